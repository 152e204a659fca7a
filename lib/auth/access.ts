import type { Roster } from "@/lib/domain/types";
import { AccessDeniedError } from "@/lib/errors";
import { lookup, rosterAliases } from "@/lib/roster/roster";

export type Role = "coach" | "student";

// Supplied by the caller once credentials are checked elsewhere.
export type AuthIdentity = {
  username: string;
  role: Role;
};

/**
 * Aliases an identity may read reports for. A coach sees the whole roster;
 * a student sees only their own alias (the roster mapping of their username,
 * or the username itself when it is already an alias).
 */
export function allowedAliases(identity: AuthIdentity, roster: Roster): string[] {
  if (identity.role === "coach") return rosterAliases(roster);
  const entry = lookup(identity.username, roster);
  return [entry?.alias || identity.username.trim()];
}

export function canView(identity: AuthIdentity, alias: string, roster: Roster): boolean {
  if (identity.role === "coach") return true;
  return allowedAliases(identity, roster).includes(alias);
}

export function assertCanView(identity: AuthIdentity, alias: string, roster: Roster): void {
  if (!canView(identity, alias, roster)) throw new AccessDeniedError(identity.username, alias);
}
