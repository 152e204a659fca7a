import { promises as fs } from "fs";
import type { Hand, Identity, Roster, RosterEntry } from "@/lib/domain/types";
import { DEFAULT_HAND, UNKNOWN_ALIAS } from "@/lib/config/policy";
import { RosterConfigError } from "@/lib/errors";
import { normalizeNameKey } from "@/lib/ingest/aliases";
import { RosterPlayerSchema, type RosterPlayerInput } from "@/lib/ingest/schemas";

export const EMPTY_ROSTER: Roster = { players: new Map() };

const HAND_WORDS: Record<string, Hand> = {
  r: "R",
  right: "R",
  droitier: "R",
  l: "L",
  left: "L",
  gaucher: "L",
};

export function parseHand(v: unknown): Hand {
  if (typeof v !== "string") return DEFAULT_HAND;
  return HAND_WORDS[v.trim().toLowerCase()] ?? DEFAULT_HAND;
}

function toEntry(rawKey: string, info: RosterPlayerInput): RosterEntry {
  const name = rawKey.trim();
  if (typeof info === "string") {
    return { name, alias: info.trim() || name, hand: DEFAULT_HAND };
  }
  const alias = info.alias === undefined ? "" : String(info.alias).trim();
  return { name, alias: alias || name, hand: parseHand(info.hand) };
}

/**
 * Builds a read-only roster from a parsed roster document. Keys are
 * normalized; entries that do not validate are skipped.
 */
export function normalizeRoster(doc: unknown): Roster {
  if (typeof doc !== "object" || doc === null || Array.isArray(doc)) return EMPTY_ROSTER;
  const playersIn: unknown = "players" in doc ? doc.players : {};
  if (typeof playersIn !== "object" || playersIn === null || Array.isArray(playersIn)) return EMPTY_ROSTER;

  const players = new Map<string, RosterEntry>();
  for (const [rawKey, info] of Object.entries(playersIn)) {
    const key = normalizeNameKey(rawKey);
    if (!key) continue;
    const parsed = RosterPlayerSchema.safeParse(info);
    if (!parsed.success) {
      console.warn("[roster] skipping entry", rawKey, parsed.error.issues[0]?.message);
      continue;
    }
    players.set(key, toEntry(rawKey, parsed.data));
  }
  return { players };
}

export function parseRosterJson(text: string, path = "roster.json"): Roster {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    throw new RosterConfigError(path, e instanceof Error ? e.message : String(e));
  }
  return normalizeRoster(doc);
}

/** Loads roster.json; a missing file is an empty roster, not an error. */
export async function loadRoster(path = "roster.json"): Promise<Roster> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf8");
  } catch (e) {
    if (isNotFound(e)) return EMPTY_ROSTER;
    throw e;
  }
  return parseRosterJson(text, path);
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

export function lookup(name: string, roster: Roster): RosterEntry | undefined {
  return roster.players.get(normalizeNameKey(name));
}

export function toAlias(name: string, roster: Roster): string {
  const entry = lookup(name, roster);
  if (!entry) return UNKNOWN_ALIAS;
  return entry.alias || name.trim();
}

export function handOf(name: string, roster: Roster): Hand {
  return lookup(name, roster)?.hand ?? DEFAULT_HAND;
}

export function resolveIdentity(name: string, roster: Roster): Identity {
  const entry = lookup(name, roster);
  return {
    playerRaw: name,
    alias: entry ? entry.alias || name.trim() : UNKNOWN_ALIAS,
    hand: entry?.hand ?? DEFAULT_HAND,
    resolved: entry !== undefined,
  };
}

export function rosterAliases(roster: Roster): string[] {
  return Array.from(new Set(Array.from(roster.players.values(), (p) => p.alias))).sort();
}
