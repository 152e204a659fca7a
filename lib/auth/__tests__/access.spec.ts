import { describe, it, expect } from "vitest";
import { AccessDeniedError } from "@/lib/errors";
import { allowedAliases, assertCanView, canView } from "@/lib/auth/access";
import { normalizeRoster } from "@/lib/roster/roster";

const roster = normalizeRoster({ players: { Conre: "Sportsman", Treve: "Cyberman" } });

describe("access", () => {
  it("lets a coach see every roster alias", () => {
    const coach = { username: "coach", role: "coach" as const };
    expect(allowedAliases(coach, roster)).toEqual(["Cyberman", "Sportsman"]);
    expect(canView(coach, "Anyone", roster)).toBe(true);
  });

  it("limits a student to their own alias", () => {
    expect(allowedAliases({ username: "Conre", role: "student" }, roster)).toEqual(["Sportsman"]);
    expect(allowedAliases({ username: " Sportsman ", role: "student" }, roster)).toEqual(["Sportsman"]);
    expect(canView({ username: "Conre", role: "student" }, "Sportsman", roster)).toBe(true);
    expect(canView({ username: "Conre", role: "student" }, "Cyberman", roster)).toBe(false);
  });

  it("throws on a denied view", () => {
    expect(() => assertCanView({ username: "Treve", role: "student" }, "Sportsman", roster)).toThrow(AccessDeniedError);
  });
});
