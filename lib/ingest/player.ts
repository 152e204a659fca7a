import type { Roster } from "@/lib/domain/types";
import { UNKNOWN_ALIAS } from "@/lib/config/policy";
import { normalizeNameKey } from "./aliases";
import type { RawRow } from "./parse";

const PLAYER_COLUMNS = ["player", "Player", "Joueur", "joueur", "name", "Name"];

function playerColumn(headers: string[]): string | undefined {
  for (const c of PLAYER_COLUMNS) {
    if (headers.includes(c)) return c;
  }
  const wanted = new Set(PLAYER_COLUMNS.map((c) => c.toLowerCase()));
  return headers.find((h) => wanted.has(h.toLowerCase()));
}

function nameFromFilename(filename: string, roster?: Roster): string | null {
  const base = filename.replace(/^.*[\\/]/, "").replace(/\.csv$/i, "");
  const key = normalizeNameKey(base);
  if (roster && key) {
    const known = Array.from(roster.players.entries())
      .filter(([k]) => k !== "" && key.includes(k))
      .sort((a, b) => b[0].length - a[0].length);
    if (known.length > 0) return known[0][1].name;
  }
  const idx = base.indexOf("Shots");
  if (idx > 0) {
    const prefix = base.slice(0, idx).replace(/[\s_-]+$/, "").trim();
    if (prefix) return prefix;
  }
  return null;
}

/**
 * Player display name for one CSV: the first non-empty value of a player
 * column, else a known name found in the filename, else "UNKNOWN".
 */
export function detectPlayerName(rows: RawRow[], headers: string[], filename?: string, roster?: Roster): string {
  const col = playerColumn(headers);
  if (col) {
    for (const r of rows) {
      const v = (r[col] ?? "").trim();
      if (v && v.toLowerCase() !== "nan") return v;
    }
  }
  if (filename) {
    const fromFile = nameFromFilename(filename, roster);
    if (fromFile) return fromFile;
  }
  return UNKNOWN_ALIAS;
}
