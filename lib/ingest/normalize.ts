import type { CanonicalColumn, Hand, NumericField, ShotRecord, ShotTable } from "@/lib/domain/types";
import { NUMERIC_FIELDS } from "@/lib/domain/types";
import { DEFAULT_POLICY, type Policy } from "@/lib/config/policy";
import { ALIASED_FIELDS, PLAIN_NUMERIC_FIELDS, SIGNED_FIELDS, resolveFieldColumns } from "./aliases";
import { isDriver } from "./clubs";
import type { RawTable } from "./parse";
import { parseSignedDirection, toOptNumber } from "./schemas";

export type BatchMeta = {
  sessionDate: string;
  playerRaw: string;
  alias: string;
  hand: Hand;
};

export type CanonicalizeReport = {
  table: ShotTable;
  unknownColumns: string[];
  smashComputed: boolean;
  smashUndefined: number; // rows where the BallSpeed/ClubSpeed ratio was undefined
};

// Output order of canonical columns in the Shots sheet.
const COLUMN_ORDER: CanonicalColumn[] = [
  "SessionDate",
  "Alias",
  "PlayerRaw",
  "Hand",
  "Club",
  "IsDriver",
  ...NUMERIC_FIELDS,
];

const META_COLUMNS: CanonicalColumn[] = ["SessionDate", "PlayerRaw", "Alias", "Hand", "IsDriver"];

function emptyShot(meta: BatchMeta): ShotRecord {
  const rec: ShotRecord = {
    Club: null,
    Carry: null,
    Total: null,
    Offline: null,
    ClubSpeed: null,
    BallSpeed: null,
    Smash: null,
    HLA: null,
    VLA: null,
    BackSpin: null,
    SpinAxis: null,
    SpinTotal: null,
    SpinLat: null,
    PeakHeight: null,
    DescAngle: null,
    SessionDate: meta.sessionDate,
    PlayerRaw: meta.playerRaw,
    Alias: meta.alias,
    Hand: meta.hand,
    IsDriver: false,
    extras: {},
  };
  return rec;
}

const CANONICAL = new Set<string>(COLUMN_ORDER);

export function isCanonicalColumn(c: string): c is CanonicalColumn {
  return CANONICAL.has(c);
}

export function orderColumns(present: Iterable<string>): string[] {
  const set = new Set(present);
  const canonical = COLUMN_ORDER.filter((c) => set.has(c));
  const extras = Array.from(set).filter((c) => !CANONICAL.has(c));
  return [...canonical, ...extras];
}

/**
 * Smash = BallSpeed / ClubSpeed clipped to [0, smashMax].
 * Non-finite ratios (zero club speed) are missing.
 */
export function fallbackSmash(ballSpeed: number | null, clubSpeed: number | null, smashMax = DEFAULT_POLICY.smashMax): number | null {
  if (ballSpeed === null || clubSpeed === null) return null;
  const r = ballSpeed / clubSpeed;
  if (!Number.isFinite(r)) return null;
  return Math.min(smashMax, Math.max(0, r));
}

/**
 * Maps one raw launch-monitor table onto canonical shot records and attaches
 * the batch metadata. Unrecognized columns are carried in `extras`.
 */
export function canonicalizeShots(raw: RawTable, meta: BatchMeta, policy: Policy = DEFAULT_POLICY): CanonicalizeReport {
  const sources = resolveFieldColumns(raw.headers);
  const used = new Set(Object.values(sources));
  const unknownColumns = raw.headers.filter((h) => !used.has(h));

  const rows = raw.rows.map((r) => {
    const shot = emptyShot(meta);
    const clubCol = sources.Club;
    if (clubCol) {
      const label = r[clubCol]?.trim() ?? "";
      shot.Club = label === "" ? null : label;
    }
    for (const f of SIGNED_FIELDS) {
      const col = sources[f];
      if (col) shot[f] = parseSignedDirection(r[col]);
    }
    for (const f of PLAIN_NUMERIC_FIELDS) {
      const col = sources[f];
      if (col) shot[f] = toOptNumber(r[col]);
    }
    for (const h of unknownColumns) shot.extras[h] = r[h] ?? "";
    shot.IsDriver = isDriver(shot.Club);
    return shot;
  });

  const columns = new Set<string>();
  for (const f of ALIASED_FIELDS) if (sources[f]) columns.add(f);

  let smashComputed = false;
  let smashUndefined = 0;
  const smashMissing = !sources.Smash || rows.every((s) => s.Smash === null);
  if (smashMissing && sources.BallSpeed && sources.ClubSpeed) {
    smashComputed = true;
    for (const s of rows) {
      s.Smash = fallbackSmash(s.BallSpeed, s.ClubSpeed, policy.smashMax);
      if (s.Smash === null && s.BallSpeed !== null && s.ClubSpeed !== null) smashUndefined += 1;
    }
    columns.add("Smash");
  }

  for (const c of META_COLUMNS) columns.add(c);
  for (const h of unknownColumns) columns.add(h);

  return {
    table: { columns: orderColumns(columns), rows },
    unknownColumns,
    smashComputed,
    smashUndefined,
  };
}

export function concatShotTables(tables: ShotTable[]): ShotTable {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const t of tables) {
    for (const c of t.columns) {
      if (!seen.has(c)) {
        seen.add(c);
        columns.push(c);
      }
    }
  }
  return { columns: orderColumns(columns), rows: tables.flatMap((t) => t.rows) };
}

export function hasColumn(table: ShotTable, col: NumericField | "Club"): boolean {
  return table.columns.includes(col);
}
