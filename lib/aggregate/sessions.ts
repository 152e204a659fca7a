import type { SessionAggregate, ShotRecord, ShotTable } from "@/lib/domain/types";
import { DEFAULT_POLICY, type Policy } from "@/lib/config/policy";
import { mean, round } from "@/lib/metrics/stats";
import { hasColumn } from "@/lib/ingest/normalize";

export function isFairwayHit(s: ShotRecord, policy: Policy = DEFAULT_POLICY): boolean {
  return s.IsDriver && s.Offline !== null && Math.abs(s.Offline) <= policy.fairwayHalfWidthM;
}

export function isGoodDrive(s: ShotRecord, policy: Policy = DEFAULT_POLICY): boolean {
  return s.IsDriver && s.Carry !== null && s.Carry > policy.goodDriveCarryM;
}

export function goodDrives(rows: ShotRecord[], policy: Policy = DEFAULT_POLICY): ShotRecord[] {
  return rows.filter((s) => isGoodDrive(s, policy));
}

/** Groups rows by key, keys sorted ascending. */
export function groupBy<K extends string>(rows: ShotRecord[], key: (s: ShotRecord) => K): [K, ShotRecord[]][] {
  const groups = new Map<K, ShotRecord[]>();
  for (const r of rows) {
    const k = key(r);
    const g = groups.get(k);
    if (g) g.push(r);
    else groups.set(k, [r]);
  }
  return Array.from(groups.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function summarizeSession(
  sessionDate: string,
  alias: string,
  rows: ShotRecord[],
  hasClubColumn: boolean,
  policy: Policy = DEFAULT_POLICY
): SessionAggregate {
  const good = goodDrives(rows, policy);
  const clubs = new Set(rows.map((r) => r.Club).filter((c): c is string => c !== null));
  return {
    SessionDate: sessionDate,
    Alias: alias,
    Hand: rows[0]?.Hand ?? "R",
    TotalShots: rows.length,
    ClubsPlayed: hasClubColumn ? clubs.size : null,
    Driver_Fairway_Count: rows.filter((r) => isFairwayHit(r, policy)).length,
    Driver_Shots_Carry_gt120: good.length,
    Driver_AvgCarry_gt120: round(mean(good.map((r) => r.Carry)), 1),
  };
}

/**
 * One Sessions row per (SessionDate, Alias), recomputed from the shots.
 */
export function aggregateSessions(table: ShotTable, policy: Policy = DEFAULT_POLICY): SessionAggregate[] {
  const hasClub = hasColumn(table, "Club");
  return groupBy(table.rows, (r) => `${r.SessionDate}\u0000${r.Alias}`).map(([key, rows]) => {
    const [date, alias] = key.split("\u0000");
    return summarizeSession(date, alias, rows, hasClub, policy);
  });
}
