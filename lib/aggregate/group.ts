import type { PlayerDriverSummary, ShotRecord, ShotTable } from "@/lib/domain/types";
import { DEFAULT_POLICY, type Policy } from "@/lib/config/policy";
import { mean, percentWhere, stdDev } from "@/lib/metrics/stats";
import { goodDrives, groupBy } from "./sessions";

export function summarizePlayerDrives(alias: string, good: ShotRecord[], policy: Policy = DEFAULT_POLICY): PlayerDriverSummary {
  const offline = good.map((r) => r.Offline);
  return {
    Alias: alias,
    N: good.length,
    AvgCarry: mean(good.map((r) => r.Carry)),
    StdCarry: stdDev(good.map((r) => r.Carry)),
    AvgOffline: mean(offline),
    StdOffline: stdDev(offline),
    AvgAbsOffline: mean(offline.map((v) => (v === null ? null : Math.abs(v)))),
    FairwayPct: percentWhere(offline, (v) => Math.abs(v) <= policy.fairwayHalfWidthM),
    AvgSmash: mean(good.map((r) => r.Smash)),
    AvgBackSpin: mean(good.map((r) => r.BackSpin)),
    AvgSpinAxis: mean(good.map((r) => r.SpinAxis)),
    AvgSpinLat: mean(good.map((r) => r.SpinLat)),
    AvgHLA: mean(good.map((r) => r.HLA)),
    AvgVLA: mean(good.map((r) => r.VLA)),
    AvgPeakHeight: mean(good.map((r) => r.PeakHeight)),
  };
}

/** Driver comparison over good drives, one row per alias that has any. */
export function groupDriverSummary(table: ShotTable, policy: Policy = DEFAULT_POLICY): PlayerDriverSummary[] {
  return groupBy(goodDrives(table.rows, policy), (r) => r.Alias).map(([alias, rows]) =>
    summarizePlayerDrives(alias, rows, policy)
  );
}

export type Rankings = {
  byCarry: string[];
  byAccuracy: string[];
  bySmash: string[];
  byFairway: string[];
};

// Stable sort; players missing the metric go last in their original order.
function rankBy(summary: PlayerDriverSummary[], metric: (s: PlayerDriverSummary) => number | null, dir: "asc" | "desc"): string[] {
  const withValue = summary.filter((s) => metric(s) !== null);
  const without = summary.filter((s) => metric(s) === null);
  const sorted = withValue
    .map((s, i) => ({ s, i, v: metric(s) ?? 0 }))
    .sort((a, b) => (a.v === b.v ? a.i - b.i : dir === "asc" ? a.v - b.v : b.v - a.v))
    .map((x) => x.s);
  return [...sorted, ...without].map((s) => s.Alias);
}

/** Carry desc, |offline| asc, smash desc, fairway % desc. */
export function rankPlayers(summary: PlayerDriverSummary[]): Rankings {
  return {
    byCarry: rankBy(summary, (s) => s.AvgCarry, "desc"),
    byAccuracy: rankBy(summary, (s) => s.AvgAbsOffline, "asc"),
    bySmash: rankBy(summary, (s) => s.AvgSmash, "desc"),
    byFairway: rankBy(summary, (s) => s.FairwayPct, "desc"),
  };
}
