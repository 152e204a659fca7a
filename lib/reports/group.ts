import type { PlayerDriverSummary, ShotTable } from "@/lib/domain/types";
import { DEFAULT_POLICY, type Policy } from "@/lib/config/policy";
import { goodDrives, groupBy } from "@/lib/aggregate/sessions";
import { groupDriverSummary, rankPlayers } from "@/lib/aggregate/group";
import { dispersionEllipse } from "@/lib/metrics/stats";
import { NOT_AVAILABLE, fmt, linesDocument, pointsOf, type Block, type ReportDocument, type ScatterChart } from "./document";
import type { ReportLetter } from "./naming";

export type GroupInput = {
  sessionDate: string;
  table: ShotTable;
  policy?: Policy;
};

export function groupSummaryLines(input: GroupInput): string[] {
  const players = Array.from(new Set(input.table.rows.map((s) => s.Alias))).sort();
  return [`Session: ${input.sessionDate}`, `Players: ${players.join(", ")}`];
}

// Leader of a ranking, with its value; null when no player has the metric.
function leader(
  ranking: string[],
  summary: PlayerDriverSummary[],
  metric: (s: PlayerDriverSummary) => number | null
): { alias: string; value: number } | null {
  const top = summary.find((s) => s.Alias === ranking[0]);
  const value = top ? metric(top) : null;
  return top && value !== null ? { alias: top.Alias, value } : null;
}

export function coachTakeaways(summary: PlayerDriverSummary[], policy: Policy): string[] {
  if (summary.length === 0) return ["Not enough data to compare players (driver)."];
  const r = rankPlayers(summary);
  const lines: string[] = [];
  const carry = leader(r.byCarry, summary, (s) => s.AvgCarry);
  if (carry) lines.push(`Distance (driver carry > ${policy.goodDriveCarryM} m): best carry = ${carry.alias} (${carry.value.toFixed(1)} m).`);
  const acc = leader(r.byAccuracy, summary, (s) => s.AvgAbsOffline);
  if (acc) {
    const fw = summary.find((s) => s.Alias === acc.alias)?.FairwayPct ?? null;
    lines.push(
      `Accuracy: tightest lateral dispersion (average |offline|) = ${acc.alias} (${acc.value.toFixed(1)} m), ` +
        `fairway +/-${policy.fairwayHalfWidthM} m = ${fmt(fw, 0)}%.`
    );
  }
  const smash = leader(r.bySmash, summary, (s) => s.AvgSmash);
  if (smash) lines.push(`Strike efficiency: best average smash = ${smash.alias} (${smash.value.toFixed(2)}).`);
  lines.push("Recommendation: prioritize (1) consistency (|offline| and fairway %), then (2) smash, then (3) spin and angle tuning.");
  return lines;
}

/** Model C: driver comparison across players, good drives only. */
export function buildModelC(input: GroupInput): ReportDocument {
  const policy = input.policy ?? DEFAULT_POLICY;
  const summary = groupDriverSummary(input.table, policy);
  const good = goodDrives(input.table.rows, policy);

  const series: ScatterChart["series"] = [];
  const ellipses: NonNullable<ScatterChart["ellipses"]> = [];
  for (const [alias, rows] of groupBy(good, (s) => s.Alias)) {
    series.push({ label: alias, points: pointsOf(rows, (s) => s.Carry, (s) => s.Offline) });
    const e = dispersionEllipse(rows.map((s) => s.Carry), rows.map((s) => s.Offline), 0.95);
    if (e) ellipses.push({ ellipse: e, dashed: true });
  }

  const blocks: Block[] = [
    { type: "keyValue", rows: [["Session date", input.sessionDate]] },
    { type: "heading", text: `1) Driver - comparative KPIs (carry > ${policy.goodDriveCarryM} m)`, level: 1 },
    {
      type: "table",
      header: ["Alias", "N", "Carry", "Std carry", "Offline", "Std offline", "|Offline|", "Fairway %", "Smash", "BackSpin", "Spin axis", "Lat. spin", "HLA", "VLA", "Peak H"],
      rows: summary.map((s) => [
        s.Alias,
        String(s.N),
        fmt(s.AvgCarry),
        fmt(s.StdCarry),
        fmt(s.AvgOffline),
        fmt(s.StdOffline),
        fmt(s.AvgAbsOffline),
        fmt(s.FairwayPct, 0),
        fmt(s.AvgSmash, 2),
        fmt(s.AvgBackSpin, 0),
        fmt(s.AvgSpinAxis),
        fmt(s.AvgSpinLat, 0),
        fmt(s.AvgHLA),
        fmt(s.AvgVLA),
        fmt(s.AvgPeakHeight),
      ]),
    },
    { type: "heading", text: "2) Dispersion (95% ellipse)", level: 1 },
    {
      type: "chart",
      chart: {
        kind: "scatter",
        title: "Driver comparison - Carry vs Offline (95% ellipse)",
        xLabel: `Carry (m) - driver (carry > ${policy.goodDriveCarryM} m)`,
        yLabel: "Offline (m)",
        series,
        band: { min: -policy.fairwayHalfWidthM, max: policy.fairwayHalfWidthM },
        ellipses,
        yRange: [-50, 50],
      },
    },
    { type: "heading", text: "3) Coach takeaways", level: 1 },
    ...coachTakeaways(summary, policy).map((text): Block => ({ type: "paragraph", text })),
  ];
  return { title: "Model C - GROUPE", blocks };
}

/** Model D: group KPI table and rankings. */
export function buildModelD(input: GroupInput): ReportDocument {
  const policy = input.policy ?? DEFAULT_POLICY;
  const summary = groupDriverSummary(input.table, policy);
  const r = rankPlayers(summary);
  const byAlias = new Map(summary.map((s) => [s.Alias, s]));
  const bars = (order: string[], metric: (s: PlayerDriverSummary) => number | null) =>
    order.map((alias) => {
      const s = byAlias.get(alias);
      return { label: alias, value: s ? metric(s) : null };
    });

  const blocks: Block[] = [
    { type: "keyValue", rows: [["Session date", input.sessionDate]] },
    { type: "heading", text: `1) Group KPIs (driver > ${policy.goodDriveCarryM} m)`, level: 1 },
    {
      type: "table",
      header: ["Alias", "N", "Carry", "|Offline|", "Fairway %", "Smash"],
      rows: summary.map((s) => [s.Alias, String(s.N), fmt(s.AvgCarry), fmt(s.AvgAbsOffline), fmt(s.FairwayPct, 0), fmt(s.AvgSmash, 2)]),
    },
    { type: "heading", text: "2) Rankings", level: 1 },
    { type: "chart", chart: { kind: "bar", title: "Group - average carry", yLabel: "Carry (m)", bars: bars(r.byCarry, (s) => s.AvgCarry) } },
    { type: "chart", chart: { kind: "bar", title: `Group - % fairway (+/-${policy.fairwayHalfWidthM} m)`, yLabel: "Fairway %", bars: bars(r.byFairway, (s) => s.FairwayPct) } },
    { type: "chart", chart: { kind: "bar", title: "Group - average smash", yLabel: "Smash", bars: bars(r.bySmash, (s) => s.AvgSmash) } },
    {
      type: "table",
      header: ["Rank", "Carry", "Accuracy", "Smash", "Fairway"],
      rows: r.byCarry.map((_, i) => [String(i + 1), r.byCarry[i], r.byAccuracy[i], r.bySmash[i], r.byFairway[i]]),
    },
  ];

  if (summary.length === 0) {
    blocks.push({ type: "paragraph", text: `Group rankings: ${NOT_AVAILABLE}.` });
  } else {
    const carry = leader(r.byCarry, summary, (s) => s.AvgCarry);
    const acc = leader(r.byFairway, summary, (s) => s.FairwayPct);
    const smash = leader(r.bySmash, summary, (s) => s.AvgSmash);
    blocks.push(
      { type: "heading", text: "3) Coach analysis & group plan", level: 1 },
      { type: "paragraph", text: carry ? `Distance leader: ${carry.alias} (carry ${carry.value.toFixed(1)} m).` : `Distance leader: ${NOT_AVAILABLE}.` },
      { type: "paragraph", text: acc ? `Accuracy leader: ${acc.alias} (${acc.value.toFixed(0)}% within +/-${policy.fairwayHalfWidthM} m).` : `Accuracy leader: ${NOT_AVAILABLE}.` },
      { type: "paragraph", text: smash ? `Efficiency leader: ${smash.alias} (smash ${smash.value.toFixed(2)}).` : `Efficiency leader: ${NOT_AVAILABLE}.` },
      {
        type: "paragraph",
        text: "Group focus (2 months): (1) centered contact at controlled speed, (2) start line and face control, (3) a dispersion routine on target and alignment.",
      }
    );
  }
  return { title: "Model D - GROUPE", blocks };
}

export function buildGroupSummary(letter: ReportLetter, input: GroupInput): ReportDocument {
  return linesDocument(`Model ${letter} - GROUPE`, groupSummaryLines(input));
}
