import type { Hand, ShotRecord } from "@/lib/domain/types";
import { DEFAULT_POLICY, type Policy } from "@/lib/config/policy";
import { driverKpis, type DriverKpis } from "@/lib/aggregate/driver";
import { goodDrives } from "@/lib/aggregate/sessions";
import { curveTendency, dispersionEllipse, mean, percentWhere, stdDev } from "@/lib/metrics/stats";
import { NOT_AVAILABLE, fmt, linesDocument, pointsOf, type Block, type ReportDocument, type ScatterChart } from "./document";
import type { ReportLetter } from "./naming";

export type StudentInput = {
  alias: string;
  hand: Hand;
  sessionDate: string;
  shots: ShotRecord[]; // this player's shots only
  hasClubColumn: boolean;
  policy?: Policy;
};

const handLabel = (hand: Hand) => (hand === "L" ? "left-handed" : "right-handed");

/** Header lines shared by every student document, including the fallback one. */
export function studentSummaryLines(input: StudentInput): string[] {
  const policy = input.policy ?? DEFAULT_POLICY;
  const drv = input.shots.filter((s) => s.IsDriver);
  const good = goodDrives(drv, policy);
  return [
    `Session: ${input.sessionDate}`,
    `Alias: ${input.alias}`,
    `Hand: ${input.hand}`,
    `Total shots: ${input.shots.length}`,
    `Driver shots: ${drv.length}`,
    `Driver shots (carry>${policy.goodDriveCarryM}m): ${good.length}`,
    `Driver avg carry (m): ${fmt(mean(good.map((s) => s.Carry)))}`,
    `Driver avg offline (m): ${fmt(mean(drv.map((s) => s.Offline)))}`,
  ];
}

function dispersionChart(drives: ShotRecord[], policy: Policy, levels: (0.68 | 0.95)[]): ScatterChart {
  const xs = drives.map((s) => s.Carry);
  const ys = drives.map((s) => s.Offline);
  const ellipses: NonNullable<ScatterChart["ellipses"]> = [];
  for (const level of levels) {
    const e = dispersionEllipse(xs, ys, level);
    if (e) ellipses.push({ ellipse: e, dashed: level === 0.95 });
  }
  return {
    kind: "scatter",
    title: `Driver - Carry vs Offline (zone +/-${policy.fairwayHalfWidthM} m)`,
    xLabel: "Carry (m)",
    yLabel: "Offline (m)",
    series: [{ label: "Drives", points: pointsOf(drives, (s) => s.Carry, (s) => s.Offline) }],
    band: { min: -policy.fairwayHalfWidthM, max: policy.fairwayHalfWidthM },
    ellipses,
    yRange: [-50, 50],
  };
}

function scatter(title: string, xLabel: string, yLabel: string, drives: ShotRecord[], x: (s: ShotRecord) => number | null, y: (s: ShotRecord) => number | null): Block {
  return {
    type: "chart",
    chart: { kind: "scatter", title, xLabel, yLabel, series: [{ label: yLabel, points: pointsOf(drives, x, y) }] },
  };
}

/**
 * Model A: driver dispersion and launch over good drives, with 68 % and 95 %
 * ellipses.
 */
export function buildModelA(input: StudentInput): ReportDocument {
  const policy = input.policy ?? DEFAULT_POLICY;
  const drv = goodDrives(input.shots, policy);
  const clubs = new Set(input.shots.map((s) => s.Club).filter((c) => c !== null));
  const blocks: Block[] = [
    {
      type: "keyValue",
      rows: [
        ["Session date", input.sessionDate],
        ["Player", input.alias],
        ["Hand", handLabel(input.hand)],
        ["Total shots", String(input.shots.length)],
        ["Clubs played", input.hasClubColumn ? String(clubs.size) : NOT_AVAILABLE],
      ],
    },
    { type: "pageBreak" },
    { type: "heading", text: "1) Driver", level: 1 },
    { type: "heading", text: "A. Carry vs Offline", level: 2 },
  ];

  if (drv.length === 0) {
    blocks.push({ type: "paragraph", text: `No usable drive (carry > ${policy.goodDriveCarryM} m): ${NOT_AVAILABLE}.` });
    return { title: `Model A - ${input.alias}`, blocks };
  }

  const offline = drv.map((s) => s.Offline);
  const smash = mean(drv.map((s) => s.Smash));
  let comment =
    `Over ${drv.length} drives (carry > ${policy.goodDriveCarryM} m): average carry ${fmt(mean(drv.map((s) => s.Carry)))} m, ` +
    `offline spread (std) ${fmt(stdDev(offline))} m, ` +
    `${fmt(percentWhere(offline, (v) => Math.abs(v) <= policy.fairwayHalfWidthM), 0)}% within +/-${policy.fairwayHalfWidthM} m.`;
  if (smash !== null) comment += ` Average smash ${fmt(smash, 2)}.`;

  blocks.push(
    { type: "chart", chart: dispersionChart(drv, policy, [0.68, 0.95]) },
    { type: "paragraph", text: comment },
    { type: "pageBreak" },
    { type: "heading", text: "B. Strike efficiency - Smash vs Carry", level: 2 },
    scatter("Driver - Smash vs Carry", "Smash factor", "Carry (m)", drv, (s) => s.Smash, (s) => s.Carry),
    { type: "paragraph", text: "Aim for a stable, high smash on most shots. An unstable smash points to irregular contact on the face." },
    { type: "pageBreak" },
    { type: "heading", text: "C. Launch angles - HLA & VLA", level: 2 },
    scatter("Driver - HLA vs Carry", "HLA (deg)", "Carry (m)", drv, (s) => s.HLA, (s) => s.Carry),
    scatter("Driver - VLA vs Carry", "VLA (deg)", "Carry (m)", drv, (s) => s.VLA, (s) => s.Carry),
    { type: "paragraph", text: "An HLA close to 0 tightens dispersion; a consistent VLA steadies height and efficiency." },
    { type: "pageBreak" },
    { type: "heading", text: "D. Lateral spin - flight control", level: 2 },
    scatter("Driver - Lateral spin vs Carry", "Carry (m)", "Lateral spin (rpm)", drv, (s) => s.Carry, (s) => s.SpinLat),
    { type: "paragraph", text: "High lateral spin increases curvature and reduces margin. Look for a tight lateral spin window." }
  );
  return { title: `Model A - ${input.alias}`, blocks };
}

export function kpiRows(k: DriverKpis, policy: Policy): [string, string][] {
  return [
    ["Drives (total)", String(k.drives)],
    [`Drives (carry > ${policy.goodDriveCarryM} m)`, String(k.goodDrives)],
    [`Average carry (m) [>${policy.goodDriveCarryM} m]`, fmt(k.avgCarryGood, 2)],
    ["Average total (m)", fmt(k.avgTotal, 2)],
    ["Average offline (m)", fmt(k.avgOffline, 2)],
    ["Offline std (m)", fmt(k.stdOffline, 2)],
    [`% within +/-${policy.fairwayHalfWidthM} m`, fmt(k.fairwayPct, 2)],
    ["Average club speed (mph)", fmt(k.avgClubSpeed, 2)],
    ["Average ball speed (mph)", fmt(k.avgBallSpeed, 2)],
    ["Average smash", fmt(k.avgSmash, 2)],
    ["Average HLA (deg)", fmt(k.avgHLA, 2)],
    ["Average VLA (deg)", fmt(k.avgVLA, 2)],
    ["Average back spin (rpm)", fmt(k.avgBackSpin, 2)],
    ["Average spin axis (deg)", fmt(k.avgSpinAxis, 2)],
    ["Average peak height (m)", fmt(k.avgPeakHeight, 2)],
    ["Average descent angle (deg)", fmt(k.avgDescAngle, 2)],
  ];
}

export function dominantFault(drives: ShotRecord[], hand: Hand): string {
  const off = drives.map((s) => s.Offline).filter((v): v is number => v !== null);
  if (off.length === 0) return "Not enough data to qualify a dominant fault.";
  if (off.length < 5) return "Few drives: the dominant fault is still unstable. Collect more data.";
  const bias = mean(off) ?? 0;
  const spread = stdDev(off) ?? 0;
  const curve = curveTendency(hand, mean(drives.map((s) => s.SpinAxis)));
  const curveText = curve === null ? "Spin axis not available: curve tendency undetermined." : `Curve tendency: ${curve}.`;
  return (
    `Typical dispersion: offline std ~ ${spread.toFixed(1)} m. ` +
    `Average bias ~ ${bias.toFixed(1)} m (${bias > 0 ? "right" : "left"}). ` +
    `${curveText} Priority: reduce the bias, then tighten the dispersion.`
  );
}

export function courseDecision(drives: ShotRecord[], policy: Policy): string {
  const off = drives.filter((s) => s.Carry !== null && s.Offline !== null).map((s) => s.Offline);
  const bias = mean(off);
  const pct = percentWhere(off, (v) => Math.abs(v) <= policy.fairwayHalfWidthM);
  if (bias === null || pct === null) return "No usable driver data.";
  const side = bias > 2 ? "right" : bias < -2 ? "left" : "centered";
  const level = pct >= 60 ? "comfortable" : pct >= 40 ? "average" : "risky";
  const aim = -bias * 0.5;
  return (
    `Course reading: ${level} dispersion (~${pct.toFixed(0)}% within +/-${policy.fairwayHalfWidthM} m). ` +
    `Bias ${side} (~${bias.toFixed(1)} m). ` +
    `Simple decision: aim ~${aim.toFixed(1)} m toward the side opposite the bias, ` +
    `and pick lines that avoid the big miss (outer edge of the 95% ellipse).`
  );
}

/** Model B: driver-only coaching report. */
export function buildModelB(input: StudentInput): ReportDocument {
  const policy = input.policy ?? DEFAULT_POLICY;
  const drv = input.shots.filter((s) => s.IsDriver);
  const k = driverKpis(input.shots, policy);
  const plotted = drv.filter((s) => s.Carry !== null && s.Offline !== null);
  const offline = plotted.map((s) => s.Offline);
  const avgAxis = mean(plotted.map((s) => s.SpinAxis));
  const curve = curveTendency(input.hand, avgAxis);

  let dispersion =
    `${fmt(percentWhere(offline, (v) => Math.abs(v) <= policy.fairwayHalfWidthM), 0)}% of drives finish within ` +
    `+/-${policy.fairwayHalfWidthM} m. Average offline bias ~ ${fmt(mean(offline))} m.`;
  if (avgAxis !== null && curve !== null) dispersion += ` Average spin axis ~ ${avgAxis.toFixed(1)} deg: ${curve} tendency.`;

  const efficiency =
    k.avgSmash === null
      ? `Smash ${NOT_AVAILABLE} (missing speeds). Check Ball Speed / Club Speed in the CSV.`
      : `Average smash ~ ${k.avgSmash.toFixed(2)}. Goal: steady the strike to gain carry at constant speed.`;

  const blocks: Block[] = [
    {
      type: "keyValue",
      rows: [
        ["Session date", input.sessionDate],
        ["Name / alias", input.alias],
        ["Hand", handLabel(input.hand)],
        ["Drives", String(drv.length)],
      ],
    },
    { type: "pageBreak" },
    { type: "heading", text: "1) Driver key indicators", level: 1 },
    { type: "table", header: ["KPI", "Value"], rows: kpiRows(k, policy) },
    {
      type: "paragraph",
      text: `Average carry is computed over drives with carry > ${policy.goodDriveCarryM} m so that topped or missed shots do not drag the level down.`,
    },
    { type: "pageBreak" },
    { type: "heading", text: "2) Dispersion & flight control", level: 1 },
    { type: "chart", chart: dispersionChart(plotted, policy, [0.95]) },
    { type: "paragraph", text: dispersion },
    { type: "pageBreak" },
    { type: "heading", text: "3) Strike efficiency (Smash)", level: 1 },
    scatter("Strike efficiency - Smash vs Carry", "Smash factor", "Carry (m)", drv, (s) => s.Smash, (s) => s.Carry),
    { type: "paragraph", text: efficiency },
    { type: "pageBreak" },
    { type: "heading", text: "4) Launch angles (HLA / VLA)", level: 1 },
    scatter("Start direction - HLA vs Carry", "Carry (m)", "HLA (deg)", drv, (s) => s.Carry, (s) => s.HLA),
    scatter("Launch height - VLA vs Carry", "Carry (m)", "VLA (deg)", drv, (s) => s.Carry, (s) => s.VLA),
    {
      type: "paragraph",
      text: "HLA tells where the ball starts, VLA sets the flight window. Look for a steadier start line (HLA near 0) before chasing height.",
    },
    { type: "pageBreak" },
    { type: "heading", text: "5) Spin - consistency and tendency", level: 1 },
    {
      type: "chart",
      chart: {
        kind: "scatter",
        title: "Driver spin - back spin & lateral",
        xLabel: "Carry (m)",
        yLabel: "Spin (rpm)",
        series: [
          { label: "BackSpin", points: pointsOf(drv, (s) => s.Carry, (s) => s.BackSpin) },
          { label: "Lateral spin", points: pointsOf(drv, (s) => s.Carry, (s) => s.SpinLat) },
        ],
      },
    },
    {
      type: "paragraph",
      text: "Back spin drives lift, lateral spin drives curvature. Reduce lateral spin variability rather than forcing a shape.",
    },
    { type: "pageBreak" },
    { type: "heading", text: "6) Dominant fault profile", level: 1 },
    { type: "paragraph", text: dominantFault(drv, input.hand) },
    { type: "pageBreak" },
    { type: "heading", text: "7) Course decision matrix", level: 1 },
    { type: "paragraph", text: courseDecision(drv, policy) },
    { type: "pageBreak" },
    { type: "heading", text: "8) Training plan (2 months)", level: 1 },
    {
      type: "paragraph",
      text:
        `Two-month goal (driver): +10% of balls within +/-${policy.fairwayHalfWidthM} m and +5 to +10 m of average carry ` +
        `(drives > ${policy.goodDriveCarryM} m) without widening the dispersion. Focus: contact, start line, lateral spin.`,
    },
  ];
  return { title: `Model B - ${input.alias}`, blocks };
}

/** Letters without dedicated content carry the summary lines only. */
export function buildStudentSummary(letter: ReportLetter, input: StudentInput): ReportDocument {
  return linesDocument(`Model ${letter} - ${input.alias}`, studentSummaryLines(input));
}
