import type { Ellipse } from "@/lib/metrics/stats";

// Library-agnostic description of a report. Models build these from
// already-computed numbers; pdf.ts is the only place that lays them out.

export const NOT_AVAILABLE = "not available";

export type Point = [x: number, y: number];

export type ScatterChart = {
  kind: "scatter";
  title: string;
  xLabel: string;
  yLabel: string;
  series: { label: string; points: Point[] }[];
  band?: { min: number; max: number }; // horizontal band, e.g. the fairway
  ellipses?: { ellipse: Ellipse; dashed: boolean }[];
  yRange?: [number, number];
};

export type BarChart = {
  kind: "bar";
  title: string;
  yLabel: string;
  bars: { label: string; value: number | null }[];
};

export type Chart = ScatterChart | BarChart;

export type Block =
  | { type: "heading"; text: string; level: 1 | 2 }
  | { type: "paragraph"; text: string }
  | { type: "keyValue"; rows: [string, string][] }
  | { type: "table"; header: string[]; rows: string[][] }
  | { type: "chart"; chart: Chart }
  | { type: "pageBreak" };

export type ReportDocument = {
  title: string;
  blocks: Block[];
};

/** Fixed-digit rendering; null and non-finite values read "not available". */
export function fmt(v: number | null | undefined, digits = 1): string {
  if (v === null || v === undefined || !Number.isFinite(v)) return NOT_AVAILABLE;
  return v.toFixed(digits);
}

// Pairs of finite values, for scatter series.
export function pointsOf<T>(rows: T[], x: (r: T) => number | null, y: (r: T) => number | null): Point[] {
  const out: Point[] = [];
  for (const r of rows) {
    const a = x(r);
    const b = y(r);
    if (a !== null && b !== null && Number.isFinite(a) && Number.isFinite(b)) out.push([a, b]);
  }
  return out;
}

/** Plain document made of text lines, used for summary and fallback reports. */
export function linesDocument(title: string, lines: string[]): ReportDocument {
  return { title, blocks: lines.map((text) => ({ type: "paragraph", text })) };
}
