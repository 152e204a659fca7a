import type { ShotTable } from "@/lib/domain/types";
import { orderColumns } from "@/lib/ingest/normalize";

// cos(±90°) is ~6e-17 in floating point, not 0.
const COS_EPSILON = 1e-9;

export type SpinComponents = {
  spinTotal: number | null;
  spinLat: number | null;
};

/**
 * SpinTotal = BackSpin / cos(axis), SpinLat = SpinTotal * sin(axis).
 * Both are null when an input is missing or the axis is ±90°.
 */
export function deriveSpin(backSpin: number | null, spinAxisDeg: number | null): SpinComponents {
  if (backSpin === null || spinAxisDeg === null) return { spinTotal: null, spinLat: null };
  const rad = (spinAxisDeg * Math.PI) / 180;
  const cos = Math.cos(rad);
  if (Math.abs(cos) < COS_EPSILON) return { spinTotal: null, spinLat: null };
  const spinTotal = backSpin / cos;
  return { spinTotal, spinLat: spinTotal * Math.sin(rad) };
}

export type SpinReport = {
  table: ShotTable;
  recomputed: boolean;
  undefinedRows: number; // both inputs present but the decomposition is undefined
};

/**
 * Recomputes SpinTotal/SpinLat for every row, replacing any vendor-supplied
 * values. Tables without a BackSpin or SpinAxis column pass through as is.
 */
export function recomputeSpins(table: ShotTable): SpinReport {
  if (!table.columns.includes("BackSpin") || !table.columns.includes("SpinAxis")) {
    return { table, recomputed: false, undefinedRows: 0 };
  }
  let undefinedRows = 0;
  const rows = table.rows.map((r) => {
    const { spinTotal, spinLat } = deriveSpin(r.BackSpin, r.SpinAxis);
    if (spinTotal === null && r.BackSpin !== null && r.SpinAxis !== null) undefinedRows += 1;
    const { SpinTotal: _t, SpinLat: _l, ...extras } = r.extras;
    return { ...r, SpinTotal: spinTotal, SpinLat: spinLat, extras };
  });
  const columns = orderColumns([...table.columns, "SpinTotal", "SpinLat"]);
  return { table: { columns, rows }, recomputed: true, undefinedRows };
}
