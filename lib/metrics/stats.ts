import { MIN_ELLIPSE_POINTS, NEUTRAL_SPIN_AXIS_DEG } from "@/lib/config/policy";
import type { Hand } from "@/lib/domain/types";

export function finite(values: Iterable<number | null | undefined>): number[] {
  const out: number[] = [];
  for (const v of values) if (typeof v === "number" && Number.isFinite(v)) out.push(v);
  return out;
}

/** Mean of the finite values; null when there are none. */
export function mean(values: Iterable<number | null | undefined>): number | null {
  const xs = finite(values);
  if (xs.length === 0) return null;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

/** Population standard deviation (ddof = 0) of the finite values. */
export function stdDev(values: Iterable<number | null | undefined>): number | null {
  const xs = finite(values);
  if (xs.length === 0) return null;
  const m = xs.reduce((a, b) => a + b, 0) / xs.length;
  return Math.sqrt(xs.reduce((a, b) => a + (b - m) ** 2, 0) / xs.length);
}

/** Share (0-100) of finite values satisfying `pred`; null when there are none. */
export function percentWhere(values: Iterable<number | null | undefined>, pred: (v: number) => boolean): number | null {
  const xs = finite(values);
  if (xs.length === 0) return null;
  return (xs.filter(pred).length / xs.length) * 100;
}

export function round(v: number | null, digits: number): number | null {
  if (v === null) return null;
  const f = 10 ** digits;
  return Math.round(v * f) / f;
}

export type Ellipse = {
  cx: number;
  cy: number;
  width: number; // full axis lengths
  height: number;
  angleDeg: number;
};

// chi-square quantiles, 2 degrees of freedom
const CHI2_68 = 2.27886856637673;
const CHI2_95 = 5.991464547107979;

/**
 * Confidence ellipse of a 2-D point cloud from its sample covariance.
 * Null when fewer than five finite pairs are available.
 */
export function dispersionEllipse(xs: (number | null)[], ys: (number | null)[], level: 0.68 | 0.95): Ellipse | null {
  const px: number[] = [];
  const py: number[] = [];
  for (let i = 0; i < Math.min(xs.length, ys.length); i++) {
    const x = xs[i];
    const y = ys[i];
    if (x === null || y === null || !Number.isFinite(x) || !Number.isFinite(y)) continue;
    px.push(x);
    py.push(y);
  }
  const n = px.length;
  if (n < MIN_ELLIPSE_POINTS) return null;

  const mx = px.reduce((a, b) => a + b, 0) / n;
  const my = py.reduce((a, b) => a + b, 0) / n;
  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    sxx += (px[i] - mx) ** 2;
    syy += (py[i] - my) ** 2;
    sxy += (px[i] - mx) * (py[i] - my);
  }
  sxx /= n - 1;
  syy /= n - 1;
  sxy /= n - 1;

  // eigen-decomposition of [[sxx, sxy], [sxy, syy]]
  const tr = sxx + syy;
  const disc = Math.sqrt(((sxx - syy) / 2) ** 2 + sxy ** 2);
  const l1 = tr / 2 + disc;
  const l2 = tr / 2 - disc;
  let angle: number;
  if (sxy !== 0) angle = Math.atan2(l1 - sxx, sxy);
  else angle = sxx >= syy ? 0 : Math.PI / 2;

  const chi2 = level === 0.68 ? CHI2_68 : CHI2_95;
  return {
    cx: mx,
    cy: my,
    width: 2 * Math.sqrt(Math.max(l1, 0) * chi2),
    height: 2 * Math.sqrt(Math.max(l2, 0) * chi2),
    angleDeg: (angle * 180) / Math.PI,
  };
}

export type CurveTendency = "draw" | "fade" | "neutral";

/**
 * Curve of the average flight from the spin axis (negative = left).
 * A ball curving left is a draw for a right-hander and a fade for a left-hander.
 */
export function curveTendency(hand: Hand, avgSpinAxis: number | null): CurveTendency | null {
  if (avgSpinAxis === null || !Number.isFinite(avgSpinAxis)) return null;
  if (Math.abs(avgSpinAxis) < NEUTRAL_SPIN_AXIS_DEG) return "neutral";
  const left = avgSpinAxis < 0;
  if (hand === "L") return left ? "fade" : "draw";
  return left ? "draw" : "fade";
}
