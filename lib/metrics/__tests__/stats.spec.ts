import { describe, it, expect } from "vitest";
import { curveTendency, dispersionEllipse, mean, percentWhere, round, stdDev } from "@/lib/metrics/stats";

describe("summary statistics", () => {
  it("ignores missing and non-finite values", () => {
    expect(mean([1, null, 3, Number.NaN])).toBe(2);
    expect(mean([null])).toBeNull();
    expect(stdDev([130, 150])).toBe(10);
    expect(percentWhere([-10, 25, 5, null], (v) => Math.abs(v) <= 20)).toBeCloseTo(66.667, 3);
    expect(round(140.04, 1)).toBe(140);
    expect(round(null, 1)).toBeNull();
  });
});

describe("dispersionEllipse", () => {
  it("aligns with the x axis for a horizontal spread", () => {
    const e = dispersionEllipse([1, 2, 3, 4, 5], [0, 0, 0, 0, 0], 0.95);
    expect(e).not.toBeNull();
    if (!e) return;
    expect(e.cx).toBe(3);
    expect(e.cy).toBe(0);
    expect(e.angleDeg).toBe(0);
    expect(e.width).toBeCloseTo(2 * Math.sqrt(2.5 * 5.991464547107979), 9);
    expect(e.height).toBe(0);
  });

  it("tilts 45 degrees along a diagonal", () => {
    const e = dispersionEllipse([1, 2, 3, 4, 5], [1, 2, 3, 4, 5], 0.68);
    expect(e?.angleDeg).toBeCloseTo(45, 9);
  });

  it("needs five finite points", () => {
    expect(dispersionEllipse([1, 2, 3, 4], [1, 2, 3, 4], 0.95)).toBeNull();
    expect(dispersionEllipse([1, 2, 3, 4, null], [1, 2, 3, 4, 5], 0.95)).toBeNull();
  });
});

describe("curveTendency", () => {
  it("reads the axis relative to the player's hand", () => {
    expect(curveTendency("R", -3)).toBe("draw");
    expect(curveTendency("R", 3)).toBe("fade");
    expect(curveTendency("L", -3)).toBe("fade");
    expect(curveTendency("L", 3)).toBe("draw");
    expect(curveTendency("R", 0.1)).toBe("neutral");
    expect(curveTendency("R", null)).toBeNull();
  });
});
