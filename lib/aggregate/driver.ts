import type { ShotRecord } from "@/lib/domain/types";
import { DEFAULT_POLICY, type Policy } from "@/lib/config/policy";
import { mean, percentWhere, stdDev } from "@/lib/metrics/stats";
import { goodDrives } from "./sessions";

export type DriverKpis = {
  drives: number;
  goodDrives: number;
  avgCarryGood: number | null;
  avgTotal: number | null;
  avgOffline: number | null;
  stdOffline: number | null;
  fairwayPct: number | null;
  avgClubSpeed: number | null;
  avgBallSpeed: number | null;
  avgSmash: number | null;
  avgHLA: number | null;
  avgVLA: number | null;
  avgBackSpin: number | null;
  avgSpinAxis: number | null;
  avgPeakHeight: number | null;
  avgDescAngle: number | null;
};

/** Driver KPIs for one player. Carry is averaged over good drives only. */
export function driverKpis(rows: ShotRecord[], policy: Policy = DEFAULT_POLICY): DriverKpis {
  const drv = rows.filter((r) => r.IsDriver);
  const good = goodDrives(drv, policy);
  const col = (f: keyof ShotRecord) => drv.map((r) => {
    const v = r[f];
    return typeof v === "number" ? v : null;
  });
  return {
    drives: drv.length,
    goodDrives: good.length,
    avgCarryGood: mean(good.map((r) => r.Carry)),
    avgTotal: mean(col("Total")),
    avgOffline: mean(col("Offline")),
    stdOffline: stdDev(col("Offline")),
    fairwayPct: percentWhere(col("Offline"), (v) => Math.abs(v) <= policy.fairwayHalfWidthM),
    avgClubSpeed: mean(col("ClubSpeed")),
    avgBallSpeed: mean(col("BallSpeed")),
    avgSmash: mean(col("Smash")),
    avgHLA: mean(col("HLA")),
    avgVLA: mean(col("VLA")),
    avgBackSpin: mean(col("BackSpin")),
    avgSpinAxis: mean(col("SpinAxis")),
    avgPeakHeight: mean(col("PeakHeight")),
    avgDescAngle: mean(col("DescAngle")),
  };
}
