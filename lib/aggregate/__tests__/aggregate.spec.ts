import { describe, it, expect } from "vitest";
import type { PlayerDriverSummary } from "@/lib/domain/types";
import { shot, sportsmanRows, table } from "@/lib/__fixtures__/shots";
import { driverKpis } from "@/lib/aggregate/driver";
import { groupDriverSummary, rankPlayers } from "@/lib/aggregate/group";
import { aggregateSessions, isFairwayHit, isGoodDrive } from "@/lib/aggregate/sessions";

const cyberman = () => [shot({ Alias: "Cyberman", PlayerRaw: "Treve", Hand: "L", Carry: 100, Offline: 30 })];

describe("shot rules", () => {
  it("only counts drivers", () => {
    expect(isGoodDrive(shot({ Carry: 121 }))).toBe(true);
    expect(isGoodDrive(shot({ Carry: 120 }))).toBe(false);
    expect(isGoodDrive(shot({ Club: "3W", IsDriver: false, Carry: 200 }))).toBe(false);
    expect(isFairwayHit(shot({ Offline: -20 }))).toBe(true);
    expect(isFairwayHit(shot({ Offline: 20.5 }))).toBe(false);
    expect(isFairwayHit(shot({ Offline: null }))).toBe(false);
  });

  it("reads thresholds from the policy", () => {
    const policy = { goodDriveCarryM: 90, fairwayHalfWidthM: 30, smashMax: 1.5 };
    expect(isGoodDrive(shot({ Carry: 100 }), policy)).toBe(true);
    expect(isFairwayHit(shot({ Offline: 25 }), policy)).toBe(true);
  });
});

describe("aggregateSessions", () => {
  it("builds one row per alias and session", () => {
    const sessions = aggregateSessions(table([...sportsmanRows(), ...cyberman()]));
    expect(sessions).toEqual([
      {
        SessionDate: "2025-03-01",
        Alias: "Cyberman",
        Hand: "L",
        TotalShots: 1,
        ClubsPlayed: 1,
        Driver_Fairway_Count: 0,
        Driver_Shots_Carry_gt120: 0,
        Driver_AvgCarry_gt120: null,
      },
      {
        SessionDate: "2025-03-01",
        Alias: "Sportsman",
        Hand: "R",
        TotalShots: 4,
        ClubsPlayed: 2,
        Driver_Fairway_Count: 2,
        Driver_Shots_Carry_gt120: 2,
        Driver_AvgCarry_gt120: 140,
      },
    ]);
  });

  it("leaves ClubsPlayed empty without a club column", () => {
    const [s] = aggregateSessions(table(cyberman(), ["Carry", "Offline"]));
    expect(s.ClubsPlayed).toBeNull();
  });
});

describe("driver summaries", () => {
  it("computes KPIs for one player", () => {
    const k = driverKpis(sportsmanRows());
    expect(k.drives).toBe(3);
    expect(k.goodDrives).toBe(2);
    expect(k.avgCarryGood).toBe(140);
    expect(k.avgOffline).toBeCloseTo(6.667, 3);
    expect(k.fairwayPct).toBeCloseTo(66.667, 3);
    expect(k.avgClubSpeed).toBeNull();
  });

  it("compares good drives across the group", () => {
    const summary = groupDriverSummary(table([...sportsmanRows(), ...cyberman()]));
    expect(summary.map((s) => s.Alias)).toEqual(["Sportsman"]);
    const [s] = summary;
    expect(s.N).toBe(2);
    expect(s.AvgCarry).toBe(140);
    expect(s.StdCarry).toBe(10);
    expect(s.AvgOffline).toBe(7.5);
    expect(s.StdOffline).toBe(17.5);
    expect(s.AvgAbsOffline).toBe(17.5);
    expect(s.FairwayPct).toBe(50);
    expect(s.AvgSmash).toBeCloseTo(1.43, 9);
  });

  it("ranks players with missing metrics last", () => {
    const row = (Alias: string, AvgCarry: number, AvgAbsOffline: number, AvgSmash: number | null, FairwayPct: number): PlayerDriverSummary => ({
      Alias,
      N: 5,
      AvgCarry,
      StdCarry: null,
      AvgOffline: null,
      StdOffline: null,
      AvgAbsOffline,
      FairwayPct,
      AvgSmash,
      AvgBackSpin: null,
      AvgSpinAxis: null,
      AvgSpinLat: null,
      AvgHLA: null,
      AvgVLA: null,
      AvgPeakHeight: null,
    });
    const ranks = rankPlayers([row("A", 200, 10, 1.4, 50), row("B", 220, 15, 1.45, 60), row("C", 190, 5, null, 40)]);
    expect(ranks).toEqual({
      byCarry: ["B", "A", "C"],
      byAccuracy: ["C", "A", "B"],
      bySmash: ["B", "A", "C"],
      byFairway: ["B", "A", "C"],
    });
  });
});
