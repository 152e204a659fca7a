import { describe, it, expect } from "vitest";
import { aggregateSessions } from "@/lib/aggregate/sessions";
import { recomputeSpins } from "@/lib/metrics/spin";
import { readWorkbook, writeWorkbook } from "@/lib/xlsx/workbook";
import { shot, table } from "@/lib/__fixtures__/shots";

describe("workbook", () => {
  it("writes shots and sessions that read back with the same values", async () => {
    const shots = table(
      [
        shot({ Carry: 150, Offline: -10, extras: { Temp: "21" } }),
        shot({ Alias: "Cyberman", PlayerRaw: "Treve", Hand: "L", Club: "7I", IsDriver: false, Carry: 140, Offline: null }),
      ],
      ["Club", "Carry", "Offline", "Temp"]
    );
    const bytes = await writeWorkbook(shots, aggregateSessions(shots));
    const back = await readWorkbook(bytes);

    expect(back.shots).toEqual([
      { SessionDate: "2025-03-01", Alias: "Sportsman", PlayerRaw: "Conre", Hand: "R", Club: "Driver", IsDriver: true, Carry: 150, Offline: -10, Temp: "21" },
      { SessionDate: "2025-03-01", Alias: "Cyberman", PlayerRaw: "Treve", Hand: "L", Club: "7I", IsDriver: false, Carry: 140, Offline: null, Temp: null },
    ]);
    expect(back.sessions).toEqual([
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
        TotalShots: 1,
        ClubsPlayed: 1,
        Driver_Fairway_Count: 1,
        Driver_Shots_Carry_gt120: 1,
        Driver_AvgCarry_gt120: 150,
      },
    ]);
  });

  it("keeps fractional and derived values", async () => {
    const { table: shots } = recomputeSpins(
      table(
        [
          shot({ Carry: 187.6, Offline: -12.45, Smash: 1.4823, HLA: -2.35, VLA: 13.7, BackSpin: 2650.5, SpinAxis: -7.3 }),
          shot({ Carry: 201.25, Offline: 3.8, Smash: 1.4467, HLA: 0.9, VLA: 11.05, BackSpin: 2310, SpinAxis: 4.15 }),
        ],
        ["Club", "Carry", "Offline", "Smash", "HLA", "VLA", "BackSpin", "SpinAxis"]
      )
    );
    const fields = ["Carry", "Offline", "Smash", "HLA", "VLA", "BackSpin", "SpinAxis", "SpinTotal", "SpinLat"] as const;
    const back = await readWorkbook(await writeWorkbook(shots, aggregateSessions(shots)));

    expect(back.shots).toHaveLength(2);
    shots.rows.forEach((rec, i) => {
      for (const f of fields) {
        const written = rec[f];
        const read = back.shots[i][f];
        expect(typeof written).toBe("number");
        expect(typeof read).toBe("number");
        if (typeof written === "number" && typeof read === "number") expect(read).toBeCloseTo(written, 6);
      }
    });
    expect(back.sessions[0].Driver_AvgCarry_gt120).toBe(194.4);
  });
});
