import { describe, it, expect } from "vitest";
import { DEFAULT_POLICY } from "@/lib/config/policy";
import { AmbiguousSessionBatchError, CoachGolfError } from "@/lib/errors";
import { silentLogger } from "@/lib/log";
import { normalizeRoster } from "@/lib/roster/roster";
import { MemoryStorage } from "@/lib/storage/memory";
import { createBatchStore } from "@/lib/state/batch-store";
import { generateAll, runBatch } from "@/lib/pipeline/generate";
import { ingestBatch, type BatchContext, type BatchFile } from "@/lib/pipeline/ingest-batch";

const ctx: BatchContext = {
  roster: normalizeRoster({ players: { Conre: "Sportsman", Treve: { alias: "Cyberman", hand: "L" } } }),
  policy: DEFAULT_POLICY,
  log: silentLogger,
};

const HEADER = "date,player,Club,Carry,Offline\n";

const files = (treveDate = "2025-03-01"): BatchFile[] => [
  { name: "conre.csv", text: `${HEADER}2025-03-01,Conre,Driver,150,10 L\n` },
  { name: "treve.csv", text: `${HEADER}${treveDate},Treve,Driver,100,5 R\n` },
];

describe("ingestBatch", () => {
  it("builds one shot table for the batch", () => {
    const batch = ingestBatch(files(), ctx);
    expect(batch.sessionDate).toBe("2025-03-01");
    expect(batch.shots.rows.map((r) => [r.Alias, r.Hand, r.Carry, r.Offline])).toEqual([
      ["Sportsman", "R", 150, -10],
      ["Cyberman", "L", 100, 5],
    ]);
    expect(batch.players.map((p) => p.playerRaw)).toEqual(["Conre", "Treve"]);
    expect(batch.warnings).toEqual([]);
    expect(batch.diagnostics).toEqual({ files: 2, rows: 2, parse_errors: 0, unknown_columns: ["date", "player"] });
  });

  it("rejects a batch spanning several dates", () => {
    try {
      ingestBatch(files("2025-03-02"), ctx);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(AmbiguousSessionBatchError);
      if (e instanceof AmbiguousSessionBatchError) expect(e.dates).toEqual(["2025-03-01", "2025-03-02"]);
    }
  });

  it("rejects same-named files from different sessions", () => {
    const sameName: BatchFile[] = [
      { name: "shots.csv", text: `${HEADER}2025-03-01,Conre,Driver,150,10 L\n` },
      { name: "shots.csv", text: `${HEADER}2025-03-02,Treve,Driver,100,5 R\n` },
    ];
    try {
      ingestBatch(sameName, ctx);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(AmbiguousSessionBatchError);
      if (e instanceof AmbiguousSessionBatchError) {
        expect(e.fileDates).toEqual([
          { file: "shots.csv", date: "2025-03-01" },
          { file: "shots.csv", date: "2025-03-02" },
        ]);
        expect(e.message).toBe(
          "Batch spans several session dates (2025-03-01, 2025-03-02): #1 shots.csv=2025-03-01; #2 shots.csv=2025-03-02"
        );
      }
    }
  });

  it("rejects an empty batch", () => {
    expect(() => ingestBatch([], ctx)).toThrow(CoachGolfError);
  });

  it("keeps shots of unknown players under the UNKNOWN alias", () => {
    const batch = ingestBatch([{ name: "range.csv", text: `${HEADER}2025-03-01,Ghost,7I,140,2 R\n` }], ctx);
    expect(batch.shots.rows[0].Alias).toBe("UNKNOWN");
    expect(batch.warnings).toEqual([{ kind: "unresolved_identity", file: "range.csv", playerRaw: "Ghost" }]);
  });
});

describe("runBatch", () => {
  it(
    "generates and stores every output",
    async () => {
      const storage = new MemoryStorage();
      const run = await runBatch(files(), ctx, { storage, rootId: storage.rootId });

      expect(run.generated.sessions.map((s) => [s.Alias, s.TotalShots, s.ClubsPlayed, s.Driver_Fairway_Count, s.Driver_AvgCarry_gt120])).toEqual([
        ["Cyberman", 1, 1, 1, null],
        ["Sportsman", 1, 1, 1, 150],
      ]);
      expect(run.generated.failures).toEqual([]);
      expect(run.persisted?.failures).toEqual([]);
      expect(run.persisted?.written).toHaveLength(25);
      expect(run.persisted?.written).toContain("Eleves/Cyberman/2025-03-01/ModelH_Cyberman_20250301.pdf");
      expect(run.store.getState().status).toBe("done");
      expect(run.store.getState().sessionDate).toBe("2025-03-01");
    },
    60_000
  );

  it("writes nothing when ingest fails", async () => {
    const storage = new MemoryStorage();
    const store = createBatchStore();
    await expect(runBatch(files("2025-03-02"), ctx, { storage, rootId: storage.rootId }, store)).rejects.toBeInstanceOf(
      AmbiguousSessionBatchError
    );
    expect(await storage.listChildren(storage.rootId)).toEqual([]);
    expect(store.getState().status).toBe("error");
    expect(store.getState().errors).toHaveLength(1);
    expect(store.getState().errors[0].stage).toBe("ingesting");
  });
});

describe("generateAll", () => {
  it(
    "falls back for every report when rendering fails",
    async () => {
      const batch = ingestBatch(files(), ctx);
      const run = await generateAll(batch, ctx, async () => {
        throw new Error("renderer offline");
      });
      expect(run.failures).toHaveLength(21);
      expect(run.studentReports.Sportsman.every((r) => r.fallback)).toBe(true);
      expect(run.groupReports.map((r) => r.fileName)[0]).toBe("ModelC_GROUPE_20250301.pdf");
    },
    60_000
  );
});
