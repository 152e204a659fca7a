import { describe, it, expect } from "vitest";
import { createBatchStore } from "@/lib/state/batch-store";

describe("batch store", () => {
  it("keeps runs independent", () => {
    const a = createBatchStore();
    const b = createBatchStore();
    a.getState().begin();
    a.getState().addError("oops");
    expect(a.getState().status).toBe("ingesting");
    expect(a.getState().errors).toEqual([{ stage: "ingesting", message: "oops" }]);
    expect(b.getState().status).toBe("idle");
    expect(b.getState().errors).toEqual([]);
  });

  it("tracks stages until done or failure", () => {
    const store = createBatchStore();
    const { begin, advance, fail, setSessionDate, addWarnings, reset } = store.getState();
    begin();
    setSessionDate("2025-03-01");
    addWarnings([{ kind: "derived_metric_undefined", metric: "Smash", count: 2 }]);
    advance("generating");
    fail("disk full");
    const s = store.getState();
    expect(s.status).toBe("error");
    expect(s.sessionDate).toBe("2025-03-01");
    expect(s.warnings).toHaveLength(1);
    expect(s.errors).toEqual([{ stage: "generating", message: "disk full" }]);
    expect(s.finishedAt).not.toBeNull();

    reset();
    expect(store.getState().status).toBe("idle");
    expect(store.getState().warnings).toEqual([]);
  });
});
