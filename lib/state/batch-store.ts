import { createStore } from "zustand/vanilla";
import type { BatchWarning } from "@/lib/domain/types";

export type BatchStatus = "idle" | "ingesting" | "generating" | "persisting" | "done" | "error";

type BatchError = { stage: BatchStatus; message: string };

export type BatchState = {
  status: BatchStatus;
  sessionDate: string | null;
  warnings: BatchWarning[];
  errors: BatchError[];
  startedAt: number | null;
  finishedAt: number | null;
  begin: () => void;
  advance: (status: Exclude<BatchStatus, "idle" | "error">) => void;
  setSessionDate: (date: string) => void;
  addWarnings: (w: BatchWarning[]) => void;
  addError: (message: string) => void;
  fail: (message: string) => void;
  reset: () => void;
};

type BatchData = Pick<BatchState, "status" | "sessionDate" | "warnings" | "errors" | "startedAt" | "finishedAt">;

const initial: BatchData = {
  status: "idle",
  sessionDate: null,
  warnings: [],
  errors: [],
  startedAt: null,
  finishedAt: null,
};

// One store per run; runs never share state.
export function createBatchStore() {
  return createStore<BatchState>()((set, get) => ({
    ...initial,
    begin: () => set({ ...initial, status: "ingesting", startedAt: Date.now() }),
    advance: (status) => set({ status, finishedAt: status === "done" ? Date.now() : null }),
    setSessionDate: (date) => set({ sessionDate: date }),
    addWarnings: (w) => set((s) => ({ warnings: s.warnings.concat(w) })),
    addError: (message) => set((s) => ({ errors: s.errors.concat({ stage: s.status, message }) })),
    fail: (message) => {
      const stage = get().status;
      set((s) => ({ status: "error", finishedAt: Date.now(), errors: s.errors.concat({ stage, message }) }));
    },
    reset: () => set({ ...initial }),
  }));
}

export type BatchStore = ReturnType<typeof createBatchStore>;
