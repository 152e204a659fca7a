import type { SessionAggregate } from "@/lib/domain/types";
import { errorMessage, type ReportRenderFailure } from "@/lib/errors";
import { aggregateSessions } from "@/lib/aggregate/sessions";
import { generateReports, groupJobs, studentJobs, type RenderedReport, type Renderer } from "@/lib/reports/generate";
import { renderPdf } from "@/lib/reports/pdf";
import { persistRun, type PersistResult } from "@/lib/storage/persist";
import type { Storage } from "@/lib/storage/types";
import { createBatchStore, type BatchStore } from "@/lib/state/batch-store";
import { writeWorkbook } from "@/lib/xlsx/workbook";
import { ingestBatch, type BatchContext, type BatchFile, type IngestedBatch } from "./ingest-batch";

export type GeneratedRun = {
  sessionDate: string;
  workbook: Buffer;
  sessions: SessionAggregate[];
  studentReports: Record<string, RenderedReport[]>;
  groupReports: RenderedReport[];
  failures: ReportRenderFailure[];
};

/** Builds every output of an ingested batch in memory. */
export async function generateAll(batch: IngestedBatch, ctx: BatchContext, render: Renderer = renderPdf): Promise<GeneratedRun> {
  const { policy, log } = ctx;
  const sessions = aggregateSessions(batch.shots, policy);
  const workbook = await writeWorkbook(batch.shots, sessions);

  const students = await generateReports(studentJobs(batch.shots, batch.sessionDate, policy), log, render);
  const group = await generateReports(groupJobs(batch.shots, batch.sessionDate, policy), log, render);

  const studentReports: Record<string, RenderedReport[]> = {};
  for (const r of students.reports) {
    const list = studentReports[r.target] ?? [];
    list.push(r);
    studentReports[r.target] = list;
  }

  return {
    sessionDate: batch.sessionDate,
    workbook,
    sessions,
    studentReports,
    groupReports: group.reports,
    failures: [...students.failures, ...group.failures],
  };
}

export type StorageTarget = { storage: Storage; rootId: string };

export type BatchRun = {
  batch: IngestedBatch;
  generated: GeneratedRun;
  persisted: PersistResult | null;
  store: BatchStore;
};

/**
 * ingest -> generate -> persist. Fatal ingest errors are rethrown after the
 * store records them; nothing is written in that case.
 */
export async function runBatch(
  files: BatchFile[],
  ctx: BatchContext,
  target?: StorageTarget,
  store: BatchStore = createBatchStore()
): Promise<BatchRun> {
  const { getState } = store;
  getState().begin();
  try {
    const batch = ingestBatch(files, ctx);
    getState().setSessionDate(batch.sessionDate);
    getState().addWarnings(batch.warnings);

    getState().advance("generating");
    const generated = await generateAll(batch, ctx);
    for (const f of generated.failures) getState().addError(f.message);

    let persisted: PersistResult | null = null;
    if (target) {
      getState().advance("persisting");
      const uploads = files.map((f) => ({ name: f.name, bytes: Buffer.from(f.text, "utf8") }));
      persisted = await persistRun(target.storage, target.rootId, generated, uploads, ctx.log);
      for (const f of persisted.failures) getState().addError(`${f.step}: ${f.message}`);
    }

    getState().advance("done");
    return { batch, generated, persisted, store };
  } catch (e) {
    getState().fail(errorMessage(e));
    throw e;
  }
}
