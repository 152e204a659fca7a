import type { Hand, ShotTable } from "@/lib/domain/types";
import { DEFAULT_POLICY, GROUP_LABEL, GROUP_REPORT_LETTERS, STUDENT_REPORT_LETTERS, type Policy } from "@/lib/config/policy";
import { groupBy } from "@/lib/aggregate/sessions";
import { hasColumn } from "@/lib/ingest/normalize";
import { ReportRenderFailure, errorMessage } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/log";
import { linesDocument, type ReportDocument } from "./document";
import { buildGroupSummary, buildModelC, buildModelD, groupSummaryLines, type GroupInput } from "./group";
import { reportFileName, type ReportLetter } from "./naming";
import { renderPdf } from "./pdf";
import { buildModelA, buildModelB, buildStudentSummary, studentSummaryLines, type StudentInput } from "./student";

// One independent unit of report work.
export type ReportJob = {
  letter: ReportLetter;
  target: string; // alias or GROUPE
  fileName: string;
  summary: string[];
  build: () => ReportDocument;
};

export type RenderedReport = {
  letter: ReportLetter;
  target: string;
  fileName: string;
  bytes: Buffer;
  fallback: boolean;
};

export type ReportRun = {
  reports: RenderedReport[];
  failures: ReportRenderFailure[];
};

export type Renderer = (doc: ReportDocument) => Promise<Buffer>;

function studentBuilder(letter: ReportLetter, input: StudentInput): () => ReportDocument {
  if (letter === "A") return () => buildModelA(input);
  if (letter === "B") return () => buildModelB(input);
  return () => buildStudentSummary(letter, input);
}

function groupBuilder(letter: ReportLetter, input: GroupInput): () => ReportDocument {
  if (letter === "C") return () => buildModelC(input);
  if (letter === "D") return () => buildModelD(input);
  return () => buildGroupSummary(letter, input);
}

/** Student jobs, letters A-H for every alias in the table. */
export function studentJobs(table: ShotTable, sessionDate: string, policy: Policy = DEFAULT_POLICY): ReportJob[] {
  const hasClubColumn = hasColumn(table, "Club");
  return groupBy(table.rows, (s) => s.Alias).flatMap(([alias, shots]) => {
    const hand: Hand = shots[0]?.Hand ?? "R";
    const input: StudentInput = { alias, hand, sessionDate, shots, hasClubColumn, policy };
    const summary = studentSummaryLines(input);
    return STUDENT_REPORT_LETTERS.map((letter) => ({
      letter,
      target: alias,
      fileName: reportFileName(letter, alias, sessionDate),
      summary,
      build: studentBuilder(letter, input),
    }));
  });
}

export function groupJobs(table: ShotTable, sessionDate: string, policy: Policy = DEFAULT_POLICY): ReportJob[] {
  if (table.rows.length === 0) return [];
  const input: GroupInput = { sessionDate, table, policy };
  const summary = groupSummaryLines(input);
  return GROUP_REPORT_LETTERS.map((letter) => ({
    letter,
    target: GROUP_LABEL,
    fileName: reportFileName(letter, GROUP_LABEL, sessionDate),
    summary,
    build: groupBuilder(letter, input),
  }));
}

export function fallbackDocument(job: ReportJob, reason: unknown): ReportDocument {
  return linesDocument(`Model ${job.letter} - ${job.target}`, [...job.summary, `ERROR Model${job.letter}: ${errorMessage(reason)}`]);
}

/**
 * Builds and renders every job. A job that throws is replaced by a fallback
 * document carrying its error; the remaining jobs still run. When the
 * fallback cannot be rendered either, the job is left out and both failures
 * are recorded.
 */
export async function generateReports(
  jobs: ReportJob[],
  log: Logger = silentLogger,
  render: Renderer = renderPdf,
  renderFallback: Renderer = renderPdf
): Promise<ReportRun> {
  const reports: RenderedReport[] = [];
  const failures: ReportRenderFailure[] = [];
  for (const job of jobs) {
    const base = { letter: job.letter, target: job.target, fileName: job.fileName };
    try {
      const bytes = await render(job.build());
      reports.push({ ...base, bytes, fallback: false });
    } catch (e) {
      const failure = new ReportRenderFailure(job.letter, job.target, e);
      log.warn(failure.message);
      failures.push(failure);
      try {
        reports.push({ ...base, bytes: await renderFallback(fallbackDocument(job, e)), fallback: true });
      } catch (fallbackError) {
        const lost = new ReportRenderFailure(job.letter, job.target, fallbackError);
        log.error(`fallback for ${job.fileName} not rendered: ${errorMessage(fallbackError)}`);
        failures.push(lost);
      }
    }
  }
  log.info(`rendered ${reports.length} reports (${failures.length} failures)`);
  return { reports, failures };
}
