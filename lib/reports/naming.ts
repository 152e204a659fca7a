import { GROUP_LABEL, type STUDENT_REPORT_LETTERS } from "@/lib/config/policy";
import { compactDate } from "@/lib/ingest/dates";

export type ReportLetter = (typeof STUDENT_REPORT_LETTERS)[number];

// Path separators would escape the storage folder.
const unsafe = /[\\/:*?"<>|]+/g;

/** Model<Letter>_<Alias|GROUPE>_<YYYYMMDD>.pdf */
export function reportFileName(letter: ReportLetter, target: string, sessionDate: string): string {
  const who = target.trim().replace(unsafe, "_") || GROUP_LABEL;
  return `Model${letter}_${who}_${compactDate(sessionDate)}.pdf`;
}

export function groupReportFileName(letter: ReportLetter, sessionDate: string): string {
  return reportFileName(letter, GROUP_LABEL, sessionDate);
}
