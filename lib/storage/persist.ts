import { BASE_WORKBOOK_NAME } from "@/lib/config/policy";
import { errorMessage } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/log";
import type { RenderedReport } from "@/lib/reports/generate";
import { CONTENT_TYPES, type Storage, type StorageEntry } from "./types";

export const FOLDERS = {
  base: "Base",
  uploads: "Uploads",
  group: "Groupe",
  students: "Eleves",
} as const;

export type RunOutputs = {
  sessionDate: string;
  workbook: Buffer;
  studentReports: Record<string, RenderedReport[]>; // alias -> reports
  groupReports: RenderedReport[];
};

export type UploadFile = { name: string; bytes: Buffer };

export type PersistStep = "base" | "uploads" | "group" | `student:${string}`;

export type PersistResult = {
  written: string[]; // "<folder path>/<file>"
  failures: { step: PersistStep; message: string }[];
};

export function archiveWorkbookName(sessionDate: string): string {
  return BASE_WORKBOOK_NAME.replace(/\.xlsx$/, `_${sessionDate}.xlsx`);
}

async function ensureAll(storage: Storage, rootId: string, names: string[]): Promise<string> {
  let id = rootId;
  for (const n of names) id = await storage.ensurePath(id, n);
  return id;
}

// Existing folder id along `names`, or null when a segment is missing.
async function findPath(storage: Storage, rootId: string, names: string[]): Promise<string | null> {
  let id = rootId;
  for (const n of names) {
    const children = await storage.listChildren(id);
    const next = children.find((c) => c.kind === "folder" && c.name === n);
    if (!next) return null;
    id = next.id;
  }
  return id;
}

/** Suffixes repeated names: shots.csv, shots_2.csv, shots_3.csv. */
export function uniqueFileNames(names: string[]): string[] {
  const taken = new Set<string>();
  return names.map((name) => {
    let candidate = name;
    const dot = name.lastIndexOf(".");
    const stem = dot > 0 ? name.slice(0, dot) : name;
    const ext = dot > 0 ? name.slice(dot) : "";
    for (let n = 2; taken.has(candidate); n++) candidate = `${stem}_${n}${ext}`;
    taken.add(candidate);
    return candidate;
  });
}

/**
 * Writes one run under the storage root:
 *   Base/<workbook> and its dated archive, Uploads/<date>/<csv>,
 *   Groupe/<date>/<pdf>, Eleves/<alias>/<date>/<pdf>.
 * Each step is isolated: a failed step is recorded and the next one runs.
 */
export async function persistRun(
  storage: Storage,
  rootId: string,
  run: RunOutputs,
  uploads: UploadFile[],
  log: Logger = silentLogger
): Promise<PersistResult> {
  const result: PersistResult = { written: [], failures: [] };

  const step = async (name: PersistStep, folders: string[], files: { name: string; bytes: Buffer; type: string }[]) => {
    try {
      const id = await ensureAll(storage, rootId, folders);
      for (const f of files) {
        await storage.upload(id, f.name, f.bytes, f.type);
        result.written.push([...folders, f.name].join("/"));
      }
    } catch (e) {
      log.error(`step ${name} failed: ${errorMessage(e)}`);
      result.failures.push({ step: name, message: errorMessage(e) });
    }
  };

  const date = run.sessionDate;
  await step("base", [FOLDERS.base], [
    { name: BASE_WORKBOOK_NAME, bytes: run.workbook, type: CONTENT_TYPES.xlsx },
    { name: archiveWorkbookName(date), bytes: run.workbook, type: CONTENT_TYPES.xlsx },
  ]);
  await step(
    "uploads",
    [FOLDERS.uploads, date],
    uniqueFileNames(uploads.map((u) => u.name)).map((name, i) => ({ name, bytes: uploads[i].bytes, type: CONTENT_TYPES.csv }))
  );
  await step(
    "group",
    [FOLDERS.group, date],
    run.groupReports.map((r) => ({ name: r.fileName, bytes: r.bytes, type: CONTENT_TYPES.pdf }))
  );
  for (const [alias, reports] of Object.entries(run.studentReports)) {
    await step(
      `student:${alias}`,
      [FOLDERS.students, alias, date],
      reports.map((r) => ({ name: r.fileName, bytes: r.bytes, type: CONTENT_TYPES.pdf }))
    );
  }

  log.info(`wrote ${result.written.length} files (${result.failures.length} failed steps)`);
  return result;
}

/** Session dates stored for an alias, most recent first. */
export async function listSessionsForAlias(storage: Storage, rootId: string, alias: string): Promise<string[]> {
  const id = await findPath(storage, rootId, [FOLDERS.students, alias]);
  if (id === null) return [];
  const children = await storage.listChildren(id);
  return children
    .filter((c) => c.kind === "folder")
    .map((c) => c.name)
    .sort()
    .reverse();
}

/** PDF reports stored for one alias and session, sorted by name. */
export async function listReports(storage: Storage, rootId: string, alias: string, sessionDate: string): Promise<StorageEntry[]> {
  const id = await findPath(storage, rootId, [FOLDERS.students, alias, sessionDate]);
  if (id === null) return [];
  const children = await storage.listChildren(id);
  return children
    .filter((c) => c.kind === "file" && (c.contentType === CONTENT_TYPES.pdf || c.name.toLowerCase().endsWith(".pdf")))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
