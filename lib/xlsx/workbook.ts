import { Readable } from "stream";
import ExcelJS from "exceljs";
import type { SessionAggregate, ShotRecord, ShotTable } from "@/lib/domain/types";
import { isCanonicalColumn } from "@/lib/ingest/normalize";

export const SHOTS_SHEET = "Shots";
export const SESSIONS_SHEET = "Sessions";

export const SESSION_COLUMNS: (keyof SessionAggregate)[] = [
  "SessionDate",
  "Alias",
  "Hand",
  "TotalShots",
  "ClubsPlayed",
  "Driver_Fairway_Count",
  "Driver_Shots_Carry_gt120",
  "Driver_AvgCarry_gt120",
];

export type CellScalar = string | number | boolean | null;
export type WorkbookRecord = Record<string, CellScalar>;

export type WorkbookContents = {
  shots: WorkbookRecord[];
  sessions: WorkbookRecord[];
};

function shotCell(rec: ShotRecord, column: string): CellScalar {
  if (isCanonicalColumn(column)) return rec[column];
  return rec.extras[column] ?? null;
}

function styleHeader(ws: ExcelJS.Worksheet) {
  const headerRow = ws.getRow(1);
  headerRow.eachCell((cell) => {
    cell.font = { bold: true };
    cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: "FFF2F2F2" } };
  });
  ws.views = [{ state: "frozen", ySplit: 1 }];
}

/**
 * Canonical workbook: one Shots row per shot, one Sessions row per
 * (Alias, SessionDate). Missing values are empty cells.
 */
export async function writeWorkbook(shots: ShotTable, sessions: SessionAggregate[]): Promise<Buffer> {
  const wb = new ExcelJS.Workbook();

  const ws = wb.addWorksheet(SHOTS_SHEET);
  ws.addRow(shots.columns);
  for (const rec of shots.rows) ws.addRow(shots.columns.map((c) => shotCell(rec, c)));
  styleHeader(ws);

  const ss = wb.addWorksheet(SESSIONS_SHEET);
  ss.addRow(SESSION_COLUMNS);
  for (const s of sessions) ss.addRow(SESSION_COLUMNS.map((c) => s[c]));
  styleHeader(ss);

  return Buffer.from(await wb.xlsx.writeBuffer());
}

function scalar(cell: ExcelJS.Cell): CellScalar {
  const v = cell.value;
  if (v === null || v === undefined) return null;
  if (typeof v === "number" || typeof v === "string" || typeof v === "boolean") return v;
  if (v instanceof Date) return v.toISOString();
  return cell.text;
}

function readSheet(ws: ExcelJS.Worksheet | undefined): WorkbookRecord[] {
  if (!ws) return [];
  const header: string[] = [];
  ws.getRow(1).eachCell((cell, col) => {
    header[col - 1] = cell.text;
  });
  const out: WorkbookRecord[] = [];
  ws.eachRow((row, rowNum) => {
    if (rowNum === 1) return;
    const rec: WorkbookRecord = {};
    header.forEach((name, i) => {
      rec[name] = scalar(row.getCell(i + 1));
    });
    out.push(rec);
  });
  return out;
}

/** Reads both sheets back as records keyed by header. */
export async function readWorkbook(bytes: Buffer): Promise<WorkbookContents> {
  const wb = new ExcelJS.Workbook();
  await wb.xlsx.read(Readable.from(bytes));
  return {
    shots: readSheet(wb.getWorksheet(SHOTS_SHEET)),
    sessions: readSheet(wb.getWorksheet(SESSIONS_SHEET)),
  };
}
