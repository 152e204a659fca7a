import Papa from "papaparse";

export type RawRow = Record<string, string>;

export type RawTable = {
  name: string;
  headers: string[];
  rows: RawRow[];
  rowCount: number;
  errors: { row: number; message: string }[];
};

// Header-mode CSV parse. Values stay strings; typing happens in normalize.ts.
export function parseCsv(text: string, name = "<csv>"): RawTable {
  const res = Papa.parse<Record<string, unknown>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  const headers = (res.meta.fields ?? []).filter((h) => h !== "");
  const rows: RawRow[] = [];
  for (const raw of res.data) {
    const row: RawRow = {};
    for (const h of headers) {
      const v = raw[h];
      row[h] = v === null || v === undefined ? "" : String(v);
    }
    rows.push(row);
  }

  return {
    name,
    headers,
    rows,
    rowCount: rows.length,
    errors: res.errors.map((e) => ({ row: (e.row ?? -1) + 1, message: `${e.code}: ${e.message}` })),
  };
}
