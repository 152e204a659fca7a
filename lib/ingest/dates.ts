import tokens from "./locale-tokens.json";
import { DateParseError, MissingDateColumnError } from "@/lib/errors";
import type { RawRow } from "./parse";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const;
type Month = (typeof MONTHS)[number];

const MONTH_ALT = MONTHS.join("|");
const TIME = String.raw`(?:[ T]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s?[AP]M)?(?:Z|[+-]\d{2}:?\d{2})?)?`;

function escapeRe(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// token (lower-case) -> canonical abbreviation
const MONTH_TOKENS = new Map<string, Month>();
for (const m of MONTHS) {
  for (const t of tokens.months[m]) MONTH_TOKENS.set(t.toLowerCase(), m);
}

// Longest token first so "septembre" wins over "sept" and "sep".
const MONTH_RE = new RegExp(
  String.raw`(?<!\p{L})(` +
    Array.from(MONTH_TOKENS.keys())
      .sort((a, b) => b.length - a.length)
      .map(escapeRe)
      .join("|") +
    String.raw`)(?!\p{L})`,
  "giu"
);

const WEEKDAY_RE = new RegExp(
  String.raw`^(?:` +
    tokens.weekdays
      .slice()
      .sort((a, b) => b.length - a.length)
      .map(escapeRe)
      .join("|") +
    String.raw`)(?:\s*,\s*|\s+)`,
  "iu"
);

type Ymd = [year: number, month: number, day: number];

type DatePattern = {
  name: string;
  re: RegExp;
  pick: (m: RegExpMatchArray) => Ymd;
};

const monthOf = (token: string): number => {
  const canon = MONTH_TOKENS.get(token.toLowerCase());
  return canon ? MONTHS.indexOf(canon) + 1 : 0;
};

const DAY_MONTH_NAME: DatePattern = {
  name: "d-mon-yyyy",
  re: new RegExp(String.raw`^(\d{1,2})(?:er)?[\s.\-/]*(${MONTH_ALT})\.?[\s.,\-/]*(\d{4})${TIME}$`, "i"),
  pick: (m) => [Number(m[3]), monthOf(m[2]), Number(m[1])],
};

// Tried in order; the first that yields a real calendar date wins.
const PATTERNS: DatePattern[] = [
  {
    name: "yyyy-mm-dd",
    re: new RegExp(String.raw`^(\d{4})-(\d{1,2})-(\d{1,2})${TIME}$`),
    pick: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    name: "yyyy/mm/dd",
    re: new RegExp(String.raw`^(\d{4})/(\d{1,2})/(\d{1,2})${TIME}$`),
    pick: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  DAY_MONTH_NAME,
  {
    name: "dd-mm-yyyy",
    re: new RegExp(String.raw`^(\d{1,2})[-.](\d{1,2})[-.](\d{4})${TIME}$`),
    pick: (m) => [Number(m[3]), Number(m[2]), Number(m[1])],
  },
  {
    name: "dd/mm/yyyy",
    re: new RegExp(String.raw`^(\d{1,2})/(\d{1,2})/(\d{4})${TIME}$`),
    pick: (m) => [Number(m[3]), Number(m[2]), Number(m[1])],
  },
  {
    name: "mm/dd/yyyy",
    re: new RegExp(String.raw`^(\d{1,2})/(\d{1,2})/(\d{4})${TIME}$`),
    pick: (m) => [Number(m[3]), Number(m[1]), Number(m[2])],
  },
  {
    name: "mon-d-yyyy",
    re: new RegExp(String.raw`^(${MONTH_ALT})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})${TIME}$`, "i"),
    pick: (m) => [Number(m[3]), monthOf(m[1]), Number(m[2])],
  },
];

const EMBEDDED_DAY_MONTH_YEAR = new RegExp(String.raw`(\d{1,2})\s*(${MONTH_ALT})\.?[\s,]*(\d{4})`, "i");

function isCalendarDate([y, m, d]: Ymd): boolean {
  if (y < 1900 || y > 2100 || m < 1 || m > 12 || d < 1) return false;
  const dt = new Date(Date.UTC(y, m - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === m - 1 && dt.getUTCDate() === d;
}

function formatYmd([y, m, d]: Ymd): string {
  return `${y}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
}

function tryPatterns(s: string, patterns: DatePattern[]): string | null {
  for (const p of patterns) {
    const m = s.match(p.re);
    if (!m) continue;
    const ymd = p.pick(m);
    if (isCalendarDate(ymd)) return formatYmd(ymd);
  }
  return null;
}

/**
 * Strips spreadsheet/locale noise from a raw date cell. Exposed for tests.
 * A leading weekday is dropped unless `keepWeekday` is set; "mar." is both
 * a French weekday and an English month.
 */
export function cleanDateText(raw: string, keepWeekday = false): string {
  let s = raw.trim();
  if (s.startsWith("=")) s = s.slice(1).trim();
  if (s.length >= 2 && (s[0] === '"' || s[0] === "'") && s[s.length - 1] === s[0]) {
    s = s.slice(1, -1).trim();
  }
  s = s.replace(/\([^)]*\)/g, " ").trim();
  if (!keepWeekday) s = s.replace(WEEKDAY_RE, "");
  s = s.replace(MONTH_RE, (tok: string) => MONTH_TOKENS.get(tok.toLowerCase()) ?? tok);
  return s.replace(/\s+/g, " ").trim();
}

/**
 * Parses a launch-monitor date cell into `YYYY-MM-DD`.
 * Returns null when nothing matches; callers decide whether that is fatal.
 */
export function parseSessionDate(raw: unknown): string | null {
  if (raw === null || raw === undefined) return null;
  const text = String(raw);
  return parseCleaned(cleanDateText(text)) ?? parseCleaned(cleanDateText(text, true));
}

function parseCleaned(s: string): string | null {
  if (!s) return null;
  const direct = tryPatterns(s, PATTERNS);
  if (direct) return direct;

  const frag = s.match(EMBEDDED_DAY_MONTH_YEAR);
  if (frag) return tryPatterns(`${frag[1]} ${frag[2]} ${frag[3]}`, [DAY_MONTH_NAME]);
  return null;
}

const DATE_COLUMN_CANDIDATES = ["date", "Date", "DATE", "Round Date", "Session Date"];

const squash = (h: string) => h.toLowerCase().replace(/[\s_-]+/g, "");

export function findDateColumn(headers: string[], file = "<csv>"): string {
  for (const c of DATE_COLUMN_CANDIDATES) {
    if (headers.includes(c)) return c;
  }
  for (const c of DATE_COLUMN_CANDIDATES) {
    const hit = headers.find((h) => squash(h) === squash(c));
    if (hit) return hit;
  }
  const loose = headers.find((h) => h.toLowerCase().includes("date"));
  if (loose) return loose;
  throw new MissingDateColumnError(file, headers);
}

/**
 * One session date per file: the mode when it covers at least 80% of the
 * parsed values, otherwise the median. Any unparseable value is fatal.
 */
export function sessionDateFromRows(rows: RawRow[], headers: string[], file = "<csv>"): string {
  const column = findDateColumn(headers, file);
  const dates: string[] = [];
  for (const row of rows) {
    const raw = row[column];
    if (raw === undefined || raw.trim() === "") continue;
    const d = parseSessionDate(raw);
    if (!d) throw new DateParseError(raw, column, file);
    dates.push(d);
  }
  if (dates.length === 0) throw new DateParseError("", column, file);

  const counts = new Map<string, number>();
  for (const d of dates) counts.set(d, (counts.get(d) ?? 0) + 1);
  let top = dates[0];
  let topCount = 0;
  for (const [d, n] of counts) {
    if (n > topCount || (n === topCount && d < top)) {
      top = d;
      topCount = n;
    }
  }
  if (topCount / dates.length >= 0.8) return top;
  const sorted = dates.slice().sort();
  return sorted[Math.floor(sorted.length / 2)];
}

export function compactDate(isoDate: string): string {
  return isoDate.replace(/-/g, "");
}
