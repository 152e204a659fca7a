import { z } from "zod";

const MISSING = new Set(["", "nan", "na", "n/a", "none", "null", "-", "#div/0!"]);

const toText = (v: unknown): string | null => {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  return MISSING.has(s.toLowerCase()) ? null : s;
};

const toFinite = (s: string): number | null => {
  if (!/^[+-]?(\d+([.,]\d*)?|[.,]\d+)([eE][+-]?\d+)?$/.test(s)) return null;
  const n = Number(s.replace(",", "."));
  return Number.isFinite(n) ? n : null;
};

// Plain numeric cell; decimal comma accepted, anything else is missing.
export const OptNumber = z.unknown().transform((v): number | null => {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = toText(v);
  return s === null ? null : toFinite(s);
});

// Signed cell: "20 L" -> -20, "15R" -> 15, "-5" -> -5, "12°" -> 12.
export const SignedDirection = z.unknown().transform((v): number | null => {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = toText(v);
  if (s === null) return null;
  const t = s.toUpperCase().replace(/°/g, "").trim();
  const direct = toFinite(t);
  if (direct !== null) return direct;
  const m = t.match(/^([+-]?\d+(?:[.,]\d+)?)\s*([LR])$/);
  if (!m) return null;
  const n = Number(m[1].replace(",", "."));
  return m[2] === "L" ? -n : n;
});

export function toOptNumber(v: unknown): number | null {
  return OptNumber.parse(v);
}

export function parseSignedDirection(v: unknown): number | null {
  return SignedDirection.parse(v);
}

// roster.json
export const RosterPlayerSchema = z.union([
  z.string(),
  z.object({
    alias: z.union([z.string(), z.number()]).optional(),
    hand: z.union([z.string(), z.null()]).optional(),
  }),
]);

export type RosterPlayerInput = z.infer<typeof RosterPlayerSchema>;
