import type { NumericField } from "@/lib/domain/types";

// Vendor column spellings per canonical field. The canonical name itself
// always wins; otherwise the first alias present in the file is used.
export const FIELD_ALIASES: Record<"Club" | Exclude<NumericField, "SpinTotal" | "SpinLat">, string[]> = {
  Club: ["Club Name", "Club", "club", "ClubName", "Club Type"],
  Carry: ["Carry Dist (m)", "Carry (m)", "CarryDistance", "Carry Distance"],
  Total: ["Total Dist (m)", "Total (m)", "TotalDistance", "Total Distance"],
  Offline: ["Offline (m)", "offline"],
  BackSpin: ["Back Spin", "Backspin", "Spin Back", "Back Spin (rpm)"],
  SpinAxis: ["Spin Axis", "Spin axis", "SpinAxis (deg)"],
  Smash: ["Smash Factor", "SmashFactor"],
  ClubSpeed: ["Club Speed", "Club Speed (mph)"],
  BallSpeed: ["Ball Speed", "Ball Speed (mph)"],
  VLA: ["VLA (deg)", "Vertical Launch Angle", "Vert Launch Angle"],
  HLA: ["HLA (deg)", "Horizontal Launch Angle", "Hor Launch Angle"],
  PeakHeight: ["Peak Height", "Peak Height (m)", "peak height"],
  DescAngle: ["Desc Angle", "Descent Angle"],
};

export type AliasedField = keyof typeof FIELD_ALIASES;

export const ALIASED_FIELDS: AliasedField[] = [
  "Club",
  "Carry",
  "Total",
  "Offline",
  "BackSpin",
  "SpinAxis",
  "Smash",
  "ClubSpeed",
  "BallSpeed",
  "VLA",
  "HLA",
  "PeakHeight",
  "DescAngle",
];

// Values may carry a trailing L/R direction letter.
export const SIGNED_FIELDS = ["Offline", "HLA", "VLA", "SpinAxis"] as const;

export const PLAIN_NUMERIC_FIELDS = [
  "Carry",
  "Total",
  "BackSpin",
  "Smash",
  "ClubSpeed",
  "BallSpeed",
  "PeakHeight",
  "DescAngle",
] as const;

/**
 * Resolves which source header feeds each canonical field.
 * Returns canonical field -> source header.
 */
export function resolveFieldColumns(headers: string[]): Partial<Record<AliasedField, string>> {
  const present = new Set(headers);
  const out: Partial<Record<AliasedField, string>> = {};
  for (const field of ALIASED_FIELDS) {
    if (present.has(field)) {
      out[field] = field;
      continue;
    }
    const hit = FIELD_ALIASES[field].find((alias) => present.has(alias));
    if (hit) out[field] = hit;
  }
  return out;
}

export function normalizeNameKey(name: string | null | undefined): string {
  if (name === null || name === undefined) return "";
  return String(name)
    .trim()
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .replace(/[^a-z0-9]+/g, "");
}
