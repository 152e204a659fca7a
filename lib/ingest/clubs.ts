export type ClubCategory = "driver" | "wood" | "hybrid" | "iron" | "wedge" | "putter" | "unknown";

export type ClubClass = {
  category: ClubCategory;
  number: number | null; // 3 for "3W", 7 for "F7" (fer), 56 for "56°"
};

const WEDGE_NAMES = new Set(["PW", "GW", "AW", "SW", "LW", "UW", "WEDGE"]);

function num(s: string | undefined): number | null {
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/**
 * Single point where club labels are interpreted. Launch monitors write the
 * same club as "DR", "Driver", "1W", "3W", "F3", "Bois 3", "H4", "7I", "Fer 7"...
 */
export function classifyClub(label: string | null | undefined): ClubClass {
  const c = String(label ?? "").toUpperCase().replace(/\s+/g, " ").trim();
  if (!c) return { category: "unknown", number: null };

  if (isDriver(c) || c === "1W" || c === "W1") return { category: "driver", number: 1 };
  if (c.startsWith("PUTT") || c === "PT") return { category: "putter", number: null };
  if (WEDGE_NAMES.has(c) || /WEDGE/.test(c)) return { category: "wedge", number: null };

  let m = c.match(/^(\d{2})\s*°?$/);
  if (m) return { category: "wedge", number: num(m[1]) };

  m = c.match(/^(?:(\d+)\s*(?:W|WOOD|BOIS)|(?:W|B|WOOD|BOIS)\s*(\d+))$/);
  if (m) return { category: "wood", number: num(m[1] ?? m[2]) };

  m = c.match(/^(?:(\d+)\s*(?:H|HY|HYBRID)|(?:H|HY|HYBRID)\s*(\d+))$/);
  if (m) return { category: "hybrid", number: num(m[1] ?? m[2]) };

  m = c.match(/^(?:(\d+)\s*(?:I|IRON|FER)|(?:I|F|IRON|FER)\s*(\d+))$/);
  if (m) return { category: "iron", number: num(m[1] ?? m[2]) };

  return { category: "unknown", number: null };
}

export function isDriver(label: string | null | undefined): boolean {
  const c = String(label ?? "").toUpperCase();
  return c.startsWith("DR") || c.includes("DRIVER");
}

export function isLongClub(label: string | null | undefined): boolean {
  const { category, number } = classifyClub(label);
  switch (category) {
    case "driver":
    case "wood":
    case "hybrid":
      return true;
    case "iron":
      return number !== null && number >= 3 && number <= 7;
    default:
      return false;
  }
}
