import { describe, it, expect } from "vitest";
import { parseCsv } from "@/lib/ingest/parse";
import { canonicalizeShots, concatShotTables, fallbackSmash } from "@/lib/ingest/normalize";
import { parseSignedDirection, toOptNumber } from "@/lib/ingest/schemas";
import { normalizeNameKey, resolveFieldColumns } from "@/lib/ingest/aliases";
import { DEFAULT_POLICY } from "@/lib/config/policy";

const meta = { sessionDate: "2025-03-01", playerRaw: "Conre", alias: "Sportsman", hand: "R" as const };

const vendorCsv = [
  "Date,Club Name,Carry Dist (m),Offline (m),Ball Speed,Club Speed,Back Spin,Spin Axis,Notes",
  "2025-03-01,Driver,150.5,10 L,150,100,2500,5 R,good",
  "2025-03-01,7I,120,3R,110,0,6000,-2,",
].join("\n");

describe("signed direction decoding", () => {
  it("negates L and keeps R", () => {
    expect(parseSignedDirection("20 L")).toBe(-20);
    expect(parseSignedDirection("15R")).toBe(15);
    expect(parseSignedDirection("12,5 l")).toBe(-12.5);
    expect(parseSignedDirection("7°R")).toBe(7);
  });

  it("takes bare numbers at face value", () => {
    expect(parseSignedDirection("10")).toBe(10);
    expect(parseSignedDirection("-5")).toBe(-5);
    expect(parseSignedDirection(3.25)).toBe(3.25);
  });

  it("maps anything else to null", () => {
    expect(parseSignedDirection("abc")).toBeNull();
    expect(parseSignedDirection("")).toBeNull();
    expect(parseSignedDirection("nan")).toBeNull();
    expect(parseSignedDirection(undefined)).toBeNull();
  });
});

describe("numeric coercion", () => {
  it("accepts a decimal comma and rejects junk", () => {
    expect(toOptNumber("1,48")).toBe(1.48);
    expect(toOptNumber(" 152.3 ")).toBe(152.3);
    expect(toOptNumber("#DIV/0!")).toBeNull();
    expect(toOptNumber("12abc")).toBeNull();
    expect(toOptNumber("N/A")).toBeNull();
  });
});

describe("smash fallback", () => {
  it("is clipped to [0, 1.5]", () => {
    expect(fallbackSmash(150, 100)).toBe(1.5);
    expect(fallbackSmash(180, 100)).toBe(1.5);
    expect(fallbackSmash(0, 100)).toBe(0);
    expect(fallbackSmash(140, 100)).toBeCloseTo(1.4, 10);
  });

  it("is null for a zero club speed or a missing input", () => {
    expect(fallbackSmash(150, 0)).toBeNull();
    expect(fallbackSmash(0, 0)).toBeNull();
    expect(fallbackSmash(null, 100)).toBeNull();
  });
});

describe("name keys", () => {
  it("ignores case, accents and punctuation", () => {
    expect(normalizeNameKey("É. Dupont")).toBe("edupont");
    expect(normalizeNameKey("e dupont")).toBe("edupont");
    expect(normalizeNameKey(normalizeNameKey("É. Dupont"))).toBe("edupont");
    expect(normalizeNameKey(null)).toBe("");
  });
});

describe("field canonicalizer", () => {
  it("prefers the canonical header over vendor aliases", () => {
    const cols = resolveFieldColumns(["Carry (m)", "Carry", "CarryDistance", "Spin axis"]);
    expect(cols.Carry).toBe("Carry");
    expect(cols.SpinAxis).toBe("Spin axis");
    expect(cols.Offline).toBeUndefined();
  });

  it("parses vendor csv into canonical shots", () => {
    const raw = parseCsv(vendorCsv, "conre.csv");
    expect(raw.rowCount).toBe(2);
    expect(raw.errors).toEqual([]);

    const rep = canonicalizeShots(raw, meta, DEFAULT_POLICY);
    const [drive, iron] = rep.table.rows;

    expect(drive.Club).toBe("Driver");
    expect(drive.IsDriver).toBe(true);
    expect(drive.Carry).toBe(150.5);
    expect(drive.Offline).toBe(-10);
    expect(drive.SpinAxis).toBe(5);
    expect(drive.Smash).toBe(1.5);
    expect(drive.Alias).toBe("Sportsman");
    expect(drive.SessionDate).toBe("2025-03-01");
    expect(drive.extras).toEqual({ Date: "2025-03-01", Notes: "good" });

    expect(iron.IsDriver).toBe(false);
    expect(iron.Offline).toBe(3);
    expect(iron.SpinAxis).toBe(-2);
    expect(iron.Smash).toBeNull();

    expect(rep.smashComputed).toBe(true);
    expect(rep.smashUndefined).toBe(1);
    expect(rep.unknownColumns).toEqual(["Date", "Notes"]);
    expect(rep.table.columns).toEqual([
      "SessionDate",
      "Alias",
      "PlayerRaw",
      "Hand",
      "Club",
      "IsDriver",
      "Carry",
      "Offline",
      "ClubSpeed",
      "BallSpeed",
      "Smash",
      "BackSpin",
      "SpinAxis",
      "Date",
      "Notes",
    ]);
  });

  it("keeps a supplied smash column", () => {
    const raw = parseCsv("Smash Factor,Ball Speed,Club Speed\n1.45,150,100\n", "s.csv");
    const rep = canonicalizeShots(raw, meta);
    expect(rep.smashComputed).toBe(false);
    expect(rep.table.rows[0].Smash).toBe(1.45);
  });

  it("strips a byte order mark from the first header", () => {
    const raw = parseCsv("\uFEFFdate,Carry\n2025-03-01,140\n");
    expect(raw.headers).toEqual(["date", "Carry"]);
  });

  it("unions columns across files in first-seen order", () => {
    const a = canonicalizeShots(parseCsv("Carry,Extra A\n140,x\n"), meta).table;
    const b = canonicalizeShots(parseCsv("Carry,Offline,Extra B\n150,2 L,y\n"), meta).table;
    const all = concatShotTables([a, b]);
    expect(all.rows).toHaveLength(2);
    expect(all.columns).toEqual(["SessionDate", "Alias", "PlayerRaw", "Hand", "IsDriver", "Carry", "Offline", "Extra A", "Extra B"]);
  });
});
