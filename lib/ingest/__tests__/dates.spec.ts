import { describe, it, expect } from "vitest";
import { cleanDateText, compactDate, findDateColumn, parseSessionDate, sessionDateFromRows } from "@/lib/ingest/dates";
import { DateParseError, MissingDateColumnError } from "@/lib/errors";

describe("parseSessionDate", () => {
  it("reads ISO and slashed year-first dates", () => {
    expect(parseSessionDate("2025-03-01")).toBe("2025-03-01");
    expect(parseSessionDate("2025/3/1")).toBe("2025-03-01");
    expect(parseSessionDate("2025-03-01 14:05:33")).toBe("2025-03-01");
  });

  it("strips formula markers and quotes", () => {
    expect(parseSessionDate('="2025/03/01"')).toBe("2025-03-01");
    expect(cleanDateText("'01/03/2025'")).toBe("01/03/2025");
  });

  it("reads localized month names with weekday and time noise", () => {
    expect(parseSessionDate("Samedi 1 mars 2025 (14:05)")).toBe("2025-03-01");
    expect(parseSessionDate("1er février 2025")).toBe("2025-02-01");
    expect(parseSessionDate("Saturday, March 1, 2025")).toBe("2025-03-01");
    expect(parseSessionDate("12-Sep-2024")).toBe("2024-09-12");
  });

  it("reads an abbreviated English month that is also a French weekday", () => {
    expect(parseSessionDate("Mar. 4, 2025")).toBe("2025-03-04");
    expect(parseSessionDate("mar. 4 mars 2025")).toBe("2025-03-04");
    expect(cleanDateText("Mar. 4, 2025")).toBe("4, 2025");
    expect(cleanDateText("Mar. 4, 2025", true)).toBe("Mar. 4, 2025");
  });

  it("prefers day-first for slashed dates and falls back to month-first", () => {
    expect(parseSessionDate("02/03/2025")).toBe("2025-03-02");
    expect(parseSessionDate("03/15/2025")).toBe("2025-03-15");
    expect(parseSessionDate("15.03.2025")).toBe("2025-03-15");
  });

  it("captures a date embedded in free text", () => {
    expect(parseSessionDate("Session du 5 avr. 2025 à 10h")).toBe("2025-04-05");
  });

  it("returns null for impossible or unrecognized values", () => {
    expect(parseSessionDate("2025-02-30")).toBeNull();
    expect(parseSessionDate("not a date")).toBeNull();
    expect(parseSessionDate("")).toBeNull();
    expect(parseSessionDate(null)).toBeNull();
  });

  it("compacts to YYYYMMDD", () => {
    expect(compactDate("2025-03-01")).toBe("20250301");
  });
});

describe("findDateColumn", () => {
  it("follows the candidate order, then loose matches", () => {
    expect(findDateColumn(["Club", "Round Date", "date"])).toBe("date");
    expect(findDateColumn(["Club", "Round Date"])).toBe("Round Date");
    expect(findDateColumn(["session_date", "Carry"])).toBe("session_date");
    expect(findDateColumn(["Carry", "Shot Date/Time"])).toBe("Shot Date/Time");
  });

  it("throws when no column carries a date", () => {
    expect(() => findDateColumn(["Carry", "Offline"], "a.csv")).toThrow(MissingDateColumnError);
  });
});

describe("sessionDateFromRows", () => {
  const headers = ["Date", "Carry"];
  const rows = (dates: string[]) => dates.map((d) => ({ Date: d, Carry: "150" }));

  it("uses the mode when it covers at least 80% of rows", () => {
    const d = sessionDateFromRows(rows(["2025-03-01", "2025-03-01", "2025-03-01", "2025-03-01", "2025-03-02"]), headers);
    expect(d).toBe("2025-03-01");
  });

  it("uses the median otherwise", () => {
    expect(sessionDateFromRows(rows(["2025-03-03", "2025-03-01", "2025-03-02"]), headers)).toBe("2025-03-02");
  });

  it("skips empty cells but fails on an unparseable one", () => {
    expect(sessionDateFromRows(rows(["", "01/03/2025"]), headers)).toBe("2025-03-01");
    try {
      sessionDateFromRows(rows(["2025-03-01", "garbage"]), headers, "b.csv");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DateParseError);
      if (e instanceof DateParseError) {
        expect(e.rawValue).toBe("garbage");
        expect(e.column).toBe("Date");
        expect(e.file).toBe("b.csv");
      }
    }
  });

  it("fails on a date column with no value", () => {
    expect(() => sessionDateFromRows(rows(["", " "]), headers)).toThrow(DateParseError);
  });
});
