import { describe, it, expect } from "vitest";
import { extractJournalDates, findDateCandidates, isWithinDateBounds, parseJournalDate } from "./dates.js";

const FIELD_ENTRY = "Found on 01/15/2023 near AZMAR-042, also 99/99/9999 and AZMAR-7.";

describe("extractJournalDates", () => {
  it("keeps valid dates and drops out-of-range ones", () => {
    expect(extractJournalDates(FIELD_ENTRY)).toEqual(["01/15/2023"]);
  });

  it("rejects month 13", () => {
    expect(extractJournalDates("Entry dated 13/01/2024.")).toEqual([]);
  });

  it("rejects day zero", () => {
    expect(extractJournalDates("01/00/2020")).toEqual([]);
  });

  it("accepts a day that does not exist in the month", () => {
    expect(extractJournalDates("Camp moved on 02/30/2024")).toEqual(["02/30/2024"]);
  });

  it("preserves order of appearance and duplicates", () => {
    const text = "03/04/2020, then 01/01/1999, then 03/04/2020 again";
    expect(extractJournalDates(text)).toEqual(["03/04/2020", "01/01/1999", "03/04/2020"]);
  });

  it("finds dates embedded in longer digit runs", () => {
    expect(extractJournalDates("x001/15/20234")).toEqual(["01/15/2023"]);
  });

  it("returns an empty list for text without dates", () => {
    expect(extractJournalDates("")).toEqual([]);
    expect(extractJournalDates("2023-01-15 and 1/5/2023")).toEqual([]);
  });

  it("only ever returns well-shaped, in-bound dates", () => {
    const inputs = [
      FIELD_ENTRY,
      "12/31/1999 00/10/2000 11/32/2001 10/31/0000 06/15/2022",
      "07/04/1776|08/08/8888|19/19/1919",
      "01/01/0001/02/02/0002"
    ];
    for (const text of inputs) {
      for (const d of extractJournalDates(text)) {
        expect(d).toMatch(/^\d{2}\/\d{2}\/\d{4}$/);
        const [month, day] = d.split("/").map(Number);
        expect(month).toBeGreaterThanOrEqual(1);
        expect(month).toBeLessThanOrEqual(12);
        expect(day).toBeGreaterThanOrEqual(1);
        expect(day).toBeLessThanOrEqual(31);
      }
    }
  });
});

describe("findDateCandidates", () => {
  it("returns every shape match before validation", () => {
    expect(findDateCandidates(FIELD_ENTRY)).toEqual(["01/15/2023", "99/99/9999"]);
  });
});

describe("parseJournalDate", () => {
  it("reads month, day and year", () => {
    expect(parseJournalDate("07/04/1776")).toEqual({ month: 7, day: 4, year: 1776 });
  });

  it("rejects year zero and malformed candidates", () => {
    expect(parseJournalDate("12/31/0000")).toBeNull();
    expect(parseJournalDate("7/4/1776")).toBeNull();
    expect(parseJournalDate("13/01/2024")).toBeNull();
  });
});

describe("isWithinDateBounds", () => {
  it("bounds the day at 31 regardless of month", () => {
    expect(isWithinDateBounds({ month: 2, day: 31, year: 2023 })).toBe(true);
    expect(isWithinDateBounds({ month: 2, day: 32, year: 2023 })).toBe(false);
    expect(isWithinDateBounds({ month: 0, day: 10, year: 2023 })).toBe(false);
  });
});
