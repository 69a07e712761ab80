/**
 * Tests for secondary date helpers and the month table loader.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { ValidationError } from "@fiscus/types";
import {
  fiscalYearNameFor,
  formatSecondaryDate,
  gregorianMonthSpan,
  isFiscalYearEndMarker,
  parseSecondaryDate,
  secondaryMonthName,
} from "../src/secondary-date.js";
import { buildMonthTable, loadMonthTable } from "../src/month-table.js";
import { addDays, diffDays, fromEpochDay, toEpochDay } from "../src/gregorian.js";

// ─── Formatting & Parsing ────────────────────────────────────────────────

describe("formatSecondaryDate", () => {
  it("zero pads month and day", () => {
    expect(formatSecondaryDate({ year: 2082, month: 4, day: 1 })).toBe("2082-04-01");
  });

  it("writes short and long month names", () => {
    const date = { year: 2082, month: 4, day: 1 };
    expect(formatSecondaryDate(date, "YYYY-MM-DD")).toBe("2082-04-01");
    expect(formatSecondaryDate(date, "DD MMM YYYY")).toBe("1 Shr 2082");
    expect(formatSecondaryDate(date, "DD MMMM YYYY")).toBe("1 Shrawan 2082");
    expect(formatSecondaryDate({ year: 2083, month: 12, day: 30 }, "DD MMM YYYY")).toBe(
      "30 Cha 2083",
    );
  });
});

describe("parseSecondaryDate", () => {
  it("parses padded and unpadded forms", () => {
    expect(parseSecondaryDate("2082-04-01")).toEqual({ year: 2082, month: 4, day: 1 });
    expect(parseSecondaryDate("2082-4-1")).toEqual({ year: 2082, month: 4, day: 1 });
  });

  it("rejects malformed strings", () => {
    expect(() => parseSecondaryDate("2082/04/01")).toThrow(ValidationError);
    expect(() => parseSecondaryDate("")).toThrow(/Invalid secondary date format/);
  });

  it("rejects month 13", () => {
    expect(() => parseSecondaryDate("2082-13-01")).toThrow(/Invalid month: 13/);
  });
});

describe("secondaryMonthName", () => {
  it("names months 1..12", () => {
    expect(secondaryMonthName(1)).toBe("Baishakh");
    expect(secondaryMonthName(4)).toBe("Shrawan");
    expect(secondaryMonthName(12)).toBe("Chaitra");
  });

  it("returns Unknown outside 1..12", () => {
    expect(secondaryMonthName(0)).toBe("Unknown");
  });
});

describe("gregorianMonthSpan", () => {
  it("gives the overlapping Gregorian months", () => {
    expect(gregorianMonthSpan(1)).toBe("April-May");
    expect(gregorianMonthSpan(4)).toBe("July-August");
    expect(gregorianMonthSpan(9)).toBe("December-January");
  });

  it("returns Unknown outside 1..12", () => {
    expect(gregorianMonthSpan(13)).toBe("Unknown");
  });
});

describe("fiscalYearNameFor", () => {
  it("starts the fiscal year on month 4", () => {
    expect(fiscalYearNameFor({ year: 2082, month: 4, day: 1 })).toBe("2082/83");
    expect(fiscalYearNameFor({ year: 2083, month: 3, day: 15 })).toBe("2082/83");
  });

  it("wraps the century suffix", () => {
    expect(fiscalYearNameFor({ year: 2099, month: 5, day: 1 })).toBe("2099/00");
  });
});

describe("isFiscalYearEndMarker", () => {
  it("matches only month 3 day 32", () => {
    expect(isFiscalYearEndMarker({ year: 2083, month: 3, day: 32 })).toBe(true);
    expect(isFiscalYearEndMarker({ year: 2083, month: 2, day: 32 })).toBe(false);
    expect(isFiscalYearEndMarker({ year: 2083, month: 3, day: 31 })).toBe(false);
  });
});

// ─── Gregorian Arithmetic ────────────────────────────────────────────────

describe("gregorian arithmetic", () => {
  it("counts days across a leap day", () => {
    expect(diffDays("2024-02-28", "2024-03-01")).toBe(2);
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
  });

  it("goes backwards with negative offsets", () => {
    expect(addDays("2025-01-01", -1)).toBe("2024-12-31");
  });

  it("round-trips epoch days", () => {
    expect(toEpochDay("1970-01-02")).toBe(1);
    expect(fromEpochDay(toEpochDay("2025-07-16"))).toBe("2025-07-16");
  });
});

// ─── Month Table ─────────────────────────────────────────────────────────

describe("month table", () => {
  it("loads the bundled table", () => {
    const table = loadMonthTable();
    expect(table.anchorGregorian).toBe("2023-04-14");
    expect(table.anchorSecondary).toEqual({ year: 2080, month: 1, day: 1 });
    expect(table.years.size).toBe(11);
    expect(table.years.get(2082)).toEqual([31, 32, 31, 32, 31, 30, 30, 30, 29, 29, 30, 31]);
  });

  it("rejects a year with the wrong number of months", () => {
    expect(() =>
      buildMonthTable({
        anchor: { gregorian: "2023-04-14", secondary: { year: 2080, month: 1, day: 1 } },
        years: { "2080": [31, 32, 31] },
      }),
    ).toThrow(ZodError);
  });

  it("rejects gaps between years", () => {
    const year = [31, 32, 31, 32, 31, 30, 30, 29, 30, 29, 30, 30];
    expect(() =>
      buildMonthTable({
        anchor: { gregorian: "2023-04-14", secondary: { year: 2080, month: 1, day: 1 } },
        years: { "2080": year, "2082": year },
      }),
    ).toThrow(/contiguous/);
  });

  it("rejects an anchor outside the table", () => {
    const year = [31, 32, 31, 32, 31, 30, 30, 29, 30, 29, 30, 30];
    expect(() =>
      buildMonthTable({
        anchor: { gregorian: "2023-04-14", secondary: { year: 2070, month: 1, day: 1 } },
        years: { "2080": year },
      }),
    ).toThrow(/anchor/);
  });
});
