/**
 * Tests for CalendarConverter.
 *
 * Covers:
 * - Anchor and month-boundary conversions in both directions
 * - Supported year range (no silent fallback)
 * - The fiscal-year end marker
 * - Period bounds derived from "YYYY/YY" names
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@fiscus/types";
import { CalendarConverter } from "../src/converter.js";
import { formatSecondaryDate } from "../src/secondary-date.js";

const calendar = new CalendarConverter();

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.code;
    throw err;
  }
  return undefined;
}

describe("CalendarConverter", () => {
  // ─── Table Queries ───────────────────────────────────────────────────

  describe("table queries", () => {
    it("reports the supported year range", () => {
      expect(calendar.supportedYears).toEqual({ min: 2080, max: 2090 });
    });

    it("looks up month lengths", () => {
      expect(calendar.daysInMonth(2082, 1)).toBe(31);
      expect(calendar.daysInMonth(2082, 2)).toBe(32);
      expect(calendar.daysInMonth(2083, 1)).toBe(30);
    });

    it("sums a whole year", () => {
      expect(calendar.totalDaysInYear(2080)).toBe(365);
      expect(calendar.totalDaysInYear(2082)).toBe(366);
    });

    it("rejects years outside the table instead of defaulting", () => {
      expect(codeOf(() => calendar.daysInMonth(2079, 1))).toBe("UNSUPPORTED_CALENDAR_YEAR");
      expect(codeOf(() => calendar.daysInMonth(2091, 6))).toBe("UNSUPPORTED_CALENDAR_YEAR");
    });

    it("rejects months outside 1..12", () => {
      expect(codeOf(() => calendar.daysInMonth(2082, 13))).toBe("INVALID_DATE");
      expect(codeOf(() => calendar.daysInMonth(2082, 0))).toBe("INVALID_DATE");
    });
  });

  // ─── toSecondary ─────────────────────────────────────────────────────

  describe("toSecondary", () => {
    it("maps the anchor date", () => {
      expect(calendar.toSecondary("2023-04-14")).toEqual({ year: 2080, month: 1, day: 1 });
    });

    it("stays in the month while the offset fits", () => {
      expect(calendar.toSecondary("2023-05-14")).toEqual({ year: 2080, month: 1, day: 31 });
    });

    it("carries into the next month", () => {
      expect(calendar.toSecondary("2023-05-15")).toEqual({ year: 2080, month: 2, day: 1 });
    });

    it("carries across years", () => {
      expect(calendar.toSecondary("2025-07-16")).toEqual({ year: 2082, month: 4, day: 1 });
      expect(calendar.toSecondary("2026-07-15")).toEqual({ year: 2083, month: 3, day: 31 });
    });

    it("maps the last supported day", () => {
      expect(calendar.toSecondary("2034-04-13")).toEqual({ year: 2090, month: 12, day: 31 });
    });

    it("rejects dates outside the supported years", () => {
      expect(codeOf(() => calendar.toSecondary("2023-04-13"))).toBe("UNSUPPORTED_CALENDAR_YEAR");
      expect(codeOf(() => calendar.toSecondary("2034-04-14"))).toBe("UNSUPPORTED_CALENDAR_YEAR");
    });

    it("rejects malformed Gregorian dates", () => {
      expect(codeOf(() => calendar.toSecondary("2025-02-30"))).toBe("INVALID_DATE");
      expect(codeOf(() => calendar.toSecondary("16/07/2025"))).toBe("INVALID_DATE");
    });

    it("formats the converted date for display", () => {
      expect(calendar.formatAsSecondary("2025-07-16")).toBe("2082-04-01");
    });
  });

  // ─── toGregorian ─────────────────────────────────────────────────────

  describe("toGregorian", () => {
    it("maps the anchor date", () => {
      expect(calendar.toGregorian({ year: 2080, month: 1, day: 1 })).toBe("2023-04-14");
    });

    it("adds whole months within the year", () => {
      expect(calendar.toGregorian({ year: 2080, month: 2, day: 1 })).toBe("2023-05-15");
    });

    it("adds whole years before months", () => {
      expect(calendar.toGregorian({ year: 2082, month: 4, day: 1 })).toBe("2025-07-16");
      expect(calendar.toGregorian({ year: 2083, month: 4, day: 1 })).toBe("2026-07-16");
    });

    it("resolves the fiscal-year end marker to the last day of month 3", () => {
      expect(calendar.toGregorian({ year: 2083, month: 3, day: 32 })).toBe("2026-07-15");
      expect(calendar.toGregorian({ year: 2082, month: 3, day: 32 })).toBe(
        calendar.toGregorian({ year: 2082, month: 3, day: 31 }),
      );
    });

    it("rejects days beyond the month length", () => {
      expect(codeOf(() => calendar.toGregorian({ year: 2082, month: 6, day: 31 }))).toBe(
        "INVALID_DATE",
      );
      expect(codeOf(() => calendar.toGregorian({ year: 2082, month: 3, day: 33 }))).toBe(
        "INVALID_DATE",
      );
    });

    it("rejects day zero and fractional parts", () => {
      expect(codeOf(() => calendar.toGregorian({ year: 2082, month: 5, day: 0 }))).toBe(
        "INVALID_DATE",
      );
      expect(codeOf(() => calendar.toGregorian({ year: 2082, month: 5, day: 1.5 }))).toBe(
        "INVALID_DATE",
      );
    });

    it("rejects years outside the table", () => {
      expect(codeOf(() => calendar.toGregorian({ year: 2100, month: 1, day: 1 }))).toBe(
        "UNSUPPORTED_CALENDAR_YEAR",
      );
    });
  });

  // ─── parse ───────────────────────────────────────────────────────────

  describe("parse", () => {
    it("parses and validates against the table", () => {
      expect(calendar.parse("2082-02-32")).toEqual({ year: 2082, month: 2, day: 32 });
    });

    it("rejects a day the table does not have", () => {
      expect(codeOf(() => calendar.parse("2082-01-32"))).toBe("INVALID_DATE");
    });
  });

  // ─── periodBoundsFromName ────────────────────────────────────────────

  describe("periodBoundsFromName", () => {
    it("derives dual-calendar bounds for 2082/83", () => {
      const bounds = calendar.periodBoundsFromName("2082/83");
      expect(formatSecondaryDate(bounds.startSecondary)).toBe("2082-04-01");
      expect(formatSecondaryDate(bounds.endSecondary)).toBe("2083-03-32");
      expect(bounds.startGregorian).toBe("2025-07-16");
      expect(bounds.endGregorian).toBe("2026-07-15");
    });

    it("leaves no gap between consecutive periods", () => {
      const first = calendar.periodBoundsFromName("2082/83");
      const second = calendar.periodBoundsFromName("2083/84");
      expect(second.startGregorian).toBe("2026-07-16");
      expect(first.endGregorian < second.startGregorian).toBe(true);
    });

    it("rejects malformed names", () => {
      expect(codeOf(() => calendar.periodBoundsFromName("82/83"))).toBe("INVALID_PERIOD_NAME");
      expect(codeOf(() => calendar.periodBoundsFromName("2082-83"))).toBe("INVALID_PERIOD_NAME");
      expect(codeOf(() => calendar.periodBoundsFromName("FY2082"))).toBe("INVALID_PERIOD_NAME");
    });

    it("rejects names whose years are not adjacent", () => {
      expect(codeOf(() => calendar.periodBoundsFromName("2082/84"))).toBe("INVALID_PERIOD_NAME");
    });

    it("rejects periods that leave the table", () => {
      expect(codeOf(() => calendar.periodBoundsFromName("2090/91"))).toBe(
        "UNSUPPORTED_CALENDAR_YEAR",
      );
    });
  });
});
