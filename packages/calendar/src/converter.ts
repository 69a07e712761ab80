/**
 * @fiscus/calendar — CalendarConverter.
 *
 * Converts between Gregorian dates and the secondary calendar using a
 * bounded per-year table of month lengths and a fixed anchor pair.
 *
 * Rules:
 * - Pure: no clock, no I/O after construction
 * - Years outside the table throw ValidationError (UNSUPPORTED_CALENDAR_YEAR);
 *   there is no silent 30-day fallback
 * - The fiscal-year end marker { month: 3, day: 32 } is accepted by
 *   toGregorian and resolves to the last day of month 3
 */

import type { GregorianDate } from "@fiscus/types";
import { ValidationError } from "@fiscus/types";
import { addDays, diffDays, toEpochDay } from "./gregorian.js";
import { loadMonthTable } from "./month-table.js";
import {
  FISCAL_YEAR_END_DAY,
  FISCAL_YEAR_END_MONTH,
  FISCAL_YEAR_START_MONTH,
  formatSecondaryDate,
  isFiscalYearEndMarker,
  parseSecondaryDate,
} from "./secondary-date.js";
import type { MonthTable, PeriodBounds, SecondaryDate, SupportedYearRange } from "./types.js";

const PERIOD_NAME = /^(\d{4})\/(\d{2})$/;

export class CalendarConverter {
  private readonly _table: MonthTable;
  private readonly _range: SupportedYearRange;
  private readonly _firstEpochDay: number;
  private readonly _lastEpochDay: number;

  constructor(table: MonthTable = loadMonthTable()) {
    this._table = table;

    const years = [...table.years.keys()];
    this._range = { min: Math.min(...years), max: Math.max(...years) };

    const first = this.toGregorian({ year: this._range.min, month: 1, day: 1 });
    const lastMonthDays = this.daysInMonth(this._range.max, 12);
    const last = this.toGregorian({ year: this._range.max, month: 12, day: lastMonthDays });
    this._firstEpochDay = toEpochDay(first);
    this._lastEpochDay = toEpochDay(last);
  }

  // ─── Table Queries ───────────────────────────────────────────────────

  get supportedYears(): SupportedYearRange {
    return this._range;
  }

  /**
   * Days in a secondary month.
   * Throws ValidationError for a year outside the table or a month outside 1..12.
   */
  daysInMonth(year: number, month: number): number {
    const lengths = this._table.years.get(year);
    if (lengths === undefined) {
      throw new ValidationError(
        "UNSUPPORTED_CALENDAR_YEAR",
        `Unsupported calendar year ${String(year)}: supported range is ${String(this._range.min)}..${String(this._range.max)}`,
      );
    }
    const days = lengths[month - 1];
    if (days === undefined) {
      throw new ValidationError("INVALID_DATE", `Invalid month: ${String(month)}`);
    }
    return days;
  }

  totalDaysInYear(year: number): number {
    let total = 0;
    for (let month = 1; month <= 12; month++) {
      total += this.daysInMonth(year, month);
    }
    return total;
  }

  /**
   * Assert a secondary date names a real day in the table.
   * The fiscal-year end marker is accepted.
   */
  assertValid(date: SecondaryDate): void {
    if (!Number.isInteger(date.year) || !Number.isInteger(date.month) || !Number.isInteger(date.day)) {
      throw new ValidationError("INVALID_DATE", `Invalid secondary date: ${JSON.stringify(date)}`);
    }
    const max = this.daysInMonth(date.year, date.month);
    if (isFiscalYearEndMarker(date)) {
      return;
    }
    if (date.day < 1 || date.day > max) {
      throw new ValidationError(
        "INVALID_DATE",
        `Invalid day ${String(date.day)} for ${String(date.year)}-${String(date.month)} (max: ${String(max)})`,
      );
    }
  }

  /** Parse "YYYY-MM-DD" and check it against the table. */
  parse(value: string): SecondaryDate {
    const date = parseSecondaryDate(value);
    this.assertValid(date);
    return date;
  }

  // ─── Conversion ──────────────────────────────────────────────────────

  /**
   * Gregorian → secondary.
   *
   * Walks month by month from the anchor, forward for later dates and
   * backward for earlier ones, until the remaining offset fits the month.
   */
  toSecondary(date: GregorianDate): SecondaryDate {
    const epochDay = toEpochDay(date);
    if (epochDay < this._firstEpochDay || epochDay > this._lastEpochDay) {
      throw new ValidationError(
        "UNSUPPORTED_CALENDAR_YEAR",
        `Date ${date} is outside the supported calendar years ${String(this._range.min)}..${String(this._range.max)}`,
      );
    }

    const anchor = this._table.anchorSecondary;
    let year = anchor.year;
    let month = anchor.month;
    let day = anchor.day + diffDays(this._table.anchorGregorian, date);

    while (day > this.daysInMonth(year, month)) {
      day -= this.daysInMonth(year, month);
      month++;
      if (month > 12) {
        month = 1;
        year++;
      }
    }

    while (day <= 0) {
      month--;
      if (month < 1) {
        month = 12;
        year--;
      }
      day += this.daysInMonth(year, month);
    }

    return { year, month, day };
  }

  /**
   * Secondary → Gregorian.
   *
   * Sums whole years, then whole months within the target year, then the
   * day remainder, and adds that delta to the anchor.
   */
  toGregorian(date: SecondaryDate): GregorianDate {
    this.assertValid(date);

    const anchor = this._table.anchorSecondary;
    const day = isFiscalYearEndMarker(date)
      ? this.daysInMonth(date.year, FISCAL_YEAR_END_MONTH)
      : date.day;

    let total = 0;

    if (date.year > anchor.year) {
      for (let y = anchor.year; y < date.year; y++) {
        total += this.totalDaysInYear(y);
      }
    } else if (date.year < anchor.year) {
      for (let y = date.year; y < anchor.year; y++) {
        total -= this.totalDaysInYear(y);
      }
    }

    if (date.month > anchor.month) {
      for (let m = anchor.month; m < date.month; m++) {
        total += this.daysInMonth(date.year, m);
      }
    } else if (date.month < anchor.month) {
      for (let m = date.month; m < anchor.month; m++) {
        total -= this.daysInMonth(date.year, m);
      }
    }

    total += day - anchor.day;

    return addDays(this._table.anchorGregorian, total);
  }

  // ─── Fiscal Periods ──────────────────────────────────────────────────

  /**
   * Boundaries for a fiscal period named "YYYY/YY" (e.g. "2082/83").
   *
   * Start is { YYYY, 4, 1 }; end is the terminal marker { YYYY+1, 3, 32 }.
   * The second part must be the following year's last two digits.
   */
  periodBoundsFromName(name: string): PeriodBounds {
    const match = PERIOD_NAME.exec(name);
    if (match === null) {
      throw new ValidationError(
        "INVALID_PERIOD_NAME",
        `Invalid period name "${name}": expected "YYYY/YY"`,
      );
    }

    const year = Number(match[1]);
    const expectedSuffix = String((year + 1) % 100).padStart(2, "0");
    if (match[2] !== expectedSuffix) {
      throw new ValidationError(
        "INVALID_PERIOD_NAME",
        `Invalid period name "${name}": expected "${String(year)}/${expectedSuffix}"`,
      );
    }

    const startSecondary: SecondaryDate = { year, month: FISCAL_YEAR_START_MONTH, day: 1 };
    const endSecondary: SecondaryDate = {
      year: year + 1,
      month: FISCAL_YEAR_END_MONTH,
      day: FISCAL_YEAR_END_DAY,
    };

    return {
      startSecondary,
      endSecondary,
      startGregorian: this.toGregorian(startSecondary),
      endGregorian: this.toGregorian(endSecondary),
    };
  }

  /** Display form of the secondary date for a Gregorian date. */
  formatAsSecondary(date: GregorianDate): string {
    return formatSecondaryDate(this.toSecondary(date));
  }
}
