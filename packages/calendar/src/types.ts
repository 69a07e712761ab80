/**
 * @fiscus/calendar — Types for the dual-calendar converter.
 *
 * Rules:
 * - All types are readonly
 * - Gregorian dates travel as "YYYY-MM-DD" strings
 * - Secondary dates travel as { year, month, day } records
 */

import type { GregorianDate } from "@fiscus/types";

// ─── Secondary Calendar ──────────────────────────────────────────────────

/**
 * A date in the secondary (table-driven) calendar.
 * `month` is 1..12; `day` is 1..daysInMonth(year, month).
 */
export interface SecondaryDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/** Inclusive range of secondary years covered by the month table. */
export interface SupportedYearRange {
  readonly min: number;
  readonly max: number;
}

// ─── Month Table ─────────────────────────────────────────────────────────

/**
 * Month lengths per secondary year plus the anchor pair used as the
 * zero point for conversion arithmetic.
 */
export interface MonthTable {
  readonly anchorGregorian: GregorianDate;
  readonly anchorSecondary: SecondaryDate;
  readonly years: ReadonlyMap<number, readonly number[]>;
}

// ─── Fiscal Periods ──────────────────────────────────────────────────────

/**
 * Boundaries of a fiscal period in both calendars.
 *
 * `endSecondary` is the terminal marker { month: 3, day: 32 }, meaning
 * "last day of month 3"; `endGregorian` is that last day resolved.
 */
export interface PeriodBounds {
  readonly startSecondary: SecondaryDate;
  readonly endSecondary: SecondaryDate;
  readonly startGregorian: GregorianDate;
  readonly endGregorian: GregorianDate;
}
