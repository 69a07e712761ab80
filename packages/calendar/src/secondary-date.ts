/**
 * @fiscus/calendar — Secondary date formatting, parsing and naming.
 *
 * Parsing here is syntactic only; range checks against the month table
 * happen in CalendarConverter.
 */

import { ValidationError } from "@fiscus/types";
import type { SecondaryDate } from "./types.js";

const MONTH_NAMES: readonly string[] = [
  "Baishakh", "Jestha", "Ashad", "Shrawan",
  "Bhadra", "Ashwin", "Kartik", "Mangsir",
  "Poush", "Magh", "Falgun", "Chaitra",
];

/** Gregorian months each secondary month overlaps, Baishakh first. */
const GREGORIAN_SPANS: readonly string[] = [
  "April-May", "May-June", "June-July", "July-August",
  "August-September", "September-October", "October-November", "November-December",
  "December-January", "January-February", "February-March", "March-April",
];

export const SECONDARY_DATE_FORMATS = ["YYYY-MM-DD", "DD MMM YYYY", "DD MMMM YYYY"] as const;

export type SecondaryDateFormat = (typeof SECONDARY_DATE_FORMATS)[number];

/** First month of a fiscal year. */
export const FISCAL_YEAR_START_MONTH = 4;

/** Month and day of the fiscal-year terminal marker ("last day of month 3"). */
export const FISCAL_YEAR_END_MONTH = 3;
export const FISCAL_YEAR_END_DAY = 32;

/**
 * Display form of a secondary date.
 *
 * - "YYYY-MM-DD" (default): zero padded, e.g. "2082-04-01"
 * - "DD MMM YYYY": "1 Shr 2082"
 * - "DD MMMM YYYY": "1 Shrawan 2082"
 */
export function formatSecondaryDate(
  date: SecondaryDate,
  format: SecondaryDateFormat = "YYYY-MM-DD",
): string {
  switch (format) {
    case "YYYY-MM-DD": {
      const year = String(date.year).padStart(4, "0");
      const month = String(date.month).padStart(2, "0");
      const day = String(date.day).padStart(2, "0");
      return `${year}-${month}-${day}`;
    }
    case "DD MMM YYYY":
      return `${String(date.day)} ${secondaryMonthName(date.month).slice(0, 3)} ${String(date.year)}`;
    case "DD MMMM YYYY":
      return `${String(date.day)} ${secondaryMonthName(date.month)} ${String(date.year)}`;
  }
}

/**
 * Parse "YYYY-MM-DD" (1–2 digit month and day accepted).
 * Throws ValidationError if the string is malformed or the month is not 1..12.
 */
export function parseSecondaryDate(value: string): SecondaryDate {
  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(value.trim());
  if (match === null) {
    throw new ValidationError("INVALID_DATE", `Invalid secondary date format: "${value}"`);
  }

  const date: SecondaryDate = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };

  if (date.month < 1 || date.month > 12) {
    throw new ValidationError("INVALID_DATE", `Invalid month: ${String(date.month)}`);
  }
  if (date.day < 1) {
    throw new ValidationError("INVALID_DATE", `Invalid day: ${String(date.day)}`);
  }

  return date;
}

/** Month name for 1..12, "Unknown" otherwise. */
export function secondaryMonthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? "Unknown";
}

/** Approximate Gregorian months for 1..12, e.g. 4 → "July-August"; "Unknown" otherwise. */
export function gregorianMonthSpan(month: number): string {
  return GREGORIAN_SPANS[month - 1] ?? "Unknown";
}

/** True for { month: 3, day: 32 }, the fiscal-year end boundary. */
export function isFiscalYearEndMarker(date: SecondaryDate): boolean {
  return date.month === FISCAL_YEAR_END_MONTH && date.day === FISCAL_YEAR_END_DAY;
}

/**
 * Fiscal year name for a secondary date.
 *
 * Fiscal years start on month 4, so 2082-04-01 → "2082/83" and
 * 2083-03-15 → "2082/83".
 */
export function fiscalYearNameFor(date: SecondaryDate): string {
  const startYear = date.month >= FISCAL_YEAR_START_MONTH ? date.year : date.year - 1;
  const endSuffix = String((startYear + 1) % 100).padStart(2, "0");
  return `${String(startYear)}/${endSuffix}`;
}
