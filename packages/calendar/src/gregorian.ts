/**
 * @fiscus/calendar — Gregorian day arithmetic.
 *
 * Dates are handled as UTC epoch-day numbers so that no local timezone
 * or DST shift can move a date by one.
 */

import type { GregorianDate } from "@fiscus/types";
import { isGregorianDate, ValidationError } from "@fiscus/types";

const MS_PER_DAY = 86_400_000;

/**
 * Parse a "YYYY-MM-DD" date into days since 1970-01-01.
 * Throws ValidationError for malformed or impossible dates.
 */
export function toEpochDay(date: GregorianDate): number {
  if (!isGregorianDate(date)) {
    throw new ValidationError("INVALID_DATE", `Invalid Gregorian date: "${String(date)}"`);
  }
  return Math.round(Date.parse(`${date}T00:00:00.000Z`) / MS_PER_DAY);
}

/** Format days since 1970-01-01 as "YYYY-MM-DD". */
export function fromEpochDay(epochDay: number): GregorianDate {
  return new Date(epochDay * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Add (or subtract) whole days. */
export function addDays(date: GregorianDate, days: number): GregorianDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** Signed number of days from `from` to `to`. */
export function diffDays(from: GregorianDate, to: GregorianDate): number {
  return toEpochDay(to) - toEpochDay(from);
}
