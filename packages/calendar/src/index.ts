/**
 * @fiscus/calendar — Dual-calendar conversion for fiscal periods.
 *
 * Converts between Gregorian dates and a table-driven secondary calendar
 * with variable month lengths, and derives fiscal period boundaries from
 * "YYYY/YY" period names.
 *
 * Design rules:
 * - Bounded: only years present in the month table are supported
 * - Fail-closed: out-of-range years and impossible days throw
 * - Pure conversion arithmetic on UTC epoch days
 */

// Converter
export { CalendarConverter } from "./converter.js";

// Month table
export { loadMonthTable, buildMonthTable, MonthTableSchema } from "./month-table.js";
export type { MonthTableFile } from "./month-table.js";

// Secondary date helpers
export {
  formatSecondaryDate,
  parseSecondaryDate,
  secondaryMonthName,
  gregorianMonthSpan,
  fiscalYearNameFor,
  isFiscalYearEndMarker,
  FISCAL_YEAR_START_MONTH,
  FISCAL_YEAR_END_MONTH,
  FISCAL_YEAR_END_DAY,
  SECONDARY_DATE_FORMATS,
} from "./secondary-date.js";
export type { SecondaryDateFormat } from "./secondary-date.js";

// Gregorian helpers
export { addDays, diffDays, toEpochDay, fromEpochDay } from "./gregorian.js";

// Types
export type {
  SecondaryDate,
  SupportedYearRange,
  MonthTable,
  PeriodBounds,
} from "./types.js";
