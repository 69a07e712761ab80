/**
 * @fiscus/calendar — Month-length table loader.
 *
 * The table ships as JSON beside this module and is validated on load:
 * every year lists exactly twelve month lengths in 29..32, years are
 * contiguous, and the anchor secondary date lies inside the table.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { MonthTable } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const SecondaryDateSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(32),
});

export const MonthTableSchema = z.object({
  anchor: z.object({
    gregorian: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    secondary: SecondaryDateSchema,
  }),
  years: z.record(
    z.string().regex(/^\d{4}$/),
    z.array(z.number().int().min(29).max(32)).length(12),
  ),
});

export type MonthTableFile = z.infer<typeof MonthTableSchema>;

// =============================================================================
// Loader
// =============================================================================

const DEFAULT_TABLE_URL = new URL("./data/month-lengths.json", import.meta.url);

/**
 * Build a MonthTable from its parsed JSON form.
 *
 * @throws {z.ZodError} if the document does not match the schema
 * @throws {Error} if years are not contiguous or the anchor is outside them
 */
export function buildMonthTable(raw: unknown): MonthTable {
  const file = MonthTableSchema.parse(raw);

  const years = new Map<number, readonly number[]>();
  for (const [year, lengths] of Object.entries(file.years)) {
    years.set(Number(year), lengths);
  }

  const sorted = [...years.keys()].sort((a, b) => a - b);
  if (sorted.length === 0) {
    throw new Error("Month table must contain at least one year");
  }
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i] !== (sorted[i - 1] ?? 0) + 1) {
      throw new Error(`Month table years must be contiguous, gap after ${String(sorted[i - 1])}`);
    }
  }

  const anchorLengths = years.get(file.anchor.secondary.year);
  const anchorMonthLength = anchorLengths?.[file.anchor.secondary.month - 1];
  if (anchorMonthLength === undefined || file.anchor.secondary.day > anchorMonthLength) {
    throw new Error("Month table anchor must be a valid date inside the table");
  }

  return {
    anchorGregorian: file.anchor.gregorian,
    anchorSecondary: file.anchor.secondary,
    years,
  };
}

/**
 * Read and validate the month table JSON file.
 * Defaults to the table bundled with this package.
 */
export function loadMonthTable(url: URL = DEFAULT_TABLE_URL): MonthTable {
  const raw: unknown = JSON.parse(readFileSync(url, "utf8"));
  return buildMonthTable(raw);
}
