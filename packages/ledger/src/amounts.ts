/**
 * @fiscus/ledger — Amount arithmetic and the double-entry check.
 *
 * Amounts are plain numbers. Totals are compared within a fixed
 * tolerance and reported values are rounded to four decimal places.
 *
 * Rules:
 * - Every amount must be finite and non-negative
 * - An entry balances when |Σdebit − Σcredit| ≤ BALANCE_TOLERANCE
 * - An entry needs at least MIN_LINES lines
 */

import { ValidationError } from "@fiscus/types";

export const BALANCE_TOLERANCE = 0.0001;
export const AMOUNT_DECIMALS = 4;
export const MIN_LINES = 2;

const SCALE = 10 ** AMOUNT_DECIMALS;

/** Round to AMOUNT_DECIMALS places. Never returns -0. */
export function roundAmount(value: number): number {
  const rounded = Math.round(value * SCALE) / SCALE;
  return rounded === 0 ? 0 : rounded;
}

export function isValidAmount(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/** Throws ValidationError (INVALID_AMOUNT) for negative or non-finite amounts. */
export function assertValidAmount(value: number, label: string): void {
  if (!isValidAmount(value)) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `${label} must be a finite, non-negative number, got ${String(value)}`,
    );
  }
}

export function sumAmounts(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function isBalanced(totalDebit: number, totalCredit: number): boolean {
  return Math.abs(totalDebit - totalCredit) <= BALANCE_TOLERANCE;
}

export interface EntryTotals {
  readonly totalDebit: number;
  readonly totalCredit: number;
}

/**
 * Check the double-entry invariant over a set of lines.
 *
 * Throws ValidationError with TOO_FEW_LINES, INVALID_AMOUNT or
 * UNBALANCED_ENTRY, in that order of precedence.
 */
export function assertDoubleEntry(
  lines: readonly { readonly debit: number; readonly credit: number }[],
): EntryTotals {
  if (lines.length < MIN_LINES) {
    throw new ValidationError(
      "TOO_FEW_LINES",
      `A journal entry needs at least ${String(MIN_LINES)} lines, got ${String(lines.length)}`,
    );
  }

  lines.forEach((line, i) => {
    assertValidAmount(line.debit, `Line ${String(i + 1)} debit`);
    assertValidAmount(line.credit, `Line ${String(i + 1)} credit`);
  });

  const totalDebit = sumAmounts(lines.map((l) => l.debit));
  const totalCredit = sumAmounts(lines.map((l) => l.credit));

  if (!isBalanced(totalDebit, totalCredit)) {
    throw new ValidationError(
      "UNBALANCED_ENTRY",
      `Journal entry is unbalanced: debits ${String(roundAmount(totalDebit))} ≠ credits ${String(roundAmount(totalCredit))}`,
      { totalDebit: roundAmount(totalDebit), totalCredit: roundAmount(totalCredit) },
    );
  }

  return { totalDebit, totalCredit };
}
