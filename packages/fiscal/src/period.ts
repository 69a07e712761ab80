/**
 * @fiscus/fiscal — Period values and document numbering.
 *
 * Pure helpers: building a fresh period record, deriving prefixes from a
 * period name and formatting issued document numbers.
 *
 * Rules:
 * - Prefix = "<TYPE>-<yearCode>-", fixed at creation
 * - Document number = prefix + counter zero-padded to 4 digits
 * - Counters beyond 9999 are rendered at their natural width
 */

import type { DocumentType, GregorianDate } from "@fiscus/types";
import type { FiscalPeriod } from "./types.js";

/** Short document-type codes used in prefixes. */
export const DOCUMENT_TYPE_CODES: Readonly<Record<DocumentType, string>> = {
  invoice: "INV",
  purchase: "PUR",
  voucher: "JV",
};

export const DOCUMENT_NUMBER_WIDTH = 4;

/**
 * Year code used in prefixes.
 *
 * For names of 7+ characters, characters 2..3 and 5..6 are concatenated
 * ("2082/83" → "8283"). Shorter names are used as-is.
 */
export function deriveYearCode(name: string): string {
  if (name.length >= 7) {
    return name.slice(2, 4) + name.slice(5, 7);
  }
  return name;
}

export function documentPrefix(type: DocumentType, yearCode: string): string {
  return `${DOCUMENT_TYPE_CODES[type]}-${yearCode}-`;
}

export function formatDocumentNumber(prefix: string, value: number): string {
  return prefix + String(value).padStart(DOCUMENT_NUMBER_WIDTH, "0");
}

/** The configured prefix for one document type. */
export function prefixFor(period: FiscalPeriod, type: DocumentType): string {
  switch (type) {
    case "invoice":
      return period.invoicePrefix;
    case "purchase":
      return period.purchasePrefix;
    case "voucher":
      return period.voucherPrefix;
  }
}

/** The last issued counter value for one document type. */
export function counterFor(period: FiscalPeriod, type: DocumentType): number {
  switch (type) {
    case "invoice":
      return period.lastInvoiceNum;
    case "purchase":
      return period.lastPurchaseNum;
    case "voucher":
      return period.lastVoucherNum;
  }
}

/** A copy of `period` with one counter replaced. */
export function withCounter(
  period: FiscalPeriod,
  type: DocumentType,
  value: number,
  updatedAt: string,
): FiscalPeriod {
  switch (type) {
    case "invoice":
      return { ...period, lastInvoiceNum: value, updatedAt };
    case "purchase":
      return { ...period, lastPurchaseNum: value, updatedAt };
    case "voucher":
      return { ...period, lastVoucherNum: value, updatedAt };
  }
}

export interface NewPeriodParams {
  readonly id: string;
  readonly tenantId: string;
  readonly name: string;
  readonly startDate: GregorianDate;
  readonly endDate: GregorianDate;
  readonly startDateSecondary: string;
  readonly endDateSecondary: string;
  readonly createdAt: string;
}

/** A fresh period: open, not current, all counters at zero. */
export function newFiscalPeriod(params: NewPeriodParams): FiscalPeriod {
  const yearCode = deriveYearCode(params.name);
  return {
    id: params.id,
    tenantId: params.tenantId,
    name: params.name,
    startDate: params.startDate,
    endDate: params.endDate,
    startDateSecondary: params.startDateSecondary,
    endDateSecondary: params.endDateSecondary,
    isCurrent: false,
    isClosed: false,
    invoicePrefix: documentPrefix("invoice", yearCode),
    purchasePrefix: documentPrefix("purchase", yearCode),
    voucherPrefix: documentPrefix("voucher", yearCode),
    lastInvoiceNum: 0,
    lastPurchaseNum: 0,
    lastVoucherNum: 0,
    createdAt: params.createdAt,
    updatedAt: params.createdAt,
  };
}

/** Whether a Gregorian date falls inside the period (inclusive). */
export function containsDate(period: FiscalPeriod, date: GregorianDate): boolean {
  return date >= period.startDate && date <= period.endDate;
}
