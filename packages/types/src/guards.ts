/**
 * Runtime Type Guards
 *
 * Narrowing functions for Fiscus domain primitives.
 * These enable safe runtime validation at system boundaries
 * (route parameters, deserialized data, external integrations).
 */

import type { AccountType, DocumentType, GregorianDate, JournalStatus } from "./domain.js";
import { DomainError } from "./errors.js";

const ACCOUNT_TYPES = new Set<string>(["asset", "liability", "equity", "revenue", "expense"]);
const JOURNAL_STATUSES = new Set<string>(["draft", "posted"]);
const DOCUMENT_TYPES = new Set<string>(["invoice", "purchase", "voucher"]);

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isAccountType(value: unknown): value is AccountType {
  return typeof value === "string" && ACCOUNT_TYPES.has(value);
}

export function isJournalStatus(value: unknown): value is JournalStatus {
  return typeof value === "string" && JOURNAL_STATUSES.has(value);
}

export function isDocumentType(value: unknown): value is DocumentType {
  return typeof value === "string" && DOCUMENT_TYPES.has(value);
}

/**
 * True for a "YYYY-MM-DD" string naming a real Gregorian day
 * ("2024-02-30" is rejected).
 */
export function isGregorianDate(value: unknown): value is GregorianDate {
  if (typeof value !== "string") return false;
  const match = ISO_DATE.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}
