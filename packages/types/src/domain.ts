/**
 * Shared domain primitives.
 *
 * Rules:
 * - All dates crossing package boundaries are strings
 * - Gregorian calendar dates are "YYYY-MM-DD", timestamps are ISO 8601
 * - Tenant and actor identities are opaque strings supplied by the caller
 */

/** A Gregorian calendar date in "YYYY-MM-DD" form. */
export type GregorianDate = string;

/** The five fundamental account types in double-entry accounting. */
export type AccountType = "asset" | "liability" | "equity" | "revenue" | "expense";

/** Journal entry lifecycle. One-directional: draft → posted. */
export type JournalStatus = "draft" | "posted";

/** Business documents numbered per fiscal period. */
export type DocumentType = "invoice" | "purchase" | "voucher";

/**
 * Options accepted by every service and store operation.
 *
 * An aborted signal rejects the call before anything is written.
 */
export interface OperationOptions {
  readonly signal?: AbortSignal | undefined;
}
