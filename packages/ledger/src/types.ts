/**
 * @fiscus/ledger — Types for accounts, journal entries and ledger projection.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are finite, non-negative numbers
 * - Posted entries are never modified
 */

import type { FiscalPeriod } from "@fiscus/fiscal";
import type {
  AccountType,
  GregorianDate,
  JournalStatus,
  OperationOptions,
} from "@fiscus/types";

// ─── Accounts ────────────────────────────────────────────────────────────

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account types to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Revenue, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  revenue: "credit",
  equity: "credit",
} as const;

/** A chart-of-accounts entry. Codes are unique per tenant. */
export interface Account {
  readonly id: string;
  readonly tenantId: string;
  /** e.g. "1001" */
  readonly code: string;
  /** e.g. "Cash on Hand" */
  readonly name: string;
  readonly type: AccountType;
  readonly parentId?: string | undefined;
  readonly active: boolean;
  readonly description?: string | undefined;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface NewAccountInput {
  readonly code: string;
  readonly name: string;
  readonly type: AccountType;
  readonly parentId?: string | undefined;
  readonly description?: string | undefined;
}

/** Fields left undefined are unchanged. */
export interface AccountUpdate {
  readonly code?: string | undefined;
  readonly name?: string | undefined;
  readonly type?: AccountType | undefined;
  readonly parentId?: string | undefined;
  readonly description?: string | undefined;
  readonly active?: boolean | undefined;
}

// ─── Journal Entries ─────────────────────────────────────────────────────

/** The business document an entry was raised for. */
export interface JournalReference {
  readonly id: string;
  /** e.g. "invoice", "payment", "manual" */
  readonly type: string;
}

export interface JournalLine {
  readonly id: string;
  readonly entryId: string;
  readonly accountId: string;
  readonly debit: number;
  readonly credit: number;
  readonly description?: string | undefined;
}

export interface JournalEntry {
  readonly id: string;
  readonly tenantId: string;
  readonly periodId: string;
  readonly transactionDate: GregorianDate;
  readonly description: string;
  readonly status: JournalStatus;
  readonly reference?: JournalReference | undefined;
  readonly createdBy?: string | undefined;
  readonly postedAt?: string | undefined;
  readonly postedBy?: string | undefined;
  readonly createdAt: string;
  readonly lines: readonly JournalLine[];
}

export interface JournalLineInput {
  readonly accountId: string;
  /** Defaults to 0. */
  readonly debit?: number | undefined;
  /** Defaults to 0. */
  readonly credit?: number | undefined;
  readonly description?: string | undefined;
}

export interface NewJournalEntryInput {
  readonly periodId: string;
  readonly transactionDate: GregorianDate;
  readonly description: string;
  readonly lines: readonly JournalLineInput[];
  readonly reference?: JournalReference | undefined;
  readonly createdBy?: string | undefined;
}

export interface PostedState {
  readonly postedAt: string;
  readonly postedBy: string;
}

export interface JournalFilter {
  readonly periodId?: string | undefined;
  readonly status?: JournalStatus | undefined;
}

// ─── Ledger Projection ───────────────────────────────────────────────────

/**
 * Sign of the running balance.
 *
 * - debit  — Σ(debit − credit) for every account
 * - normal — Σ(debit − credit) for debit-normal accounts,
 *            Σ(credit − debit) for credit-normal accounts
 */
export type BalanceOrientation = "debit" | "normal";

export interface ProjectionOptions extends OperationOptions {
  readonly orientation?: BalanceOrientation | undefined;
}

/** One posted line with its entry header, as returned by the journal store. */
export interface PostedLine {
  readonly entry: JournalEntry;
  readonly line: JournalLine;
}

/** One row of an account's ledger with the running balance after it. */
export interface LedgerEntry {
  readonly lineId: string;
  readonly entryId: string;
  readonly accountId: string;
  readonly transactionDate: GregorianDate;
  readonly description: string;
  readonly lineDescription?: string | undefined;
  readonly debit: number;
  readonly credit: number;
  readonly runningBalance: number;
}

// ─── Store Results ───────────────────────────────────────────────────────

export type JournalWrite =
  | { readonly status: "ok"; readonly entry: JournalEntry }
  | { readonly status: "not_found" }
  | { readonly status: "rejected"; readonly entry: JournalEntry };

// ─── Persistence Contracts ───────────────────────────────────────────────

export interface AccountStore {
  /** Throws ConflictError on a duplicate ID or a duplicate code within the tenant. */
  insert(account: Account, options?: OperationOptions): Promise<void>;

  findById(id: string, options?: OperationOptions): Promise<Account | undefined>;

  findByCode(
    tenantId: string,
    code: string,
    options?: OperationOptions,
  ): Promise<Account | undefined>;

  /** All accounts for a tenant, ordered by code. */
  listByTenant(tenantId: string, options?: OperationOptions): Promise<readonly Account[]>;

  /**
   * Replace an existing account. Returns undefined if it does not exist.
   * Throws ConflictError if the new code is taken within the tenant.
   */
  replace(account: Account, options?: OperationOptions): Promise<Account | undefined>;
}

export interface JournalStore {
  /** Write the header and every line in one step. Throws ConflictError on a duplicate ID. */
  insert(entry: JournalEntry, options?: OperationOptions): Promise<void>;

  findById(id: string, options?: OperationOptions): Promise<JournalEntry | undefined>;

  /** A tenant's entries, newest transaction date first, then newest created. */
  list(
    tenantId: string,
    filter?: JournalFilter,
    options?: OperationOptions,
  ): Promise<readonly JournalEntry[]>;

  /** draft → posted, only if the entry is still a draft. */
  markPosted(id: string, posted: PostedState, options?: OperationOptions): Promise<JournalWrite>;

  /**
   * Lines of posted entries for one account with transactionDate in
   * [from, to], ordered by (transactionDate, entry creation order).
   */
  listPostedLines(
    accountId: string,
    from: GregorianDate,
    to: GregorianDate,
    options?: OperationOptions,
  ): Promise<readonly PostedLine[]>;
}

/** The part of the period store the ledger reads. */
export interface PeriodReader {
  findById(id: string, options?: OperationOptions): Promise<FiscalPeriod | undefined>;
}
