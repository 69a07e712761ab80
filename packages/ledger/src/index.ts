/**
 * @fiscus/ledger — Double-entry journal and ledger projection.
 *
 * Enforces double-entry accounting invariants:
 * - Every entry has at least two lines
 * - Debits equal credits within 0.0001
 * - Entries are recorded only inside an open period
 * - Posting is one-way (draft → posted) and re-checks the period
 *
 * Design rules:
 * - All types are readonly
 * - Posted entries are never modified
 * - Fail-closed: invalid entries throw, never silently succeed
 */

// Services
export { AccountDirectory } from "./accounts.js";
export type { AccountDirectoryDeps } from "./accounts.js";
export { JournalService } from "./journal-service.js";
export type { JournalServiceDeps } from "./journal-service.js";
export { LedgerProjector } from "./ledger-projector.js";
export type { LedgerProjectorDeps } from "./ledger-projector.js";

// Stores
export { InMemoryAccountStore } from "./account-store.js";
export { InMemoryJournalStore } from "./journal-store.js";

// Amount arithmetic
export {
  BALANCE_TOLERANCE,
  AMOUNT_DECIMALS,
  MIN_LINES,
  roundAmount,
  isValidAmount,
  assertValidAmount,
  sumAmounts,
  isBalanced,
  assertDoubleEntry,
} from "./amounts.js";
export type { EntryTotals } from "./amounts.js";

// Types
export type {
  NormalBalance,
  Account,
  NewAccountInput,
  AccountUpdate,
  JournalReference,
  JournalLine,
  JournalEntry,
  JournalLineInput,
  NewJournalEntryInput,
  PostedState,
  JournalFilter,
  BalanceOrientation,
  ProjectionOptions,
  PostedLine,
  LedgerEntry,
  JournalWrite,
  AccountStore,
  JournalStore,
  PeriodReader,
} from "./types.js";

export { NORMAL_BALANCE } from "./types.js";
