/**
 * @fiscus/types — Shared domain types for the Fiscus stack.
 *
 * Used across all Fiscus packages:
 * - Domain error taxonomy (validation, conflict, state, not found)
 * - Calendar-agnostic primitives (dates, account types, statuses)
 * - Operation options (cancellation)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Domain primitives
export type {
  GregorianDate,
  AccountType,
  JournalStatus,
  DocumentType,
  OperationOptions,
} from "./domain.js";

// Errors
export {
  DomainError,
  ValidationError,
  ConflictError,
  StateError,
  NotFoundError,
} from "./errors.js";
export type {
  DomainErrorKind,
  DomainErrorCode,
  ValidationErrorCode,
  ConflictErrorCode,
  StateErrorCode,
  NotFoundErrorCode,
} from "./errors.js";

// Runtime type guards
export {
  isAccountType,
  isJournalStatus,
  isDocumentType,
  isGregorianDate,
  isDomainError,
} from "./guards.js";
