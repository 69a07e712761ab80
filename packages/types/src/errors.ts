/**
 * Domain error taxonomy.
 *
 * Every business-rule violation in Fiscus is thrown as one of four kinds:
 * - ValidationError — malformed input, broken invariant, out-of-range date
 * - ConflictError   — duplicate key, double-posting
 * - StateError      — operation forbidden by lifecycle state
 * - NotFoundError   — referenced period, entry or account is missing
 *
 * Rules:
 * - Always thrown, never returned as codes
 * - Thrown before any persistence write on the failing path
 * - Never retried: these are not transient failures
 */

// =============================================================================
// Kinds & Codes
// =============================================================================

export type DomainErrorKind = "validation" | "conflict" | "state" | "not_found";

export type ValidationErrorCode =
  | "INVALID_DATE"
  | "UNSUPPORTED_CALENDAR_YEAR"
  | "INVALID_PERIOD_NAME"
  | "INVALID_PERIOD_RANGE"
  | "DATE_OUTSIDE_PERIOD"
  | "PERIOD_CLOSED"
  | "TOO_FEW_LINES"
  | "INVALID_AMOUNT"
  | "UNBALANCED_ENTRY"
  | "INVALID_ACCOUNT"
  | "INVALID_RANGE"
  | "VALIDATION_ERROR";

export type ConflictErrorCode =
  | "DUPLICATE_ACCOUNT_CODE"
  | "DUPLICATE_PERIOD_NAME"
  | "DUPLICATE_ID"
  | "ALREADY_POSTED";

export type StateErrorCode =
  | "PERIOD_CLOSED"
  | "PERIOD_ALREADY_CLOSED"
  | "PERIOD_NOT_CLOSED"
  | "PERIOD_IS_CURRENT";

export type NotFoundErrorCode =
  | "PERIOD_NOT_FOUND"
  | "ENTRY_NOT_FOUND"
  | "ACCOUNT_NOT_FOUND";

export type DomainErrorCode =
  | ValidationErrorCode
  | ConflictErrorCode
  | StateErrorCode
  | NotFoundErrorCode;

// =============================================================================
// Errors
// =============================================================================

/**
 * Base class for all domain errors. Carries its kind, a stable code and an
 * optional structured payload for API consumers.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;
  public readonly code: DomainErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: DomainErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends DomainError {
  readonly kind = "validation" as const;

  constructor(
    code: ValidationErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(code, message, details);
    this.name = "ValidationError";
  }
}

export class ConflictError extends DomainError {
  readonly kind = "conflict" as const;

  constructor(code: ConflictErrorCode, message: string) {
    super(code, message);
    this.name = "ConflictError";
  }
}

export class StateError extends DomainError {
  readonly kind = "state" as const;

  constructor(code: StateErrorCode, message: string) {
    super(code, message);
    this.name = "StateError";
  }
}

export class NotFoundError extends DomainError {
  readonly kind = "not_found" as const;

  constructor(code: NotFoundErrorCode, message: string) {
    super(code, message);
    this.name = "NotFoundError";
  }
}
