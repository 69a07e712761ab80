/**
 * @fiscus/fiscal — Types for fiscal periods and their persistence contract.
 *
 * Rules:
 * - All types are readonly
 * - Counters and the current flag change only through PeriodStore's
 *   conditional writes, never by field assignment
 */

import type { DocumentType, GregorianDate, OperationOptions } from "@fiscus/types";

// ─── Fiscal Period ───────────────────────────────────────────────────────

/**
 * A named accounting window with dual-calendar boundaries, lifecycle
 * state and three independent document counters.
 */
export interface FiscalPeriod {
  readonly id: string;
  readonly tenantId: string;
  /** e.g. "2082/83" */
  readonly name: string;
  readonly startDate: GregorianDate;
  readonly endDate: GregorianDate;
  /** Secondary calendar display string, e.g. "2082-04-01" */
  readonly startDateSecondary: string;
  /** Secondary calendar display string, e.g. "2083-03-32" */
  readonly endDateSecondary: string;
  readonly isCurrent: boolean;
  readonly isClosed: boolean;
  readonly closedAt?: string | undefined;
  readonly closedBy?: string | undefined;
  /** e.g. "INV-8283-" */
  readonly invoicePrefix: string;
  readonly purchasePrefix: string;
  readonly voucherPrefix: string;
  readonly lastInvoiceNum: number;
  readonly lastPurchaseNum: number;
  readonly lastVoucherNum: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Who closed a period, and when. */
export interface ClosedState {
  readonly closedAt: string;
  readonly closedBy: string;
}

// ─── Store Results ───────────────────────────────────────────────────────

/**
 * Outcome of a conditional write.
 *
 * - ok        — the write was applied
 * - not_found — no period with that ID (in that tenant)
 * - rejected  — the period's state did not satisfy the write's condition;
 *               `period` is the state that caused the rejection
 */
export type PeriodWrite =
  | { readonly status: "ok"; readonly period: FiscalPeriod }
  | { readonly status: "not_found" }
  | { readonly status: "rejected"; readonly period: FiscalPeriod };

/**
 * Outcome of an increment-and-return. Closed periods are rejected.
 */
export type CounterWrite =
  | { readonly status: "ok"; readonly value: number; readonly period: FiscalPeriod }
  | { readonly status: "not_found" }
  | { readonly status: "rejected"; readonly period: FiscalPeriod };

export interface IncrementOptions extends OperationOptions {
  /**
   * Retry key. A second call with the same key returns the value issued
   * by the first call instead of incrementing again.
   */
  readonly idempotencyKey?: string | undefined;
}

// ─── Persistence Contract ────────────────────────────────────────────────

/**
 * Storage for fiscal periods.
 *
 * Every mutating method is a single atomic step with respect to other
 * calls on the same store.
 */
export interface PeriodStore {
  /** Throws ConflictError on a duplicate ID or a duplicate name within the tenant. */
  insert(period: FiscalPeriod, options?: OperationOptions): Promise<void>;

  findById(id: string, options?: OperationOptions): Promise<FiscalPeriod | undefined>;

  /** All periods for a tenant, ordered by start date. */
  listByTenant(tenantId: string, options?: OperationOptions): Promise<readonly FiscalPeriod[]>;

  findCurrent(tenantId: string, options?: OperationOptions): Promise<FiscalPeriod | undefined>;

  /** Clear the tenant's current flag everywhere and set it on `periodId`, in one step. */
  setCurrent(tenantId: string, periodId: string, options?: OperationOptions): Promise<PeriodWrite>;

  /**
   * Close (state given, requires open) or reopen (null, requires closed).
   */
  setClosed(
    periodId: string,
    closed: ClosedState | null,
    options?: OperationOptions,
  ): Promise<PeriodWrite>;

  /** Delete unless the period is current or closed. */
  remove(periodId: string, options?: OperationOptions): Promise<PeriodWrite>;

  /** Increment one counter and return the new value, unless the period is closed. */
  incrementCounter(
    periodId: string,
    documentType: DocumentType,
    options?: IncrementOptions,
  ): Promise<CounterWrite>;
}
