/**
 * @fiscus/fiscal — PeriodService.
 *
 * Lifecycle and document numbering for fiscal periods.
 *
 * Rules:
 * - Every state change is one conditional store write (no read-then-write)
 * - Document numbers come from the store's gated increment-and-return;
 *   a closed period never issues a number
 * - Only TransientStoreError is retried, with the same idempotency key,
 *   so a retry never skips or repeats a number
 * - Domain errors are thrown before anything is written
 */

import { randomUUID } from "node:crypto";
import type { CalendarConverter } from "@fiscus/calendar";
import { formatSecondaryDate } from "@fiscus/calendar";
import type { DocumentType, GregorianDate, OperationOptions } from "@fiscus/types";
import {
  NotFoundError,
  StateError,
  ValidationError,
  isGregorianDate,
} from "@fiscus/types";
import { containsDate, formatDocumentNumber, newFiscalPeriod, prefixFor } from "./period.js";
import { TransientStoreError } from "./store.js";
import type { CounterWrite, FiscalPeriod, PeriodStore } from "./types.js";

export const DEFAULT_RETRY_ATTEMPTS = 3;

export interface PeriodServiceDeps {
  readonly store: PeriodStore;
  readonly calendar: CalendarConverter;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
  /** Total attempts for a counter increment, including the first. */
  readonly retryAttempts?: number | undefined;
}

export class PeriodService {
  private readonly _store: PeriodStore;
  private readonly _calendar: CalendarConverter;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _retryAttempts: number;

  constructor(deps: PeriodServiceDeps) {
    this._store = deps.store;
    this._calendar = deps.calendar;
    this._clock = deps.clock ?? (() => new Date());
    this._generateId = deps.generateId ?? randomUUID;
    this._retryAttempts = Math.max(1, deps.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS);
  }

  // ─── Creation ───────────────────────────────────────────────────────

  /**
   * Create a period with explicit Gregorian bounds.
   * The secondary-calendar display strings are derived from the bounds.
   */
  async create(
    tenantId: string,
    name: string,
    startDate: GregorianDate,
    endDate: GregorianDate,
    options?: OperationOptions,
  ): Promise<FiscalPeriod> {
    if (name.trim() === "") {
      throw new ValidationError("INVALID_PERIOD_NAME", "Period name must not be empty");
    }

    const startDateSecondary = this._calendar.formatAsSecondary(startDate);
    const endDateSecondary = this._calendar.formatAsSecondary(endDate);

    if (startDate >= endDate) {
      throw new ValidationError(
        "INVALID_PERIOD_RANGE",
        `Period start ${startDate} must be before end ${endDate}`,
      );
    }

    return this._insert(
      { tenantId, name, startDate, endDate, startDateSecondary, endDateSecondary },
      options,
    );
  }

  /**
   * Create a period from a "YYYY/YY" name.
   * Bounds run from { YYYY, 4, 1 } to the marker { YYYY+1, 3, 32 }.
   */
  async createFromName(
    tenantId: string,
    name: string,
    options?: OperationOptions,
  ): Promise<FiscalPeriod> {
    const bounds = this._calendar.periodBoundsFromName(name);

    return this._insert(
      {
        tenantId,
        name,
        startDate: bounds.startGregorian,
        endDate: bounds.endGregorian,
        startDateSecondary: formatSecondaryDate(bounds.startSecondary),
        endDateSecondary: formatSecondaryDate(bounds.endSecondary),
      },
      options,
    );
  }

  // ─── Queries ────────────────────────────────────────────────────────

  /** Throws NotFoundError if the period does not exist. */
  async get(periodId: string, options?: OperationOptions): Promise<FiscalPeriod> {
    const period = await this._store.findById(periodId, options);
    if (period === undefined) {
      throw periodNotFound(periodId);
    }
    return period;
  }

  async list(tenantId: string, options?: OperationOptions): Promise<readonly FiscalPeriod[]> {
    return this._store.listByTenant(tenantId, options);
  }

  async getCurrent(
    tenantId: string,
    options?: OperationOptions,
  ): Promise<FiscalPeriod | undefined> {
    return this._store.findCurrent(tenantId, options);
  }

  /** The tenant's period whose Gregorian bounds contain `date`, if any. */
  async findForDate(
    tenantId: string,
    date: GregorianDate,
    options?: OperationOptions,
  ): Promise<FiscalPeriod | undefined> {
    if (!isGregorianDate(date)) {
      throw new ValidationError("INVALID_DATE", `Invalid date: "${date}"`);
    }
    const periods = await this._store.listByTenant(tenantId, options);
    return periods.find((p) => containsDate(p, date));
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  async setAsCurrent(
    tenantId: string,
    periodId: string,
    options?: OperationOptions,
  ): Promise<FiscalPeriod> {
    const result = await this._store.setCurrent(tenantId, periodId, options);
    if (result.status !== "ok") {
      throw periodNotFound(periodId);
    }
    return result.period;
  }

  async close(
    periodId: string,
    actor: string,
    options?: OperationOptions,
  ): Promise<FiscalPeriod> {
    const result = await this._store.setClosed(
      periodId,
      { closedAt: this._clock().toISOString(), closedBy: actor },
      options,
    );

    switch (result.status) {
      case "ok":
        return result.period;
      case "not_found":
        throw periodNotFound(periodId);
      case "rejected":
        throw new StateError(
          "PERIOD_ALREADY_CLOSED",
          `Period "${result.period.name}" is already closed`,
        );
    }
  }

  async reopen(periodId: string, options?: OperationOptions): Promise<FiscalPeriod> {
    const result = await this._store.setClosed(periodId, null, options);

    switch (result.status) {
      case "ok":
        return result.period;
      case "not_found":
        throw periodNotFound(periodId);
      case "rejected":
        throw new StateError(
          "PERIOD_NOT_CLOSED",
          `Period "${result.period.name}" is not closed`,
        );
    }
  }

  async delete(periodId: string, options?: OperationOptions): Promise<void> {
    const result = await this._store.remove(periodId, options);

    switch (result.status) {
      case "ok":
        return;
      case "not_found":
        throw periodNotFound(periodId);
      case "rejected":
        if (result.period.isClosed) {
          throw new StateError(
            "PERIOD_CLOSED",
            `Period "${result.period.name}" is closed and cannot be deleted`,
          );
        }
        throw new StateError(
          "PERIOD_IS_CURRENT",
          `Period "${result.period.name}" is the current period and cannot be deleted`,
        );
    }
  }

  // ─── Document Numbers ───────────────────────────────────────────────

  async generateInvoiceNumber(periodId: string, options?: OperationOptions): Promise<string> {
    return this.generateNumber(periodId, "invoice", options);
  }

  async generatePurchaseNumber(periodId: string, options?: OperationOptions): Promise<string> {
    return this.generateNumber(periodId, "purchase", options);
  }

  async generateVoucherNumber(periodId: string, options?: OperationOptions): Promise<string> {
    return this.generateNumber(periodId, "voucher", options);
  }

  /**
   * Issue the next number for a document type, e.g. "INV-8283-0001".
   * Throws StateError (PERIOD_CLOSED) if the period is closed.
   */
  async generateNumber(
    periodId: string,
    documentType: DocumentType,
    options?: OperationOptions,
  ): Promise<string> {
    const result = await this._incrementWithRetry(periodId, documentType, options);

    switch (result.status) {
      case "ok":
        return formatDocumentNumber(prefixFor(result.period, documentType), result.value);
      case "not_found":
        throw periodNotFound(periodId);
      case "rejected":
        throw new StateError(
          "PERIOD_CLOSED",
          `Period "${result.period.name}" is closed: cannot generate ${documentType} numbers`,
        );
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _incrementWithRetry(
    periodId: string,
    documentType: DocumentType,
    options: OperationOptions | undefined,
  ): Promise<CounterWrite> {
    const idempotencyKey = this._generateId();

    for (let attempt = 1; ; attempt++) {
      try {
        return await this._store.incrementCounter(periodId, documentType, {
          signal: options?.signal,
          idempotencyKey,
        });
      } catch (err) {
        if (!(err instanceof TransientStoreError) || attempt >= this._retryAttempts) {
          throw err;
        }
      }
    }
  }

  private async _insert(
    fields: {
      readonly tenantId: string;
      readonly name: string;
      readonly startDate: GregorianDate;
      readonly endDate: GregorianDate;
      readonly startDateSecondary: string;
      readonly endDateSecondary: string;
    },
    options: OperationOptions | undefined,
  ): Promise<FiscalPeriod> {
    const period = newFiscalPeriod({
      ...fields,
      id: this._generateId(),
      createdAt: this._clock().toISOString(),
    });
    await this._store.insert(period, options);
    return period;
  }
}

function periodNotFound(periodId: string): NotFoundError {
  return new NotFoundError("PERIOD_NOT_FOUND", `Period not found: "${periodId}"`);
}
