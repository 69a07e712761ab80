/**
 * @fiscus/fiscal — In-memory PeriodStore.
 *
 * Keeps periods in a Map keyed by ID. Every mutating method checks its
 * condition and writes in the same synchronous step, so no other call
 * on the store can observe or interleave with a half-applied write.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Single-process deployments without durability needs
 */

import type { DocumentType, OperationOptions } from "@fiscus/types";
import { ConflictError } from "@fiscus/types";
import { counterFor, withCounter } from "./period.js";
import type {
  ClosedState,
  CounterWrite,
  FiscalPeriod,
  IncrementOptions,
  PeriodStore,
  PeriodWrite,
} from "./types.js";

/**
 * A storage failure that may succeed when retried (lost connection,
 * timeout, serialization failure). Domain errors are never transient.
 */
export class TransientStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransientStoreError";
  }
}

/** Idempotency keys remembered per period; the oldest is forgotten first. */
export const DEFAULT_RETAINED_KEYS = 256;

export class InMemoryPeriodStore implements PeriodStore {
  private readonly _periods = new Map<string, FiscalPeriod>();

  /** period ID → ("documentType:key" → counter value issued under it) */
  private readonly _issued = new Map<string, Map<string, number>>();

  private readonly _clock: () => Date;
  private readonly _retainedKeys: number;

  constructor(
    clock: () => Date = () => new Date(),
    retainedKeys: number = DEFAULT_RETAINED_KEYS,
  ) {
    if (!Number.isInteger(retainedKeys) || retainedKeys < 1) {
      throw new RangeError(`retainedKeys must be a positive integer, got ${String(retainedKeys)}`);
    }
    this._clock = clock;
    this._retainedKeys = retainedKeys;
  }

  /** Number of idempotency keys currently remembered for a period. */
  retainedKeyCount(periodId: string): number {
    return this._issued.get(periodId)?.size ?? 0;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  async findById(id: string, options?: OperationOptions): Promise<FiscalPeriod | undefined> {
    options?.signal?.throwIfAborted();
    return this._periods.get(id);
  }

  async listByTenant(
    tenantId: string,
    options?: OperationOptions,
  ): Promise<readonly FiscalPeriod[]> {
    options?.signal?.throwIfAborted();
    return [...this._periods.values()]
      .filter((p) => p.tenantId === tenantId)
      .sort((a, b) => a.startDate.localeCompare(b.startDate) || a.name.localeCompare(b.name));
  }

  async findCurrent(
    tenantId: string,
    options?: OperationOptions,
  ): Promise<FiscalPeriod | undefined> {
    options?.signal?.throwIfAborted();
    for (const period of this._periods.values()) {
      if (period.tenantId === tenantId && period.isCurrent) {
        return period;
      }
    }
    return undefined;
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  async insert(period: FiscalPeriod, options?: OperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();

    if (this._periods.has(period.id)) {
      throw new ConflictError("DUPLICATE_ID", `Period already exists: "${period.id}"`);
    }
    for (const existing of this._periods.values()) {
      if (existing.tenantId === period.tenantId && existing.name === period.name) {
        throw new ConflictError(
          "DUPLICATE_PERIOD_NAME",
          `Period "${period.name}" already exists for this tenant`,
        );
      }
    }

    this._periods.set(period.id, { ...period });
  }

  async setCurrent(
    tenantId: string,
    periodId: string,
    options?: OperationOptions,
  ): Promise<PeriodWrite> {
    options?.signal?.throwIfAborted();

    const target = this._periods.get(periodId);
    if (target === undefined || target.tenantId !== tenantId) {
      return { status: "not_found" };
    }

    const updatedAt = this._now();
    for (const period of this._periods.values()) {
      if (period.tenantId === tenantId && period.isCurrent && period.id !== periodId) {
        this._periods.set(period.id, { ...period, isCurrent: false, updatedAt });
      }
    }

    const updated: FiscalPeriod = { ...target, isCurrent: true, updatedAt };
    this._periods.set(periodId, updated);
    return { status: "ok", period: updated };
  }

  async setClosed(
    periodId: string,
    closed: ClosedState | null,
    options?: OperationOptions,
  ): Promise<PeriodWrite> {
    options?.signal?.throwIfAborted();

    const current = this._periods.get(periodId);
    if (current === undefined) {
      return { status: "not_found" };
    }

    const closing = closed !== null;
    if (current.isClosed === closing) {
      return { status: "rejected", period: current };
    }

    const updated: FiscalPeriod = closing
      ? {
          ...current,
          isClosed: true,
          closedAt: closed.closedAt,
          closedBy: closed.closedBy,
          updatedAt: this._now(),
        }
      : {
          ...current,
          isClosed: false,
          closedAt: undefined,
          closedBy: undefined,
          updatedAt: this._now(),
        };

    this._periods.set(periodId, updated);
    return { status: "ok", period: updated };
  }

  async remove(periodId: string, options?: OperationOptions): Promise<PeriodWrite> {
    options?.signal?.throwIfAborted();

    const current = this._periods.get(periodId);
    if (current === undefined) {
      return { status: "not_found" };
    }
    if (current.isCurrent || current.isClosed) {
      return { status: "rejected", period: current };
    }

    this._periods.delete(periodId);
    this._issued.delete(periodId);
    return { status: "ok", period: current };
  }

  async incrementCounter(
    periodId: string,
    documentType: DocumentType,
    options?: IncrementOptions,
  ): Promise<CounterWrite> {
    options?.signal?.throwIfAborted();

    const current = this._periods.get(periodId);
    if (current === undefined) {
      return { status: "not_found" };
    }

    const key = options?.idempotencyKey;
    if (key !== undefined) {
      const issued = this._issued.get(periodId)?.get(`${documentType}:${key}`);
      if (issued !== undefined) {
        return { status: "ok", value: issued, period: current };
      }
    }

    if (current.isClosed) {
      return { status: "rejected", period: current };
    }

    const value = counterFor(current, documentType) + 1;
    const updated = withCounter(current, documentType, value, this._now());
    this._periods.set(periodId, updated);

    if (key !== undefined) {
      this._remember(periodId, `${documentType}:${key}`, value);
    }

    return { status: "ok", value, period: updated };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _remember(periodId: string, key: string, value: number): void {
    let keys = this._issued.get(periodId);
    if (keys === undefined) {
      keys = new Map();
      this._issued.set(periodId, keys);
    }
    keys.set(key, value);

    // Maps iterate in insertion order, so the first key is the oldest.
    for (const oldest of keys.keys()) {
      if (keys.size <= this._retainedKeys) {
        break;
      }
      keys.delete(oldest);
    }
  }

  private _now(): string {
    return this._clock().toISOString();
  }
}
