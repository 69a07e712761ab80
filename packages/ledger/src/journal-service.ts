/**
 * @fiscus/ledger — JournalService.
 *
 * Records journal entries against fiscal periods and posts them.
 *
 * Rules:
 * - create checks, in order: period exists (and is the tenant's), period
 *   is open, date inside the period, every account exists, double-entry
 *   invariant; only then is anything written
 * - Header and lines are written in one store call
 * - draft → posted is the only transition; it re-reads the period and
 *   is a compare-and-set on status, so concurrent posts of one entry
 *   yield exactly one success
 */

import { randomUUID } from "node:crypto";
import { containsDate } from "@fiscus/fiscal";
import type { FiscalPeriod } from "@fiscus/fiscal";
import type { OperationOptions } from "@fiscus/types";
import {
  ConflictError,
  NotFoundError,
  StateError,
  ValidationError,
  isGregorianDate,
} from "@fiscus/types";
import { assertDoubleEntry } from "./amounts.js";
import type {
  AccountStore,
  JournalEntry,
  JournalFilter,
  JournalLine,
  JournalStore,
  NewJournalEntryInput,
  PeriodReader,
} from "./types.js";

export interface JournalServiceDeps {
  readonly periods: PeriodReader;
  readonly accounts: AccountStore;
  readonly journals: JournalStore;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

export class JournalService {
  private readonly _periods: PeriodReader;
  private readonly _accounts: AccountStore;
  private readonly _journals: JournalStore;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;

  constructor(deps: JournalServiceDeps) {
    this._periods = deps.periods;
    this._accounts = deps.accounts;
    this._journals = deps.journals;
    this._clock = deps.clock ?? (() => new Date());
    this._generateId = deps.generateId ?? randomUUID;
  }

  // ─── Create ─────────────────────────────────────────────────────────

  /** Validate and persist a new draft entry. */
  async create(
    tenantId: string,
    input: NewJournalEntryInput,
    options?: OperationOptions,
  ): Promise<JournalEntry> {
    const period = await this._periods.findById(input.periodId, options);
    if (period === undefined || period.tenantId !== tenantId) {
      throw periodNotFound(input.periodId);
    }

    if (period.isClosed) {
      throw new ValidationError(
        "PERIOD_CLOSED",
        `Cannot create a journal entry in closed period "${period.name}"`,
      );
    }

    if (!isGregorianDate(input.transactionDate)) {
      throw new ValidationError(
        "INVALID_DATE",
        `Invalid transaction date: "${input.transactionDate}"`,
      );
    }
    if (!containsDate(period, input.transactionDate)) {
      throw new ValidationError(
        "DATE_OUTSIDE_PERIOD",
        `Transaction date ${input.transactionDate} is outside period "${period.name}" (${period.startDate}..${period.endDate})`,
      );
    }

    await this._assertAccountsExist(
      tenantId,
      input.lines.map((l) => l.accountId),
      options,
    );

    const amounts = input.lines.map((l) => ({ debit: l.debit ?? 0, credit: l.credit ?? 0 }));
    assertDoubleEntry(amounts);

    const id = this._generateId();
    const lines: JournalLine[] = input.lines.map((l) => ({
      id: this._generateId(),
      entryId: id,
      accountId: l.accountId,
      debit: l.debit ?? 0,
      credit: l.credit ?? 0,
      description: l.description,
    }));

    const entry: JournalEntry = {
      id,
      tenantId,
      periodId: period.id,
      transactionDate: input.transactionDate,
      description: input.description,
      status: "draft",
      reference: input.reference,
      createdBy: input.createdBy,
      createdAt: this._clock().toISOString(),
      lines,
    };

    await this._journals.insert(entry, options);
    return entry;
  }

  // ─── Post ───────────────────────────────────────────────────────────

  /**
   * draft → posted.
   *
   * Throws NotFoundError if the entry is missing, ConflictError if it is
   * already posted (or another post wins the race), StateError if its
   * period has been closed since the entry was created.
   */
  async post(entryId: string, actor: string, options?: OperationOptions): Promise<JournalEntry> {
    const entry = await this.get(entryId, options);
    if (entry.status === "posted") {
      throw alreadyPosted(entryId);
    }

    const period = await this._loadPeriod(entry.periodId, options);
    if (period.isClosed) {
      throw new StateError(
        "PERIOD_CLOSED",
        `Cannot post to closed period "${period.name}"`,
      );
    }

    const result = await this._journals.markPosted(
      entryId,
      { postedAt: this._clock().toISOString(), postedBy: actor },
      options,
    );

    switch (result.status) {
      case "ok":
        return result.entry;
      case "not_found":
        throw entryNotFound(entryId);
      case "rejected":
        throw alreadyPosted(entryId);
    }
  }

  // ─── Queries ────────────────────────────────────────────────────────

  async get(entryId: string, options?: OperationOptions): Promise<JournalEntry> {
    const entry = await this._journals.findById(entryId, options);
    if (entry === undefined) {
      throw entryNotFound(entryId);
    }
    return entry;
  }

  async list(
    tenantId: string,
    filter?: JournalFilter,
    options?: OperationOptions,
  ): Promise<readonly JournalEntry[]> {
    return this._journals.list(tenantId, filter, options);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _loadPeriod(
    periodId: string,
    options: OperationOptions | undefined,
  ): Promise<FiscalPeriod> {
    const period = await this._periods.findById(periodId, options);
    if (period === undefined) {
      throw periodNotFound(periodId);
    }
    return period;
  }

  private async _assertAccountsExist(
    tenantId: string,
    accountIds: readonly string[],
    options: OperationOptions | undefined,
  ): Promise<void> {
    for (const accountId of new Set(accountIds)) {
      const account = await this._accounts.findById(accountId, options);
      if (account === undefined || account.tenantId !== tenantId) {
        throw new NotFoundError("ACCOUNT_NOT_FOUND", `Account not found: "${accountId}"`);
      }
    }
  }
}

function periodNotFound(periodId: string): NotFoundError {
  return new NotFoundError("PERIOD_NOT_FOUND", `Period not found: "${periodId}"`);
}

function entryNotFound(entryId: string): NotFoundError {
  return new NotFoundError("ENTRY_NOT_FOUND", `Journal entry not found: "${entryId}"`);
}

function alreadyPosted(entryId: string): ConflictError {
  return new ConflictError("ALREADY_POSTED", `Journal entry "${entryId}" is already posted`);
}
