/**
 * FiscusService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never construct stores
 * or services themselves. One instance serves every tenant: isolation is
 * by the tenantId carried on each record, and the ownership checks below
 * make another tenant's period or entry look missing.
 */

import { CalendarConverter } from "@fiscus/calendar";
import { InMemoryPeriodStore, PeriodService } from "@fiscus/fiscal";
import type { FiscalPeriod, PeriodStore } from "@fiscus/fiscal";
import {
  AccountDirectory,
  InMemoryAccountStore,
  InMemoryJournalStore,
  JournalService,
  LedgerProjector,
} from "@fiscus/ledger";
import type { AccountStore, JournalEntry, JournalStore } from "@fiscus/ledger";
import { NotFoundError } from "@fiscus/types";
import type { OperationOptions } from "@fiscus/types";

// =============================================================================
// Configuration
// =============================================================================

export interface FiscusServiceConfig {
  /** Total attempts for a document counter increment. */
  readonly retryAttempts?: number | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly calendar?: CalendarConverter | undefined;
  readonly periodStore?: PeriodStore | undefined;
  readonly accountStore?: AccountStore | undefined;
  readonly journalStore?: JournalStore | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class FiscusService {
  readonly calendar: CalendarConverter;
  readonly periods: PeriodService;
  readonly accounts: AccountDirectory;
  readonly journals: JournalService;
  readonly ledger: LedgerProjector;

  constructor(config: FiscusServiceConfig = {}) {
    const periodStore = config.periodStore ?? new InMemoryPeriodStore(config.clock);
    const accountStore = config.accountStore ?? new InMemoryAccountStore();
    const journalStore = config.journalStore ?? new InMemoryJournalStore();

    this.calendar = config.calendar ?? new CalendarConverter();
    this.periods = new PeriodService({
      store: periodStore,
      calendar: this.calendar,
      clock: config.clock,
      retryAttempts: config.retryAttempts,
    });
    this.accounts = new AccountDirectory({ store: accountStore, clock: config.clock });
    this.journals = new JournalService({
      periods: periodStore,
      accounts: accountStore,
      journals: journalStore,
      clock: config.clock,
    });
    this.ledger = new LedgerProjector({ accounts: accountStore, journals: journalStore });
  }

  // ─── Tenant Ownership ─────────────────────────────────────────────

  /** The tenant's period, or NotFoundError if missing or foreign. */
  async periodOf(
    tenantId: string,
    periodId: string,
    options?: OperationOptions,
  ): Promise<FiscalPeriod> {
    const period = await this.periods.get(periodId, options);
    if (period.tenantId !== tenantId) {
      throw new NotFoundError("PERIOD_NOT_FOUND", `Period not found: "${periodId}"`);
    }
    return period;
  }

  /** The tenant's journal entry, or NotFoundError if missing or foreign. */
  async entryOf(
    tenantId: string,
    entryId: string,
    options?: OperationOptions,
  ): Promise<JournalEntry> {
    const entry = await this.journals.get(entryId, options);
    if (entry.tenantId !== tenantId) {
      throw new NotFoundError("ENTRY_NOT_FOUND", `Journal entry not found: "${entryId}"`);
    }
    return entry;
  }
}
