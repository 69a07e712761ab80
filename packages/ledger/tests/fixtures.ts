/**
 * Shared wiring for ledger tests: in-memory stores, a fixed clock and a
 * period "2082/83" (2025-07-16 .. 2026-07-15) with a small chart of accounts.
 */

import { CalendarConverter } from "@fiscus/calendar";
import { InMemoryPeriodStore, PeriodService } from "@fiscus/fiscal";
import type { FiscalPeriod } from "@fiscus/fiscal";
import { AccountDirectory } from "../src/accounts.js";
import { InMemoryAccountStore } from "../src/account-store.js";
import { JournalService } from "../src/journal-service.js";
import { InMemoryJournalStore } from "../src/journal-store.js";
import { LedgerProjector } from "../src/ledger-projector.js";
import type { Account } from "../src/types.js";

export const NOW = "2025-08-01T00:00:00.000Z";
export const TENANT = "t1";
export const OTHER_TENANT = "t2";

export const clock = (): Date => new Date(NOW);

const calendar = new CalendarConverter();

export interface LedgerHarness {
  readonly periodStore: InMemoryPeriodStore;
  readonly periods: PeriodService;
  readonly accountStore: InMemoryAccountStore;
  readonly accounts: AccountDirectory;
  readonly journalStore: InMemoryJournalStore;
  readonly journals: JournalService;
  readonly projector: LedgerProjector;
}

export function createHarness(): LedgerHarness {
  const periodStore = new InMemoryPeriodStore(clock);
  const accountStore = new InMemoryAccountStore();
  const journalStore = new InMemoryJournalStore();

  return {
    periodStore,
    periods: new PeriodService({ store: periodStore, calendar, clock }),
    accountStore,
    accounts: new AccountDirectory({ store: accountStore, clock }),
    journalStore,
    journals: new JournalService({
      periods: periodStore,
      accounts: accountStore,
      journals: journalStore,
      clock,
    }),
    projector: new LedgerProjector({ accounts: accountStore, journals: journalStore }),
  };
}

export interface Books {
  readonly period: FiscalPeriod;
  readonly cash: Account;
  readonly revenue: Account;
  readonly rent: Account;
}

/** Open period 2082/83 plus cash (asset), sales (revenue) and rent (expense). */
export async function openBooks(harness: LedgerHarness): Promise<Books> {
  const period = await harness.periods.createFromName(TENANT, "2082/83");
  const cash = await harness.accounts.create(TENANT, {
    code: "1001",
    name: "Cash on Hand",
    type: "asset",
  });
  const revenue = await harness.accounts.create(TENANT, {
    code: "4001",
    name: "Sales Revenue",
    type: "revenue",
  });
  const rent = await harness.accounts.create(TENANT, {
    code: "5001",
    name: "Rent Expense",
    type: "expense",
  });
  return { period, cash, revenue, rent };
}
