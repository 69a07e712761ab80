/**
 * @fiscus/ledger — LedgerProjector.
 *
 * Read-only running-balance view of one account over a date window.
 *
 * Rules:
 * - Only posted entries contribute
 * - Rows are ordered by (transactionDate, entry creation order)
 * - The balance starts at 0 for the window; there is no opening carry-in
 * - Each running balance is rounded to four decimal places
 */

import type { GregorianDate } from "@fiscus/types";
import { NotFoundError, ValidationError, isGregorianDate } from "@fiscus/types";
import { roundAmount } from "./amounts.js";
import type {
  AccountStore,
  JournalStore,
  LedgerEntry,
  ProjectionOptions,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";

export interface LedgerProjectorDeps {
  readonly accounts: AccountStore;
  readonly journals: JournalStore;
}

export class LedgerProjector {
  private readonly _accounts: AccountStore;
  private readonly _journals: JournalStore;

  constructor(deps: LedgerProjectorDeps) {
    this._accounts = deps.accounts;
    this._journals = deps.journals;
  }

  async project(
    tenantId: string,
    accountId: string,
    dateFrom: GregorianDate,
    dateTo: GregorianDate,
    options?: ProjectionOptions,
  ): Promise<readonly LedgerEntry[]> {
    for (const [label, value] of [
      ["dateFrom", dateFrom],
      ["dateTo", dateTo],
    ] as const) {
      if (!isGregorianDate(value)) {
        throw new ValidationError("INVALID_DATE", `Invalid ${label}: "${value}"`);
      }
    }
    if (dateFrom > dateTo) {
      throw new ValidationError(
        "INVALID_RANGE",
        `dateFrom ${dateFrom} is after dateTo ${dateTo}`,
      );
    }

    const account = await this._accounts.findById(accountId, options);
    if (account === undefined || account.tenantId !== tenantId) {
      throw new NotFoundError("ACCOUNT_NOT_FOUND", `Account not found: "${accountId}"`);
    }

    const sign =
      options?.orientation === "normal" && NORMAL_BALANCE[account.type] === "credit" ? -1 : 1;

    const rows = await this._journals.listPostedLines(accountId, dateFrom, dateTo, options);

    let balance = 0;
    return rows.map(({ entry, line }) => {
      balance += sign * (line.debit - line.credit);
      return {
        lineId: line.id,
        entryId: entry.id,
        accountId: line.accountId,
        transactionDate: entry.transactionDate,
        description: entry.description,
        lineDescription: line.description,
        debit: line.debit,
        credit: line.credit,
        runningBalance: roundAmount(balance),
      };
    });
  }
}
