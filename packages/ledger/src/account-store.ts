/**
 * @fiscus/ledger — In-memory AccountStore.
 *
 * Code uniqueness is checked and the write applied in the same
 * synchronous step.
 */

import type { OperationOptions } from "@fiscus/types";
import { ConflictError } from "@fiscus/types";
import type { Account, AccountStore } from "./types.js";

export class InMemoryAccountStore implements AccountStore {
  private readonly _accounts = new Map<string, Account>();

  async insert(account: Account, options?: OperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();

    if (this._accounts.has(account.id)) {
      throw new ConflictError("DUPLICATE_ID", `Account already exists: "${account.id}"`);
    }
    this._assertCodeFree(account);

    this._accounts.set(account.id, { ...account });
  }

  async findById(id: string, options?: OperationOptions): Promise<Account | undefined> {
    options?.signal?.throwIfAborted();
    return this._accounts.get(id);
  }

  async findByCode(
    tenantId: string,
    code: string,
    options?: OperationOptions,
  ): Promise<Account | undefined> {
    options?.signal?.throwIfAborted();
    for (const account of this._accounts.values()) {
      if (account.tenantId === tenantId && account.code === code) {
        return account;
      }
    }
    return undefined;
  }

  async listByTenant(tenantId: string, options?: OperationOptions): Promise<readonly Account[]> {
    options?.signal?.throwIfAborted();
    return [...this._accounts.values()]
      .filter((a) => a.tenantId === tenantId)
      .sort((a, b) => a.code.localeCompare(b.code));
  }

  async replace(account: Account, options?: OperationOptions): Promise<Account | undefined> {
    options?.signal?.throwIfAborted();

    if (!this._accounts.has(account.id)) {
      return undefined;
    }
    this._assertCodeFree(account);

    const stored = { ...account };
    this._accounts.set(account.id, stored);
    return stored;
  }

  private _assertCodeFree(account: Account): void {
    for (const existing of this._accounts.values()) {
      if (
        existing.id !== account.id &&
        existing.tenantId === account.tenantId &&
        existing.code === account.code
      ) {
        throw new ConflictError(
          "DUPLICATE_ACCOUNT_CODE",
          `Account code "${account.code}" already exists for this tenant`,
        );
      }
    }
  }
}
