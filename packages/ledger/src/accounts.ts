/**
 * @fiscus/ledger — Account directory.
 *
 * Manages a tenant's chart of accounts on top of an AccountStore.
 *
 * Rules:
 * - Codes are unique per tenant
 * - Code and name must be non-empty
 * - A parent must exist in the same tenant
 * - The parent chain never leads back to the account
 * - Accounts are deactivated, never removed
 * - Lookups across tenants behave as if the account does not exist
 */

import { randomUUID } from "node:crypto";
import type { OperationOptions } from "@fiscus/types";
import { NotFoundError, ValidationError, isAccountType } from "@fiscus/types";
import type {
  Account,
  AccountStore,
  AccountUpdate,
  NewAccountInput,
  NormalBalance,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";

export interface AccountDirectoryDeps {
  readonly store: AccountStore;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

export class AccountDirectory {
  private readonly _store: AccountStore;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;

  constructor(deps: AccountDirectoryDeps) {
    this._store = deps.store;
    this._clock = deps.clock ?? (() => new Date());
    this._generateId = deps.generateId ?? randomUUID;
  }

  /**
   * Register a new active account.
   * Throws ConflictError if the code is already taken in the tenant.
   */
  async create(
    tenantId: string,
    input: NewAccountInput,
    options?: OperationOptions,
  ): Promise<Account> {
    const now = this._clock().toISOString();
    const account: Account = {
      id: this._generateId(),
      tenantId,
      code: input.code.trim(),
      name: input.name.trim(),
      type: input.type,
      parentId: input.parentId,
      active: true,
      description: input.description,
      createdAt: now,
      updatedAt: now,
    };

    await this._validate(account, options);
    await this._store.insert(account, options);
    return account;
  }

  /** Throws NotFoundError if missing or owned by another tenant. */
  async get(tenantId: string, id: string, options?: OperationOptions): Promise<Account> {
    const account = await this._store.findById(id, options);
    if (account === undefined || account.tenantId !== tenantId) {
      throw accountNotFound(id);
    }
    return account;
  }

  async getByCode(tenantId: string, code: string, options?: OperationOptions): Promise<Account> {
    const account = await this._store.findByCode(tenantId, code, options);
    if (account === undefined) {
      throw new NotFoundError("ACCOUNT_NOT_FOUND", `No account with code "${code}"`);
    }
    return account;
  }

  async list(tenantId: string, options?: OperationOptions): Promise<readonly Account[]> {
    return this._store.listByTenant(tenantId, options);
  }

  /** Apply the defined fields of `patch`. */
  async update(
    tenantId: string,
    id: string,
    patch: AccountUpdate,
    options?: OperationOptions,
  ): Promise<Account> {
    const current = await this.get(tenantId, id, options);
    const next: Account = {
      ...current,
      code: patch.code?.trim() ?? current.code,
      name: patch.name?.trim() ?? current.name,
      type: patch.type ?? current.type,
      parentId: patch.parentId ?? current.parentId,
      description: patch.description ?? current.description,
      active: patch.active ?? current.active,
      updatedAt: this._clock().toISOString(),
    };

    await this._validate(next, options);
    const stored = await this._store.replace(next, options);
    if (stored === undefined) {
      throw accountNotFound(id);
    }
    return stored;
  }

  async deactivate(tenantId: string, id: string, options?: OperationOptions): Promise<Account> {
    return this.update(tenantId, id, { active: false }, options);
  }

  normalBalanceOf(account: Account): NormalBalance {
    return NORMAL_BALANCE[account.type];
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _validate(account: Account, options: OperationOptions | undefined): Promise<void> {
    if (account.code === "") {
      throw new ValidationError("INVALID_ACCOUNT", "Account code is required");
    }
    if (account.name === "") {
      throw new ValidationError("INVALID_ACCOUNT", "Account name is required");
    }
    if (!isAccountType(account.type)) {
      throw new ValidationError("INVALID_ACCOUNT", `Invalid account type: "${String(account.type)}"`);
    }

    if (account.parentId !== undefined) {
      if (account.parentId === account.id) {
        throw new ValidationError("INVALID_ACCOUNT", "An account cannot be its own parent");
      }
      const parent = await this._store.findById(account.parentId, options);
      if (parent === undefined || parent.tenantId !== account.tenantId) {
        throw accountNotFound(account.parentId);
      }
      await this._assertNoCycle(account, parent, options);
    }
  }

  private async _assertNoCycle(
    account: Account,
    parent: Account,
    options: OperationOptions | undefined,
  ): Promise<void> {
    const seen = new Set<string>([parent.id]);
    let ancestorId = parent.parentId;

    while (ancestorId !== undefined && !seen.has(ancestorId)) {
      if (ancestorId === account.id) {
        throw new ValidationError(
          "INVALID_ACCOUNT",
          `Account "${account.code}" cannot be a descendant of itself`,
          { accountId: account.id, parentId: parent.id },
        );
      }
      seen.add(ancestorId);
      ancestorId = (await this._store.findById(ancestorId, options))?.parentId;
    }
  }
}

function accountNotFound(id: string): NotFoundError {
  return new NotFoundError("ACCOUNT_NOT_FOUND", `Account not found: "${id}"`);
}
