/**
 * @fiscus/ledger — In-memory JournalStore.
 *
 * Entries are stored whole (header and lines together), so an insert
 * is all-or-nothing. Each entry gets an insertion sequence number that
 * stands in for creation order when dates tie.
 *
 * Properties:
 * - O(1) insert and lookup by ID
 * - O(n) list and posted-line scans (n = stored entries)
 * - No durability guarantees
 */

import type { GregorianDate, OperationOptions } from "@fiscus/types";
import { ConflictError } from "@fiscus/types";
import type {
  JournalEntry,
  JournalFilter,
  JournalStore,
  JournalWrite,
  PostedLine,
  PostedState,
} from "./types.js";

interface StoredEntry {
  readonly entry: JournalEntry;
  readonly sequence: number;
}

export class InMemoryJournalStore implements JournalStore {
  private readonly _entries = new Map<string, StoredEntry>();

  /** Next creation-order sequence to assign */
  private _nextSequence = 1;

  async insert(entry: JournalEntry, options?: OperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();

    if (this._entries.has(entry.id)) {
      throw new ConflictError("DUPLICATE_ID", `Journal entry already exists: "${entry.id}"`);
    }

    this._entries.set(entry.id, {
      entry: { ...entry, lines: entry.lines.map((l) => ({ ...l })) },
      sequence: this._nextSequence++,
    });
  }

  async findById(id: string, options?: OperationOptions): Promise<JournalEntry | undefined> {
    options?.signal?.throwIfAborted();
    return this._entries.get(id)?.entry;
  }

  async list(
    tenantId: string,
    filter?: JournalFilter,
    options?: OperationOptions,
  ): Promise<readonly JournalEntry[]> {
    options?.signal?.throwIfAborted();

    return [...this._entries.values()]
      .filter(({ entry }) => {
        if (entry.tenantId !== tenantId) return false;
        if (filter?.periodId !== undefined && entry.periodId !== filter.periodId) return false;
        if (filter?.status !== undefined && entry.status !== filter.status) return false;
        return true;
      })
      .sort(
        (a, b) =>
          b.entry.transactionDate.localeCompare(a.entry.transactionDate) ||
          b.sequence - a.sequence,
      )
      .map(({ entry }) => entry);
  }

  async markPosted(
    id: string,
    posted: PostedState,
    options?: OperationOptions,
  ): Promise<JournalWrite> {
    options?.signal?.throwIfAborted();

    const stored = this._entries.get(id);
    if (stored === undefined) {
      return { status: "not_found" };
    }
    if (stored.entry.status !== "draft") {
      return { status: "rejected", entry: stored.entry };
    }

    const entry: JournalEntry = {
      ...stored.entry,
      status: "posted",
      postedAt: posted.postedAt,
      postedBy: posted.postedBy,
    };
    this._entries.set(id, { entry, sequence: stored.sequence });
    return { status: "ok", entry };
  }

  async listPostedLines(
    accountId: string,
    from: GregorianDate,
    to: GregorianDate,
    options?: OperationOptions,
  ): Promise<readonly PostedLine[]> {
    options?.signal?.throwIfAborted();

    const matching = [...this._entries.values()]
      .filter(
        ({ entry }) =>
          entry.status === "posted" &&
          entry.transactionDate >= from &&
          entry.transactionDate <= to,
      )
      .sort(
        (a, b) =>
          a.entry.transactionDate.localeCompare(b.entry.transactionDate) ||
          a.sequence - b.sequence,
      );

    const result: PostedLine[] = [];
    for (const { entry } of matching) {
      for (const line of entry.lines) {
        if (line.accountId === accountId) {
          result.push({ entry, line });
        }
      }
    }
    return result;
  }
}
