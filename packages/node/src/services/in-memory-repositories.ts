/**
 * In-memory implementations of the persistence ports.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Optimistic concurrency: `save(entity, expectedVersion)` compares
 * `expectedVersion` with the stored version (0 when nothing is stored)
 * and throws CONCURRENCY_CONFLICT on mismatch.
 */

import type { AccountType } from "@socai/types";
import { LedgerError, matchesAccountPattern } from "@socai/ledger";
import type {
  Account,
  AccountRepository,
  AccountingVoucher,
  JournalEntry,
  JournalEntryRepository,
  VoucherFilter,
  VoucherRepository,
} from "@socai/ledger";

function checkVersion(
  kind: string,
  id: string,
  stored: { readonly version: number } | undefined,
  expectedVersion: number | undefined,
): void {
  if (expectedVersion === undefined) {
    return;
  }
  const actual = stored?.version ?? 0;
  if (actual !== expectedVersion) {
    throw new LedgerError(
      "CONCURRENCY_CONFLICT",
      `${kind} "${id}" is at version ${String(actual)}, expected ${String(expectedVersion)}`,
      { id, expectedVersion, actualVersion: actual },
    );
  }
}

// ─── Accounts ────────────────────────────────────────────────────────────

export class InMemoryAccountRepository implements AccountRepository {
  private readonly _accounts = new Map<string, Account>();

  async getByCode(code: string): Promise<Account | undefined> {
    return this._accounts.get(code);
  }

  async save(account: Account, expectedVersion?: number): Promise<Account> {
    checkVersion("Account", account.code, this._accounts.get(account.code), expectedVersion);
    this._accounts.set(account.code, account);
    return account;
  }

  async getByPattern(pattern: string): Promise<readonly Account[]> {
    return this._sorted().filter((a) => matchesAccountPattern(a.code, pattern));
  }

  async listByType(accountType: AccountType): Promise<readonly Account[]> {
    return this._sorted().filter((a) => a.accountType === accountType);
  }

  async list(): Promise<readonly Account[]> {
    return this._sorted();
  }

  private _sorted(): Account[] {
    return [...this._accounts.values()].sort((a, b) =>
      a.code < b.code ? -1 : a.code > b.code ? 1 : 0,
    );
  }
}

// ─── Journal Entries ─────────────────────────────────────────────────────

export class InMemoryJournalEntryRepository implements JournalEntryRepository {
  private readonly _entries = new Map<string, JournalEntry>();

  async save(entry: JournalEntry, expectedVersion?: number): Promise<JournalEntry> {
    checkVersion("Journal entry", entry.id, this._entries.get(entry.id), expectedVersion);
    this._entries.set(entry.id, entry);
    return entry;
  }

  async getById(id: string): Promise<JournalEntry | undefined> {
    return this._entries.get(id);
  }

  async getByVoucher(voucherId: string): Promise<readonly JournalEntry[]> {
    return this._inOrder().filter((e) => e.voucherId === voucherId);
  }

  async getByPeriod(from: string, to: string): Promise<readonly JournalEntry[]> {
    return this._inOrder().filter((e) => e.postingDate >= from && e.postingDate <= to);
  }

  async getByAccount(accountCode: string): Promise<readonly JournalEntry[]> {
    return this._inOrder().filter((e) =>
      e.lines.some((line) => line.accountCode === accountCode),
    );
  }

  /** Insertion order, which is entry-number order within a day. */
  private _inOrder(): JournalEntry[] {
    return [...this._entries.values()];
  }
}

// ─── Vouchers ────────────────────────────────────────────────────────────

export class InMemoryVoucherRepository implements VoucherRepository {
  private readonly _vouchers = new Map<string, AccountingVoucher>();

  async save(voucher: AccountingVoucher, expectedVersion?: number): Promise<AccountingVoucher> {
    checkVersion("Voucher", voucher.id, this._vouchers.get(voucher.id), expectedVersion);
    this._vouchers.set(voucher.id, voucher);
    return voucher;
  }

  async getById(id: string): Promise<AccountingVoucher | undefined> {
    return this._vouchers.get(id);
  }

  /** Ordered by voucher date, then voucher number. */
  async list(filter?: VoucherFilter): Promise<readonly AccountingVoucher[]> {
    return [...this._vouchers.values()]
      .filter((v) => filter?.from === undefined || v.voucherDate >= filter.from)
      .filter((v) => filter?.to === undefined || v.voucherDate <= filter.to)
      .filter((v) => filter?.voucherType === undefined || v.voucherType === filter.voucherType)
      .sort((a, b) => {
        if (a.voucherDate !== b.voucherDate) return a.voucherDate < b.voucherDate ? -1 : 1;
        if (a.voucherNumber !== b.voucherNumber) return a.voucherNumber < b.voucherNumber ? -1 : 1;
        return 0;
      });
  }

  async countByDate(date: string): Promise<number> {
    let count = 0;
    for (const voucher of this._vouchers.values()) {
      if (voucher.voucherDate === date) count++;
    }
    return count;
  }
}
