/**
 * @socai/ledger - Persistence ports.
 *
 * Interfaces the caller layer implements. Nothing in this package
 * imports an implementation.
 *
 * `save(entity, expectedVersion)` must reject with a LedgerError of
 * code CONCURRENCY_CONFLICT when the stored version differs from
 * `expectedVersion`. Omitting `expectedVersion` saves unconditionally.
 */

import type { AccountType, VoucherType } from "@socai/types";
import type { Account, AccountingVoucher, JournalEntry } from "./types.js";

export interface AccountRepository {
  getByCode(code: string): Promise<Account | undefined>;
  save(account: Account, expectedVersion?: number): Promise<Account>;
  /** See `matchesAccountPattern` for the pattern notation. */
  getByPattern(pattern: string): Promise<readonly Account[]>;
  listByType(accountType: AccountType): Promise<readonly Account[]>;
  list(): Promise<readonly Account[]>;
}

export interface JournalEntryRepository {
  save(entry: JournalEntry, expectedVersion?: number): Promise<JournalEntry>;
  getById(id: string): Promise<JournalEntry | undefined>;
  getByVoucher(voucherId: string): Promise<readonly JournalEntry[]>;
  /** Entries whose posting date falls in [from, to], both inclusive. */
  getByPeriod(from: string, to: string): Promise<readonly JournalEntry[]>;
  /** Entries with at least one line on `accountCode`. */
  getByAccount(accountCode: string): Promise<readonly JournalEntry[]>;
}

export interface VoucherFilter {
  readonly from?: string | undefined;
  readonly to?: string | undefined;
  readonly voucherType?: VoucherType | undefined;
}

export interface VoucherRepository {
  save(voucher: AccountingVoucher, expectedVersion?: number): Promise<AccountingVoucher>;
  getById(id: string): Promise<AccountingVoucher | undefined>;
  list(filter?: VoucherFilter): Promise<readonly AccountingVoucher[]>;
  /** Vouchers dated `date` (YYYY-MM-DD), used for numbering. */
  countByDate(date: string): Promise<number>;
}
