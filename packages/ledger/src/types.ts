/**
 * @socai/ledger - Entity types for the accounting core.
 *
 * These extend the shared @socai/types with the structures the
 * core operates on: vouchers, journal entries, accounts and balances.
 *
 * Rules:
 * - All types are readonly
 * - Operations return new values, never mutate their inputs
 * - Fail-closed: invalid transitions throw, never silently succeed
 */

import type {
  AccountType,
  BalanceDirection,
  LockStatus,
  Money,
  VoucherType,
} from "@socai/types";

// ─── Exchange Rates ──────────────────────────────────────────────────────

/**
 * REALTIME - actual transaction-date rate.
 * AVERAGE - period average rate.
 */
export type ExchangeRateType = "REALTIME" | "AVERAGE";

/** A VND-per-unit rate for a foreign currency. */
export interface ExchangeRate {
  /** VND per one unit of `currency`, as a decimal string ("25400.50"). */
  readonly rate: string;
  readonly currency: string;
  readonly rateType: ExchangeRateType;
  readonly valuationDate?: string | undefined;
}

// ─── Journal Entries ─────────────────────────────────────────────────────

/**
 * One debit or credit line of a journal entry.
 * A line normally carries either a debit or a credit amount.
 */
export interface VoucherLineDetail {
  readonly accountCode: string;
  readonly description: string;
  readonly debitAmount?: Money | undefined;
  readonly creditAmount?: Money | undefined;
  readonly counterpartAccount?: string | undefined;
  readonly quantity?: string | undefined;
  readonly unitPrice?: Money | undefined;
  readonly exchangeRate?: ExchangeRate | undefined;
  readonly foreignAmount?: Money | undefined;
  readonly taxCode?: string | undefined;
  readonly taxRate?: string | undefined;
  readonly objectCode?: string | undefined;
  readonly contractCode?: string | undefined;
}

/**
 * A group of debit/credit lines recorded for one voucher.
 * Totals are absent until calculated.
 */
export interface JournalEntry {
  readonly id: string;
  readonly entryNumber: string;
  readonly voucherId: string;
  /** Accounting date of the voucher (YYYY-MM-DD). */
  readonly entryDate: string;
  readonly postingDate: string;
  readonly description: string;
  readonly descriptionDetail?: string | undefined;
  readonly createdBy: string;
  readonly createdAt: string;
  readonly lines: readonly VoucherLineDetail[];
  readonly totalDebit?: Money | undefined;
  readonly totalCredit?: Money | undefined;
  readonly difference?: Money | undefined;
  readonly isPosted: boolean;
  readonly postedAt?: string | undefined;
  readonly postedBy?: string | undefined;
  readonly isLocked: boolean;
  readonly lockStatus: LockStatus;
  readonly lockedAt?: string | undefined;
  /**
   * Optimistic concurrency version. Each transition (post, lock) bumps
   * it; repositories only compare it on save.
   */
  readonly version: number;
}

// ─── Vouchers ────────────────────────────────────────────────────────────

/** A source document (chứng từ kế toán). */
export interface AccountingVoucher {
  readonly id: string;
  readonly voucherNumber: string;
  readonly voucherType: VoucherType;
  readonly voucherDate: string;
  readonly postingDate?: string | undefined;
  readonly description: string;
  readonly descriptionDetail?: string | undefined;
  readonly documentRef?: string | undefined;
  readonly documentDate?: string | undefined;
  readonly companyCode: string;
  readonly branchCode?: string | undefined;
  readonly createdBy: string;
  readonly createdAt: string;
  readonly isSigned: boolean;
  readonly signedAt?: string | undefined;
  readonly signerId?: string | undefined;
  readonly signatureData?: string | undefined;
  readonly isLocked: boolean;
  readonly lockedAt?: string | undefined;
  readonly lockStatus: LockStatus;
  readonly journalEntryIds: readonly string[];
  readonly version: number;
}

// ─── Accounts ────────────────────────────────────────────────────────────

/** A chart-of-accounts entry with its running balance. */
export interface Account {
  readonly code: string;
  readonly name: string;
  readonly accountType: AccountType;
  readonly balanceDirection: BalanceDirection;
  readonly parentCode?: string | undefined;
  /** Only detail (leaf) accounts should carry postings. */
  readonly isDetail: boolean;
  readonly isActive: boolean;
  /** Positive on the account's balance direction, negative past zero. */
  readonly currentBalance: Money;
  readonly createdAt: string;
  readonly version: number;
}

export type BalancePeriodType = "MONTH" | "QUARTER" | "YEAR";

/** Opening, movement and closing balances of an account for one period. */
export interface AccountBalance {
  readonly accountCode: string;
  readonly periodType: BalancePeriodType;
  readonly periodValue: number;
  readonly year: number;
  readonly openingDebit?: Money | undefined;
  readonly openingCredit?: Money | undefined;
  readonly periodDebit?: Money | undefined;
  readonly periodCredit?: Money | undefined;
  readonly closingDebit?: Money | undefined;
  readonly closingCredit?: Money | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for core operations. */
export type LedgerErrorCode =
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "NOT_BALANCED"
  | "ALREADY_POSTED"
  | "ALREADY_SIGNED"
  | "CONCURRENCY_CONFLICT";

/**
 * Structured error from the accounting core.
 * Always thrown - never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}
