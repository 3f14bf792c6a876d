/**
 * Financial Types
 *
 * Core financial primitives for statutory double-entry bookkeeping
 * under Circular 99/2025/TT-BTC.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit VND)
 * - Negative amounts are legal (reversing entries, contra accounts)
 */

/**
 * Currency identifier. ISO 4217 code ("VND", "USD", "EUR").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic lives in @socai/ledger (bigint scaled by `decimals`).
 */
export interface Money {
  /** String representation of the amount (e.g., "10000000", "-250.75") */
  readonly amount: string;

  /** Currency code (e.g., "VND", "USD") */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * VND = 0 (đồng has no minor unit), USD = 2.
   */
  readonly decimals: number;
}

/**
 * Chart-of-accounts classification (Appendix II of the Circular).
 *
 * Level-1 account series in the bundled chart: 1xx/2xx ASSET,
 * 3xx LIABILITY, 4xx EQUITY, 5xx REVENUE, 6xx DIRECT_COST / EXPENSE,
 * 7xx OTHER_REVENUE, 8xx OTHER_EXPENSE; 911 (profit determination)
 * is carried as EQUITY.
 */
export type AccountType =
  | "ASSET"
  | "LIABILITY"
  | "EQUITY"
  | "REVENUE"
  | "EXPENSE"
  | "DIRECT_COST"
  | "OTHER_REVENUE"
  | "OTHER_EXPENSE";

/** The side on which an account's balance normally increases. */
export type BalanceDirection = "DEBIT" | "CREDIT";

/**
 * Source document kinds (Appendix I).
 *
 * CASH_RECEIPT / CASH_PAYMENT - phiếu thu / phiếu chi
 * IMPORT / EXPORT - goods imported / exported
 * PURCHASE / SALE - purchases and sales of goods and services
 * SHORTAGE_FOUND / SURPLUS_FOUND - stock-count differences
 */
export type VoucherType =
  | "CASH_RECEIPT"
  | "CASH_PAYMENT"
  | "IMPORT"
  | "EXPORT"
  | "PURCHASE"
  | "SALE"
  | "SHORTAGE_FOUND"
  | "SURPLUS_FOUND"
  | "ADJUSTMENT"
  | "OTHER";

/**
 * Locking state of a voucher, journal entry or period.
 * OPEN is the only modifiable state.
 */
export type LockStatus =
  | "OPEN"
  | "MONTH_LOCKED"
  | "QUARTER_LOCKED"
  | "YEAR_LOCKED"
  | "FINALIZED"
  | "MANUAL";

/** Lock statuses a lock operation may apply (everything except OPEN). */
export type LockType = Exclude<LockStatus, "OPEN">;
