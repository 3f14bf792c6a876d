/**
 * @socai/ledger - Statutory double-entry accounting core.
 *
 * A pure TypeScript core with zero runtime dependencies.
 * Enforces the bookkeeping invariants of Circular 99/2025/TT-BTC:
 * - A journal entry is posted only when debits = credits
 * - Posting and signing happen at most once
 * - Locking is monotonic; there is no unlock
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - Every operation returns a new value
 * - Fail-closed: invalid transitions throw, never silently succeed
 * - No I/O; persistence is behind the ports in repositories.ts
 */

// Journal entries
export {
  createJournalEntry,
  calculateTotals,
  isBalanced,
  postEntry,
  lockEntry,
  canModifyEntry,
} from "./journal-entry.js";
export type { NewJournalEntry } from "./journal-entry.js";

// Vouchers
export {
  createVoucher,
  signVoucher,
  lockVoucher,
  canModifyVoucher,
} from "./voucher.js";
export type { NewVoucher } from "./voucher.js";

// Accounts
export {
  BALANCE_DIRECTION,
  createAccount,
  postBalance,
  matchesAccountPattern,
} from "./accounts.js";
export type { NewAccount } from "./accounts.js";

// Balance checks
export {
  CRITICAL_ACCOUNT_CODES,
  checkNegativeBalance,
  findNegativeBalances,
  validateEntriesBalance,
} from "./balance-checks.js";
export type { EntriesBalanceResult } from "./balance-checks.js";

// Exchange rates
export {
  EXCHANGE_GAIN_ACCOUNT,
  EXCHANGE_LOSS_ACCOUNT,
  toVnd,
  calculateExchangeDifference,
  classifyExchangeDifference,
} from "./exchange-rate.js";
export type { ExchangeDifferenceClass } from "./exchange-rate.js";

// Inventory costing
export {
  COST_METHODS,
  SHORTAGE_ACCOUNT,
  SURPLUS_ACCOUNT,
  calculateCostOfGoodsSold,
  weightedAverageUnitCost,
  reconcileInventory,
} from "./inventory-costing.js";
export type {
  CostMethod,
  GoodsDemand,
  InventoryLot,
  CostedDemandLine,
  CostOfGoodsSold,
  InventoryReconciliation,
} from "./inventory-costing.js";

// Provisions
export {
  SPECIFIC_PROVISION_BANDS,
  GENERAL_PROVISION_RATE,
  provisionRate,
  calculateSpecificProvision,
  calculateGeneralProvision,
} from "./provision.js";
export type {
  ProvisionBand,
  Receivable,
  ProvisionLine,
  SpecificProvision,
} from "./provision.js";

// Money arithmetic
export {
  BASE_CURRENCY,
  VND_DECIMALS,
  parseAmount,
  formatAmount,
  decimalScale,
  divideRounded,
  rescale,
  money,
  vnd,
  vndUnitCost,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  multiplyMoney,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
} from "./money-math.js";

// Persistence ports
export type {
  AccountRepository,
  JournalEntryRepository,
  VoucherRepository,
  VoucherFilter,
} from "./repositories.js";

// Types
export type {
  ExchangeRateType,
  ExchangeRate,
  VoucherLineDetail,
  JournalEntry,
  AccountingVoucher,
  Account,
  BalancePeriodType,
  AccountBalance,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
