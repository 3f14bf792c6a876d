/**
 * Enumerated vocabularies as readonly tuples.
 *
 * The unions in financial.ts and audit.ts are derived from the same
 * literals; these tuples exist for runtime checks and schema builders.
 */

import type {
  AccountType,
  BalanceDirection,
  LockStatus,
  LockType,
  VoucherType,
} from "./financial.js";
import type { AuditAction } from "./audit.js";

export const ACCOUNT_TYPES = [
  "ASSET",
  "LIABILITY",
  "EQUITY",
  "REVENUE",
  "EXPENSE",
  "DIRECT_COST",
  "OTHER_REVENUE",
  "OTHER_EXPENSE",
] as const satisfies readonly AccountType[];

export const BALANCE_DIRECTIONS = ["DEBIT", "CREDIT"] as const satisfies readonly BalanceDirection[];

export const VOUCHER_TYPES = [
  "CASH_RECEIPT",
  "CASH_PAYMENT",
  "IMPORT",
  "EXPORT",
  "PURCHASE",
  "SALE",
  "SHORTAGE_FOUND",
  "SURPLUS_FOUND",
  "ADJUSTMENT",
  "OTHER",
] as const satisfies readonly VoucherType[];

export const LOCK_TYPES = [
  "MONTH_LOCKED",
  "QUARTER_LOCKED",
  "YEAR_LOCKED",
  "FINALIZED",
  "MANUAL",
] as const satisfies readonly LockType[];

export const LOCK_STATUSES = ["OPEN", ...LOCK_TYPES] as const satisfies readonly LockStatus[];

export const AUDIT_ACTIONS = [
  "CREATE",
  "UPDATE",
  "DELETE",
  "SIGN",
  "LOCK",
  "UNLOCK",
  "POST",
  "REVERSE",
] as const satisfies readonly AuditAction[];
