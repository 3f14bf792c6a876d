/**
 * @socai/types - Shared domain types for the ledger stack.
 *
 * These types are used across all packages:
 * - Financial primitives (Money, account classification)
 * - Source document vocabulary (voucher types, lock statuses)
 * - Audit trail vocabulary
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  Currency,
  AccountType,
  BalanceDirection,
  VoucherType,
  LockStatus,
  LockType,
} from "./financial.js";

// Audit types
export type { AuditAction, AuditEntityType } from "./audit.js";

// Vocabularies
export {
  ACCOUNT_TYPES,
  BALANCE_DIRECTIONS,
  VOUCHER_TYPES,
  LOCK_STATUSES,
  LOCK_TYPES,
  AUDIT_ACTIONS,
} from "./constants.js";
