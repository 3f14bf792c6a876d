/**
 * Audit Types
 *
 * Every state-changing operation on a voucher, journal entry or account
 * is recorded by the caller with one of these action kinds.
 */

export type AuditAction =
  | "CREATE"
  | "UPDATE"
  | "DELETE"
  | "SIGN"
  | "LOCK"
  | "UNLOCK"
  | "POST"
  | "REVERSE";

/** Entity kinds that appear in the audit trail. */
export type AuditEntityType = "AccountingVoucher" | "JournalEntry" | "Account";
