/**
 * @socai/ledger - Advisory balance checks.
 *
 * Nothing here throws or blocks a posting. Each check returns the
 * warnings (or errors) a caller may show or log.
 */

import type { Account, AccountBalance, JournalEntry } from "./types.js";
import { isBalanced } from "./journal-entry.js";
import { isNegative } from "./money-math.js";

/**
 * Accounts that should not carry a negative balance: cash, bank,
 * receivables, inventories, fixed assets, loans and payables.
 */
export const CRITICAL_ACCOUNT_CODES: readonly string[] = [
  "111",
  "112",
  "131",
  "138",
  "151",
  "152",
  "156",
  "157",
  "211",
  "213",
  "311",
  "331",
];

/**
 * Warn when a period's closing debit is present and negative.
 */
export function checkNegativeBalance(balance: AccountBalance): readonly string[] {
  const warnings: string[] = [];

  if (balance.closingDebit !== undefined && isNegative(balance.closingDebit)) {
    warnings.push(
      `Account ${balance.accountCode} has a negative closing debit balance: ${balance.closingDebit.amount} ${balance.closingDebit.currency}`,
    );
  }

  return warnings;
}

/**
 * Warn for every critical account (or one of its sub-accounts) whose
 * current balance is negative. Results follow the order of `accounts`.
 */
export function findNegativeBalances(
  accounts: readonly Account[],
  codes: readonly string[] = CRITICAL_ACCOUNT_CODES,
): readonly string[] {
  const warnings: string[] = [];

  for (const account of accounts) {
    const critical = codes.some((code) => account.code.startsWith(code));
    if (critical && isNegative(account.currentBalance)) {
      warnings.push(
        `Account ${account.code} (${account.name}) has a negative balance: ${account.currentBalance.amount} ${account.currentBalance.currency}`,
      );
    }
  }

  return warnings;
}

export interface EntriesBalanceResult {
  readonly balanced: boolean;
  readonly errors: readonly string[];
}

/**
 * Check a batch of entries, one error per unbalanced entry.
 */
export function validateEntriesBalance(
  entries: readonly JournalEntry[],
): EntriesBalanceResult {
  const errors: string[] = [];

  for (const entry of entries) {
    if (!isBalanced(entry)) {
      errors.push(
        `Journal entry ${entry.entryNumber}: total debit (${entry.totalDebit?.amount ?? "n/a"}) != total credit (${entry.totalCredit?.amount ?? "n/a"})`,
      );
    }
  }

  return { balanced: errors.length === 0, errors };
}
