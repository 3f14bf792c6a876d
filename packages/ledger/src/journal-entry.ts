/**
 * @socai/ledger - Journal entry lifecycle.
 *
 * Unbalanced → Balanced → Posted, with an orthogonal Locked flag
 * that can be set from any state.
 *
 * Rules:
 * - Totals are derived from lines, never supplied by callers
 * - Posting requires debit = credit (exact, no tolerance)
 * - Posting twice is rejected, never absorbed
 * - Every transition bumps `version` and returns a new entry
 */

import type { LockType, Money } from "@socai/types";
import type { JournalEntry, VoucherLineDetail } from "./types.js";
import { LedgerError } from "./types.js";
import {
  BASE_CURRENCY,
  VND_DECIMALS,
  addMoney,
  compareMoney,
  subtractMoney,
  zeroMoney,
} from "./money-math.js";

// ─── Construction ────────────────────────────────────────────────────────

export interface NewJournalEntry {
  readonly id: string;
  readonly entryNumber: string;
  readonly voucherId: string;
  readonly entryDate: string;
  readonly postingDate?: string | undefined;
  readonly description: string;
  readonly descriptionDetail?: string | undefined;
  readonly createdBy: string;
  readonly createdAt?: string | undefined;
  readonly lines?: readonly VoucherLineDetail[] | undefined;
}

/**
 * Create an open, unposted entry. Totals stay absent until
 * `calculateTotals` runs.
 */
export function createJournalEntry(params: NewJournalEntry): JournalEntry {
  return {
    id: params.id,
    entryNumber: params.entryNumber,
    voucherId: params.voucherId,
    entryDate: params.entryDate,
    postingDate: params.postingDate ?? params.entryDate,
    description: params.description,
    descriptionDetail: params.descriptionDetail,
    createdBy: params.createdBy,
    createdAt: params.createdAt ?? new Date().toISOString(),
    lines: [...(params.lines ?? [])],
    isPosted: false,
    isLocked: false,
    lockStatus: "OPEN",
    version: 1,
  };
}

// ─── Balance ─────────────────────────────────────────────────────────────

/**
 * Sum every present debit and credit amount. A missing amount
 * contributes zero. Lines are expected in the base currency; a foreign
 * line throws CURRENCY_MISMATCH.
 */
export function calculateTotals(entry: JournalEntry): JournalEntry {
  let totalDebit: Money = zeroMoney(BASE_CURRENCY, VND_DECIMALS);
  let totalCredit: Money = zeroMoney(BASE_CURRENCY, VND_DECIMALS);

  for (const line of entry.lines) {
    if (line.debitAmount !== undefined) {
      totalDebit = addMoney(totalDebit, line.debitAmount);
    }
    if (line.creditAmount !== undefined) {
      totalCredit = addMoney(totalCredit, line.creditAmount);
    }
  }

  return {
    ...entry,
    totalDebit,
    totalCredit,
    difference: subtractMoney(totalDebit, totalCredit),
  };
}

/**
 * True iff both totals are present and exactly equal.
 */
export function isBalanced(entry: JournalEntry): boolean {
  if (entry.totalDebit === undefined || entry.totalCredit === undefined) {
    return false;
  }
  return compareMoney(entry.totalDebit, entry.totalCredit) === 0;
}

// ─── Transitions ─────────────────────────────────────────────────────────

/**
 * Post a balanced entry. Throws NOT_BALANCED before ALREADY_POSTED,
 * so an unbalanced entry always reports its difference.
 */
export function postEntry(
  entry: JournalEntry,
  postedBy: string,
  timestamp: string = new Date().toISOString(),
): JournalEntry {
  if (!isBalanced(entry)) {
    throw new LedgerError(
      "NOT_BALANCED",
      `Journal entry "${entry.entryNumber}" is not balanced: debit=${entry.totalDebit?.amount ?? "n/a"}, credit=${entry.totalCredit?.amount ?? "n/a"}`,
      {
        entryId: entry.id,
        entryNumber: entry.entryNumber,
        totalDebit: entry.totalDebit?.amount,
        totalCredit: entry.totalCredit?.amount,
        difference: entry.difference?.amount,
      },
    );
  }

  if (entry.isPosted) {
    throw new LedgerError(
      "ALREADY_POSTED",
      `Journal entry "${entry.entryNumber}" is already posted`,
      { entryId: entry.id, entryNumber: entry.entryNumber },
    );
  }

  return {
    ...entry,
    isPosted: true,
    postedAt: timestamp,
    postedBy,
    version: entry.version + 1,
  };
}

/**
 * Lock an entry. Total: succeeds from any state, including an
 * already-locked one.
 */
export function lockEntry(
  entry: JournalEntry,
  lockType: LockType,
  timestamp: string = new Date().toISOString(),
): JournalEntry {
  return {
    ...entry,
    isLocked: true,
    lockStatus: lockType,
    lockedAt: timestamp,
    version: entry.version + 1,
  };
}

export function canModifyEntry(entry: JournalEntry): boolean {
  return !entry.isLocked;
}
