/**
 * @socai/ledger - Chart-of-accounts entries and balance posting.
 *
 * Rules:
 * - Account type determines the balance direction (debit/credit)
 * - Direction is fixed at creation; posting never changes it
 * - Balances may go negative; that is flagged, never blocked
 */

import type { AccountType, BalanceDirection, Money } from "@socai/types";
import type { Account } from "./types.js";
import {
  BASE_CURRENCY,
  VND_DECIMALS,
  addMoney,
  money,
  subtractMoney,
} from "./money-math.js";

/**
 * Map account types to their balance direction.
 *
 * - Asset and cost/expense accounts → debit (increase with debits)
 * - Liability, equity and revenue accounts → credit (increase with credits)
 */
export const BALANCE_DIRECTION: Readonly<Record<AccountType, BalanceDirection>> = {
  ASSET: "DEBIT",
  EXPENSE: "DEBIT",
  DIRECT_COST: "DEBIT",
  OTHER_EXPENSE: "DEBIT",
  LIABILITY: "CREDIT",
  EQUITY: "CREDIT",
  REVENUE: "CREDIT",
  OTHER_REVENUE: "CREDIT",
} as const;

export interface NewAccount {
  readonly code: string;
  readonly name: string;
  readonly accountType: AccountType;
  /** Contra accounts (214, 229) run against their type's direction. */
  readonly balanceDirection?: BalanceDirection | undefined;
  readonly parentCode?: string | undefined;
  readonly isDetail?: boolean | undefined;
  readonly isActive?: boolean | undefined;
  readonly openingBalance?: Money | undefined;
  readonly createdAt?: string | undefined;
}

export function createAccount(params: NewAccount): Account {
  return {
    code: params.code,
    name: params.name,
    accountType: params.accountType,
    balanceDirection: params.balanceDirection ?? BALANCE_DIRECTION[params.accountType],
    parentCode: params.parentCode,
    isDetail: params.isDetail ?? true,
    isActive: params.isActive ?? true,
    currentBalance: params.openingBalance ?? money("0", BASE_CURRENCY, VND_DECIMALS),
    createdAt: params.createdAt ?? new Date().toISOString(),
    version: 1,
  };
}

/**
 * Apply a posting to an account.
 *
 * DEBIT:  balance + debit − credit
 * CREDIT: balance − debit + credit
 */
export function postBalance(account: Account, debit: Money, credit: Money): Account {
  const currentBalance =
    account.balanceDirection === "DEBIT"
      ? subtractMoney(addMoney(account.currentBalance, debit), credit)
      : addMoney(subtractMoney(account.currentBalance, debit), credit);

  return {
    ...account,
    currentBalance,
    version: account.version + 1,
  };
}

function escapeRegExp(ch: string): string {
  return ch.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Match an account code against a pattern.
 * `*` matches any run of characters, `_` exactly one character.
 *
 * matchesAccountPattern("1561", "156*") → true
 * matchesAccountPattern("33311", "3331_") → true
 * matchesAccountPattern("1561", "156") → false
 */
export function matchesAccountPattern(code: string, pattern: string): boolean {
  const source = [...pattern]
    .map((ch) => (ch === "*" ? ".*" : ch === "_" ? "." : escapeRegExp(ch)))
    .join("");
  return new RegExp(`^${source}$`).test(code);
}
