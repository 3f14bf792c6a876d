/**
 * @socai/ledger - Provisions for doubtful receivables.
 *
 * Specific provisions follow the aging bands of the receivable
 * itself; the general provision is a flat rate on the total.
 */

import type { Money } from "@socai/types";
import {
  BASE_CURRENCY,
  VND_DECIMALS,
  addMoney,
  multiplyMoney,
  zeroMoney,
} from "./money-math.js";

export interface ProvisionBand {
  /** Inclusive. */
  readonly minDays: number;
  /** Inclusive. */
  readonly maxDays: number;
  readonly rate: string;
}

/** First matching band wins. */
export const SPECIFIC_PROVISION_BANDS: readonly ProvisionBand[] = [
  { minDays: 0, maxDays: 90, rate: "0.00" },
  { minDays: 91, maxDays: 180, rate: "0.30" },
  { minDays: 181, maxDays: 365, rate: "0.50" },
  { minDays: 366, maxDays: Number.POSITIVE_INFINITY, rate: "1.00" },
];

export const GENERAL_PROVISION_RATE = "0.01";

export interface Receivable {
  readonly amount: Money;
  readonly overdueDays: number;
  readonly customerCode?: string | undefined;
}

export interface ProvisionLine {
  readonly customerCode?: string | undefined;
  readonly amount: Money;
  readonly overdueDays: number;
  readonly rate: string;
  readonly provision: Money;
}

export interface SpecificProvision {
  readonly total: Money;
  readonly lines: readonly ProvisionLine[];
}

/**
 * Provision rate for a number of overdue days. Days outside every
 * band (negative, fractional between bands) get "0.00".
 */
export function provisionRate(overdueDays: number): string {
  const band = SPECIFIC_PROVISION_BANDS.find(
    (b) => overdueDays >= b.minDays && overdueDays <= b.maxDays,
  );
  return band?.rate ?? "0.00";
}

/**
 * Provision each receivable by its own aging.
 *
 * The second parameter is accepted for compatibility and ignored:
 * every item is aged by its own `overdueDays`.
 */
export function calculateSpecificProvision(
  receivables: readonly Receivable[],
  _overdueDays?: number,
): SpecificProvision {
  const lines = receivables.map((item): ProvisionLine => {
    const rate = provisionRate(item.overdueDays);
    return {
      customerCode: item.customerCode,
      amount: item.amount,
      overdueDays: item.overdueDays,
      rate,
      provision: multiplyMoney(item.amount, rate),
    };
  });

  const total = lines.reduce(
    (sum, line) => addMoney(sum, line.provision),
    zeroMoney(BASE_CURRENCY, VND_DECIMALS),
  );

  return { total, lines };
}

/**
 * 1% of the total receivables, whatever their aging.
 */
export function calculateGeneralProvision(totalReceivables: Money): Money {
  return multiplyMoney(totalReceivables, GENERAL_PROVISION_RATE);
}
