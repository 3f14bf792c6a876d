/**
 * @socai/ledger - Foreign-currency conversion.
 *
 * Converts foreign amounts to VND and classifies the difference that
 * arises when the same amount is revalued at a later rate.
 *
 * Rules:
 * - The product is exact and rounded once to VND decimals
 * - No currency check on the input amount; this is the conversion point
 */

import type { Money } from "@socai/types";
import type { ExchangeRate } from "./types.js";
import {
  BASE_CURRENCY,
  VND_DECIMALS,
  decimalScale,
  formatAmount,
  isPositive,
  parseAmount,
  rescale,
} from "./money-math.js";

/** Account for exchange gains (lãi chênh lệch tỷ giá). */
export const EXCHANGE_GAIN_ACCOUNT = "4131";

/** Account for exchange losses (lỗ chênh lệch tỷ giá). */
export const EXCHANGE_LOSS_ACCOUNT = "4132";

export interface ExchangeDifferenceClass {
  readonly accountCode: typeof EXCHANGE_GAIN_ACCOUNT | typeof EXCHANGE_LOSS_ACCOUNT;
  readonly kind: "REVENUE" | "EXPENSE";
}

/**
 * Exact product of two decimal strings as a bigint at the combined scale.
 */
function exactProduct(a: string, b: string): { value: bigint; scale: number } {
  const scaleA = decimalScale(a);
  const scaleB = decimalScale(b);
  return {
    value: parseAmount(a, scaleA) * parseAmount(b, scaleB),
    scale: scaleA + scaleB,
  };
}

function vndFromScaled(value: bigint, scale: number): Money {
  return {
    amount: formatAmount(rescale(value, scale, VND_DECIMALS), VND_DECIMALS),
    currency: BASE_CURRENCY,
    decimals: VND_DECIMALS,
  };
}

/**
 * Convert a foreign-currency amount to VND at the given rate.
 *
 * toVnd({ rate: "25400", ... }, "100.50") → 2552700 VND
 */
export function toVnd(rate: ExchangeRate, amount: string): Money {
  const product = exactProduct(amount, rate.rate);
  return vndFromScaled(product.value, product.scale);
}

/**
 * VND value of `amount` at `currentRate` minus its value at `originalRate`.
 * Both products are kept exact; only the difference is rounded.
 */
export function calculateExchangeDifference(
  originalRate: ExchangeRate,
  currentRate: ExchangeRate,
  amount: string,
): Money {
  const current = exactProduct(amount, currentRate.rate);
  const original = exactProduct(amount, originalRate.rate);
  const scale = Math.max(current.scale, original.scale);
  const diff =
    rescale(current.value, current.scale, scale) -
    rescale(original.value, original.scale, scale);
  return vndFromScaled(diff, scale);
}

/**
 * A positive difference is a gain (4131); zero or negative goes to 4132.
 */
export function classifyExchangeDifference(difference: Money): ExchangeDifferenceClass {
  if (isPositive(difference)) {
    return { accountCode: EXCHANGE_GAIN_ACCOUNT, kind: "REVENUE" };
  }
  return { accountCode: EXCHANGE_LOSS_ACCOUNT, kind: "EXPENSE" };
}
