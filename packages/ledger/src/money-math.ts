/**
 * @socai/ledger - Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all additive operations
 * - Products (rates, quantities, percentages) are exact and rounded once,
 *   half away from zero, to the target currency's decimals
 * - Zero runtime dependencies
 */

import type { Money } from "@socai/types";
import { LedgerError } from "./types.js";

/** Base currency of the statutory books. */
export const BASE_CURRENCY = "VND";

/** The đồng has no minor unit. */
export const VND_DECIMALS = 0;

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Number of fractional digits in a decimal string.
 * Used to pick a common scale for quantities and rates.
 */
export function decimalScale(value: string): number {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid decimal format: "${trimmed}"`);
  }
  const dot = trimmed.indexOf(".");
  return dot === -1 ? 0 : trimmed.length - dot - 1;
}

/**
 * Integer division rounded half away from zero.
 *
 * 7n / 2n → 4n, -7n / 2n → -4n, 5n / 3n → 2n
 */
export function divideRounded(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }

  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) {
    return quotient;
  }

  const absRemainder = remainder < 0n ? -remainder : remainder;
  const absDenominator = denominator < 0n ? -denominator : denominator;
  if (absRemainder * 2n < absDenominator) {
    return quotient;
  }

  const negative = (numerator < 0n) !== (denominator < 0n);
  return negative ? quotient - 1n : quotient + 1n;
}

/**
 * Rescale a bigint from one decimal scale to another.
 * Scaling down rounds half away from zero; scaling up is exact.
 */
export function rescale(value: bigint, fromScale: number, toScale: number): bigint {
  if (toScale >= fromScale) {
    return value * 10n ** BigInt(toScale - fromScale);
  }
  return divideRounded(value, 10n ** BigInt(fromScale - toScale));
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Build a Money value from a decimal string, normalizing its format.
 * Throws if the amount has more fractional digits than `decimals`.
 */
export function money(amount: string, currency: string, decimals: number): Money {
  return {
    amount: formatAmount(parseAmount(amount, decimals), decimals),
    currency,
    decimals,
  };
}

/**
 * Shorthand for an amount in the base currency.
 */
export function vnd(amount: string): Money {
  return money(amount, BASE_CURRENCY, VND_DECIMALS);
}

/**
 * A VND unit price. Unlike a booked amount it keeps the fractional
 * places it was given: "105714.2857" → decimals 4.
 */
export function vndUnitCost(amount: string): Money {
  return money(amount, BASE_CURRENCY, Math.max(VND_DECIMALS, decimalScale(amount)));
}

/**
 * Assert two Money values have the same currency and decimals.
 * Throws LedgerError if they differ.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
      { left: a.currency, right: b.currency },
    );
  }
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
      { left: a.currency, right: b.currency },
    );
  }
}

/**
 * Add two Money values. They must have the same currency.
 */
export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const sum = parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals);
  return {
    amount: formatAmount(sum, a.decimals),
    currency: a.currency,
    decimals: a.decimals,
  };
}

/**
 * Subtract b from a. They must have the same currency.
 */
export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const diff = parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals);
  return {
    amount: formatAmount(diff, a.decimals),
    currency: a.currency,
    decimals: a.decimals,
  };
}

/**
 * Multiply a Money value by an exact decimal factor ("0.30", "2.5", "25400").
 * The product keeps the currency and is rounded once to its decimals.
 */
export function multiplyMoney(value: Money, factor: string): Money {
  const factorScale = decimalScale(factor);
  const product = parseAmount(value.amount, value.decimals) * parseAmount(factor, factorScale);
  return {
    amount: formatAmount(rescale(product, value.decimals + factorScale, value.decimals), value.decimals),
    currency: value.currency,
    decimals: value.decimals,
  };
}

/**
 * Check if a Money amount is positive (> 0).
 */
export function isPositive(value: Money): boolean {
  return parseAmount(value.amount, value.decimals) > 0n;
}

/**
 * Check if a Money amount is negative (< 0).
 */
export function isNegative(value: Money): boolean {
  return parseAmount(value.amount, value.decimals) < 0n;
}

/**
 * Create a zero Money value for a given currency.
 */
export function zeroMoney(currency: string, decimals: number): Money {
  return {
    amount: formatAmount(0n, decimals),
    currency,
    decimals,
  };
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 * They must have the same currency.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = parseAmount(a.amount, a.decimals);
  const vb = parseAmount(b.amount, b.decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}
