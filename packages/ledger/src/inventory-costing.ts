/**
 * @socai/ledger - Inventory costing.
 *
 * Cost of goods sold under FIFO, LIFO or weighted average, and
 * stock-count reconciliation. Each call is a pure function over the
 * lots it is given.
 *
 * Rules:
 * - FIFO/LIFO cost each demand line against the lots as supplied;
 *   lots are not depleted across demand lines
 * - Demand beyond the available lots is reported as unfilled, not costed
 * - Weighted average is taken over ALL supplied lots, whatever their
 *   product code (known limitation, kept for compatibility)
 * - Quantities share one decimal scale per call, unit costs another
 * - Line costs are exact until the end; the total is rounded once from
 *   their exact sum, so displayed line costs may not add up to it
 */

import type { Money } from "@socai/types";
import {
  decimalScale,
  divideRounded,
  formatAmount,
  parseAmount,
  rescale,
  BASE_CURRENCY,
  VND_DECIMALS,
} from "./money-math.js";
import { LedgerError } from "./types.js";

export const COST_METHODS = ["FIFO", "LIFO", "WEIGHTED_AVERAGE"] as const;

export type CostMethod = (typeof COST_METHODS)[number];

/** Inventory shortage pending resolution (tài sản thiếu chờ xử lý). */
export const SHORTAGE_ACCOUNT = "1381";

/** Inventory surplus pending resolution (tài sản thừa chờ giải quyết). */
export const SURPLUS_ACCOUNT = "3381";

export interface GoodsDemand {
  readonly productCode: string;
  readonly quantity: string;
}

export interface InventoryLot {
  readonly productCode: string;
  readonly remainingQuantity: string;
  /** VND, at any number of decimal places. */
  readonly unitCost: Money;
  /** ISO date; lots sort on it lexically. */
  readonly receiptDate: string;
}

export interface CostedDemandLine {
  readonly productCode: string;
  readonly requestedQuantity: string;
  readonly costedQuantity: string;
  readonly unfilledQuantity: string;
  readonly cost: Money;
}

export interface CostOfGoodsSold {
  readonly method: CostMethod;
  readonly totalCost: Money;
  readonly lines: readonly CostedDemandLine[];
}

export interface InventoryReconciliation {
  readonly productCode: string;
  /** actual − book */
  readonly difference: string;
  readonly amount: Money;
  /** "1381" for a shortage, "3381" for a surplus, "" when equal. */
  readonly accountCode: string;
}

// ─── Internal Helpers ────────────────────────────────────────────────────

interface Scales {
  readonly quantity: number;
  readonly unitCost: number;
}

/**
 * A demand line before rounding. Its cost is
 * `numerator / denominator` đồng, with one denominator per call.
 */
interface ExactLine {
  readonly productCode: string;
  readonly requested: bigint;
  readonly costed: bigint;
  readonly unfilled: bigint;
  readonly numerator: bigint;
}

function quantityScale(quantities: readonly string[]): number {
  return quantities.reduce((max, q) => Math.max(max, decimalScale(q)), 0);
}

function compareDates(a: InventoryLot, b: InventoryLot): number {
  if (a.receiptDate < b.receiptDate) return -1;
  if (a.receiptDate > b.receiptDate) return 1;
  return 0;
}

function requireBaseCurrency(cost: Money): void {
  if (cost.currency !== BASE_CURRENCY) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Inventory is valued in ${BASE_CURRENCY}, got "${cost.currency}"`,
      { left: BASE_CURRENCY, right: cost.currency },
    );
  }
}

function unitCostScale(lots: readonly InventoryLot[]): number {
  return lots.reduce((max, lot) => Math.max(max, lot.unitCost.decimals), VND_DECIMALS);
}

function scaledUnitCost(lot: InventoryLot, scale: number): bigint {
  requireBaseCurrency(lot.unitCost);
  return rescale(
    parseAmount(lot.unitCost.amount, lot.unitCost.decimals),
    lot.unitCost.decimals,
    scale,
  );
}

function vndAmount(scaled: bigint): Money {
  return {
    amount: formatAmount(scaled, VND_DECIMALS),
    currency: BASE_CURRENCY,
    decimals: VND_DECIMALS,
  };
}

/** 10^(quantity scale + unit cost scale − VND decimals) */
function productUnit(scales: Scales): bigint {
  return 10n ** BigInt(scales.quantity + scales.unitCost - VND_DECIMALS);
}

function costByLayers(
  demand: GoodsDemand,
  lots: readonly InventoryLot[],
  scales: Scales,
  newestFirst: boolean,
): ExactLine {
  const requested = parseAmount(demand.quantity, scales.quantity);
  const candidates = lots
    .filter((lot) => lot.productCode === demand.productCode)
    .filter((lot) => parseAmount(lot.remainingQuantity, scales.quantity) > 0n)
    .sort((a, b) => (newestFirst ? compareDates(b, a) : compareDates(a, b)));

  let remaining = requested > 0n ? requested : 0n;
  let cost = 0n; // scale: quantity + unit cost

  for (const lot of candidates) {
    if (remaining <= 0n) break;
    const available = parseAmount(lot.remainingQuantity, scales.quantity);
    const taken = available < remaining ? available : remaining;
    cost += taken * scaledUnitCost(lot, scales.unitCost);
    remaining -= taken;
  }

  return {
    productCode: demand.productCode,
    requested,
    costed: (requested > 0n ? requested : 0n) - remaining,
    unfilled: remaining,
    numerator: cost,
  };
}

interface LotTotals {
  readonly quantity: bigint;
  /** scale: quantity + unit cost */
  readonly value: bigint;
}

function totalLots(lots: readonly InventoryLot[], scales: Scales): LotTotals {
  let quantity = 0n;
  let value = 0n;
  for (const lot of lots) {
    const q = parseAmount(lot.remainingQuantity, scales.quantity);
    quantity += q;
    value += q * scaledUnitCost(lot, scales.unitCost);
  }
  return { quantity, value };
}

// requested × value over the denominator quantity × productUnit
function costByAverage(demand: GoodsDemand, totals: LotTotals, scales: Scales): ExactLine {
  const requested = parseAmount(demand.quantity, scales.quantity);
  return {
    productCode: demand.productCode,
    requested,
    costed: requested,
    unfilled: 0n,
    numerator: totals.quantity === 0n ? 0n : requested * totals.value,
  };
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Cost a list of demand lines against the supplied lots.
 *
 * Lots {30 @ 100000 on 2025-01-01, 40 @ 110000 on 2025-02-01}, demand 50:
 * FIFO → 5200000, LIFO → 5400000, WEIGHTED_AVERAGE → 5285714
 */
export function calculateCostOfGoodsSold(
  demands: readonly GoodsDemand[],
  lots: readonly InventoryLot[],
  method: CostMethod = "FIFO",
): CostOfGoodsSold {
  const scales: Scales = {
    quantity: quantityScale([
      ...demands.map((d) => d.quantity),
      ...lots.map((lot) => lot.remainingQuantity),
    ]),
    unitCost: unitCostScale(lots),
  };

  let exact: ExactLine[];
  let denominator = productUnit(scales);
  if (method === "WEIGHTED_AVERAGE") {
    const totals = totalLots(lots, scales);
    if (totals.quantity > 0n) denominator *= totals.quantity;
    exact = demands.map((d) => costByAverage(d, totals, scales));
  } else {
    exact = demands.map((d) => costByLayers(d, lots, scales, method === "LIFO"));
  }

  const lines = exact.map((line) => ({
    productCode: line.productCode,
    requestedQuantity: formatAmount(line.requested, scales.quantity),
    costedQuantity: formatAmount(line.costed, scales.quantity),
    unfilledQuantity: formatAmount(line.unfilled, scales.quantity),
    cost: vndAmount(divideRounded(line.numerator, denominator)),
  }));
  const total = exact.reduce((sum, line) => sum + line.numerator, 0n);

  return { method, totalCost: vndAmount(divideRounded(total, denominator)), lines };
}

/**
 * Weighted average unit cost over all lots, with `scale` extra
 * decimal places. Returns zero when the lots hold no quantity.
 *
 * {30 @ 100000, 40 @ 110000} → "105714.2857"
 */
export function weightedAverageUnitCost(
  lots: readonly InventoryLot[],
  scale = 4,
): string {
  const scales: Scales = {
    quantity: quantityScale(lots.map((lot) => lot.remainingQuantity)),
    unitCost: unitCostScale(lots),
  };
  const totals = totalLots(lots, scales);
  const outScale = VND_DECIMALS + scale;
  if (totals.quantity === 0n) {
    return formatAmount(0n, outScale);
  }
  // value / quantity is at the unit cost scale
  return formatAmount(
    divideRounded(
      totals.value * 10n ** BigInt(outScale),
      totals.quantity * 10n ** BigInt(scales.unitCost),
    ),
    outScale,
  );
}

/**
 * Compare counted stock with the books.
 * A shortage goes to 1381, a surplus to 3381, each valued at `unitCost`
 * and rounded once to whole đồng.
 */
export function reconcileInventory(
  productCode: string,
  actualQuantity: string,
  bookQuantity: string,
  unitCost: Money,
): InventoryReconciliation {
  requireBaseCurrency(unitCost);
  const scale = quantityScale([actualQuantity, bookQuantity]);
  const difference = parseAmount(actualQuantity, scale) - parseAmount(bookQuantity, scale);
  const magnitude = difference < 0n ? -difference : difference;
  const value = rescale(
    magnitude * parseAmount(unitCost.amount, unitCost.decimals),
    scale + unitCost.decimals,
    VND_DECIMALS,
  );

  let accountCode = "";
  if (difference < 0n) accountCode = SHORTAGE_ACCOUNT;
  else if (difference > 0n) accountCode = SURPLUS_ACCOUNT;

  return {
    productCode,
    difference: formatAmount(difference, scale),
    amount: vndAmount(value),
    accountCode,
  };
}
