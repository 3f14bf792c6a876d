/**
 * Property-Based Tests for @socai/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Totals equal the sums of line amounts; difference = debit − credit
 * 2. Posting succeeds iff the entry is balanced and unposted
 * 3. Bigint arithmetic roundtrip (parse → format → parse = identity)
 * 4. Money addition is commutative; subtraction undoes addition
 * 5. FIFO and LIFO agree when every lot is consumed
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { VoucherLineDetail } from "../src/types.js";
import { LedgerError } from "../src/types.js";
import {
  createJournalEntry,
  calculateTotals,
  isBalanced,
  postEntry,
} from "../src/journal-entry.js";
import { calculateCostOfGoodsSold } from "../src/inventory-costing.js";
import type { InventoryLot } from "../src/inventory-costing.js";
import {
  parseAmount,
  formatAmount,
  addMoney,
  subtractMoney,
  vnd,
} from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Whole-đồng amounts, including zero. */
const arbAmount = fc.integer({ min: 0, max: 9_999_999_999 });

/** A line carrying a debit, a credit, or neither. */
const arbLine: fc.Arbitrary<VoucherLineDetail> = fc
  .tuple(fc.constantFrom("debit", "credit", "memo"), arbAmount)
  .map(([side, amount]): VoucherLineDetail => {
    const base = { accountCode: "1111", description: side };
    if (side === "debit") return { ...base, debitAmount: vnd(String(amount)) };
    if (side === "credit") return { ...base, creditAmount: vnd(String(amount)) };
    return base;
  });

const arbLot: fc.Arbitrary<InventoryLot> = fc
  .tuple(
    fc.integer({ min: 1, max: 1000 }),
    fc.integer({ min: 1, max: 10_000_000 }),
    fc.integer({ min: 1, max: 28 }),
  )
  .map(([quantity, cost, day]) => ({
    productCode: "SP01",
    remainingQuantity: String(quantity),
    unitCost: vnd(String(cost)),
    receiptDate: `2025-01-${String(day).padStart(2, "0")}`,
  }));

function entryOf(lines: readonly VoucherLineDetail[]) {
  return createJournalEntry({
    id: "je",
    entryNumber: "BT/20250101/001",
    voucherId: "v",
    entryDate: "2025-01-01",
    description: "property",
    createdBy: "system",
    createdAt: "2025-01-01T00:00:00.000Z",
    lines,
  });
}

// =============================================================================
// Property: Balance Invariant
// =============================================================================

describe("property: totals match the lines", () => {
  it("totalDebit = Σ debit, totalCredit = Σ credit, difference = debit − credit", () => {
    fc.assert(
      fc.property(fc.array(arbLine, { maxLength: 20 }), (lines) => {
        let debit = 0n;
        let credit = 0n;
        for (const line of lines) {
          if (line.debitAmount) debit += parseAmount(line.debitAmount.amount, 0);
          if (line.creditAmount) credit += parseAmount(line.creditAmount.amount, 0);
        }

        const entry = calculateTotals(entryOf(lines));
        expect(entry.totalDebit?.amount).toBe(debit.toString());
        expect(entry.totalCredit?.amount).toBe(credit.toString());
        expect(entry.difference?.amount).toBe((debit - credit).toString());
        expect(isBalanced(entry)).toBe(debit === credit);
      }),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: Posting Gate
// =============================================================================

describe("property: posting gate", () => {
  it("post succeeds iff balanced and not yet posted; failures leave the entry unchanged", () => {
    fc.assert(
      fc.property(fc.array(arbLine, { maxLength: 10 }), fc.boolean(), (lines, prePosted) => {
        const entry = { ...calculateTotals(entryOf(lines)), isPosted: prePosted };
        const before = JSON.stringify(entry);

        if (isBalanced(entry) && !prePosted) {
          const posted = postEntry(entry, "system", "2025-01-02T00:00:00.000Z");
          expect(posted.isPosted).toBe(true);
          expect(posted.version).toBe(entry.version + 1);
        } else {
          let code: string | undefined;
          try {
            postEntry(entry, "system");
          } catch (err) {
            if (err instanceof LedgerError) code = err.code;
          }
          expect(code).toBe(isBalanced(entry) ? "ALREADY_POSTED" : "NOT_BALANCED");
        }
        expect(JSON.stringify(entry)).toBe(before);
      }),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: Bigint Arithmetic
// =============================================================================

describe("property: parseAmount ↔ formatAmount roundtrip", () => {
  it("parse(format(n, d), d) === n for any bigint n and decimals d", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: -999_999_999_999n, max: 999_999_999_999n }),
        fc.integer({ min: 0, max: 12 }),
        (scaled, decimals) => {
          expect(parseAmount(formatAmount(scaled, decimals), decimals)).toBe(scaled);
        },
      ),
      { numRuns: 1000 },
    );
  });
});

describe("property: money addition", () => {
  it("is commutative and undone by subtraction", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -1_000_000_000, max: 1_000_000_000 }),
        fc.integer({ min: -1_000_000_000, max: 1_000_000_000 }),
        (a, b) => {
          const ma = vnd(String(a));
          const mb = vnd(String(b));
          expect(addMoney(ma, mb)).toEqual(addMoney(mb, ma));
          expect(subtractMoney(addMoney(ma, mb), mb)).toEqual(ma);
        },
      ),
      { numRuns: 500 },
    );
  });
});

// =============================================================================
// Property: FIFO/LIFO Duality
// =============================================================================

describe("property: FIFO and LIFO agree on full consumption", () => {
  it("consuming every unit costs the same under both methods", () => {
    fc.assert(
      fc.property(fc.array(arbLot, { minLength: 1, maxLength: 8 }), (lots) => {
        const total = lots.reduce((sum, lot) => sum + Number(lot.remainingQuantity), 0);
        const demand = [{ productCode: "SP01", quantity: String(total) }];

        const fifo = calculateCostOfGoodsSold(demand, lots, "FIFO");
        const lifo = calculateCostOfGoodsSold(demand, lots, "LIFO");
        expect(fifo.totalCost).toEqual(lifo.totalCost);
        expect(fifo.lines[0]?.unfilledQuantity).toBe("0");
      }),
      { numRuns: 200 },
    );
  });
});
