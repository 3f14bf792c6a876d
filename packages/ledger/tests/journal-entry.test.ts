/**
 * Tests for the journal entry and voucher lifecycles.
 *
 * Covers:
 * - Totals from lines (absent amounts count as zero)
 * - Posting gate (NOT_BALANCED before ALREADY_POSTED)
 * - Lock monotonicity
 * - Sign-once
 * - Batch balance validation
 */

import { describe, it, expect } from "vitest";
import type { VoucherLineDetail } from "../src/types.js";
import { LedgerError } from "../src/types.js";
import {
  createJournalEntry,
  calculateTotals,
  isBalanced,
  postEntry,
  lockEntry,
  canModifyEntry,
} from "../src/journal-entry.js";
import {
  createVoucher,
  signVoucher,
  lockVoucher,
  canModifyVoucher,
} from "../src/voucher.js";
import { validateEntriesBalance } from "../src/balance-checks.js";
import { vnd } from "../src/money-math.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2025-03-10T08:00:00.000Z";
const TS2 = "2025-03-10T09:00:00.000Z";

function debit(accountCode: string, amount: string): VoucherLineDetail {
  return { accountCode, description: "Nợ", debitAmount: vnd(amount) };
}

function credit(accountCode: string, amount: string): VoucherLineDetail {
  return { accountCode, description: "Có", creditAmount: vnd(amount) };
}

function entry(lines: readonly VoucherLineDetail[]) {
  return createJournalEntry({
    id: "je-1",
    entryNumber: "BT/20250310/001",
    voucherId: "v-1",
    entryDate: "2025-03-10",
    description: "Thu tiền bán hàng",
    createdBy: "ketoan01",
    createdAt: TS,
    lines,
  });
}

function errorOf(fn: () => unknown): LedgerError | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err;
  }
  return undefined;
}

// ─── Journal Entries ─────────────────────────────────────────────────────

describe("createJournalEntry", () => {
  it("starts open, unposted and without totals", () => {
    const e = entry([]);
    expect(e.isPosted).toBe(false);
    expect(e.isLocked).toBe(false);
    expect(e.lockStatus).toBe("OPEN");
    expect(e.version).toBe(1);
    expect(e.totalDebit).toBeUndefined();
    expect(e.postingDate).toBe("2025-03-10");
    expect(isBalanced(e)).toBe(false);
  });
});

describe("calculateTotals", () => {
  it("sums debits and credits separately", () => {
    const e = calculateTotals(
      entry([debit("1111", "11000000"), credit("5111", "10000000"), credit("33311", "1000000")]),
    );
    expect(e.totalDebit).toEqual(vnd("11000000"));
    expect(e.totalCredit).toEqual(vnd("11000000"));
    expect(e.difference).toEqual(vnd("0"));
    expect(isBalanced(e)).toBe(true);
  });

  it("treats an empty line as zero", () => {
    const e = calculateTotals(entry([{ accountCode: "1111", description: "memo" }]));
    expect(e.totalDebit).toEqual(vnd("0"));
    expect(e.totalCredit).toEqual(vnd("0"));
  });

  it("reports debit minus credit", () => {
    const e = calculateTotals(entry([debit("1111", "500"), credit("511", "800")]));
    expect(e.difference).toEqual(vnd("-300"));
    expect(isBalanced(e)).toBe(false);
  });

  it("leaves the input untouched", () => {
    const original = entry([debit("1111", "500")]);
    calculateTotals(original);
    expect(original.totalDebit).toBeUndefined();
  });
});

describe("postEntry", () => {
  const balanced = calculateTotals(entry([debit("1111", "1000"), credit("511", "1000")]));

  it("posts a balanced entry", () => {
    const posted = postEntry(balanced, "ketoan01", TS2);
    expect(posted.isPosted).toBe(true);
    expect(posted.postedAt).toBe(TS2);
    expect(posted.postedBy).toBe("ketoan01");
    expect(posted.version).toBe(2);
  });

  it("rejects a second post", () => {
    const posted = postEntry(balanced, "ketoan01", TS2);
    const err = errorOf(() => postEntry(posted, "ketoan01", TS2));
    expect(err?.code).toBe("ALREADY_POSTED");
    expect(err?.details).toEqual({ entryId: "je-1", entryNumber: "BT/20250310/001" });
  });

  it("rejects an unbalanced entry with its totals", () => {
    const unbalanced = calculateTotals(entry([debit("1111", "1000"), credit("511", "900")]));
    const err = errorOf(() => postEntry(unbalanced, "ketoan01", TS2));
    expect(err?.code).toBe("NOT_BALANCED");
    expect(err?.message).toBe(
      'Journal entry "BT/20250310/001" is not balanced: debit=1000, credit=900',
    );
    expect(err?.details).toEqual({
      entryId: "je-1",
      entryNumber: "BT/20250310/001",
      totalDebit: "1000",
      totalCredit: "900",
      difference: "100",
    });
  });

  it("rejects an entry whose totals were never computed", () => {
    expect(errorOf(() => postEntry(entry([]), "ketoan01"))?.code).toBe("NOT_BALANCED");
  });

  it("reports NOT_BALANCED before ALREADY_POSTED", () => {
    const posted = postEntry(balanced, "ketoan01", TS2);
    const broken = { ...posted, totalCredit: vnd("1") };
    expect(errorOf(() => postEntry(broken, "ketoan01"))?.code).toBe("NOT_BALANCED");
  });
});

describe("lockEntry", () => {
  it("locks from any state", () => {
    const locked = lockEntry(entry([debit("1111", "1")]), "MONTH_LOCKED", TS2);
    expect(locked.isLocked).toBe(true);
    expect(locked.lockStatus).toBe("MONTH_LOCKED");
    expect(locked.lockedAt).toBe(TS2);
    expect(locked.version).toBe(2);
    expect(canModifyEntry(locked)).toBe(false);
  });

  it("re-locks a locked entry", () => {
    const twice = lockEntry(lockEntry(entry([]), "MONTH_LOCKED", TS), "YEAR_LOCKED", TS2);
    expect(twice.lockStatus).toBe("YEAR_LOCKED");
    expect(twice.version).toBe(3);
  });
});

// ─── Vouchers ────────────────────────────────────────────────────────────

describe("voucher lifecycle", () => {
  const voucher = createVoucher({
    id: "v-1",
    voucherNumber: "CT/20250310/001",
    voucherType: "CASH_RECEIPT",
    voucherDate: "2025-03-10",
    description: "Phiếu thu",
    companyCode: "CTY01",
    createdBy: "ketoan01",
    createdAt: TS,
    journalEntryIds: ["je-1"],
  });

  it("starts unsigned and modifiable", () => {
    expect(voucher.isSigned).toBe(false);
    expect(voucher.lockStatus).toBe("OPEN");
    expect(canModifyVoucher(voucher)).toBe(true);
    expect(voucher.journalEntryIds).toEqual(["je-1"]);
  });

  it("signs once", () => {
    const signed = signVoucher(voucher, "giamdoc", "sig-1", TS2);
    expect(signed.isSigned).toBe(true);
    expect(signed.signerId).toBe("giamdoc");
    expect(signed.signatureData).toBe("sig-1");
    expect(signed.signedAt).toBe(TS2);
    expect(signed.version).toBe(2);
  });

  it("rejects a second signature and keeps the first", () => {
    const signed = signVoucher(voucher, "giamdoc", "sig-1", TS2);
    expect(errorOf(() => signVoucher(signed, "other", "sig-2"))?.code).toBe("ALREADY_SIGNED");
    expect(signed.signerId).toBe("giamdoc");
    expect(signed.signatureData).toBe("sig-1");
  });

  it("locks monotonically", () => {
    const locked = lockVoucher(voucher, "FINALIZED", TS2);
    expect(canModifyVoucher(locked)).toBe(false);
    expect(canModifyVoucher(lockVoucher(locked, "MANUAL", TS2))).toBe(false);
  });
});

// ─── Batch validation ────────────────────────────────────────────────────

describe("validateEntriesBalance", () => {
  it("lists every unbalanced entry", () => {
    const ok = calculateTotals(entry([debit("1111", "5"), credit("511", "5")]));
    const bad = { ...calculateTotals(entry([debit("1111", "5")])), entryNumber: "BT/20250310/002" };
    const raw = { ...entry([]), entryNumber: "BT/20250310/003" };

    expect(validateEntriesBalance([ok, bad, raw])).toEqual({
      balanced: false,
      errors: [
        "Journal entry BT/20250310/002: total debit (5) != total credit (0)",
        "Journal entry BT/20250310/003: total debit (n/a) != total credit (n/a)",
      ],
    });
  });

  it("is balanced for an empty batch", () => {
    expect(validateEntriesBalance([])).toEqual({ balanced: true, errors: [] });
  });
});
