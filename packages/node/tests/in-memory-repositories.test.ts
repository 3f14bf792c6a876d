/**
 * Tests for the in-memory persistence ports.
 *
 * Covers ordering, filters, and the optimistic version check.
 */

import { describe, it, expect } from "vitest";
import { createAccount, createJournalEntry, createVoucher, vnd } from "@socai/ledger";
import type { AccountingVoucher } from "@socai/ledger";
import type { VoucherType } from "@socai/types";
import {
  InMemoryAccountRepository,
  InMemoryJournalEntryRepository,
  InMemoryVoucherRepository,
} from "../src/services/in-memory-repositories.js";

const TS = "2025-03-10T09:00:00.000Z";

function voucher(id: string, voucherNumber: string, voucherDate: string, voucherType: VoucherType = "SALE"): AccountingVoucher {
  return createVoucher({
    id,
    voucherNumber,
    voucherType,
    voucherDate,
    description: "Chứng từ thử",
    companyCode: "CTY1",
    createdBy: "ketoan01",
    createdAt: TS,
  });
}

describe("InMemoryAccountRepository", () => {
  it("returns accounts ordered by code", async () => {
    const repo = new InMemoryAccountRepository();
    await repo.save(createAccount({ code: "331", name: "Phải trả", accountType: "LIABILITY" }));
    await repo.save(createAccount({ code: "1111", name: "Tiền mặt", accountType: "ASSET" }));
    await repo.save(createAccount({ code: "131", name: "Phải thu", accountType: "ASSET" }));

    const codes = (await repo.list()).map((a) => a.code);
    expect(codes).toEqual(["1111", "131", "331"]);
  });

  it("finds accounts by pattern and by type", async () => {
    const repo = new InMemoryAccountRepository();
    await repo.save(createAccount({ code: "156", name: "Hàng hóa", accountType: "ASSET" }));
    await repo.save(createAccount({ code: "1561", name: "Giá mua", accountType: "ASSET" }));
    await repo.save(createAccount({ code: "33311", name: "Thuế GTGT", accountType: "LIABILITY" }));

    expect((await repo.getByPattern("156*")).map((a) => a.code)).toEqual(["156", "1561"]);
    expect((await repo.getByPattern("3331_")).map((a) => a.code)).toEqual(["33311"]);
    expect((await repo.listByType("LIABILITY")).map((a) => a.code)).toEqual(["33311"]);
    expect(await repo.getByCode("999")).toBeUndefined();
  });

  it("accepts expectedVersion 0 only for a new account", async () => {
    const repo = new InMemoryAccountRepository();
    const cash = createAccount({ code: "1111", name: "Tiền mặt", accountType: "ASSET" });

    await repo.save(cash, 0);
    await expect(repo.save(cash, 0)).rejects.toMatchObject({
      code: "CONCURRENCY_CONFLICT",
      details: { id: "1111", expectedVersion: 0, actualVersion: 1 },
    });
  });

  it("saves unconditionally without expectedVersion", async () => {
    const repo = new InMemoryAccountRepository();
    const cash = createAccount({ code: "1111", name: "Tiền mặt", accountType: "ASSET" });
    await repo.save(cash);
    await repo.save({ ...cash, currentBalance: vnd("100"), version: 7 });

    const stored = await repo.getByCode("1111");
    expect(stored?.version).toBe(7);
    expect(stored?.currentBalance.amount).toBe("100");
  });
});

describe("InMemoryJournalEntryRepository", () => {
  const entry = (id: string, voucherId: string, postingDate: string, accountCode: string) =>
    createJournalEntry({
      id,
      entryNumber: `BT-${id}`,
      voucherId,
      entryDate: postingDate,
      description: "Bút toán thử",
      createdBy: "ketoan01",
      createdAt: TS,
      lines: [{ accountCode, description: "", debitAmount: vnd("1000") }],
    });

  it("filters by voucher, inclusive period and account", async () => {
    const repo = new InMemoryJournalEntryRepository();
    await repo.save(entry("je-1", "v-1", "2025-03-01", "131"), 0);
    await repo.save(entry("je-2", "v-2", "2025-03-15", "1111"), 0);
    await repo.save(entry("je-3", "v-2", "2025-03-31", "131"), 0);

    expect((await repo.getByVoucher("v-2")).map((e) => e.id)).toEqual(["je-2", "je-3"]);
    expect((await repo.getByPeriod("2025-03-01", "2025-03-15")).map((e) => e.id)).toEqual([
      "je-1",
      "je-2",
    ]);
    expect((await repo.getByAccount("131")).map((e) => e.id)).toEqual(["je-1", "je-3"]);
  });

  it("rejects a stale expectedVersion", async () => {
    const repo = new InMemoryJournalEntryRepository();
    const je = entry("je-1", "v-1", "2025-03-01", "131");
    await repo.save(je, 0);
    await repo.save({ ...je, version: 2 }, 1);

    await expect(repo.save({ ...je, version: 2 }, 1)).rejects.toMatchObject({
      code: "CONCURRENCY_CONFLICT",
      details: { id: "je-1", expectedVersion: 1, actualVersion: 2 },
    });
  });
});

describe("InMemoryVoucherRepository", () => {
  it("lists by date then number, with filters", async () => {
    const repo = new InMemoryVoucherRepository();
    await repo.save(voucher("v-3", "CT/20250311/001", "2025-03-11"), 0);
    await repo.save(voucher("v-2", "CT/20250310/002", "2025-03-10", "CASH_PAYMENT"), 0);
    await repo.save(voucher("v-1", "CT/20250310/001", "2025-03-10"), 0);

    expect((await repo.list()).map((v) => v.id)).toEqual(["v-1", "v-2", "v-3"]);
    expect((await repo.list({ from: "2025-03-11" })).map((v) => v.id)).toEqual(["v-3"]);
    expect((await repo.list({ to: "2025-03-10" })).map((v) => v.id)).toEqual(["v-1", "v-2"]);
    expect((await repo.list({ voucherType: "CASH_PAYMENT" })).map((v) => v.id)).toEqual(["v-2"]);
  });

  it("counts vouchers per date", async () => {
    const repo = new InMemoryVoucherRepository();
    await repo.save(voucher("v-1", "CT/20250310/001", "2025-03-10"));
    await repo.save(voucher("v-2", "CT/20250310/002", "2025-03-10"));

    expect(await repo.countByDate("2025-03-10")).toBe(2);
    expect(await repo.countByDate("2025-03-11")).toBe(0);
  });
});
