/**
 * Tests for the audit trail route.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, createVoucher, jsonRequest, FIXED_NOW, TEST_USER } from "../setup.js";
import type { AppInstance } from "../../src/app.js";

interface AuditBody {
  data: {
    action: string;
    entityType: string;
    entityId: string;
    actor: string;
    companyCode: string;
    timestamp: string;
  }[];
  pagination: { total: number; hasMore: boolean };
}

let instance: AppInstance;
let voucherId: string;
let entryId: string;

beforeEach(async () => {
  instance = createTestApp();
  const created = await createVoucher(instance);
  voucherId = created.voucher.id;
  entryId = created.entry.id;
  await instance.app.request(jsonRequest(`/api/v1/journal-entries/${entryId}/post`, "POST"));
});

async function audit(query: string, headers?: Record<string, string>): Promise<AuditBody> {
  const res = await instance.app.request(jsonRequest(`/api/v1/audit-logs${query}`, "GET", undefined, headers));
  return (await res.json()) as AuditBody;
}

describe("GET /api/v1/audit-logs", () => {
  it("returns the company's trail newest-first", async () => {
    const body = await audit("");

    expect(body.pagination.total).toBe(5);
    expect(body.data.map((e) => e.action)).toEqual(["POST", "UPDATE", "UPDATE", "CREATE", "CREATE"]);
    expect(body.data[0]).toMatchObject({
      entityType: "JournalEntry",
      entityId: entryId,
      actor: TEST_USER,
      companyCode: "TEST",
      timestamp: FIXED_NOW,
    });
  });

  it("filters by entity type, entity id and action", async () => {
    expect((await audit("?entityType=Account")).data.map((e) => e.entityId)).toEqual(["5111", "131"]);
    expect((await audit(`?entityId=${voucherId}`)).data.map((e) => e.action)).toEqual(["CREATE"]);
    expect((await audit("?action=CREATE")).pagination.total).toBe(2);
    expect((await audit(`?actor=${TEST_USER}`)).pagination.total).toBe(5);
  });

  it("paginates", async () => {
    const body = await audit("?limit=2");

    expect(body.data).toHaveLength(2);
    expect(body.pagination.hasMore).toBe(true);
  });

  it("hides other companies' entries", async () => {
    const body = await audit("", { "X-Company-Code": "CTY2" });

    expect(body.pagination.total).toBe(0);
  });

  it("returns 400 for an unknown action", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/audit-logs?action=APPROVE"));

    expect(res.status).toBe(400);
  });
});
