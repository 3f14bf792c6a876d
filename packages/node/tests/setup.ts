/**
 * Test helpers for @socai/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, AppSettings } from "../src/app.js";

/** Every service and audit timestamp in the test app. */
export const FIXED_NOW = "2025-03-10T09:00:00.000Z";

export const TEST_COMPANY = "TEST";
export const TEST_USER = "ketoan01";

export const TEST_SETTINGS: AppSettings = {
  DEFAULT_COMPANY_CODE: TEST_COMPANY,
  COMPANY_CODES: ["CTY2", "CTY9"],
  SEED_CHART_OF_ACCOUNTS: true,
  VOUCHER_PREFIX: "CT",
  ENTRY_PREFIX: "BT",
  DEFAULT_COST_METHOD: "FIFO",
};

/**
 * Create a test app seeded with the bundled chart of accounts.
 */
export function createTestApp(overrides?: Partial<AppSettings>): AppInstance {
  return createApp({
    config: { ...TEST_SETTINGS, ...overrides },
    clock: () => FIXED_NOW,
  });
}

/**
 * JSON request helper. Sends X-User-Id unless the caller overrides it.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      "X-User-Id": TEST_USER,
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Body for a balanced sale on credit: Dr 131 / Cr 5111.
 */
export function saleVoucher(amount: string = "1000000", voucherDate: string = "2025-03-10") {
  return {
    voucherType: "SALE",
    voucherDate,
    description: "Bán hàng cho khách lẻ",
    lines: [
      { accountCode: "131", description: "Phải thu khách hàng", debitAmount: amount },
      { accountCode: "5111", description: "Doanh thu bán hàng", creditAmount: amount },
    ],
  };
}

export interface CreatedVoucherBody {
  data: {
    voucher: { id: string; voucherNumber: string; version: number };
    entry: { id: string; entryNumber: string; version: number };
  };
}

/**
 * POST a voucher and return the created ids.
 */
export async function createVoucher(
  instance: AppInstance,
  body: unknown = saleVoucher(),
  headers?: Record<string, string>,
): Promise<CreatedVoucherBody["data"]> {
  const res = await instance.app.request(jsonRequest("/api/v1/vouchers", "POST", body, headers));
  if (res.status !== 201) {
    throw new Error(`Voucher creation failed with ${res.status}: ${await res.text()}`);
  }
  const created = (await res.json()) as CreatedVoucherBody;
  return created.data;
}
