/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { LedgerError } from "@socai/ledger";
import { handleError } from "../../src/middleware/error-handler.js";
import { ServiceError } from "../../src/services/service-error.js";

function appThrowing(error: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

describe("handleError", () => {
  it("maps NOT_BALANCED to 400 with details", async () => {
    const res = await appThrowing(
      new LedgerError("NOT_BALANCED", "Voucher lines are not balanced", { difference: "5" }),
    ).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "NOT_BALANCED",
        message: "Voucher lines are not balanced",
        details: { difference: "5" },
      },
    });
  });

  it("maps lookups to 404", async () => {
    const res = await appThrowing(
      new ServiceError("VOUCHER_NOT_FOUND", 'Voucher "v-1" not found'),
    ).request("/boom");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "VOUCHER_NOT_FOUND", message: 'Voucher "v-1" not found' },
    });
  });

  it.each([
    ["ALREADY_POSTED"],
    ["ALREADY_SIGNED"],
    ["CONCURRENCY_CONFLICT"],
  ] as const)("maps %s to 409", async (code) => {
    const res = await appThrowing(new LedgerError(code, "conflict")).request("/boom");
    expect(res.status).toBe(409);
  });

  it.each([
    ["DUPLICATE_ACCOUNT"],
    ["VOUCHER_LOCKED"],
    ["ENTRY_LOCKED"],
  ] as const)("maps %s to 409", async (code) => {
    const res = await appThrowing(new ServiceError(code, "conflict")).request("/boom");
    expect(res.status).toBe(409);
  });

  it("hides the message of an unexpected error", async () => {
    const res = await appThrowing(new Error("connection string leaked")).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("treats an unmapped code as internal", async () => {
    const error = Object.assign(new Error("odd"), { code: "SOMETHING_ELSE" });
    const res = await appThrowing(error).request("/boom");

    expect(res.status).toBe(500);
  });
});
