/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (LedgerError, ServiceError) to
 * appropriate HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Money and posting errors
  CURRENCY_MISMATCH: 400,
  INVALID_AMOUNT: 400,
  NOT_BALANCED: 400,
  UNKNOWN_ACCOUNT: 400,

  // Lookups
  COMPANY_NOT_FOUND: 404,
  ACCOUNT_NOT_FOUND: 404,
  VOUCHER_NOT_FOUND: 404,
  ENTRY_NOT_FOUND: 404,

  // State conflicts
  ALREADY_POSTED: 409,
  ALREADY_SIGNED: 409,
  CONCURRENCY_CONFLICT: 409,
  DUPLICATE_ACCOUNT: 409,
  VOUCHER_LOCKED: 409,
  ENTRY_LOCKED: 409,
};

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function errorDetails(error: Error): Record<string, unknown> | undefined {
  if (!("details" in error)) return undefined;
  const { details } = error;
  if (typeof details !== "object" || details === null) return undefined;
  return Object.fromEntries(Object.entries(details));
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCode(err);
  const status = code !== undefined ? STATUS_MAP[code] : undefined;

  if (code === undefined || status === undefined) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message, errorDetails(err)), status);
}
