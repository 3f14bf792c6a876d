/**
 * Structured request logging middleware.
 *
 * One entry per request, tagged with its requestId and company.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Absent on routes outside /api. */
  readonly companyCode?: string | undefined;
}

/**
 * Creates a request logging middleware.
 *
 * Logs method, path, status, and duration once the response is ready.
 * The sink decides the format; main.ts hands entries to pino.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      companyCode: c.get("companyCode"),
    };

    log(entry);
  };
}
