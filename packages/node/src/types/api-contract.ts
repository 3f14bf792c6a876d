/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AccountingService } from "../services/accounting-service.js";

/**
 * Hono environment type for the service.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Company the request operates on (set by company middleware) */
    companyCode: string;

    /** User recorded in the audit trail (set by company middleware) */
    actor: string;

    /** Resolved AccountingService for the current company */
    service: AccountingService;

    /** Parsed request body (set by validateBody) */
    validatedBody: unknown;
  };
}
