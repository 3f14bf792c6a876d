/**
 * Audit trail routes.
 *
 * GET /api/v1/audit-logs - Newest-first entries for the current company
 *   ?entityType=&entityId=&actor=&action=&skip=&limit=
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditLogQuerySchema } from "../types/dto.js";
import { formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import type { AuditLog } from "../services/audit-log.js";

export function createAuditLogRoutes(auditLog: AuditLog): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = AuditLogQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const entries = auditLog.query({
      companyCode: c.get("companyCode"),
      entityType: query.entityType,
      entityId: query.entityId,
      actor: query.actor,
      action: query.action,
    });

    return c.json(paginate(entries, { skip: query.skip, limit: query.limit }));
  });

  return routes;
}
