/**
 * Health check route.
 *
 * GET /health - Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CompanyRegistry } from "../services/company-registry.js";

export function createHealthRoutes(registry: CompanyRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      companies: registry.companyCodes().length,
      auditEntries: registry.auditLog.size,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
