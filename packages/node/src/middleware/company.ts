/**
 * Company resolution middleware.
 *
 * Resolves the company the request operates on from the
 * X-Company-Code header (or the configured default) and the acting
 * user from X-User-Id, then provides that company's AccountingService
 * via c.set("service"). Codes outside the configured list are
 * rejected by the registry with COMPANY_NOT_FOUND.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CompanyRegistry } from "../services/company-registry.js";
import { createErrorEnvelope } from "../types/error.js";
import { COMPANY_CODE_PATTERN } from "../config.js";

export const COMPANY_HEADER = "X-Company-Code";
export const USER_HEADER = "X-User-Id";

/** Actor recorded when the request names no user. */
export const DEFAULT_ACTOR = "system";

export function companyMiddleware(
  registry: CompanyRegistry,
  defaultCompanyCode: string,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const companyCode = c.req.header(COMPANY_HEADER) ?? defaultCompanyCode;
    if (!COMPANY_CODE_PATTERN.test(companyCode)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid ${COMPANY_HEADER} header`),
        400,
      );
    }

    const actor = c.req.header(USER_HEADER)?.trim() || DEFAULT_ACTOR;

    c.set("companyCode", companyCode);
    c.set("actor", actor);
    c.set("service", await registry.getOrCreate(companyCode));
    return next();
  };
}
