/**
 * Receivable provision calculators.
 *
 * POST /api/v1/provisions/specific  - Per-receivable provision by overdue band
 * POST /api/v1/provisions/general   - 1% of total receivables
 */

import { Hono } from "hono";
import { vnd } from "@socai/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { GeneralProvisionSchema, SpecificProvisionSchema } from "../types/dto.js";
import type { GeneralProvisionDto, SpecificProvisionDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createProvisionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/specific", validateBody(SpecificProvisionSchema), (c) => {
    const body = c.get("validatedBody") as SpecificProvisionDto;
    const result = c.get("service").specificProvision(
      body.receivables.map((r) => ({
        customerCode: r.customerCode,
        amount: vnd(r.amount),
        overdueDays: r.overdueDays,
      })),
      body.overdueDays,
    );
    return c.json({ data: result });
  });

  routes.post("/general", validateBody(GeneralProvisionSchema), (c) => {
    const body = c.get("validatedBody") as GeneralProvisionDto;
    const provision = c.get("service").generalProvision(vnd(body.totalReceivables));
    return c.json({ data: { provision } });
  });

  return routes;
}
