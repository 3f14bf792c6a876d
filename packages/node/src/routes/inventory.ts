/**
 * Inventory calculators. Stateless: nothing is stored.
 *
 * POST /api/v1/inventory/cost-of-goods-sold  - FIFO, LIFO or weighted average
 * POST /api/v1/inventory/reconcile           - Count vs. book difference
 */

import { Hono } from "hono";
import { vndUnitCost } from "@socai/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { CostOfGoodsSoldSchema, ReconcileInventorySchema } from "../types/dto.js";
import type { CostOfGoodsSoldDto, ReconcileInventoryDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createInventoryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // Method defaults to DEFAULT_COST_METHOD when the body names none
  routes.post("/cost-of-goods-sold", validateBody(CostOfGoodsSoldSchema), (c) => {
    const body = c.get("validatedBody") as CostOfGoodsSoldDto;
    const result = c.get("service").costOfGoodsSold(
      body.demands,
      body.lots.map((lot) => ({ ...lot, unitCost: vndUnitCost(lot.unitCost) })),
      body.method,
    );
    return c.json({ data: result });
  });

  routes.post("/reconcile", validateBody(ReconcileInventorySchema), (c) => {
    const body = c.get("validatedBody") as ReconcileInventoryDto;
    const result = c.get("service").reconcileInventory(
      body.productCode,
      body.actualQuantity,
      body.bookQuantity,
      vndUnitCost(body.unitCost),
    );
    return c.json({ data: result });
  });

  return routes;
}
