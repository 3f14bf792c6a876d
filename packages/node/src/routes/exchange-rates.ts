/**
 * Exchange rate calculators.
 *
 * POST /api/v1/exchange-rates/convert     - Foreign amount → VND
 * POST /api/v1/exchange-rates/difference  - Revaluation gain (4131) or loss (4132)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ConvertCurrencySchema, ExchangeDifferenceSchema } from "../types/dto.js";
import type { ConvertCurrencyDto, ExchangeDifferenceDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createExchangeRateRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/convert", validateBody(ConvertCurrencySchema), (c) => {
    const body = c.get("validatedBody") as ConvertCurrencyDto;
    const converted = c.get("service").convertToVnd(body.rate, body.amount);
    return c.json({ data: { amount: converted } });
  });

  routes.post("/difference", validateBody(ExchangeDifferenceSchema), (c) => {
    const body = c.get("validatedBody") as ExchangeDifferenceDto;
    const result = c.get("service").exchangeDifference(
      body.originalRate,
      body.currentRate,
      body.amount,
    );
    return c.json({ data: result });
  });

  return routes;
}
