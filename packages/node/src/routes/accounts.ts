/**
 * Chart of accounts routes.
 *
 * POST /api/v1/accounts                             - Create an account
 * GET  /api/v1/accounts                             - List (?pattern=156*&type=ASSET)
 * GET  /api/v1/accounts/warnings/negative-balances  - Critical accounts below zero
 * GET  /api/v1/accounts/:code                       - Get one account
 */

import { Hono } from "hono";
import { vnd } from "@socai/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { CreateAccountSchema, ListAccountsQuerySchema } from "../types/dto.js";
import type { CreateAccountDto } from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/accounts - Create
  routes.post("/", validateBody(CreateAccountSchema), async (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody") as CreateAccountDto;

    const account = await service.createAccount(
      {
        code: body.code,
        name: body.name,
        accountType: body.accountType,
        balanceDirection: body.balanceDirection,
        parentCode: body.parentCode,
        isDetail: body.isDetail,
        openingBalance: body.openingBalance !== undefined ? vnd(body.openingBalance) : undefined,
      },
      c.get("actor"),
    );

    return c.json({ data: account }, 201);
  });

  // GET /api/v1/accounts - List
  routes.get("/", async (c) => {
    const queryResult = ListAccountsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const accounts = await c.get("service").listAccounts(queryResult.data);
    return c.json({ data: accounts });
  });

  // GET /api/v1/accounts/warnings/negative-balances
  routes.get("/warnings/negative-balances", async (c) => {
    const warnings = await c.get("service").negativeBalanceWarnings();
    return c.json({ data: warnings });
  });

  // GET /api/v1/accounts/:code - Get one
  routes.get("/:code", async (c) => {
    const account = await c.get("service").getAccount(c.req.param("code"));
    return c.json({ data: account });
  });

  return routes;
}
