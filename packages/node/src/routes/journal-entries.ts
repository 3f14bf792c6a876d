/**
 * Journal entry routes.
 *
 * GET  /api/v1/journal-entries/:id       - Get one entry
 * POST /api/v1/journal-entries/:id/post  - Post and update account balances
 * POST /api/v1/journal-entries/:id/lock  - Lock (no unlock)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { LockSchema, PostEntrySchema } from "../types/dto.js";
import type { LockDto, PostEntryDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createJournalEntryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:id", async (c) => {
    const entry = await c.get("service").getJournalEntry(c.req.param("id"));
    return c.json({ data: entry });
  });

  routes.post("/:id/post", validateBody(PostEntrySchema), async (c) => {
    const body = c.get("validatedBody") as PostEntryDto;
    const entry = await c.get("service").postJournalEntry(
      c.req.param("id"),
      c.get("actor"),
      body.expectedVersion,
    );
    return c.json({ data: entry });
  });

  routes.post("/:id/lock", validateBody(LockSchema), async (c) => {
    const body = c.get("validatedBody") as LockDto;
    const entry = await c.get("service").lockJournalEntry(
      c.req.param("id"),
      body.lockType,
      c.get("actor"),
      body.expectedVersion,
    );
    return c.json({ data: entry });
  });

  return routes;
}
