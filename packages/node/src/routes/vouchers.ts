/**
 * Accounting voucher routes.
 *
 * POST /api/v1/vouchers                    - Create a voucher and its journal entry
 * GET  /api/v1/vouchers                    - List (date range, type, offset pagination)
 * GET  /api/v1/vouchers/:id                - Get one voucher
 * GET  /api/v1/vouchers/:id/entries        - Journal entries of a voucher
 * GET  /api/v1/vouchers/:id/balance-check  - Debit/credit check over its entries
 * POST /api/v1/vouchers/:id/sign           - Sign (once)
 * POST /api/v1/vouchers/:id/lock           - Lock (no unlock)
 */

import { Hono } from "hono";
import { money, vnd } from "@socai/ledger";
import type { VoucherLineDetail } from "@socai/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateVoucherSchema,
  ListVouchersQuerySchema,
  LockSchema,
  SignVoucherSchema,
} from "../types/dto.js";
import type {
  CreateVoucherDto,
  LockDto,
  SignVoucherDto,
  VoucherLineDto,
} from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

function toLineDetail(line: VoucherLineDto): VoucherLineDetail {
  return {
    accountCode: line.accountCode,
    description: line.description,
    debitAmount: line.debitAmount !== undefined ? vnd(line.debitAmount) : undefined,
    creditAmount: line.creditAmount !== undefined ? vnd(line.creditAmount) : undefined,
    counterpartAccount: line.counterpartAccount,
    quantity: line.quantity,
    unitPrice: line.unitPrice !== undefined ? vnd(line.unitPrice) : undefined,
    exchangeRate: line.exchangeRate,
    foreignAmount:
      line.foreignAmount !== undefined
        ? money(line.foreignAmount.amount, line.foreignAmount.currency, line.foreignAmount.decimals)
        : undefined,
    taxCode: line.taxCode,
    taxRate: line.taxRate,
    objectCode: line.objectCode,
    contractCode: line.contractCode,
  };
}

export function createVoucherRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/vouchers - Create
  routes.post("/", validateBody(CreateVoucherSchema), async (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody") as CreateVoucherDto;

    const created = await service.createVoucher(
      {
        voucherType: body.voucherType,
        voucherDate: body.voucherDate,
        postingDate: body.postingDate,
        description: body.description,
        descriptionDetail: body.descriptionDetail,
        documentRef: body.documentRef,
        documentDate: body.documentDate,
        branchCode: body.branchCode,
        lines: body.lines.map(toLineDetail),
      },
      c.get("actor"),
    );

    return c.json({ data: created }, 201);
  });

  // GET /api/v1/vouchers - List
  routes.get("/", async (c) => {
    const queryResult = ListVouchersQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const vouchers = await c.get("service").listVouchers({
      from: query.from,
      to: query.to,
      voucherType: query.voucherType,
    });

    return c.json(paginate(vouchers, { skip: query.skip, limit: query.limit }));
  });

  // GET /api/v1/vouchers/:id - Get one
  routes.get("/:id", async (c) => {
    const voucher = await c.get("service").getVoucher(c.req.param("id"));
    return c.json({ data: voucher });
  });

  // GET /api/v1/vouchers/:id/entries
  routes.get("/:id/entries", async (c) => {
    const entries = await c.get("service").getVoucherEntries(c.req.param("id"));
    return c.json({ data: entries });
  });

  // GET /api/v1/vouchers/:id/balance-check
  routes.get("/:id/balance-check", async (c) => {
    const check = await c.get("service").checkVoucherBalance(c.req.param("id"));
    return c.json({ data: check });
  });

  // POST /api/v1/vouchers/:id/sign
  routes.post("/:id/sign", validateBody(SignVoucherSchema), async (c) => {
    const body = c.get("validatedBody") as SignVoucherDto;
    const voucher = await c.get("service").signVoucher(
      c.req.param("id"),
      body.signature,
      c.get("actor"),
      body.expectedVersion,
    );
    return c.json({ data: voucher });
  });

  // POST /api/v1/vouchers/:id/lock
  routes.post("/:id/lock", validateBody(LockSchema), async (c) => {
    const body = c.get("validatedBody") as LockDto;
    const voucher = await c.get("service").lockVoucher(
      c.req.param("id"),
      body.lockType,
      c.get("actor"),
      body.expectedVersion,
    );
    return c.json({ data: voucher });
  });

  return routes;
}
