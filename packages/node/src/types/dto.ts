/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Amounts are VND unless a currency is named; they travel as decimal
 * strings (numbers are accepted and converted).
 */

import { z } from "zod";
import {
  ACCOUNT_TYPES,
  AUDIT_ACTIONS,
  BALANCE_DIRECTIONS,
  LOCK_TYPES,
  VOUCHER_TYPES,
} from "@socai/types";
import { COST_METHODS } from "@socai/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const DecimalSchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, "Expected a decimal string");

/** Accepts "1500000" or 1500000. */
export const AmountSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .pipe(DecimalSchema);

export const QuantitySchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal string");

export const PositiveQuantitySchema = QuantitySchema.refine(
  (v) => /[1-9]/.test(v),
  "Quantity must be greater than zero",
);

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine((v) => {
    const parsed = new Date(`${v}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(v);
  }, "Not a calendar date");

export const AccountCodeSchema = z
  .string()
  .regex(/^[0-9A-Z]{1,20}$/, "Account codes are digits and capital letters");

export const MoneySchema = z.object({
  amount: DecimalSchema,
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(18),
});

export const ExchangeRateSchema = z.object({
  rate: DecimalSchema.refine((v) => !v.startsWith("-") && /[1-9]/.test(v), "Rate must be positive"),
  currency: z.string().regex(/^[A-Z]{3}$/, "Expected an ISO 4217 code"),
  rateType: z.enum(["REALTIME", "AVERAGE"]).default("REALTIME"),
  valuationDate: IsoDateSchema.optional(),
});

export const ExpectedVersionSchema = z.number().int().min(1).optional();

export const PaginationQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Account DTOs
// =============================================================================

export const CreateAccountSchema = z.object({
  code: AccountCodeSchema,
  name: z.string().min(1).max(255),
  accountType: z.enum(ACCOUNT_TYPES),
  balanceDirection: z.enum(BALANCE_DIRECTIONS).optional(),
  parentCode: AccountCodeSchema.optional(),
  isDetail: z.boolean().default(true),
  openingBalance: AmountSchema.optional(),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

export const ListAccountsQuerySchema = z.object({
  pattern: z.string().regex(/^[0-9A-Z*_]{1,20}$/, "Patterns use digits, *, and _").optional(),
  type: z.enum(ACCOUNT_TYPES).optional(),
});

export type ListAccountsQuery = z.infer<typeof ListAccountsQuerySchema>;

// =============================================================================
// Voucher DTOs
// =============================================================================

export const VoucherLineSchema = z
  .object({
    accountCode: AccountCodeSchema,
    description: z.string().max(500).default(""),
    debitAmount: AmountSchema.optional(),
    creditAmount: AmountSchema.optional(),
    counterpartAccount: AccountCodeSchema.optional(),
    quantity: DecimalSchema.optional(),
    unitPrice: AmountSchema.optional(),
    exchangeRate: ExchangeRateSchema.optional(),
    foreignAmount: MoneySchema.optional(),
    taxCode: z.string().max(20).optional(),
    taxRate: DecimalSchema.optional(),
    objectCode: z.string().max(50).optional(),
    contractCode: z.string().max(50).optional(),
  })
  .refine((line) => line.debitAmount === undefined || line.creditAmount === undefined, {
    message: "A line carries either a debit or a credit amount, not both",
    path: ["creditAmount"],
  });

export type VoucherLineDto = z.infer<typeof VoucherLineSchema>;

export const CreateVoucherSchema = z.object({
  voucherType: z.enum(VOUCHER_TYPES),
  voucherDate: IsoDateSchema,
  postingDate: IsoDateSchema.optional(),
  description: z.string().min(1).max(500),
  descriptionDetail: z.string().max(2000).optional(),
  documentRef: z.string().max(100).optional(),
  documentDate: IsoDateSchema.optional(),
  branchCode: z.string().max(32).optional(),
  lines: z.array(VoucherLineSchema).min(1),
});

export type CreateVoucherDto = z.infer<typeof CreateVoucherSchema>;

export const ListVouchersQuerySchema = PaginationQuerySchema.extend({
  from: IsoDateSchema.optional(),
  to: IsoDateSchema.optional(),
  voucherType: z.enum(VOUCHER_TYPES).optional(),
});

export type ListVouchersQuery = z.infer<typeof ListVouchersQuerySchema>;

export const SignVoucherSchema = z.object({
  signature: z.string().min(1).max(4096),
  expectedVersion: ExpectedVersionSchema,
});

export type SignVoucherDto = z.infer<typeof SignVoucherSchema>;

/** Shared by voucher and journal entry locks. */
export const LockSchema = z.object({
  lockType: z.enum(LOCK_TYPES).default("MANUAL"),
  expectedVersion: ExpectedVersionSchema,
});

export type LockDto = z.infer<typeof LockSchema>;

export const PostEntrySchema = z.object({
  expectedVersion: ExpectedVersionSchema,
});

export type PostEntryDto = z.infer<typeof PostEntrySchema>;

// =============================================================================
// Calculator DTOs
// =============================================================================

export const CostOfGoodsSoldSchema = z.object({
  method: z.enum(COST_METHODS).optional(),
  demands: z
    .array(
      z.object({
        productCode: z.string().min(1).max(50),
        quantity: PositiveQuantitySchema,
      }),
    )
    .min(1),
  lots: z.array(
    z.object({
      productCode: z.string().min(1).max(50),
      remainingQuantity: QuantitySchema,
      unitCost: AmountSchema,
      receiptDate: IsoDateSchema,
    }),
  ),
});

export type CostOfGoodsSoldDto = z.infer<typeof CostOfGoodsSoldSchema>;

export const ReconcileInventorySchema = z.object({
  productCode: z.string().min(1).max(50),
  actualQuantity: QuantitySchema,
  bookQuantity: QuantitySchema,
  unitCost: AmountSchema,
});

export type ReconcileInventoryDto = z.infer<typeof ReconcileInventorySchema>;

export const SpecificProvisionSchema = z.object({
  receivables: z.array(
    z.object({
      customerCode: z.string().max(50).optional(),
      amount: AmountSchema,
      overdueDays: z.number().int(),
    }),
  ),
  overdueDays: z.number().int().optional(),
});

export type SpecificProvisionDto = z.infer<typeof SpecificProvisionSchema>;

export const GeneralProvisionSchema = z.object({
  totalReceivables: AmountSchema,
});

export type GeneralProvisionDto = z.infer<typeof GeneralProvisionSchema>;

export const ConvertCurrencySchema = z.object({
  amount: DecimalSchema,
  rate: ExchangeRateSchema,
});

export type ConvertCurrencyDto = z.infer<typeof ConvertCurrencySchema>;

export const ExchangeDifferenceSchema = z.object({
  amount: DecimalSchema,
  originalRate: ExchangeRateSchema,
  currentRate: ExchangeRateSchema,
});

export type ExchangeDifferenceDto = z.infer<typeof ExchangeDifferenceSchema>;

// =============================================================================
// Audit DTOs
// =============================================================================

export const AuditLogQuerySchema = PaginationQuerySchema.extend({
  entityType: z.enum(["AccountingVoucher", "JournalEntry", "Account"]).optional(),
  entityId: z.string().optional(),
  actor: z.string().optional(),
  action: z.enum(AUDIT_ACTIONS).optional(),
});

export type AuditLogQueryDto = z.infer<typeof AuditLogQuerySchema>;
