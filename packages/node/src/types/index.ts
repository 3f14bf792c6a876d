/**
 * Type barrel - re-exports all public types from @socai/node.
 */

// DTOs
export {
  DecimalSchema,
  AmountSchema,
  QuantitySchema,
  PositiveQuantitySchema,
  IsoDateSchema,
  AccountCodeSchema,
  MoneySchema,
  ExchangeRateSchema,
  PaginationQuerySchema,
  CreateAccountSchema,
  ListAccountsQuerySchema,
  VoucherLineSchema,
  CreateVoucherSchema,
  ListVouchersQuerySchema,
  SignVoucherSchema,
  LockSchema,
  PostEntrySchema,
  CostOfGoodsSoldSchema,
  ReconcileInventorySchema,
  SpecificProvisionSchema,
  GeneralProvisionSchema,
  ConvertCurrencySchema,
  ExchangeDifferenceSchema,
  AuditLogQuerySchema,
} from "./dto.js";
export type {
  CreateAccountDto,
  ListAccountsQuery,
  VoucherLineDto,
  CreateVoucherDto,
  ListVouchersQuery,
  SignVoucherDto,
  LockDto,
  PostEntryDto,
  CostOfGoodsSoldDto,
  ReconcileInventoryDto,
  SpecificProvisionDto,
  GeneralProvisionDto,
  ConvertCurrencyDto,
  ExchangeDifferenceDto,
  AuditLogQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
