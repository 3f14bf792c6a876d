/**
 * @socai/node - Package public API.
 *
 * Importing this module never starts a server; main.ts does.
 */

export { AccountingService, createInMemoryRepositories } from "./services/accounting-service.js";
export type {
  AccountingServiceConfig,
  AccountingRepositories,
  CreateVoucherInput,
  CreatedVoucher,
  VoucherBalanceCheck,
  ExchangeDifferenceResult,
  CostOfGoodsSoldResult,
  AccountListFilter,
} from "./services/accounting-service.js";
export { CompanyRegistry } from "./services/company-registry.js";
export type { CompanyServiceDefaults } from "./services/company-registry.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery } from "./services/audit-log.js";
export { ServiceError } from "./services/service-error.js";
export type { ServiceErrorCode } from "./services/service-error.js";
export {
  InMemoryAccountRepository,
  InMemoryJournalEntryRepository,
  InMemoryVoucherRepository,
} from "./services/in-memory-repositories.js";
export { formatDocumentNumber } from "./services/numbering.js";
export {
  loadChartOfAccounts,
  ChartOfAccountsSchema,
  DEFAULT_CHART_PATH,
} from "./services/chart-of-accounts.js";
export type { ChartEntry } from "./services/chart-of-accounts.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance, AppSettings } from "./app.js";
export * from "./types/index.js";
