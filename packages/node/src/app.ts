/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { NewAccount } from "@socai/ledger";
import type { AppEnv } from "./types/api-contract.js";
import type { AppConfig } from "./config.js";
import { CompanyRegistry } from "./services/company-registry.js";
import { AuditLog } from "./services/audit-log.js";
import { loadChartOfAccounts } from "./services/chart-of-accounts.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { companyMiddleware } from "./middleware/company.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createVoucherRoutes } from "./routes/vouchers.js";
import { createJournalEntryRoutes } from "./routes/journal-entries.js";
import { createInventoryRoutes } from "./routes/inventory.js";
import { createProvisionRoutes } from "./routes/provisions.js";
import { createExchangeRateRoutes } from "./routes/exchange-rates.js";
import { createAuditLogRoutes } from "./routes/audit-logs.js";

// =============================================================================
// App Config
// =============================================================================

export type AppSettings = Pick<
  AppConfig,
  | "DEFAULT_COMPANY_CODE"
  | "COMPANY_CODES"
  | "SEED_CHART_OF_ACCOUNTS"
  | "VOUCHER_PREFIX"
  | "ENTRY_PREFIX"
  | "DEFAULT_COST_METHOD"
>;

export interface CreateAppOptions {
  readonly config: AppSettings;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Seed list for new companies. Defaults to the bundled chart when seeding is on. */
  readonly chartOfAccounts?: readonly NewAccount[] | undefined;
  /** ISO timestamp source for the services and the audit log. */
  readonly clock?: (() => string) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly companies: CompanyRegistry;
  readonly auditLog: AuditLog;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { config } = options;
  const auditLog = new AuditLog(options.clock);

  let chart: readonly NewAccount[] = [];
  if (config.SEED_CHART_OF_ACCOUNTS) {
    chart = options.chartOfAccounts ?? loadChartOfAccounts();
  }

  const companies = new CompanyRegistry(
    {
      voucherPrefix: config.VOUCHER_PREFIX,
      entryPrefix: config.ENTRY_PREFIX,
      defaultCostMethod: config.DEFAULT_COST_METHOD,
      clock: options.clock,
    },
    auditLog,
    [...new Set([config.DEFAULT_COMPANY_CODE, ...config.COMPANY_CODES])],
    chart,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(companies));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", companyMiddleware(companies, config.DEFAULT_COMPANY_CODE));

  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/vouchers", createVoucherRoutes());
  app.route("/api/v1/journal-entries", createJournalEntryRoutes());
  app.route("/api/v1/inventory", createInventoryRoutes());
  app.route("/api/v1/provisions", createProvisionRoutes());
  app.route("/api/v1/exchange-rates", createExchangeRateRoutes());
  app.route("/api/v1/audit-logs", createAuditLogRoutes(auditLog));

  return { app, companies, auditLog };
}
