/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createVoucherRoutes } from "./vouchers.js";
export { createJournalEntryRoutes } from "./journal-entries.js";
export { createInventoryRoutes } from "./inventory.js";
export { createProvisionRoutes } from "./provisions.js";
export { createExchangeRateRoutes } from "./exchange-rates.js";
export { createAuditLogRoutes } from "./audit-logs.js";
