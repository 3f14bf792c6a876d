/**
 * Middleware barrel - re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  companyMiddleware,
  COMPANY_HEADER,
  USER_HEADER,
  DEFAULT_ACTOR,
} from "./company.js";
