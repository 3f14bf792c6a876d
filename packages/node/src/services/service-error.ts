/**
 * Errors raised by the service layer around the accounting core.
 *
 * Like LedgerError, each carries a string code that the global
 * error handler maps to an HTTP status.
 */

export type ServiceErrorCode =
  | "COMPANY_NOT_FOUND"
  | "ACCOUNT_NOT_FOUND"
  | "VOUCHER_NOT_FOUND"
  | "ENTRY_NOT_FOUND"
  | "DUPLICATE_ACCOUNT"
  | "UNKNOWN_ACCOUNT"
  | "VOUCHER_LOCKED"
  | "ENTRY_LOCKED";

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: ServiceErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
    this.details = details;
  }
}
