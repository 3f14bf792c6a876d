/**
 * CompanyRegistry - Maps company codes to isolated AccountingService instances.
 *
 * Each company gets its own books (accounts, vouchers, journal entries)
 * for complete data isolation. All companies share one audit log,
 * partitioned by company code. Only configured company codes are
 * served; a service is created on first use.
 */

import type { NewAccount } from "@socai/ledger";
import { AccountingService } from "./accounting-service.js";
import { ServiceError } from "./service-error.js";
import type { AccountingServiceConfig } from "./accounting-service.js";
import type { AuditLog } from "./audit-log.js";

export type CompanyServiceDefaults = Omit<AccountingServiceConfig, "companyCode">;

export class CompanyRegistry {
  private readonly _companies = new Map<string, Promise<AccountingService>>();
  private readonly _allowed: ReadonlySet<string>;
  private readonly _defaults: CompanyServiceDefaults;
  private readonly _auditLog: AuditLog;
  private readonly _chart: readonly NewAccount[];

  /**
   * @param companyCodes - Every company this registry may serve
   * @param chart - Accounts seeded into every new company; empty to skip seeding
   */
  constructor(
    defaults: CompanyServiceDefaults,
    auditLog: AuditLog,
    companyCodes: readonly string[],
    chart: readonly NewAccount[] = [],
  ) {
    this._allowed = new Set(companyCodes);
    this._defaults = defaults;
    this._auditLog = auditLog;
    this._chart = chart;
  }

  /**
   * Get or lazily create the service instance for a company.
   *
   * Concurrent first requests share one initialization. A failed
   * initialization is forgotten so the next request retries it.
   * Rejects with COMPANY_NOT_FOUND for an unconfigured code.
   */
  getOrCreate(companyCode: string): Promise<AccountingService> {
    if (!this._allowed.has(companyCode)) {
      return Promise.reject(
        new ServiceError("COMPANY_NOT_FOUND", `Company "${companyCode}" is not configured`, {
          companyCode,
        }),
      );
    }

    let pending = this._companies.get(companyCode);
    if (pending === undefined) {
      pending = this._create(companyCode);
      this._companies.set(companyCode, pending);
      void pending.catch(() => {
        if (this._companies.get(companyCode) === pending) {
          this._companies.delete(companyCode);
        }
      });
    }
    return pending;
  }

  /** Whether a service has been created for the company. */
  has(companyCode: string): boolean {
    return this._companies.has(companyCode);
  }

  companyCodes(): readonly string[] {
    return [...this._companies.keys()];
  }

  get auditLog(): AuditLog {
    return this._auditLog;
  }

  private async _create(companyCode: string): Promise<AccountingService> {
    const service = new AccountingService(
      { ...this._defaults, companyCode },
      this._auditLog,
    );
    if (this._chart.length > 0) {
      await service.seedChartOfAccounts(this._chart);
    }
    return service;
  }
}
