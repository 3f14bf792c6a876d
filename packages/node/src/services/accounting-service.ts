/**
 * AccountingService - Composition root for one company's books.
 *
 * Route handlers delegate to this service; they never import the
 * accounting core directly. Each company gets its own AccountingService
 * instance (and repositories) for data isolation.
 *
 * Every state change follows the same cycle: load, apply a core
 * transition, save under the loaded version, append an audit entry.
 */

import { randomUUID } from "node:crypto";
import type { AccountType, LockType, Money, VoucherType } from "@socai/types";
import {
  BASE_CURRENCY,
  VND_DECIMALS,
  LedgerError,
  calculateCostOfGoodsSold,
  calculateExchangeDifference,
  calculateGeneralProvision,
  calculateSpecificProvision,
  calculateTotals,
  canModifyEntry,
  canModifyVoucher,
  classifyExchangeDifference,
  createAccount,
  createJournalEntry,
  createVoucher,
  findNegativeBalances,
  isBalanced,
  lockEntry,
  lockVoucher,
  postBalance,
  postEntry,
  reconcileInventory,
  signVoucher,
  toVnd,
  validateEntriesBalance,
  weightedAverageUnitCost,
  zeroMoney,
} from "@socai/ledger";
import type {
  Account,
  AccountRepository,
  AccountingVoucher,
  CostMethod,
  CostOfGoodsSold,
  EntriesBalanceResult,
  ExchangeDifferenceClass,
  ExchangeRate,
  GoodsDemand,
  InventoryLot,
  InventoryReconciliation,
  JournalEntry,
  JournalEntryRepository,
  NewAccount,
  Receivable,
  SpecificProvision,
  VoucherFilter,
  VoucherLineDetail,
  VoucherRepository,
} from "@socai/ledger";
import type { AuditLog } from "./audit-log.js";
import { ServiceError } from "./service-error.js";
import { formatDocumentNumber } from "./numbering.js";
import {
  InMemoryAccountRepository,
  InMemoryJournalEntryRepository,
  InMemoryVoucherRepository,
} from "./in-memory-repositories.js";

// =============================================================================
// Configuration
// =============================================================================

export interface AccountingServiceConfig {
  readonly companyCode: string;
  readonly voucherPrefix: string;
  readonly entryPrefix: string;
  readonly defaultCostMethod: CostMethod;
  /** ISO timestamp source; injectable for tests. */
  readonly clock?: (() => string) | undefined;
  /** Entity id source; injectable for tests. */
  readonly newId?: (() => string) | undefined;
}

export interface AccountingRepositories {
  readonly accounts: AccountRepository;
  readonly entries: JournalEntryRepository;
  readonly vouchers: VoucherRepository;
}

export function createInMemoryRepositories(): AccountingRepositories {
  return {
    accounts: new InMemoryAccountRepository(),
    entries: new InMemoryJournalEntryRepository(),
    vouchers: new InMemoryVoucherRepository(),
  };
}

// =============================================================================
// Inputs & Results
// =============================================================================

export interface CreateVoucherInput {
  readonly voucherType: VoucherType;
  readonly voucherDate: string;
  readonly postingDate?: string | undefined;
  readonly description: string;
  readonly descriptionDetail?: string | undefined;
  readonly documentRef?: string | undefined;
  readonly documentDate?: string | undefined;
  readonly branchCode?: string | undefined;
  readonly lines: readonly VoucherLineDetail[];
}

export interface CreatedVoucher {
  readonly voucher: AccountingVoucher;
  readonly entry: JournalEntry;
}

export interface VoucherBalanceCheck extends EntriesBalanceResult {
  readonly voucherId: string;
  readonly voucherNumber: string;
}

export interface ExchangeDifferenceResult extends ExchangeDifferenceClass {
  readonly difference: Money;
}

export interface CostOfGoodsSoldResult extends CostOfGoodsSold {
  /** Per-unit average over all lots; present for WEIGHTED_AVERAGE. */
  readonly averageUnitCost?: string | undefined;
}

export interface AccountListFilter {
  readonly pattern?: string | undefined;
  readonly type?: AccountType | undefined;
}

const ZERO_VND = zeroMoney(BASE_CURRENCY, VND_DECIMALS);

// =============================================================================
// Service
// =============================================================================

export class AccountingService {
  readonly companyCode: string;

  private readonly _config: AccountingServiceConfig;
  private readonly _repos: AccountingRepositories;
  private readonly _auditLog: AuditLog;
  private readonly _clock: () => string;
  private readonly _newId: () => string;

  constructor(
    config: AccountingServiceConfig,
    auditLog: AuditLog,
    repositories: AccountingRepositories = createInMemoryRepositories(),
  ) {
    this.companyCode = config.companyCode;
    this._config = config;
    this._repos = repositories;
    this._auditLog = auditLog;
    this._clock = config.clock ?? (() => new Date().toISOString());
    this._newId = config.newId ?? randomUUID;
  }

  // ─── Chart of Accounts ─────────────────────────────────────────────

  /**
   * Create every listed account that does not exist yet.
   * Returns the number created. Seeding is not audited.
   */
  async seedChartOfAccounts(entries: readonly NewAccount[]): Promise<number> {
    let created = 0;
    for (const entry of entries) {
      if ((await this._repos.accounts.getByCode(entry.code)) !== undefined) {
        continue;
      }
      await this._repos.accounts.save(
        createAccount({ ...entry, createdAt: this._clock() }),
        0,
      );
      created++;
    }
    return created;
  }

  async createAccount(input: NewAccount, actor: string): Promise<Account> {
    if ((await this._repos.accounts.getByCode(input.code)) !== undefined) {
      throw new ServiceError("DUPLICATE_ACCOUNT", `Account "${input.code}" already exists`, {
        accountCode: input.code,
      });
    }
    if (input.parentCode !== undefined) {
      await this._requireKnownAccount(input.parentCode);
    }

    const account = await this._repos.accounts.save(
      createAccount({ ...input, createdAt: this._clock() }),
      0,
    );

    this._audit(actor, "CREATE", "Account", account.code, undefined, {
      code: account.code,
      name: account.name,
      accountType: account.accountType,
      balanceDirection: account.balanceDirection,
      currentBalance: account.currentBalance.amount,
    });

    return account;
  }

  async getAccount(code: string): Promise<Account> {
    const account = await this._repos.accounts.getByCode(code);
    if (account === undefined) {
      throw new ServiceError("ACCOUNT_NOT_FOUND", `Account "${code}" not found`, {
        accountCode: code,
      });
    }
    return account;
  }

  async listAccounts(filter?: AccountListFilter): Promise<readonly Account[]> {
    const base =
      filter?.pattern !== undefined
        ? await this._repos.accounts.getByPattern(filter.pattern)
        : await this._repos.accounts.list();
    return filter?.type !== undefined
      ? base.filter((a) => a.accountType === filter.type)
      : base;
  }

  async negativeBalanceWarnings(): Promise<readonly string[]> {
    return findNegativeBalances(await this._repos.accounts.list());
  }

  // ─── Vouchers ──────────────────────────────────────────────────────

  /**
   * Number, balance and store a voucher with its journal entry.
   * Unbalanced input is rejected before anything is stored.
   */
  async createVoucher(input: CreateVoucherInput, actor: string): Promise<CreatedVoucher> {
    for (const line of input.lines) {
      await this._requireKnownAccount(line.accountCode);
      if (line.counterpartAccount !== undefined) {
        await this._requireKnownAccount(line.counterpartAccount);
      }
    }

    const createdAt = this._clock();
    const postingDate = input.postingDate ?? input.voucherDate;
    const voucherSeq = (await this._repos.vouchers.countByDate(input.voucherDate)) + 1;
    const entrySeq = (await this._repos.entries.getByPeriod(postingDate, postingDate)).length + 1;
    const voucherId = this._newId();
    const entryId = this._newId();

    const entry = calculateTotals(
      createJournalEntry({
        id: entryId,
        entryNumber: formatDocumentNumber(this._config.entryPrefix, postingDate, entrySeq),
        voucherId,
        entryDate: input.voucherDate,
        postingDate,
        description: input.description,
        descriptionDetail: input.descriptionDetail,
        createdBy: actor,
        createdAt,
        lines: input.lines,
      }),
    );

    if (!isBalanced(entry)) {
      throw new LedgerError(
        "NOT_BALANCED",
        `Voucher lines are not balanced: debit=${entry.totalDebit?.amount ?? "0"}, credit=${entry.totalCredit?.amount ?? "0"}`,
        {
          totalDebit: entry.totalDebit?.amount,
          totalCredit: entry.totalCredit?.amount,
          difference: entry.difference?.amount,
        },
      );
    }

    const voucher = createVoucher({
      id: voucherId,
      voucherNumber: formatDocumentNumber(this._config.voucherPrefix, input.voucherDate, voucherSeq),
      voucherType: input.voucherType,
      voucherDate: input.voucherDate,
      postingDate,
      description: input.description,
      descriptionDetail: input.descriptionDetail,
      documentRef: input.documentRef,
      documentDate: input.documentDate,
      companyCode: this.companyCode,
      branchCode: input.branchCode,
      createdBy: actor,
      createdAt,
      journalEntryIds: [entryId],
    });

    const savedEntry = await this._repos.entries.save(entry, 0);
    const savedVoucher = await this._repos.vouchers.save(voucher, 0);

    this._audit(actor, "CREATE", "AccountingVoucher", savedVoucher.id, undefined, {
      voucherNumber: savedVoucher.voucherNumber,
      voucherType: savedVoucher.voucherType,
      voucherDate: savedVoucher.voucherDate,
      journalEntryIds: savedVoucher.journalEntryIds,
    });
    this._audit(actor, "CREATE", "JournalEntry", savedEntry.id, undefined, {
      entryNumber: savedEntry.entryNumber,
      voucherId: savedEntry.voucherId,
      totalDebit: savedEntry.totalDebit?.amount,
      totalCredit: savedEntry.totalCredit?.amount,
    });

    return { voucher: savedVoucher, entry: savedEntry };
  }

  async getVoucher(id: string): Promise<AccountingVoucher> {
    const voucher = await this._repos.vouchers.getById(id);
    if (voucher === undefined) {
      throw new ServiceError("VOUCHER_NOT_FOUND", `Voucher "${id}" not found`, { voucherId: id });
    }
    return voucher;
  }

  async listVouchers(filter?: VoucherFilter): Promise<readonly AccountingVoucher[]> {
    return this._repos.vouchers.list(filter);
  }

  async getVoucherEntries(id: string): Promise<readonly JournalEntry[]> {
    const voucher = await this.getVoucher(id);
    return this._repos.entries.getByVoucher(voucher.id);
  }

  async checkVoucherBalance(id: string): Promise<VoucherBalanceCheck> {
    const voucher = await this.getVoucher(id);
    const entries = await this._repos.entries.getByVoucher(voucher.id);
    return {
      voucherId: voucher.id,
      voucherNumber: voucher.voucherNumber,
      ...validateEntriesBalance(entries),
    };
  }

  async signVoucher(
    id: string,
    signature: string,
    actor: string,
    expectedVersion?: number,
  ): Promise<AccountingVoucher> {
    const current = await this.getVoucher(id);
    this._requireOpenVoucher(current);

    const signed = signVoucher(current, actor, signature, this._clock());
    const saved = await this._repos.vouchers.save(signed, expectedVersion ?? current.version);

    this._audit(
      actor,
      "SIGN",
      "AccountingVoucher",
      id,
      { isSigned: current.isSigned, version: current.version },
      { isSigned: saved.isSigned, signerId: saved.signerId, signedAt: saved.signedAt, version: saved.version },
    );

    return saved;
  }

  async lockVoucher(
    id: string,
    lockType: LockType,
    actor: string,
    expectedVersion?: number,
  ): Promise<AccountingVoucher> {
    const current = await this.getVoucher(id);
    this._requireOpenVoucher(current);
    const locked = lockVoucher(current, lockType, this._clock());
    const saved = await this._repos.vouchers.save(locked, expectedVersion ?? current.version);

    this._audit(
      actor,
      "LOCK",
      "AccountingVoucher",
      id,
      { lockStatus: current.lockStatus, version: current.version },
      { lockStatus: saved.lockStatus, lockedAt: saved.lockedAt, version: saved.version },
    );

    return saved;
  }

  // ─── Journal Entries ───────────────────────────────────────────────

  async getJournalEntry(id: string): Promise<JournalEntry> {
    const entry = await this._repos.entries.getById(id);
    if (entry === undefined) {
      throw new ServiceError("ENTRY_NOT_FOUND", `Journal entry "${id}" not found`, { entryId: id });
    }
    return entry;
  }

  /**
   * Post an entry and apply each line to its account's running balance.
   */
  async postJournalEntry(
    id: string,
    actor: string,
    expectedVersion?: number,
  ): Promise<JournalEntry> {
    const current = await this.getJournalEntry(id);
    this._requireOpenEntry(current);
    const voucher = await this._repos.vouchers.getById(current.voucherId);
    if (voucher !== undefined) this._requireOpenVoucher(voucher);

    const posted = postEntry(current, actor, this._clock());
    for (const line of posted.lines) {
      await this._requireKnownAccount(line.accountCode);
    }
    const saved = await this._repos.entries.save(posted, expectedVersion ?? current.version);

    for (const line of saved.lines) {
      const account = await this.getAccount(line.accountCode);
      const updated = postBalance(
        account,
        line.debitAmount ?? ZERO_VND,
        line.creditAmount ?? ZERO_VND,
      );
      await this._repos.accounts.save(updated, account.version);
      this._audit(
        actor,
        "UPDATE",
        "Account",
        account.code,
        { currentBalance: account.currentBalance.amount },
        { currentBalance: updated.currentBalance.amount },
        `Posted ${saved.entryNumber}`,
      );
    }

    this._audit(
      actor,
      "POST",
      "JournalEntry",
      id,
      { isPosted: current.isPosted, version: current.version },
      { isPosted: saved.isPosted, postedAt: saved.postedAt, postedBy: saved.postedBy, version: saved.version },
    );

    return saved;
  }

  async lockJournalEntry(
    id: string,
    lockType: LockType,
    actor: string,
    expectedVersion?: number,
  ): Promise<JournalEntry> {
    const current = await this.getJournalEntry(id);
    this._requireOpenEntry(current);
    const locked = lockEntry(current, lockType, this._clock());
    const saved = await this._repos.entries.save(locked, expectedVersion ?? current.version);

    this._audit(
      actor,
      "LOCK",
      "JournalEntry",
      id,
      { lockStatus: current.lockStatus, version: current.version },
      { lockStatus: saved.lockStatus, lockedAt: saved.lockedAt, version: saved.version },
    );

    return saved;
  }

  // ─── Calculators ───────────────────────────────────────────────────

  costOfGoodsSold(
    demands: readonly GoodsDemand[],
    lots: readonly InventoryLot[],
    method: CostMethod = this._config.defaultCostMethod,
  ): CostOfGoodsSoldResult {
    const result = calculateCostOfGoodsSold(demands, lots, method);
    if (method === "WEIGHTED_AVERAGE") {
      return { ...result, averageUnitCost: weightedAverageUnitCost(lots) };
    }
    return result;
  }

  reconcileInventory(
    productCode: string,
    actualQuantity: string,
    bookQuantity: string,
    unitCost: Money,
  ): InventoryReconciliation {
    return reconcileInventory(productCode, actualQuantity, bookQuantity, unitCost);
  }

  specificProvision(receivables: readonly Receivable[], overdueDays?: number): SpecificProvision {
    return calculateSpecificProvision(receivables, overdueDays);
  }

  generalProvision(totalReceivables: Money): Money {
    return calculateGeneralProvision(totalReceivables);
  }

  convertToVnd(rate: ExchangeRate, amount: string): Money {
    return toVnd(rate, amount);
  }

  exchangeDifference(
    originalRate: ExchangeRate,
    currentRate: ExchangeRate,
    amount: string,
  ): ExchangeDifferenceResult {
    const difference = calculateExchangeDifference(originalRate, currentRate, amount);
    return { difference, ...classifyExchangeDifference(difference) };
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private async _requireKnownAccount(code: string): Promise<Account> {
    const account = await this._repos.accounts.getByCode(code);
    if (account === undefined) {
      throw new ServiceError("UNKNOWN_ACCOUNT", `Unknown account "${code}"`, { accountCode: code });
    }
    return account;
  }

  /** Locks are final: no sign, post or second lock once set. */
  private _requireOpenVoucher(voucher: AccountingVoucher): void {
    if (!canModifyVoucher(voucher)) {
      throw new ServiceError("VOUCHER_LOCKED", `Voucher "${voucher.voucherNumber}" is locked`, {
        voucherId: voucher.id,
        lockStatus: voucher.lockStatus,
      });
    }
  }

  private _requireOpenEntry(entry: JournalEntry): void {
    if (!canModifyEntry(entry)) {
      throw new ServiceError("ENTRY_LOCKED", `Journal entry "${entry.entryNumber}" is locked`, {
        entryId: entry.id,
        lockStatus: entry.lockStatus,
      });
    }
  }

  private _audit(
    actor: string,
    action: "CREATE" | "UPDATE" | "SIGN" | "LOCK" | "POST",
    entityType: "AccountingVoucher" | "JournalEntry" | "Account",
    entityId: string,
    oldValues: Record<string, unknown> | undefined,
    newValues: Record<string, unknown>,
    detail?: string,
  ): void {
    this._auditLog.append({
      companyCode: this.companyCode,
      actor,
      action,
      entityType,
      entityId,
      oldValues,
      newValues,
      detail,
    });
  }
}
