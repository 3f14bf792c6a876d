/**
 * @socai/ledger - Accounting voucher lifecycle.
 *
 * A voucher is signed at most once and locked monotonically.
 * There is no unlock transition.
 */

import type { LockType, VoucherType } from "@socai/types";
import type { AccountingVoucher } from "./types.js";
import { LedgerError } from "./types.js";

export interface NewVoucher {
  readonly id: string;
  readonly voucherNumber: string;
  readonly voucherType: VoucherType;
  readonly voucherDate: string;
  readonly postingDate?: string | undefined;
  readonly description: string;
  readonly descriptionDetail?: string | undefined;
  readonly documentRef?: string | undefined;
  readonly documentDate?: string | undefined;
  readonly companyCode: string;
  readonly branchCode?: string | undefined;
  readonly createdBy: string;
  readonly createdAt?: string | undefined;
  readonly journalEntryIds?: readonly string[] | undefined;
}

export function createVoucher(params: NewVoucher): AccountingVoucher {
  return {
    id: params.id,
    voucherNumber: params.voucherNumber,
    voucherType: params.voucherType,
    voucherDate: params.voucherDate,
    postingDate: params.postingDate,
    description: params.description,
    descriptionDetail: params.descriptionDetail,
    documentRef: params.documentRef,
    documentDate: params.documentDate,
    companyCode: params.companyCode,
    branchCode: params.branchCode,
    createdBy: params.createdBy,
    createdAt: params.createdAt ?? new Date().toISOString(),
    isSigned: false,
    isLocked: false,
    lockStatus: "OPEN",
    journalEntryIds: [...(params.journalEntryIds ?? [])],
    version: 1,
  };
}

/**
 * Sign a voucher. A second signature is rejected and the first is kept.
 */
export function signVoucher(
  voucher: AccountingVoucher,
  signerId: string,
  signature: string,
  timestamp: string = new Date().toISOString(),
): AccountingVoucher {
  if (voucher.isSigned) {
    throw new LedgerError(
      "ALREADY_SIGNED",
      `Voucher "${voucher.voucherNumber}" is already signed by "${voucher.signerId ?? "unknown"}"`,
      { voucherId: voucher.id, voucherNumber: voucher.voucherNumber },
    );
  }

  return {
    ...voucher,
    isSigned: true,
    signedAt: timestamp,
    signerId,
    signatureData: signature,
    version: voucher.version + 1,
  };
}

export function lockVoucher(
  voucher: AccountingVoucher,
  lockType: LockType,
  timestamp: string = new Date().toISOString(),
): AccountingVoucher {
  return {
    ...voucher,
    isLocked: true,
    lockStatus: lockType,
    lockedAt: timestamp,
    version: voucher.version + 1,
  };
}

export function canModifyVoucher(voucher: AccountingVoucher): boolean {
  return !voucher.isLocked;
}

