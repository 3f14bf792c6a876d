/**
 * Append-only audit log for recording who-did-what-when.
 *
 * The service appends one entry per state change on a voucher,
 * journal entry or account. Held in memory for the life of
 * the process.
 */

import { randomUUID } from "node:crypto";
import type { AuditAction, AuditEntityType } from "@socai/types";

// =============================================================================
// Types
// =============================================================================

export interface AuditLogEntry {
  readonly id: string;
  readonly timestamp: string;
  readonly companyCode: string;
  readonly actor: string;
  readonly action: AuditAction;
  readonly entityType: AuditEntityType;
  readonly entityId: string;
  readonly oldValues?: Readonly<Record<string, unknown>> | undefined;
  readonly newValues?: Readonly<Record<string, unknown>> | undefined;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly companyCode?: string | undefined;
  readonly actor?: string | undefined;
  readonly action?: AuditAction | undefined;
  readonly entityType?: AuditEntityType | undefined;
  readonly entityId?: string | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _clock: () => string;

  constructor(clock: () => string = () => new Date().toISOString()) {
    this._clock = clock;
  }

  /**
   * Append an entry to the audit log.
   */
  append(entry: Omit<AuditLogEntry, "id" | "timestamp">): AuditLogEntry {
    const stored: AuditLogEntry = {
      ...entry,
      id: randomUUID(),
      timestamp: this._clock(),
    };
    this._entries.push(stored);
    return stored;
  }

  /**
   * Query audit log entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.companyCode !== undefined) {
      results = results.filter((e) => e.companyCode === filter.companyCode);
    }
    if (filter?.actor !== undefined) {
      results = results.filter((e) => e.actor === filter.actor);
    }
    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.entityType !== undefined) {
      results = results.filter((e) => e.entityType === filter.entityType);
    }
    if (filter?.entityId !== undefined) {
      results = results.filter((e) => e.entityId === filter.entityId);
    }

    // Newest first
    return [...results].reverse();
  }

  /**
   * Total number of entries.
   */
  get size(): number {
    return this._entries.length;
  }
}
