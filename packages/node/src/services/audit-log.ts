/**
 * Append-only audit log of mutations made through the API.
 *
 * Each entry names the principal, what it did, the resource it did it
 * to and the transaction that carried it. In-memory only; it lives as
 * long as the sandbox.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditResourceType = "vault" | "registry" | "custody" | "asset" | "host";

export interface AuditLogEntry {
  readonly seq: number;
  readonly timestamp: string;
  readonly actor: string;
  readonly action: string;
  readonly resourceType: AuditResourceType;
  readonly resourceId: string;
  readonly transactionId?: string | undefined;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly actor?: string | undefined;
  readonly action?: string | undefined;
  readonly resourceType?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this._now = now;
  }

  append(entry: Omit<AuditLogEntry, "seq" | "timestamp">): AuditLogEntry {
    const stored: AuditLogEntry = {
      ...entry,
      seq: this._entries.length,
      timestamp: this._now().toISOString(),
    };
    this._entries.push(stored);
    return stored;
  }

  /**
   * Entries matching every given filter, newest first.
   */
  query(filter: AuditLogQuery = {}): readonly AuditLogEntry[] {
    const matches = this._entries.filter(
      (e) =>
        (filter.actor === undefined || e.actor === filter.actor) &&
        (filter.action === undefined || e.action === filter.action) &&
        (filter.resourceType === undefined || e.resourceType === filter.resourceType) &&
        (filter.resourceId === undefined || e.resourceId === filter.resourceId),
    );
    matches.reverse();
    return filter.limit !== undefined && filter.limit > 0
      ? matches.slice(0, filter.limit)
      : matches;
  }

  get size(): number {
    return this._entries.length;
  }
}
