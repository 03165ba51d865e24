import type { AuditEntry, AuditQuery } from './types.js';

/**
 * Append-only audit log store interface.
 * Implementations: JsonAuditStore (local file), MemoryAuditStore.
 */
export interface AuditStore {
  /** Append a new audit entry. */
  append(entry: AuditEntry): Promise<void>;

  /** Query audit entries with optional filters, newest first. */
  query(query: AuditQuery): Promise<AuditEntry[]>;

  /** Get a single entry by ID. */
  get(id: string): Promise<AuditEntry | undefined>;
}

export function filterEntries(entries: AuditEntry[], query: AuditQuery): AuditEntry[] {
  let result = entries;
  if (query.action) result = result.filter((e) => e.action === query.action);
  if (query.taskId) result = result.filter((e) => e.taskId === query.taskId);
  if (query.agentId) result = result.filter((e) => e.agentId === query.agentId);
  const since = query.since;
  if (since) result = result.filter((e) => e.timestamp >= since);

  // Most recent first
  return [...result].sort((a, b) => b.timestamp.localeCompare(a.timestamp)).slice(0, query.limit);
}
