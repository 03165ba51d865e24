import type { AuditEntry, AuditQuery } from './types.js';
import { filterEntries } from './store.js';
import type { AuditStore } from './store.js';

export class MemoryAuditStore implements AuditStore {
  private readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    return filterEntries(this.entries, query);
  }

  async get(id: string): Promise<AuditEntry | undefined> {
    return this.entries.find((e) => e.id === id);
  }

  all(): AuditEntry[] {
    return [...this.entries];
  }
}
