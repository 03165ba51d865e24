import { randomUUID } from 'node:crypto';
import { errorMessage } from '../errors/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { AuditStore } from './store.js';
import type { AuditAction, AuditEntry } from './types.js';

export interface AuditOptions {
  taskId?: string;
  agentId?: string;
  detail?: Record<string, unknown>;
  success?: boolean;
  error?: string;
  actor?: string;
}

/** Writes audit entries; a failing store is logged and never breaks the caller. */
export class AuditLog {
  constructor(
    private readonly store: AuditStore,
    private readonly logger: Logger = silentLogger,
  ) {}

  get backingStore(): AuditStore {
    return this.store;
  }

  async record(action: AuditAction, opts: AuditOptions = {}): Promise<AuditEntry> {
    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      action,
      actor: opts.actor ?? 'scheduler',
      taskId: opts.taskId,
      agentId: opts.agentId,
      detail: opts.detail,
      success: opts.success ?? true,
      error: opts.error,
    };

    try {
      await this.store.append(entry);
    } catch (err) {
      this.logger.error(`audit write failed for ${action}`, { taskId: opts.taskId, error: errorMessage(err) });
    }
    return entry;
  }
}
