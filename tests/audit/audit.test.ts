import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AuditLog, JsonAuditStore, MemoryAuditStore, filterEntries } from '../../src/audit/index.js';
import type { AuditEntry, AuditStore } from '../../src/audit/index.js';
import type { Logger } from '../../src/log/index.js';

function entry(n: number, overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    id: `00000000-0000-4000-8000-00000000000${n}`,
    timestamp: new Date(Date.UTC(2026, 2, 1, 10, n)).toISOString(),
    action: 'task.submit',
    actor: 'scheduler',
    taskId: `t${n}`,
    success: true,
    ...overrides,
  };
}

describe('filterEntries', () => {
  const entries = [
    entry(1),
    entry(2, { action: 'task.escalate', taskId: 't1' }),
    entry(3, { action: 'agent.health', taskId: undefined, agentId: 'closer' }),
    entry(4, { action: 'task.fail', taskId: 't1', success: false }),
  ];

  it('returns newest first up to the limit', () => {
    expect(filterEntries(entries, { limit: 2 }).map((e) => e.id)).toEqual([entries[3].id, entries[2].id]);
  });

  it('filters by action, task, agent and start time', () => {
    expect(filterEntries(entries, { taskId: 't1', limit: 50 }).map((e) => e.action)).toEqual([
      'task.fail',
      'task.escalate',
      'task.submit',
    ]);
    expect(filterEntries(entries, { action: 'task.escalate', limit: 50 })).toEqual([entries[1]]);
    expect(filterEntries(entries, { agentId: 'closer', limit: 50 })).toEqual([entries[2]]);
    expect(filterEntries(entries, { since: entries[2].timestamp, limit: 50 })).toEqual([entries[3], entries[2]]);
  });
});

describe('MemoryAuditStore', () => {
  it('appends, queries and looks up by id', async () => {
    const store = new MemoryAuditStore();
    await store.append(entry(1));
    await store.append(entry(2, { taskId: 't1' }));

    expect((await store.query({ taskId: 't1', limit: 50 })).map((e) => e.id)).toEqual([entry(2).id, entry(1).id]);
    expect(await store.get(entry(2).id)).toMatchObject({ taskId: 't1' });
    expect(await store.get('missing')).toBeUndefined();
  });
});

describe('JsonAuditStore', () => {
  it('keeps every concurrent append on disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tierflow-audit-'));
    try {
      const path = join(dir, 'nested', 'audit.json');
      const store = new JsonAuditStore(path);
      expect(await store.query({ limit: 50 })).toEqual([]);

      await Promise.all([store.append(entry(1)), store.append(entry(2)), store.append(entry(3))]);

      expect((await store.query({ limit: 50 })).map((e) => e.taskId)).toEqual(['t3', 't2', 't1']);
      expect(await store.get(entry(2).id)).toEqual(entry(2));
      const onDisk: unknown = JSON.parse(await readFile(path, 'utf-8'));
      expect(Array.isArray(onDisk) && onDisk.length).toBe(3);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects entries that do not match the schema', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tierflow-audit-'));
    try {
      const store = new JsonAuditStore(join(dir, 'audit.json'));
      await expect(store.append(entry(1, { id: 'not-a-uuid' }))).rejects.toThrow();
      await store.append(entry(2));
      expect(await store.query({ limit: 50 })).toEqual([entry(2)]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('AuditLog', () => {
  it('fills in defaults when recording', async () => {
    const store = new MemoryAuditStore();
    const log = new AuditLog(store);
    const recorded = await log.record('task.cancel', { taskId: 'deal-1', detail: { reason: 'duplicate' } });

    expect(recorded).toMatchObject({
      action: 'task.cancel',
      actor: 'scheduler',
      taskId: 'deal-1',
      success: true,
      detail: { reason: 'duplicate' },
    });
    expect(store.all()).toEqual([recorded]);
    expect(log.backingStore).toBe(store);
  });

  it('logs and carries on when the store fails', async () => {
    const broken: AuditStore = {
      append: () => Promise.reject(new Error('disk full')),
      query: async () => [],
      get: async () => undefined,
    };
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => logger,
    };

    const recorded = await new AuditLog(broken, logger).record('task.fail', { taskId: 'deal-1', success: false });

    expect(recorded.success).toBe(false);
    expect(logger.error).toHaveBeenCalledWith('audit write failed for task.fail', { taskId: 'deal-1', error: 'disk full' });
  });
});
