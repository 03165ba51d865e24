import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  JsonCheckpointStore,
  MemoryCheckpointStore,
  applyRetention,
  planSave,
  restoreTaskState,
} from '../../src/checkpoint/index.js';
import { CheckpointError, NotFoundError } from '../../src/errors/index.js';
import { checkpoint } from '../helpers.js';

describe('planSave', () => {
  it('writes newer sequences, skips stored ones and rejects older ones', () => {
    const existing = [checkpoint(2), checkpoint(4)];
    expect(planSave([], checkpoint(0))).toBe('write');
    expect(planSave(existing, checkpoint(5))).toBe('write');
    expect(planSave(existing, checkpoint(4))).toBe('skip');
    expect(planSave(existing, checkpoint(2))).toBe('skip');
    expect(() => planSave(existing, checkpoint(3))).toThrow('Checkpoint 3 for t1 is older than the latest (4)');
  });

  it('skips sequences that a full retention window has pruned', () => {
    const retained = [checkpoint(2), checkpoint(4)];
    expect(planSave(retained, checkpoint(1), 2)).toBe('skip');
    expect(() => planSave(retained, checkpoint(1))).toThrow('Checkpoint 1 for t1 is older than the latest (4)');
    expect(() => planSave(retained, checkpoint(3), 2)).toThrow(CheckpointError);
  });

  it('keeps the newest checkpoints under retention', () => {
    const all = [checkpoint(1), checkpoint(2), checkpoint(3)];
    expect(applyRetention(all, 2).map((c) => c.sequence)).toEqual([2, 3]);
    expect(applyRetention(all, 0)).toHaveLength(3);
  });
});

describe('MemoryCheckpointStore', () => {
  it('retains the latest sequences and returns copies', async () => {
    const store = new MemoryCheckpointStore(2);
    for (const seq of [1, 2, 3]) await store.save(checkpoint(seq));

    expect((await store.history('t1')).map((c) => c.sequence)).toEqual([2, 3]);

    const latest = await store.load('t1');
    expect(latest?.sequence).toBe(3);
    if (latest) latest.state.payload.touched = true;
    expect((await store.load('t1'))?.state.payload).toEqual({});
  });

  it('treats a repeated save as a no-op, pruned sequences included', async () => {
    const store = new MemoryCheckpointStore(2);
    for (const seq of [1, 2, 3]) await store.save(checkpoint(seq));

    await store.save(checkpoint(3, { payload: { changed: true } }));
    await store.save(checkpoint(1, { payload: { changed: true } }));
    expect((await store.load('t1'))?.state.payload).toEqual({});
    expect((await store.history('t1')).map((c) => c.sequence)).toEqual([2, 3]);
  });

  it('refuses a sequence missing from inside the retained window', async () => {
    const store = new MemoryCheckpointStore(3);
    for (const seq of [1, 2, 4]) await store.save(checkpoint(seq));
    await expect(store.save(checkpoint(3))).rejects.toBeInstanceOf(CheckpointError);
  });

  it('lists tasks and reports unknown ones as empty', async () => {
    const store = new MemoryCheckpointStore();
    await store.save(checkpoint(0, {}, 'a'));
    await store.save(checkpoint(0, {}, 'b'));
    expect(await store.listTasks()).toEqual(['a', 'b']);
    expect(await store.load('c')).toBeUndefined();
    expect(await store.history('c')).toEqual([]);
  });
});

describe('JsonCheckpointStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tierflow-checkpoints-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('serialises concurrent saves for the same task', async () => {
    const store = new JsonCheckpointStore(dir);
    await Promise.all([1, 2, 3].map((seq) => store.save(checkpoint(seq))));
    expect((await store.history('t1')).map((c) => c.sequence)).toEqual([1, 2, 3]);
  });

  it('applies retention on disk', async () => {
    const store = new JsonCheckpointStore(dir, 1);
    await store.save(checkpoint(1));
    await store.save(checkpoint(2, { currentNode: 'qualify' }));

    const onDisk: unknown = JSON.parse(await readFile(join(dir, 't1.json'), 'utf-8'));
    expect(Array.isArray(onDisk) && onDisk.length).toBe(1);
    expect((await store.load('t1'))?.state.currentNode).toBe('qualify');
  });

  it('encodes task ids into file names', async () => {
    const store = new JsonCheckpointStore(dir);
    await store.save(checkpoint(0, {}, 'deals/acme'));
    expect(await store.listTasks()).toEqual(['deals/acme']);
    expect((await store.load('deals/acme'))?.taskId).toBe('deals/acme');
  });

  it('ignores other files and a missing directory', async () => {
    await writeFile(join(dir, 'notes.txt'), 'hello');
    expect(await new JsonCheckpointStore(dir).listTasks()).toEqual([]);
    expect(await new JsonCheckpointStore(join(dir, 'missing')).listTasks()).toEqual([]);
    expect(await new JsonCheckpointStore(dir).load('nope')).toBeUndefined();
  });
});

describe('restoreTaskState', () => {
  it('rebuilds state from the latest checkpoint', async () => {
    const store = new MemoryCheckpointStore();
    await store.save(checkpoint(4, { currentNode: 'propose', tier: 'management', escalationCount: 1 }));

    const state = await restoreTaskState(store, 't1');
    expect(state).toMatchObject({ currentNode: 'propose', tier: 'management', escalationCount: 1, sequence: 4 });
  });

  it('fails for tasks without checkpoints', async () => {
    await expect(restoreTaskState(new MemoryCheckpointStore(), 'ghost')).rejects.toBeInstanceOf(NotFoundError);
  });
});
