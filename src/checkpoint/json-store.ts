import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { CheckpointSchema } from './types.js';
import type { Checkpoint } from './types.js';
import type { CheckpointStore } from './store.js';
import { applyRetention, planSave } from './ordering.js';

const FILE_SUFFIX = '.json';
const CheckpointsFileSchema = z.array(CheckpointSchema);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON file per task holding its retained checkpoints. Each write goes to
 * a temp file that is renamed over the original.
 */
export class JsonCheckpointStore implements CheckpointStore {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    private readonly dir: string,
    private readonly retention = 0,
  ) {}

  private fileFor(taskId: string): string {
    return join(this.dir, encodeURIComponent(taskId) + FILE_SUFFIX);
  }

  private async readAll(taskId: string): Promise<Checkpoint[]> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(taskId), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return CheckpointsFileSchema.parse(JSON.parse(raw));
  }

  private async writeAll(taskId: string, checkpoints: Checkpoint[]): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.fileFor(taskId);
    const tmp = `${target}.${randomUUID()}.tmp`;
    await writeFile(tmp, JSON.stringify(checkpoints, null, 2) + '\n', 'utf-8');
    await rename(tmp, target);
  }

  /** Serialise writes per task id. */
  private withLock<T>(taskId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(taskId) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(taskId, settled);
    void settled.then(() => {
      if (this.locks.get(taskId) === settled) this.locks.delete(taskId);
    });
    return run;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const validated = CheckpointSchema.parse(checkpoint);
    await this.withLock(validated.taskId, async () => {
      const existing = await this.readAll(validated.taskId);
      if (planSave(existing, validated, this.retention) === 'skip') return;
      await this.writeAll(validated.taskId, applyRetention([...existing, validated], this.retention));
    });
  }

  async load(taskId: string): Promise<Checkpoint | undefined> {
    const all = await this.readAll(taskId);
    return all[all.length - 1];
  }

  async history(taskId: string): Promise<Checkpoint[]> {
    return this.readAll(taskId);
  }

  async listTasks(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return names
      .filter((n) => n.endsWith(FILE_SUFFIX))
      .map((n) => decodeURIComponent(n.slice(0, -FILE_SUFFIX.length)));
  }
}
