import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { AuditEntrySchema } from './types.js';
import type { AuditEntry, AuditQuery } from './types.js';
import { filterEntries } from './store.js';
import type { AuditStore } from './store.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonAuditStore implements AuditStore {
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  private async readAll(): Promise<AuditEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return z.array(AuditEntrySchema).parse(JSON.parse(raw));
  }

  private async writeAll(entries: AuditEntry[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(entries, null, 2) + '\n', 'utf-8');
  }

  async append(entry: AuditEntry): Promise<void> {
    // appends are read-modify-write, so run them one at a time
    const run = this.pending.then(async () => {
      const entries = await this.readAll();
      entries.push(AuditEntrySchema.parse(entry));
      await this.writeAll(entries);
    });
    this.pending = run.catch(() => undefined);
    return run;
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    return filterEntries(await this.readAll(), query);
  }

  async get(id: string): Promise<AuditEntry | undefined> {
    const entries = await this.readAll();
    return entries.find((e) => e.id === id);
  }
}
