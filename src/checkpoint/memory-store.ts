import type { CheckpointStore } from './store.js';
import type { Checkpoint } from './types.js';
import { applyRetention, planSave } from './ordering.js';

export class MemoryCheckpointStore implements CheckpointStore {
  private readonly byTask = new Map<string, Checkpoint[]>();

  constructor(private readonly retention = 0) {}

  async save(checkpoint: Checkpoint): Promise<void> {
    const existing = this.byTask.get(checkpoint.taskId) ?? [];
    if (planSave(existing, checkpoint, this.retention) === 'skip') return;
    this.byTask.set(checkpoint.taskId, applyRetention([...existing, structuredClone(checkpoint)], this.retention));
  }

  async load(taskId: string): Promise<Checkpoint | undefined> {
    const list = this.byTask.get(taskId);
    const latest = list?.[list.length - 1];
    return latest ? structuredClone(latest) : undefined;
  }

  async history(taskId: string): Promise<Checkpoint[]> {
    return (this.byTask.get(taskId) ?? []).map((c) => structuredClone(c));
  }

  async listTasks(): Promise<string[]> {
    return [...this.byTask.keys()];
  }
}
