import type { Checkpoint } from './types.js';

/**
 * Durable task snapshots keyed by task id.
 * Implementations: MemoryCheckpointStore, JsonCheckpointStore (local files),
 * DynamoCheckpointStore (AWS).
 *
 * One writer per task id, any number of readers. Saving a sequence that is
 * already stored is a no-op; saving one below the latest is an error.
 */
export interface CheckpointStore {
  save(checkpoint: Checkpoint): Promise<void>;

  /** Latest checkpoint for a task. */
  load(taskId: string): Promise<Checkpoint | undefined>;

  /** Retained checkpoints for a task, oldest first. */
  history(taskId: string): Promise<Checkpoint[]>;

  listTasks(): Promise<string[]>;
}
