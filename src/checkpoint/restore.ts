import { TaskStateSchema } from '../types/index.js';
import type { TaskState } from '../types/index.js';
import { NotFoundError } from '../errors/index.js';
import type { CheckpointStore } from './store.js';

/** Rebuild a task's state from its latest checkpoint. */
export async function restoreTaskState(store: CheckpointStore, taskId: string): Promise<TaskState> {
  const latest = await store.load(taskId);
  if (!latest) throw new NotFoundError(`No checkpoint for task ${taskId}`);
  return TaskStateSchema.parse({ ...latest.state, sequence: latest.sequence });
}
