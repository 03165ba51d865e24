import { CheckpointError } from '../errors/index.js';
import type { Checkpoint } from './types.js';

export type SaveAction = 'write' | 'skip';

/**
 * Decide what a save should do given the checkpoints already retained. A
 * sequence older than a full retention window was written and pruned, so
 * saving it again is a no-op like any other repeat.
 */
export function planSave(existing: Checkpoint[], incoming: Checkpoint, retention = 0): SaveAction {
  const latest = existing[existing.length - 1];
  if (!latest || incoming.sequence > latest.sequence) return 'write';
  if (existing.some((c) => c.sequence === incoming.sequence)) return 'skip';
  const pruned = retention > 0 && existing.length >= retention && incoming.sequence < existing[0].sequence;
  if (pruned) return 'skip';
  throw new CheckpointError(
    `Checkpoint ${incoming.sequence} for ${incoming.taskId} is older than the latest (${latest.sequence})`,
    { taskId: incoming.taskId, sequence: incoming.sequence, latest: latest.sequence },
  );
}

/** Drop the oldest checkpoints beyond `retention`; 0 keeps everything. */
export function applyRetention(checkpoints: Checkpoint[], retention: number): Checkpoint[] {
  if (retention <= 0 || checkpoints.length <= retention) return checkpoints;
  return checkpoints.slice(checkpoints.length - retention);
}
