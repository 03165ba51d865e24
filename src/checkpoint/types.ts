import { z } from 'zod';
import { TaskStateSchema } from '../types/index.js';

export const CheckpointSchema = z.object({
  taskId: z.string().min(1),
  /** Strictly increasing per task */
  sequence: z.number().int().nonnegative(),
  timestamp: z.string().datetime(),
  state: TaskStateSchema,
  /** Why this snapshot was taken, e.g. "submitted", "escalated", "failed: ..." */
  reason: z.string().optional(),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;
