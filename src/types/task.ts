import { z } from 'zod';
import { Tier } from './tier.js';

export const Priority = z.enum(['low', 'medium', 'high', 'critical']);
export type Priority = z.infer<typeof Priority>;

const PRIORITY_RANK: Record<Priority, number> = { low: 0, medium: 1, high: 2, critical: 3 };

export function priorityRank(priority: Priority): number {
  return PRIORITY_RANK[priority];
}

export const TaskStatus = z.enum(['running', 'awaiting_fan_in', 'succeeded', 'failed']);
export type TaskStatus = z.infer<typeof TaskStatus>;

/** Terminal markers a task's `currentNode` may hold besides real graph nodes. */
export const SUCCEEDED_NODE = '@succeeded';
export const FAILED_NODE = '@failed';
export type TerminalMarker = typeof SUCCEEDED_NODE | typeof FAILED_NODE;

export function isTerminalMarker(node: string): node is TerminalMarker {
  return node === SUCCEEDED_NODE || node === FAILED_NODE;
}

export const Outcome = z.enum([
  'success',
  'transient_error',
  'fatal_error',
  'timeout',
  'unavailable',
  'terminal',
  'cancelled',
]);
export type Outcome = z.infer<typeof Outcome>;

export const Payload = z.record(z.unknown());
export type Payload = z.infer<typeof Payload>;

export const HistoryEntrySchema = z.object({
  nodeId: z.string(),
  timestamp: z.string().datetime(),
  outcome: Outcome,
  tier: Tier,
  agentId: z.string().optional(),
  branch: z.string().optional(),
  attempt: z.number().int().positive(),
  durationMs: z.number().nonnegative().optional(),
  error: z.string().optional(),
});
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const EscalationRecordSchema = z.object({
  kind: z.enum(['escalate', 'reset']),
  from: Tier,
  to: Tier,
  nodeId: z.string(),
  reason: z.string(),
  timestamp: z.string().datetime(),
});
export type EscalationRecord = z.infer<typeof EscalationRecordSchema>;

export const BranchStatus = z.enum(['running', 'succeeded', 'failed', 'cancelled']);
export type BranchStatus = z.infer<typeof BranchStatus>;

export const BranchStateSchema = z.object({
  branchId: z.string(),
  startNode: z.string(),
  currentNode: z.string(),
  status: BranchStatus,
  history: z.array(HistoryEntrySchema),
  retryCounts: z.record(z.number().int().nonnegative()),
  output: Payload,
  error: z.string().optional(),
});
export type BranchState = z.infer<typeof BranchStateSchema>;

export const FanOutStateSchema = z.object({
  fromNode: z.string(),
  joinNode: z.string(),
  quorum: z.number().int().positive(),
  branches: z.array(BranchStateSchema),
});
export type FanOutState = z.infer<typeof FanOutStateSchema>;

export const TaskStateSchema = z.object({
  taskId: z.string().min(1),
  payload: Payload,
  priority: Priority,
  entryNode: z.string(),
  currentNode: z.string(),
  tier: Tier,
  history: z.array(HistoryEntrySchema),
  retryCounts: z.record(z.number().int().nonnegative()),
  escalationCount: z.number().int().nonnegative(),
  escalations: z.array(EscalationRecordSchema),
  status: TaskStatus,
  fanOut: FanOutStateSchema.optional(),
  sequence: z.number().int().nonnegative(),
  slaDeadline: z.string().datetime(),
  slaBreached: z.boolean().default(false),
  failureReason: z.string().optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});
export type TaskState = z.infer<typeof TaskStateSchema>;

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'succeeded' || status === 'failed';
}

export const SubmitTaskInputSchema = z.object({
  taskId: z.string().min(1).optional(),
  entryNode: z.string().min(1),
  payload: Payload.default({}),
  priority: Priority.default('medium'),
});
export type SubmitTaskInput = z.input<typeof SubmitTaskInputSchema>;

export interface TaskHandle {
  taskId: string;
}

/** What `getStatus` reports to callers. */
export interface TaskStatusView {
  taskId: string;
  status: TaskStatus;
  currentNode: string;
  tier: Tier;
  history: HistoryEntry[];
  escalationCount: number;
  failureReason?: string;
}
