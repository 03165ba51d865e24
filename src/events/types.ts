import type { Outcome, Priority, Tier } from '../types/index.js';
import type { EscalationTrigger } from '../escalation/index.js';

interface EventBase {
  taskId: string;
  timestamp: string;
  tier: Tier;
}

/** Event-specific fields; the scheduler stamps taskId, timestamp and tier. */
export type SchedulerEventBody =
  | { type: 'task.submitted'; entryNode: string; priority: Priority }
  | { type: 'task.replayed'; nodeId: string; sequence: number }
  | { type: 'task.dispatched'; nodeId: string; agentId: string; attempt: number; branch?: string }
  | {
      type: 'task.node_completed';
      nodeId: string;
      agentId?: string;
      attempt: number;
      outcome: Outcome;
      durationMs: number;
      branch?: string;
      error?: string;
    }
  | { type: 'task.retry_scheduled'; nodeId: string; attempt: number; delayMs: number; branch?: string }
  | {
      type: 'task.escalated';
      nodeId: string;
      toNode: string;
      from: Tier;
      to: Tier;
      trigger: EscalationTrigger;
      reason: string;
      escalationCount: number;
    }
  | { type: 'task.tier_reset'; from: Tier; to: Tier; reason: string }
  | { type: 'task.fanned_out'; nodeId: string; branches: string[]; join: string; quorum: number }
  | { type: 'task.fanned_in'; joinNode: string; succeeded: string[]; failed: string[] }
  | { type: 'task.checkpointed'; sequence: number }
  | { type: 'task.sla_breached'; deadline: string }
  | { type: 'task.succeeded'; nodeId: string }
  | { type: 'task.failed'; nodeId: string; reason: string; escalationExhausted: boolean }
  | { type: 'task.cancelled'; reason: string };

export type SchedulerEvent = EventBase & SchedulerEventBody;

export type SchedulerEventType = SchedulerEvent['type'];

export interface EventFilter {
  taskId?: string;
  types?: SchedulerEventType[];
}

export type EventListener = (event: SchedulerEvent) => void;

export const SCHEDULER_EVENT_TYPES = [
  'task.submitted',
  'task.replayed',
  'task.dispatched',
  'task.node_completed',
  'task.retry_scheduled',
  'task.escalated',
  'task.tier_reset',
  'task.fanned_out',
  'task.fanned_in',
  'task.checkpointed',
  'task.sla_breached',
  'task.succeeded',
  'task.failed',
  'task.cancelled',
] as const satisfies readonly SchedulerEventType[];

export function isSchedulerEventType(value: string): value is SchedulerEventType {
  return SCHEDULER_EVENT_TYPES.some((t) => t === value);
}
