import type { ZodType } from 'zod';
import type { Condition } from '../policy/index.js';
import type { Payload, TaskState, Tier } from '../types/index.js';

export interface NodeDefinition {
  id: string;
  /** Capability tag the registry resolves an agent by */
  capability: string;
  /** Tier that owns this node */
  tier: Tier;
  maxRetries: number;
  timeoutMs: number;
  /** Payload fields that must be present when a task enters here */
  requiredFields: string[];
  /** Optional schema for the entry payload */
  input?: ZodType<Payload>;
  /** Per-tier escalation targets, overriding the graph-level ones */
  escalation: Partial<Record<Tier, string>>;
  /** Join node for a fan-out */
  fanIn: boolean;
}

export interface NodeOptions {
  tier?: Tier;
  maxRetries?: number;
  timeoutMs?: number;
  requiredFields?: string[];
  input?: ZodType<Payload>;
  escalation?: Partial<Record<Tier, string>>;
  fanIn?: boolean;
}

export type TerminalOutcome = 'succeeded' | 'failed';

export type NodeSelection =
  | { kind: 'next'; node: string }
  | { kind: 'fan_out'; branches: string[]; join: string; quorum: number }
  | { kind: 'terminal'; outcome: TerminalOutcome; reason?: string };

/** The slice of task state that edge predicates may read. */
export type RouteInput = Readonly<Pick<TaskState, 'taskId' | 'payload' | 'tier' | 'priority' | 'history'>> & {
  readonly currentNode: string;
};

export type EdgePredicate = (state: RouteInput) => NodeSelection;

export type EdgeKind = 'sequential' | 'conditional' | 'fan_out' | 'terminal' | 'custom';

export interface EdgeRule {
  from: string;
  kind: EdgeKind;
  /** Every node `select` may pick; used for validation and checked on resolve */
  targets: string[];
  /** Declared fan-out, present only when kind is 'fan_out' */
  fanOut?: { branches: string[]; join: string; quorum: number };
  select: EdgePredicate;
}

export type RouteTarget = string | { terminal: TerminalOutcome };

export interface ConditionalRoute {
  /** All must hold (AND logic) */
  when: Condition[];
  to: RouteTarget;
}
