import { z } from 'zod';
import { Tier } from './tier.js';
import type { Payload } from './task.js';

export const AgentHealth = z.enum(['healthy', 'degraded', 'unavailable']);
export type AgentHealth = z.infer<typeof AgentHealth>;

export const AgentDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  tier: Tier,
  capabilities: z.array(z.string().min(1)).min(1),
  concurrencyLimit: z.number().int().positive(),
  health: AgentHealth.default('healthy'),
});

export type AgentDescriptor = z.infer<typeof AgentDescriptorSchema>;
export type AgentDescriptorInput = z.input<typeof AgentDescriptorSchema>;

export interface AgentContext {
  taskId: string;
  nodeId: string;
  /** Frozen view of the merged payload; agents return changes in `output`. */
  payload: Readonly<Payload>;
  tier: Tier;
  deadline: Date;
  attempt: number;
  branch?: string;
  signal: AbortSignal;
}

/**
 * What an executor hands back. The orchestrator never looks inside `output`
 * beyond merging it into the payload that edge conditions read.
 */
export type AgentResult =
  | { status: 'success'; output?: Payload }
  | { status: 'transient_error'; error: string }
  | { status: 'fatal_error'; error: string }
  | { status: 'terminal'; outcome: 'succeeded' | 'failed'; output?: Payload; error?: string };

export interface AgentExecutor {
  process(context: AgentContext): Promise<AgentResult>;
}

/** Liveness probe used by the registry health check. Resolves true when healthy. */
export type HealthProbe = () => Promise<boolean>;
