import { evaluateAll, matchPattern } from '../policy/index.js';
import { EscalationConfigSchema, isAbove, nextTier } from '../types/index.js';
import type { EscalationConfig, EscalationConfigInput, TaskState, Tier } from '../types/index.js';
import type { ValueThreshold } from '../policy/index.js';

/** Top-level escalation states: the three tiers plus the two terminal states. */
export type EscalationState = Tier | 'terminal_success' | 'terminal_failed';

export type EscalationTrigger = 'threshold' | 'retries_exhausted' | 'fatal' | 'agent_unavailable';

export type EscalationDecision =
  | { kind: 'none' }
  | { kind: 'escalate'; from: Tier; to: Tier; trigger: EscalationTrigger; reason: string; threshold?: ValueThreshold }
  | { kind: 'terminal'; outcome: 'succeeded' | 'failed'; reason: string; exhausted: boolean };

type PolicyView = Pick<TaskState, 'taskId' | 'tier' | 'payload' | 'escalationCount' | 'status'>;

/**
 * Decides, from task state and failure or threshold signals, whether a task
 * stays put, moves up a tier, or terminates. Pure: the scheduler applies the
 * decision and picks the node to continue at.
 */
export class EscalationPolicy {
  private readonly config: EscalationConfig;

  constructor(config: EscalationConfigInput = {}) {
    this.config = EscalationConfigSchema.parse(config);
  }

  get maxEscalations(): number {
    return this.config.maxEscalations;
  }

  thresholds(): ValueThreshold[] {
    return [...this.config.thresholds];
  }

  stateOf(task: Pick<TaskState, 'tier' | 'status'>): EscalationState {
    if (task.status === 'succeeded') return 'terminal_success';
    if (task.status === 'failed') return 'terminal_failed';
    return task.tier;
  }

  /** Value thresholds, checked after a node succeeds. First matching rule wins. */
  onNodeSuccess(task: PolicyView, nodeId: string): EscalationDecision {
    for (const threshold of this.config.thresholds) {
      if (!matchPattern(threshold.node, nodeId)) continue;
      if (!evaluateAll(threshold.conditions, task.payload)) continue;
      if (!isAbove(threshold.escalateTo, task.tier)) return { kind: 'none' };
      return this.escalate(task, threshold.escalateTo, 'threshold', threshold.description ?? `Matched threshold: ${threshold.id}`, threshold);
    }
    return { kind: 'none' };
  }

  /** A node owned by the current tier ran out of retries. */
  onRetriesExhausted(task: PolicyView, nodeId: string): EscalationDecision {
    return this.escalateOneTier(task, 'retries_exhausted', `Retries exhausted at "${nodeId}"`);
  }

  onAgentUnavailable(task: PolicyView, nodeId: string, capability: string): EscalationDecision {
    return this.escalateOneTier(task, 'agent_unavailable', `No agent for "${capability}" at "${nodeId}"`);
  }

  onFatal(task: PolicyView, nodeId: string, error: string): EscalationDecision {
    return this.escalateOneTier(task, 'fatal', `Fatal error at "${nodeId}": ${error}`);
  }

  /** An agent returned an explicit terminal marker. */
  onTerminal(outcome: 'succeeded' | 'failed', reason: string): EscalationDecision {
    return { kind: 'terminal', outcome, reason, exhausted: false };
  }

  /** The explicit transition that may lower a tier. */
  reset(task: PolicyView): { from: Tier; to: Tier } {
    return { from: task.tier, to: 'operational' };
  }

  private escalateOneTier(task: PolicyView, trigger: EscalationTrigger, reason: string): EscalationDecision {
    const to = nextTier(task.tier);
    if (to === null) {
      return { kind: 'terminal', outcome: 'failed', reason: `${reason} at the executive tier`, exhausted: false };
    }
    return this.escalate(task, to, trigger, reason);
  }

  private escalate(
    task: PolicyView,
    to: Tier,
    trigger: EscalationTrigger,
    reason: string,
    threshold?: ValueThreshold,
  ): EscalationDecision {
    if (task.escalationCount >= this.config.maxEscalations) {
      return {
        kind: 'terminal',
        outcome: 'failed',
        reason: `Escalation limit ${this.config.maxEscalations} reached (${reason})`,
        exhausted: true,
      };
    }
    return { kind: 'escalate', from: task.tier, to, trigger, reason, threshold };
  }
}
