import { AgentDescriptorSchema, tierRank } from '../types/index.js';
import type {
  AgentDescriptor,
  AgentDescriptorInput,
  AgentExecutor,
  AgentHealth,
  HealthProbe,
  Tier,
} from '../types/index.js';
import { AgentUnavailableError, errorMessage } from '../errors/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';

const DOWN: Record<AgentHealth, AgentHealth> = { healthy: 'degraded', degraded: 'unavailable', unavailable: 'unavailable' };
const UP: Record<AgentHealth, AgentHealth> = { healthy: 'healthy', degraded: 'healthy', unavailable: 'degraded' };

interface RegisteredAgent {
  descriptor: AgentDescriptor;
  executor: AgentExecutor;
  probe?: HealthProbe;
  consecutiveFailures: number;
  order: number;
}

export interface ResolvedAgent {
  descriptor: Readonly<AgentDescriptor>;
  executor: AgentExecutor;
  /** The capability that matched, which differs from the requested one on substitution */
  capability: string;
  viaSubstitute: boolean;
}

export interface HealthChange {
  agentId: string;
  from: AgentHealth;
  to: AgentHealth;
  reason: string;
}

export type HealthListener = (change: HealthChange) => void;

export interface AgentRegistryOptions {
  /** capability tag -> substitute tag */
  substitutes?: Record<string, string>;
  /** Consecutive failures before health drops a level */
  failureThreshold?: number;
  logger?: Logger;
}

/**
 * Holds agent descriptors and their executors. Health only changes through
 * probes and reported outcomes: a run of `failureThreshold` failures drops one
 * level, a single success lifts one level.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, RegisteredAgent>();
  private readonly listeners = new Set<HealthListener>();
  private readonly substitutes: Record<string, string>;
  private readonly failureThreshold: number;
  private readonly logger: Logger;

  constructor(opts: AgentRegistryOptions = {}) {
    this.substitutes = { ...opts.substitutes };
    this.failureThreshold = opts.failureThreshold ?? 3;
    this.logger = opts.logger ?? silentLogger;
  }

  register(input: AgentDescriptorInput, executor: AgentExecutor, probe?: HealthProbe): AgentDescriptor {
    const descriptor = AgentDescriptorSchema.parse(input);
    if (this.agents.has(descriptor.id)) {
      throw new Error(`Agent "${descriptor.id}" is already registered`);
    }
    this.agents.set(descriptor.id, {
      descriptor,
      executor,
      probe,
      consecutiveFailures: 0,
      order: this.agents.size,
    });
    this.logger.debug(`registered ${descriptor.id}`, { tier: descriptor.tier, capabilities: descriptor.capabilities });
    return { ...descriptor };
  }

  get(id: string): AgentDescriptor | undefined {
    const agent = this.agents.get(id);
    return agent ? { ...agent.descriptor, capabilities: [...agent.descriptor.capabilities] } : undefined;
  }

  list(): AgentDescriptor[] {
    return [...this.agents.values()].map((a) => ({ ...a.descriptor, capabilities: [...a.descriptor.capabilities] }));
  }

  onHealthChange(listener: HealthListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private matching(capability: string, tier: Tier): RegisteredAgent[] {
    const wanted = tierRank(tier);
    // exact tier first, then higher tiers nearest-first; never below the task's tier
    return [...this.agents.values()]
      .filter(
        (a) =>
          a.descriptor.health !== 'unavailable' &&
          tierRank(a.descriptor.tier) >= wanted &&
          a.descriptor.capabilities.includes(capability),
      )
      .sort(
        (a, b) =>
          tierRank(a.descriptor.tier) - tierRank(b.descriptor.tier) ||
          Number(a.descriptor.health === 'degraded') - Number(b.descriptor.health === 'degraded') ||
          a.order - b.order,
      );
  }

  /** Available agents for a capability, best first; falls back to the configured substitute tag. */
  candidates(capability: string, tier: Tier): ResolvedAgent[] {
    const primary = this.matching(capability, tier);
    if (primary.length > 0) {
      return primary.map((a) => ({ descriptor: a.descriptor, executor: a.executor, capability, viaSubstitute: false }));
    }
    const substitute = this.substitutes[capability];
    if (substitute === undefined || substitute === capability) return [];
    return this.matching(substitute, tier).map((a) => ({
      descriptor: a.descriptor,
      executor: a.executor,
      capability: substitute,
      viaSubstitute: true,
    }));
  }

  resolve(capability: string, tier: Tier): ResolvedAgent {
    const [best] = this.candidates(capability, tier);
    if (!best) throw new AgentUnavailableError(capability);
    return best;
  }

  /** Feed a dispatch outcome into the failure counter. */
  recordOutcome(agentId: string, ok: boolean, reason?: string): HealthChange | null {
    return this.applySignal(agentId, ok, reason ?? (ok ? 'task succeeded' : 'task failed'));
  }

  /** Probe every agent that has a probe and apply the results. */
  async healthCheck(): Promise<HealthChange[]> {
    const probed = [...this.agents.values()].filter(
      (a): a is RegisteredAgent & { probe: HealthProbe } => a.probe !== undefined,
    );
    const results = await Promise.allSettled(probed.map((a) => a.probe()));

    const changes: HealthChange[] = [];
    results.forEach((result, i) => {
      const id = probed[i].descriptor.id;
      let ok = false;
      let reason = 'probe failed';
      if (result.status === 'fulfilled') {
        ok = result.value;
        reason = ok ? 'probe succeeded' : 'probe reported unhealthy';
      } else {
        reason = `probe error: ${errorMessage(result.reason)}`;
        this.logger.warn(`health probe for ${id} threw`, { error: errorMessage(result.reason) });
      }
      const change = this.applySignal(id, ok, reason);
      if (change) changes.push(change);
    });
    return changes;
  }

  private applySignal(agentId: string, ok: boolean, reason: string): HealthChange | null {
    const agent = this.agents.get(agentId);
    if (!agent) return null;
    const from = agent.descriptor.health;
    let to = from;

    if (ok) {
      agent.consecutiveFailures = 0;
      to = UP[from];
    } else {
      agent.consecutiveFailures += 1;
      if (agent.consecutiveFailures >= this.failureThreshold) {
        agent.consecutiveFailures = 0;
        to = DOWN[from];
      }
    }

    if (to === from) return null;
    agent.descriptor = { ...agent.descriptor, health: to };
    const change: HealthChange = { agentId, from, to, reason };
    this.logger.info(`${agentId} ${from} -> ${to}`, { reason });
    for (const listener of this.listeners) listener(change);
    return change;
  }
}
