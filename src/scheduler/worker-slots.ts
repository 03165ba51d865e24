import type { AgentDescriptor } from '../types/index.js';

/**
 * Per-agent in-flight counters. An agent with every slot taken is skipped
 * and its work waits in the ready queue.
 */
export class WorkerSlots {
  private readonly inFlight = new Map<string, number>();
  private readonly peaks = new Map<string, number>();

  hasCapacity(agent: Pick<AgentDescriptor, 'id' | 'concurrencyLimit'>): boolean {
    return this.count(agent.id) < agent.concurrencyLimit;
  }

  acquire(agentId: string): void {
    const next = this.count(agentId) + 1;
    this.inFlight.set(agentId, next);
    if (next > (this.peaks.get(agentId) ?? 0)) this.peaks.set(agentId, next);
  }

  release(agentId: string): void {
    const next = this.count(agentId) - 1;
    if (next <= 0) this.inFlight.delete(agentId);
    else this.inFlight.set(agentId, next);
  }

  count(agentId: string): number {
    return this.inFlight.get(agentId) ?? 0;
  }

  /** Highest concurrent count seen for an agent. */
  peak(agentId: string): number {
    return this.peaks.get(agentId) ?? 0;
  }

  get total(): number {
    let sum = 0;
    for (const n of this.inFlight.values()) sum += n;
    return sum;
  }
}
