import { describe, it, expect, vi, afterEach } from 'vitest';
import { AgentRegistry } from '../../src/registry/index.js';
import { HealthMonitor } from '../../src/health/index.js';
import { agent, executor, ok } from '../helpers.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('HealthMonitor', () => {
  it('polls the registry and reports changes', async () => {
    const registry = new AgentRegistry({ failureThreshold: 1 });
    registry.register(agent('a', ['work']), executor(() => ok()), async () => false);
    const monitor = new HealthMonitor(registry, { intervalMs: 1000 });

    const changes = await monitor.poll();
    expect(changes).toEqual([{ agentId: 'a', from: 'healthy', to: 'degraded', reason: 'probe reported unhealthy' }]);
  });

  it('probes on its interval until stopped', async () => {
    vi.useFakeTimers();
    const probe = vi.fn(async () => true);
    const registry = new AgentRegistry();
    registry.register(agent('a', ['work']), executor(() => ok()), probe);
    const monitor = new HealthMonitor(registry, { intervalMs: 1000 });

    monitor.start();
    expect(monitor.active).toBe(true);
    await vi.advanceTimersByTimeAsync(2500);
    expect(probe).toHaveBeenCalledTimes(2);

    monitor.stop();
    expect(monitor.active).toBe(false);
    await vi.advanceTimersByTimeAsync(2000);
    expect(probe).toHaveBeenCalledTimes(2);
  });
});
