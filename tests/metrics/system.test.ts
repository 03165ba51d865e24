import { describe, it, expect } from 'vitest';
import type { CpuInfo } from 'node:os';
import { SystemSampler } from '../../src/metrics/index.js';
import type { HostStats, SystemSampleInput } from '../../src/metrics/index.js';

function core(user: number, sys: number, idle: number): CpuInfo {
  return { model: 'test', speed: 1000, times: { user, nice: 0, sys, idle, irq: 0 } };
}

describe('SystemSampler', () => {
  it('reports the busy share since the previous sample and memory in use', () => {
    let cores = [core(100, 100, 800)];
    let free = 250;
    const host: HostStats = { cpus: () => cores, freemem: () => free, totalmem: () => 1000 };
    const recorded: SystemSampleInput[] = [];
    const sampler = new SystemSampler({ recordSystem: (s) => recorded.push(s) }, host);

    expect(sampler.sample()).toEqual({ cpuPercent: 20, memoryPercent: 75 });

    cores = [core(300, 100, 1000)];
    free = 600;
    expect(sampler.sample()).toEqual({ cpuPercent: 50, memoryPercent: 40 });
    expect(recorded).toHaveLength(2);
  });

  it('reads zero when nothing has changed', () => {
    const host: HostStats = { cpus: () => [core(1, 1, 1)], freemem: () => 0, totalmem: () => 0 };
    const sampler = new SystemSampler({ recordSystem: () => undefined }, host);
    sampler.sample();
    expect(sampler.sample()).toEqual({ cpuPercent: 0, memoryPercent: 0 });
  });
});
