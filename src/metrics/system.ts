import { cpus, freemem, totalmem } from 'node:os';
import type { CpuInfo } from 'node:os';
import type { SystemSampleInput } from './types.js';

interface CpuTimes {
  idle: number;
  total: number;
}

export interface HostStats {
  cpus(): CpuInfo[];
  freemem(): number;
  totalmem(): number;
}

const nodeHost: HostStats = { cpus, freemem, totalmem };

function sumTimes(list: CpuInfo[]): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of list) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export interface SystemSink {
  recordSystem(sample: SystemSampleInput): void;
}

/**
 * Host CPU and memory usage. CPU is the busy share of all cores since the
 * previous sample, so the first reading covers the time since boot.
 */
export class SystemSampler {
  private last: CpuTimes;
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly sink: SystemSink,
    private readonly host: HostStats = nodeHost,
  ) {
    this.last = { idle: 0, total: 0 };
  }

  sample(): SystemSampleInput {
    const now = sumTimes(this.host.cpus());
    const total = now.total - this.last.total;
    const idle = now.idle - this.last.idle;
    this.last = now;

    const memTotal = this.host.totalmem();
    const reading: SystemSampleInput = {
      cpuPercent: total > 0 ? round1((1 - idle / total) * 100) : 0,
      memoryPercent: memTotal > 0 ? round1((1 - this.host.freemem() / memTotal) * 100) : 0,
    };
    this.sink.recordSystem(reading);
    return reading;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sample(), intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}
