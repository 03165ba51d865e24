import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { MetricsConfigSchema } from '../types/index.js';
import type { MetricsWindow, TaskState } from '../types/index.js';
import { ValidationError } from '../errors/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { EventFilter, EventListener, SchedulerEvent } from '../events/index.js';
import type { Alert } from '../alerting/index.js';
import { bucketDurations } from './histogram.js';
import type { CampaignRepository, ClientRepository } from './repositories.js';
import type {
  AgentSample,
  AgentWindowStats,
  BusinessStats,
  HttpWindowStats,
  MetricsSnapshot,
  RequestSampleInput,
  SystemSampleInput,
  SystemWindowStats,
  TaskMark,
  TaskWindowStats,
  TimeRange,
} from './types.js';

const SLOW_REQUEST_MS = 5000;

interface Timed<T> {
  timestamp: number;
  value: T;
}

export interface MetricsCollectorOptions {
  windows?: MetricsWindow[];
  clients?: ClientRepository;
  campaigns?: CampaignRepository;
  logger?: Logger;
  clock?: () => number;
}

/** Anything events can be subscribed from: the scheduler or a bare EventBus. */
export interface EventSource {
  subscribe(filter: EventFilter, listener: EventListener): () => void;
}

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

function within<T extends { timestamp: number }>(items: T[], range: TimeRange): T[] {
  return items.filter((i) => i.timestamp > range.start && i.timestamp <= range.end);
}

/**
 * Aggregates scheduler events and external samples over named sliding
 * windows. Samples older than the longest window are dropped.
 */
export class MetricsCollector {
  private readonly windows: MetricsWindow[];
  private readonly clients?: ClientRepository;
  private readonly campaigns?: CampaignRepository;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly startedAt: number;

  private agentSamples: AgentSample[] = [];
  private taskMarks: Array<Timed<TaskMark>> = [];
  private systemSamples: Array<Timed<SystemSampleInput>> = [];
  private requestSamples: Array<Timed<RequestSampleInput>> = [];

  constructor(opts: MetricsCollectorOptions = {}) {
    this.windows = opts.windows ?? MetricsConfigSchema.parse({}).windows;
    this.clients = opts.clients;
    this.campaigns = opts.campaigns;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? Date.now;
    this.startedAt = this.clock();
  }

  /** Start consuming scheduler events; returns the unsubscribe function. */
  attach(source: EventSource): () => void {
    return source.subscribe({}, (event) => this.record(event));
  }

  record(event: SchedulerEvent): void {
    const timestamp = this.clock();
    switch (event.type) {
      case 'task.node_completed':
        if (event.agentId === undefined) break;
        this.agentSamples.push({
          agentId: event.agentId,
          taskId: event.taskId,
          nodeId: event.nodeId,
          outcome: event.outcome,
          ok: event.outcome === 'success' || event.outcome === 'terminal',
          durationMs: event.durationMs,
          timestamp,
        });
        break;
      case 'task.submitted':
        this.taskMarks.push({ timestamp, value: 'submitted' });
        break;
      case 'task.succeeded':
        this.taskMarks.push({ timestamp, value: 'succeeded' });
        break;
      case 'task.failed':
        this.taskMarks.push({ timestamp, value: 'failed' });
        break;
      case 'task.escalated':
        this.taskMarks.push({ timestamp, value: 'escalated' });
        break;
      case 'task.sla_breached':
        this.taskMarks.push({ timestamp, value: 'sla_breached' });
        break;
      default:
        return;
    }
    this.prune(timestamp);
  }

  /**
   * Load a persisted task, using the timestamps it recorded rather than the
   * clock. Lets metrics be rebuilt from checkpoints.
   */
  ingestTask(state: TaskState): void {
    for (const entry of state.history) {
      if (entry.agentId === undefined) continue;
      this.agentSamples.push({
        agentId: entry.agentId,
        taskId: state.taskId,
        nodeId: entry.nodeId,
        outcome: entry.outcome,
        ok: entry.outcome === 'success' || entry.outcome === 'terminal',
        durationMs: entry.durationMs ?? 0,
        timestamp: Date.parse(entry.timestamp),
      });
    }
    this.taskMarks.push({ timestamp: Date.parse(state.createdAt), value: 'submitted' });
    for (const escalation of state.escalations) {
      if (escalation.kind === 'escalate') {
        this.taskMarks.push({ timestamp: Date.parse(escalation.timestamp), value: 'escalated' });
      }
    }
    if (state.status === 'succeeded' || state.status === 'failed') {
      this.taskMarks.push({ timestamp: Date.parse(state.updatedAt), value: state.status });
    }

    const byTime = (a: { timestamp: number }, b: { timestamp: number }) => a.timestamp - b.timestamp;
    this.agentSamples.sort(byTime);
    this.taskMarks.sort(byTime);
    this.prune(this.clock());
  }

  recordSystem(sample: SystemSampleInput): void {
    const timestamp = this.clock();
    this.systemSamples.push({ timestamp, value: { ...sample } });
    this.prune(timestamp);
  }

  recordRequest(sample: RequestSampleInput): void {
    const timestamp = this.clock();
    if (sample.durationMs > SLOW_REQUEST_MS) {
      this.logger.warn(`slow request ${sample.method} ${sample.path}`, {
        durationMs: sample.durationMs,
        statusCode: sample.statusCode,
      });
    }
    this.requestSamples.push({ timestamp, value: { ...sample } });
    this.prune(timestamp);
  }

  timeframes(): string[] {
    return this.windows.map((w) => w.name);
  }

  windowMs(timeframe: string): number {
    const window = this.windows.find((w) => w.name === timeframe);
    if (!window) {
      throw new ValidationError(`Unknown timeframe "${timeframe}"`, [`expected one of: ${this.timeframes().join(', ')}`]);
    }
    return window.durationMs;
  }

  /** The trailing range `timeframe` covers, ending now. */
  rangeFor(timeframe: string): TimeRange {
    const end = this.clock();
    return { start: end - this.windowMs(timeframe), end };
  }

  agentStats(range: TimeRange): AgentWindowStats[] {
    const byAgent = new Map<string, AgentSample[]>();
    for (const sample of within(this.agentSamples, range)) {
      const list = byAgent.get(sample.agentId) ?? [];
      list.push(sample);
      byAgent.set(sample.agentId, list);
    }

    return [...byAgent.entries()]
      .map(([agentId, samples]): AgentWindowStats => {
        const successCount = samples.filter((s) => s.ok).length;
        const taskCount = samples.length;
        const successRate = taskCount === 0 ? 0 : successCount / taskCount;
        const durations = samples.map((s) => s.durationMs);
        return {
          agentId,
          taskCount,
          successCount,
          failureCount: taskCount - successCount,
          successRate,
          averageDurationMs: average(durations),
          performanceScore: successRate * taskCount,
          histogram: bucketDurations(durations),
        };
      })
      .sort((a, b) => a.agentId.localeCompare(b.agentId));
  }

  systemStats(range: TimeRange): SystemWindowStats {
    const samples = within(this.systemSamples, range).map((s) => s.value);
    const cpu = samples.map((s) => s.cpuPercent);
    const memory = samples.map((s) => s.memoryPercent);
    return {
      samples: samples.length,
      avgCpuPercent: average(cpu),
      maxCpuPercent: cpu.length === 0 ? 0 : Math.max(...cpu),
      avgMemoryPercent: average(memory),
      maxMemoryPercent: memory.length === 0 ? 0 : Math.max(...memory),
    };
  }

  httpStats(range: TimeRange): HttpWindowStats {
    const samples = within(this.requestSamples, range).map((s) => s.value);
    const errors = samples.filter((s) => s.statusCode >= 400).length;
    return {
      requests: samples.length,
      errors,
      errorRate: samples.length === 0 ? 0 : errors / samples.length,
      averageDurationMs: average(samples.map((s) => s.durationMs)),
    };
  }

  taskStats(range: TimeRange): TaskWindowStats {
    const stats: TaskWindowStats = { submitted: 0, succeeded: 0, failed: 0, escalated: 0, sla_breached: 0 };
    for (const mark of within(this.taskMarks, range)) stats[mark.value] += 1;
    return stats;
  }

  /** success rate x task count over the window; 0 for an agent with no samples. */
  performanceScore(agentId: string, timeframe: string): number {
    const stats = this.agentStats(this.rangeFor(timeframe)).find((s) => s.agentId === agentId);
    return stats?.performanceScore ?? 0;
  }

  /** Best first. Ties go to the lower average duration. */
  rankAgents(timeframe: string): AgentWindowStats[] {
    return this.agentStats(this.rangeFor(timeframe)).sort(
      (a, b) =>
        b.performanceScore - a.performanceScore ||
        a.averageDurationMs - b.averageDurationMs ||
        a.agentId.localeCompare(b.agentId),
    );
  }

  async snapshot(timeframe: string, alerts: Alert[] = []): Promise<MetricsSnapshot> {
    const windowMs = this.windowMs(timeframe);
    const range = this.rangeFor(timeframe);
    const snapshot: MetricsSnapshot = {
      timeframe,
      windowMs,
      generatedAt: new Date(range.end).toISOString(),
      uptimeSeconds: Math.round((range.end - this.startedAt) / 1000),
      agents: this.agentStats(range).map((stats) => ({
        ...stats,
        alerts: alerts.filter((a) => a.agentId === stats.agentId),
      })),
      tasks: this.taskStats(range),
      system: this.systemStats(range),
      http: this.httpStats(range),
      alerts,
    };
    const business = await this.businessStats();
    if (business) snapshot.business = business;
    return snapshot;
  }

  async exportSnapshot(path: string, timeframe: string, alerts: Alert[] = []): Promise<MetricsSnapshot> {
    const snapshot = await this.snapshot(timeframe, alerts);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(snapshot, null, 2) + '\n');
    this.logger.info(`metrics exported to ${path}`, { timeframe });
    return snapshot;
  }

  private async businessStats(): Promise<BusinessStats | undefined> {
    if (!this.clients && !this.campaigns) return undefined;
    const [clients, campaigns] = await Promise.all([
      this.clients?.list() ?? Promise.resolve([]),
      this.campaigns?.list() ?? Promise.resolve([]),
    ]);
    return {
      clients: clients.length,
      campaigns: campaigns.length,
      activeCampaigns: campaigns.filter((c) => c.status === 'active').length,
    };
  }

  private prune(now: number): void {
    const longest = Math.max(...this.windows.map((w) => w.durationMs));
    const cutoff = now - longest;
    const keep = <T extends { timestamp: number }>(items: T[]): T[] =>
      items.length > 0 && items[0].timestamp <= cutoff ? items.filter((i) => i.timestamp > cutoff) : items;

    this.agentSamples = keep(this.agentSamples);
    this.taskMarks = keep(this.taskMarks);
    this.systemSamples = keep(this.systemSamples);
    this.requestSamples = keep(this.requestSamples);
  }
}
