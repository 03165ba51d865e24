import { randomUUID } from 'node:crypto';
import { AlertingConfigSchema } from '../types/index.js';
import type { AlertingConfig, AlertingConfigInput } from '../types/index.js';
import { errorMessage } from '../errors/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { AuditLog } from '../audit/index.js';
import type { SchedulerEvent } from '../events/index.js';
import type { HealthChange } from '../registry/index.js';
import type { EventSource, MetricsCollector, TimeRange } from '../metrics/index.js';
import type { Alert, AlertKind, AlertListener, AlertSender, AlertSeverity } from './types.js';

const DEFAULT_RECENT = 200;

export interface AlertEngineOptions {
  collector: MetricsCollector;
  config?: AlertingConfigInput;
  sender?: AlertSender;
  audit?: AuditLog;
  logger?: Logger;
  clock?: () => number;
  /** How many alerts `recent()` keeps */
  keep?: number;
}

export interface HealthSource {
  onHealthChange(listener: (change: HealthChange) => void): () => void;
}

type AlertInput = Omit<Alert, 'id' | 'timestamp'>;

function pct(n: number): string {
  return `${Math.round(n * 1000) / 10}%`;
}

/**
 * Raises alerts from two sources: threshold checks over each elapsed alert
 * window (tumbling, evaluated by `tick`), and task or agent events, which
 * alert as they arrive. Nothing is deduplicated; a condition that persists
 * alerts once per window.
 */
export class AlertEngine {
  private readonly collector: MetricsCollector;
  private readonly config: AlertingConfig;
  private readonly sender?: AlertSender;
  private readonly audit?: AuditLog;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly keep: number;

  private readonly alerts: Alert[] = [];
  private readonly listeners = new Set<AlertListener>();
  private readonly pending = new Set<Promise<void>>();
  private windowStart: number;
  private timer?: ReturnType<typeof setInterval>;
  private ticking = false;

  constructor(opts: AlertEngineOptions) {
    this.collector = opts.collector;
    this.config = AlertingConfigSchema.parse(opts.config ?? {});
    this.sender = opts.sender;
    this.audit = opts.audit;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? Date.now;
    this.keep = opts.keep ?? DEFAULT_RECENT;
    this.windowStart = this.clock();
  }

  get windowMs(): number {
    return this.config.windowMs;
  }

  /** Subscribe to task events and, when given, agent health changes. */
  attach(events: EventSource, health?: HealthSource): () => void {
    const offEvents = events.subscribe(
      { types: ['task.failed', 'task.sla_breached'] },
      (event) => this.onEvent(event),
    );
    const offHealth = health?.onHealthChange((change) => this.onHealthChange(change));
    return () => {
      offEvents();
      offHealth?.();
    };
  }

  onAlert(listener: AlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Evaluate every alert window that has fully elapsed since the last tick.
   * Returns the alerts raised.
   */
  async tick(): Promise<Alert[]> {
    const now = this.clock();
    const raised: Alert[] = [];
    while (now - this.windowStart >= this.config.windowMs) {
      const range = { start: this.windowStart, end: this.windowStart + this.config.windowMs };
      this.windowStart = range.end;
      for (const input of this.evaluate(range)) {
        raised.push(this.raise(input, range));
      }
    }
    await this.flush();
    return raised;
  }

  /** Threshold checks for one window. Pure with respect to engine state. */
  evaluate(range: TimeRange): AlertInput[] {
    const out: AlertInput[] = [];
    const system = this.collector.systemStats(range);
    if (system.samples > 0 && system.maxCpuPercent > this.config.cpuPercent) {
      out.push({
        kind: 'high_cpu',
        severity: 'warning',
        title: 'High CPU usage',
        message: `CPU peaked at ${system.maxCpuPercent}% (threshold ${this.config.cpuPercent}%)`,
      });
    }
    if (system.samples > 0 && system.maxMemoryPercent > this.config.memoryPercent) {
      out.push({
        kind: 'high_memory',
        severity: 'warning',
        title: 'High memory usage',
        message: `Memory peaked at ${system.maxMemoryPercent}% (threshold ${this.config.memoryPercent}%)`,
      });
    }

    const http = this.collector.httpStats(range);
    if (http.requests > 0 && http.errorRate > this.config.httpErrorRate) {
      out.push({
        kind: 'high_http_error_rate',
        severity: 'warning',
        title: 'High HTTP error rate',
        message: `${http.errors} of ${http.requests} requests failed (${pct(http.errorRate)})`,
      });
    }

    for (const agent of this.collector.agentStats(range)) {
      if (agent.taskCount > 0 && agent.successRate < this.config.agentSuccessRate) {
        out.push({
          kind: 'low_success_rate',
          severity: 'warning',
          title: 'Low agent success rate',
          message: `${agent.agentId} succeeded on ${agent.successCount} of ${agent.taskCount} tasks (${pct(agent.successRate)})`,
          agentId: agent.agentId,
        });
      }
    }
    return out;
  }

  /** Run `tick` on an interval; the timer does not keep the process alive. */
  start(intervalMs = Math.min(this.config.windowMs, 60_000)): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.ticking) return;
      this.ticking = true;
      void this.tick()
        .catch((err: unknown) => this.logger.error('alert tick failed', { error: errorMessage(err) }))
        .finally(() => {
          this.ticking = false;
        });
    }, intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    await this.flush();
  }

  /** Most recent alerts, newest first; at least one when any exist. */
  recent(limit = 50): Alert[] {
    const count = Math.max(1, Math.floor(limit));
    return this.alerts.slice(-count).reverse();
  }

  /** Resolves when every delivery started so far has finished. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  /** Record an alert and hand it to listeners, the audit log and the sender. */
  raise(input: AlertInput, range?: TimeRange): Alert {
    const alert: Alert = {
      ...input,
      id: randomUUID(),
      timestamp: new Date(this.clock()).toISOString(),
    };
    if (range) {
      alert.window = { start: new Date(range.start).toISOString(), end: new Date(range.end).toISOString() };
    }

    this.alerts.push(alert);
    if (this.alerts.length > this.keep) this.alerts.splice(0, this.alerts.length - this.keep);

    const detail = { agentId: alert.agentId, taskId: alert.taskId };
    if (alert.severity === 'info') this.logger.info(`${alert.kind}: ${alert.message}`, detail);
    else this.logger.warn(`${alert.kind}: ${alert.message}`, detail);
    for (const listener of this.listeners) {
      try {
        listener(alert);
      } catch (err) {
        this.logger.error('alert listener threw', { kind: alert.kind, error: errorMessage(err) });
      }
    }
    this.track(this.deliver(alert));
    return alert;
  }

  private async deliver(alert: Alert): Promise<void> {
    await this.audit?.record('alert.raise', {
      actor: 'alerting',
      taskId: alert.taskId,
      agentId: alert.agentId,
      detail: { kind: alert.kind, severity: alert.severity, message: alert.message },
    });
    if (!this.sender) return;
    try {
      await this.sender.send(alert);
    } catch (err) {
      this.logger.error(`failed to deliver ${alert.kind} alert`, { error: errorMessage(err) });
    }
  }

  private track(delivery: Promise<void>): void {
    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }

  private onEvent(event: SchedulerEvent): void {
    if (event.type === 'task.failed') {
      if (event.escalationExhausted) {
        this.raise({
          kind: 'escalation_exhausted',
          severity: 'critical',
          title: 'Escalation limit reached',
          message: event.reason,
          taskId: event.taskId,
        });
        return;
      }
      this.raise({
        kind: 'task_failed',
        severity: 'warning',
        title: 'Task failed',
        message: `Failed at "${event.nodeId}" (${event.tier}): ${event.reason}`,
        taskId: event.taskId,
      });
      return;
    }
    if (event.type === 'task.sla_breached') {
      this.raise({
        kind: 'sla_breach',
        severity: 'warning',
        title: 'SLA breached',
        message: `Task passed its deadline of ${event.deadline}`,
        taskId: event.taskId,
      });
    }
  }

  private onHealthChange(change: HealthChange): void {
    const kinds: Record<HealthChange['to'], { kind: AlertKind; severity: AlertSeverity; title: string }> = {
      unavailable: { kind: 'agent_unavailable', severity: 'critical', title: 'Agent unavailable' },
      degraded: { kind: 'agent_degraded', severity: 'warning', title: 'Agent degraded' },
      healthy: { kind: 'agent_recovered', severity: 'info', title: 'Agent recovered' },
    };
    const { kind, severity, title } = kinds[change.to];
    this.raise({
      kind,
      severity,
      title,
      message: `${change.agentId} is ${change.to} (was ${change.from}): ${change.reason}`,
      agentId: change.agentId,
    });
  }
}
