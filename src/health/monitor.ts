import type { AgentRegistry, HealthChange } from '../registry/index.js';
import { errorMessage } from '../errors/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';

export interface HealthMonitorOptions {
  intervalMs: number;
  logger?: Logger;
}

/** Periodically probes every registered agent. */
export class HealthMonitor {
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  private readonly logger: Logger;

  constructor(
    private readonly registry: AgentRegistry,
    private readonly opts: HealthMonitorOptions,
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  get active(): boolean {
    return this.timer !== undefined;
  }

  /** One probe round. Overlapping rounds are skipped. */
  async poll(): Promise<HealthChange[]> {
    if (this.running) return [];
    this.running = true;
    try {
      const changes = await this.registry.healthCheck();
      for (const c of changes) {
        this.logger.info(`${c.agentId}: ${c.from} -> ${c.to}`, { reason: c.reason });
      }
      return changes;
    } finally {
      this.running = false;
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.poll().catch((err: unknown) => {
        this.logger.error('health check round failed', { error: errorMessage(err) });
      });
    }, this.opts.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}
