import { AgentRegistry, loadDescriptorFile } from '../registry/index.js';
import type { AgentDescriptor } from '../types/index.js';
import type { Config } from '../types/index.js';
import { ConfigError, errorMessage } from '../errors/index.js';
import { loadGraphFile } from '../graph/index.js';
import type { WorkflowGraph } from '../graph/index.js';
import { EscalationPolicy } from '../escalation/index.js';
import { EventBus } from '../events/index.js';
import { AuditLog } from '../audit/index.js';
import type { AuditStore } from '../audit/index.js';
import type { CheckpointStore } from '../checkpoint/index.js';
import { SchedulerCore } from '../scheduler/index.js';
import { MetricsCollector, SystemSampler } from '../metrics/index.js';
import type { CampaignRepository, ClientRepository } from '../metrics/index.js';
import { AlertEngine, createSender } from '../alerting/index.js';
import type { AlertSender } from '../alerting/index.js';
import { HealthMonitor } from '../health/index.js';
import { getTierflowDir } from '../config/index.js';
import { createLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { ApiContext } from '../server/index.js';
import { loadExecutorModule } from './executors.js';
import type { ExecutorModule } from './executors.js';
import { createAuditStore, createCheckpointStore } from './stores.js';

export interface RuntimeParts {
  config: Config;
  graph: WorkflowGraph;
  registry: AgentRegistry;
  checkpoints: CheckpointStore;
  auditStore: AuditStore;
  sender?: AlertSender;
  clients?: ClientRepository;
  campaigns?: CampaignRepository;
  logger?: Logger;
}

export interface Runtime extends ApiContext {
  config: Config;
  graph: WorkflowGraph;
  escalation: EscalationPolicy;
  events: EventBus;
  audit: AuditLog;
  monitor: HealthMonitor;
  sampler: SystemSampler;
  logger: Logger;
  /** Start periodic health checks, host sampling and alert evaluation. */
  start(): void;
  stop(): Promise<void>;
}

export interface RuntimeOptions {
  config: Config;
  graphPath: string;
  agentsPath: string;
  executorsPath: string;
  /** Tierflow home for the json stores; defaults to ~/.tierflow */
  home?: string;
  logger?: Logger;
}

/** Build a registry from descriptors and the executors matched to them by id. */
export function buildRegistry(
  descriptors: AgentDescriptor[],
  mod: ExecutorModule,
  config: Config,
  logger: Logger,
): AgentRegistry {
  const registry = new AgentRegistry({
    substitutes: config.registry.substitutes,
    failureThreshold: config.registry.failureThreshold,
    logger: logger.child('registry'),
  });
  for (const descriptor of descriptors) {
    const executor = mod.executors[descriptor.id];
    if (!executor) {
      throw new ConfigError(`No executor exported for agent "${descriptor.id}"`);
    }
    registry.register(descriptor, executor, mod.probes[descriptor.id]);
  }
  return registry;
}

/** Wire the scheduler, metrics, alerting and health monitor around the given parts. */
export function assembleRuntime(parts: RuntimeParts): Runtime {
  const { config, graph, registry, checkpoints } = parts;
  const logger = parts.logger ?? createLogger({ level: config.logLevel });

  const events = new EventBus(logger.child('events'));
  const audit = new AuditLog(parts.auditStore, logger.child('audit'));
  const escalation = new EscalationPolicy(config.escalation);
  const scheduler = new SchedulerCore({
    graph,
    registry,
    escalation,
    checkpoints,
    config: config.scheduler,
    audit,
    events,
    logger: logger.child('scheduler'),
  });

  const collector = new MetricsCollector({
    windows: config.metrics.windows,
    clients: parts.clients,
    campaigns: parts.campaigns,
    logger: logger.child('metrics'),
  });
  const alerts = new AlertEngine({
    collector,
    config: config.alerting,
    sender: parts.sender ?? createSender(config.alerting.channels, logger.child('alerts')),
    audit,
    logger: logger.child('alerts'),
  });
  const monitor = new HealthMonitor(registry, {
    intervalMs: config.registry.healthCheckIntervalMs,
    logger: logger.child('health'),
  });
  const sampler = new SystemSampler(collector);

  const detach = [
    collector.attach(scheduler),
    alerts.attach(scheduler, registry),
    registry.onHealthChange((change) => {
      void audit.record('agent.health', {
        actor: 'registry',
        agentId: change.agentId,
        detail: { from: change.from, to: change.to, reason: change.reason },
      });
    }),
  ];

  return {
    config,
    graph,
    registry,
    checkpoints,
    escalation,
    events,
    audit,
    scheduler,
    collector,
    alerts,
    monitor,
    sampler,
    logger,
    start() {
      monitor.start();
      sampler.start(config.metrics.systemSampleIntervalMs);
      alerts.start();
    },
    async stop() {
      monitor.stop();
      sampler.stop();
      await scheduler.stop();
      await alerts.stop();
      for (const off of detach) off();
    },
  };
}

/** Load config-named stores plus the graph, agent and executor files. */
export async function createRuntime(opts: RuntimeOptions): Promise<Runtime> {
  const { config } = opts;
  const logger = opts.logger ?? createLogger({ level: config.logLevel });
  const home = opts.home ?? getTierflowDir();

  const graph = await loadGraphFile(opts.graphPath, {
    maxRetries: config.scheduler.defaultMaxRetries,
    timeoutMs: config.scheduler.defaultTimeoutMs,
  });
  const descriptors = await loadDescriptorFile(opts.agentsPath);

  let executorModule: ExecutorModule;
  try {
    executorModule = await loadExecutorModule(opts.executorsPath);
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Could not load executors from ${opts.executorsPath}: ${errorMessage(err)}`);
  }

  return assembleRuntime({
    config,
    graph,
    registry: buildRegistry(descriptors, executorModule, config, logger),
    checkpoints: await createCheckpointStore(config.checkpoints, home),
    auditStore: createAuditStore(home),
    logger,
  });
}
