import { AgentRegistry } from '../src/registry/index.js';
import { SchedulerCore } from '../src/scheduler/index.js';
import type { SchedulerOptions } from '../src/scheduler/index.js';
import { MemoryCheckpointStore } from '../src/checkpoint/index.js';
import type { Checkpoint } from '../src/checkpoint/index.js';
import { EventBus } from '../src/events/index.js';
import type { SchedulerEvent, SchedulerEventBody } from '../src/events/index.js';
import type {
  AgentContext,
  AgentDescriptorInput,
  AgentExecutor,
  AgentResult,
  Payload,
  TaskState,
  Tier,
} from '../src/types/index.js';
import type { WorkflowGraph } from '../src/graph/index.js';

export type Handler = (ctx: AgentContext) => AgentResult | Promise<AgentResult>;

export function executor(handler: Handler): AgentExecutor {
  return { process: async (ctx) => handler(ctx) };
}

export function ok(output?: Payload): AgentResult {
  return { status: 'success', output };
}

/** Returns each result once, in order, then repeats the last one. */
export function scripted(results: AgentResult[]): AgentExecutor & { calls: AgentContext[] } {
  const calls: AgentContext[] = [];
  return {
    calls,
    async process(ctx) {
      calls.push(ctx);
      return results[Math.min(calls.length - 1, results.length - 1)];
    },
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function agent(
  id: string,
  capabilities: string[],
  opts: Partial<Omit<AgentDescriptorInput, 'id' | 'capabilities'>> = {},
): AgentDescriptorInput {
  return { id, capabilities, tier: opts.tier ?? 'operational', concurrencyLimit: opts.concurrencyLimit ?? 1, ...opts };
}

export interface Harness {
  scheduler: SchedulerCore;
  registry: AgentRegistry;
  checkpoints: MemoryCheckpointStore;
  events: SchedulerEvent[];
}

/** A scheduler over in-memory stores that records every event it publishes. */
export function harness(
  graph: WorkflowGraph,
  agents: Array<[AgentDescriptorInput, AgentExecutor]>,
  opts: Partial<Omit<SchedulerOptions, 'graph' | 'registry' | 'checkpoints'>> & {
    substitutes?: Record<string, string>;
    checkpoints?: MemoryCheckpointStore;
  } = {},
): Harness {
  const registry = new AgentRegistry({ substitutes: opts.substitutes });
  for (const [descriptor, exec] of agents) registry.register(descriptor, exec);

  const checkpoints = opts.checkpoints ?? new MemoryCheckpointStore();
  const bus = opts.events ?? new EventBus();
  const events: SchedulerEvent[] = [];
  bus.subscribe({}, (e) => events.push(e));

  const scheduler = new SchedulerCore({
    config: { backoff: { baseMs: 1, factor: 2, maxMs: 5 } },
    escalation: opts.escalation,
    audit: opts.audit,
    logger: opts.logger,
    clock: opts.clock,
    ...(opts.config ? { config: opts.config } : {}),
    graph,
    registry,
    checkpoints,
    events: bus,
  });
  return { scheduler, registry, checkpoints, events };
}

export function eventTypes(events: SchedulerEvent[], taskId?: string): string[] {
  return events.filter((e) => taskId === undefined || e.taskId === taskId).map((e) => e.type);
}

export function taskState(overrides: Partial<TaskState> = {}): TaskState {
  return {
    taskId: 't1',
    payload: {},
    priority: 'medium',
    entryNode: 'intake',
    currentNode: 'intake',
    tier: 'operational',
    history: [],
    retryCounts: {},
    escalationCount: 0,
    escalations: [],
    status: 'running',
    sequence: 0,
    slaDeadline: '2026-03-02T00:00:00.000Z',
    slaBreached: false,
    createdAt: '2026-03-01T00:00:00.000Z',
    updatedAt: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

export function checkpoint(sequence: number, state: Partial<TaskState> = {}, taskId = 't1'): Checkpoint {
  return {
    taskId,
    sequence,
    timestamp: new Date(Date.UTC(2026, 2, 1, 0, sequence)).toISOString(),
    state: taskState({ taskId, sequence, ...state }),
  };
}

/** Stamp an event body the way the scheduler does. */
export function event(body: SchedulerEventBody, taskId = 't1', tier: Tier = 'operational'): SchedulerEvent {
  return { ...body, taskId, timestamp: '2026-03-01T00:00:00.000Z', tier };
}
