import { randomUUID } from 'node:crypto';
import {
  FAILED_NODE,
  SchedulerConfigSchema,
  SubmitTaskInputSchema,
  SUCCEEDED_NODE,
  isTerminalMarker,
  isTerminalStatus,
} from '../types/index.js';
import type {
  AgentContext,
  BranchState,
  HistoryEntry,
  Payload,
  SchedulerConfig,
  SchedulerConfigInput,
  SubmitTaskInput,
  TaskHandle,
  TaskState,
  TaskStatusView,
} from '../types/index.js';
import {
  AgentUnavailableError,
  EscalationExhaustedError,
  NotFoundError,
  TimeoutError,
  ValidationError,
  errorMessage,
  formatZodError,
} from '../errors/index.js';
import { EscalationPolicy } from '../escalation/index.js';
import type { EscalationDecision } from '../escalation/index.js';
import { MemoryCheckpointStore, restoreTaskState } from '../checkpoint/index.js';
import type { CheckpointStore } from '../checkpoint/index.js';
import { EventBus } from '../events/index.js';
import type { EventFilter, EventListener, SchedulerEventBody } from '../events/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { AuditLog } from '../audit/index.js';
import type { AgentRegistry, ResolvedAgent } from '../registry/index.js';
import type { NodeSelection, RouteInput, TerminalOutcome, WorkflowGraph } from '../graph/index.js';
import { ReadyQueue } from './ready-queue.js';
import type { DispatchJob } from './ready-queue.js';
import { WorkerSlots } from './worker-slots.js';
import { TaskActor } from './task-actor.js';
import { backoffDelay } from './backoff.js';
import { awaitAttempt, classifyAttempt, invokeExecutor, outcomeOf } from './attempt.js';
import type { AttemptClass } from './attempt.js';
import { evaluateFanIn, mergeBranches, startFanOut } from './fan-out.js';

export interface SchedulerOptions {
  graph: WorkflowGraph;
  registry: AgentRegistry;
  escalation?: EscalationPolicy;
  checkpoints?: CheckpointStore;
  config?: SchedulerConfigInput;
  audit?: AuditLog;
  events?: EventBus;
  logger?: Logger;
  /** Milliseconds since the epoch; injectable for SLA tests */
  clock?: () => number;
}

interface TaskRecord {
  state: TaskState;
  actor: TaskActor;
  /** Attempt controllers keyed by lane: '' for the main line, else the branch id */
  inFlight: Map<string, AbortController>;
  timers: Set<ReturnType<typeof setTimeout>>;
  waiters: Array<(state: TaskState) => void>;
  settled: boolean;
}

const MAIN_LANE = '';

function laneOf(branch?: string): string {
  return branch ?? MAIN_LANE;
}

/**
 * Drives tasks through the workflow graph.
 *
 * Every state change for a task runs on that task's actor and is checkpointed
 * before anything downstream (dispatch, events) can observe it. Dispatch is
 * shared: a ready queue ordered by priority feeds agents up to their
 * concurrency limit, and work for a saturated agent stays queued.
 */
export class SchedulerCore {
  private readonly graph: WorkflowGraph;
  private readonly registry: AgentRegistry;
  private readonly escalation: EscalationPolicy;
  private readonly checkpoints: CheckpointStore;
  private readonly config: SchedulerConfig;
  private readonly audit?: AuditLog;
  private readonly events: EventBus;
  private readonly logger: Logger;
  private readonly clock: () => number;

  private readonly tasks = new Map<string, TaskRecord>();
  private readonly queue = new ReadyQueue();
  private readonly slots = new WorkerSlots();
  private stopped = false;
  private pumping = false;
  private pumpRequested = false;

  constructor(opts: SchedulerOptions) {
    if (!opts.graph.validated) {
      throw new Error('Workflow graph must be validated before scheduling');
    }
    this.graph = opts.graph;
    this.registry = opts.registry;
    this.escalation = opts.escalation ?? new EscalationPolicy();
    this.checkpoints = opts.checkpoints ?? new MemoryCheckpointStore();
    this.config = SchedulerConfigSchema.parse(opts.config ?? {});
    this.audit = opts.audit;
    this.logger = opts.logger ?? silentLogger;
    this.events = opts.events ?? new EventBus(this.logger);
    this.clock = opts.clock ?? Date.now;
  }

  get eventBus(): EventBus {
    return this.events;
  }

  get queueDepth(): number {
    return this.queue.size;
  }

  /** Highest number of concurrent calls seen against one agent. */
  peakConcurrency(agentId: string): number {
    return this.slots.peak(agentId);
  }

  inFlight(agentId: string): number {
    return this.slots.count(agentId);
  }

  // --- Public operations ---

  /**
   * Accept a task. Validation happens here, synchronously; everything after
   * (checkpoint, dispatch) happens on the task's actor.
   */
  submit(input: SubmitTaskInput): TaskHandle {
    if (this.stopped) throw new Error('Scheduler is stopped');

    const parsed = SubmitTaskInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid task submission', formatZodError(parsed.error));
    }
    const { entryNode, payload, priority } = parsed.data;
    if (!this.graph.hasNode(entryNode)) {
      throw new ValidationError(`Unknown entry node "${entryNode}"`);
    }
    const issues = this.graph.checkEntryPayload(entryNode, payload);
    if (issues.length > 0) {
      throw new ValidationError(`Payload rejected at "${entryNode}"`, issues);
    }
    const taskId = parsed.data.taskId ?? randomUUID();
    if (this.tasks.has(taskId)) {
      throw new ValidationError(`Task ${taskId} already exists`);
    }

    const now = this.clock();
    const iso = new Date(now).toISOString();
    const state: TaskState = {
      taskId,
      payload: structuredClone(payload),
      priority,
      entryNode,
      currentNode: entryNode,
      tier: this.graph.node(entryNode).tier,
      history: [],
      retryCounts: {},
      escalationCount: 0,
      escalations: [],
      status: 'running',
      sequence: 0,
      slaDeadline: new Date(now + this.config.slaMs[priority]).toISOString(),
      slaBreached: false,
      createdAt: iso,
      updatedAt: iso,
    };

    const record = this.track(state);
    this.logger.info(`task ${taskId} submitted`, { entryNode, priority });
    this.emit(state, { type: 'task.submitted', entryNode, priority });

    void record.actor.post(async () => {
      await this.commit(record, 'submitted');
      await this.audit?.record('task.submit', { taskId, detail: { entryNode, priority } });
      this.enqueue(record, entryNode);
    });
    return { taskId };
  }

  getStatus(taskId: string): TaskStatusView | undefined {
    const record = this.tasks.get(taskId);
    return record ? this.viewOf(record.state) : undefined;
  }

  /** Full copy of a tracked task's state. */
  getState(taskId: string): TaskState | undefined {
    const record = this.tasks.get(taskId);
    return record ? structuredClone(record.state) : undefined;
  }

  listTasks(): TaskStatusView[] {
    return [...this.tasks.values()].map((r) => this.viewOf(r.state));
  }

  subscribe(filter: EventFilter, listener: EventListener): () => void {
    return this.events.subscribe(filter, listener);
  }

  /** Resolves with the final state once the task is terminal. */
  waitFor(taskId: string): Promise<TaskState> {
    const record = this.tasks.get(taskId);
    if (!record) return Promise.reject(new NotFoundError(`Unknown task ${taskId}`));
    if (record.settled) return Promise.resolve(structuredClone(record.state));
    return new Promise((resolve) => {
      record.waiters.push(resolve);
    });
  }

  /**
   * Mark a task Failed. In-flight calls are signalled to abort; whatever they
   * return afterwards is ignored. Returns false for unknown or finished tasks.
   */
  async cancel(taskId: string, reason = 'cancelled by operator'): Promise<boolean> {
    const record = this.tasks.get(taskId);
    if (!record || isTerminalStatus(record.state.status)) return false;

    let cancelled = false;
    await record.actor.post(async () => {
      if (isTerminalStatus(record.state.status)) return;
      cancelled = true;
      this.emit(record.state, { type: 'task.cancelled', reason });
      await this.audit?.record('task.cancel', { taskId, detail: { reason } });
      await this.finish(record, 'failed', `Cancelled: ${reason}`, false);
    });
    return cancelled;
  }

  /**
   * Resume a task from its latest checkpoint. Nodes whose success is already
   * checkpointed are not run again.
   */
  async replay(taskId: string): Promise<TaskHandle> {
    if (this.stopped) throw new Error('Scheduler is stopped');
    const existing = this.tasks.get(taskId);
    if (existing && !existing.settled) {
      throw new ValidationError(`Task ${taskId} is still active`);
    }

    const state = await restoreTaskState(this.checkpoints, taskId);
    const unknown = this.unknownNodes(state);
    if (unknown.length > 0) {
      throw new ValidationError(`Checkpoint for ${taskId} references nodes missing from the graph`, unknown);
    }

    const record = this.track(state);
    if (isTerminalStatus(state.status)) {
      this.settle(record);
      return { taskId };
    }

    this.logger.info(`task ${taskId} replayed`, { nodeId: state.currentNode, sequence: state.sequence });
    this.emit(state, { type: 'task.replayed', nodeId: state.currentNode, sequence: state.sequence });
    await this.audit?.record('task.replay', { taskId, detail: { nodeId: state.currentNode, sequence: state.sequence } });
    void record.actor.post(() => this.resume(record));
    return { taskId };
  }

  /** Return a task to the operational tier. The only transition that lowers a tier. */
  async resetTier(taskId: string, reason: string): Promise<boolean> {
    const record = this.tasks.get(taskId);
    if (!record) throw new NotFoundError(`Unknown task ${taskId}`);

    let changed = false;
    await record.actor.post(async () => {
      const state = record.state;
      if (isTerminalStatus(state.status) || state.tier === 'operational') return;
      const { from, to } = this.escalation.reset(state);
      state.tier = to;
      state.escalations.push({ kind: 'reset', from, to, nodeId: state.currentNode, reason, timestamp: this.now() });
      await this.commit(record, 'tier reset');
      this.emit(state, { type: 'task.tier_reset', from, to, reason });
      await this.audit?.record('task.reset', { taskId, detail: { from, to, reason } });
      changed = true;
    });
    return changed;
  }

  /**
   * Stop dispatching. In-flight calls are aborted and queued work dropped;
   * task state stays as last checkpointed so another scheduler can replay it.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.queue.drain();
    for (const record of this.tasks.values()) {
      for (const timer of record.timers) clearTimeout(timer);
      record.timers.clear();
      this.abortLanes(record);
    }
    await Promise.all([...this.tasks.values()].map((r) => r.actor.idle()));
  }

  // --- Dispatch loop ---

  private enqueue(record: TaskRecord, nodeId: string, branch?: string, delayMs = 0): void {
    if (this.stopped) return;
    const counts = branch === undefined ? record.state.retryCounts : this.branchOf(record.state, branch)?.retryCounts;
    const job: DispatchJob = {
      taskId: record.state.taskId,
      nodeId,
      priority: record.state.priority,
      attempt: (counts?.[nodeId] ?? 0) + 1,
      branch,
    };

    if (delayMs <= 0) {
      this.queue.push(job);
      this.pump();
      return;
    }
    const timer = setTimeout(() => {
      record.timers.delete(timer);
      if (this.stopped) return;
      this.queue.push(job);
      this.pump();
    }, delayMs);
    record.timers.add(timer);
  }

  private pump(): void {
    if (this.stopped) return;
    if (this.pumping) {
      this.pumpRequested = true;
      return;
    }
    this.pumping = true;
    try {
      do {
        this.pumpRequested = false;
        for (const { job, seq } of this.queue.drain()) {
          if (!this.place(job)) this.queue.requeue(job, seq);
        }
      } while (this.pumpRequested && !this.stopped);
    } finally {
      this.pumping = false;
    }
  }

  /** Dispatch a job if an agent has room. False means it stays queued. */
  private place(job: DispatchJob): boolean {
    const record = this.tasks.get(job.taskId);
    if (!record || !this.isLive(record, job)) return true;

    const node = this.graph.node(job.nodeId);
    const candidates = this.registry.candidates(node.capability, record.state.tier);
    if (candidates.length === 0) {
      void record.actor.post(() => this.onUnavailable(record, job, node.capability));
      return true;
    }
    // Only the best-placed tier is eligible; when it is saturated the job waits.
    const tier = candidates[0].descriptor.tier;
    const agent = candidates.find((c) => c.descriptor.tier === tier && this.slots.hasCapacity(c.descriptor));
    if (!agent) return false;

    this.dispatch(record, job, agent);
    return true;
  }

  private isLive(record: TaskRecord, job: DispatchJob): boolean {
    const state = record.state;
    if (isTerminalStatus(state.status)) return false;
    if (record.inFlight.has(laneOf(job.branch))) return false;
    if (job.branch === undefined) {
      return state.status === 'running' && state.currentNode === job.nodeId;
    }
    const branch = this.branchOf(state, job.branch);
    return branch !== undefined && branch.status === 'running' && branch.currentNode === job.nodeId;
  }

  private dispatch(record: TaskRecord, job: DispatchJob, agent: ResolvedAgent): void {
    const state = record.state;
    const node = this.graph.node(job.nodeId);
    const agentId = agent.descriptor.id;
    const lane = laneOf(job.branch);
    const controller = new AbortController();
    const started = this.clock();

    record.inFlight.set(lane, controller);
    this.slots.acquire(agentId);

    const context: AgentContext = {
      taskId: state.taskId,
      nodeId: node.id,
      payload: Object.freeze(structuredClone(this.payloadFor(state, job.branch))),
      tier: state.tier,
      deadline: new Date(started + node.timeoutMs),
      attempt: job.attempt,
      branch: job.branch,
      signal: controller.signal,
    };

    this.logger.debug(`dispatch ${node.id} -> ${agentId}`, {
      taskId: state.taskId,
      attempt: job.attempt,
      branch: job.branch,
      substitute: agent.viaSubstitute ? agent.capability : undefined,
    });
    this.emit(state, { type: 'task.dispatched', nodeId: node.id, agentId, attempt: job.attempt, branch: job.branch });

    const processing = invokeExecutor(agent.executor, context);
    // The slot is held until the call itself settles, even after a timeout.
    void processing.then(() => {
      this.slots.release(agentId);
      this.pump();
    });

    void awaitAttempt(processing, node.timeoutMs, controller.signal).then((attempt) => {
      if (attempt.kind === 'timeout') controller.abort(new TimeoutError(node.id, node.timeoutMs));
      if (record.inFlight.get(lane) === controller) record.inFlight.delete(lane);
      const durationMs = this.clock() - started;
      return record.actor.post(() => this.onAttempt(record, job, agentId, classifyAttempt(attempt), durationMs));
    });
  }

  // --- Attempt handling (runs on the task actor) ---

  private async onAttempt(
    record: TaskRecord,
    job: DispatchJob,
    agentId: string,
    cls: AttemptClass,
    durationMs: number,
  ): Promise<void> {
    if (cls.kind === 'cancelled') return;
    const state = record.state;
    if (isTerminalStatus(state.status)) return;

    const branch = job.branch === undefined ? undefined : this.branchOf(state, job.branch);
    if (job.branch !== undefined && (!branch || branch.status !== 'running')) return;

    const error = cls.kind === 'retryable' || cls.kind === 'fatal' || cls.kind === 'terminal' ? cls.error : undefined;
    const entry: HistoryEntry = {
      nodeId: job.nodeId,
      timestamp: this.now(),
      outcome: outcomeOf(cls),
      tier: state.tier,
      agentId,
      branch: job.branch,
      attempt: job.attempt,
      durationMs,
      error,
    };
    (branch ? branch.history : state.history).push(entry);
    this.emit(state, {
      type: 'task.node_completed',
      nodeId: job.nodeId,
      agentId,
      attempt: job.attempt,
      outcome: entry.outcome,
      durationMs,
      branch: job.branch,
      error,
    });

    if (cls.kind === 'success') this.registry.recordOutcome(agentId, true);
    if (cls.kind === 'retryable') this.registry.recordOutcome(agentId, false, error);

    if (branch) return this.onBranchAttempt(record, branch, job.nodeId, cls);
    return this.onMainAttempt(record, job.nodeId, cls);
  }

  private async onMainAttempt(record: TaskRecord, nodeId: string, cls: AttemptClass): Promise<void> {
    const state = record.state;
    const node = this.graph.node(nodeId);

    switch (cls.kind) {
      case 'success': {
        Object.assign(state.payload, cls.output);
        state.retryCounts[nodeId] = 0;
        const decision = this.escalation.onNodeSuccess(state, nodeId);
        if (decision.kind !== 'none') return this.applyDecision(record, nodeId, decision);
        return this.advance(record, nodeId);
      }
      case 'retryable': {
        const used = state.retryCounts[nodeId] ?? 0;
        if (used < node.maxRetries) {
          state.retryCounts[nodeId] = used + 1;
          await this.commit(record, `retry ${nodeId}`);
          this.scheduleRetry(record, nodeId, used + 1);
          return;
        }
        return this.applyDecision(record, nodeId, this.escalation.onRetriesExhausted(state, nodeId));
      }
      case 'fatal':
        return this.applyDecision(record, nodeId, this.escalation.onFatal(state, nodeId, cls.error));
      case 'terminal': {
        Object.assign(state.payload, cls.output);
        const reason = cls.outcome === 'failed' ? (cls.error ?? `Agent ended the task at "${nodeId}"`) : undefined;
        return this.applyDecision(record, nodeId, this.escalation.onTerminal(cls.outcome, reason ?? 'completed'));
      }
      case 'cancelled':
        return;
    }
  }

  private async onBranchAttempt(
    record: TaskRecord,
    branch: BranchState,
    nodeId: string,
    cls: AttemptClass,
  ): Promise<void> {
    const state = record.state;
    const node = this.graph.node(nodeId);

    switch (cls.kind) {
      case 'success': {
        Object.assign(branch.output, cls.output);
        branch.retryCounts[nodeId] = 0;
        const selection = this.select(this.routeInput(state, branch));
        if (selection.kind === 'error') {
          this.failBranch(branch, selection.reason);
        } else if (selection.value.kind === 'next') {
          if (selection.value.node === state.fanOut?.joinNode) {
            branch.status = 'succeeded';
          } else {
            branch.currentNode = selection.value.node;
            await this.commit(record, `branch ${branch.branchId} -> ${branch.currentNode}`);
            this.enqueue(record, branch.currentNode, branch.branchId);
            return;
          }
        } else if (selection.value.kind === 'terminal') {
          if (selection.value.outcome === 'succeeded') branch.status = 'succeeded';
          else this.failBranch(branch, selection.value.reason ?? `Branch ended failed after "${nodeId}"`);
        } else {
          this.failBranch(branch, `Nested fan-out from "${nodeId}" is not supported`);
        }
        break;
      }
      case 'retryable': {
        const used = branch.retryCounts[nodeId] ?? 0;
        if (used < node.maxRetries) {
          branch.retryCounts[nodeId] = used + 1;
          await this.commit(record, `retry ${branch.branchId}/${nodeId}`);
          this.scheduleRetry(record, nodeId, used + 1, branch.branchId);
          return;
        }
        return this.onBranchLost(record, branch, nodeId, `Retries exhausted at "${nodeId}": ${cls.error}`, () =>
          this.escalation.onRetriesExhausted(state, nodeId),
        );
      }
      case 'fatal':
        this.failBranch(branch, cls.error);
        return this.finish(
          record,
          'failed',
          `Branch "${branch.branchId}" failed fatally at "${nodeId}": ${cls.error}`,
          false,
        );
      case 'terminal':
        Object.assign(branch.output, cls.output);
        if (cls.outcome === 'succeeded') branch.status = 'succeeded';
        else this.failBranch(branch, cls.error ?? `Agent ended branch at "${nodeId}"`);
        break;
      case 'cancelled':
        return;
    }
    return this.settleFanOut(record);
  }

  private async onUnavailable(record: TaskRecord, job: DispatchJob, capability: string): Promise<void> {
    if (!this.isLive(record, job)) return;
    const state = record.state;
    const error = new AgentUnavailableError(capability).message;
    const branch = job.branch === undefined ? undefined : this.branchOf(state, job.branch);

    const entry: HistoryEntry = {
      nodeId: job.nodeId,
      timestamp: this.now(),
      outcome: 'unavailable',
      tier: state.tier,
      branch: job.branch,
      attempt: job.attempt,
      error,
    };
    (branch ? branch.history : state.history).push(entry);
    this.emit(state, {
      type: 'task.node_completed',
      nodeId: job.nodeId,
      attempt: job.attempt,
      outcome: 'unavailable',
      durationMs: 0,
      branch: job.branch,
      error,
    });
    this.logger.warn(`no agent for ${capability}`, { taskId: state.taskId, nodeId: job.nodeId, tier: state.tier });

    if (branch) {
      return this.onBranchLost(record, branch, job.nodeId, error, () =>
        this.escalation.onAgentUnavailable(state, job.nodeId, capability),
      );
    }
    return this.applyDecision(record, job.nodeId, this.escalation.onAgentUnavailable(state, job.nodeId, capability));
  }

  /**
   * A branch ran out of retries or agents. While the quorum can still be met
   * the loss is absorbed; once it cannot, the fan-out collapses and the
   * escalation policy decides, as it would for the same failure on the main path.
   */
  private async onBranchLost(
    record: TaskRecord,
    branch: BranchState,
    nodeId: string,
    error: string,
    decide: () => EscalationDecision,
  ): Promise<void> {
    this.failBranch(branch, error);
    const state = record.state;
    const fanOut = state.fanOut;
    if (!fanOut || evaluateFanIn(fanOut).kind !== 'unreachable') return this.settleFanOut(record);

    const decision = decide();
    if (decision.kind === 'none') return this.settleFanOut(record);
    this.cancelBranches(record);
    state.history.push(...mergeBranches(fanOut).history);
    state.fanOut = undefined;
    state.status = 'running';
    return this.applyDecision(record, nodeId, decision);
  }

  // --- State transitions ---

  private async advance(record: TaskRecord, fromNode: string): Promise<void> {
    const state = record.state;
    const selection = this.select(this.routeInput(state));
    if (selection.kind === 'error') {
      return this.finish(record, 'failed', selection.reason, false);
    }

    const next = selection.value;
    switch (next.kind) {
      case 'terminal':
        return this.finish(
          record,
          next.outcome,
          next.outcome === 'failed' ? (next.reason ?? `Routed to failure after "${fromNode}"`) : undefined,
          false,
        );
      case 'next':
        state.currentNode = next.node;
        await this.commit(record, `advance ${next.node}`);
        this.enqueue(record, next.node);
        return;
      case 'fan_out':
        state.status = 'awaiting_fan_in';
        state.fanOut = startFanOut(fromNode, next.branches, next.join, next.quorum);
        await this.commit(record, `fan-out ${fromNode}`);
        this.emit(state, {
          type: 'task.fanned_out',
          nodeId: fromNode,
          branches: next.branches,
          join: next.join,
          quorum: next.quorum,
        });
        for (const branch of next.branches) this.enqueue(record, branch, branch);
        return;
    }
  }

  private async applyDecision(record: TaskRecord, nodeId: string, decision: EscalationDecision): Promise<void> {
    const state = record.state;
    switch (decision.kind) {
      case 'none':
        return this.advance(record, nodeId);
      case 'terminal': {
        const reason = decision.exhausted
          ? new EscalationExhaustedError(state.taskId, state.escalationCount).message
          : decision.reason;
        if (decision.exhausted) this.logger.error(reason, { taskId: state.taskId, cause: decision.reason });
        return this.finish(record, decision.outcome, decision.outcome === 'failed' ? reason : undefined, decision.exhausted);
      }
      case 'escalate': {
        const target = this.graph.escalationTargetFor(nodeId, decision.to);
        if (target === undefined) {
          return this.finish(record, 'failed', `${decision.reason}; no ${decision.to} escalation target`, false);
        }
        state.tier = decision.to;
        state.escalationCount += 1;
        state.escalations.push({
          kind: 'escalate',
          from: decision.from,
          to: decision.to,
          nodeId,
          reason: decision.reason,
          timestamp: this.now(),
        });
        state.currentNode = target;
        await this.commit(record, `escalate ${decision.to}`);

        this.logger.info(`task ${state.taskId} escalated ${decision.from} -> ${decision.to}`, {
          nodeId,
          target,
          trigger: decision.trigger,
        });
        this.emit(state, {
          type: 'task.escalated',
          nodeId,
          toNode: target,
          from: decision.from,
          to: decision.to,
          trigger: decision.trigger,
          reason: decision.reason,
          escalationCount: state.escalationCount,
        });
        await this.audit?.record('task.escalate', {
          taskId: state.taskId,
          detail: { from: decision.from, to: decision.to, nodeId, target, trigger: decision.trigger, reason: decision.reason },
        });
        this.enqueue(record, target);
        return;
      }
    }
  }

  private async settleFanOut(record: TaskRecord): Promise<void> {
    const state = record.state;
    const fanOut = state.fanOut;
    if (!fanOut) return;

    const verdict = evaluateFanIn(fanOut);
    switch (verdict.kind) {
      case 'waiting':
        await this.commit(record, 'branch update');
        return;
      case 'unreachable':
        return this.finish(record, 'failed', verdict.reason, false);
      case 'join': {
        this.cancelBranches(record);
        const merged = mergeBranches(fanOut);
        Object.assign(state.payload, merged.output);
        state.history.push(...merged.history);
        state.fanOut = undefined;
        state.status = 'running';
        state.currentNode = fanOut.joinNode;
        await this.commit(record, `fan-in ${fanOut.joinNode}`);
        this.emit(state, {
          type: 'task.fanned_in',
          joinNode: fanOut.joinNode,
          succeeded: verdict.succeeded,
          failed: verdict.failed,
        });
        this.enqueue(record, fanOut.joinNode);
        return;
      }
    }
  }

  private async finish(
    record: TaskRecord,
    outcome: TerminalOutcome,
    reason: string | undefined,
    exhausted: boolean,
  ): Promise<void> {
    const state = record.state;
    const lastNode = isTerminalMarker(state.currentNode) ? state.entryNode : state.currentNode;

    if (state.fanOut) {
      this.cancelBranches(record);
      state.history.push(...mergeBranches(state.fanOut).history);
      state.fanOut = undefined;
    }
    this.abortLanes(record);
    this.queue.removeTask(state.taskId);

    state.status = outcome;
    state.currentNode = outcome === 'succeeded' ? SUCCEEDED_NODE : FAILED_NODE;
    if (outcome === 'failed') state.failureReason = reason ?? `Failed at "${lastNode}"`;
    await this.commit(record, outcome);

    if (outcome === 'succeeded') {
      this.logger.info(`task ${state.taskId} succeeded`, { nodeId: lastNode, tier: state.tier });
      this.emit(state, { type: 'task.succeeded', nodeId: lastNode });
    } else {
      this.logger.warn(`task ${state.taskId} failed`, { nodeId: lastNode, reason: state.failureReason });
      this.emit(state, {
        type: 'task.failed',
        nodeId: lastNode,
        reason: state.failureReason ?? 'failed',
        escalationExhausted: exhausted,
      });
    }
    await this.audit?.record(outcome === 'succeeded' ? 'task.succeed' : 'task.fail', {
      taskId: state.taskId,
      success: outcome === 'succeeded',
      error: state.failureReason,
      detail: { nodeId: lastNode, tier: state.tier, escalationCount: state.escalationCount },
    });
    this.settle(record);
  }

  private async resume(record: TaskRecord): Promise<void> {
    const state = record.state;
    if (state.status === 'awaiting_fan_in' && state.fanOut) {
      const running = state.fanOut.branches.filter((b) => b.status === 'running');
      if (running.length === 0) return this.settleFanOut(record);
      for (const branch of running) this.enqueue(record, branch.currentNode, branch.branchId);
      return;
    }
    this.enqueue(record, state.currentNode);
  }

  // --- Helpers ---

  /** Write-ahead: bump the sequence and persist before anything else sees the change. */
  private async commit(record: TaskRecord, reason: string): Promise<void> {
    const state = record.state;
    const now = this.clock();
    state.sequence += 1;
    state.updatedAt = new Date(now).toISOString();

    const breached = !state.slaBreached && now > Date.parse(state.slaDeadline);
    if (breached) state.slaBreached = true;

    await this.checkpoints.save({
      taskId: state.taskId,
      sequence: state.sequence,
      timestamp: state.updatedAt,
      state: structuredClone(state),
      reason,
    });
    this.emit(state, { type: 'task.checkpointed', sequence: state.sequence });
    if (breached) {
      this.logger.warn(`task ${state.taskId} missed its SLA`, { deadline: state.slaDeadline });
      this.emit(state, { type: 'task.sla_breached', deadline: state.slaDeadline });
    }
  }

  private scheduleRetry(record: TaskRecord, nodeId: string, retry: number, branch?: string): void {
    const delayMs = backoffDelay(retry, this.config.backoff);
    this.emit(record.state, { type: 'task.retry_scheduled', nodeId, attempt: retry + 1, delayMs, branch });
    this.enqueue(record, nodeId, branch, delayMs);
  }

  private select(input: RouteInput): { kind: 'ok'; value: NodeSelection } | { kind: 'error'; reason: string } {
    try {
      return { kind: 'ok', value: this.graph.resolve(input) };
    } catch (err) {
      return { kind: 'error', reason: `Routing from "${input.currentNode}" failed: ${errorMessage(err)}` };
    }
  }

  private routeInput(state: TaskState, branch?: BranchState): RouteInput {
    if (!branch) return state;
    return {
      taskId: state.taskId,
      tier: state.tier,
      priority: state.priority,
      payload: this.payloadFor(state, branch.branchId),
      history: branch.history,
      currentNode: branch.currentNode,
    };
  }

  private payloadFor(state: TaskState, branch?: string): Payload {
    if (branch === undefined) return state.payload;
    const output = this.branchOf(state, branch)?.output ?? {};
    return { ...state.payload, ...output };
  }

  private branchOf(state: TaskState, branchId: string): BranchState | undefined {
    return state.fanOut?.branches.find((b) => b.branchId === branchId);
  }

  private failBranch(branch: BranchState, error: string): void {
    branch.status = 'failed';
    branch.error = error;
  }

  private cancelBranches(record: TaskRecord): void {
    for (const branch of record.state.fanOut?.branches ?? []) {
      if (branch.status !== 'running') continue;
      branch.status = 'cancelled';
      record.inFlight.get(branch.branchId)?.abort();
      record.inFlight.delete(branch.branchId);
    }
  }

  private abortLanes(record: TaskRecord): void {
    for (const controller of record.inFlight.values()) controller.abort();
    record.inFlight.clear();
  }

  private unknownNodes(state: TaskState): string[] {
    const nodes = [state.currentNode, ...(state.fanOut?.branches.map((b) => b.currentNode) ?? [])];
    return nodes.filter((n) => !isTerminalMarker(n) && !this.graph.hasNode(n));
  }

  private track(state: TaskState): TaskRecord {
    const record: TaskRecord = {
      state,
      actor: new TaskActor((err) => this.crash(record, err)),
      inFlight: new Map(),
      timers: new Set(),
      waiters: [],
      settled: false,
    };
    this.tasks.set(state.taskId, record);
    return record;
  }

  private settle(record: TaskRecord): void {
    record.settled = true;
    for (const timer of record.timers) clearTimeout(timer);
    record.timers.clear();
    const waiters = record.waiters.splice(0);
    for (const resolve of waiters) resolve(structuredClone(record.state));
  }

  /** A step threw: fail the task so it never sits half-applied. */
  private async crash(record: TaskRecord, err: unknown): Promise<void> {
    const state = record.state;
    this.logger.error(`task ${state.taskId} step failed`, { error: errorMessage(err) });
    if (record.settled) return;
    if (isTerminalStatus(state.status)) {
      this.settle(record);
      return;
    }

    this.abortLanes(record);
    this.queue.removeTask(state.taskId);
    const lastNode = state.currentNode;
    state.status = 'failed';
    state.currentNode = FAILED_NODE;
    state.failureReason = `Internal error: ${errorMessage(err)}`;
    try {
      await this.commit(record, 'failed');
    } catch (saveErr) {
      this.logger.error(`final checkpoint for ${state.taskId} failed`, { error: errorMessage(saveErr) });
    }
    this.emit(state, { type: 'task.failed', nodeId: lastNode, reason: state.failureReason, escalationExhausted: false });
    await this.audit?.record('task.fail', {
      taskId: state.taskId,
      success: false,
      error: state.failureReason,
      detail: { nodeId: lastNode, tier: state.tier, escalationCount: state.escalationCount, internal: true },
    });
    this.settle(record);
  }

  private emit(state: TaskState, body: SchedulerEventBody): void {
    this.events.publish({ ...body, taskId: state.taskId, timestamp: this.now(), tier: state.tier });
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }

  private viewOf(state: TaskState): TaskStatusView {
    return {
      taskId: state.taskId,
      status: state.status,
      currentNode: state.currentNode,
      tier: state.tier,
      history: structuredClone(state.history),
      escalationCount: state.escalationCount,
      failureReason: state.failureReason,
    };
  }
}
