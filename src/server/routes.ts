import { z } from 'zod';
import { SubmitTaskInputSchema } from '../types/index.js';
import type { TaskStatusView } from '../types/index.js';
import { NotFoundError, OrchestrationError, ValidationError, errorMessage, formatZodError } from '../errors/index.js';
import type { SchedulerCore } from '../scheduler/index.js';
import type { AgentRegistry } from '../registry/index.js';
import type { MetricsCollector } from '../metrics/index.js';
import type { AlertEngine } from '../alerting/index.js';
import type { CheckpointStore } from '../checkpoint/index.js';

export interface ApiContext {
  scheduler: SchedulerCore;
  registry: AgentRegistry;
  collector: MetricsCollector;
  alerts: AlertEngine;
  checkpoints: CheckpointStore;
}

export interface ApiRequest {
  method: string;
  path: string;
  query?: URLSearchParams;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

const CancelBodySchema = z.object({ reason: z.string().min(1).optional() }).default({});

function ok(body: unknown, status = 200): ApiResponse {
  return { status, body };
}

function fail(status: number, error: string, issues?: string[]): ApiResponse {
  return { status, body: issues && issues.length > 0 ? { error, issues } : { error } };
}

function toResponse(err: unknown): ApiResponse {
  if (err instanceof ValidationError) return fail(400, err.message, err.issues);
  if (err instanceof NotFoundError) return fail(404, err.message);
  if (err instanceof OrchestrationError) return fail(500, err.message);
  return fail(500, errorMessage(err));
}

/** Status of a task the scheduler tracks, else from its latest checkpoint. */
async function findTask(ctx: ApiContext, taskId: string): Promise<TaskStatusView | undefined> {
  const live = ctx.scheduler.getStatus(taskId);
  if (live) return live;
  const latest = await ctx.checkpoints.load(taskId);
  if (!latest) return undefined;
  const state = latest.state;
  return {
    taskId: state.taskId,
    status: state.status,
    currentNode: state.currentNode,
    tier: state.tier,
    history: state.history,
    escalationCount: state.escalationCount,
    failureReason: state.failureReason,
  };
}

async function route(ctx: ApiContext, req: ApiRequest): Promise<ApiResponse> {
  const method = req.method.toUpperCase();
  const parts = req.path.split('/').filter(Boolean);
  if (parts[0] !== 'api') return fail(404, 'Not found');
  const [, resource, id, action] = parts;

  switch (resource) {
    case 'health': {
      const agents = ctx.registry.list();
      return ok({
        status: 'ok',
        timestamp: new Date().toISOString(),
        queueDepth: ctx.scheduler.queueDepth,
        tasks: ctx.scheduler.listTasks().length,
        agents: {
          healthy: agents.filter((a) => a.health === 'healthy').length,
          degraded: agents.filter((a) => a.health === 'degraded').length,
          unavailable: agents.filter((a) => a.health === 'unavailable').length,
        },
      });
    }

    case 'tasks': {
      if (id === undefined) {
        if (method === 'POST') {
          const parsed = SubmitTaskInputSchema.safeParse(req.body ?? {});
          if (!parsed.success) return fail(400, 'Invalid task submission', formatZodError(parsed.error));
          return ok(ctx.scheduler.submit(parsed.data), 202);
        }
        if (method === 'GET') return ok(ctx.scheduler.listTasks());
        break;
      }
      if (action === undefined && method === 'GET') {
        const task = await findTask(ctx, id);
        return task ? ok(task) : fail(404, `Task ${id} not found`);
      }
      if (action === 'cancel' && method === 'POST') {
        const parsed = CancelBodySchema.safeParse(req.body);
        if (!parsed.success) return fail(400, 'Invalid cancel request', formatZodError(parsed.error));
        const task = await findTask(ctx, id);
        if (!task) return fail(404, `Task ${id} not found`);
        const cancelled = await ctx.scheduler.cancel(id, parsed.data.reason);
        return ok({ taskId: id, cancelled });
      }
      break;
    }

    case 'agents':
      if (method === 'GET' && id === undefined) {
        return ok(
          ctx.registry.list().map((agent) => ({ ...agent, inFlight: ctx.scheduler.inFlight(agent.id) })),
        );
      }
      break;

    case 'metrics':
      if (method === 'GET') {
        const timeframe = req.query?.get('timeframe') ?? ctx.collector.timeframes()[0];
        return ok(await ctx.collector.snapshot(timeframe, ctx.alerts.recent()));
      }
      break;

    case 'alerts':
      if (method === 'GET') {
        const limit = Number.parseInt(req.query?.get('limit') ?? '50', 10);
        return ok(ctx.alerts.recent(Number.isNaN(limit) ? 50 : limit));
      }
      break;
  }
  return fail(404, 'Not found');
}

/**
 * Route one API request. Kept free of sockets so the HTTP server and tests
 * share it.
 */
export async function handleApiRequest(ctx: ApiContext, req: ApiRequest): Promise<ApiResponse> {
  try {
    return await route(ctx, req);
  } catch (err) {
    return toResponse(err);
  }
}
