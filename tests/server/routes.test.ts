import { describe, it, expect, beforeEach } from 'vitest';
import { WorkflowGraph } from '../../src/graph/index.js';
import { MetricsCollector } from '../../src/metrics/index.js';
import { AlertEngine } from '../../src/alerting/index.js';
import { handleApiRequest } from '../../src/server/index.js';
import type { ApiContext } from '../../src/server/index.js';
import { agent, checkpoint, executor, harness, ok } from '../helpers.js';
import type { Harness } from '../helpers.js';

function build(): { h: Harness; ctx: ApiContext } {
  const graph = new WorkflowGraph()
    .addNode('work', 'work', { requiredFields: ['lead.company'] })
    .addEntry('work')
    .terminal('work');
  graph.validate();
  const h = harness(graph, [[agent('w', ['work']), executor(() => ok({ done: true }))]]);
  const collector = new MetricsCollector();
  collector.attach(h.scheduler);
  const ctx: ApiContext = {
    scheduler: h.scheduler,
    registry: h.registry,
    collector,
    alerts: new AlertEngine({ collector }),
    checkpoints: h.checkpoints,
  };
  return { h, ctx };
}

describe('handleApiRequest', () => {
  let h: Harness;
  let ctx: ApiContext;

  beforeEach(() => {
    ({ h, ctx } = build());
  });

  it('reports health', async () => {
    const res = await handleApiRequest(ctx, { method: 'GET', path: '/api/health' });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'ok',
      queueDepth: 0,
      tasks: 0,
      agents: { healthy: 1, degraded: 0, unavailable: 0 },
    });
  });

  it('submits a task and reports its status', async () => {
    const submitted = await handleApiRequest(ctx, {
      method: 'POST',
      path: '/api/tasks',
      body: { taskId: 'api-1', entryNode: 'work', payload: { lead: { company: 'Acme' } }, priority: 'high' },
    });
    expect(submitted).toEqual({ status: 202, body: { taskId: 'api-1' } });

    await h.scheduler.waitFor('api-1');
    const status = await handleApiRequest(ctx, { method: 'GET', path: '/api/tasks/api-1' });
    expect(status.status).toBe(200);
    expect(status.body).toMatchObject({ taskId: 'api-1', status: 'succeeded', currentNode: '@succeeded' });

    const list = await handleApiRequest(ctx, { method: 'GET', path: '/api/tasks' });
    expect(Array.isArray(list.body) && list.body.length).toBe(1);
  });

  it('rejects malformed submissions and payloads the entry node refuses', async () => {
    expect(await handleApiRequest(ctx, { method: 'POST', path: '/api/tasks', body: { entryNode: '' } })).toEqual({
      status: 400,
      body: { error: 'Invalid task submission', issues: ['entryNode: String must contain at least 1 character(s)'] },
    });
    expect(await handleApiRequest(ctx, { method: 'POST', path: '/api/tasks', body: { entryNode: 'work' } })).toEqual({
      status: 400,
      body: { error: 'Payload rejected at "work"', issues: ['missing required field "lead.company"'] },
    });
  });

  it('falls back to checkpoints for tasks this scheduler does not track', async () => {
    await h.checkpoints.save(checkpoint(3, { currentNode: 'review', tier: 'management' }, 'old-1'));
    const res = await handleApiRequest(ctx, { method: 'GET', path: '/api/tasks/old-1' });
    expect(res.body).toMatchObject({ taskId: 'old-1', currentNode: 'review', tier: 'management', status: 'running' });
  });

  it('cancels only known tasks', async () => {
    expect(await handleApiRequest(ctx, { method: 'POST', path: '/api/tasks/ghost/cancel' })).toEqual({
      status: 404,
      body: { error: 'Task ghost not found' },
    });

    h.scheduler.submit({ taskId: 'done', entryNode: 'work', payload: { lead: { company: 'Acme' } } });
    await h.scheduler.waitFor('done');
    expect(
      await handleApiRequest(ctx, { method: 'POST', path: '/api/tasks/done/cancel', body: { reason: 'too late' } }),
    ).toEqual({ status: 200, body: { taskId: 'done', cancelled: false } });
  });

  it('lists agents with their in-flight counts', async () => {
    const res = await handleApiRequest(ctx, { method: 'GET', path: '/api/agents' });
    expect(res.body).toEqual([
      { id: 'w', tier: 'operational', capabilities: ['work'], concurrencyLimit: 1, health: 'healthy', inFlight: 0 },
    ]);
  });

  it('serves metrics for a timeframe and rejects unknown ones', async () => {
    const res = await handleApiRequest(ctx, { method: 'GET', path: '/api/metrics', query: new URLSearchParams('timeframe=24h') });
    expect(res.body).toMatchObject({ timeframe: '24h', alerts: [] });

    expect(
      await handleApiRequest(ctx, { method: 'GET', path: '/api/metrics', query: new URLSearchParams('timeframe=90d') }),
    ).toEqual({ status: 400, body: { error: 'Unknown timeframe "90d"', issues: ['expected one of: 1h, 24h, 7d'] } });
  });

  it('lists recent alerts', async () => {
    ctx.alerts.raise({ kind: 'test', severity: 'info', title: 'Test', message: 'one' });
    ctx.alerts.raise({ kind: 'test', severity: 'info', title: 'Test', message: 'two' });
    const res = await handleApiRequest(ctx, { method: 'GET', path: '/api/alerts', query: new URLSearchParams('limit=1') });
    expect(res.body).toEqual([expect.objectContaining({ message: 'two' })]);

    for (const limit of ['0', '-3']) {
      const clamped = await handleApiRequest(ctx, { method: 'GET', path: '/api/alerts', query: new URLSearchParams({ limit }) });
      expect(clamped.body).toEqual([expect.objectContaining({ message: 'two' })]);
    }
  });

  it('answers 404 for anything else', async () => {
    expect(await handleApiRequest(ctx, { method: 'GET', path: '/nope' })).toEqual({ status: 404, body: { error: 'Not found' } });
    expect(await handleApiRequest(ctx, { method: 'DELETE', path: '/api/tasks' })).toEqual({
      status: 404,
      body: { error: 'Not found' },
    });
  });
});
