import { describe, it, expect } from 'vitest';
import { WorkflowGraph } from '../../src/graph/index.js';
import { EscalationPolicy } from '../../src/escalation/index.js';
import { AuditLog, MemoryAuditStore } from '../../src/audit/index.js';
import { ValidationError } from '../../src/errors/index.js';
import type { AgentResult } from '../../src/types/index.js';
import { agent, eventTypes, executor, harness, ok, scripted } from '../helpers.js';

describe('sales pipeline with a value threshold', () => {
  const graph = new WorkflowGraph()
    .addNode('qualify', 'qualification')
    .addNode('propose', 'proposal')
    .addNode('review', 'deal-review', { tier: 'management' })
    .addEntry('qualify')
    .setEscalationTarget('management', 'review')
    .sequential('qualify', 'propose')
    .terminal('propose')
    .terminal('review');
  graph.validate();

  const escalation = new EscalationPolicy({
    thresholds: [
      {
        id: 'large-deal',
        node: 'propose',
        conditions: [{ field: 'proposal.value', op: 'gte', value: 1_000_000 }],
        escalateTo: 'management',
      },
    ],
  });

  it('escalates a large proposal to management review and succeeds there', async () => {
    const seen: string[] = [];
    const sales = executor((ctx) => {
      seen.push(`${ctx.nodeId}@${ctx.tier}`);
      return ctx.nodeId === 'qualify' ? ok({ lead_score: 85 }) : ok({ proposal: { value: 3_200_000 } });
    });
    const manager = executor((ctx) => {
      seen.push(`${ctx.nodeId}@${ctx.tier}`);
      return ok({ review: { approved: true } });
    });
    const audit = new MemoryAuditStore();
    const h = harness(
      graph,
      [
        [agent('ops', ['qualification', 'proposal'], { concurrencyLimit: 2 }), sales],
        [agent('mgr', ['deal-review'], { tier: 'management' }), manager],
      ],
      { escalation, audit: new AuditLog(audit) },
    );

    const { taskId } = h.scheduler.submit({ taskId: 'deal-1', entryNode: 'qualify', payload: { lead: { company: 'Acme' } } });
    const final = await h.scheduler.waitFor(taskId);

    expect(final.status).toBe('succeeded');
    expect(final.currentNode).toBe('@succeeded');
    expect(final.tier).toBe('management');
    expect(final.escalationCount).toBe(1);
    expect(final.history.map((e) => [e.nodeId, e.tier, e.outcome])).toEqual([
      ['qualify', 'operational', 'success'],
      ['propose', 'operational', 'success'],
      ['review', 'management', 'success'],
    ]);
    expect(final.escalations).toEqual([
      expect.objectContaining({
        kind: 'escalate',
        from: 'operational',
        to: 'management',
        nodeId: 'propose',
        reason: 'Matched threshold: large-deal',
      }),
    ]);
    expect(final.payload).toEqual({
      lead: { company: 'Acme' },
      lead_score: 85,
      proposal: { value: 3_200_000 },
      review: { approved: true },
    });
    expect(seen).toEqual(['qualify@operational', 'propose@operational', 'review@management']);

    expect(eventTypes(h.events, taskId)).toEqual([
      'task.submitted',
      'task.checkpointed',
      'task.dispatched',
      'task.node_completed',
      'task.checkpointed',
      'task.dispatched',
      'task.node_completed',
      'task.checkpointed',
      'task.escalated',
      'task.dispatched',
      'task.node_completed',
      'task.checkpointed',
      'task.succeeded',
    ]);
    expect((await h.checkpoints.history(taskId)).map((c) => c.sequence)).toEqual([1, 2, 3, 4]);
    expect(audit.all().map((e) => e.action)).toEqual(['task.submit', 'task.escalate', 'task.succeed']);
  });
});

describe('retries exhausted at the operational tier', () => {
  it('retries with backoff and then hands the task to management', async () => {
    const graph = new WorkflowGraph()
      .addNode('audit', 'audit', { maxRetries: 2 })
      .addNode('audit-review', 'review', { tier: 'management' })
      .addEntry('audit')
      .setEscalationTarget('management', 'audit-review')
      .terminal('audit')
      .terminal('audit-review');
    graph.validate();

    const flaky = scripted([{ status: 'transient_error', error: 'upstream 503' }]);
    const h = harness(graph, [
      [agent('auditor', ['audit']), flaky],
      [agent('mgr', ['review'], { tier: 'management' }), executor(() => ok())],
    ]);

    const { taskId } = h.scheduler.submit({ entryNode: 'audit' });
    const final = await h.scheduler.waitFor(taskId);

    expect(flaky.calls.map((c) => c.attempt)).toEqual([1, 2, 3]);
    expect(final.status).toBe('succeeded');
    expect(final.tier).toBe('management');
    expect(final.escalationCount).toBe(1);
    expect(final.retryCounts).toEqual({ audit: 2, 'audit-review': 0 });
    expect(final.history.map((e) => [e.nodeId, e.attempt, e.outcome])).toEqual([
      ['audit', 1, 'transient_error'],
      ['audit', 2, 'transient_error'],
      ['audit', 3, 'transient_error'],
      ['audit-review', 1, 'success'],
    ]);
    expect(final.escalations[0]).toMatchObject({ reason: 'Retries exhausted at "audit"', nodeId: 'audit' });

    const retries = h.events.flatMap((e) => (e.type === 'task.retry_scheduled' ? [[e.attempt, e.delayMs]] : []));
    expect(retries).toEqual([
      [2, 1],
      [3, 2],
    ]);
  });
});

describe('fan-out with a fatal branch', () => {
  it('fails the task and cancels the sibling branches', async () => {
    const graph = new WorkflowGraph()
      .addNode('research', 'research.plan')
      .addNode('market', 'research.market')
      .addNode('legal', 'research.legal')
      .addNode('competitors', 'research.competitors')
      .addNode('propose', 'proposal', { fanIn: true })
      .addEntry('research')
      .fanOut('research', ['market', 'legal', 'competitors'], 'propose')
      .sequential('market', 'propose')
      .sequential('legal', 'propose')
      .sequential('competitors', 'propose')
      .terminal('propose');
    graph.validate();

    const aborted: string[] = [];
    const hang = executor(
      (ctx) =>
        new Promise<AgentResult>((resolve) => {
          ctx.signal.addEventListener('abort', () => {
            aborted.push(ctx.nodeId);
            resolve({ status: 'success' });
          });
        }),
    );
    const h = harness(graph, [
      [agent('planner', ['research.plan']), executor(() => ok({ plan: true }))],
      [agent('market-agent', ['research.market']), hang],
      [agent('legal-agent', ['research.legal']), executor(() => ({ status: 'fatal_error', error: 'contract unreadable' }))],
      [agent('competitor-agent', ['research.competitors']), hang],
      [agent('writer', ['proposal']), executor(() => ok())],
    ]);

    const { taskId } = h.scheduler.submit({ entryNode: 'research' });
    const final = await h.scheduler.waitFor(taskId);

    expect(final.status).toBe('failed');
    expect(final.currentNode).toBe('@failed');
    expect(final.failureReason).toBe('Branch "legal" failed fatally at "legal": contract unreadable');
    expect(final.fanOut).toBeUndefined();
    expect(final.history.map((e) => [e.nodeId, e.outcome, e.branch])).toEqual([
      ['research', 'success', undefined],
      ['legal', 'fatal_error', 'legal'],
    ]);
    expect(aborted.sort()).toEqual(['competitors', 'market']);
    expect(eventTypes(h.events, taskId)).not.toContain('task.fanned_in');
    expect(h.events.find((e) => e.type === 'task.failed')).toMatchObject({ nodeId: 'research', escalationExhausted: false });
  });
});

describe('submission validation', () => {
  it('rejects a payload missing a required field without creating a checkpoint', async () => {
    const graph = new WorkflowGraph()
      .addNode('intake', 'intake', { requiredFields: ['lead.value'] })
      .addEntry('intake')
      .terminal('intake');
    graph.validate();
    const h = harness(graph, [[agent('ops', ['intake']), executor(() => ok())]]);

    let caught: unknown;
    try {
      h.scheduler.submit({ taskId: 'bad', entryNode: 'intake', payload: { lead: { company: 'Acme' } } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message).toBe('Payload rejected at "intake"');
      expect(caught.issues).toEqual(['missing required field "lead.value"']);
    }
    expect(h.scheduler.getStatus('bad')).toBeUndefined();
    expect(await h.checkpoints.listTasks()).toEqual([]);
    expect(h.events).toEqual([]);
  });

  it('rejects unknown entry nodes and duplicate task ids', () => {
    const graph = new WorkflowGraph().addNode('intake', 'intake').addEntry('intake').terminal('intake');
    graph.validate();
    const h = harness(graph, [[agent('ops', ['intake']), executor(() => ok())]]);

    expect(() => h.scheduler.submit({ entryNode: 'nowhere' })).toThrow('Unknown entry node "nowhere"');
    h.scheduler.submit({ taskId: 'dup', entryNode: 'intake' });
    expect(() => h.scheduler.submit({ taskId: 'dup', entryNode: 'intake' })).toThrow('Task dup already exists');
  });
});
