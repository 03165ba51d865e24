import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  assembleRuntime,
  buildRegistry,
  createCheckpointStore,
  createRuntime,
  loadExecutorModule,
} from '../../src/runtime/index.js';
import type { Runtime } from '../../src/runtime/index.js';
import { WorkflowGraph } from '../../src/graph/index.js';
import { JsonCheckpointStore, MemoryCheckpointStore } from '../../src/checkpoint/index.js';
import { MemoryAuditStore } from '../../src/audit/index.js';
import { ConfigError } from '../../src/errors/index.js';
import { AgentDescriptorSchema, ConfigSchema } from '../../src/types/index.js';
import { silentLogger } from '../../src/log/index.js';
import { agent, executor, ok } from '../helpers.js';

const config = ConfigSchema.parse({
  logLevel: 'silent',
  checkpoints: { store: 'memory' },
  registry: { failureThreshold: 1 },
});

let runtime: Runtime | undefined;
const dirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'tierflow-runtime-'));
  dirs.push(dir);
  return dir;
}

afterEach(async () => {
  await runtime?.stop();
  runtime = undefined;
  for (const dir of dirs.splice(0)) await rm(dir, { recursive: true, force: true });
});

describe('buildRegistry', () => {
  it('pairs descriptors with executors and probes by id', async () => {
    const registry = buildRegistry(
      [AgentDescriptorSchema.parse(agent('closer', ['closing'], { tier: 'management', concurrencyLimit: 2 }))],
      { executors: { closer: executor(() => ok()) }, probes: { closer: async () => false } },
      config,
      silentLogger,
    );

    expect(registry.list().map((a) => [a.id, a.tier])).toEqual([['closer', 'management']]);
    expect((await registry.healthCheck()).map((c) => c.to)).toEqual(['degraded']);
  });

  it('refuses a descriptor without an executor', () => {
    expect(() =>
      buildRegistry([AgentDescriptorSchema.parse(agent('ghost', ['closing']))], { executors: {}, probes: {} }, config, silentLogger),
    ).toThrow(new ConfigError('No executor exported for agent "ghost"'));
  });
});

describe('assembleRuntime', () => {
  it('wires audit and metrics around the scheduler', async () => {
    const graph = new WorkflowGraph().addNode('work', 'work').addEntry('work').terminal('work');
    graph.validate();
    const registry = buildRegistry(
      [AgentDescriptorSchema.parse(agent('worker', ['work']))],
      { executors: { worker: executor(() => ok({ done: true })) }, probes: {} },
      config,
      silentLogger,
    );
    const auditStore = new MemoryAuditStore();
    runtime = assembleRuntime({
      config,
      graph,
      registry,
      checkpoints: new MemoryCheckpointStore(),
      auditStore,
      logger: silentLogger,
    });

    runtime.scheduler.submit({ taskId: 'wired', entryNode: 'work' });
    const final = await runtime.scheduler.waitFor('wired');
    registry.recordOutcome('worker', false, 'probe error: offline');

    expect(final.status).toBe('succeeded');
    expect(auditStore.all().map((e) => e.action)).toEqual(['task.submit', 'task.succeed', 'alert.raise', 'agent.health']);
    expect(auditStore.all()[3]).toMatchObject({
      actor: 'registry',
      agentId: 'worker',
      detail: { from: 'healthy', to: 'degraded', reason: 'probe error: offline' },
    });
    expect(runtime.collector.rankAgents('1h').map((s) => [s.agentId, s.taskCount])).toEqual([['worker', 1]]);
    expect(runtime.alerts.recent().map((a) => a.kind)).toEqual(['agent_degraded']);
  });
});

describe('createRuntime', () => {
  it('loads the bundled sales example', async () => {
    runtime = await createRuntime({
      config,
      graphPath: 'examples/sales-graph.json',
      agentsPath: 'examples/agents.json',
      executorsPath: 'examples/executors.mjs',
      home: await tempDir(),
      logger: silentLogger,
    });

    expect(runtime.graph.entryPoints()).toEqual(['intake']);
    expect(runtime.registry.list().map((a) => a.id)).toEqual([
      'ops-intake',
      'ops-research',
      'ops-sales',
      'sup-manager',
      'exec-director',
    ]);
  });

  it('reports an executors module that cannot be imported', async () => {
    const home = await tempDir();
    const missing = join(home, 'missing.mjs');
    await expect(
      createRuntime({
        config,
        graphPath: 'examples/sales-graph.json',
        agentsPath: 'examples/agents.json',
        executorsPath: missing,
        home,
        logger: silentLogger,
      }),
    ).rejects.toThrow(`Could not load executors from ${missing}`);
  });
});

describe('loadExecutorModule', () => {
  it('reads executors and probes from the example module', async () => {
    const mod = await loadExecutorModule('examples/executors.mjs');
    expect(Object.keys(mod.executors)).toEqual(['ops-intake', 'ops-research', 'ops-sales', 'sup-manager', 'exec-director']);
    expect(Object.keys(mod.probes)).toEqual(['ops-intake']);
    const result = await mod.executors['sup-manager'].process({
      taskId: 't',
      nodeId: 'close',
      tier: 'management',
      payload: {},
      deadline: new Date(),
      attempt: 1,
      signal: new AbortController().signal,
    });
    expect(result).toEqual({ status: 'terminal', outcome: 'succeeded', output: { closed: true } });
  });

  it('rejects modules with the wrong exports', async () => {
    const dir = await tempDir();
    const noExecutors = join(dir, 'none.mjs');
    await writeFile(noExecutors, 'export const other = 1;\n');
    await expect(loadExecutorModule(noExecutors)).rejects.toThrow(`${noExecutors} must export an object named "executors"`);

    const wrongShape = join(dir, 'wrong.mjs');
    await writeFile(wrongShape, 'export const executors = { a: 42 };\n');
    await expect(loadExecutorModule(wrongShape)).rejects.toThrow(`${wrongShape}: executors.a has the wrong shape`);
  });
});

describe('createCheckpointStore', () => {
  it('builds the configured store', async () => {
    const home = await tempDir();
    expect(await createCheckpointStore(config.checkpoints, home)).toBeInstanceOf(MemoryCheckpointStore);
    expect(await createCheckpointStore({ ...config.checkpoints, store: 'json' }, home)).toBeInstanceOf(JsonCheckpointStore);
  });
});
