import { Command } from 'commander';
import chalk from 'chalk';
import type { Checkpoint } from '../../checkpoint/index.js';
import { TaskStatus } from '../../types/index.js';
import { ValidationError } from '../../errors/index.js';
import type { Runtime } from '../../runtime/index.js';
import {
  formatHistory,
  formatTable,
  formatTaskSummary,
  openCheckpoints,
  openRuntime,
  reportError,
  statusColor,
  withRuntimeOptions,
} from '../shared.js';

export function createTasksCommand(): Command {
  const tasks = new Command('tasks').description('Inspect and replay checkpointed tasks');

  tasks
    .command('list')
    .description('List tasks with a checkpoint')
    .option('--status <status>', 'Only tasks in this status')
    .option('--json', 'Output as JSON')
    .action(async (opts: { status?: string; json?: boolean }) => {
      try {
        const parsed = TaskStatus.optional().safeParse(opts.status);
        if (!parsed.success) {
          throw new ValidationError(`Unknown status "${opts.status}"`, [`expected one of: ${TaskStatus.options.join(', ')}`]);
        }
        const status = parsed.data;
        const store = await openCheckpoints();
        const latest: Checkpoint[] = [];
        for (const taskId of await store.listTasks()) {
          const checkpoint = await store.load(taskId);
          if (checkpoint) latest.push(checkpoint);
        }
        const states = latest
          .map((c) => c.state)
          .filter((s) => status === undefined || s.status === status)
          .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));

        if (opts.json) {
          console.log(JSON.stringify(states, null, 2));
          return;
        }
        if (states.length === 0) {
          console.log('No tasks found.');
          return;
        }

        const header = ['ID', 'STATUS', 'NODE', 'TIER', 'PRIORITY', 'UPDATED'];
        const plain = states.map((s) => [s.taskId, s.status, s.currentNode, s.tier, s.priority, s.updatedAt]);
        const colored = states.map((s, i) => {
          const row = [...plain[i]];
          row[1] = statusColor(s.status);
          return row;
        });
        for (const line of formatTable(header, plain, colored)) console.log(line);
      } catch (err) {
        reportError(err);
      }
    });

  tasks
    .command('status')
    .description('Show the latest checkpointed state of a task')
    .argument('<id>', 'Task ID')
    .option('--json', 'Output as JSON')
    .action(async (id: string, opts: { json?: boolean }) => {
      try {
        const checkpoint = await (await openCheckpoints()).load(id);
        if (!checkpoint) {
          console.error(`Task ${id} not found.`);
          process.exitCode = 1;
          return;
        }
        if (opts.json) {
          console.log(JSON.stringify(checkpoint.state, null, 2));
          return;
        }
        for (const line of formatTaskSummary(checkpoint.state)) console.log(line);
        console.log(chalk.dim(`Checkpoint #${checkpoint.sequence} (${checkpoint.reason ?? 'no reason'})`));
      } catch (err) {
        reportError(err);
      }
    });

  tasks
    .command('history')
    .description('Show the node history of a task, or its retained checkpoints')
    .argument('<id>', 'Task ID')
    .option('--checkpoints', 'List retained checkpoints instead of node history')
    .action(async (id: string, opts: { checkpoints?: boolean }) => {
      try {
        const store = await openCheckpoints();
        if (opts.checkpoints) {
          const list = await store.history(id);
          if (list.length === 0) {
            console.error(`Task ${id} not found.`);
            process.exitCode = 1;
            return;
          }
          const header = ['SEQ', 'TIMESTAMP', 'STATUS', 'NODE', 'REASON'];
          const plain = list.map((c) => [
            String(c.sequence),
            c.timestamp,
            c.state.status,
            c.state.currentNode,
            c.reason ?? '',
          ]);
          for (const line of formatTable(header, plain)) console.log(line);
          return;
        }

        const checkpoint = await store.load(id);
        if (!checkpoint) {
          console.error(`Task ${id} not found.`);
          process.exitCode = 1;
          return;
        }
        for (const line of formatHistory(checkpoint.state.history)) console.log(line);
      } catch (err) {
        reportError(err);
      }
    });

  withRuntimeOptions(
    tasks
      .command('replay')
      .description('Resume a task from its latest checkpoint and wait for it to finish')
      .argument('<id>', 'Task ID'),
  ).action(async (id: string, opts: { graph: string; agents: string; executors: string }) => {
    let runtime: Runtime | undefined;
    try {
      runtime = await openRuntime(opts);
      await runtime.scheduler.replay(id);
      console.log(chalk.dim(`Replaying ${id}...`));
      const final = await runtime.scheduler.waitFor(id);
      await runtime.alerts.flush();
      for (const line of formatTaskSummary(final)) console.log(line);
      console.log('');
      for (const line of formatHistory(final.history)) console.log(line);
      if (final.status === 'failed') process.exitCode = 1;
    } catch (err) {
      reportError(err);
    } finally {
      await runtime?.stop();
    }
  });

  return tasks;
}
