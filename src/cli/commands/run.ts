import { Command } from 'commander';
import chalk from 'chalk';
import { Priority } from '../../types/index.js';
import { ValidationError } from '../../errors/index.js';
import type { Runtime } from '../../runtime/index.js';
import {
  formatHistory,
  formatTaskSummary,
  openRuntime,
  readPayload,
  reportError,
  withRuntimeOptions,
} from '../shared.js';

interface RunOptions {
  graph: string;
  agents: string;
  executors: string;
  entry?: string;
  payload?: string;
  payloadFile?: string;
  priority: string;
  taskId?: string;
  json?: boolean;
}

export function createRunCommand(): Command {
  return withRuntimeOptions(
    new Command('run').description('Run one task through a workflow graph and print its history'),
  )
    .option('--entry <node>', 'Entry node (defaults to the first declared entry point)')
    .option('--payload <json>', 'Task payload as a JSON object')
    .option('--payload-file <file>', 'Read the task payload from a JSON file')
    .option('--priority <p>', 'low, medium, high or critical', 'medium')
    .option('--task-id <id>', 'Use this task id instead of a generated one')
    .option('--json', 'Print the final task state as JSON')
    .action(async (opts: RunOptions) => {
      let runtime: Runtime | undefined;
      try {
        const priority = Priority.safeParse(opts.priority);
        if (!priority.success) {
          throw new ValidationError(`Unknown priority "${opts.priority}"`, [`expected one of: ${Priority.options.join(', ')}`]);
        }
        const payload = await readPayload(opts);

        runtime = await openRuntime(opts);
        const entryNode = opts.entry ?? runtime.graph.entryPoints()[0];
        const { taskId } = runtime.scheduler.submit({ taskId: opts.taskId, entryNode, payload, priority: priority.data });
        if (!opts.json) console.log(chalk.dim(`Submitted ${taskId} at "${entryNode}"`));

        const final = await runtime.scheduler.waitFor(taskId);
        await runtime.alerts.flush();

        if (opts.json) {
          console.log(JSON.stringify(final, null, 2));
        } else {
          console.log('');
          for (const line of formatTaskSummary(final)) console.log(line);
          console.log('');
          for (const line of formatHistory(final.history)) console.log(line);
        }
        if (final.status === 'failed') process.exitCode = 1;
      } catch (err) {
        reportError(err);
      } finally {
        await runtime?.stop();
      }
    });
}
