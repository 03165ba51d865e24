import { join } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, getTierflowDir } from '../../config/index.js';
import { MetricsCollector } from '../../metrics/index.js';
import { formatTable, openCheckpoints, reportError } from '../shared.js';

async function collectFromCheckpoints(): Promise<MetricsCollector> {
  const config = await loadConfig();
  const store = await openCheckpoints(config);
  const collector = new MetricsCollector({ windows: config.metrics.windows });
  for (const taskId of await store.listTasks()) {
    const checkpoint = await store.load(taskId);
    if (checkpoint) collector.ingestTask(checkpoint.state);
  }
  return collector;
}

export function createMetricsCommand(): Command {
  const metrics = new Command('metrics').description('Agent and task metrics rebuilt from checkpoints');

  metrics
    .command('export')
    .description('Write a metrics snapshot as JSON')
    .option('--timeframe <name>', 'Metrics window, e.g. 1h, 24h or 7d', '24h')
    .option('--out <file>', 'Output path (defaults to ~/.tierflow/metrics-<timeframe>.json)')
    .action(async (opts: { timeframe: string; out?: string }) => {
      try {
        const collector = await collectFromCheckpoints();
        const out = opts.out ?? join(getTierflowDir(), `metrics-${opts.timeframe}.json`);
        const snapshot = await collector.exportSnapshot(out, opts.timeframe);
        console.log(chalk.green(`Metrics for ${snapshot.timeframe} written to ${out}`));
        console.log(
          chalk.dim(
            `  ${snapshot.agents.length} agents, ${snapshot.tasks.submitted} submitted, ` +
              `${snapshot.tasks.succeeded} succeeded, ${snapshot.tasks.failed} failed`,
          ),
        );
      } catch (err) {
        reportError(err);
      }
    });

  metrics
    .command('rank')
    .description('Rank agents by performance score')
    .option('--timeframe <name>', 'Metrics window', '24h')
    .action(async (opts: { timeframe: string }) => {
      try {
        const collector = await collectFromCheckpoints();
        const ranked = collector.rankAgents(opts.timeframe);
        if (ranked.length === 0) {
          console.log(`No agent activity in the last ${opts.timeframe}.`);
          return;
        }
        const header = ['RANK', 'AGENT', 'TASKS', 'SUCCESS', 'AVG MS', 'SCORE'];
        const plain = ranked.map((a, i) => [
          String(i + 1),
          a.agentId,
          String(a.taskCount),
          `${Math.round(a.successRate * 100)}%`,
          String(Math.round(a.averageDurationMs)),
          a.performanceScore.toFixed(2),
        ]);
        for (const line of formatTable(header, plain)) console.log(line);
      } catch (err) {
        reportError(err);
      }
    });

  return metrics;
}
