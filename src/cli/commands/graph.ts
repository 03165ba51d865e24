import { Command } from 'commander';
import chalk from 'chalk';
import { loadGraphFile } from '../../graph/index.js';
import { GraphValidationError } from '../../errors/index.js';
import { reportError } from '../shared.js';

export function createGraphCommand(): Command {
  const graph = new Command('graph').description('Inspect workflow graph definitions');

  graph
    .command('validate')
    .description('Check a graph file for structural errors')
    .argument('<file>', 'Graph definition (JSON)')
    .action(async (file: string) => {
      try {
        const loaded = await loadGraphFile(file);
        console.log(chalk.green(`Graph is valid: ${loaded.nodeIds().length} nodes`));
        console.log(chalk.dim(`  Entry points: ${loaded.entryPoints().join(', ')}`));
      } catch (err) {
        if (err instanceof GraphValidationError) {
          console.error(chalk.red('Graph is invalid:'));
          for (const issue of err.issues) console.error(`  - ${issue}`);
          process.exitCode = 1;
          return;
        }
        reportError(err);
      }
    });

  return graph;
}
