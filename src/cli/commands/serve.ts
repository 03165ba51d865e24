import { Command } from 'commander';
import chalk from 'chalk';
import { startServer } from '../../server/index.js';
import { ValidationError, errorMessage } from '../../errors/index.js';
import { openRuntime, reportError, withRuntimeOptions } from '../shared.js';

interface ServeOptions {
  graph: string;
  agents: string;
  executors: string;
  port: string;
  host: string;
}

export function createServeCommand(): Command {
  return withRuntimeOptions(
    new Command('serve').description('Run the scheduler behind an HTTP API and WebSocket event stream'),
  )
    .option('--port <port>', 'Port to listen on', '7400')
    .option('--host <host>', 'Interface to bind', '127.0.0.1')
    .action(async (opts: ServeOptions) => {
      try {
        const port = parseInt(opts.port, 10);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          throw new ValidationError(`Invalid port "${opts.port}"`);
        }

        const runtime = await openRuntime(opts);
        runtime.start();
        const running = await startServer(runtime, {
          port,
          host: opts.host,
          logger: runtime.logger.child('http'),
        });

        console.log(chalk.bold('tierflow') + ` listening on ${running.url}`);
        console.log(chalk.dim(`  Graph entry points: ${runtime.graph.entryPoints().join(', ')}`));
        console.log(chalk.dim(`  Agents: ${runtime.registry.list().length}`));
        console.log(chalk.dim('  Press Ctrl+C to stop'));

        const shutdown = () => {
          console.log(chalk.dim('\nShutting down...'));
          void running
            .close()
            .then(() => runtime.stop())
            .catch((err: unknown) => {
              console.error(chalk.red(`Shutdown failed: ${errorMessage(err)}`));
              process.exitCode = 1;
            });
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      } catch (err) {
        reportError(err);
      }
    });
}
