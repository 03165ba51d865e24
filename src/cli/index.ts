#!/usr/bin/env node

import { Command } from 'commander';
import { createGraphCommand } from './commands/graph.js';
import { createRunCommand } from './commands/run.js';
import { createTasksCommand } from './commands/tasks.js';
import { createMetricsCommand } from './commands/metrics.js';
import { createAlertsCommand } from './commands/alerts.js';
import { createAuditCommand } from './commands/audit.js';
import { createServeCommand } from './commands/serve.js';

const program = new Command('tierflow')
  .description('Hierarchical task orchestration for tiered agent teams')
  .version('0.1.0');

program.addCommand(createGraphCommand());
program.addCommand(createRunCommand());
program.addCommand(createTasksCommand());
program.addCommand(createMetricsCommand());
program.addCommand(createAlertsCommand());
program.addCommand(createAuditCommand());
program.addCommand(createServeCommand());

await program.parseAsync();
