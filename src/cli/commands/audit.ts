import { Command } from 'commander';
import chalk from 'chalk';
import { getTierflowDir } from '../../config/index.js';
import { AuditQuerySchema } from '../../audit/index.js';
import { ValidationError, formatZodError } from '../../errors/index.js';
import { createAuditStore } from '../../runtime/index.js';
import { formatTable, reportError } from '../shared.js';

interface AuditListOptions {
  action?: string;
  task?: string;
  agent?: string;
  since?: string;
  limit: string;
  json?: boolean;
}

export function createAuditCommand(): Command {
  const audit = new Command('audit').description('Query the audit log');

  audit
    .command('list')
    .description('List audit entries, newest first')
    .option('--action <action>', 'Only this action, e.g. task.escalate')
    .option('--task <id>', 'Only entries for this task')
    .option('--agent <id>', 'Only entries for this agent')
    .option('--since <iso>', 'Only entries at or after this time')
    .option('--limit <n>', 'Maximum entries', '50')
    .option('--json', 'Output as JSON')
    .action(async (opts: AuditListOptions) => {
      try {
        const query = AuditQuerySchema.safeParse({
          action: opts.action,
          taskId: opts.task,
          agentId: opts.agent,
          since: opts.since,
          limit: parseInt(opts.limit, 10),
        });
        if (!query.success) {
          throw new ValidationError('Invalid audit query', formatZodError(query.error));
        }

        const entries = await createAuditStore(getTierflowDir()).query(query.data);
        if (opts.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }
        if (entries.length === 0) {
          console.log('No audit entries found.');
          return;
        }

        const header = ['TIMESTAMP', 'ACTION', 'ACTOR', 'TASK', 'AGENT', 'OK'];
        const plain = entries.map((e) => [
          e.timestamp,
          e.action,
          e.actor,
          e.taskId ?? '-',
          e.agentId ?? '-',
          e.success ? 'yes' : 'no',
        ]);
        const colored = entries.map((e, i) => {
          const row = [...plain[i]];
          row[5] = e.success ? chalk.green('yes') : chalk.red('no');
          return row;
        });
        for (const line of formatTable(header, plain, colored)) console.log(line);
      } catch (err) {
        reportError(err);
      }
    });

  return audit;
}
