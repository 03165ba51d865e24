import { randomUUID } from 'node:crypto';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, saveConfig } from '../../config/index.js';
import { AlertSeverity, createSender } from '../../alerting/index.js';
import { ValidationError } from '../../errors/index.js';
import { createLogger } from '../../log/index.js';
import { reportError } from '../shared.js';

export function createAlertsCommand(): Command {
  const alerts = new Command('alerts').description('Configure and test alert delivery');

  alerts
    .command('status')
    .description('Show alert thresholds and channels')
    .action(async () => {
      try {
        const { alerting } = await loadConfig();
        console.log(`Alerts: ${alerting.channels.enabled ? chalk.green('enabled') : chalk.dim('disabled')}`);
        if (alerting.channels.telegram) {
          console.log(`  Telegram: chat ${alerting.channels.telegram.chatId}`);
        } else {
          console.log(`  Telegram: ${chalk.dim('not configured')}`);
        }
        console.log(chalk.dim(`  Window: ${alerting.windowMs}ms`));
        console.log(chalk.dim(`  CPU > ${alerting.cpuPercent}%, memory > ${alerting.memoryPercent}%`));
        console.log(
          chalk.dim(`  HTTP error rate > ${alerting.httpErrorRate}, agent success rate < ${alerting.agentSuccessRate}`),
        );
      } catch (err) {
        reportError(err);
      }
    });

  alerts
    .command('enable')
    .description('Enable alert delivery')
    .action(async () => {
      try {
        const config = await loadConfig();
        config.alerting.channels.enabled = true;
        await saveConfig(config);
        console.log(chalk.green('Alerting enabled.'));
      } catch (err) {
        reportError(err);
      }
    });

  alerts
    .command('disable')
    .description('Disable alert delivery')
    .action(async () => {
      try {
        const config = await loadConfig();
        config.alerting.channels.enabled = false;
        await saveConfig(config);
        console.log(chalk.yellow('Alerting disabled.'));
      } catch (err) {
        reportError(err);
      }
    });

  alerts
    .command('set-telegram')
    .description('Configure Telegram delivery')
    .requiredOption('--bot-token <token>', 'Telegram bot token')
    .requiredOption('--chat-id <id>', 'Telegram chat ID')
    .action(async (opts: { botToken: string; chatId: string }) => {
      try {
        const config = await loadConfig();
        config.alerting.channels.telegram = { botToken: opts.botToken, chatId: opts.chatId };
        config.alerting.channels.enabled = true;
        await saveConfig(config);
        console.log(chalk.green('Telegram alerting configured and enabled.'));
      } catch (err) {
        reportError(err);
      }
    });

  alerts
    .command('test')
    .description('Send a test alert to the configured channels')
    .option('--severity <s>', 'info, warning, or critical', 'info')
    .action(async (opts: { severity: string }) => {
      try {
        const severity = AlertSeverity.safeParse(opts.severity);
        if (!severity.success) {
          throw new ValidationError(`Unknown severity "${opts.severity}"`, [
            `expected one of: ${AlertSeverity.options.join(', ')}`,
          ]);
        }
        const config = await loadConfig();
        const sender = createSender(config.alerting.channels, createLogger({ scope: 'alerts' }));
        if (!sender) {
          console.log(chalk.yellow('No alert channels are enabled. Run "tierflow alerts set-telegram" first.'));
          return;
        }
        console.log('Sending test alert...');
        await sender.send({
          id: randomUUID(),
          kind: 'test',
          severity: severity.data,
          title: 'tierflow test alert',
          message: `This is a test ${severity.data} alert from tierflow. If you see this, alerting is working!`,
          timestamp: new Date().toISOString(),
        });
        console.log(chalk.green('Done. Check your configured channels.'));
      } catch (err) {
        reportError(err);
      }
    });

  return alerts;
}
