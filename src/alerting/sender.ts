import { errorMessage } from '../errors/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { AlertingConfig } from '../types/index.js';
import type { Alert, AlertSender } from './types.js';

function severityEmoji(s: string): string {
  switch (s) {
    case 'critical':
      return '🔴';
    case 'warning':
      return '🟡';
    default:
      return 'ℹ️';
  }
}

function escapeMarkdown(text: string): string {
  return text.replace(/([_*[\]()~`>#+\-=|{}.!\\])/g, '\\$1');
}

export function formatTelegramText(alert: Alert): string {
  return [
    `${severityEmoji(alert.severity)} *${escapeMarkdown(alert.title)}*`,
    '',
    escapeMarkdown(alert.message),
    alert.agentId ? `Agent: ${escapeMarkdown(alert.agentId)}` : '',
    alert.taskId ? `Task: ${escapeMarkdown(alert.taskId)}` : '',
    `_${escapeMarkdown(alert.timestamp)}_`,
  ]
    .filter(Boolean)
    .join('\n');
}

export class TelegramSender implements AlertSender {
  constructor(
    private readonly config: { botToken: string; chatId: string },
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async send(alert: Alert): Promise<void> {
    const url = `https://api.telegram.org/bot${this.config.botToken}/sendMessage`;
    const res = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: this.config.chatId,
        text: formatTelegramText(alert),
        parse_mode: 'MarkdownV2',
      }),
    });
    if (!res.ok) {
      throw new Error(`Telegram responded ${res.status}`);
    }
  }
}

/** Sends to every configured channel; a failing channel is logged, not thrown. */
export class ChannelSender implements AlertSender {
  constructor(
    private readonly channels: Array<{ name: string; sender: AlertSender }>,
    private readonly logger: Logger = silentLogger,
  ) {}

  get size(): number {
    return this.channels.length;
  }

  async send(alert: Alert): Promise<void> {
    await Promise.all(
      this.channels.map(async ({ name, sender }) => {
        try {
          await sender.send(alert);
        } catch (err) {
          this.logger.error(`failed to send ${name} alert`, { kind: alert.kind, error: errorMessage(err) });
        }
      }),
    );
  }
}

/** Senders for the enabled channels in the alerting config; undefined when disabled. */
export function createSender(config: AlertingConfig['channels'], logger: Logger = silentLogger): AlertSender | undefined {
  if (!config.enabled) return undefined;
  const channels: Array<{ name: string; sender: AlertSender }> = [];
  if (config.telegram) channels.push({ name: 'telegram', sender: new TelegramSender(config.telegram) });
  return channels.length > 0 ? new ChannelSender(channels, logger) : undefined;
}
