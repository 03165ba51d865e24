import chalk from 'chalk';
import { LogLevel } from '../types/config.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string, detail?: Record<string, unknown>): void;
  info(message: string, detail?: Record<string, unknown>): void;
  warn(message: string, detail?: Record<string, unknown>): void;
  error(message: string, detail?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
}

function formatDetail(detail?: Record<string, unknown>): string {
  if (!detail) return '';
  const parts = Object.entries(detail)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? ' ' + chalk.dim(parts.join(' ')) : '';
}

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const parsed = LogLevel.safeParse(process.env.TIERFLOW_LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

/**
 * Console logger with a bracketed scope prefix, e.g. `[scheduler] task queued`.
 * Warnings and errors go to stderr.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = resolveLevel(opts.level);
  const prefix = opts.scope ? `[${opts.scope}] ` : '';
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug(message, detail) {
      if (enabled('debug')) console.log(chalk.dim(prefix + message) + formatDetail(detail));
    },
    info(message, detail) {
      if (enabled('info')) console.log(prefix + message + formatDetail(detail));
    },
    warn(message, detail) {
      if (enabled('warn')) console.error(chalk.yellow(prefix + message) + formatDetail(detail));
    },
    error(message, detail) {
      if (enabled('error')) console.error(chalk.red(prefix + message) + formatDetail(detail));
    },
    child(scope) {
      return createLogger({ scope: opts.scope ? `${opts.scope}:${scope}` : scope, level });
    },
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
