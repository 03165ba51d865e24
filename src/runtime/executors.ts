import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError } from '../errors/index.js';
import type { AgentExecutor, HealthProbe } from '../types/index.js';

export interface ExecutorModule {
  executors: Record<string, AgentExecutor>;
  probes: Record<string, HealthProbe>;
}

export function isExecutor(value: unknown): value is AgentExecutor {
  return typeof value === 'object' && value !== null && 'process' in value && typeof value.process === 'function';
}

function isProbe(value: unknown): value is HealthProbe {
  return typeof value === 'function';
}

function table<T>(
  mod: object,
  key: string,
  guard: (value: unknown) => value is T,
  required: boolean,
  path: string,
): Record<string, T> {
  const raw: unknown = key in mod ? Reflect.get(mod, key) : undefined;
  if (raw === undefined && !required) return {};
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigError(`${path} must export an object named "${key}"`);
  }
  const out: Record<string, T> = {};
  for (const [id, value] of Object.entries(raw)) {
    if (!guard(value)) throw new ConfigError(`${path}: ${key}.${id} has the wrong shape`);
    out[id] = value;
  }
  return out;
}

/**
 * Import a module exporting `executors` (agent id -> executor) and,
 * optionally, `probes` (agent id -> health probe).
 */
export async function loadExecutorModule(path: string): Promise<ExecutorModule> {
  const mod: unknown = await import(pathToFileURL(resolve(path)).href);
  if (typeof mod !== 'object' || mod === null) {
    throw new ConfigError(`${path} is not a module`);
  }
  return {
    executors: table(mod, 'executors', isExecutor, true, path),
    probes: table(mod, 'probes', isProbe, false, path),
  };
}
