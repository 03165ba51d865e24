import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { ConfigSchema, DEFAULT_CONFIG } from '../types/index.js';
import type { Config } from '../types/index.js';
import { ConfigError, formatZodError } from '../errors/index.js';

const TIERFLOW_DIR_NAME = '.tierflow';
const CONFIG_FILE_NAME = 'config.json';

export function getTierflowDir(): string {
  return process.env.TIERFLOW_HOME ?? join(homedir(), TIERFLOW_DIR_NAME);
}

export async function ensureTierflowDir(): Promise<string> {
  const dir = getTierflowDir();
  await mkdir(dir, { recursive: true });
  return dir;
}

export function getConfigPath(): string {
  return join(getTierflowDir(), CONFIG_FILE_NAME);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load config from the tierflow directory. A missing file yields defaults;
 * a file that fails validation is an error rather than being overwritten.
 */
export async function loadConfig(path: string = getConfigPath()): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return DEFAULT_CONFIG;
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config at ${path} is not valid JSON`, formatZodError(err));
  }

  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatZodError(parsed.error);
    throw new ConfigError(`Config at ${path} is invalid: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export async function saveConfig(config: Config, path: string = getConfigPath()): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const validated = ConfigSchema.parse(config);
  await writeFile(path, JSON.stringify(validated, null, 2) + '\n', 'utf-8');
}
