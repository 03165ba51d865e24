import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, getTierflowDir } from '../config/index.js';
import { OrchestrationError, ValidationError, errorMessage } from '../errors/index.js';
import { Payload } from '../types/index.js';
import type { Config, HistoryEntry, Outcome, TaskState, TaskStatus } from '../types/index.js';
import { createCheckpointStore, createRuntime } from '../runtime/index.js';
import type { Runtime } from '../runtime/index.js';
import type { CheckpointStore } from '../checkpoint/index.js';

export interface RuntimeFileOptions {
  graph: string;
  agents: string;
  executors: string;
}

export function withRuntimeOptions(cmd: Command): Command {
  return cmd
    .requiredOption('--graph <file>', 'Workflow graph definition (JSON)')
    .requiredOption('--agents <file>', 'Agent descriptors (JSON)')
    .requiredOption('--executors <module>', 'Module exporting executors keyed by agent id');
}

export async function openRuntime(opts: RuntimeFileOptions, config?: Config): Promise<Runtime> {
  return createRuntime({
    config: config ?? (await loadConfig()),
    graphPath: opts.graph,
    agentsPath: opts.agents,
    executorsPath: opts.executors,
  });
}

export async function openCheckpoints(config?: Config): Promise<CheckpointStore> {
  const resolved = config ?? (await loadConfig());
  return createCheckpointStore(resolved.checkpoints, getTierflowDir());
}

/** Payload from `--payload <json>` or `--payload-file <path>`; empty when neither is given. */
export async function readPayload(opts: { payload?: string; payloadFile?: string }): Promise<Payload> {
  const raw = opts.payloadFile ? await readFile(opts.payloadFile, 'utf-8') : opts.payload;
  if (raw === undefined) return {};

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`Payload is not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = Payload.safeParse(data);
  if (!parsed.success) throw new ValidationError('Payload must be a JSON object');
  return parsed.data;
}

/** Print an error and its issue lines, and mark the process as failed. */
export function reportError(err: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  if (err instanceof ValidationError) {
    for (const issue of err.issues) console.error(chalk.dim(`  - ${issue}`));
  } else if (!(err instanceof OrchestrationError) && err instanceof Error && err.stack) {
    console.error(chalk.dim(err.stack.split('\n').slice(1, 4).join('\n')));
  }
  process.exitCode = 1;
}

export function statusColor(s: TaskStatus): string {
  switch (s) {
    case 'succeeded': return chalk.green(s);
    case 'failed': return chalk.red(s);
    case 'awaiting_fan_in': return chalk.cyan(s);
    default: return chalk.yellow(s);
  }
}

export function outcomeColor(o: Outcome): string {
  switch (o) {
    case 'success':
    case 'terminal':
      return chalk.green(o);
    case 'transient_error':
    case 'timeout':
      return chalk.yellow(o);
    case 'cancelled':
      return chalk.dim(o);
    default:
      return chalk.red(o);
  }
}

/**
 * Pad columns by the plain text width so that colour codes in `colored`
 * do not skew alignment.
 */
export function formatTable(header: string[], plainRows: string[][], coloredRows: string[][] = plainRows): string[] {
  const allPlain = [header, ...plainRows];
  const widths = header.map((_, i) => Math.max(...allPlain.map((r) => (r[i] ?? '').length)));
  const fmtPlain = (row: string[]) => row.map((c, i) => c.padEnd(widths[i])).join('  ');
  const fmtColored = (row: string[], plain: string[]) =>
    row.map((c, i) => c + ' '.repeat(Math.max(0, widths[i] - plain[i].length))).join('  ');

  return [
    chalk.bold(fmtPlain(header)),
    ...coloredRows.map((row, i) => fmtColored(row, plainRows[i])),
  ];
}

export function formatLabels(pairs: Array<[string, string]>): string[] {
  const labelWidth = Math.max(...pairs.map(([label]) => label.length)) + 1;
  return pairs.map(([label, value]) => `${(label + ':').padEnd(labelWidth)} ${value}`);
}

export function formatHistory(history: HistoryEntry[]): string[] {
  if (history.length === 0) return [chalk.dim('No nodes have run yet.')];
  const header = ['#', 'NODE', 'TIER', 'AGENT', 'ATTEMPT', 'OUTCOME', 'MS', 'ERROR'];
  const plain = history.map((h, i) => [
    String(i + 1),
    h.branch ? `${h.nodeId} (${h.branch})` : h.nodeId,
    h.tier,
    h.agentId ?? '-',
    String(h.attempt),
    h.outcome,
    h.durationMs === undefined ? '-' : String(Math.round(h.durationMs)),
    h.error ?? '',
  ]);
  const colored = plain.map((row, i) => {
    const copy = [...row];
    copy[5] = outcomeColor(history[i].outcome);
    return copy;
  });
  return formatTable(header, plain, colored);
}

export function formatTaskSummary(state: TaskState): string[] {
  const pairs: Array<[string, string]> = [
    ['Task', state.taskId],
    ['Status', statusColor(state.status)],
    ['Node', state.currentNode],
    ['Tier', state.tier],
    ['Priority', state.priority],
    ['Escalations', String(state.escalationCount)],
    ['SLA deadline', state.slaBreached ? chalk.red(`${state.slaDeadline} (breached)`) : state.slaDeadline],
    ['Updated', state.updatedAt],
  ];
  if (state.fanOut) {
    const running = state.fanOut.branches.filter((b) => b.status === 'running').length;
    pairs.push(['Fan-out', `${state.fanOut.fromNode} -> ${state.fanOut.joinNode}, ${running} branch(es) running`]);
  }
  if (state.failureReason) pairs.push(['Failure', chalk.red(state.failureReason)]);
  return formatLabels(pairs);
}
