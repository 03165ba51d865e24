import { describe, it, expect, beforeAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import chalk from 'chalk';
import { formatHistory, formatLabels, formatTable, formatTaskSummary, readPayload } from '../../src/cli/shared.js';
import { ValidationError } from '../../src/errors/index.js';
import { taskState } from '../helpers.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatTable', () => {
  it('pads columns to the widest plain cell', () => {
    expect(formatTable(['ID', 'STATUS'], [['t1', 'running'], ['task-22', 'ok']])).toEqual([
      'ID       STATUS ',
      't1       running',
      'task-22  ok     ',
    ]);
  });

  it('aligns coloured cells by their plain width', () => {
    expect(formatTable(['ID', 'STATUS'], [['t1', 'ok']], [['t1', '<ok>']])).toEqual(['ID  STATUS', 't1  <ok>    ']);
  });
});

describe('formatLabels', () => {
  it('aligns values after the longest label', () => {
    expect(formatLabels([['Task', 't1'], ['Escalations', '2']])).toEqual(['Task:        t1', 'Escalations: 2']);
  });
});

describe('formatHistory', () => {
  it('says when nothing has run', () => {
    expect(formatHistory([])).toEqual(['No nodes have run yet.']);
  });

  it('renders one row per attempt', () => {
    const lines = formatHistory([
      {
        nodeId: 'market',
        branch: 'market',
        timestamp: '2026-03-01T00:00:00.000Z',
        outcome: 'success',
        tier: 'operational',
        agentId: 'ops-research',
        attempt: 1,
        durationMs: 12.4,
      },
      {
        nodeId: 'review',
        timestamp: '2026-03-01T00:01:00.000Z',
        outcome: 'unavailable',
        tier: 'management',
        attempt: 1,
        error: 'no agent',
      },
    ]);
    expect(lines.map((l) => l.trim().split(/ {2,}/))).toEqual([
      ['#', 'NODE', 'TIER', 'AGENT', 'ATTEMPT', 'OUTCOME', 'MS', 'ERROR'],
      ['1', 'market (market)', 'operational', 'ops-research', '1', 'success', '12'],
      ['2', 'review', 'management', '-', '1', 'unavailable', '-', 'no agent'],
    ]);
  });
});

describe('formatTaskSummary', () => {
  it('adds the failure reason for failed tasks', () => {
    const lines = formatTaskSummary(taskState({ status: 'failed', failureReason: 'boom' }));
    expect(lines[0]).toBe('Task:         t1');
    expect(lines[lines.length - 1]).toBe('Failure:      boom');
  });
});

describe('readPayload', () => {
  it('is empty without a payload option', async () => {
    expect(await readPayload({})).toEqual({});
  });

  it('parses inline JSON and payload files', async () => {
    expect(await readPayload({ payload: '{"lead":{"company":"Acme"}}' })).toEqual({ lead: { company: 'Acme' } });

    const dir = await mkdtemp(join(tmpdir(), 'tierflow-payload-'));
    try {
      const file = join(dir, 'lead.json');
      await writeFile(file, '{"lead":{"value":5000}}');
      expect(await readPayload({ payload: '{"ignored":true}', payloadFile: file })).toEqual({ lead: { value: 5000 } });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects malformed or non-object payloads', async () => {
    await expect(readPayload({ payload: '{oops' })).rejects.toBeInstanceOf(ValidationError);
    await expect(readPayload({ payload: '[1, 2]' })).rejects.toThrow('Payload must be a JSON object');
  });
});
