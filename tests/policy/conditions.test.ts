import { describe, it, expect } from 'vitest';
import { evaluateAll, evaluateCondition, matchPattern, readField } from '../../src/policy/index.js';
import type { Condition } from '../../src/policy/index.js';

const payload = {
  lead: { company: 'Acme', value: 250000, tags: ['enterprise', 'emea'] },
  score: '85',
  active: true,
};

describe('readField', () => {
  it('follows dotted paths', () => {
    expect(readField(payload, 'lead.company')).toBe('Acme');
    expect(readField(payload, 'lead.missing')).toBeUndefined();
    expect(readField(payload, 'lead.company.length')).toBeUndefined();
  });

  it('does not walk into arrays or inherited properties', () => {
    expect(readField(payload, 'lead.tags.0')).toBeUndefined();
    expect(readField(payload, 'lead.toString')).toBeUndefined();
  });
});

describe('evaluateCondition', () => {
  const cases: Array<[Condition, boolean]> = [
    [{ field: 'lead.company', op: 'eq', value: 'Acme' }, true],
    [{ field: 'lead.company', op: 'neq', value: 'Acme' }, false],
    [{ field: 'lead.value', op: 'gte', value: 250000 }, true],
    [{ field: 'lead.value', op: 'gt', value: 250000 }, false],
    [{ field: 'score', op: 'gt', value: 70 }, true],
    [{ field: 'score', op: 'lt', value: '90' }, true],
    [{ field: 'lead.value', op: 'lte', value: 'many' }, false],
    [{ field: 'lead.company', op: 'in', value: ['Acme', 'Globex'] }, true],
    [{ field: 'lead.company', op: 'notIn', value: ['Acme'] }, false],
    [{ field: 'lead.tags', op: 'contains', value: 'emea' }, true],
    [{ field: 'lead.tags', op: 'contains', value: ['apac', 'amer'] }, false],
    [{ field: 'active', op: 'exists' }, true],
    [{ field: 'inactive', op: 'exists' }, false],
  ];

  it.each(cases)('%o -> %s', (cond, expected) => {
    expect(evaluateCondition(cond, payload)).toBe(expected);
  });

  it('treats neq on a missing field as a match', () => {
    expect(evaluateCondition({ field: 'nope', op: 'neq', value: 1 }, payload)).toBe(true);
  });
});

describe('evaluateAll', () => {
  it('requires every condition', () => {
    const conds: Condition[] = [
      { field: 'lead.value', op: 'gte', value: 100000 },
      { field: 'active', op: 'eq', value: true },
    ];
    expect(evaluateAll(conds, payload)).toBe(true);
    expect(evaluateAll([...conds, { field: 'lead.company', op: 'eq', value: 'Globex' }], payload)).toBe(false);
  });
});

describe('matchPattern', () => {
  it('matches wildcards, exact ids and prefix globs', () => {
    expect(matchPattern('*', 'anything')).toBe(true);
    expect(matchPattern('propose', 'propose')).toBe(true);
    expect(matchPattern('sales.*', 'sales.propose')).toBe(true);
    expect(matchPattern('sales.*', 'salesforce')).toBe(false);
    expect(matchPattern('propose', 'review')).toBe(false);
  });
});
