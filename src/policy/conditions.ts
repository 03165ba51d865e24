import type { Payload } from '../types/task.js';
import type { Condition } from './types.js';

type Scalar = string | number | boolean;

/** Read a dotted path out of a payload; undefined when any segment is missing. */
export function readField(payload: Payload, path: string): unknown {
  let current: unknown = payload;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) return undefined;
    current = Object.hasOwn(current, segment) ? Reflect.get(current, segment) : undefined;
  }
  return current;
}

export function matchPattern(pattern: string, id: string): boolean {
  if (pattern === '*') return true;
  if (pattern === id) return true;
  // Glob: "sales.*" matches "sales.qualify", "sales.propose", etc.
  if (pattern.endsWith('.*')) {
    const prefix = pattern.slice(0, -2);
    return id.startsWith(prefix + '.');
  }
  return false;
}

function toNumber(v: unknown): number | undefined {
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function compareNumeric(raw: unknown, target: Scalar | Scalar[] | undefined, test: (a: number, b: number) => boolean): boolean {
  if (Array.isArray(target)) return false;
  const a = toNumber(raw);
  const b = toNumber(target);
  return a !== undefined && b !== undefined && test(a, b);
}

function isScalar(v: unknown): v is Scalar {
  return typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean';
}

export function evaluateCondition(cond: Condition, payload: Payload): boolean {
  const raw = readField(payload, cond.field);
  const compareVals = cond.value === undefined ? [] : Array.isArray(cond.value) ? cond.value : [cond.value];

  switch (cond.op) {
    case 'exists':
      return raw !== undefined && raw !== null;
    case 'eq':
      return isScalar(raw) && compareVals.length === 1 && raw === compareVals[0];
    case 'neq':
      return !(isScalar(raw) && compareVals.length === 1 && raw === compareVals[0]);
    case 'gt':
      return compareNumeric(raw, cond.value, (a, b) => a > b);
    case 'gte':
      return compareNumeric(raw, cond.value, (a, b) => a >= b);
    case 'lt':
      return compareNumeric(raw, cond.value, (a, b) => a < b);
    case 'lte':
      return compareNumeric(raw, cond.value, (a, b) => a <= b);
    case 'in':
      return isScalar(raw) && compareVals.includes(raw);
    case 'notIn':
      return isScalar(raw) && !compareVals.includes(raw);
    case 'contains':
      // For array fields (like tags): check if any compareVal is in the array
      return Array.isArray(raw) && compareVals.some((v) => raw.includes(v));
    default:
      return false;
  }
}

export function evaluateAll(conditions: Condition[], payload: Payload): boolean {
  return conditions.every((cond) => evaluateCondition(cond, payload));
}
