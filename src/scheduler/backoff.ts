import type { Backoff } from '../types/index.js';

/** Delay before retry number `retry` (1-based): base * factor^(retry-1), capped. */
export function backoffDelay(retry: number, backoff: Backoff): number {
  const exponent = Math.max(0, retry - 1);
  return Math.min(backoff.maxMs, Math.round(backoff.baseMs * Math.pow(backoff.factor, exponent)));
}
