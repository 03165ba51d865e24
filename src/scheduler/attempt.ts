import { toOrchestrationError } from '../errors/index.js';
import type { OrchestrationError } from '../errors/index.js';
import type { AgentContext, AgentExecutor, AgentResult, Outcome } from '../types/index.js';

export type AttemptResult =
  | { kind: 'result'; result: AgentResult }
  | { kind: 'error'; error: OrchestrationError }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

/** How the scheduler treats an attempt once it has finished. */
export type AttemptClass =
  | { kind: 'success'; output: Record<string, unknown> }
  | { kind: 'retryable'; outcome: Outcome; error: string }
  | { kind: 'fatal'; error: string }
  | { kind: 'terminal'; outcome: 'succeeded' | 'failed'; output: Record<string, unknown>; error?: string }
  | { kind: 'cancelled' };

/**
 * Call the executor. The returned promise never rejects: anything thrown,
 * synchronously or not, comes back as an `error` result.
 */
export function invokeExecutor(executor: AgentExecutor, context: AgentContext): Promise<AttemptResult> {
  return Promise.resolve()
    .then(() => executor.process(context))
    .then(
      (result): AttemptResult => ({ kind: 'result', result }),
      (err: unknown): AttemptResult => ({ kind: 'error', error: toOrchestrationError(err) }),
    );
}

/**
 * Wait for an attempt, a timeout, or cancellation, whichever comes first.
 * The underlying call keeps running after a timeout; callers hold its
 * concurrency slot until `processing` settles.
 */
export function awaitAttempt(
  processing: Promise<AttemptResult>,
  timeoutMs: number,
  signal: AbortSignal,
): Promise<AttemptResult> {
  return new Promise((resolve) => {
    const finish = (result: AttemptResult) => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      resolve(result);
    };
    const onAbort = () => finish({ kind: 'cancelled' });
    const timer = setTimeout(() => finish({ kind: 'timeout' }), timeoutMs);

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void processing.then(finish);
  });
}

export function classifyAttempt(attempt: AttemptResult): AttemptClass {
  switch (attempt.kind) {
    case 'cancelled':
      return { kind: 'cancelled' };
    case 'timeout':
      return { kind: 'retryable', outcome: 'timeout', error: 'timed out' };
    case 'error':
      return attempt.error.retryable
        ? { kind: 'retryable', outcome: 'transient_error', error: attempt.error.message }
        : { kind: 'fatal', error: attempt.error.message };
    case 'result': {
      const result = attempt.result;
      switch (result.status) {
        case 'success':
          return { kind: 'success', output: result.output ?? {} };
        case 'transient_error':
          return { kind: 'retryable', outcome: 'transient_error', error: result.error };
        case 'fatal_error':
          return { kind: 'fatal', error: result.error };
        case 'terminal':
          return { kind: 'terminal', outcome: result.outcome, output: result.output ?? {}, error: result.error };
      }
    }
  }
}

export function outcomeOf(cls: AttemptClass): Outcome {
  switch (cls.kind) {
    case 'success':
      return 'success';
    case 'retryable':
      return cls.outcome;
    case 'fatal':
      return 'fatal_error';
    case 'terminal':
      return 'terminal';
    case 'cancelled':
      return 'cancelled';
  }
}
