/**
 * Error taxonomy for the orchestrator.
 *
 * Per-node failures are absorbed by the scheduler (retry, escalate or fail
 * the task). Only `ValidationError` is thrown back to a submitter.
 */

export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',
  TRANSIENT = 'TRANSIENT',
  AGENT_UNAVAILABLE = 'AGENT_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',
  FATAL = 'FATAL',
  ESCALATION_EXHAUSTED = 'ESCALATION_EXHAUSTED',
  GRAPH_INVALID = 'GRAPH_INVALID',
  CHECKPOINT = 'CHECKPOINT',
  CONFIG = 'CONFIG',
  NOT_FOUND = 'NOT_FOUND',
}

export class OrchestrationError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly retryable: boolean = false,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'OrchestrationError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/** Malformed input at submission; the task never enters the graph. */
export class ValidationError extends OrchestrationError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, ErrorCode.VALIDATION, false, issues);
    this.name = 'ValidationError';
  }
}

export class TransientError extends OrchestrationError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.TRANSIENT, true, details);
    this.name = 'TransientError';
  }
}

export class AgentUnavailableError extends OrchestrationError {
  constructor(
    public readonly capability: string,
    message = `No available agent for capability "${capability}"`,
  ) {
    super(message, ErrorCode.AGENT_UNAVAILABLE, false, { capability });
    this.name = 'AgentUnavailableError';
  }
}

export class TimeoutError extends OrchestrationError {
  constructor(
    public readonly nodeId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Node "${nodeId}" timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, true, { nodeId, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class FatalError extends OrchestrationError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.FATAL, false, details);
    this.name = 'FatalError';
  }
}

export class EscalationExhaustedError extends OrchestrationError {
  constructor(
    public readonly taskId: string,
    public readonly escalationCount: number,
  ) {
    super(
      `Task ${taskId} reached the escalation limit (${escalationCount})`,
      ErrorCode.ESCALATION_EXHAUSTED,
      false,
      { taskId, escalationCount },
    );
    this.name = 'EscalationExhaustedError';
  }
}

export class GraphValidationError extends OrchestrationError {
  constructor(public readonly issues: string[]) {
    super(`Workflow graph is invalid:\n  - ${issues.join('\n  - ')}`, ErrorCode.GRAPH_INVALID, false, issues);
    this.name = 'GraphValidationError';
  }
}

export class CheckpointError extends OrchestrationError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.CHECKPOINT, false, details);
    this.name = 'CheckpointError';
  }
}

export class ConfigError extends OrchestrationError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.CONFIG, false, details);
    this.name = 'ConfigError';
  }
}

export class NotFoundError extends OrchestrationError {
  constructor(message: string) {
    super(message, ErrorCode.NOT_FOUND, false);
    this.name = 'NotFoundError';
  }
}

/**
 * Normalise anything thrown into an OrchestrationError.
 * Unclassified errors are treated as transient so they get retried.
 */
export function toOrchestrationError(error: unknown): OrchestrationError {
  if (error instanceof OrchestrationError) return error;
  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new TransientError(error.message || 'Operation was aborted');
    }
    return new TransientError(error.message, { name: error.name });
  }
  if (typeof error === 'string') return new TransientError(error);
  return new TransientError('An unexpected error occurred', error);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Flatten zod issues (or any error) into printable lines. */
export function formatZodError(err: unknown): string[] {
  if (err instanceof Error && 'issues' in err && Array.isArray(err.issues)) {
    return err.issues.map((issue: { path?: Array<string | number>; message?: string }) => {
      const path = issue.path && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message ?? 'invalid value'}`;
    });
  }
  return [errorMessage(err)];
}
