export {
  ErrorCode,
  OrchestrationError,
  ValidationError,
  TransientError,
  AgentUnavailableError,
  TimeoutError,
  FatalError,
  EscalationExhaustedError,
  GraphValidationError,
  CheckpointError,
  ConfigError,
  NotFoundError,
  toOrchestrationError,
  errorMessage,
  formatZodError,
} from './errors.js';
