export { Tier, TIERS, tierRank, nextTier, isAbove } from './tier.js';

export {
  Priority,
  priorityRank,
  TaskStatus,
  Outcome,
  Payload,
  HistoryEntrySchema,
  EscalationRecordSchema,
  BranchStatus,
  BranchStateSchema,
  FanOutStateSchema,
  TaskStateSchema,
  SubmitTaskInputSchema,
  SUCCEEDED_NODE,
  FAILED_NODE,
  isTerminalMarker,
  isTerminalStatus,
} from './task.js';
export type {
  TerminalMarker,
  HistoryEntry,
  EscalationRecord,
  BranchState,
  FanOutState,
  TaskState,
  SubmitTaskInput,
  TaskHandle,
  TaskStatusView,
} from './task.js';

export { AgentHealth, AgentDescriptorSchema } from './agent.js';
export type {
  AgentDescriptor,
  AgentDescriptorInput,
  AgentContext,
  AgentResult,
  AgentExecutor,
  HealthProbe,
} from './agent.js';

export {
  ConfigSchema,
  DEFAULT_CONFIG,
  LogLevel,
  BackoffSchema,
  SchedulerConfigSchema,
  EscalationConfigSchema,
  CheckpointConfigSchema,
  RegistryConfigSchema,
  MetricsConfigSchema,
  MetricsWindowSchema,
  AlertingConfigSchema,
} from './config.js';
export type {
  Config,
  ConfigInput,
  Backoff,
  SchedulerConfig,
  SchedulerConfigInput,
  EscalationConfig,
  EscalationConfigInput,
  CheckpointConfig,
  RegistryConfig,
  MetricsConfig,
  MetricsWindow,
  AlertingConfig,
  AlertingConfigInput,
} from './config.js';
