import { z } from 'zod';
import { ValueThresholdSchema } from '../policy/types.js';

const HOUR = 3_600_000;

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

export const BackoffSchema = z.object({
  baseMs: z.number().int().nonnegative().default(1000),
  factor: z.number().min(1).default(2),
  maxMs: z.number().int().nonnegative().default(30_000),
});
export type Backoff = z.infer<typeof BackoffSchema>;

export const SchedulerConfigSchema = z.object({
  backoff: BackoffSchema.default({}),
  defaultMaxRetries: z.number().int().nonnegative().default(2),
  defaultTimeoutMs: z.number().int().positive().default(30_000),
  slaMs: z
    .object({
      critical: z.number().int().positive().default(HOUR),
      high: z.number().int().positive().default(4 * HOUR),
      medium: z.number().int().positive().default(24 * HOUR),
      low: z.number().int().positive().default(72 * HOUR),
    })
    .default({}),
});
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof SchedulerConfigSchema>;

export const EscalationConfigSchema = z.object({
  maxEscalations: z.number().int().nonnegative().default(2),
  thresholds: z.array(ValueThresholdSchema).default([]),
});
export type EscalationConfig = z.infer<typeof EscalationConfigSchema>;
export type EscalationConfigInput = z.input<typeof EscalationConfigSchema>;

export const CheckpointConfigSchema = z.object({
  store: z.enum(['json', 'memory', 'dynamo']).default('json'),
  /** Sequences kept per task; 0 keeps all */
  retention: z.number().int().nonnegative().default(20),
  dynamoTable: z.string().default('tierflow-checkpoints'),
  awsRegion: z.string().default('us-east-1'),
});
export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>;

export const RegistryConfigSchema = z.object({
  /** capability tag -> substitute tag used when the primary has no available agent */
  substitutes: z.record(z.string()).default({}),
  healthCheckIntervalMs: z.number().int().positive().default(60_000),
  failureThreshold: z.number().int().positive().default(3),
});
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;

export const MetricsWindowSchema = z.object({
  name: z.string().min(1),
  durationMs: z.number().int().positive(),
});
export type MetricsWindow = z.infer<typeof MetricsWindowSchema>;

export const MetricsConfigSchema = z.object({
  windows: z
    .array(MetricsWindowSchema)
    .min(1)
    .default([
      { name: '1h', durationMs: HOUR },
      { name: '24h', durationMs: 24 * HOUR },
      { name: '7d', durationMs: 7 * 24 * HOUR },
    ]),
  /** How often a running server samples host CPU and memory */
  systemSampleIntervalMs: z.number().int().positive().default(30_000),
});
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;

export const AlertingConfigSchema = z.object({
  windowMs: z.number().int().positive().default(HOUR),
  cpuPercent: z.number().positive().default(90),
  memoryPercent: z.number().positive().default(90),
  httpErrorRate: z.number().min(0).max(1).default(0.05),
  agentSuccessRate: z.number().min(0).max(1).default(0.8),
  channels: z
    .object({
      enabled: z.boolean().default(false),
      telegram: z.object({ botToken: z.string().min(1), chatId: z.string().min(1) }).optional(),
    })
    .default({}),
});
export type AlertingConfig = z.infer<typeof AlertingConfigSchema>;
export type AlertingConfigInput = z.input<typeof AlertingConfigSchema>;

export const ConfigSchema = z.object({
  logLevel: LogLevel.default('info'),
  scheduler: SchedulerConfigSchema.default({}),
  escalation: EscalationConfigSchema.default({}),
  checkpoints: CheckpointConfigSchema.default({}),
  registry: RegistryConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
  alerting: AlertingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
