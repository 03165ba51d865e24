import type { Outcome } from '../types/index.js';
import type { Alert } from '../alerting/index.js';
import type { HistogramBucket } from './histogram.js';

export interface SystemSampleInput {
  cpuPercent: number;
  memoryPercent: number;
}

export interface RequestSampleInput {
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
}

export interface AgentSample {
  agentId: string;
  taskId: string;
  nodeId: string;
  outcome: Outcome;
  ok: boolean;
  durationMs: number;
  timestamp: number;
}

export type TaskMark = 'submitted' | 'succeeded' | 'failed' | 'escalated' | 'sla_breached';

export interface TimeRange {
  start: number;
  end: number;
}

export interface AgentWindowStats {
  agentId: string;
  taskCount: number;
  successCount: number;
  failureCount: number;
  successRate: number;
  averageDurationMs: number;
  performanceScore: number;
  histogram: HistogramBucket[];
}

export interface SystemWindowStats {
  samples: number;
  avgCpuPercent: number;
  maxCpuPercent: number;
  avgMemoryPercent: number;
  maxMemoryPercent: number;
}

export interface HttpWindowStats {
  requests: number;
  errors: number;
  errorRate: number;
  averageDurationMs: number;
}

export type TaskWindowStats = Record<TaskMark, number>;

export interface BusinessStats {
  clients: number;
  campaigns: number;
  activeCampaigns: number;
}

export interface MetricsSnapshot {
  timeframe: string;
  windowMs: number;
  generatedAt: string;
  uptimeSeconds: number;
  agents: Array<AgentWindowStats & { alerts: Alert[] }>;
  tasks: TaskWindowStats;
  system: SystemWindowStats;
  http: HttpWindowStats;
  alerts: Alert[];
  business?: BusinessStats;
}
