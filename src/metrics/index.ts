export { MetricsCollector } from './collector.js';
export type { MetricsCollectorOptions, EventSource } from './collector.js';
export { bucketDurations, DURATION_BUCKETS_MS } from './histogram.js';
export type { HistogramBucket } from './histogram.js';
export {
  CampaignSchema,
  CampaignStatus,
  ClientSchema,
  MemoryCampaignRepository,
  MemoryClientRepository,
} from './repositories.js';
export type { Campaign, CampaignRepository, Client, ClientRepository } from './repositories.js';
export type {
  AgentSample,
  AgentWindowStats,
  BusinessStats,
  HttpWindowStats,
  MetricsSnapshot,
  RequestSampleInput,
  SystemSampleInput,
  SystemWindowStats,
  TaskMark,
  TaskWindowStats,
  TimeRange,
} from './types.js';
export { SystemSampler } from './system.js';
export type { HostStats, SystemSink } from './system.js';
