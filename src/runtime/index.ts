export { assembleRuntime, buildRegistry, createRuntime } from './bootstrap.js';
export type { Runtime, RuntimeOptions, RuntimeParts } from './bootstrap.js';
export { isExecutor, loadExecutorModule } from './executors.js';
export type { ExecutorModule } from './executors.js';
export { auditPath, checkpointDir, createAuditStore, createCheckpointStore } from './stores.js';
