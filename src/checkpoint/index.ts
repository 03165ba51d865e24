export { CheckpointSchema } from './types.js';
export type { Checkpoint } from './types.js';
export type { CheckpointStore } from './store.js';
export { MemoryCheckpointStore } from './memory-store.js';
export { JsonCheckpointStore } from './json-store.js';
export { DynamoCheckpointStore } from './dynamo-store.js';
export type { DynamoCheckpointStoreOptions } from './dynamo-store.js';
export { restoreTaskState } from './restore.js';
export { planSave, applyRetention } from './ordering.js';
