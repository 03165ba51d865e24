export * from './types/index.js';
export * from './errors/index.js';
export * from './log/index.js';
export * from './config/index.js';
export * from './policy/index.js';
export * from './graph/index.js';
export * from './escalation/index.js';
export * from './registry/index.js';
export * from './health/index.js';
export * from './checkpoint/index.js';
export * from './audit/index.js';
export * from './events/index.js';
export * from './scheduler/index.js';
export * from './metrics/index.js';
export * from './alerting/index.js';
export * from './server/index.js';
export * from './runtime/index.js';
