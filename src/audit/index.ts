export { AuditLog } from './logger.js';
export type { AuditOptions } from './logger.js';
export { JsonAuditStore } from './json-store.js';
export { MemoryAuditStore } from './memory-store.js';
export { filterEntries } from './store.js';
export type { AuditStore } from './store.js';
export { AuditAction, AuditEntrySchema, AuditQuerySchema } from './types.js';
export type { AuditEntry, AuditQuery, AuditQueryInput } from './types.js';
