export { EventBus, matchesFilter } from './bus.js';
export { SCHEDULER_EVENT_TYPES, isSchedulerEventType } from './types.js';
export type { SchedulerEvent, SchedulerEventBody, SchedulerEventType, EventFilter, EventListener } from './types.js';
