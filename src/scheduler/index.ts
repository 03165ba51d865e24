export { SchedulerCore } from './scheduler.js';
export type { SchedulerOptions } from './scheduler.js';
export { ReadyQueue } from './ready-queue.js';
export type { DispatchJob } from './ready-queue.js';
export { WorkerSlots } from './worker-slots.js';
export { TaskActor } from './task-actor.js';
export { backoffDelay } from './backoff.js';
export { evaluateFanIn, mergeBranches, startFanOut } from './fan-out.js';
export type { FanInVerdict } from './fan-out.js';
