export { HealthMonitor } from './monitor.js';
export type { HealthMonitorOptions } from './monitor.js';
