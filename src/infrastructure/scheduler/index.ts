export { HealthCheckScheduler } from './health-scheduler.js';
export type { SchedulerState, SchedulerStatus, TickSummary, HealthSchedulerOptions } from './health-scheduler.js';
