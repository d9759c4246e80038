export { BaseScheduler } from './BaseScheduler';
export type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult, SchedulerConfig } from './types';
