export type SchedulerStatus = 'stopped' | 'running';

export interface SchedulerInfo {
  name: string;
  cronExpression: string;
  status: SchedulerStatus;
  lastRunAt: Date | null;
  lastRunDurationMs: number | null;
  lastRunSuccess: boolean | null;
  runCount: number;
  errorCount: number;
  serviceName: string;
}

export interface SchedulerExecutionResult {
  success: boolean;
  message?: string;
  data?: Record<string, unknown>;
  durationMs: number;
  noOp?: boolean;
}

export interface SchedulerConfig {
  cronExpression: string;
  enabled?: boolean;
  runOnStart?: boolean;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  timezone?: string;
}
