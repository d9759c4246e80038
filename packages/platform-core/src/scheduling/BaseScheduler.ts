/**
 * BaseScheduler - cron-driven job with retries, a run timeout and run statistics.
 * Subclasses supply name, serviceName and execute().
 */

import * as cron from 'node-cron';
import { getLogger, type Logger } from '../logging';
import { serializeError } from '../logging/error-serializer';
import type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult, SchedulerConfig } from './types';

type ResolvedSchedulerConfig = Required<SchedulerConfig>;

export abstract class BaseScheduler {
  protected task: cron.ScheduledTask | null = null;
  protected logger: Logger;
  protected status: SchedulerStatus = 'stopped';

  protected lastRunAt: Date | null = null;
  protected lastRunDurationMs: number | null = null;
  protected lastRunSuccess: boolean | null = null;
  protected runCount = 0;
  protected errorCount = 0;

  protected config: ResolvedSchedulerConfig;
  private inFlight: Promise<SchedulerExecutionResult> | null = null;

  constructor(config: SchedulerConfig) {
    this.config = {
      enabled: true,
      runOnStart: false,
      maxRetries: 0,
      retryDelayMs: 1000,
      timeoutMs: 300000,
      timezone: 'UTC',
      ...config,
    };
    this.logger = getLogger('scheduler');
  }

  protected initLogger(): void {
    this.logger = getLogger(`scheduler-${this.name}`);
  }

  abstract get name(): string;

  abstract get serviceName(): string;

  protected abstract execute(): Promise<SchedulerExecutionResult>;

  get cronExpression(): string {
    return this.config.cronExpression;
  }

  start(): void {
    if (this.task) {
      this.logger.warn(`[${this.name}] Already running, skipping start`);
      return;
    }

    if (!this.config.enabled) {
      this.logger.info(`[${this.name}] Disabled, not starting`);
      return;
    }

    if (!cron.validate(this.config.cronExpression)) {
      this.logger.error(`[${this.name}] Invalid cron expression: ${this.config.cronExpression}`);
      return;
    }

    this.task = cron.schedule(
      this.config.cronExpression,
      () => {
        this.triggerNow().catch(error => {
          this.logger.error(`[${this.name}] Scheduled run failed`, { error: serializeError(error) });
        });
      },
      { scheduled: false, timezone: this.config.timezone }
    );
    this.task.start();
    this.status = 'running';

    this.logger.info(`[${this.name}] Scheduler started`, { cronExpression: this.config.cronExpression });

    if (this.config.runOnStart) {
      this.triggerNow().catch(error => {
        this.logger.error(`[${this.name}] Initial run failed`, { error: serializeError(error) });
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.debug(`[${this.name}] Already stopped`);
      return;
    }

    this.task.stop();
    this.task = null;
    this.status = 'stopped';
    this.logger.info(`[${this.name}] Scheduler stopped`);
  }

  /**
   * Runs the job now. A trigger that arrives while a run is in flight joins
   * that run instead of starting a second one.
   */
  async triggerNow(): Promise<SchedulerExecutionResult> {
    if (this.inFlight) {
      this.logger.debug(`[${this.name}] Run already in progress, joining it`);
      return this.inFlight;
    }

    this.inFlight = this.runWithRetries();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async runWithRetries(): Promise<SchedulerExecutionResult> {
    const startTime = Date.now();
    this.lastRunAt = new Date();
    this.runCount++;

    const maxAttempts = this.config.maxRetries + 1;
    let lastMessage = 'Max retries exceeded';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const result = await this.executeWithTimeout();
        if (result.success) {
          this.lastRunDurationMs = Date.now() - startTime;
          this.lastRunSuccess = true;
          this.logger.info(`[${this.name}] Execution completed`, {
            durationMs: this.lastRunDurationMs,
            message: result.message,
            noOp: result.noOp ?? false,
          });
          return { ...result, durationMs: this.lastRunDurationMs };
        }
        lastMessage = result.message ?? lastMessage;
        this.logger.warn(`[${this.name}] Execution failed`, { message: result.message, attempt, maxAttempts });
      } catch (error) {
        this.errorCount++;
        lastMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`[${this.name}] Execution error`, { error: serializeError(error), attempt, maxAttempts });
      }

      if (attempt < maxAttempts) {
        await new Promise(resolve => setTimeout(resolve, this.config.retryDelayMs));
      }
    }

    this.lastRunDurationMs = Date.now() - startTime;
    this.lastRunSuccess = false;
    return { success: false, message: lastMessage, durationMs: this.lastRunDurationMs };
  }

  private async executeWithTimeout(): Promise<SchedulerExecutionResult> {
    const timeoutMs = this.config.timeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Execution timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      return await Promise.race([this.execute(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getInfo(): SchedulerInfo {
    return {
      name: this.name,
      cronExpression: this.config.cronExpression,
      status: this.status,
      lastRunAt: this.lastRunAt,
      lastRunDurationMs: this.lastRunDurationMs,
      lastRunSuccess: this.lastRunSuccess,
      runCount: this.runCount,
      errorCount: this.errorCount,
      serviceName: this.serviceName,
    };
  }

  isHealthy(): boolean {
    if (this.status !== 'running' || this.runCount === 0) return true;
    return this.errorCount / this.runCount < 0.5;
  }
}
