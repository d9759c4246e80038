/**
 * Pattern Miner Scheduled Job
 * Runs the batch pattern analysis over every user with recent events.
 */

import { BaseScheduler, type SchedulerExecutionResult } from '@lifestream/platform-core';
import type { PatternAnalysisUseCase } from '../../application/use-cases';
import { SERVICE_NAME } from '../../config/service-urls';

export interface PatternMinerSchedulerConfig {
  cronExpression: string;
  enabled: boolean;
  analysisDays: number;
}

export class PatternMinerScheduler extends BaseScheduler {
  get name(): string {
    return 'pattern-miner';
  }

  get serviceName(): string {
    return SERVICE_NAME;
  }

  constructor(
    private readonly analysis: Pick<PatternAnalysisUseCase, 'runBatchAnalysis'>,
    private readonly schedule: PatternMinerSchedulerConfig
  ) {
    super({
      cronExpression: schedule.cronExpression,
      enabled: schedule.enabled,
      maxRetries: 1,
      timeoutMs: 1800000,
    });
    this.initLogger();
  }

  protected async execute(): Promise<SchedulerExecutionResult> {
    const result = await this.analysis.runBatchAnalysis(this.schedule.analysisDays);

    return {
      success: true,
      message: `Analyzed ${result.usersAnalyzed} users, found ${result.patternsFound} patterns`,
      data: { ...result },
      durationMs: 0,
      noOp: result.usersAnalyzed === 0,
    };
  }
}
