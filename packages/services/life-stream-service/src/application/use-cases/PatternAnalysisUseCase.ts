/**
 * PatternAnalysisUseCase - one mining pass per user, and the nightly batch over all active users.
 *
 * Reruns supersede earlier patterns through their fingerprints, so a user can
 * be analysed any number of times.
 */

import { createTimer, serializeError } from '@lifestream/platform-core';
import type { Insight, NewPattern, Pattern } from '../../domains/entities';
import type { IPatternRepository } from '../../domains/repositories/ILifeStreamRepository';
import { getLogger } from '../../config/service-urls';
import { guardStore } from '../errors';
import type { GeoPatternMiner } from '../mining/GeoPatternMiner';
import type { RoutineMiner } from '../mining/RoutineMiner';
import type { InsightSynthesizer } from '../insights/InsightSynthesizer';

const logger = getLogger('life-stream-service:pattern-analysis');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AnalysisResult {
  userId: string;
  geoPatterns: Pattern[];
  timePatterns: Pattern[];
  insights: Insight[];
  analyzedAt: string;
}

export interface BatchAnalysisResult {
  usersAnalyzed: number;
  patternsFound: number;
  insightsGenerated: number;
  failures: number;
}

export interface PatternAnalysisDeps {
  geoMiner: Pick<GeoPatternMiner, 'mine'>;
  routineMiner: Pick<RoutineMiner, 'mine'>;
  synthesizer: Pick<InsightSynthesizer, 'synthesize'>;
  patterns: Pick<IPatternRepository, 'savePatterns'>;
  users: { getUsersWithEvents(since: Date): Promise<string[]> };
  defaultDays: number;
  now?: () => Date;
}

export class PatternAnalysisUseCase {
  private readonly now: () => Date;

  constructor(private readonly deps: PatternAnalysisDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async runAnalysis(userId: string, daysBack: number = this.deps.defaultDays): Promise<AnalysisResult> {
    const stopTimer = createTimer(logger, `pattern-analysis:${userId}`);
    const end = this.now();
    const start = new Date(end.getTime() - daysBack * DAY_MS);

    logger.info('Starting pattern analysis', { userId, daysBack });

    const geo = await this.deps.geoMiner.mine(userId, start, end);
    const routines = await this.deps.routineMiner.mine(userId, start, end);

    const mined: NewPattern[] = [...geo, ...routines];
    const saved =
      mined.length > 0 ? await guardStore('savePatterns', () => this.deps.patterns.savePatterns(userId, mined)) : [];

    // Habits reach the graph only after the patterns behind them are stored.
    const insights = await this.deps.synthesizer.synthesize(userId, geo, routines, daysBack);

    const result: AnalysisResult = {
      userId,
      geoPatterns: saved.filter(pattern => pattern.patternType === 'location_cluster'),
      timePatterns: saved.filter(pattern => pattern.patternType === 'routine'),
      insights,
      analyzedAt: end.toISOString(),
    };

    logger.info('Pattern analysis complete', {
      userId,
      patterns: saved.length,
      insights: insights.length,
      durationMs: stopTimer(),
    });
    return result;
  }

  async runBatchAnalysis(daysBack: number = this.deps.defaultDays): Promise<BatchAnalysisResult> {
    const since = new Date(this.now().getTime() - daysBack * DAY_MS);
    const userIds = await this.deps.users.getUsersWithEvents(since);

    const summary: BatchAnalysisResult = { usersAnalyzed: 0, patternsFound: 0, insightsGenerated: 0, failures: 0 };

    for (const userId of userIds) {
      try {
        const result = await this.runAnalysis(userId, daysBack);
        summary.usersAnalyzed++;
        summary.patternsFound += result.geoPatterns.length + result.timePatterns.length;
        summary.insightsGenerated += result.insights.length;
      } catch (error) {
        summary.failures++;
        logger.error('Pattern analysis failed for user', { userId, error: serializeError(error) });
      }
    }

    logger.info('Batch pattern analysis complete', { users: userIds.length, ...summary });
    return summary;
  }
}
