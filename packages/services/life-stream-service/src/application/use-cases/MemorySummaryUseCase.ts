import type { EventStats, Pattern } from '../../domains/entities';
import type { IPatternRepository } from '../../domains/repositories/ILifeStreamRepository';
import type { LifeEventStore } from '../events/LifeEventStore';
import { LifeStreamError, guardStore } from '../errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const SAMPLE_LIMIT = 100;
const TOP_PATTERNS = 5;

export interface MemorySummary {
  userId: string;
  periodDays: number;
  stats: EventStats;
  patternsCount: number;
  recentEventsSample: number;
  patterns: Pattern[];
}

export class MemorySummaryUseCase {
  constructor(
    private readonly events: Pick<LifeEventStore, 'stats' | 'query'>,
    private readonly patterns: Pick<IPatternRepository, 'getPatterns'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async execute(userId: string, days = 7): Promise<MemorySummary> {
    if (!Number.isInteger(days) || days < 1 || days > 365) {
      throw LifeStreamError.invalidTimeRange('days must be an integer between 1 and 365');
    }

    const end = this.now();
    const start = new Date(end.getTime() - days * DAY_MS);

    const [stats, patterns, recent] = await Promise.all([
      this.events.stats(userId),
      guardStore('getPatterns', () => this.patterns.getPatterns(userId, { activeOnly: true })),
      this.events.query(userId, { start, end, limit: SAMPLE_LIMIT }),
    ]);

    return {
      userId,
      periodDays: days,
      stats,
      patternsCount: patterns.length,
      recentEventsSample: recent.length,
      patterns: patterns.slice(0, TOP_PATTERNS),
    };
  }
}
