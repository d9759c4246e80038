/**
 * Repository port for the life-stream store.
 * Every read is scoped to one user.
 */

import type {
  EventQuery,
  EventStats,
  GeoPoint,
  HourlyRollup,
  Insight,
  LifeEvent,
  NewPattern,
  Pattern,
  PatternFilter,
  TimeRange,
} from '../entities';

export interface IEventRepository {
  /** Idempotent on event id. Returns how many rows were new. */
  insertEvents(events: LifeEvent[]): Promise<number>;
  queryEvents(userId: string, query: EventQuery): Promise<LifeEvent[]>;
  searchEvents(userId: string, keyword: string, range: TimeRange, limit: number): Promise<LifeEvent[]>;
  getEventStats(userId: string): Promise<EventStats>;
  getGeoPoints(userId: string, start: Date, end: Date, limit: number): Promise<GeoPoint[]>;
  getHourlyActivity(userId: string, start: Date, end: Date): Promise<HourlyRollup[]>;
  getUsersWithEvents(since: Date): Promise<string[]>;
}

export interface IPatternRepository {
  /** Deactivates active patterns whose fingerprint reappears, then inserts the new ones. */
  savePatterns(userId: string, patterns: NewPattern[]): Promise<Pattern[]>;
  getPatterns(userId: string, filter?: PatternFilter): Promise<Pattern[]>;
}

export interface IInsightRepository {
  saveInsight(insight: Insight): Promise<void>;
  getInsights(userId: string, limit?: number): Promise<Insight[]>;
}

export interface ILifeStreamRepository extends IEventRepository, IPatternRepository, IInsightRepository {
  healthCheck(): Promise<{ healthy: boolean; details?: Record<string, unknown> }>;
  close(): Promise<void>;
}
