/**
 * In-memory ILifeStreamRepository used in development and tests when no database is configured.
 * Mirrors the SQL semantics: user scoping, id idempotency, hourly geo rollups and fingerprint supersession.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ILifeStreamRepository } from '../../domains/repositories/ILifeStreamRepository';
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
} from '../../domains/entities';

const HOUR_MS = 60 * 60 * 1000;

function inRange(time: Date, range: TimeRange): boolean {
  if (range.start && time < range.start) return false;
  if (range.end && time > range.end) return false;
  return true;
}

function newestFirst(a: LifeEvent, b: LifeEvent): number {
  return b.eventTime.getTime() - a.eventTime.getTime();
}

function mean(values: number[]): number | null {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : null;
}

export class InMemoryLifeStreamRepository implements ILifeStreamRepository {
  private readonly events = new Map<string, LifeEvent>();
  private readonly patterns: Pattern[] = [];
  private readonly insights: Insight[] = [];

  async insertEvents(events: LifeEvent[]): Promise<number> {
    let inserted = 0;
    for (const event of events) {
      if (this.events.has(event.id)) continue;
      this.events.set(event.id, { ...event, payload: { ...event.payload } });
      inserted++;
    }
    return inserted;
  }

  async queryEvents(userId: string, query: EventQuery): Promise<LifeEvent[]> {
    return this.userEvents(userId)
      .filter(event => inRange(event.eventTime, query))
      .filter(event => !query.types || query.types.length === 0 || query.types.includes(event.type))
      .sort(newestFirst)
      .slice(0, query.limit);
  }

  async searchEvents(userId: string, keyword: string, range: TimeRange, limit: number): Promise<LifeEvent[]> {
    const needle = keyword.toLowerCase();
    return this.userEvents(userId)
      .filter(event => inRange(event.eventTime, range))
      .filter(
        event =>
          JSON.stringify(event.payload).toLowerCase().includes(needle) || event.subtype.toLowerCase().includes(needle)
      )
      .sort(newestFirst)
      .slice(0, limit);
  }

  async getEventStats(userId: string): Promise<EventStats> {
    const stats: EventStats = { totalEvents: 0, byType: {}, firstEvent: null, lastEvent: null };

    for (const event of this.userEvents(userId)) {
      const time = event.eventTime;
      const current = stats.byType[event.type];
      stats.byType[event.type] = current
        ? {
            count: current.count + 1,
            first: time < current.first ? time : current.first,
            last: time > current.last ? time : current.last,
          }
        : { count: 1, first: time, last: time };

      stats.totalEvents++;
      if (!stats.firstEvent || time < stats.firstEvent) stats.firstEvent = time;
      if (!stats.lastEvent || time > stats.lastEvent) stats.lastEvent = time;
    }
    return stats;
  }

  async getGeoPoints(userId: string, start: Date, end: Date, limit: number): Promise<GeoPoint[]> {
    const points: GeoPoint[] = [];
    for (const event of this.geoEvents(userId, start, end)) {
      if (event.lat === null || event.lon === null) continue;
      points.push({ lat: event.lat, lon: event.lon, eventTime: event.eventTime });
    }
    return points.sort((a, b) => a.eventTime.getTime() - b.eventTime.getTime()).slice(0, limit);
  }

  async getHourlyActivity(userId: string, start: Date, end: Date): Promise<HourlyRollup[]> {
    const buckets = new Map<number, LifeEvent[]>();
    for (const event of this.geoEvents(userId, start, end)) {
      const hour = Math.floor(event.eventTime.getTime() / HOUR_MS) * HOUR_MS;
      const bucket = buckets.get(hour) ?? [];
      bucket.push(event);
      buckets.set(hour, bucket);
    }

    return [...buckets.entries()]
      .sort(([a], [b]) => a - b)
      .map(([hour, events]) => {
        const speeds = events.flatMap(event => (event.speed === null ? [] : [event.speed]));
        return {
          hour: new Date(hour),
          centerLat: mean(events.flatMap(event => (event.lat === null ? [] : [event.lat]))) ?? 0,
          centerLon: mean(events.flatMap(event => (event.lon === null ? [] : [event.lon]))) ?? 0,
          pointsCount: events.length,
          avgSpeed: mean(speeds),
          maxSpeed: speeds.length > 0 ? Math.max(...speeds) : null,
        };
      });
  }

  async getUsersWithEvents(since: Date): Promise<string[]> {
    const users = new Set<string>();
    for (const event of this.events.values()) {
      if (event.eventTime >= since) users.add(event.userId);
    }
    return [...users].sort();
  }

  async savePatterns(userId: string, patterns: NewPattern[]): Promise<Pattern[]> {
    const fingerprints = new Set(patterns.map(pattern => pattern.fingerprint));
    for (const existing of this.patterns) {
      if (existing.userId === userId && existing.isActive && fingerprints.has(existing.fingerprint)) {
        existing.isActive = false;
      }
    }

    const saved = patterns.map(pattern => ({ ...pattern, userId, id: uuidv4(), isActive: true }));
    this.patterns.push(...saved);
    return saved.map(pattern => ({ ...pattern }));
  }

  async getPatterns(userId: string, filter: PatternFilter = {}): Promise<Pattern[]> {
    const activeOnly = filter.activeOnly ?? true;
    return this.patterns
      .filter(pattern => pattern.userId === userId)
      .filter(pattern => !activeOnly || pattern.isActive)
      .filter(pattern => !filter.patternType || pattern.patternType === filter.patternType)
      .sort((a, b) => b.confidence - a.confidence || b.occurrences - a.occurrences)
      .map(pattern => ({ ...pattern }));
  }

  async saveInsight(insight: Insight): Promise<void> {
    if (this.insights.some(existing => existing.id === insight.id)) return;
    this.insights.push({ ...insight });
  }

  async getInsights(userId: string, limit = 20): Promise<Insight[]> {
    return this.insights
      .filter(insight => insight.userId === userId)
      .reverse()
      .slice(0, limit);
  }

  async healthCheck(): Promise<{ healthy: boolean; details?: Record<string, unknown> }> {
    return {
      healthy: true,
      details: { inMemory: true, events: this.events.size, patterns: this.patterns.length },
    };
  }

  async close(): Promise<void> {}

  private userEvents(userId: string): LifeEvent[] {
    return [...this.events.values()].filter(event => event.userId === userId);
  }

  /** Half-open [start, end), matching the miner windows. */
  private geoEvents(userId: string, start: Date, end: Date): LifeEvent[] {
    return this.userEvents(userId).filter(
      event =>
        event.type === 'geo' &&
        event.lat !== null &&
        event.lon !== null &&
        event.eventTime >= start &&
        event.eventTime < end
    );
  }
}
