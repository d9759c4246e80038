/**
 * TimescaleDB Life-Stream Repository - Delegating Facade
 * Implements ILifeStreamRepository over one pg Pool shared by the domain repositories in timescale/:
 * - EventRepository: ls_events hypertable and the ls_geo_hourly continuous aggregate
 * - PatternRepository: ls_patterns with fingerprint supersession
 * - InsightRepository: ls_insights log of synthesized habits
 */

import { Pool } from 'pg';
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
import { serializeError } from '@lifestream/platform-core';
import { getLogger } from '../../config/service-urls';
import { TimescaleDBManager } from '../database/TimescaleDBManager';
import { EventRepository } from './timescale/EventRepository';
import { PatternRepository } from './timescale/PatternRepository';
import { InsightRepository } from './timescale/InsightRepository';

const logger = getLogger('life-stream-service:timescale-repository');

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  connectionTimeoutMs?: number;
  queryTimeoutMs?: number;
}

export class TimescaleLifeStreamRepository implements ILifeStreamRepository {
  private readonly pool: Pool;
  private readonly manager: TimescaleDBManager;
  private readonly events: EventRepository;
  private readonly patterns: PatternRepository;
  private readonly insights: InsightRepository;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: true } : false,
      max: config.maxConnections || (process.env.NODE_ENV === 'production' ? 20 : 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs || 5000,
      statement_timeout: config.queryTimeoutMs || 30000,
      query_timeout: config.queryTimeoutMs || 30000,
    });

    this.pool.on('error', err => {
      logger.error('Pool error', { error: serializeError(err) });
    });

    this.manager = new TimescaleDBManager(this.pool);
    this.events = new EventRepository(this.pool);
    this.patterns = new PatternRepository(this.pool);
    this.insights = new InsightRepository(this.pool);

    logger.debug('Repository initialized with connection pool');
  }

  initialize(): Promise<void> {
    return this.manager.initialize();
  }

  // ================================
  // EVENTS DELEGATION
  // ================================

  insertEvents(events: LifeEvent[]): Promise<number> {
    return this.events.insertEvents(events);
  }

  queryEvents(userId: string, query: EventQuery): Promise<LifeEvent[]> {
    return this.events.queryEvents(userId, query);
  }

  searchEvents(userId: string, keyword: string, range: TimeRange, limit: number): Promise<LifeEvent[]> {
    return this.events.searchEvents(userId, keyword, range, limit);
  }

  getEventStats(userId: string): Promise<EventStats> {
    return this.events.getEventStats(userId);
  }

  getGeoPoints(userId: string, start: Date, end: Date, limit: number): Promise<GeoPoint[]> {
    return this.events.getGeoPoints(userId, start, end, limit);
  }

  getHourlyActivity(userId: string, start: Date, end: Date): Promise<HourlyRollup[]> {
    return this.events.getHourlyActivity(userId, start, end);
  }

  getUsersWithEvents(since: Date): Promise<string[]> {
    return this.events.getUsersWithEvents(since);
  }

  // ================================
  // PATTERNS DELEGATION
  // ================================

  savePatterns(userId: string, patterns: NewPattern[]): Promise<Pattern[]> {
    return this.patterns.savePatterns(userId, patterns);
  }

  getPatterns(userId: string, filter?: PatternFilter): Promise<Pattern[]> {
    return this.patterns.getPatterns(userId, filter);
  }

  // ================================
  // INSIGHTS DELEGATION
  // ================================

  saveInsight(insight: Insight): Promise<void> {
    return this.insights.saveInsight(insight);
  }

  getInsights(userId: string, limit?: number): Promise<Insight[]> {
    return this.insights.getInsights(userId, limit);
  }

  // ================================
  // OPERATIONS
  // ================================

  async healthCheck(): Promise<{ healthy: boolean; details?: Record<string, unknown> }> {
    const status = await this.manager.getHealthStatus();
    return {
      healthy: status.healthy,
      details: {
        timescaleVersion: status.version,
        hypertables: status.hypertables,
        queryTimeMs: status.queryTimeMs,
        totalConnections: this.pool.totalCount,
        idleConnections: this.pool.idleCount,
        waitingClients: this.pool.waitingCount,
      },
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Connection pool closed');
  }
}
