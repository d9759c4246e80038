import type { Pool } from 'pg';
import type { EventQuery, EventStats, GeoPoint, HourlyRollup, LifeEvent, TimeRange } from '../../../domains/entities';
import type { IEventRepository } from '../../../domains/repositories/ILifeStreamRepository';
import { LifeEventTypeSchema } from '@lifestream/shared-contracts';
import { getLogger } from '../../../config/service-urls';
import { EVENT_COLUMNS, escapeLike, mapEventRow, toNumber, type EventRow, type SqlValue } from './utils';

const logger = getLogger('life-stream-service:event-repository');

// 13 parameters per row keeps each statement well under the 65535 bind limit.
const INSERT_CHUNK_SIZE = 1000;
const COLUMNS_PER_ROW = 13;

export class EventRepository implements IEventRepository {
  constructor(private readonly pool: Pool) {}

  async insertEvents(events: LifeEvent[]): Promise<number> {
    let inserted = 0;

    for (let offset = 0; offset < events.length; offset += INSERT_CHUNK_SIZE) {
      const chunk = events.slice(offset, offset + INSERT_CHUNK_SIZE);
      const values: SqlValue[] = [];
      const tuples = chunk.map((event, rowIndex) => {
        const base = rowIndex * COLUMNS_PER_ROW;
        values.push(
          event.id,
          event.userId,
          event.eventTime,
          event.type,
          event.subtype,
          event.source,
          event.deviceId,
          event.lat,
          event.lon,
          event.accuracy,
          event.altitude,
          event.speed,
          JSON.stringify(event.payload)
        );
        const placeholders = Array.from({ length: COLUMNS_PER_ROW }, (_, column) => `$${base + column + 1}`);
        return `(${placeholders.join(', ')})`;
      });

      const result = await this.pool.query(
        `INSERT INTO ls_events (${EVENT_COLUMNS})
         VALUES ${tuples.join(', ')}
         ON CONFLICT (id, event_time) DO NOTHING`,
        values
      );
      inserted += result.rowCount ?? 0;
    }

    logger.debug('Events inserted', { requested: events.length, inserted });
    return inserted;
  }

  async queryEvents(userId: string, query: EventQuery): Promise<LifeEvent[]> {
    const values: SqlValue[] = [userId];
    let paramIndex = 2;
    let sql = `SELECT ${EVENT_COLUMNS} FROM ls_events WHERE user_id = $1`;

    if (query.start) {
      sql += ` AND event_time >= $${paramIndex++}`;
      values.push(query.start);
    }
    if (query.end) {
      sql += ` AND event_time <= $${paramIndex++}`;
      values.push(query.end);
    }
    if (query.types && query.types.length > 0) {
      sql += ` AND type = ANY($${paramIndex++})`;
      values.push(query.types);
    }

    sql += ` ORDER BY event_time DESC LIMIT $${paramIndex}`;
    values.push(query.limit);

    const result = await this.pool.query<EventRow>(sql, values);
    return result.rows.map(mapEventRow);
  }

  async searchEvents(userId: string, keyword: string, range: TimeRange, limit: number): Promise<LifeEvent[]> {
    const values: SqlValue[] = [userId, `%${escapeLike(keyword)}%`];
    let paramIndex = 3;
    let sql = `SELECT ${EVENT_COLUMNS} FROM ls_events
      WHERE user_id = $1 AND (payload::text ILIKE $2 OR subtype ILIKE $2)`;

    if (range.start) {
      sql += ` AND event_time >= $${paramIndex++}`;
      values.push(range.start);
    }
    if (range.end) {
      sql += ` AND event_time <= $${paramIndex++}`;
      values.push(range.end);
    }

    sql += ` ORDER BY event_time DESC LIMIT $${paramIndex}`;
    values.push(limit);

    const result = await this.pool.query<EventRow>(sql, values);
    return result.rows.map(mapEventRow);
  }

  async getEventStats(userId: string): Promise<EventStats> {
    const result = await this.pool.query<{ type: string; count: string; first: Date; last: Date }>(
      `SELECT type, COUNT(*) AS count, MIN(event_time) AS first, MAX(event_time) AS last
       FROM ls_events
       WHERE user_id = $1
       GROUP BY type
       ORDER BY type`,
      [userId]
    );

    const stats: EventStats = { totalEvents: 0, byType: {}, firstEvent: null, lastEvent: null };
    for (const row of result.rows) {
      const type = LifeEventTypeSchema.safeParse(row.type);
      if (!type.success) continue;

      const first = new Date(row.first);
      const last = new Date(row.last);
      const count = toNumber(row.count);

      stats.byType[type.data] = { count, first, last };
      stats.totalEvents += count;
      if (!stats.firstEvent || first < stats.firstEvent) stats.firstEvent = first;
      if (!stats.lastEvent || last > stats.lastEvent) stats.lastEvent = last;
    }
    return stats;
  }

  async getGeoPoints(userId: string, start: Date, end: Date, limit: number): Promise<GeoPoint[]> {
    const result = await this.pool.query<{ lat: number; lon: number; event_time: Date }>(
      `SELECT lat, lon, event_time
       FROM ls_events
       WHERE user_id = $1 AND type = 'geo'
         AND lat IS NOT NULL AND lon IS NOT NULL
         AND event_time >= $2 AND event_time < $3
       ORDER BY event_time ASC
       LIMIT $4`,
      [userId, start, end, limit]
    );
    return result.rows.map(row => ({ lat: row.lat, lon: row.lon, eventTime: new Date(row.event_time) }));
  }

  async getHourlyActivity(userId: string, start: Date, end: Date): Promise<HourlyRollup[]> {
    const result = await this.pool.query<{
      hour: Date;
      center_lat: number;
      center_lon: number;
      points_count: string;
      avg_speed: number | null;
      max_speed: number | null;
    }>(
      `SELECT hour, center_lat, center_lon, points_count, avg_speed, max_speed
       FROM ls_geo_hourly
       WHERE user_id = $1 AND hour >= $2 AND hour < $3
       ORDER BY hour ASC`,
      [userId, start, end]
    );

    return result.rows.map(row => ({
      hour: new Date(row.hour),
      centerLat: row.center_lat,
      centerLon: row.center_lon,
      pointsCount: toNumber(row.points_count),
      avgSpeed: row.avg_speed,
      maxSpeed: row.max_speed,
    }));
  }

  async getUsersWithEvents(since: Date): Promise<string[]> {
    const result = await this.pool.query<{ user_id: string }>(
      'SELECT DISTINCT user_id FROM ls_events WHERE event_time >= $1 ORDER BY user_id',
      [since]
    );
    return result.rows.map(row => row.user_id);
  }
}
