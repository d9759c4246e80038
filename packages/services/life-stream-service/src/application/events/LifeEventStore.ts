/**
 * LifeEventStore - validated ingestion and user-scoped reads over the event repository.
 *
 * Malformed events are reported per index and never abort a batch. Any
 * repository failure surfaces as LifeStreamError.storeUnavailable.
 */

import { v4 as uuidv4 } from 'uuid';
import type { IEventRepository } from '../../domains/repositories/ILifeStreamRepository';
import type {
  BatchInsertResult,
  EventQuery,
  EventStats,
  GeoPoint,
  HourlyRollup,
  LifeEvent,
  TimeRange,
} from '../../domains/entities';
import { LifeStreamError, guardStore } from '../errors';
import { getLogger } from '../../config/service-urls';
import { toLifeEvent, validateEvent } from './normalize-event';

const logger = getLogger('life-stream-service:event-store');

export const MAX_QUERY_LIMIT = 10000;
export const DEFAULT_QUERY_LIMIT = 100;

export class LifeEventStore {
  constructor(private readonly repository: IEventRepository) {}

  async insertBatch(userId: string, rawEvents: unknown[]): Promise<BatchInsertResult> {
    const errors: BatchInsertResult['errors'] = [];
    const valid: LifeEvent[] = [];

    rawEvents.forEach((raw, index) => {
      const result = validateEvent(raw);
      if (result.success) {
        valid.push(toLifeEvent(userId, result.event, uuidv4));
      } else {
        errors.push({ index, message: result.message });
      }
    });

    if (valid.length > 0) {
      const inserted = await guardStore('insertBatch', () => this.repository.insertEvents(valid));
      if (inserted < valid.length) {
        logger.debug('Replayed events ignored', { userId, replayed: valid.length - inserted });
      }
    }

    logger.info('Batch ingested', {
      userId,
      received: rawEvents.length,
      stored: valid.length,
      rejected: errors.length,
    });

    return { storedCount: valid.length, errors };
  }

  /** Single-event ingest rejects outright instead of reporting by index. */
  async insertOne(userId: string, rawEvent: unknown): Promise<BatchInsertResult> {
    const result = validateEvent(rawEvent);
    if (!result.success) {
      throw LifeStreamError.invalidEvent(result.message);
    }
    return this.insertBatch(userId, [rawEvent]);
  }

  async query(userId: string, query: Partial<EventQuery> = {}): Promise<LifeEvent[]> {
    const limit = query.limit ?? DEFAULT_QUERY_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_QUERY_LIMIT) {
      throw LifeStreamError.validationError('limit', `must be an integer between 1 and ${MAX_QUERY_LIMIT}`);
    }
    assertRange(query);
    return guardStore('query', () => this.repository.queryEvents(userId, { ...query, limit }));
  }

  async searchText(userId: string, keyword: string, range: TimeRange = {}, limit = 50): Promise<LifeEvent[]> {
    assertRange(range);
    const needle = keyword.trim();
    if (!needle) return [];
    return guardStore('searchText', () => this.repository.searchEvents(userId, needle, range, limit));
  }

  async stats(userId: string): Promise<EventStats> {
    return guardStore('stats', () => this.repository.getEventStats(userId));
  }

  async getGeoPoints(userId: string, start: Date, end: Date, limit: number): Promise<GeoPoint[]> {
    return guardStore('getGeoPoints', () => this.repository.getGeoPoints(userId, start, end, limit));
  }

  async getHourlyActivity(userId: string, start: Date, end: Date): Promise<HourlyRollup[]> {
    return guardStore('getHourlyActivity', () => this.repository.getHourlyActivity(userId, start, end));
  }

  async getUsersWithEvents(since: Date): Promise<string[]> {
    return guardStore('getUsersWithEvents', () => this.repository.getUsersWithEvents(since));
  }
}

function assertRange(range: TimeRange): void {
  if (range.start && range.end && range.start > range.end) {
    throw LifeStreamError.invalidTimeRange('start must not be after end');
  }
}
