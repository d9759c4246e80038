import { z } from 'zod';
import { LifeEventSourceSchema, LifeEventTypeSchema, PatternTypeSchema } from '@lifestream/shared-contracts';
import { INSIGHT_TYPES, type Insight, type LifeEvent, type Pattern } from '../../../domains/entities';

export type SqlValue = string | number | boolean | Date | null | string[];

export type EventRow = {
  id: string;
  user_id: string;
  event_time: Date;
  type: string;
  subtype: string;
  source: string;
  device_id: string | null;
  lat: number | null;
  lon: number | null;
  accuracy: number | null;
  altitude: number | null;
  speed: number | null;
  payload: unknown;
};

export type PatternRow = {
  id: string;
  user_id: string;
  pattern_type: string;
  name: string;
  description: string;
  confidence: number;
  center_lat: number | null;
  center_lon: number | null;
  radius_meters: number | null;
  time_pattern: string;
  frequency_per_week: number;
  first_seen: Date;
  last_seen: Date;
  occurrences: number;
  is_active: boolean;
  fingerprint: string;
  data: unknown;
};

export type InsightRow = {
  id: string;
  user_id: string;
  insight_type: string;
  title: string;
  description: string;
  confidence: number;
  evidence_count: number;
  time_range_start: Date;
  time_range_end: Date;
  ai_model: string;
  reasoning: string;
  graph_node_id: string | null;
};

export const EVENT_COLUMNS =
  'id, user_id, event_time, type, subtype, source, device_id, lat, lon, accuracy, altitude, speed, payload';

export const PATTERN_COLUMNS =
  'id, user_id, pattern_type, name, description, confidence, center_lat, center_lon, radius_meters, ' +
  'time_pattern, frequency_per_week, first_seen, last_seen, occurrences, is_active, fingerprint, data';

const InsightTypeSchema = z.enum(INSIGHT_TYPES);

export function toRecord(value: unknown): Record<string, unknown> {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/** COUNT and NUMERIC columns arrive from pg as strings. */
export function toNumber(value: unknown, fallback = 0): number {
  const parsed = typeof value === 'number' ? value : parseFloat(String(value));
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Escapes LIKE wildcards so a keyword only ever matches literally. */
export function escapeLike(keyword: string): string {
  return keyword.replace(/[\\%_]/g, match => `\\${match}`);
}

export function mapEventRow(row: EventRow): LifeEvent {
  return {
    id: row.id,
    userId: row.user_id,
    eventTime: new Date(row.event_time),
    type: LifeEventTypeSchema.catch('custom').parse(row.type),
    subtype: row.subtype,
    source: LifeEventSourceSchema.catch('api').parse(row.source),
    deviceId: row.device_id,
    lat: row.lat,
    lon: row.lon,
    accuracy: row.accuracy,
    altitude: row.altitude,
    speed: row.speed,
    payload: toRecord(row.payload),
  };
}

export function mapPatternRow(row: PatternRow): Pattern {
  return {
    id: row.id,
    userId: row.user_id,
    patternType: PatternTypeSchema.parse(row.pattern_type),
    name: row.name,
    description: row.description,
    confidence: toNumber(row.confidence),
    centerLat: row.center_lat,
    centerLon: row.center_lon,
    radiusMeters: row.radius_meters,
    timePattern: row.time_pattern,
    frequencyPerWeek: toNumber(row.frequency_per_week),
    firstSeen: new Date(row.first_seen),
    lastSeen: new Date(row.last_seen),
    occurrences: toNumber(row.occurrences),
    isActive: row.is_active,
    fingerprint: row.fingerprint,
    data: toRecord(row.data),
  };
}

export function mapInsightRow(row: InsightRow): Insight {
  return {
    id: row.id,
    userId: row.user_id,
    insightType: InsightTypeSchema.catch('habit').parse(row.insight_type),
    title: row.title,
    description: row.description,
    confidence: toNumber(row.confidence),
    evidenceCount: toNumber(row.evidence_count),
    timeRangeStart: new Date(row.time_range_start),
    timeRangeEnd: new Date(row.time_range_end),
    aiModel: row.ai_model,
    reasoning: row.reasoning,
    source: 'pattern_miner',
    graphNodeId: row.graph_node_id,
  };
}
