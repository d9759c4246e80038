import type { LifeEventSource, LifeEventType } from '@lifestream/shared-contracts';

export type { LifeEventSource, LifeEventType };

/** Immutable once stored. */
export interface LifeEvent {
  id: string;
  userId: string;
  eventTime: Date;
  type: LifeEventType;
  subtype: string;
  source: LifeEventSource;
  deviceId: string | null;
  lat: number | null;
  lon: number | null;
  accuracy: number | null;
  altitude: number | null;
  speed: number | null;
  payload: Record<string, unknown>;
}

export interface TimeRange {
  start?: Date;
  end?: Date;
}

export interface EventQuery extends TimeRange {
  types?: LifeEventType[];
  limit: number;
}

export interface EventTypeStats {
  count: number;
  first: Date;
  last: Date;
}

export interface EventStats {
  totalEvents: number;
  byType: Partial<Record<LifeEventType, EventTypeStats>>;
  firstEvent: Date | null;
  lastEvent: Date | null;
}

export interface GeoPoint {
  lat: number;
  lon: number;
  eventTime: Date;
}

/** Geo activity for one user bucketed to the hour. */
export interface HourlyRollup {
  hour: Date;
  centerLat: number;
  centerLon: number;
  pointsCount: number;
  avgSpeed: number | null;
  maxSpeed: number | null;
}

export interface BatchInsertResult {
  storedCount: number;
  errors: Array<{ index: number; message: string }>;
}
