import type { PatternType } from '@lifestream/shared-contracts';

export type { PatternType };

export interface Pattern {
  id: string;
  userId: string;
  patternType: PatternType;
  name: string;
  description: string;
  confidence: number;
  centerLat: number | null;
  centerLon: number | null;
  radiusMeters: number | null;
  /** Cron-style for routines, empty otherwise. */
  timePattern: string;
  frequencyPerWeek: number;
  firstSeen: Date;
  lastSeen: Date;
  occurrences: number;
  isActive: boolean;
  /** Patterns sharing a fingerprint describe the same place or hour; the newest one stays active. */
  fingerprint: string;
  data: Record<string, unknown>;
}

export type NewPattern = Omit<Pattern, 'id' | 'isActive'>;

export interface PatternFilter {
  patternType?: PatternType;
  activeOnly?: boolean;
}

export function locationFingerprint(lat: number, lon: number): string {
  return `location_cluster:${lat.toFixed(3)}:${lon.toFixed(3)}`;
}

export function routineFingerprint(hour: number): string {
  return `routine:${hour}`;
}
