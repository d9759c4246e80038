import type { HourlyRollup, NewPattern } from '../../domains/entities';
import { routineFingerprint } from '../../domains/entities';
import { getLogger } from '../../config/service-urls';
import { perWeek, windowDays } from './window';

const logger = getLogger('life-stream-service:routine-miner');

export const MIN_ROUTINE_DAYS = 5;
export const MIN_AVG_POINTS = 10;

interface HourlyActivitySource {
  getHourlyActivity(userId: string, start: Date, end: Date): Promise<HourlyRollup[]>;
}

const ROUTINE_NAME_BUCKETS: Array<{ from: number; to: number; name: string }> = [
  { from: 7, to: 9, name: 'Morning activity (likely commute)' },
  { from: 12, to: 14, name: 'Midday activity' },
  { from: 17, to: 19, name: 'Evening activity (likely commute home)' },
];

export function routineName(hour: number): string {
  return (
    ROUTINE_NAME_BUCKETS.find(bucket => hour >= bucket.from && hour <= bucket.to)?.name ??
    `Regular activity at ${hour}:00`
  );
}

export class RoutineMiner {
  constructor(private readonly source: HourlyActivitySource) {}

  async mine(userId: string, start: Date, end: Date): Promise<NewPattern[]> {
    const rollups = await this.source.getHourlyActivity(userId, start, end);
    return this.detect(userId, rollups, windowDays(start, end));
  }

  detect(userId: string, rollups: HourlyRollup[], days: number): NewPattern[] {
    if (rollups.length === 0) {
      logger.info('No hourly activity for routine analysis', { userId });
      return [];
    }

    const byHour = new Map<number, HourlyRollup[]>();
    for (const row of rollups) {
      const hour = row.hour.getUTCHours();
      const rows = byHour.get(hour) ?? [];
      rows.push(row);
      byHour.set(hour, rows);
    }

    const patterns: NewPattern[] = [];
    for (const hour of [...byHour.keys()].sort((a, b) => a - b)) {
      const rows = byHour.get(hour) ?? [];
      const occurrences = rows.length;
      if (occurrences < MIN_ROUTINE_DAYS) continue;

      const avgPoints = rows.reduce((sum, row) => sum + row.pointsCount, 0) / occurrences;
      if (avgPoints <= MIN_AVG_POINTS) continue;

      const times = rows.map(row => row.hour.getTime());
      patterns.push({
        userId,
        patternType: 'routine',
        name: routineName(hour),
        description: `Regular activity around ${hour}:00 (${occurrences} days)`,
        confidence: Math.min(0.9, 0.4 + occurrences / 30),
        centerLat: null,
        centerLon: null,
        radiusMeters: null,
        timePattern: `0 ${hour} * * *`,
        frequencyPerWeek: perWeek(occurrences, days),
        firstSeen: new Date(Math.min(...times)),
        lastSeen: new Date(Math.max(...times)),
        occurrences,
        fingerprint: routineFingerprint(hour),
        data: { hour, avg_points: avgPoints, days_observed: occurrences },
      });
    }

    logger.info('Routines found', { userId, hoursObserved: byHour.size, routines: patterns.length });
    return patterns;
  }
}
