/**
 * GeoPatternMiner - frequently visited places from raw geo pings.
 *
 * The neighbourhood radius is in degrees and radii are reported with a flat
 * 111 km per degree conversion, so both stretch with latitude.
 */

import type { GeoPoint, NewPattern } from '../../domains/entities';
import { locationFingerprint } from '../../domains/entities';
import type { MiningConfig } from '../../config/life-stream-config';
import { getLogger } from '../../config/service-urls';
import { dbscan, NOISE } from './dbscan';
import { perWeek, windowDays } from './window';

const logger = getLogger('life-stream-service:geo-pattern-miner');

export const METERS_PER_DEGREE = 111000;

interface GeoPointSource {
  getGeoPoints(userId: string, start: Date, end: Date, limit: number): Promise<GeoPoint[]>;
}

const PLACE_NAME_BUCKETS: Array<{ from: number; to: number; name: string }> = [
  { from: 6, to: 9, name: 'Morning place' },
  { from: 9, to: 18, name: 'Daytime place' },
  { from: 18, to: 22, name: 'Evening place' },
];

export function placeName(hour: number): string {
  return PLACE_NAME_BUCKETS.find(bucket => hour >= bucket.from && hour <= bucket.to)?.name ?? 'Night place';
}

export function modeHour(hours: number[]): number {
  const counts = new Map<number, number>();
  for (const hour of hours) counts.set(hour, (counts.get(hour) ?? 0) + 1);

  let best = 12;
  let bestCount = 0;
  for (const [hour, count] of counts) {
    if (count > bestCount || (count === bestCount && hour < best)) {
      best = hour;
      bestCount = count;
    }
  }
  return best;
}

export function describeCluster(
  userId: string,
  label: number,
  members: GeoPoint[],
  days: number
): NewPattern {
  const centerLat = members.reduce((sum, p) => sum + p.lat, 0) / members.length;
  const centerLon = members.reduce((sum, p) => sum + p.lon, 0) / members.length;
  const radiusDegrees = Math.max(...members.map(p => Math.hypot(p.lat - centerLat, p.lon - centerLon)));

  const hours = members.map(p => p.eventTime.getUTCHours());
  const mostCommonHour = modeHour(hours);
  const distribution: Record<string, number> = {};
  for (const hour of [...new Set(hours)].sort((a, b) => a - b)) {
    distribution[String(hour)] = hours.filter(h => h === hour).length;
  }

  const times = members.map(p => p.eventTime.getTime());
  const occurrences = members.length;

  return {
    userId,
    patternType: 'location_cluster',
    name: `${placeName(mostCommonHour)} #${label}`,
    description: `Frequently visited place (${occurrences} visits)`,
    confidence: Math.min(0.95, 0.5 + occurrences / 100),
    centerLat,
    centerLon,
    radiusMeters: radiusDegrees * METERS_PER_DEGREE,
    timePattern: '',
    frequencyPerWeek: perWeek(occurrences, days),
    firstSeen: new Date(Math.min(...times)),
    lastSeen: new Date(Math.max(...times)),
    occurrences,
    fingerprint: locationFingerprint(centerLat, centerLon),
    data: {
      visit_count: occurrences,
      most_common_hour: mostCommonHour,
      visit_hours_distribution: distribution,
    },
  };
}

export class GeoPatternMiner {
  constructor(
    private readonly source: GeoPointSource,
    private readonly config: Pick<MiningConfig, 'minClusterSize' | 'batchSize' | 'epsDegrees'>
  ) {}

  async mine(userId: string, start: Date, end: Date): Promise<NewPattern[]> {
    const points = await this.source.getGeoPoints(userId, start, end, this.config.batchSize);
    return this.cluster(userId, points, windowDays(start, end));
  }

  cluster(userId: string, points: GeoPoint[], days: number): NewPattern[] {
    if (points.length < this.config.minClusterSize) {
      logger.info('Not enough geo points, skipping clustering', {
        userId,
        points: points.length,
        required: this.config.minClusterSize,
      });
      return [];
    }

    const labels = dbscan(
      points.map(p => [p.lat, p.lon] as const),
      this.config.epsDegrees,
      this.config.minClusterSize
    );

    const clusters = new Map<number, GeoPoint[]>();
    labels.forEach((label, index) => {
      if (label === NOISE) return;
      const members = clusters.get(label) ?? [];
      members.push(points[index]);
      clusters.set(label, members);
    });

    const patterns = [...clusters.keys()]
      .sort((a, b) => a - b)
      .map(label => describeCluster(userId, label, clusters.get(label) ?? [], days));

    logger.info('Location clusters found', {
      userId,
      points: points.length,
      clusters: patterns.length,
      noise: labels.filter(label => label === NOISE).length,
    });
    return patterns;
  }
}
