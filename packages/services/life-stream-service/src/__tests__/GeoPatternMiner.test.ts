import { describe, it, expect, vi } from 'vitest';
import type { GeoPoint } from '../domains/entities';
import { GeoPatternMiner, modeHour, placeName } from '../application/mining/GeoPatternMiner';
import { windowDays } from '../application/mining/window';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../config/service-urls', () => ({
  SERVICE_NAME: 'life-stream-service',
  getLogger: vi.fn(() => mockLogger),
}));

const miningConfig = { minClusterSize: 3, batchSize: 1000, epsDegrees: 0.001 };

function ping(lat: number, lon: number, iso: string): GeoPoint {
  return { lat, lon, eventTime: new Date(iso) };
}

describe('GeoPatternMiner', () => {
  it('should find one frequently visited place from five morning pings', () => {
    const miner = new GeoPatternMiner({ getGeoPoints: vi.fn() }, miningConfig);
    const points = [
      ping(55.755, 37.617, '2026-01-05T08:15:00Z'),
      ping(55.7551, 37.617, '2026-01-06T08:14:00Z'),
      ping(55.7552, 37.617, '2026-01-07T08:16:00Z'),
      ping(55.7553, 37.617, '2026-01-07T08:20:00Z'),
      ping(55.7554, 37.617, '2026-01-08T08:10:00Z'),
    ];

    const patterns = miner.cluster('user-1', points, 7);

    expect(patterns).toHaveLength(1);
    const [place] = patterns;
    expect(place.patternType).toBe('location_cluster');
    expect(place.name).toBe('Morning place #0');
    expect(place.description).toBe('Frequently visited place (5 visits)');
    expect(place.occurrences).toBe(5);
    expect(place.confidence).toBeCloseTo(0.55, 10);
    expect(place.centerLat).toBeCloseTo(55.7552, 8);
    expect(place.centerLon).toBeCloseTo(37.617, 8);
    expect(place.radiusMeters).toBeCloseTo(22.2, 4);
    expect(place.frequencyPerWeek).toBe(5);
    expect(place.firstSeen.toISOString()).toBe('2026-01-05T08:15:00.000Z');
    expect(place.lastSeen.toISOString()).toBe('2026-01-08T08:10:00.000Z');
    expect(place.timePattern).toBe('');
    expect(place.fingerprint).toBe('location_cluster:55.755:37.617');
    expect(place.data).toEqual({ visit_count: 5, most_common_hour: 8, visit_hours_distribution: { '8': 5 } });
  });

  it('should return nothing when there are fewer points than the minimum cluster size', () => {
    const miner = new GeoPatternMiner({ getGeoPoints: vi.fn() }, miningConfig);
    const patterns = miner.cluster('user-1', [ping(1, 1, '2026-01-05T08:00:00Z'), ping(1, 1, '2026-01-05T09:00:00Z')], 7);
    expect(patterns).toEqual([]);
  });

  it('should keep every cluster at or above the minimum size and drop noise', () => {
    const miner = new GeoPatternMiner({ getGeoPoints: vi.fn() }, miningConfig);
    const points = [
      ping(10, 10, '2026-01-05T20:00:00Z'),
      ping(10, 10.0001, '2026-01-05T20:30:00Z'),
      ping(10, 10.0002, '2026-01-06T20:00:00Z'),
      ping(20, 20, '2026-01-06T03:00:00Z'),
    ];

    const patterns = miner.cluster('user-1', points, 7);

    expect(patterns.map(p => p.name)).toEqual(['Evening place #0']);
    expect(patterns.every(p => p.occurrences >= miningConfig.minClusterSize)).toBe(true);
  });

  it('should read at most batchSize points for the window and scale frequency by window length', async () => {
    const points = [
      ping(1, 1, '2026-01-02T12:00:00Z'),
      ping(1, 1, '2026-01-03T12:00:00Z'),
      ping(1, 1, '2026-01-04T12:00:00Z'),
    ];
    const source = { getGeoPoints: vi.fn().mockResolvedValue(points) };
    const miner = new GeoPatternMiner(source, miningConfig);
    const start = new Date('2026-01-01T00:00:00Z');
    const end = new Date('2026-01-31T00:00:00Z');

    const patterns = await miner.mine('user-1', start, end);

    expect(source.getGeoPoints).toHaveBeenCalledWith('user-1', start, end, 1000);
    expect(patterns[0].name).toBe('Daytime place #0');
    expect(patterns[0].frequencyPerWeek).toBeCloseTo(3 / (30 / 7), 10);
  });
});

describe('place naming', () => {
  it('should evaluate inclusive hour buckets in order', () => {
    expect(placeName(6)).toBe('Morning place');
    expect(placeName(9)).toBe('Morning place');
    expect(placeName(10)).toBe('Daytime place');
    expect(placeName(18)).toBe('Daytime place');
    expect(placeName(22)).toBe('Evening place');
    expect(placeName(23)).toBe('Night place');
    expect(placeName(3)).toBe('Night place');
  });

  it('should break mode ties toward the earlier hour and default to noon', () => {
    expect(modeHour([14, 9, 14, 9])).toBe(9);
    expect(modeHour([])).toBe(12);
  });
});

describe('windowDays', () => {
  it('should floor to whole days with a minimum of one', () => {
    expect(windowDays(new Date('2026-01-01T00:00:00Z'), new Date('2026-01-31T12:00:00Z'))).toBe(30);
    expect(windowDays(new Date('2026-01-01T00:00:00Z'), new Date('2026-01-01T05:00:00Z'))).toBe(1);
  });
});
