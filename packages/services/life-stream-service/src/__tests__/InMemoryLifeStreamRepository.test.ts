import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { LifeEvent, NewPattern } from '../domains/entities';
import { InMemoryLifeStreamRepository } from '../infrastructure/repositories/InMemoryLifeStreamRepository';

vi.mock('../config/service-urls', async () => {
  const { createMockLogger } = await import('@lifestream/test-utils');
  const logger = createMockLogger();
  return {
    SERVICE_NAME: 'life-stream-service',
    getLogger: vi.fn(() => logger),
  };
});

describe('InMemoryLifeStreamRepository', () => {
  let repository: InMemoryLifeStreamRepository;

  function geo(id: string, time: string, lat: number, speed: number | null = null): LifeEvent {
    return {
      id,
      userId: 'user-1',
      eventTime: new Date(time),
      type: 'geo',
      subtype: '',
      source: 'mobile',
      deviceId: null,
      lat,
      lon: 37.61,
      accuracy: null,
      altitude: null,
      speed,
      payload: {},
    };
  }

  function minedPattern(overrides: Partial<NewPattern> = {}): NewPattern {
    return {
      userId: 'user-1',
      patternType: 'routine',
      name: 'Morning activity (likely commute)',
      description: 'Regular activity at 08:00',
      confidence: 0.5,
      centerLat: null,
      centerLon: null,
      radiusMeters: null,
      timePattern: '0 8 * * *',
      frequencyPerWeek: 3,
      firstSeen: new Date('2026-01-01T08:00:00.000Z'),
      lastSeen: new Date('2026-01-05T08:00:00.000Z'),
      occurrences: 5,
      fingerprint: 'routine:8',
      data: {},
      ...overrides,
    };
  }

  beforeEach(() => {
    repository = new InMemoryLifeStreamRepository();
  });

  it('should roll geo events up by hour', async () => {
    await repository.insertEvents([
      geo('a', '2026-01-05T08:10:00Z', 55.75, 1),
      geo('b', '2026-01-05T08:40:00Z', 55.76, 3),
      geo('c', '2026-01-05T09:05:00Z', 55.77),
      geo('d', '2026-01-05T10:00:00Z', 55.78),
    ]);

    const rollups = await repository.getHourlyActivity(
      'user-1',
      new Date('2026-01-05T08:00:00Z'),
      new Date('2026-01-05T10:00:00Z')
    );

    expect(rollups).toHaveLength(2);
    expect(rollups[0].hour).toEqual(new Date('2026-01-05T08:00:00.000Z'));
    expect(rollups[0].centerLat).toBeCloseTo(55.755);
    expect(rollups[0]).toMatchObject({ centerLon: 37.61, pointsCount: 2, avgSpeed: 2, maxSpeed: 3 });
    expect(rollups[1]).toMatchObject({ pointsCount: 1, avgSpeed: null, maxSpeed: null });
  });

  it('should return geo points ascending in a half-open window', async () => {
    await repository.insertEvents([
      geo('late', '2026-01-05T10:00:00Z', 55.78),
      geo('first', '2026-01-05T08:00:00Z', 55.75),
      geo('second', '2026-01-05T09:00:00Z', 55.76),
    ]);

    const points = await repository.getGeoPoints(
      'user-1',
      new Date('2026-01-05T08:00:00Z'),
      new Date('2026-01-05T10:00:00Z'),
      1000
    );

    expect(points.map(point => point.lat)).toEqual([55.75, 55.76]);
  });

  it('should list users with events since a date', async () => {
    await repository.insertEvents([
      { ...geo('a', '2026-01-05T08:00:00Z', 55.75), userId: 'user-b' },
      { ...geo('b', '2026-01-05T08:00:00Z', 55.75), userId: 'user-a' },
      { ...geo('c', '2025-12-01T08:00:00Z', 55.75), userId: 'user-c' },
    ]);

    expect(await repository.getUsersWithEvents(new Date('2026-01-01T00:00:00Z'))).toEqual(['user-a', 'user-b']);
  });

  it('should supersede active patterns sharing a fingerprint', async () => {
    await repository.savePatterns('user-1', [minedPattern({ confidence: 0.5 })]);
    await repository.savePatterns('user-1', [
      minedPattern({ confidence: 0.6 }),
      minedPattern({ fingerprint: 'routine:18', timePattern: '0 18 * * *', confidence: 0.7 }),
    ]);

    const active = await repository.getPatterns('user-1');
    expect(active.map(pattern => [pattern.fingerprint, pattern.confidence])).toEqual([
      ['routine:18', 0.7],
      ['routine:8', 0.6],
    ]);

    const all = await repository.getPatterns('user-1', { activeOnly: false });
    expect(all).toHaveLength(3);
    expect(all.filter(pattern => !pattern.isActive).map(pattern => pattern.confidence)).toEqual([0.5]);
  });

  it('should filter patterns by type', async () => {
    await repository.savePatterns('user-1', [
      minedPattern(),
      minedPattern({ patternType: 'location_cluster', fingerprint: 'location_cluster:55.750:37.610' }),
    ]);

    const clusters = await repository.getPatterns('user-1', { patternType: 'location_cluster' });
    expect(clusters.map(pattern => pattern.fingerprint)).toEqual(['location_cluster:55.750:37.610']);
  });
});
