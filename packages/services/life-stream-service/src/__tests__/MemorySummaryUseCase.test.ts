import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { EventStats, NewPattern, Pattern } from '../domains/entities';
import { MemorySummaryUseCase } from '../application/use-cases/MemorySummaryUseCase';

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

const NOW = new Date('2026-01-31T00:00:00.000Z');

function mined(overrides: Partial<NewPattern> = {}): NewPattern {
  return {
    userId: 'user-1',
    patternType: 'location_cluster',
    name: 'Morning place #0',
    description: 'Frequently visited place (5 visits)',
    confidence: 0.55,
    centerLat: 55.7552,
    centerLon: 37.617,
    radiusMeters: 22.2,
    timePattern: '',
    frequencyPerWeek: 1.2,
    firstSeen: new Date('2026-01-05T08:15:00Z'),
    lastSeen: new Date('2026-01-08T08:10:00Z'),
    occurrences: 5,
    fingerprint: 'location_cluster:55.755:37.617',
    data: {},
    ...overrides,
  };
}

function saved(patterns: NewPattern[]): Pattern[] {
  return patterns.map((pattern, index) => ({ ...pattern, id: `pattern-${index}`, isActive: true }));
}

describe('MemorySummaryUseCase', () => {
  const stats: EventStats = { totalEvents: 0, byType: {}, firstEvent: null, lastEvent: null };
  let events: { stats: ReturnType<typeof vi.fn>; query: ReturnType<typeof vi.fn> };
  let patternStore: { getPatterns: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    events = { stats: vi.fn().mockResolvedValue(stats), query: vi.fn().mockResolvedValue([]) };
    patternStore = { getPatterns: vi.fn().mockResolvedValue([]) };
  });

  it('should summarise stats, active patterns and the recent sample', async () => {
    const active = saved(Array.from({ length: 6 }, (_, hour) => mined({ fingerprint: `routine:${hour}` })));
    patternStore.getPatterns.mockResolvedValue(active);
    events.query.mockResolvedValue([{ id: 'evt-1' }, { id: 'evt-2' }]);

    const summary = await new MemorySummaryUseCase(events, patternStore, () => NOW).execute('user-1', 3);

    expect(events.query).toHaveBeenCalledWith('user-1', {
      start: new Date('2026-01-28T00:00:00.000Z'),
      end: NOW,
      limit: 100,
    });
    expect(patternStore.getPatterns).toHaveBeenCalledWith('user-1', { activeOnly: true });
    expect(summary).toEqual({
      userId: 'user-1',
      periodDays: 3,
      stats,
      patternsCount: 6,
      recentEventsSample: 2,
      patterns: active.slice(0, 5),
    });
  });

  it('should reject a period outside 1..365 days', async () => {
    const summary = new MemorySummaryUseCase(events, patternStore, () => NOW);
    await expect(summary.execute('user-1', 0)).rejects.toMatchObject({ statusCode: 400, code: 'INVALID_TIME_RANGE' });
    await expect(summary.execute('user-1', 366)).rejects.toMatchObject({ statusCode: 400 });
  });

  it('should report an unavailable pattern store', async () => {
    patternStore.getPatterns.mockRejectedValue(new Error('connection refused'));
    await expect(new MemorySummaryUseCase(events, patternStore, () => NOW).execute('user-1')).rejects.toMatchObject({
      statusCode: 503,
      message: 'Event store unavailable during getPatterns',
    });
  });
});
