import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Insight, NewPattern, Pattern } from '../domains/entities';
import { PatternAnalysisUseCase } from '../application/use-cases/PatternAnalysisUseCase';
import { InsightSynthesizer } from '../application/insights/InsightSynthesizer';

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

const routine = mined({
  patternType: 'routine',
  name: 'Morning activity (likely commute)',
  centerLat: null,
  centerLon: null,
  radiusMeters: null,
  timePattern: '0 8 * * *',
  fingerprint: 'routine:8',
});

function saved(patterns: NewPattern[]): Pattern[] {
  return patterns.map((pattern, index) => ({ ...pattern, id: `pattern-${index}`, isActive: true }));
}

describe('PatternAnalysisUseCase', () => {
  let geoMiner: { mine: ReturnType<typeof vi.fn> };
  let routineMiner: { mine: ReturnType<typeof vi.fn> };
  let synthesizer: { synthesize: ReturnType<typeof vi.fn> };
  let patterns: { savePatterns: ReturnType<typeof vi.fn> };
  let users: { getUsersWithEvents: ReturnType<typeof vi.fn> };

  function useCase(): PatternAnalysisUseCase {
    return new PatternAnalysisUseCase({
      geoMiner,
      routineMiner,
      synthesizer,
      patterns,
      users,
      defaultDays: 30,
      now: () => NOW,
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    geoMiner = { mine: vi.fn().mockResolvedValue([mined()]) };
    routineMiner = { mine: vi.fn().mockResolvedValue([routine]) };
    synthesizer = { synthesize: vi.fn().mockResolvedValue([]) };
    patterns = {
      savePatterns: vi
        .fn()
        .mockImplementation((_userId: string, toSave: NewPattern[]) => Promise.resolve(saved(toSave))),
    };
    users = { getUsersWithEvents: vi.fn().mockResolvedValue([]) };
  });

  it('should mine both kinds of pattern over the requested window and save them together', async () => {
    const insight: Insight = {
      id: 'insight-1',
      userId: 'user-1',
      title: 'Morning coffee',
      description: 'Stops at the same cafe before work',
      confidence: 0.8,
      insightType: 'habit',
      evidenceCount: 2,
      timeRangeStart: new Date('2026-01-17T00:00:00.000Z'),
      timeRangeEnd: NOW,
      aiModel: 'test-model',
      reasoning: 'Based on 1 location clusters and 1 time patterns',
      source: 'pattern_miner',
      graphNodeId: null,
    };
    synthesizer.synthesize.mockResolvedValue([insight]);

    const result = await useCase().runAnalysis('user-1', 14);

    const start = new Date('2026-01-17T00:00:00.000Z');
    expect(geoMiner.mine).toHaveBeenCalledWith('user-1', start, NOW);
    expect(routineMiner.mine).toHaveBeenCalledWith('user-1', start, NOW);
    expect(synthesizer.synthesize).toHaveBeenCalledWith('user-1', [mined()], [routine], 14);
    expect(patterns.savePatterns).toHaveBeenCalledWith('user-1', [mined(), routine]);

    expect(result.geoPatterns.map(pattern => pattern.id)).toEqual(['pattern-0']);
    expect(result.timePatterns.map(pattern => pattern.id)).toEqual(['pattern-1']);
    expect(result.insights).toEqual([insight]);
    expect(result.analyzedAt).toBe('2026-01-31T00:00:00.000Z');
  });

  it('should use the configured default window', async () => {
    await useCase().runAnalysis('user-1');
    expect(geoMiner.mine).toHaveBeenCalledWith('user-1', new Date('2026-01-01T00:00:00.000Z'), NOW);
  });

  it('should skip the save when nothing was mined', async () => {
    geoMiner.mine.mockResolvedValue([]);
    routineMiner.mine.mockResolvedValue([]);

    const result = await useCase().runAnalysis('user-1');

    expect(patterns.savePatterns).not.toHaveBeenCalled();
    expect(result.geoPatterns).toEqual([]);
    expect(result.timePatterns).toEqual([]);
  });

  it('should fail before any insight is synthesized when the pattern store is unavailable', async () => {
    patterns.savePatterns.mockRejectedValue(new Error('deadlock detected'));

    await expect(useCase().runAnalysis('user-1')).rejects.toMatchObject({
      statusCode: 503,
      message: 'Event store unavailable during savePatterns',
    });
    expect(synthesizer.synthesize).not.toHaveBeenCalled();
  });

  it('should not write habits to the knowledge graph when saving patterns fails', async () => {
    const writeHabit = vi.fn().mockResolvedValue('habit-node-1');
    const saveInsight = vi.fn().mockResolvedValue(undefined);
    const reasoning = {
      model: 'test-model',
      complete: vi
        .fn()
        .mockResolvedValue(JSON.stringify([{ title: 'Morning coffee', description: 'Cafe before work', confidence: 0.8 }])),
    };
    patterns.savePatterns.mockRejectedValue(new Error('db down'));

    const analysis = new PatternAnalysisUseCase({
      geoMiner,
      routineMiner,
      synthesizer: new InsightSynthesizer({
        reasoning,
        knowledgeGraph: { resolvePeople: vi.fn(), writeHabit, isConfigured: () => true },
        insights: { saveInsight, getInsights: vi.fn() },
        now: () => NOW,
      }),
      patterns,
      users,
      defaultDays: 30,
      now: () => NOW,
    });

    await expect(analysis.runAnalysis('user-1')).rejects.toMatchObject({ statusCode: 503 });
    await expect(analysis.runAnalysis('user-1')).rejects.toMatchObject({ statusCode: 503 });

    expect(reasoning.complete).not.toHaveBeenCalled();
    expect(writeHabit).not.toHaveBeenCalled();
    expect(saveInsight).not.toHaveBeenCalled();
  });

  it('should continue the batch past a failing user', async () => {
    users.getUsersWithEvents.mockResolvedValue(['user-a', 'user-b', 'user-c']);
    geoMiner.mine.mockImplementation((userId: string) =>
      userId === 'user-b' ? Promise.reject(new Error('store down')) : Promise.resolve([mined({ userId })])
    );

    const summary = await useCase().runBatchAnalysis();

    expect(users.getUsersWithEvents).toHaveBeenCalledWith(new Date('2026-01-01T00:00:00.000Z'));
    expect(summary).toEqual({ usersAnalyzed: 2, patternsFound: 4, insightsGenerated: 0, failures: 1 });
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Pattern analysis failed for user',
      expect.objectContaining({ userId: 'user-b' })
    );
  });
});
