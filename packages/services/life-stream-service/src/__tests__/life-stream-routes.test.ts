import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createGeoPing, createPurchase, resetFixtureIds } from '@lifestream/test-utils';
import { createApp } from '../app';
import { createServiceRegistry } from '../infrastructure/ServiceFactory';
import { InMemoryLifeStreamRepository } from '../infrastructure/repositories/InMemoryLifeStreamRepository';
import { loadLifeStreamConfig } from '../config/life-stream-config';
import { templatedAnswer } from '../application/memory/answer';

vi.mock('../config/service-urls', async () => {
  const { createMockLogger } = await import('@lifestream/test-utils');
  const logger = createMockLogger();
  return {
    SERVICE_NAME: 'life-stream-service',
    getLogger: vi.fn(() => logger),
  };
});

const HOUR_MS = 60 * 60 * 1000;

function hoursAgo(hours: number): string {
  return new Date(Date.now() - hours * HOUR_MS).toISOString();
}

describe('life-stream routes', () => {
  let app: Application;
  let repository: InMemoryLifeStreamRepository;

  const knowledgeGraph = {
    resolvePeople: vi.fn().mockResolvedValue([]),
    writeHabit: vi.fn().mockResolvedValue('habit-node-1'),
    isConfigured: () => true,
  };

  async function ingestCluster(): Promise<void> {
    const events = [2, 3, 4, 5].map(hours => createGeoPing(55.7558, 37.6173, hoursAgo(hours)));
    await request(app).post('/api/life-stream/ingest').send({ userId: 'user-1', events }).expect(200);
  }

  beforeEach(() => {
    resetFixtureIds();
    repository = new InMemoryLifeStreamRepository();
    const registry = createServiceRegistry(loadLifeStreamConfig({ NODE_ENV: 'test' }), {
      repository,
      knowledgeGraph,
      reasoning: null,
    });
    app = createApp(registry);
  });

  describe('health', () => {
    it('should report component health', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body.status).toBe('healthy');
      expect(response.body.components.eventStore.healthy).toBe(true);
      expect(response.body.components.knowledgeGraph).toEqual({ configured: true });
      expect(response.body.components.reasoning).toEqual({ configured: false, model: null });
      expect(response.body.components.scheduler).toMatchObject({ healthy: true, name: 'pattern-miner' });
    });

    it('should answer liveness and readiness probes', async () => {
      expect((await request(app).get('/health/live').expect(200)).body.alive).toBe(true);
      expect((await request(app).get('/health/ready').expect(200)).body.ready).toBe(true);
    });

    it('should report 503 when the store is unhealthy', async () => {
      vi.spyOn(repository, 'healthCheck').mockResolvedValue({ healthy: false });
      const response = await request(app).get('/health/ready').expect(503);
      expect(response.body.ready).toBe(false);
    });
  });

  describe('POST /api/life-stream/ingest', () => {
    it('should store valid events and report rejected ones by index', async () => {
      const response = await request(app)
        .post('/api/life-stream/ingest')
        .send({
          userId: 'user-1',
          events: [createGeoPing(55.7558, 37.6173, '2026-01-05T08:00:00Z'), { type: 'geo', lat: 55.75 }],
        })
        .expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data).toEqual({
        success: true,
        eventsReceived: 2,
        eventsStored: 1,
        errors: [{ index: 1, message: 'lon: Required' }],
      });
    });

    it('should reject an empty batch', async () => {
      const response = await request(app)
        .post('/api/life-stream/ingest')
        .send({ userId: 'user-1', events: [] })
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('should store a single event', async () => {
      const response = await request(app)
        .post('/api/life-stream/ingest/single')
        .send({ userId: 'user-1', ...createPurchase('Coffee', 250, '2026-01-05T09:00:00Z') })
        .expect(200);

      expect(response.body.data).toEqual({ success: true, eventsReceived: 1, eventsStored: 1, errors: [] });
    });

    it('should reject an invalid single event', async () => {
      const response = await request(app)
        .post('/api/life-stream/ingest/single')
        .send({ userId: 'user-1', type: 'geo', lat: 55.75 })
        .expect(400);

      expect(response.body.error.message).toBe('Invalid event: lon: Required');
    });
  });

  describe('events', () => {
    beforeEach(async () => {
      await request(app)
        .post('/api/life-stream/ingest')
        .send({
          userId: 'user-1',
          events: [
            createGeoPing(55.7558, 37.6173, '2026-01-05T08:00:00Z'),
            createPurchase('Coffee', 250, '2026-01-05T09:00:00Z'),
          ],
        })
        .expect(200);
    });

    it('should list events filtered by type', async () => {
      const response = await request(app).get('/api/life-stream/events/user-1?types=geo&limit=10').expect(200);

      expect(response.body.data.userId).toBe('user-1');
      expect(response.body.data.count).toBe(1);
      expect(response.body.data.events[0]).toMatchObject({
        type: 'geo',
        lat: 55.7558,
        eventTime: '2026-01-05T08:00:00.000Z',
      });
    });

    it('should reject unknown types and inverted ranges', async () => {
      await request(app).get('/api/life-stream/events/user-1?types=weather').expect(400);
      await request(app)
        .get('/api/life-stream/events/user-1?start=2026-01-06T00:00:00Z&end=2026-01-05T00:00:00Z')
        .expect(400);
    });

    it('should return per-type stats', async () => {
      const response = await request(app).get('/api/life-stream/stats/user-1').expect(200);

      expect(response.body.data.totalEvents).toBe(2);
      expect(response.body.data.byType.purchase.count).toBe(1);
      expect(response.body.data.firstEvent).toBe('2026-01-05T08:00:00.000Z');
    });

    it('should map an unavailable store to 503', async () => {
      vi.spyOn(repository, 'getEventStats').mockRejectedValue(new Error('connection refused'));

      const response = await request(app).get('/api/life-stream/stats/user-1').expect(503);

      expect(response.body.error).toMatchObject({
        code: 'SERVICE_UNAVAILABLE',
        message: 'Event store unavailable during stats',
      });
    });
  });

  describe('patterns', () => {
    it('should analyse on demand and list the saved patterns', async () => {
      await ingestCluster();

      const analysis = await request(app)
        .post('/api/life-stream/patterns/user-1/analyze')
        .send({ daysBack: 7 })
        .expect(200);

      expect(analysis.body.data.userId).toBe('user-1');
      expect(analysis.body.data.geoPatterns).toHaveLength(1);
      expect(analysis.body.data.geoPatterns[0]).toMatchObject({ patternType: 'location_cluster', occurrences: 4 });
      expect(analysis.body.data.insights).toEqual([]);

      const listed = await request(app)
        .get('/api/life-stream/patterns/user-1?patternType=location_cluster')
        .expect(200);
      expect(listed.body.data.count).toBe(1);
    });

    it('should keep one active pattern per place across reruns', async () => {
      await ingestCluster();

      await request(app).post('/api/life-stream/patterns/user-1/analyze').send({}).expect(200);
      await request(app).post('/api/life-stream/patterns/user-1/analyze').send({}).expect(200);

      const active = await request(app).get('/api/life-stream/patterns/user-1?patternType=location_cluster');
      const all = await request(app).get('/api/life-stream/patterns/user-1?patternType=location_cluster&activeOnly=false');

      expect(active.body.data.count).toBe(1);
      expect(all.body.data.count).toBe(2);
    });

    it('should validate the analysis window and pattern type', async () => {
      await request(app).post('/api/life-stream/patterns/user-1/analyze').send({ daysBack: 0 }).expect(400);
      await request(app).get('/api/life-stream/patterns/user-1?patternType=bogus').expect(400);
    });
  });

  describe('memory', () => {
    it('should answer from the stored events without a reasoning provider', async () => {
      await ingestCluster();

      const response = await request(app)
        .post('/api/life-stream/memory/query')
        .send({
          userId: 'user-1',
          question: 'Where was I?',
          start: hoursAgo(24),
          end: hoursAgo(0),
        })
        .expect(200);

      expect(response.body.data).toMatchObject({
        question: 'Where was I?',
        answer: templatedAnswer(4),
        eventsAnalyzed: 4,
        reasoning: null,
        people: [],
        transactions: [],
      });
      expect(response.body.data.confidence).toBeCloseTo(0.54);
      expect(response.body.data.locations).toHaveLength(1);
    });

    it('should reject a question that is too short', async () => {
      await request(app).post('/api/life-stream/memory/query').send({ userId: 'user-1', question: 'Hi' }).expect(400);
    });

    it('should summarise the recent period', async () => {
      await ingestCluster();

      const response = await request(app).get('/api/life-stream/memory/user-1/summary?days=7').expect(200);

      expect(response.body.data).toMatchObject({
        userId: 'user-1',
        periodDays: 7,
        patternsCount: 0,
        recentEventsSample: 4,
      });
      expect(response.body.data.stats.totalEvents).toBe(4);
    });
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(app).get('/api/life-stream/unknown').expect(404);
    expect(response.body.success).toBe(false);
  });
});
