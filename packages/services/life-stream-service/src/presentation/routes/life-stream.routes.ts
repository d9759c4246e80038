/**
 * Life-Stream Routes - ingestion, events, patterns and memory
 * Mounted under /api/life-stream
 */

import { Router } from 'express';
import { getValidation } from '@lifestream/platform-core';
import {
  AnalyzeRequestSchema,
  EventsQuerySchema,
  IngestBatchRequestSchema,
  IngestSingleRequestSchema,
  MemoryQueryRequestSchema,
  MemorySummaryQuerySchema,
  PatternsQuerySchema,
  UserIdParamsSchema,
} from '@lifestream/shared-contracts';
import { IngestController } from '../controllers/IngestController';
import { EventsController } from '../controllers/EventsController';
import { PatternsController } from '../controllers/PatternsController';
import { MemoryController } from '../controllers/MemoryController';
import type { LifeStreamServiceRegistry } from '../../infrastructure/ServiceFactory';

export function createLifeStreamRoutes(registry: LifeStreamServiceRegistry): Router {
  const router = Router();
  const { validateBody, validateQuery, validateParams } = getValidation();

  const ingest = new IngestController(registry);
  const events = new EventsController(registry);
  const patterns = new PatternsController(registry);
  const memory = new MemoryController(registry);

  router.post('/ingest', validateBody(IngestBatchRequestSchema), (req, res) => ingest.ingestBatch(req, res));
  router.post('/ingest/single', validateBody(IngestSingleRequestSchema), (req, res) => ingest.ingestSingle(req, res));

  router.get('/events/:userId', validateParams(UserIdParamsSchema), validateQuery(EventsQuerySchema), (req, res) =>
    events.getEvents(req, res)
  );
  router.get('/stats/:userId', validateParams(UserIdParamsSchema), (req, res) => events.getStats(req, res));

  router.get('/patterns/:userId', validateParams(UserIdParamsSchema), validateQuery(PatternsQuerySchema), (req, res) =>
    patterns.getPatterns(req, res)
  );
  router.post(
    '/patterns/:userId/analyze',
    validateParams(UserIdParamsSchema),
    validateBody(AnalyzeRequestSchema),
    (req, res) => patterns.analyze(req, res)
  );

  router.post('/memory/query', validateBody(MemoryQueryRequestSchema), (req, res) => memory.query(req, res));
  router.get(
    '/memory/:userId/summary',
    validateParams(UserIdParamsSchema),
    validateQuery(MemorySummaryQuerySchema),
    (req, res) => memory.summary(req, res)
  );

  return router;
}
