/**
 * Life-Stream Service - Route Aggregator
 * Combines all route modules and mounts them on the Express app.
 */

import type { Express } from 'express';
import { getResponseHelpers } from '@lifestream/platform-core';
import type { LifeStreamServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../../config/service-urls';
import { createHealthRoutes } from './health.routes';
import { createLifeStreamRoutes } from './life-stream.routes';

const { sendSuccess } = getResponseHelpers();

export function setupRoutes(app: Express, registry: LifeStreamServiceRegistry): void {
  app.use('/', createHealthRoutes(registry));
  app.use('/api/life-stream', createLifeStreamRoutes(registry));

  app.get('/', (_req, res) => {
    sendSuccess(res, {
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0',
      status: 'running',
      endpoints: {
        health: '/health',
        ingest: '/api/life-stream/ingest',
        memory: '/api/life-stream/memory/query',
      },
    });
  });
}
