/**
 * Life-Stream Service - Express App Factory
 * Creates the Express app without starting the server, so tests can mount it with an injected registry.
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import {
  errorHandler,
  initResponseHelpers,
  initValidation,
  notFoundHandler,
  requestLogger,
} from '@lifestream/platform-core';
import { getServiceRegistry, type LifeStreamServiceRegistry } from './infrastructure/ServiceFactory';
import { setupRoutes } from './presentation/routes';
import { SERVICE_NAME } from './config/service-urls';

export type { LifeStreamServiceRegistry } from './infrastructure/ServiceFactory';
export {
  createServiceRegistry,
  getServiceRegistry,
  setServiceRegistry,
  resetServiceRegistry,
} from './infrastructure/ServiceFactory';

export function createApp(registry: LifeStreamServiceRegistry = getServiceRegistry()): express.Application {
  initResponseHelpers(SERVICE_NAME);
  initValidation(SERVICE_NAME);

  const app = express();

  setupMiddleware(app, registry.config.nodeEnv);
  setupRoutes(app, registry);
  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}

function setupMiddleware(app: express.Application, nodeEnv: string): void {
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(compression());

  // Comma-separated; production without an explicit list allows no cross-origin callers.
  const corsOrigins = process.env.CORS_ALLOWED_ORIGINS
    ? process.env.CORS_ALLOWED_ORIGINS.split(',').map(origin => origin.trim())
    : nodeEnv !== 'production';

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    })
  );

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: nodeEnv === 'production' ? 1000 : 10000,
    message: 'Too many requests from this IP, please try again later.',
    standardHeaders: true,
  });
  app.use('/api/', limiter);

  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  app.use(requestLogger(SERVICE_NAME));
}
