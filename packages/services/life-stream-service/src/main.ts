// Load environment variables first (never override values already set)
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * Life-Stream Service - entry point
 * Event ingestion, pattern mining and memory queries over the user's life stream.
 */

import {
  createLogger,
  initResponseHelpers,
  registerShutdownHook,
  serializeError,
  setupGracefulShutdown,
} from '@lifestream/platform-core';
import { createApp } from './app';
import { getServiceRegistry } from './infrastructure/ServiceFactory';
import { TimescaleLifeStreamRepository } from './infrastructure/repositories/TimescaleLifeStreamRepository';
import { SERVICE_NAME } from './config/service-urls';

initResponseHelpers(SERVICE_NAME);

const logger = createLogger(SERVICE_NAME);

async function main(): Promise<void> {
  const registry = getServiceRegistry();
  const { port } = registry.config;

  logger.info('Starting Life-Stream Service', { service: SERVICE_NAME, port, phase: 'initialization' });

  if (registry.repository instanceof TimescaleLifeStreamRepository) {
    await registry.repository.initialize();
  }

  const app = createApp(registry);
  const server = app.listen(port, () => {
    logger.info('Life-Stream Service listening', { port, phase: 'listening' });
  });

  registry.scheduler.start();

  registerShutdownHook('schedulers', 'pattern-miner', async () => {
    registry.scheduler.stop();
  });
  registerShutdownHook('connections', 'life-stream-repository', () => registry.repository.close());

  setupGracefulShutdown(server);
}

main().catch(error => {
  logger.error('Failed to start Life-Stream Service', { error: serializeError(error) });
  process.exit(1);
});
