/**
 * Ingest Controller
 * Batch and single-event ingestion into the event store.
 */

import type { Request, Response } from 'express';
import { serializeError, getResponseHelpers } from '@lifestream/platform-core';
import type { IngestBatchRequest, IngestResponse, IngestSingleRequest } from '@lifestream/shared-contracts';
import type { LifeStreamServiceRegistry } from '../../infrastructure/ServiceFactory';
import { getLogger } from '../../config/service-urls';

const { sendSuccess, ServiceErrors } = getResponseHelpers();
const logger = getLogger('life-stream-service:ingest-controller');

export class IngestController {
  constructor(private readonly registry: Pick<LifeStreamServiceRegistry, 'eventStore'>) {}

  /** A batch where every event is rejected still answers 200 with the error list. */
  async ingestBatch(req: Request, res: Response): Promise<void> {
    const { userId, events }: IngestBatchRequest = req.body;
    try {
      const result = await this.registry.eventStore.insertBatch(userId, events);
      const response: IngestResponse = {
        success: true,
        eventsReceived: events.length,
        eventsStored: result.storedCount,
        errors: result.errors,
      };
      sendSuccess(res, response);
    } catch (error) {
      logger.error('Batch ingest failed', { userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to ingest events', req);
    }
  }

  async ingestSingle(req: Request, res: Response): Promise<void> {
    const { userId, ...event }: IngestSingleRequest = req.body;
    try {
      const result = await this.registry.eventStore.insertOne(userId, event);
      const response: IngestResponse = {
        success: true,
        eventsReceived: 1,
        eventsStored: result.storedCount,
        errors: result.errors,
      };
      sendSuccess(res, response);
    } catch (error) {
      logger.warn('Single event ingest failed', { userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to ingest event', req);
    }
  }
}
