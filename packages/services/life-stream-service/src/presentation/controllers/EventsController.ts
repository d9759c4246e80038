/**
 * Events Controller
 * User-scoped event listing and per-type statistics.
 */

import type { Request, Response } from 'express';
import { serializeError, getResponseHelpers, validatedParams, validatedQuery } from '@lifestream/platform-core';
import { EventsQuerySchema, UserIdParamsSchema } from '@lifestream/shared-contracts';
import type { LifeStreamServiceRegistry } from '../../infrastructure/ServiceFactory';
import { getLogger } from '../../config/service-urls';

const { sendSuccess, ServiceErrors } = getResponseHelpers();
const logger = getLogger('life-stream-service:events-controller');

export class EventsController {
  constructor(private readonly registry: Pick<LifeStreamServiceRegistry, 'eventStore'>) {}

  async getEvents(req: Request, res: Response): Promise<void> {
    const { userId } = validatedParams(res, UserIdParamsSchema);
    const query = validatedQuery(res, EventsQuerySchema);
    try {
      const events = await this.registry.eventStore.query(userId, query);
      sendSuccess(res, { userId, count: events.length, events });
    } catch (error) {
      logger.error('Event query failed', { userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to query events', req);
    }
  }

  async getStats(req: Request, res: Response): Promise<void> {
    const { userId } = validatedParams(res, UserIdParamsSchema);
    try {
      const stats = await this.registry.eventStore.stats(userId);
      sendSuccess(res, { userId, ...stats });
    } catch (error) {
      logger.error('Event stats failed', { userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to get event stats', req);
    }
  }
}
