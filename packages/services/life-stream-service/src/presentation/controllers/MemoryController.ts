/**
 * Memory Controller
 * Natural-language memory queries and the period summary.
 */

import type { Request, Response } from 'express';
import { serializeError, getResponseHelpers, validatedParams, validatedQuery } from '@lifestream/platform-core';
import {
  MemorySummaryQuerySchema,
  UserIdParamsSchema,
  type MemoryQueryRequest,
} from '@lifestream/shared-contracts';
import type { LifeStreamServiceRegistry } from '../../infrastructure/ServiceFactory';
import { getLogger } from '../../config/service-urls';

const { sendSuccess, ServiceErrors } = getResponseHelpers();
const logger = getLogger('life-stream-service:memory-controller');

export class MemoryController {
  constructor(private readonly registry: Pick<LifeStreamServiceRegistry, 'memoryQuery' | 'memorySummary'>) {}

  async query(req: Request, res: Response): Promise<void> {
    const request: MemoryQueryRequest = req.body;
    try {
      const answer = await this.registry.memoryQuery.execute(request);
      sendSuccess(res, answer);
    } catch (error) {
      logger.error('Memory query failed', { userId: request.userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to answer memory query', req);
    }
  }

  async summary(req: Request, res: Response): Promise<void> {
    const { userId } = validatedParams(res, UserIdParamsSchema);
    const { days } = validatedQuery(res, MemorySummaryQuerySchema);
    try {
      const summary = await this.registry.memorySummary.execute(userId, days);
      sendSuccess(res, summary);
    } catch (error) {
      logger.error('Memory summary failed', { userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to build memory summary', req);
    }
  }
}
