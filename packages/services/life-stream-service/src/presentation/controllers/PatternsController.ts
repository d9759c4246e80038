/**
 * Patterns Controller
 * Lists mined patterns and triggers an on-demand analysis for one user.
 */

import type { Request, Response } from 'express';
import { serializeError, getResponseHelpers, validatedParams, validatedQuery } from '@lifestream/platform-core';
import { PatternsQuerySchema, UserIdParamsSchema, type AnalyzeRequest } from '@lifestream/shared-contracts';
import type { LifeStreamServiceRegistry } from '../../infrastructure/ServiceFactory';
import { guardStore } from '../../application/errors';
import { getLogger } from '../../config/service-urls';

const { sendSuccess, ServiceErrors } = getResponseHelpers();
const logger = getLogger('life-stream-service:patterns-controller');

export class PatternsController {
  constructor(private readonly registry: Pick<LifeStreamServiceRegistry, 'repository' | 'patternAnalysis'>) {}

  async getPatterns(req: Request, res: Response): Promise<void> {
    const { userId } = validatedParams(res, UserIdParamsSchema);
    const { patternType, activeOnly } = validatedQuery(res, PatternsQuerySchema);
    try {
      const patterns = await guardStore('getPatterns', () =>
        this.registry.repository.getPatterns(userId, { patternType, activeOnly })
      );
      sendSuccess(res, { userId, count: patterns.length, patterns });
    } catch (error) {
      logger.error('Pattern listing failed', { userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to get patterns', req);
    }
  }

  async analyze(req: Request, res: Response): Promise<void> {
    const { userId } = validatedParams(res, UserIdParamsSchema);
    const { daysBack }: AnalyzeRequest = req.body;
    try {
      const result = await this.registry.patternAnalysis.runAnalysis(userId, daysBack);
      sendSuccess(res, result);
    } catch (error) {
      logger.error('Pattern analysis failed', { userId, error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to analyze patterns', req);
    }
  }
}
