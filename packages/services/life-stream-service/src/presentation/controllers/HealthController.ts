/**
 * Health Controller - Kubernetes-compatible health probes
 * Handles /health, /health/live, /health/ready
 */

import type { Request, Response } from 'express';
import { getResponseHelpers } from '@lifestream/platform-core';
import type { HealthStatus } from '@lifestream/shared-contracts';
import type { LifeStreamServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../../config/service-urls';

const { ServiceErrors } = getResponseHelpers();

export class HealthController {
  constructor(
    private readonly registry: Pick<LifeStreamServiceRegistry, 'repository' | 'scheduler' | 'knowledgeGraph' | 'reasoning'>
  ) {}

  async getHealth(req: Request, res: Response): Promise<void> {
    try {
      const store = await this.registry.repository.healthCheck();
      const schedulerHealthy = this.registry.scheduler.isHealthy();
      const healthy = store.healthy && schedulerHealthy;
      const status: HealthStatus = healthy ? 'healthy' : 'unhealthy';

      res.status(healthy ? 200 : 503).json({
        service: SERVICE_NAME,
        status,
        version: process.env.npm_package_version || '1.0.0',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        components: {
          eventStore: store,
          scheduler: { healthy: schedulerHealthy, ...this.registry.scheduler.getInfo() },
          knowledgeGraph: { configured: this.registry.knowledgeGraph.isConfigured() },
          reasoning: { configured: this.registry.reasoning !== null, model: this.registry.reasoning?.model ?? null },
        },
      });
    } catch (error) {
      ServiceErrors.serviceUnavailable(res, error instanceof Error ? error.message : 'Unknown error', req);
    }
  }

  getLiveness(_req: Request, res: Response): void {
    res.status(200).json({
      alive: true,
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  async getReadiness(req: Request, res: Response): Promise<void> {
    try {
      const store = await this.registry.repository.healthCheck();

      res.status(store.healthy ? 200 : 503).json({
        ready: store.healthy,
        service: SERVICE_NAME,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        components: {
          eventStore: { healthy: store.healthy },
        },
      });
    } catch (error) {
      ServiceErrors.serviceUnavailable(res, error instanceof Error ? error.message : 'Unknown error', req);
    }
  }
}
