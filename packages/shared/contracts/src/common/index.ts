/**
 * Common Contracts
 *
 * Response envelope, error structure and health shapes shared by every service.
 */

export interface ServiceError {
  type: string;
  code: string;
  message: string;
  details?: unknown;
  correlationId?: string;
}

export type ServiceResponse<T> = {
  success: boolean;
  data?: T;
  error?: ServiceError;
  timestamp?: string;
};

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export * from './error-factory';
