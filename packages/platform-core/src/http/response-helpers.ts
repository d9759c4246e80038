/**
 * Response helpers
 *
 * Service-scoped success and error senders producing the ServiceResponse<T>
 * envelope from @lifestream/shared-contracts.
 *
 *   const { sendSuccess, ServiceErrors } = getResponseHelpers();
 *   try {
 *     sendSuccess(res, await this.store.stats(userId));
 *   } catch (error) {
 *     ServiceErrors.fromException(res, error, 'Failed to get stats', req);
 *   }
 */

import type { Response } from 'express';
import { StructuredErrors, getCorrelationId, type ServiceResponse } from '@lifestream/shared-contracts';

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string, req?: RequestWithHeaders) => void;
  serviceUnavailable: (res: Response, message: string, req?: RequestWithHeaders) => void;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, statusCode?: number) => void;
  ServiceErrors: ServiceErrorHelpers;
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  const context = (req?: RequestWithHeaders) => ({
    service: serviceName,
    correlationId: req ? getCorrelationId(req) : undefined,
  });

  return {
    fromException: (res, error, fallbackMessage, req) => {
      StructuredErrors.fromException(res, error, fallbackMessage, context(req));
    },
    serviceUnavailable: (res, message, req) => {
      StructuredErrors.serviceUnavailable(res, message || 'Service unavailable', context(req));
    },
  };
}

function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  const body: ServiceResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(body);
}

export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess,
    ServiceErrors: createServiceErrors(serviceName),
  };
}

let _serviceHelpers: ResponseHelpers | null = null;

export function initResponseHelpers(serviceName: string): ResponseHelpers {
  _serviceHelpers = createResponseHelpers(serviceName);
  return _serviceHelpers;
}

function resolve(): ResponseHelpers {
  if (!_serviceHelpers) {
    throw new Error('Response helpers not initialized. Call initResponseHelpers(serviceName) during service bootstrap.');
  }
  return _serviceHelpers;
}

/**
 * Controllers grab helpers at module load, before bootstrap has named the
 * service, so each call resolves the initialised helpers lazily.
 */
export function getResponseHelpers(): ResponseHelpers {
  return {
    sendSuccess: (res, data, statusCode) => resolve().sendSuccess(res, data, statusCode),
    ServiceErrors: {
      fromException: (...args) => resolve().ServiceErrors.fromException(...args),
      serviceUnavailable: (...args) => resolve().ServiceErrors.serviceUnavailable(...args),
    },
  };
}
