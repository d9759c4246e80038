import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import {
  statusCodeToErrorCode,
  statusCodeToErrorType,
  sendStructuredError,
  getCorrelationId,
  isErrorCode,
  type ErrorType,
} from '@lifestream/shared-contracts';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  CONFLICT = 'CONFLICT',
  RATE_LIMITED = 'RATE_LIMITED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  TIMEOUT = 'TIMEOUT',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  DATABASE_ERROR = 'DATABASE_ERROR',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, statusCode: number = 500, cause?: Error, code?: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, statusCode: number, code: T, cause?: Error, serviceName?: string) {
    super(message, statusCode, cause, code);
    if (serviceName) this.name = `${serviceName}Error`;
  }
}

type BaseCodeKey = 'INTERNAL_ERROR' | 'NOT_FOUND' | 'VALIDATION_ERROR' | 'UNAUTHORIZED' | 'FORBIDDEN' | 'SERVICE_UNAVAILABLE';

export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: Record<BaseCodeKey, T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static unauthorized(message = 'Unauthorized') {
      return new ServiceError(message, 401, domainErrorCodes.UNAUTHORIZED);
    }

    static forbidden(message = 'Forbidden') {
      return new ServiceError(message, 403, domainErrorCodes.FORBIDDEN);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  options?: {
    code?: string;
    type?: ErrorType;
    details?: Record<string, unknown>;
    correlationId?: string;
    stack?: string;
  }
): void {
  const requestedCode = options?.code;
  const code = isErrorCode(requestedCode) ? requestedCode : statusCodeToErrorCode(statusCode);
  const isDevelopment = process.env.NODE_ENV !== 'production';

  sendStructuredError(res, statusCode, {
    type: options?.type ?? statusCodeToErrorType(statusCode),
    code,
    message,
    details: options?.details,
    correlationId: options?.correlationId,
    stack: isDevelopment ? options?.stack : undefined,
  });
}

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null) {
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    if ('status' in error && typeof error.status === 'number') return error.status;
  }
  return 500;
}

export function errorHandler(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const correlationId = getCorrelationId(req);

    if (error instanceof DomainError) {
      middlewareLogger.error('DomainError caught', {
        error: error.message,
        statusCode: error.statusCode,
        code: error.code,
        correlationId,
        url: req.url,
        method: req.method,
      });

      sendErrorResponse(res, error.statusCode, error.message, {
        code: error.code,
        details: error.details,
        correlationId,
        stack: error.stack,
      });
      return;
    }

    const statusCode = statusOf(error);
    const message =
      process.env.NODE_ENV === 'production' && statusCode >= 500
        ? 'Internal Server Error'
        : errorMessage(error) || 'Unknown error occurred';

    middlewareLogger.error('Unhandled error', {
      error: serializeError(error),
      correlationId,
      url: req.url,
      method: req.method,
    });

    sendErrorResponse(res, statusCode, message, { correlationId, stack: errorStack(error) });
  };
}

export function notFoundHandler(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}
