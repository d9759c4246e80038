/**
 * Structured Error Factory
 *
 * Builds the `{ success: false, error, timestamp }` envelope so that error
 * details survive service boundaries.
 */

import type { Response } from 'express';
import type { ServiceError } from './index';

export type ErrorCode =
  | 'UNKNOWN'
  | 'VALIDATION_ERROR'
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'PAYMENT_REQUIRED'
  | 'CONFLICT'
  | 'GONE'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'PAYLOAD_TOO_LARGE'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'DATABASE_ERROR'
  | 'INTERNAL_ERROR';

const ERROR_CODES: readonly ErrorCode[] = [
  'UNKNOWN',
  'VALIDATION_ERROR',
  'BAD_REQUEST',
  'NOT_FOUND',
  'UNAUTHORIZED',
  'FORBIDDEN',
  'PAYMENT_REQUIRED',
  'CONFLICT',
  'GONE',
  'RATE_LIMITED',
  'TIMEOUT',
  'PAYLOAD_TOO_LARGE',
  'EXTERNAL_SERVICE_ERROR',
  'SERVICE_UNAVAILABLE',
  'DATABASE_ERROR',
  'INTERNAL_ERROR',
];

export type ErrorType =
  | 'ValidationError'
  | 'NotFoundError'
  | 'AuthenticationError'
  | 'AuthorizationError'
  | 'ConflictError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'ExternalServiceError'
  | 'ServiceUnavailableError'
  | 'DatabaseError'
  | 'InternalError';

export interface StructuredError {
  type: ErrorType;
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: string;
  stack?: string;
  service?: string;
  correlationId?: string;
}

interface ErrorOptions {
  details?: Record<string, unknown>;
  originalError?: unknown;
  service?: string;
  correlationId?: string;
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && ERROR_CODES.some(code => code === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const PG_FIELDS = ['code', 'detail', 'hint', 'constraint', 'table', 'column'] as const;

/**
 * Pulls message, stack and details out of anything thrown. PostgreSQL driver
 * errors contribute their code/detail/hint fields as pg* details.
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  originalError: string;
  stack?: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof Error) {
    const causeMessage = error.cause instanceof Error ? error.cause.message : undefined;

    const pgDetails: Record<string, unknown> = {};
    for (const field of PG_FIELDS) {
      const value: unknown = Reflect.get(error, field);
      if (typeof value === 'string' && value) {
        pgDetails[`pg${field.charAt(0).toUpperCase()}${field.slice(1)}`] = value;
      }
    }
    if (causeMessage) pgDetails.causeMessage = causeMessage;

    const existingDetails = 'details' in error && isRecord(error.details) ? error.details : undefined;

    return {
      message: error.message,
      originalError: causeMessage ? `${error.message} | Cause: ${causeMessage}` : error.message,
      stack: process.env.NODE_ENV !== 'production' ? error.stack : undefined,
      details: Object.keys(pgDetails).length > 0 ? { ...existingDetails, ...pgDetails } : existingDetails,
    };
  }

  if (typeof error === 'string') {
    return { message: error, originalError: error };
  }

  if (isRecord(error)) {
    return {
      message: String(error.message || error.error || 'Unknown error'),
      originalError: JSON.stringify(error),
      details: isRecord(error.details) ? error.details : undefined,
    };
  }

  return { message: 'Unknown error occurred', originalError: String(error) };
}

export function createStructuredError(
  code: ErrorCode,
  type: ErrorType,
  message: string,
  options?: ErrorOptions
): StructuredError {
  const result: StructuredError = { type, code, message };

  if (options?.details) {
    result.details = options.details;
  }

  if (options?.originalError) {
    const errorInfo = extractErrorInfo(options.originalError);
    result.originalError = errorInfo.originalError;
    if (errorInfo.stack) result.stack = errorInfo.stack;
    if (errorInfo.details && !result.details) result.details = errorInfo.details;
  }

  if (options?.service) result.service = options.service;
  if (options?.correlationId) result.correlationId = options.correlationId;

  return result;
}

export function sendStructuredError(res: Response, statusCode: number, error: StructuredError): void {
  const extraDetails: Record<string, unknown> = {};
  if (error.originalError) extraDetails.originalError = error.originalError;
  if (error.service) extraDetails.service = error.service;

  const hasDetails = error.details || Object.keys(extraDetails).length > 0;

  const responseError: ServiceError & { stack?: string } = {
    type: error.type,
    code: error.code,
    message: error.message,
    ...(hasDetails && { details: { ...error.details, ...extraDetails } }),
    correlationId: error.correlationId,
    ...(error.stack && { stack: error.stack }),
  };

  res.status(statusCode).json({
    success: false,
    error: responseError,
    timestamp: new Date().toISOString(),
  });
}

export const StructuredErrors = {
  validation: (res: Response, message: string, options?: ErrorOptions) => {
    sendStructuredError(res, 400, createStructuredError('VALIDATION_ERROR', 'ValidationError', message, options));
  },

  serviceUnavailable: (res: Response, message: string, options?: ErrorOptions) => {
    sendStructuredError(
      res,
      503,
      createStructuredError('SERVICE_UNAVAILABLE', 'ServiceUnavailableError', message, options)
    );
  },

  /**
   * Typed errors (anything carrying a 4xx/5xx statusCode) keep their status
   * and code; everything else is classified by message.
   */
  fromException: (
    res: Response,
    error: unknown,
    fallbackMessage: string,
    options?: { service?: string; correlationId?: string }
  ) => {
    const errorInfo = extractErrorInfo(error);
    const message = errorInfo.message || fallbackMessage;
    const base = { originalError: error, details: errorInfo.details, ...options };

    if (isRecord(error) && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 600) {
      const statusCode = error.statusCode;
      const code = isErrorCode(error.code) ? error.code : statusCodeToErrorCode(statusCode);
      sendStructuredError(res, statusCode, createStructuredError(code, statusCodeToErrorType(statusCode), message, base));
      return;
    }

    const { statusCode, code, type } = classifyByMessage(message);
    sendStructuredError(res, statusCode, createStructuredError(code, type, message, base));
  },
};

export function statusCodeToErrorCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
    case 422:
      return 'VALIDATION_ERROR';
    case 401:
      return 'UNAUTHORIZED';
    case 402:
      return 'PAYMENT_REQUIRED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 408:
    case 504:
      return 'TIMEOUT';
    case 409:
      return 'CONFLICT';
    case 410:
      return 'GONE';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 429:
      return 'RATE_LIMITED';
    case 502:
      return 'EXTERNAL_SERVICE_ERROR';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return 'INTERNAL_ERROR';
  }
}

export function statusCodeToErrorType(statusCode: number): ErrorType {
  switch (statusCode) {
    case 400:
    case 413:
    case 422:
      return 'ValidationError';
    case 401:
      return 'AuthenticationError';
    case 403:
      return 'AuthorizationError';
    case 404:
      return 'NotFoundError';
    case 408:
    case 504:
      return 'TimeoutError';
    case 409:
      return 'ConflictError';
    case 429:
      return 'RateLimitError';
    case 502:
      return 'ExternalServiceError';
    case 503:
      return 'ServiceUnavailableError';
    default:
      return 'InternalError';
  }
}

function classifyByMessage(message: string): { statusCode: number; code: ErrorCode; type: ErrorType } {
  const lowerMessage = message.toLowerCase();

  if (lowerMessage.includes('not found') || lowerMessage.includes('does not exist')) {
    return { statusCode: 404, code: 'NOT_FOUND', type: 'NotFoundError' };
  }
  if (lowerMessage.includes('validation') || lowerMessage.includes('invalid') || lowerMessage.includes('required')) {
    return { statusCode: 400, code: 'VALIDATION_ERROR', type: 'ValidationError' };
  }
  if (lowerMessage.includes('database') || lowerMessage.includes('sql')) {
    return { statusCode: 500, code: 'DATABASE_ERROR', type: 'DatabaseError' };
  }
  return { statusCode: 500, code: 'INTERNAL_ERROR', type: 'InternalError' };
}

export function getCorrelationId(req: { headers: Record<string, string | string[] | undefined> }): string | undefined {
  const header = req.headers['x-correlation-id'] ?? req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}
