import type { Request, Response, RequestHandler } from 'express';
import { z } from 'zod';
import { StructuredErrors, getCorrelationId } from '@lifestream/shared-contracts';

/**
 * Parsed query and params are kept on res.locals: Express types req.query
 * as ParsedQs, so zod output (dates, numbers, arrays) cannot live there.
 */
export const VALIDATED_QUERY = 'validatedQuery';
export const VALIDATED_PARAMS = 'validatedParams';

function handleZodError(res: Response, req: Request, error: z.ZodError, serviceName: string, message: string): void {
  StructuredErrors.validation(res, message, {
    service: serviceName,
    correlationId: getCorrelationId(req),
    details: {
      errors: error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    },
  });
}

function createValidator(
  serviceName: string,
  source: 'body' | 'query' | 'params',
  message: string
): <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) => RequestHandler {
  return schema => (req, res, next) => {
    const result = schema.safeParse(req[source]);
    if (!result.success) {
      handleZodError(res, req, result.error, serviceName, message);
      return;
    }
    if (source === 'body') {
      req.body = result.data;
    } else {
      res.locals[source === 'query' ? VALIDATED_QUERY : VALIDATED_PARAMS] = result.data;
    }
    next();
  };
}

export interface ValidationMiddleware {
  validateBody: <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) => RequestHandler;
  validateQuery: <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) => RequestHandler;
  validateParams: <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) => RequestHandler;
}

export function createValidation(serviceName: string): ValidationMiddleware {
  return {
    validateBody: createValidator(serviceName, 'body', 'Request body validation failed'),
    validateQuery: createValidator(serviceName, 'query', 'Query parameters validation failed'),
    validateParams: createValidator(serviceName, 'params', 'URL parameters validation failed'),
  };
}

let _validationMiddleware: ValidationMiddleware | null = null;

export function initValidation(serviceName: string): ValidationMiddleware {
  _validationMiddleware = createValidation(serviceName);
  return _validationMiddleware;
}

export function getValidation(): ValidationMiddleware {
  if (!_validationMiddleware) {
    throw new Error('Validation middleware not initialized. Call initValidation(serviceName) during service bootstrap.');
  }
  return _validationMiddleware;
}

/**
 * Reads what validateQuery stored. The schema argument only pins the type to
 * the one the route validated with.
 */
export function validatedQuery<S extends z.ZodTypeAny>(res: Response, _schema: S): z.output<S> {
  return res.locals[VALIDATED_QUERY];
}

export function validatedParams<S extends z.ZodTypeAny>(res: Response, _schema: S): z.output<S> {
  return res.locals[VALIDATED_PARAMS];
}
