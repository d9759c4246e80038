/**
 * Log Formatting
 *
 * Log formatters plus redaction of secrets, location traces and personal data.
 */

import * as winston from 'winston';
import type { LogContext } from './types';

const SECRET_PATTERNS = [/authorization/i, /set-cookie/i, /api[-_]?key/i, /token/i, /secret/i, /password/i, /bearer/i];

// A user's movement history is as sensitive as their message content.
const LOCATION_FIELDS = new Set(['lat', 'lon', 'latitude', 'longitude', 'centerLat', 'centerLon', 'center_lat', 'center_lon']);

const CONTENT_FIELDS = new Set(['payload', 'question', 'context', 'prompt', 'answer']);

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE_PATTERN = /\b(?:\+\d{1,3}[-.\s]?)?(?:\(?\d{3}\)?[-.\s])\d{3}[-.\s]?\d{4}\b/g;

/**
 * example@domain.com -> ex***@d***.com
 */
export function maskEmail(email: string): string {
  const atIndex = email.indexOf('@');
  if (atIndex < 1) return '[EMAIL]';

  const local = email.substring(0, atIndex);
  const domainParts = email.substring(atIndex + 1).split('.');

  const maskedLocal = local.length > 2 ? local.substring(0, 2) + '***' : local.charAt(0) + '***';
  const maskedDomain =
    domainParts.length > 1
      ? domainParts[0].charAt(0) + '***.' + domainParts[domainParts.length - 1]
      : domainParts[0].charAt(0) + '***';

  return `${maskedLocal}@${maskedDomain}`;
}

/**
 * +1-555-123-4567 -> ***-4567
 */
export function maskPhone(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  if (digits.length < 4) return '[PHONE]';
  return '***-' + digits.slice(-4);
}

export function sanitizePiiInString(value: string): string {
  return value.replace(EMAIL_PATTERN, match => maskEmail(match)).replace(PHONE_PATTERN, match => maskPhone(match));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Masks PII by value content; maskSecrets masks by key name.
 */
export function sanitizePii(obj: unknown, maxDepth = 5): unknown {
  if (maxDepth <= 0 || obj === null || obj === undefined) {
    return obj;
  }
  if (typeof obj === 'string') {
    return sanitizePiiInString(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => sanitizePii(item, maxDepth - 1));
  }
  if (!isPlainObject(obj)) {
    return obj;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (key.toLowerCase() === 'email' && typeof value === 'string') {
      sanitized[key] = maskEmail(value);
    } else {
      sanitized[key] = sanitizePii(value, maxDepth - 1);
    }
  }
  return sanitized;
}

export function maskSecrets(obj: unknown, maxDepth = 3): unknown {
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }
  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }
  if (!isPlainObject(obj)) {
    return obj;
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else if (LOCATION_FIELDS.has(key)) {
      masked[key] = '[LOCATION_REDACTED]';
    } else if (CONTENT_FIELDS.has(key)) {
      masked[key] = '[CONTENT_REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSecrets(value, maxDepth - 1);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

export function sanitizeForLogging(obj: unknown, maxDepth = 5): unknown {
  return sanitizePii(maskSecrets(obj, maxDepth), maxDepth);
}

export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(sanitizeForLogging(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

export function createDevFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, module: moduleCtx, ...meta }) => {
      const finalCorrelationId = correlationId || correlationStorage.getStore()?.correlationId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 8)}]` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

export function createProdFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.correlationId = info.correlationId || context.correlationId;
        info.userId = info.userId || context.userId;
      }
      return safeStringify(info, 50000);
    })
  );
}
