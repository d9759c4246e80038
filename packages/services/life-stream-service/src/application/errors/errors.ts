import { DomainErrorCode, createDomainServiceError } from '@lifestream/platform-core';

const LifeStreamDomainCodes = {
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  INVALID_EVENT: 'INVALID_EVENT',
  INVALID_TIME_RANGE: 'INVALID_TIME_RANGE',
  GRAPH_UNAVAILABLE: 'GRAPH_UNAVAILABLE',
} as const;

export const LifeStreamErrorCode = { ...DomainErrorCode, ...LifeStreamDomainCodes } as const;
export type LifeStreamErrorCodeType = (typeof LifeStreamErrorCode)[keyof typeof LifeStreamErrorCode];

const LifeStreamErrorBase = createDomainServiceError('LifeStream', LifeStreamErrorCode);

export class LifeStreamError extends LifeStreamErrorBase {
  /** Retryable; the only failure allowed to fail an ingest, mining or memory call. */
  static storeUnavailable(operation: string, cause?: Error) {
    return new LifeStreamError(
      `Event store unavailable during ${operation}`,
      503,
      LifeStreamErrorCode.STORE_UNAVAILABLE,
      cause
    );
  }

  static invalidEvent(reason: string) {
    return new LifeStreamError(`Invalid event: ${reason}`, 400, LifeStreamErrorCode.INVALID_EVENT);
  }

  static invalidTimeRange(reason: string) {
    return new LifeStreamError(`Invalid time range: ${reason}`, 400, LifeStreamErrorCode.INVALID_TIME_RANGE);
  }

  static graphUnavailable(operation: string, cause?: Error) {
    return new LifeStreamError(
      `Knowledge graph unavailable during ${operation}`,
      503,
      LifeStreamErrorCode.GRAPH_UNAVAILABLE,
      cause
    );
  }
}
