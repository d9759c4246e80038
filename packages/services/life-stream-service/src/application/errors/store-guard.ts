import { serializeError, toError } from '@lifestream/platform-core';
import { getLogger } from '../../config/service-urls';
import { LifeStreamError } from './errors';

const logger = getLogger('life-stream-service:store-guard');

/** Runs a repository call, turning any non-domain failure into storeUnavailable. */
export async function guardStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof LifeStreamError) throw error;
    logger.error('Store operation failed', { operation, error: serializeError(error) });
    throw LifeStreamError.storeUnavailable(operation, toError(error));
  }
}
