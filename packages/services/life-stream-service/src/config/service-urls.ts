/**
 * Service identity and logger factory for life-stream-service
 */

import type * as winston from 'winston';

export type Logger = winston.Logger;

export const SERVICE_NAME = 'life-stream-service';

export { getLogger } from '@lifestream/platform-core';
