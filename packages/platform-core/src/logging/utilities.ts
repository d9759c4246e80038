import type * as winston from 'winston';

export function createTimer(logger: winston.Logger, label: string): () => number {
  const start = Date.now();
  return () => {
    const duration = Date.now() - start;
    logger.debug(`Timer: ${label}`, { duration, label });
    return duration;
  };
}
