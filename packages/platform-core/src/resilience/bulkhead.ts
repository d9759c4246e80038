import { DomainError, DomainErrorCode } from '../error-handling/errors';
import type { BulkheadConfig, BulkheadStats } from './types';
import { parsePositiveInt } from './env-utils';

export const DEFAULT_BULKHEAD_CONFIG: Required<BulkheadConfig> = {
  maxConcurrent: parsePositiveInt('BULKHEAD_MAX_CONCURRENT', 10, 1),
  maxQueue: parsePositiveInt('BULKHEAD_MAX_QUEUE', 100, 1),
};

/**
 * Caps concurrent calls to one dependency. Callers beyond maxConcurrent wait
 * in a FIFO queue; once the queue is full they are rejected with a 503.
 */
export class Bulkhead {
  private running = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly config: Required<BulkheadConfig>) {}

  async acquire(): Promise<void> {
    if (this.running < this.config.maxConcurrent) {
      this.running++;
      return;
    }

    if (this.queue.length >= this.config.maxQueue) {
      throw new DomainError('Bulkhead queue full - request rejected', 503, undefined, DomainErrorCode.SERVICE_UNAVAILABLE);
    }

    return new Promise(resolve => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    this.running--;
    const next = this.queue.shift();
    if (next) {
      this.running++;
      next();
    }
  }

  getStats(): BulkheadStats {
    return {
      running: this.running,
      queued: this.queue.length,
      maxConcurrent: this.config.maxConcurrent,
      maxQueue: this.config.maxQueue,
    };
  }
}
