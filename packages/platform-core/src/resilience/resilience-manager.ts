import CircuitBreaker from 'opossum';
import { getLogger } from '../logging/logger';
import { DomainError, DomainErrorCode } from '../error-handling/errors';
import { Bulkhead, DEFAULT_BULKHEAD_CONFIG } from './bulkhead';
import { parsePositiveInt } from './env-utils';
import type {
  CircuitBreakerConfig,
  CircuitBreakerStats,
  CircuitState,
  ResilienceConfig,
  ResilienceEvent,
  ResilienceEventHandler,
  ResiliencePreset,
  RetryConfig,
} from './types';

const logger = getLogger('resilience');

const RETRYABLE_CODES = ['ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE', 'ECONNRESET'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function statusFromError(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.statusCode === 'number') return error.statusCode;
  if (typeof error.status === 'number') return error.status;
  if (isRecord(error.response) && typeof error.response.status === 'number') return error.response.status;
  return undefined;
}

function retryAfterFromError(error: unknown): string | undefined {
  if (!isRecord(error) || !isRecord(error.response) || !isRecord(error.response.headers)) return undefined;
  const header = error.response.headers['retry-after'];
  return typeof header === 'string' ? header : undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (!isRecord(error)) return false;
  if (typeof error.code === 'string' && RETRYABLE_CODES.includes(error.code)) return true;
  if (typeof error.message === 'string' && error.message.includes('socket hang up')) return true;
  const status = statusFromError(error);
  return status !== undefined && (status >= 500 || status === 429);
}

export const DEFAULT_CIRCUIT_CONFIG: Required<CircuitBreakerConfig> = {
  timeout: parsePositiveInt('CIRCUIT_BREAKER_TIMEOUT_MS', 30000, 100),
  errorThresholdPercentage: parsePositiveInt('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50, 1),
  resetTimeout: parsePositiveInt('CIRCUIT_BREAKER_RESET_TIMEOUT_MS', 30000, 100),
  volumeThreshold: parsePositiveInt('CIRCUIT_BREAKER_VOLUME_THRESHOLD', 5, 1),
  rollingCountTimeout: parsePositiveInt('CIRCUIT_BREAKER_ROLLING_COUNT_TIMEOUT_MS', 10000, 100),
  rollingCountBuckets: parsePositiveInt('CIRCUIT_BREAKER_ROLLING_COUNT_BUCKETS', 3, 1),
};

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: parsePositiveInt('RETRY_MAX_RETRIES', 3, 0),
  retryDelay: parsePositiveInt('RETRY_DELAY_MS', 1000, 0),
  exponentialBackoff: process.env.RETRY_EXPONENTIAL_BACKOFF !== 'false',
  retryableErrors: isRetryableError,
};

type Task = () => Promise<unknown>;

export class ResilienceManager {
  private breakers = new Map<string, CircuitBreaker<[Task], unknown>>();
  private bulkheads = new Map<string, Bulkhead>();
  private configs = new Map<string, ResilienceConfig>();
  private eventHandlers: ResilienceEventHandler[] = [];
  private presets = new Map<string, ResilienceConfig>();

  constructor() {
    this.registerPreset('external-api', {
      circuitBreaker: { timeout: 30000, errorThresholdPercentage: 50, resetTimeout: 30000 },
      retry: { maxRetries: 2, retryDelay: 1000, exponentialBackoff: true },
      bulkhead: { maxConcurrent: 15, maxQueue: 50 },
    });

    this.registerPreset('internal-service', {
      circuitBreaker: { timeout: 10000, errorThresholdPercentage: 60, resetTimeout: 15000 },
      retry: { maxRetries: 1, retryDelay: 500, exponentialBackoff: false },
      bulkhead: { maxConcurrent: 25, maxQueue: 100 },
    });

    this.registerPreset('database', {
      circuitBreaker: { timeout: 5000, errorThresholdPercentage: 70, resetTimeout: 10000 },
      retry: { maxRetries: 2, retryDelay: 100, exponentialBackoff: true },
      bulkhead: { maxConcurrent: 20, maxQueue: 50 },
    });

    this.registerPreset('ai-provider', {
      circuitBreaker: { timeout: 60000, errorThresholdPercentage: 40, resetTimeout: 60000, volumeThreshold: 10 },
      retry: { maxRetries: 1, retryDelay: 2000, exponentialBackoff: true },
      bulkhead: { maxConcurrent: 10, maxQueue: 50 },
    });

    this.onEvent(event => {
      const meta = { circuitBreaker: event.name };
      switch (event.type) {
        case 'open':
          logger.warn('Circuit breaker OPENED', { ...meta, error: event.error?.message });
          break;
        case 'reject':
          logger.warn('Circuit breaker rejected request', meta);
          break;
        case 'timeout':
          logger.warn('Circuit breaker timeout', meta);
          break;
        case 'halfOpen':
          logger.info('Circuit breaker HALF-OPEN, testing recovery', meta);
          break;
        case 'close':
          logger.info('Circuit breaker CLOSED, recovered', meta);
          break;
        case 'failure':
          logger.debug('Circuit breaker call failed', { ...meta, error: event.error?.message });
          break;
        case 'success':
          break;
      }
    });
  }

  registerPreset(name: string, config: ResilienceConfig): void {
    this.presets.set(name, config);
  }

  getPreset(name: string): ResilienceConfig | undefined {
    return this.presets.get(name);
  }

  configure(name: string, config: ResilienceConfig): void {
    this.configs.set(name, config);
    const existing = this.breakers.get(name);
    if (existing) {
      existing.shutdown();
      this.breakers.delete(name);
    }
    this.bulkheads.delete(name);
  }

  onEvent(handler: ResilienceEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const idx = this.eventHandlers.indexOf(handler);
      if (idx >= 0) this.eventHandlers.splice(idx, 1);
    };
  }

  private emit(event: ResilienceEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (handlerError) {
        logger.warn('Resilience event handler threw', {
          eventType: event.type,
          name: event.name,
          error: handlerError instanceof Error ? handlerError.message : String(handlerError),
        });
      }
    }
  }

  private getOrCreateBreaker(name: string): CircuitBreaker<[Task], unknown> {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const opts = { ...DEFAULT_CIRCUIT_CONFIG, ...this.configs.get(name)?.circuitBreaker };

    const breaker = new CircuitBreaker<[Task], unknown>(async (task: Task) => task(), {
      timeout: opts.timeout,
      errorThresholdPercentage: opts.errorThresholdPercentage,
      resetTimeout: opts.resetTimeout,
      volumeThreshold: opts.volumeThreshold,
      rollingCountTimeout: opts.rollingCountTimeout,
      rollingCountBuckets: opts.rollingCountBuckets,
      name,
    });

    this.setupEvents(breaker, name);
    this.breakers.set(name, breaker);
    return breaker;
  }

  private getOrCreateBulkhead(name: string): Bulkhead | undefined {
    const config = this.configs.get(name)?.bulkhead;
    if (!config) return undefined;

    let bulkhead = this.bulkheads.get(name);
    if (!bulkhead) {
      bulkhead = new Bulkhead({ ...DEFAULT_BULKHEAD_CONFIG, ...config });
      this.bulkheads.set(name, bulkhead);
    }
    return bulkhead;
  }

  private setupEvents(breaker: CircuitBreaker<[Task], unknown>, name: string): void {
    breaker.on('open', () => this.emit({ type: 'open', name, timestamp: Date.now() }));
    breaker.on('close', () => this.emit({ type: 'close', name, timestamp: Date.now() }));
    breaker.on('halfOpen', () => this.emit({ type: 'halfOpen', name, timestamp: Date.now() }));
    breaker.on('timeout', () => this.emit({ type: 'timeout', name, timestamp: Date.now() }));
    breaker.on('reject', () => this.emit({ type: 'reject', name, timestamp: Date.now() }));
    breaker.on('success', () => this.emit({ type: 'success', name, timestamp: Date.now() }));
    breaker.on('failure', (error: unknown) => {
      this.emit({ type: 'failure', name, timestamp: Date.now(), error: error instanceof Error ? error : undefined });
    });
  }

  private async executeWithRetry<T>(fn: () => Promise<T>, retryConfig: Required<RetryConfig>): Promise<T> {
    let lastError: Error = new Error('Retry loop exited without an attempt');

    for (let attempt = 0; attempt <= retryConfig.maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt >= retryConfig.maxRetries) break;
        if (!retryConfig.retryableErrors(lastError)) break;

        const retryAfterHeader = retryAfterFromError(error);
        let delayMs: number;
        if (statusFromError(error) === 429 && retryAfterHeader) {
          const retryAfterSeconds = parseFloat(retryAfterHeader);
          delayMs = isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : retryConfig.retryDelay;
          logger.warn('Rate limited (429), honouring Retry-After header', { retryAfterHeader, delayMs, attempt });
        } else {
          const baseDelay = retryConfig.exponentialBackoff
            ? retryConfig.retryDelay * Math.pow(2, attempt)
            : retryConfig.retryDelay;
          delayMs = baseDelay * (0.5 + Math.random());
        }

        await new Promise(resolve => setTimeout(resolve, delayMs));
      }
    }

    throw lastError;
  }

  async execute<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const breaker = this.getOrCreateBreaker(name);
    const bulkhead = this.getOrCreateBulkhead(name);
    const retryConfig: Required<RetryConfig> = { ...DEFAULT_RETRY_CONFIG, ...this.configs.get(name)?.retry };

    const run = async (): Promise<T> => {
      if (!bulkhead) return this.executeWithRetry(fn, retryConfig);
      await bulkhead.acquire();
      try {
        return await this.executeWithRetry(fn, retryConfig);
      } finally {
        bulkhead.release();
      }
    };

    // The breaker is shared across result types, so the typed value travels through a box.
    const box: { result?: { value: T } } = {};
    await breaker.fire(async () => {
      box.result = { value: await run() };
    });
    if (!box.result) {
      throw new DomainError(`Circuit ${name} produced no result`, 503, undefined, DomainErrorCode.SERVICE_UNAVAILABLE);
    }
    return box.result.value;
  }

  getStats(name: string): CircuitBreakerStats | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;

    const stats = breaker.stats;
    const state: CircuitState = breaker.opened ? 'open' : breaker.halfOpen ? 'half-open' : 'closed';

    return {
      name,
      state,
      failures: stats.failures,
      successes: stats.successes,
      rejects: stats.rejects,
      fires: stats.fires,
      timeouts: stats.timeouts,
      latencyMean: stats.latencyMean,
    };
  }

  shutdownAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.shutdown();
    }
    this.breakers.clear();
    this.bulkheads.clear();
    this.configs.clear();
  }
}

export const resilience = new ResilienceManager();

export async function withResilience<T>(name: string, fn: () => Promise<T>, config?: ResilienceConfig): Promise<T> {
  if (config) {
    resilience.configure(name, config);
  }
  return resilience.execute(name, fn);
}

export function usePreset(name: string, presetName: ResiliencePreset, overrides?: ResilienceConfig): void {
  const preset = resilience.getPreset(presetName);
  if (!preset) return;
  resilience.configure(name, {
    circuitBreaker: { ...preset.circuitBreaker, ...overrides?.circuitBreaker },
    retry: { ...preset.retry, ...overrides?.retry },
    bulkhead: { ...preset.bulkhead, ...overrides?.bulkhead },
  });
}
