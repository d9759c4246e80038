import axios, { AxiosError, type AxiosInstance, type AxiosRequestConfig, type InternalAxiosRequestConfig } from 'axios';
import http from 'node:http';
import https from 'node:https';
import { randomUUID } from 'node:crypto';
import { DomainError } from '../error-handling/errors';
import type { HttpClientConfig } from '../types';
import { timeoutHierarchy } from '../config/timeout-hierarchy';
import { getLogger } from '../logging/logger';
import { getCorrelationContext, generateCorrelationId } from '../logging/correlation';

const httpClientLogger = getLogger('http-client');

export class HttpClientError extends DomainError {
  constructor(message: string, statusCode: number, errorCode: string, details?: Record<string, unknown>) {
    super(message, statusCode, undefined, errorCode, details);
    this.name = 'HttpClientError';
  }
}

const IDEMPOTENT_METHODS = new Set(['GET', 'HEAD', 'OPTIONS', 'PUT', 'DELETE']);
const RETRYABLE_NETWORK_CODES = new Set(['ECONNABORTED', 'ENOTFOUND', 'ECONNRESET', 'ECONNREFUSED']);

function jitter(baseDelay: number): number {
  return baseDelay * (0.5 + Math.random());
}

function messageFromBody(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return undefined;
  if ('error' in data) {
    const error = data.error;
    if (typeof error === 'string') return error;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  if ('message' in data && typeof data.message === 'string') return data.message;
  return undefined;
}

export class HttpClient {
  private client: AxiosInstance;
  private readonly retries: number;
  private readonly retryDelay: number;
  private readonly retryCounts = new WeakMap<InternalAxiosRequestConfig, number>();

  constructor(private readonly config: HttpClientConfig = {}) {
    if (!config.timeout && !config.serviceName) {
      httpClientLogger.debug('HttpClient created without timeout or serviceName, using the default service tier');
    }
    const timeout = config.timeout || timeoutHierarchy.getServiceTimeout(config.serviceName);
    const maxSockets = config.maxSockets ?? 20;

    this.retries = config.skipRetries ? 0 : (config.retries ?? 3);
    this.retryDelay = config.retryDelay ?? 1000;

    this.client = axios.create({
      baseURL: config.baseUrl || undefined,
      timeout,
      maxRedirects: 5,
      validateStatus: status => status < 400,
      httpAgent: new http.Agent({ keepAlive: true, maxSockets, maxFreeSockets: 5 }),
      httpsAgent: new https.Agent({ keepAlive: true, maxSockets, maxFreeSockets: 5 }),
      headers: {
        'Content-Type': 'application/json',
        ...config.headers,
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use(requestConfig => {
      const correlationId =
        requestConfig.headers.get('x-correlation-id') ?? getCorrelationContext()?.correlationId ?? generateCorrelationId();
      requestConfig.headers.set('x-correlation-id', String(correlationId));
      requestConfig.headers.set('user-agent', `${this.config.serviceName ?? 'platform-core'}-http-client/1.0.0`);

      if (this.config.useServiceAuth && process.env.SERVICE_AUTH_KEY) {
        requestConfig.headers.set('x-service-key', process.env.SERVICE_AUTH_KEY);
      }

      const method = (requestConfig.method || 'GET').toUpperCase();
      if ((method === 'POST' || method === 'PATCH') && !requestConfig.headers.has('x-idempotency-key')) {
        requestConfig.headers.set('x-idempotency-key', randomUUID());
      }

      return requestConfig;
    });

    this.client.interceptors.response.use(
      response => response,
      async (error: unknown) => {
        if (!(error instanceof AxiosError) || !error.config) {
          throw this.transformError(error);
        }

        const requestConfig = error.config;
        const attempt = this.retryCounts.get(requestConfig) ?? 0;

        if (this.shouldRetry(error, requestConfig) && attempt < this.retries) {
          this.retryCounts.set(requestConfig, attempt + 1);
          requestConfig.headers.set('x-retry-count', String(attempt + 1));
          await new Promise(resolve => setTimeout(resolve, jitter(this.retryDelay * Math.pow(2, attempt))));
          return this.client.request(requestConfig);
        }

        throw this.transformError(error);
      }
    );
  }

  private shouldRetry(error: AxiosError, requestConfig: InternalAxiosRequestConfig): boolean {
    const method = (requestConfig.method || '').toUpperCase();
    if (!IDEMPOTENT_METHODS.has(method) && !requestConfig.headers.has('x-idempotency-key')) {
      return false;
    }
    if (error.code && RETRYABLE_NETWORK_CODES.has(error.code)) {
      return true;
    }
    return error.response !== undefined && error.response.status >= 500;
  }

  private transformError(error: unknown): HttpClientError {
    if (!(error instanceof AxiosError)) {
      return new HttpClientError(error instanceof Error ? error.message : 'Unknown HTTP client error', 500, 'HTTP_CLIENT_ERROR');
    }

    const target = { url: error.config?.url, method: error.config?.method };
    if (error.response) {
      const status = error.response.status;
      const message = messageFromBody(error.response.data) || error.message || `HTTP ${status} Error`;
      return new HttpClientError(message, status, 'HTTP_ERROR', { ...target, status });
    }
    if (error.request) {
      return new HttpClientError('Network error - unable to reach service', 503, 'NETWORK_ERROR', {
        ...target,
        code: error.code,
      });
    }
    return new HttpClientError(error.message || 'Unknown HTTP client error', 500, 'HTTP_CLIENT_ERROR');
  }

  async post<T = unknown>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.post<T>(url, data, config);
    return response.data;
  }
}
