/**
 * Shared Types for Platform Core
 */

export interface HttpClientConfig {
  baseUrl?: string;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  headers?: Record<string, string>;
  useServiceAuth?: boolean;
  serviceName?: string;
  skipRetries?: boolean;
  maxSockets?: number;
}

