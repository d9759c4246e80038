/**
 * Platform Core - shared runtime for the life-stream services
 *
 * Logging with correlation tracking, domain errors and structured responses,
 * request validation, resilience around remote calls, an HTTP client, cron
 * scheduling and shutdown hooks.
 */

export * from './config';
export * from './error-handling';
export * from './http';
export * from './logging';
export * from './resilience';
export * from './scheduling';
export * from './middleware';
export * from './lifecycle';

export type { HttpClientConfig } from './types';
