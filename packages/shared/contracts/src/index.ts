/**
 * Shared contracts for the life-stream services
 *
 * Wire schemas, the response envelope and the structured error factory.
 */

export * from './common';

export * from './api';
