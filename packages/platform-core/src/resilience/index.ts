export * from './types';
export * from './env-utils';
export * from './bulkhead';
export * from './resilience-manager';
