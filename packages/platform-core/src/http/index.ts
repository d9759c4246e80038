export * from './types';
export * from './http-client';
export * from './response-helpers';
export * from './resilientHttpClient';
