export * from './timeout-hierarchy';
