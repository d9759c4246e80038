export * from './life-event-schemas';
export * from './life-stream-schemas';
export * from './validation-utils';
