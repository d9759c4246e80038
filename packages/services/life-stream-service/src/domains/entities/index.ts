export * from './LifeEvent';
export * from './Pattern';
export * from './Insight';
export * from './MemoryAnswer';
