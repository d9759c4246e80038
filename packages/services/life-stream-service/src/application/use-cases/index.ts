export * from './PatternAnalysisUseCase';
export * from './MemoryQueryUseCase';
export * from './MemorySummaryUseCase';
