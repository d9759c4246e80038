/**
 * Life-Stream Service - Service Factory (Composition Root)
 * Creates and manages all service dependencies using the registry pattern.
 */

import type { ILifeStreamRepository } from '../domains/repositories/ILifeStreamRepository';
import type { IKnowledgeGraphClient } from '../domains/ports/IKnowledgeGraphClient';
import type { IReasoningClient } from '../domains/ports/IReasoningClient';
import { LifeEventStore } from '../application/events/LifeEventStore';
import { GeoPatternMiner } from '../application/mining/GeoPatternMiner';
import { RoutineMiner } from '../application/mining/RoutineMiner';
import { InsightSynthesizer } from '../application/insights/InsightSynthesizer';
import { loadMemoryRules } from '../application/memory/memory-rules';
import { MemoryQueryUseCase, MemorySummaryUseCase, PatternAnalysisUseCase } from '../application/use-cases';
import { LifeStreamError } from '../application/errors';
import { loadLifeStreamConfig, type LifeStreamConfig } from '../config/life-stream-config';
import { getLogger } from '../config/service-urls';
import { TimescaleLifeStreamRepository, type DatabaseConfig } from './repositories/TimescaleLifeStreamRepository';
import { InMemoryLifeStreamRepository } from './repositories/InMemoryLifeStreamRepository';
import { KnowledgeGraphServiceClient } from './clients/KnowledgeGraphServiceClient';
import { createReasoningClient } from './clients/ReasoningProviderClient';
import { PatternMinerScheduler } from './scheduling/PatternMinerScheduler';

const logger = getLogger('life-stream-service:service-factory');

export interface LifeStreamServiceRegistry {
  config: LifeStreamConfig;
  repository: ILifeStreamRepository;
  knowledgeGraph: IKnowledgeGraphClient;
  reasoning: IReasoningClient | null;
  eventStore: LifeEventStore;
  patternAnalysis: PatternAnalysisUseCase;
  memoryQuery: MemoryQueryUseCase;
  memorySummary: MemorySummaryUseCase;
  scheduler: PatternMinerScheduler;
}

export type RegistryOverrides = Partial<Pick<LifeStreamServiceRegistry, 'repository' | 'knowledgeGraph' | 'reasoning'>>;

let registry: LifeStreamServiceRegistry | null = null;

export function getServiceRegistry(): LifeStreamServiceRegistry {
  if (!registry) {
    registry = createServiceRegistry();
  }
  return registry;
}

export function setServiceRegistry(custom: LifeStreamServiceRegistry): void {
  registry = custom;
  logger.info('Service registry overridden (test mode)');
}

export function resetServiceRegistry(): void {
  registry = null;
}

export function parseDatabaseUrl(databaseUrl: string, nodeEnv: string): DatabaseConfig {
  const url = new URL(databaseUrl);
  const isLocal = url.hostname === 'localhost' || url.hostname === '127.0.0.1';
  const useSsl =
    !isLocal &&
    process.env.DATABASE_SSL !== 'false' &&
    (process.env.DATABASE_SSL === 'true' ||
      ['require', 'verify-full', 'verify-ca'].includes(url.searchParams.get('sslmode') || '') ||
      nodeEnv === 'production');

  return {
    host: url.hostname,
    port: parseInt(url.port) || 5432,
    database: url.pathname.substring(1),
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    ssl: useSsl,
  };
}

function createRepository(config: LifeStreamConfig): ILifeStreamRepository {
  const useMemoryFallback = config.nodeEnv === 'test' || config.nodeEnv === 'development';

  if (config.databaseUrl) {
    const dbConfig = parseDatabaseUrl(config.databaseUrl, config.nodeEnv);
    logger.info('Using TimescaleDB life-stream repository', { host: dbConfig.host, database: dbConfig.database });
    return new TimescaleLifeStreamRepository(dbConfig);
  }

  if (useMemoryFallback) {
    logger.info('Using in-memory life-stream repository (no LIFE_STREAM_DATABASE_URL or DATABASE_URL configured)');
    return new InMemoryLifeStreamRepository();
  }

  throw LifeStreamError.validationError(
    'LIFE_STREAM_DATABASE_URL',
    'LIFE_STREAM_DATABASE_URL or DATABASE_URL is required for life-stream-service in production'
  );
}

export function createServiceRegistry(
  config: LifeStreamConfig = loadLifeStreamConfig(),
  overrides: RegistryOverrides = {}
): LifeStreamServiceRegistry {
  const repository = overrides.repository ?? createRepository(config);
  const knowledgeGraph = overrides.knowledgeGraph ?? new KnowledgeGraphServiceClient(config.knowledgeGraphUrl);
  const reasoning = overrides.reasoning !== undefined ? overrides.reasoning : createReasoningClient(config.reasoning);

  const eventStore = new LifeEventStore(repository);
  const synthesizer = new InsightSynthesizer({ reasoning, knowledgeGraph, insights: repository });

  const patternAnalysis = new PatternAnalysisUseCase({
    geoMiner: new GeoPatternMiner(eventStore, config.mining),
    routineMiner: new RoutineMiner(eventStore),
    synthesizer,
    patterns: repository,
    users: eventStore,
    defaultDays: config.mining.analysisDays,
  });

  const memoryQuery = new MemoryQueryUseCase({
    events: eventStore,
    patterns: repository,
    knowledgeGraph,
    reasoning,
    rules: loadMemoryRules(),
  });

  const memorySummary = new MemorySummaryUseCase(eventStore, repository);

  const scheduler = new PatternMinerScheduler(patternAnalysis, {
    cronExpression: config.scheduler.cronExpression,
    enabled: config.scheduler.enabled,
    analysisDays: config.mining.analysisDays,
  });

  return {
    config,
    repository,
    knowledgeGraph,
    reasoning,
    eventStore,
    patternAnalysis,
    memoryQuery,
    memorySummary,
    scheduler,
  };
}
