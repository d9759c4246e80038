/**
 * Life-stream configuration, read from the environment once and validated.
 */

import { z } from 'zod';
import * as cron from 'node-cron';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(value => value === 'true' || value === '1');

const LifeStreamEnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3020),
  LIFE_STREAM_DATABASE_URL: z.string().url().optional(),
  DATABASE_URL: z.string().url().optional(),
  KNOWLEDGE_GRAPH_SERVICE_URL: z.string().url().optional(),
  REASONING_SERVICE_URL: z.string().url().optional(),
  REASONING_MODEL: z.string().min(1).default('default'),
  REASONING_TIMEOUT_MS: z.coerce.number().int().min(1000).default(20000),
  PATTERN_MINER_SCHEDULE: z
    .string()
    .default('0 3 * * *')
    .refine(expression => cron.validate(expression), 'must be a valid cron expression'),
  PATTERN_MINER_ENABLED: booleanFlag,
  PATTERN_MIN_CLUSTER_SIZE: z.coerce.number().int().min(1).default(3),
  PATTERN_BATCH_SIZE: z.coerce.number().int().min(1).max(100000).default(1000),
  PATTERN_ANALYSIS_DAYS: z.coerce.number().int().min(1).max(365).default(30),
  GEO_CLUSTER_EPS_DEGREES: z.coerce.number().positive().max(1).default(0.001),
});

export interface MiningConfig {
  minClusterSize: number;
  batchSize: number;
  analysisDays: number;
  epsDegrees: number;
}

export interface LifeStreamConfig {
  nodeEnv: string;
  port: number;
  databaseUrl: string | undefined;
  knowledgeGraphUrl: string | undefined;
  reasoning: { url: string | undefined; model: string; timeoutMs: number };
  scheduler: { cronExpression: string; enabled: boolean };
  mining: MiningConfig;
}

export function loadLifeStreamConfig(env: NodeJS.ProcessEnv = process.env): LifeStreamConfig {
  const result = LifeStreamEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid life-stream configuration: ${details}`);
  }
  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.LIFE_STREAM_DATABASE_URL ?? parsed.DATABASE_URL,
    knowledgeGraphUrl: parsed.KNOWLEDGE_GRAPH_SERVICE_URL,
    reasoning: {
      url: parsed.REASONING_SERVICE_URL,
      model: parsed.REASONING_MODEL,
      timeoutMs: parsed.REASONING_TIMEOUT_MS,
    },
    scheduler: {
      cronExpression: parsed.PATTERN_MINER_SCHEDULE,
      enabled: parsed.PATTERN_MINER_ENABLED,
    },
    mining: {
      minClusterSize: parsed.PATTERN_MIN_CLUSTER_SIZE,
      batchSize: parsed.PATTERN_BATCH_SIZE,
      analysisDays: parsed.PATTERN_ANALYSIS_DAYS,
      epsDegrees: parsed.GEO_CLUSTER_EPS_DEGREES,
    },
  };
}
