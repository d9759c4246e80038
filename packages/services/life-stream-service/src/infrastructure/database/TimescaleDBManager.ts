/**
 * TimescaleDB Manager
 * Owns schema setup and database-level health for the life-stream tables.
 */

import type { Pool } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import { serializeError } from '@lifestream/platform-core';
import { getLogger } from '../../config/service-urls';
import { LifeStreamError } from '../../application/errors';

const logger = getLogger('life-stream-service:timescaledb-manager');

export const LIFE_STREAM_HYPERTABLES = ['ls_events'] as const;

export interface TimescaleHealth {
  healthy: boolean;
  version: string;
  hypertables: string[];
  queryTimeMs: number;
}

/** Splits the setup script on statement-terminating semicolons, dropping comment lines. */
export function splitSqlStatements(script: string): string[] {
  const withoutComments = script
    .split('\n')
    .filter(line => !line.trim().startsWith('--'))
    .join('\n');

  return withoutComments
    .split(/;\s*(?:\n|$)/)
    .map(statement => statement.trim())
    .filter(statement => statement.length > 0);
}

export class TimescaleDBManager {
  private readonly setupPath: string;

  constructor(private readonly pool: Pool) {
    this.setupPath = path.join(__dirname, 'timescale-setup.sql');
  }

  async initialize(): Promise<void> {
    logger.info('Starting initialization', { phase: 'initialization_started' });

    try {
      await this.ensureTimescaleExtension();
      await this.runSetupScript();

      const health = await this.getHealthStatus();
      logger.info('Initialization completed', {
        phase: 'initialization_completed',
        version: health.version,
        hypertables: health.hypertables,
      });
    } catch (error) {
      logger.error('Initialization failed', { phase: 'initialization_failed', error: serializeError(error) });
      throw error;
    }
  }

  async getHealthStatus(): Promise<TimescaleHealth> {
    const started = Date.now();
    try {
      const versionResult = await this.pool.query<{ extversion: string }>(
        "SELECT extversion FROM pg_extension WHERE extname = 'timescaledb'"
      );
      const hypertablesResult = await this.pool.query<{ hypertable_name: string }>(
        'SELECT hypertable_name FROM timescaledb_information.hypertables ORDER BY hypertable_name'
      );
      const hypertables = hypertablesResult.rows.map(row => row.hypertable_name);

      return {
        healthy: LIFE_STREAM_HYPERTABLES.every(name => hypertables.includes(name)),
        version: versionResult.rows[0]?.extversion ?? 'unknown',
        hypertables,
        queryTimeMs: Date.now() - started,
      };
    } catch (error) {
      logger.warn('Health check failed', { error: serializeError(error) });
      return { healthy: false, version: 'unknown', hypertables: [], queryTimeMs: Date.now() - started };
    }
  }

  private async ensureTimescaleExtension(): Promise<void> {
    try {
      await this.pool.query('CREATE EXTENSION IF NOT EXISTS timescaledb');
      logger.info('Extension verified');
    } catch (error) {
      throw LifeStreamError.storeUnavailable('ensureTimescaleExtension', error instanceof Error ? error : undefined);
    }
  }

  private async runSetupScript(): Promise<void> {
    const script = fs.readFileSync(this.setupPath, 'utf-8');
    const statements = splitSqlStatements(script);

    for (const statement of statements) {
      await this.pool.query(statement);
    }
    logger.info('Setup script executed', { statements: statements.length });
  }
}
