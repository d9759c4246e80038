import type { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type { NewPattern, Pattern, PatternFilter } from '../../../domains/entities';
import type { IPatternRepository } from '../../../domains/repositories/ILifeStreamRepository';
import { getLogger } from '../../../config/service-urls';
import { PATTERN_COLUMNS, mapPatternRow, type PatternRow, type SqlValue } from './utils';

const logger = getLogger('life-stream-service:pattern-repository');

const COLUMNS_PER_ROW = 17;

export class PatternRepository implements IPatternRepository {
  constructor(private readonly pool: Pool) {}

  /** Supersession and insert share one transaction. */
  async savePatterns(userId: string, patterns: NewPattern[]): Promise<Pattern[]> {
    if (patterns.length === 0) return [];

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const fingerprints = [...new Set(patterns.map(pattern => pattern.fingerprint))];
      const superseded = await client.query(
        `UPDATE ls_patterns SET is_active = FALSE
         WHERE user_id = $1 AND is_active AND fingerprint = ANY($2)`,
        [userId, fingerprints]
      );

      const values: SqlValue[] = [];
      const tuples = patterns.map((pattern, rowIndex) => {
        const base = rowIndex * COLUMNS_PER_ROW;
        values.push(
          uuidv4(),
          userId,
          pattern.patternType,
          pattern.name,
          pattern.description,
          pattern.confidence,
          pattern.centerLat,
          pattern.centerLon,
          pattern.radiusMeters,
          pattern.timePattern,
          pattern.frequencyPerWeek,
          pattern.firstSeen,
          pattern.lastSeen,
          pattern.occurrences,
          true,
          pattern.fingerprint,
          JSON.stringify(pattern.data)
        );
        const placeholders = Array.from({ length: COLUMNS_PER_ROW }, (_, column) => `$${base + column + 1}`);
        return `(${placeholders.join(', ')})`;
      });

      const inserted = await client.query<PatternRow>(
        `INSERT INTO ls_patterns (${PATTERN_COLUMNS})
         VALUES ${tuples.join(', ')}
         RETURNING ${PATTERN_COLUMNS}`,
        values
      );

      await client.query('COMMIT');

      logger.info('Patterns saved', {
        userId,
        inserted: inserted.rowCount ?? 0,
        superseded: superseded.rowCount ?? 0,
      });
      return inserted.rows.map(mapPatternRow);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async getPatterns(userId: string, filter: PatternFilter = {}): Promise<Pattern[]> {
    const values: SqlValue[] = [userId];
    let paramIndex = 2;
    let sql = `SELECT ${PATTERN_COLUMNS} FROM ls_patterns WHERE user_id = $1`;

    if (filter.activeOnly ?? true) {
      sql += ' AND is_active';
    }
    if (filter.patternType) {
      sql += ` AND pattern_type = $${paramIndex++}`;
      values.push(filter.patternType);
    }

    sql += ' ORDER BY confidence DESC, occurrences DESC, created_at DESC';

    const result = await this.pool.query<PatternRow>(sql, values);
    return result.rows.map(mapPatternRow);
  }
}
