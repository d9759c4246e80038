import type { Pool } from 'pg';
import type { Insight } from '../../../domains/entities';
import type { IInsightRepository } from '../../../domains/repositories/ILifeStreamRepository';
import { mapInsightRow, type InsightRow } from './utils';

export class InsightRepository implements IInsightRepository {
  constructor(private readonly pool: Pool) {}

  async saveInsight(insight: Insight): Promise<void> {
    await this.pool.query(
      `INSERT INTO ls_insights (
         id, user_id, insight_type, title, description, confidence, evidence_count,
         time_range_start, time_range_end, ai_model, reasoning, source, graph_node_id
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
       ON CONFLICT (id) DO NOTHING`,
      [
        insight.id,
        insight.userId,
        insight.insightType,
        insight.title,
        insight.description,
        insight.confidence,
        insight.evidenceCount,
        insight.timeRangeStart,
        insight.timeRangeEnd,
        insight.aiModel,
        insight.reasoning,
        insight.source,
        insight.graphNodeId,
      ]
    );
  }

  async getInsights(userId: string, limit = 20): Promise<Insight[]> {
    const result = await this.pool.query<InsightRow>(
      `SELECT id, user_id, insight_type, title, description, confidence, evidence_count,
              time_range_start, time_range_end, ai_model, reasoning, graph_node_id
       FROM ls_insights
       WHERE user_id = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map(mapInsightRow);
  }
}
