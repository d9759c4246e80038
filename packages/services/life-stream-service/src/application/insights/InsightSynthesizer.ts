/**
 * InsightSynthesizer - turns mined patterns into habit insights.
 *
 * Reasoning and graph failures degrade to fewer (or no) insights; they never
 * fail the analysis run.
 */

import { v4 as uuidv4 } from 'uuid';
import { serializeError } from '@lifestream/platform-core';
import type { Insight, NewPattern } from '../../domains/entities';
import type { IInsightRepository } from '../../domains/repositories/ILifeStreamRepository';
import type { IKnowledgeGraphClient } from '../../domains/ports/IKnowledgeGraphClient';
import type { IReasoningClient } from '../../domains/ports/IReasoningClient';
import { getLogger } from '../../config/service-urls';
import { guardStore } from '../errors';
import { buildInsightPrompt } from './insight-prompt';
import { parseInsights } from './insight-parser';

const logger = getLogger('life-stream-service:insight-synthesizer');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface InsightSynthesizerDeps {
  reasoning: IReasoningClient | null;
  knowledgeGraph: IKnowledgeGraphClient;
  insights: IInsightRepository;
  now?: () => Date;
}

export class InsightSynthesizer {
  private readonly now: () => Date;

  constructor(private readonly deps: InsightSynthesizerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async synthesize(
    userId: string,
    geoPatterns: NewPattern[],
    timePatterns: NewPattern[],
    analysisDays: number
  ): Promise<Insight[]> {
    if (geoPatterns.length === 0 && timePatterns.length === 0) return [];

    const { reasoning } = this.deps;
    if (!reasoning) {
      logger.warn('No reasoning provider configured, skipping insight generation', { userId });
      return [];
    }

    let response: string;
    try {
      response = await reasoning.complete(buildInsightPrompt(geoPatterns, timePatterns));
    } catch (error) {
      logger.warn('Reasoning provider failed, continuing without insights', { userId, error: serializeError(error) });
      return [];
    }

    const drafts = parseInsights(response);
    const end = this.now();
    const start = new Date(end.getTime() - analysisDays * DAY_MS);
    const evidenceCount = geoPatterns.length + timePatterns.length;
    const reasoningNote = `Based on ${geoPatterns.length} location clusters and ${timePatterns.length} time patterns`;

    const accepted: Insight[] = [];
    for (const draft of drafts) {
      const insight: Insight = {
        id: uuidv4(),
        userId,
        insightType: draft.insightType,
        title: draft.title,
        description: draft.description,
        confidence: draft.confidence,
        evidenceCount,
        timeRangeStart: start,
        timeRangeEnd: end,
        aiModel: reasoning.model,
        reasoning: reasoningNote,
        source: 'pattern_miner',
        graphNodeId: null,
      };

      const persisted = await this.persist(insight, end);
      if (persisted) accepted.push(persisted);
    }

    logger.info('Insights generated', { userId, proposed: drafts.length, accepted: accepted.length });
    return accepted;
  }

  /** Graph first: an insight that never reached the graph is not logged. */
  private async persist(insight: Insight, discoveredAt: Date): Promise<Insight | null> {
    let graphNodeId: string;
    try {
      graphNodeId = await this.deps.knowledgeGraph.writeHabit(insight.userId, {
        title: insight.title,
        description: insight.description,
        confidence: insight.confidence,
        insightType: insight.insightType,
        evidenceCount: insight.evidenceCount,
        source: insight.source,
        discoveredAt: discoveredAt.toISOString(),
      });
    } catch (error) {
      logger.warn('Failed to write habit to knowledge graph, skipping insight', {
        userId: insight.userId,
        title: insight.title,
        error: serializeError(error),
      });
      return null;
    }

    const stored = { ...insight, graphNodeId };
    await guardStore('saveInsight', () => this.deps.insights.saveInsight(stored));
    return stored;
  }
}
