/**
 * MemoryQueryUseCase - answers a natural-language question about the user's past.
 *
 * Read-only. Resolves a time range, retrieves events and people, asks the
 * reasoning provider and scores the answer. Only an unavailable event store
 * fails the call; graph and reasoning failures degrade the answer.
 */

import { serializeError } from '@lifestream/platform-core';
import type { LifeEvent, LifeEventType, MemoryAnswer, TimeRange } from '../../domains/entities';
import type { IPatternRepository } from '../../domains/repositories/ILifeStreamRepository';
import type { GraphPerson, IKnowledgeGraphClient } from '../../domains/ports/IKnowledgeGraphClient';
import type { IReasoningClient } from '../../domains/ports/IReasoningClient';
import { getLogger } from '../../config/service-urls';
import { guardStore } from '../errors';
import type { MemoryRules } from '../memory/memory-rules';
import { resolveTimeRange } from '../memory/time-range';
import { MAX_SEARCH_KEYWORDS, extractKeywords, inferEventTypes } from '../memory/query-terms';
import { buildMemoryContext } from '../memory/context-builder';
import { buildAnswerPrompt, parseAnswer, templatedAnswer, type ParsedAnswer } from '../memory/answer';
import { scoreConfidence } from '../memory/confidence';
import { extractLocations, extractPeople, extractTransactions, socialPersonIds } from '../memory/evidence';

const logger = getLogger('life-stream-service:memory-query');

export const RETRIEVAL_LIMIT = 500;
export const SEARCH_LIMIT = 50;

export interface MemoryEventSource {
  query(userId: string, query: TimeRange & { types?: LifeEventType[]; limit: number }): Promise<LifeEvent[]>;
  searchText(userId: string, keyword: string, range: TimeRange, limit: number): Promise<LifeEvent[]>;
}

export interface MemoryQueryRequest {
  userId: string;
  question: string;
  start?: Date;
  end?: Date;
  includeReasoning?: boolean;
}

export interface MemoryQueryDeps {
  events: MemoryEventSource;
  patterns: Pick<IPatternRepository, 'getPatterns'>;
  knowledgeGraph: Pick<IKnowledgeGraphClient, 'resolvePeople'>;
  reasoning: IReasoningClient | null;
  rules: MemoryRules;
  now?: () => Date;
}

export class MemoryQueryUseCase {
  private readonly now: () => Date;

  constructor(private readonly deps: MemoryQueryDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async execute(request: MemoryQueryRequest): Promise<MemoryAnswer> {
    const { userId, question } = request;
    const includeReasoning = request.includeReasoning ?? true;
    const { rules } = this.deps;

    const range = resolveTimeRange(question, { start: request.start, end: request.end }, rules, this.now());
    const types = inferEventTypes(question, rules);
    const keywords = extractKeywords(question, rules).slice(0, MAX_SEARCH_KEYWORDS);

    logger.debug('Memory query resolved', {
      userId,
      matchedBy: range.matchedBy,
      types: types ?? 'all',
      keywordCount: keywords.length,
    });

    const events = await this.retrieve(userId, { start: range.start, end: range.end }, types, keywords);
    const people = await this.resolvePeople(userId, events);
    const patterns = await guardStore('getPatterns', () =>
      this.deps.patterns.getPatterns(userId, { activeOnly: true })
    );

    const context = buildMemoryContext(events, people, patterns);
    const { answer, reasoning } = await this.answer(userId, question, context, events.length, includeReasoning);

    return {
      question,
      answer,
      confidence: scoreConfidence(events.length, answer, rules.hedgingPhrases),
      eventsAnalyzed: events.length,
      timeRange: { start: range.start.toISOString(), end: range.end.toISOString() },
      locations: extractLocations(events),
      people: extractPeople(events, people),
      transactions: extractTransactions(events),
      reasoning: includeReasoning ? reasoning : null,
      sources: [`Event store events: ${events.length}`, `Knowledge graph people: ${people.length}`],
    };
  }

  private async retrieve(
    userId: string,
    range: TimeRange,
    types: LifeEventType[] | undefined,
    keywords: string[]
  ): Promise<LifeEvent[]> {
    const events = await this.deps.events.query(userId, { ...range, types, limit: RETRIEVAL_LIMIT });
    const seen = new Set(events.map(event => event.id));

    for (const keyword of keywords) {
      const matches = await this.deps.events.searchText(userId, keyword, range, SEARCH_LIMIT);
      for (const event of matches) {
        if (seen.has(event.id)) continue;
        seen.add(event.id);
        events.push(event);
      }
    }
    return events;
  }

  private async resolvePeople(userId: string, events: LifeEvent[]): Promise<GraphPerson[]> {
    const ids = socialPersonIds(events);
    if (ids.length === 0) return [];
    try {
      return await this.deps.knowledgeGraph.resolvePeople(ids);
    } catch (error) {
      logger.warn('People enrichment failed, using event payload names', {
        userId,
        requested: ids.length,
        error: serializeError(error),
      });
      return [];
    }
  }

  private async answer(
    userId: string,
    question: string,
    context: string,
    eventCount: number,
    includeReasoning: boolean
  ): Promise<ParsedAnswer> {
    const { reasoning } = this.deps;
    if (!reasoning) {
      return { answer: templatedAnswer(eventCount), reasoning: null };
    }

    try {
      const response = await reasoning.complete(buildAnswerPrompt(question, context, includeReasoning));
      const parsed = parseAnswer(response);
      if (!parsed.answer) {
        logger.warn('Reasoning provider returned an empty answer', { userId });
        return { answer: templatedAnswer(eventCount), reasoning: null };
      }
      return parsed;
    } catch (error) {
      logger.warn('Reasoning provider failed, using templated answer', { userId, error: serializeError(error) });
      return { answer: templatedAnswer(eventCount), reasoning: null };
    }
  }
}
