/**
 * Knowledge Graph Service Client
 * Resolves people referenced by events and records discovered habits as
 * (Person)-[:HAS_HABIT]->(Habit) links.
 */

import { z } from 'zod';
import { HttpClient, withServiceResilience } from '@lifestream/platform-core';
import { parseResponse } from '@lifestream/shared-contracts';
import type { GraphPerson, HabitNode, IKnowledgeGraphClient } from '../../domains/ports/IKnowledgeGraphClient';
import { LifeStreamError } from '../../application/errors';
import { SERVICE_NAME, getLogger } from '../../config/service-urls';

const logger = getLogger('life-stream-service:knowledge-graph-client');

const TARGET_SERVICE = 'knowledge-graph-service';

const ResolvePeopleResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    people: z.array(
      z.object({
        id: z.string(),
        name: z.string().default('Unknown'),
        email: z.string().optional(),
      })
    ),
  }),
});

const WriteHabitResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({ habitId: z.string().min(1) }),
});

export class KnowledgeGraphServiceClient implements IKnowledgeGraphClient {
  private readonly httpClient: HttpClient | null;

  constructor(baseUrl: string | undefined) {
    this.httpClient = baseUrl
      ? new HttpClient({ baseUrl, serviceName: TARGET_SERVICE, useServiceAuth: true, retries: 2 })
      : null;

    if (!this.httpClient) {
      logger.warn('KNOWLEDGE_GRAPH_SERVICE_URL not set, people enrichment and habit links are disabled');
    }
  }

  isConfigured(): boolean {
    return this.httpClient !== null;
  }

  async resolvePeople(ids: string[]): Promise<GraphPerson[]> {
    const client = this.httpClient;
    if (!client || ids.length === 0) return [];

    return withServiceResilience(TARGET_SERVICE, 'resolvePeople', async () => {
      const body = await client.post('/api/graph/people/resolve', { ids, requestedBy: SERVICE_NAME });
      return parseResponse(ResolvePeopleResponseSchema, body, 'knowledge-graph people').data.people;
    });
  }

  async writeHabit(personId: string, habit: HabitNode): Promise<string> {
    const client = this.httpClient;
    if (!client) {
      throw LifeStreamError.graphUnavailable('writeHabit');
    }

    const habitId = await withServiceResilience(TARGET_SERVICE, 'writeHabit', async () => {
      const body = await client.post(`/api/graph/people/${encodeURIComponent(personId)}/habits`, {
        ...habit,
        relationship: 'HAS_HABIT',
      });
      return parseResponse(WriteHabitResponseSchema, body, 'knowledge-graph habit').data.habitId;
    });

    logger.debug('Habit linked to person', { personId, habitId });
    return habitId;
  }
}
