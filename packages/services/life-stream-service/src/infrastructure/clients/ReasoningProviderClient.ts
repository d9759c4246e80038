/**
 * Reasoning Provider Client
 * Text generation through the reasoning service. Every call is bounded by the
 * configured timeout and is not retried.
 */

import { z } from 'zod';
import { HttpClient, withServiceResilience } from '@lifestream/platform-core';
import { parseResponse } from '@lifestream/shared-contracts';
import type { IReasoningClient } from '../../domains/ports/IReasoningClient';
import { getLogger } from '../../config/service-urls';

const logger = getLogger('life-stream-service:reasoning-client');

const TARGET_SERVICE = 'reasoning-service';

const InvokeResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({ content: z.string() }),
});

export interface ReasoningClientConfig {
  url: string;
  model: string;
  timeoutMs: number;
}

export class ReasoningProviderClient implements IReasoningClient {
  readonly model: string;
  private readonly httpClient: HttpClient;
  private readonly timeoutMs: number;

  constructor(config: ReasoningClientConfig) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.httpClient = new HttpClient({
      baseUrl: config.url,
      serviceName: TARGET_SERVICE,
      timeout: config.timeoutMs,
      skipRetries: true,
      useServiceAuth: true,
    });
  }

  async complete(prompt: string): Promise<string> {
    const started = Date.now();
    const content = await withServiceResilience(
      TARGET_SERVICE,
      'complete',
      async () => {
        const body = await this.httpClient.post('/api/providers/invoke', {
          operation: 'text_generation',
          payload: { prompt, model: this.model },
        });
        return parseResponse(InvokeResponseSchema, body, 'reasoning completion').data.content;
      },
      'ai-provider',
      { circuitBreaker: { timeout: this.timeoutMs }, retry: { maxRetries: 0 } }
    );

    logger.debug('Reasoning completion received', {
      model: this.model,
      durationMs: Date.now() - started,
      length: content.length,
    });
    return content;
  }
}

/** Null when REASONING_SERVICE_URL is unset; callers fall back to deterministic output. */
export function createReasoningClient(config: {
  url: string | undefined;
  model: string;
  timeoutMs: number;
}): IReasoningClient | null {
  if (!config.url) {
    logger.warn('REASONING_SERVICE_URL not set, insights are disabled and memory answers are templated');
    return null;
  }
  return new ReasoningProviderClient({ url: config.url, model: config.model, timeoutMs: config.timeoutMs });
}
