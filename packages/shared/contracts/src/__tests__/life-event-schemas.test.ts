/**
 * Unit Tests for life event and request contracts
 */

import { describe, it, expect } from 'vitest';
import { LifeEventInputSchema } from '../api/life-event-schemas';
import { EventsQuerySchema, MemoryQueryRequestSchema, PatternsQuerySchema } from '../api/life-stream-schemas';
import { formatZodIssues } from '../api/validation-utils';

describe('LifeEventInputSchema', () => {
  it('should accept a geo ping and default the source', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'geo', lat: 55.75, lon: 37.61, ts: '2024-03-04T08:15:00Z' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.source).toBe('api');
      expect(result.data.ts?.toISOString()).toBe('2024-03-04T08:15:00.000Z');
    }
  });

  it('should reject a geo ping without lon', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'geo', lat: 55.75 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('lon: Required');
    }
  });

  it('should reject a heading of 360 degrees', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'geo', lat: 1, lon: 1, heading: 360 });

    expect(result.success).toBe(false);
  });

  it('should default purchase currency to RUB', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'purchase', item: 'Latte', amount: 300 });

    expect(result.success).toBe(true);
    if (result.success && result.data.type === 'purchase') {
      expect(result.data.currency).toBe('RUB');
    }
  });

  it('should reject a negative purchase amount', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'purchase', item: 'Latte', amount: -1 });

    expect(result.success).toBe(false);
  });

  it('should default the health unit to an empty string', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'health', metric: 'steps', value: 9000 });

    expect(result.success).toBe(true);
    if (result.success && result.data.type === 'health') {
      expect(result.data.unit).toBe('');
    }
  });

  it('should keep undeclared fields on passthrough', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'social', action: 'meet', mood: 'good' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toMatchObject({ mood: 'good' });
    }
  });

  it('should reject an unknown event type', () => {
    const result = LifeEventInputSchema.safeParse({ type: 'telepathy' });

    expect(result.success).toBe(false);
  });
});

describe('EventsQuerySchema', () => {
  it('should apply the default limit', () => {
    expect(EventsQuerySchema.parse({}).limit).toBe(100);
  });

  it('should split a comma-separated type list', () => {
    expect(EventsQuerySchema.parse({ types: 'geo, purchase' }).types).toEqual(['geo', 'purchase']);
  });

  it('should reject an unknown type in the list', () => {
    expect(EventsQuerySchema.safeParse({ types: 'geo,dreams' }).success).toBe(false);
  });

  it('should reject a limit above 10000', () => {
    expect(EventsQuerySchema.safeParse({ limit: '10001' }).success).toBe(false);
  });

  it('should reject start after end', () => {
    const result = EventsQuerySchema.safeParse({ start: '2024-03-05T00:00:00Z', end: '2024-03-04T00:00:00Z' });

    expect(result.success).toBe(false);
  });
});

describe('PatternsQuerySchema', () => {
  it('should default activeOnly to true', () => {
    expect(PatternsQuerySchema.parse({}).activeOnly).toBe(true);
  });

  it('should parse activeOnly=false from a query string', () => {
    expect(PatternsQuerySchema.parse({ activeOnly: 'false' }).activeOnly).toBe(false);
  });
});

describe('MemoryQueryRequestSchema', () => {
  it('should default includeReasoning to true', () => {
    const parsed = MemoryQueryRequestSchema.parse({ userId: 'user-1', question: 'Where was I?' });

    expect(parsed.includeReasoning).toBe(true);
  });

  it('should reject a question shorter than 3 characters', () => {
    expect(MemoryQueryRequestSchema.safeParse({ userId: 'user-1', question: 'hi' }).success).toBe(false);
  });

  it('should reject a question longer than 500 characters', () => {
    expect(MemoryQueryRequestSchema.safeParse({ userId: 'user-1', question: 'x'.repeat(501) }).success).toBe(false);
  });
});
