import { z } from 'zod';
import { LifeEventTypeSchema, TimestampSchema } from './life-event-schemas';

export const PATTERN_TYPES = ['location_cluster', 'routine', 'habit', 'relationship', 'anomaly'] as const;
export const PatternTypeSchema = z.enum(PATTERN_TYPES);
export type PatternType = z.infer<typeof PatternTypeSchema>;

export const UserIdSchema = z.string().trim().min(1).max(128);

export const UserIdParamsSchema = z.object({ userId: UserIdSchema });
export type UserIdParams = z.infer<typeof UserIdParamsSchema>;

/** Events are validated one by one downstream, so a bad item never rejects the batch. */
export const IngestBatchRequestSchema = z.object({
  userId: UserIdSchema,
  events: z.array(z.unknown()).min(1).max(10000),
});
export type IngestBatchRequest = z.infer<typeof IngestBatchRequestSchema>;

export const IngestSingleRequestSchema = z.object({ userId: UserIdSchema }).passthrough();
export type IngestSingleRequest = z.infer<typeof IngestSingleRequestSchema>;

export interface IngestResponse {
  success: boolean;
  eventsReceived: number;
  eventsStored: number;
  errors: Array<{ index: number; message: string }>;
}

const queryBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform(value => value === true || value === 'true' || value === '1');

export const EventsQuerySchema = z
  .object({
    start: TimestampSchema.optional(),
    end: TimestampSchema.optional(),
    types: z
      .string()
      .optional()
      .transform(value =>
        value
          ? value
              .split(',')
              .map(part => part.trim())
              .filter(part => part.length > 0)
          : undefined
      )
      .pipe(z.array(LifeEventTypeSchema).optional()),
    limit: z.coerce.number().int().min(1).max(10000).default(100),
  })
  .refine(query => !query.start || !query.end || query.start <= query.end, {
    message: 'start must not be after end',
    path: ['start'],
  });
export type EventsQuery = z.infer<typeof EventsQuerySchema>;

export const PatternsQuerySchema = z.object({
  patternType: PatternTypeSchema.optional(),
  activeOnly: queryBoolean.default('true'),
});
export type PatternsQuery = z.infer<typeof PatternsQuerySchema>;

export const AnalyzeRequestSchema = z.object({
  daysBack: z.number().int().min(1).max(365).optional(),
});
export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

export const MemoryQueryRequestSchema = z
  .object({
    userId: UserIdSchema,
    question: z.string().trim().min(3).max(500),
    start: TimestampSchema.optional(),
    end: TimestampSchema.optional(),
    includeReasoning: z.boolean().default(true),
  })
  .refine(body => !body.start || !body.end || body.start <= body.end, {
    message: 'start must not be after end',
    path: ['start'],
  });
export type MemoryQueryRequest = z.infer<typeof MemoryQueryRequestSchema>;

export const MemorySummaryQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});
export type MemorySummaryQuery = z.infer<typeof MemorySummaryQuerySchema>;
