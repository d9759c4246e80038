/**
 * Life event wire contracts
 *
 * One schema per event type, discriminated on `type`. Fields a type does not
 * declare pass through untouched and end up in the stored payload.
 */

import { z } from 'zod';

export const LIFE_EVENT_TYPES = [
  'geo',
  'purchase',
  'transaction',
  'social',
  'health',
  'activity',
  'communication',
  'custom',
] as const;
export const LifeEventTypeSchema = z.enum(LIFE_EVENT_TYPES);
export type LifeEventType = z.infer<typeof LifeEventTypeSchema>;

export const LIFE_EVENT_SOURCES = ['api', 'mobile', 'wearable', 'import', 'webhook'] as const;
export const LifeEventSourceSchema = z.enum(LIFE_EVENT_SOURCES);
export type LifeEventSource = z.infer<typeof LifeEventSourceSchema>;

/** An ISO-8601 instant. Numbers, booleans and null are rejected rather than read as epoch offsets. */
export const TimestampSchema = z.union([z.string().datetime({ offset: true }), z.date()]).pipe(z.coerce.date());

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

const BaseEventSchema = z.object({
  id: z.string().uuid().optional(),
  ts: TimestampSchema.optional(),
  timestamp: TimestampSchema.optional(),
  source: LifeEventSourceSchema.default('api'),
  device_id: z.string().min(1).max(128).optional(),
});

export const GeoEventSchema = BaseEventSchema.extend({
  type: z.literal('geo'),
  lat: latitude,
  lon: longitude,
  accuracy: z.number().min(0).optional(),
  altitude: z.number().optional(),
  speed: z.number().min(0).optional(),
  heading: z.number().min(0).lt(360).optional(),
}).passthrough();

export const PurchaseEventSchema = BaseEventSchema.extend({
  type: z.literal('purchase'),
  item: z.string().min(1),
  amount: z.number().min(0),
  currency: z.string().min(1).default('RUB'),
  place: z.string().optional(),
  category: z.string().optional(),
  payment_method: z.string().optional(),
  lat: latitude.optional(),
  lon: longitude.optional(),
}).passthrough();

export const TransactionEventSchema = BaseEventSchema.extend({
  type: z.literal('transaction'),
  amount: z.number().min(0),
  currency: z.string().min(1).default('RUB'),
  item: z.string().optional(),
  place: z.string().optional(),
  category: z.string().optional(),
}).passthrough();

export const SocialEventSchema = BaseEventSchema.extend({
  type: z.literal('social'),
  action: z.string().min(1),
  person_id: z.string().optional(),
  person_name: z.string().optional(),
  context: z.string().optional(),
  duration_minutes: z.number().int().min(0).optional(),
  lat: latitude.optional(),
  lon: longitude.optional(),
}).passthrough();

export const HealthEventSchema = BaseEventSchema.extend({
  type: z.literal('health'),
  metric: z.string().min(1),
  value: z.number(),
  unit: z.string().default(''),
  min_value: z.number().optional(),
  max_value: z.number().optional(),
  avg_value: z.number().optional(),
}).passthrough();

export const ActivityEventSchema = BaseEventSchema.extend({
  type: z.literal('activity'),
  activity: z.string().min(1),
  duration_minutes: z.number().int().min(0),
  distance_meters: z.number().min(0).optional(),
  calories: z.number().min(0).optional(),
  start_lat: latitude.optional(),
  start_lon: longitude.optional(),
  end_lat: latitude.optional(),
  end_lon: longitude.optional(),
}).passthrough();

export const CommunicationEventSchema = BaseEventSchema.extend({
  type: z.literal('communication'),
  channel: z.string().min(1),
  direction: z.enum(['inbound', 'outbound']).optional(),
  person_id: z.string().optional(),
  person_name: z.string().optional(),
}).passthrough();

export const CustomEventSchema = BaseEventSchema.extend({
  type: z.literal('custom'),
  event_subtype: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
}).passthrough();

export const LifeEventInputSchema = z.discriminatedUnion('type', [
  GeoEventSchema,
  PurchaseEventSchema,
  TransactionEventSchema,
  SocialEventSchema,
  HealthEventSchema,
  ActivityEventSchema,
  CommunicationEventSchema,
  CustomEventSchema,
]);
export type LifeEventInput = z.infer<typeof LifeEventInputSchema>;
