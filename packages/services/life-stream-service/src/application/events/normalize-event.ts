import { LifeEventInputSchema, formatZodIssues, type LifeEventInput } from '@lifestream/shared-contracts';
import type { LifeEvent } from '../../domains/entities';

/** Fields with their own columns; everything else lands in the payload. */
const INDEXED_FIELDS = new Set([
  'id',
  'type',
  'ts',
  'timestamp',
  'source',
  'device_id',
  'lat',
  'lon',
  'accuracy',
  'altitude',
  'speed',
]);

export type EventValidationResult =
  | { success: true; event: LifeEventInput }
  | { success: false; message: string };

export function validateEvent(raw: unknown): EventValidationResult {
  const result = LifeEventInputSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, message: formatZodIssues(result.error) };
  }
  return { success: true, event: result.data };
}

function stringField(input: Record<string, unknown>, key: string): string | undefined {
  const value = input[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function numberField(input: Record<string, unknown>, key: string): number | null {
  const value = input[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deriveSubtype(input: Record<string, unknown>): string {
  return (
    stringField(input, 'event_subtype') ??
    stringField(input, 'action') ??
    stringField(input, 'metric') ??
    stringField(input, 'activity') ??
    stringField(input, 'channel') ??
    ''
  );
}

export function buildPayload(input: Record<string, unknown>): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (INDEXED_FIELDS.has(key) || key === 'payload' || value === undefined) continue;
    payload[key] = value;
  }
  if (input.type === 'custom' && isRecord(input.payload)) {
    Object.assign(payload, input.payload);
  }
  return payload;
}

export function toLifeEvent(
  userId: string,
  input: LifeEventInput,
  generateId: () => string,
  now: () => Date = () => new Date()
): LifeEvent {
  const fields: Record<string, unknown> = { ...input };

  return {
    id: input.id ?? generateId(),
    userId,
    eventTime: input.ts ?? input.timestamp ?? now(),
    type: input.type,
    subtype: deriveSubtype(fields),
    source: input.source,
    deviceId: input.device_id ?? null,
    lat: numberField(fields, 'lat'),
    lon: numberField(fields, 'lon'),
    accuracy: numberField(fields, 'accuracy'),
    altitude: numberField(fields, 'altitude'),
    speed: numberField(fields, 'speed'),
    payload: buildPayload(fields),
  };
}
