import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createGeoPing,
  createHealthReading,
  createPurchase,
  createSocialContact,
  resetFixtureIds,
} from '@lifestream/test-utils';
import { LifeEventStore } from '../application/events/LifeEventStore';
import { buildPayload, deriveSubtype, toLifeEvent, validateEvent } from '../application/events/normalize-event';
import { InMemoryLifeStreamRepository } from '../infrastructure/repositories/InMemoryLifeStreamRepository';

vi.mock('../config/service-urls', async () => {
  const { createMockLogger } = await import('@lifestream/test-utils');
  const logger = createMockLogger();
  return {
    SERVICE_NAME: 'life-stream-service',
    getLogger: vi.fn(() => logger),
  };
});

function validated(raw: unknown) {
  const result = validateEvent(raw);
  if (!result.success) throw new Error(result.message);
  return result.event;
}

describe('normalize-event', () => {
  const fixedNow = () => new Date('2026-01-05T12:00:00.000Z');

  beforeEach(() => resetFixtureIds());

  it('should keep indexed fields in columns and the rest in the payload', () => {
    const input = validated(
      createGeoPing(55.75, 37.61, '2026-01-05T08:00:00Z', { speed: 1.2, heading: 90, device_id: 'phone-1' })
    );

    expect(toLifeEvent('user-1', input, () => 'generated-id', fixedNow)).toEqual({
      id: '00000000-0000-4000-8000-000000000001',
      userId: 'user-1',
      eventTime: new Date('2026-01-05T08:00:00.000Z'),
      type: 'geo',
      subtype: '',
      source: 'mobile',
      deviceId: 'phone-1',
      lat: 55.75,
      lon: 37.61,
      accuracy: null,
      altitude: null,
      speed: 1.2,
      payload: { heading: 90 },
    });
  });

  it('should apply defaults and generate missing ids and timestamps', () => {
    const input = validated({ type: 'purchase', item: 'Coffee', amount: 250, place: 'Cafe' });
    const event = toLifeEvent('user-1', input, () => 'generated-id', fixedNow);

    expect(event.id).toBe('generated-id');
    expect(event.eventTime).toEqual(new Date('2026-01-05T12:00:00.000Z'));
    expect(event.source).toBe('api');
    expect(event.payload).toEqual({ item: 'Coffee', amount: 250, currency: 'RUB', place: 'Cafe' });
  });

  it('should prefer ts over timestamp', () => {
    const input = validated({
      type: 'health',
      metric: 'steps',
      value: 8000,
      ts: '2026-01-05T07:00:00Z',
      timestamp: '2026-01-04T07:00:00Z',
    });
    expect(toLifeEvent('user-1', input, () => 'id', fixedNow).eventTime).toEqual(new Date('2026-01-05T07:00:00.000Z'));
  });

  it('should derive the subtype from the first descriptive field', () => {
    expect(deriveSubtype({ action: 'met', metric: 'x' })).toBe('met');
    expect(deriveSubtype({ metric: 'steps' })).toBe('steps');
    expect(deriveSubtype({ activity: 'running' })).toBe('running');
    expect(deriveSubtype({ channel: 'telegram' })).toBe('telegram');
    expect(deriveSubtype({ event_subtype: 'mood', action: 'met' })).toBe('mood');
    expect(deriveSubtype({ item: 'Coffee' })).toBe('');
  });

  it('should merge a custom payload into the stored payload', () => {
    expect(
      buildPayload({ type: 'custom', source: 'api', event_subtype: 'mood', note: 'ok', payload: { score: 7 } })
    ).toEqual({ event_subtype: 'mood', note: 'ok', score: 7 });
  });

  it('should reject events that break their type contract', () => {
    expect(validateEvent({ type: 'geo', lat: 200, lon: 37.61 })).toEqual({
      success: false,
      message: 'lat: Number must be less than or equal to 90',
    });

    const unknown = validateEvent({ type: 'weather', value: 3 });
    expect(unknown.success).toBe(false);
    if (!unknown.success) {
      expect(unknown.message).toMatch(/^type: Invalid discriminator value/);
    }
  });

  it('should reject timestamps that are not ISO-8601 instants', () => {
    for (const ts of [null, true, 0]) {
      expect(validateEvent({ type: 'geo', lat: 1, lon: 1, ts })).toEqual({ success: false, message: 'ts: Invalid input' });
    }
    expect(validateEvent({ type: 'geo', lat: 1, lon: 1, timestamp: 'yesterday' })).toEqual({
      success: false,
      message: 'timestamp: Invalid datetime',
    });
    expect(validated({ type: 'geo', lat: 1, lon: 1, ts: '2026-01-05T08:00:00+03:00' }).ts).toEqual(
      new Date('2026-01-05T05:00:00.000Z')
    );
  });
});

describe('LifeEventStore', () => {
  let repository: InMemoryLifeStreamRepository;
  let store: LifeEventStore;

  beforeEach(() => {
    resetFixtureIds();
    repository = new InMemoryLifeStreamRepository();
    store = new LifeEventStore(repository);
  });

  it('should store the valid events of a batch and report the rest by index', async () => {
    const batch = [
      createGeoPing(55.75, 37.61, '2026-01-05T08:00:00Z'),
      createGeoPing(200, 37.61, '2026-01-05T08:05:00Z'),
      createPurchase('Coffee', 250, '2026-01-05T09:00:00Z', { place: 'Cafe' }),
    ];

    const result = await store.insertBatch('user-1', batch);

    expect(result).toEqual({
      storedCount: 2,
      errors: [{ index: 1, message: 'lat: Number must be less than or equal to 90' }],
    });

    const events = await store.query('user-1');
    expect(events.map(event => event.type)).toEqual(['purchase', 'geo']);
  });

  it('should report events with a malformed timestamp by index instead of storing them', async () => {
    const result = await store.insertBatch('user-1', [
      { type: 'geo', lat: 1, lon: 1, ts: null },
      { type: 'geo', lat: 2, lon: 2, ts: true },
      createGeoPing(3, 3, '2026-01-05T08:00:00Z'),
    ]);

    expect(result).toEqual({
      storedCount: 1,
      errors: [
        { index: 0, message: 'ts: Invalid input' },
        { index: 1, message: 'ts: Invalid input' },
      ],
    });
    expect((await store.query('user-1')).map(event => event.eventTime.toISOString())).toEqual([
      '2026-01-05T08:00:00.000Z',
    ]);
  });

  it('should ignore replayed events by id', async () => {
    const batch = [
      createGeoPing(55.75, 37.61, '2026-01-05T08:00:00Z'),
      createSocialContact('met', '2026-01-05T13:00:00Z', { person_id: 'p-1' }),
    ];

    await store.insertBatch('user-1', batch);
    const replay = await store.insertBatch('user-1', batch);

    expect(replay.storedCount).toBe(2);
    expect((await store.stats('user-1')).totalEvents).toBe(2);
  });

  it('should keep users apart', async () => {
    await store.insertBatch('user-1', [createHealthReading('steps', 8000, '2026-01-05T20:00:00Z')]);
    await store.insertBatch('user-2', [createHealthReading('steps', 4000, '2026-01-05T20:00:00Z')]);

    const events = await store.query('user-2');
    expect(events).toHaveLength(1);
    expect(events[0].payload.value).toBe(4000);
  });

  it('should reject a single invalid event outright', async () => {
    await expect(store.insertOne('user-1', { type: 'geo', lat: 55.75 })).rejects.toMatchObject({
      statusCode: 400,
      code: 'INVALID_EVENT',
    });

    const stored = await store.insertOne('user-1', createGeoPing(55.75, 37.61, '2026-01-05T08:00:00Z'));
    expect(stored).toEqual({ storedCount: 1, errors: [] });
  });

  it('should filter queries by type and range', async () => {
    await store.insertBatch('user-1', [
      createGeoPing(55.75, 37.61, '2026-01-04T08:00:00Z'),
      createGeoPing(55.75, 37.61, '2026-01-05T08:00:00Z'),
      createPurchase('Coffee', 250, '2026-01-05T09:00:00Z'),
    ]);

    const events = await store.query('user-1', {
      start: new Date('2026-01-05T00:00:00Z'),
      end: new Date('2026-01-06T00:00:00Z'),
      types: ['geo'],
    });

    expect(events).toHaveLength(1);
    expect(events[0].eventTime).toEqual(new Date('2026-01-05T08:00:00.000Z'));
  });

  it('should validate the limit and range', async () => {
    await expect(store.query('user-1', { limit: 0 })).rejects.toMatchObject({
      statusCode: 400,
      message: 'Validation failed for limit: must be an integer between 1 and 10000',
    });
    await expect(store.query('user-1', { limit: 10001 })).rejects.toMatchObject({ statusCode: 400 });
    await expect(
      store.query('user-1', { start: new Date('2026-01-06T00:00:00Z'), end: new Date('2026-01-05T00:00:00Z') })
    ).rejects.toMatchObject({ statusCode: 400, code: 'INVALID_TIME_RANGE' });
  });

  it('should search payloads and subtypes case-insensitively', async () => {
    await store.insertBatch('user-1', [
      createPurchase('Flat white', 250, '2026-01-05T09:00:00Z', { place: 'Cafe Pushkin' }),
      createSocialContact('Lunch', '2026-01-05T13:00:00Z'),
      createHealthReading('steps', 8000, '2026-01-05T20:00:00Z'),
    ]);

    expect((await store.searchText('user-1', 'pushkin')).map(event => event.type)).toEqual(['purchase']);
    expect((await store.searchText('user-1', 'lunch')).map(event => event.subtype)).toEqual(['Lunch']);
  });

  it('should skip the search for a blank keyword', async () => {
    const search = vi.spyOn(repository, 'searchEvents');
    expect(await store.searchText('user-1', '   ')).toEqual([]);
    expect(search).not.toHaveBeenCalled();
  });

  it('should surface repository failures as store unavailable', async () => {
    vi.spyOn(repository, 'insertEvents').mockRejectedValue(new Error('connection reset'));

    await expect(
      store.insertBatch('user-1', [createGeoPing(55.75, 37.61, '2026-01-05T08:00:00Z')])
    ).rejects.toMatchObject({
      statusCode: 503,
      code: 'STORE_UNAVAILABLE',
      message: 'Event store unavailable during insertBatch',
    });
  });
});
