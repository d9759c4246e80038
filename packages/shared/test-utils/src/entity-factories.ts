/**
 * Raw ingest payloads, shaped the way clients post them.
 */

export type RawEvent = Record<string, unknown>;

let counter = 0;

function nextId(): string {
  counter += 1;
  return `00000000-0000-4000-8000-${String(counter).padStart(12, '0')}`;
}

export function resetFixtureIds(): void {
  counter = 0;
}

export function createGeoPing(lat: number, lon: number, ts: string, overrides: RawEvent = {}): RawEvent {
  return { id: nextId(), type: 'geo', lat, lon, ts, source: 'mobile', ...overrides };
}

export function createPurchase(item: string, amount: number, ts: string, overrides: RawEvent = {}): RawEvent {
  return { id: nextId(), type: 'purchase', item, amount, ts, ...overrides };
}

export function createSocialContact(action: string, ts: string, overrides: RawEvent = {}): RawEvent {
  return { id: nextId(), type: 'social', action, ts, ...overrides };
}

export function createHealthReading(metric: string, value: number, ts: string, overrides: RawEvent = {}): RawEvent {
  return { id: nextId(), type: 'health', metric, value, ts, ...overrides };
}
