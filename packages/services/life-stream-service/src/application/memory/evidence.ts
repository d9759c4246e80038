import type { LifeEvent, MemoryLocation, MemoryPerson, MemoryTransaction } from '../../domains/entities';
import type { GraphPerson } from '../../domains/ports/IKnowledgeGraphClient';

export const MAX_LOCATIONS = 20;
export const MAX_TRANSACTIONS = 50;

function stringValue(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function socialPersonIds(events: LifeEvent[]): string[] {
  const ids = new Set<string>();
  for (const event of events) {
    if (event.type !== 'social') continue;
    const personId = stringValue(event.payload.person_id);
    if (personId) ids.add(personId);
  }
  return [...ids];
}

export function extractLocations(events: LifeEvent[]): MemoryLocation[] {
  const seen = new Set<string>();
  const locations: MemoryLocation[] = [];

  for (const event of events) {
    if (event.lat === null || event.lon === null) continue;
    const key = `${event.lat.toFixed(4)},${event.lon.toFixed(4)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    locations.push({ lat: event.lat, lon: event.lon, timestamp: event.eventTime.toISOString() });
    if (locations.length === MAX_LOCATIONS) break;
  }
  return locations;
}

export function extractPeople(events: LifeEvent[], resolved: GraphPerson[]): MemoryPerson[] {
  const known = new Map(resolved.map(person => [person.id, person]));
  const people: MemoryPerson[] = [];
  const seen = new Set<string>();

  for (const event of events) {
    if (event.type !== 'social') continue;
    const personId = stringValue(event.payload.person_id);
    if (!personId || seen.has(personId)) continue;
    seen.add(personId);
    people.push(known.get(personId) ?? { id: personId, name: stringValue(event.payload.person_name) ?? 'Unknown' });
  }
  return people;
}

export function extractTransactions(events: LifeEvent[]): MemoryTransaction[] {
  return events
    .filter(event => event.type === 'purchase' || event.type === 'transaction')
    .slice(0, MAX_TRANSACTIONS)
    .map(event => ({
      timestamp: event.eventTime.toISOString(),
      item: stringValue(event.payload.item) ?? '',
      amount: typeof event.payload.amount === 'number' ? event.payload.amount : 0,
      place: stringValue(event.payload.place) ?? '',
      category: stringValue(event.payload.category) ?? '',
    }));
}
