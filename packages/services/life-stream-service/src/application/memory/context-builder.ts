/**
 * Renders retrieved evidence as the markdown context handed to the reasoning provider.
 */

import type { LifeEvent, Pattern } from '../../domains/entities';
import type { GraphPerson } from '../../domains/ports/IKnowledgeGraphClient';

export const EVENTS_PER_TYPE = 10;
export const CONTEXT_PATTERNS = 5;
const PAYLOAD_PREVIEW = 100;

function text(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function formatEventLine(event: LifeEvent): string {
  const ts = event.eventTime.toISOString();
  const payload = event.payload;

  switch (event.type) {
    case 'geo':
      return `- ${ts}: Coordinates (${event.lat}, ${event.lon})`;
    case 'purchase':
      return `- ${ts}: ${text(payload.item)} - ${text(payload.amount, '0')} ${text(payload.currency, 'RUB')} (${text(payload.place)})`;
    case 'social': {
      const action = event.subtype || text(payload.action);
      const person = text(payload.person_name) || text(payload.person_id);
      return `- ${ts}: ${action} with ${person}`;
    }
    default:
      return `- ${ts}: ${JSON.stringify(payload).slice(0, PAYLOAD_PREVIEW)}`;
  }
}

export function buildMemoryContext(events: LifeEvent[], people: GraphPerson[], patterns: Pattern[]): string {
  const parts: string[] = [];

  if (events.length > 0) {
    parts.push(`## Events (${events.length} records)`);
    const byType = new Map<string, LifeEvent[]>();
    for (const event of events) {
      const group = byType.get(event.type) ?? [];
      group.push(event);
      byType.set(event.type, group);
    }
    for (const [type, group] of byType) {
      parts.push(`\n### ${type.toUpperCase()} (${group.length})`);
      for (const event of group.slice(0, EVENTS_PER_TYPE)) {
        parts.push(formatEventLine(event));
      }
    }
  }

  if (people.length > 0) {
    parts.push(`\n## People (${people.length})`);
    for (const person of people) {
      parts.push(`- ${person.name || 'Unknown'} (${person.email ?? ''})`);
    }
  }

  if (patterns.length > 0) {
    parts.push(`\n## Known patterns (${patterns.length})`);
    for (const pattern of patterns.slice(0, CONTEXT_PATTERNS)) {
      parts.push(`- ${pattern.name}: ${pattern.description}`);
    }
  }

  return parts.join('\n');
}
