import type { NewPattern } from '../../domains/entities';

function summarize(pattern: NewPattern): Record<string, unknown> {
  return {
    name: pattern.name,
    description: pattern.description,
    confidence: pattern.confidence,
    center_lat: pattern.centerLat,
    center_lon: pattern.centerLon,
    radius_meters: pattern.radiusMeters,
    time_pattern: pattern.timePattern || undefined,
    frequency_per_week: pattern.frequencyPerWeek,
    occurrences: pattern.occurrences,
    data: pattern.data,
  };
}

export function buildInsightPrompt(geoPatterns: NewPattern[], timePatterns: NewPattern[]): string {
  return `Analyze the following life patterns discovered from GPS and activity data:

## Location Clusters (Frequently Visited Places):
${JSON.stringify(geoPatterns.map(summarize), null, 2)}

## Time Patterns (Routines):
${JSON.stringify(timePatterns.map(summarize), null, 2)}

Based on these patterns, generate 2-3 meaningful insights about the person's lifestyle.
For each insight, provide:
1. A short title (habit name)
2. A description of the habit/pattern
3. Confidence score (0-1)

Respond with a JSON array only:
[
  {
    "title": "Habit name",
    "description": "Description of the pattern/habit",
    "confidence": 0.8,
    "insight_type": "habit|routine|preference"
  }
]`;
}
