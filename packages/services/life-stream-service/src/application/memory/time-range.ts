import type { MemoryRules, TimeRule } from './memory-rules';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ResolvedTimeRange {
  start: Date;
  end: Date;
  /** Rule name, 'explicit' or 'default'. */
  matchedBy: string;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function shiftDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function endOfDay(dayStart: Date): Date {
  return new Date(dayStart.getTime() + DAY_MS - 1);
}

/** Monday = 0 ... Sunday = 6. */
function weekdayIndex(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

function rangeForRule(rule: TimeRule, now: Date): { start: Date; end: Date } {
  const today = startOfUtcDay(now);

  switch (rule.kind) {
    case 'today':
      return { start: today, end: now };
    case 'yesterday': {
      const yesterday = shiftDays(today, -1);
      return { start: yesterday, end: endOfDay(yesterday) };
    }
    case 'last_friday': {
      const daysSinceFriday = (weekdayIndex(now) - 4 + 7) % 7 || 7;
      const friday = shiftDays(today, -daysSinceFriday);
      return { start: friday, end: endOfDay(friday) };
    }
    case 'last_weekend': {
      const daysSinceSunday = (weekdayIndex(now) + 1) % 7;
      const sunday = shiftDays(today, -daysSinceSunday);
      return { start: shiftDays(sunday, -1), end: endOfDay(sunday) };
    }
    case 'trailing':
      return { start: shiftDays(now, -rule.days), end: now };
  }
}

export function resolveTimeRange(
  question: string,
  explicit: { start?: Date; end?: Date },
  rules: MemoryRules,
  now: Date
): ResolvedTimeRange {
  if (explicit.start && explicit.end) {
    return { start: explicit.start, end: explicit.end, matchedBy: 'explicit' };
  }

  const lowered = question.toLowerCase();
  const rule = rules.timeRules.find(candidate => candidate.phrases.some(phrase => lowered.includes(phrase)));
  if (rule) {
    return { ...rangeForRule(rule, now), matchedBy: rule.name };
  }

  return { start: shiftDays(now, -rules.defaultTrailingDays), end: now, matchedBy: 'default' };
}
