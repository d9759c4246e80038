import type { LifeEventType } from '../../domains/entities';
import type { MemoryRules } from './memory-rules';

const WORD = /[\p{L}\p{N}]+/gu;
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export const MAX_SEARCH_KEYWORDS = 3;

/**
 * A rule fires when any question word starts with one of its words, so stems
 * such as "был" also catch "была", or equals one of its exact words ("met" but
 * not "metro"). Types come back in table order, deduplicated.
 */
export function inferEventTypes(question: string, rules: MemoryRules): LifeEventType[] | undefined {
  const tokens: string[] = question.toLowerCase().match(WORD) ?? [];
  const types: LifeEventType[] = [];

  for (const rule of rules.typeRules) {
    const fires =
      rule.words.some(word => tokens.some(token => token.startsWith(word))) ||
      rule.exact.some(word => tokens.includes(word));
    if (!fires) continue;
    for (const type of rule.types) {
      if (!types.includes(type)) types.push(type);
    }
  }

  return types.length > 0 ? types : undefined;
}

export function extractKeywords(question: string, rules: MemoryRules): string[] {
  const stopwords = new Set(rules.stopwords);
  return question
    .toLowerCase()
    .split(/\s+/)
    .map(word => word.replace(EDGE_PUNCTUATION, ''))
    .filter(word => word.length > 2 && !stopwords.has(word));
}
