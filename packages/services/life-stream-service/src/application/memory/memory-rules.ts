/**
 * Ordered rule tables for question interpretation, loaded from memory-rules.json.
 */

import { z } from 'zod';
import { LifeEventTypeSchema, formatZodIssues } from '@lifestream/shared-contracts';
import rulesFile from '../../config/memory-rules.json';

const TimeRuleSchema = z.discriminatedUnion('kind', [
  z.object({ name: z.string(), kind: z.literal('today'), phrases: z.array(z.string().min(1)).min(1) }),
  z.object({ name: z.string(), kind: z.literal('yesterday'), phrases: z.array(z.string().min(1)).min(1) }),
  z.object({ name: z.string(), kind: z.literal('last_friday'), phrases: z.array(z.string().min(1)).min(1) }),
  z.object({ name: z.string(), kind: z.literal('last_weekend'), phrases: z.array(z.string().min(1)).min(1) }),
  z.object({
    name: z.string(),
    kind: z.literal('trailing'),
    days: z.number().int().positive(),
    phrases: z.array(z.string().min(1)).min(1),
  }),
]);
export type TimeRule = z.infer<typeof TimeRuleSchema>;

const TypeRuleSchema = z.object({
  name: z.string(),
  types: z.array(LifeEventTypeSchema).min(1),
  words: z.array(z.string().min(1)).min(1),
  exact: z.array(z.string().min(1)).default([]),
});
export type TypeRule = z.infer<typeof TypeRuleSchema>;

export const MemoryRulesSchema = z.object({
  timeRules: z.array(TimeRuleSchema),
  defaultTrailingDays: z.number().int().positive(),
  typeRules: z.array(TypeRuleSchema),
  stopwords: z.array(z.string()),
  hedgingPhrases: z.array(z.string().min(1)),
});
export type MemoryRules = z.infer<typeof MemoryRulesSchema>;

export function parseMemoryRules(input: unknown): MemoryRules {
  const result = MemoryRulesSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid memory rules: ${formatZodIssues(result.error)}`);
  }
  return {
    ...result.data,
    stopwords: result.data.stopwords.map(word => word.toLowerCase()),
    hedgingPhrases: result.data.hedgingPhrases.map(phrase => phrase.toLowerCase()),
  };
}

let cached: MemoryRules | null = null;

export function loadMemoryRules(): MemoryRules {
  if (!cached) cached = parseMemoryRules(rulesFile);
  return cached;
}
