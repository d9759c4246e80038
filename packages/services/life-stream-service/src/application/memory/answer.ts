/**
 * Memory answer prompt, parsing and the fallback used without a reasoning provider.
 */

import { z } from 'zod';

const AnswerSchema = z.object({
  answer: z.string().min(1),
  reasoning: z.string().nullish(),
});

export interface ParsedAnswer {
  answer: string;
  reasoning: string | null;
}

export const NO_EVENTS_ANSWER = 'No matching events were found for the requested period.';

export function templatedAnswer(eventCount: number): string {
  if (eventCount === 0) return NO_EVENTS_ANSWER;
  return `Found ${eventCount} events for the requested period. Configure a reasoning provider for a detailed answer.`;
}

export function buildAnswerPrompt(question: string, context: string, includeReasoning: boolean): string {
  return `You are a "second brain" assistant helping the user recall events from their own life.

User question: ${question}

Context (records from the event store):
${context || '(no records)'}

Task:
1. Analyse the context and find the answer to the question
2. Give a short, useful answer in the language of the question
3. If the information is insufficient, say so plainly
${includeReasoning ? '\nAlso explain your reasoning.\n' : ''}
Respond with JSON only:
{"answer": "your answer", "reasoning": "how you reached it"}`;
}

function tryParse(text: string): ParsedAnswer | null {
  try {
    const result = AnswerSchema.safeParse(JSON.parse(text));
    if (!result.success) return null;
    return { answer: result.data.answer, reasoning: result.data.reasoning ?? null };
  } catch {
    return null;
  }
}

export function parseAnswer(response: string): ParsedAnswer {
  const trimmed = response.trim();
  const strict = tryParse(trimmed);
  if (strict) return strict;

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const sliced = tryParse(trimmed.slice(start, end + 1));
    if (sliced) return sliced;
  }

  return { answer: trimmed, reasoning: null };
}
