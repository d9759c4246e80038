/**
 * Parses the reasoning provider's insight list.
 *
 * The whole response is tried as a JSON array first; failing that, the first
 * fenced code block, then the outermost [...] slice. Items are validated one
 * by one and invalid ones dropped.
 */

import { z } from 'zod';
import { formatZodIssues } from '@lifestream/shared-contracts';
import { INSIGHT_TYPES, type InsightDraft } from '../../domains/entities';
import { getLogger } from '../../config/service-urls';

const logger = getLogger('life-stream-service:insight-parser');

const InsightItemSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().min(1),
  confidence: z.number().min(0).max(1).default(0.5),
  insight_type: z.enum(INSIGHT_TYPES).default('habit'),
});

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

function tryParseArray(text: string): unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function extractJsonArray(response: string): unknown[] | null {
  const trimmed = response.trim();
  const strict = tryParseArray(trimmed);
  if (strict) return strict;

  const fenced = FENCED_BLOCK.exec(trimmed);
  if (fenced) {
    const fromBlock = tryParseArray(fenced[1].trim());
    if (fromBlock) return fromBlock;
  }

  const start = trimmed.indexOf('[');
  const end = trimmed.lastIndexOf(']');
  if (start !== -1 && end > start) {
    return tryParseArray(trimmed.slice(start, end + 1));
  }
  return null;
}

export function parseInsights(response: string): InsightDraft[] {
  const items = extractJsonArray(response);
  if (!items) {
    logger.warn('Reasoning response contained no JSON array', { responseLength: response.length });
    return [];
  }

  const drafts: InsightDraft[] = [];
  items.forEach((item, index) => {
    const result = InsightItemSchema.safeParse(item);
    if (!result.success) {
      logger.warn('Dropping invalid insight', { index, issues: formatZodIssues(result.error) });
      return;
    }
    drafts.push({
      title: result.data.title,
      description: result.data.description,
      confidence: result.data.confidence,
      insightType: result.data.insight_type,
    });
  });
  return drafts;
}
