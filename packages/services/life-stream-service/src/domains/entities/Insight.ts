export const INSIGHT_TYPES = ['habit', 'routine', 'preference'] as const;
export type InsightType = (typeof INSIGHT_TYPES)[number];

export interface Insight {
  id: string;
  userId: string;
  insightType: InsightType;
  title: string;
  description: string;
  confidence: number;
  evidenceCount: number;
  timeRangeStart: Date;
  timeRangeEnd: Date;
  aiModel: string;
  reasoning: string;
  source: 'pattern_miner';
  graphNodeId: string | null;
}

/** What the reasoning provider proposes before provenance is attached. */
export interface InsightDraft {
  title: string;
  description: string;
  confidence: number;
  insightType: InsightType;
}
