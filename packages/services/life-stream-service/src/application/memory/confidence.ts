export const MIN_CONFIDENCE = 0.1;
export const MAX_CONFIDENCE = 0.95;
const HEDGE_PENALTY = 0.1;

export function countHedges(answer: string, hedgingPhrases: string[]): number {
  const lowered = answer.toLowerCase();
  return hedgingPhrases.filter(phrase => lowered.includes(phrase)).length;
}

export function scoreConfidence(eventsAnalyzed: number, answer: string, hedgingPhrases: string[]): number {
  if (eventsAnalyzed === 0) return MIN_CONFIDENCE;
  const raw = 0.5 + Math.min(0.5, eventsAnalyzed / 100) - HEDGE_PENALTY * countHedges(answer, hedgingPhrases);
  return Math.min(MAX_CONFIDENCE, Math.max(MIN_CONFIDENCE, raw));
}
