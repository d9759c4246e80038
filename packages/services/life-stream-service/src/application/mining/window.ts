const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole days in the analysis window, at least 1. */
export function windowDays(start: Date, end: Date): number {
  return Math.max(1, Math.floor((end.getTime() - start.getTime()) / DAY_MS));
}

export function perWeek(occurrences: number, days: number): number {
  return occurrences / (days / 7);
}
