import { ScoredInstrument, ScoreSummary } from '@/models';

/**
 * Top-N instruments by score, highest first
 *
 * Array.prototype.sort is stable, so equal scores keep their input order.
 * A topN that is not a positive integer yields an empty ranking.
 */
export function rankInstruments(
  scored: readonly ScoredInstrument[],
  topN: number
): ScoredInstrument[] {
  if (!Number.isInteger(topN) || topN <= 0) {
    return [];
  }

  return [...scored].sort((a, b) => b.score - a.score).slice(0, topN);
}

/**
 * Aggregate statistics over every scored instrument
 */
export function summarizeScores(scored: readonly ScoredInstrument[]): ScoreSummary {
  if (scored.length === 0) {
    return { analyzedCount: 0, positiveCount: 0, averageScore: 0, maxScore: 0 };
  }

  const total = scored.reduce((sum, item) => sum + item.score, 0);

  return {
    analyzedCount: scored.length,
    positiveCount: scored.filter((item) => item.score > 0).length,
    averageScore: total / scored.length,
    maxScore: Math.max(...scored.map((item) => item.score)),
  };
}
