import { RuleName } from '@/constants/instruments';
import { MarketSnapshot } from './MarketSnapshot';

/**
 * Which scoring rules are enabled for one ranking request
 */
export type RuleSelection = Record<RuleName, boolean>;

export interface ScoreResult {
  score: number;
  /** Labels of the contributions that fired, in rule order */
  reasons: string[];
}

/**
 * Snapshot with its computed score
 * Derived per request and never mutated.
 */
export interface ScoredInstrument {
  readonly snapshot: MarketSnapshot;
  readonly score: number;
  readonly reasons: readonly string[];
}

/**
 * Aggregates over every scored instrument (not only the returned top-N)
 */
export interface ScoreSummary {
  analyzedCount: number;
  positiveCount: number;
  averageScore: number;
  maxScore: number;
}
