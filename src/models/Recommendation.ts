import { SnapshotSource } from '@/constants/instruments';
import { KisCredentials } from './Credentials';
import { RuleSelection, ScoredInstrument, ScoreSummary } from './Scoring';

export interface RecommendationRequest {
  count: number;
  /** Minimum trading size in 억원; echoed back, not applied */
  minVolume: number;
  useLive: boolean;
  rules: RuleSelection;
  credentials?: KisCredentials;
}

export interface RankedRecommendation extends ScoredInstrument {
  /** 1-based position in the ranking */
  rank: number;
}

export interface RecommendationResponse {
  source: SnapshotSource;
  fetchedAt: string;
  requested: {
    count: number;
    minVolume: number;
    useLive: boolean;
    rules: RuleSelection;
  };
  /** True when the best candidate has a positive score */
  hasStrongCandidates: boolean;
  recommendations: RankedRecommendation[];
  summary: ScoreSummary;
}
