import {
  KisCredentials,
  RecommendationRequest,
  RecommendationResponse,
  ScoredInstrument,
} from '@/models';
import { ILogger } from '@/interfaces/ILogger';
import { MarketSnapshotService } from './marketSnapshot.service';
import { scoreSnapshot } from './scoring.service';
import { rankInstruments, summarizeScores } from './ranking.service';

/**
 * Recommendation Service
 * Runs the snapshot → score → rank pipeline for one request
 */
export class RecommendationService {
  constructor(
    private readonly snapshotService: MarketSnapshotService,
    private readonly defaultCredentials: KisCredentials | null,
    private readonly logger: ILogger
  ) {}

  /**
   * Rank the tracked universe under the request's rules
   *
   * Request credentials win over the configured defaults. minVolume is
   * echoed back but does not filter.
   */
  async recommend(request: RecommendationRequest): Promise<RecommendationResponse> {
    const credentials = request.credentials ?? this.defaultCredentials;
    const batch = await this.snapshotService.getUniverseSnapshots(credentials, request.useLive);

    const scored: ScoredInstrument[] = batch.snapshots.map((snapshot) => {
      const { score, reasons } = scoreSnapshot(snapshot, request.rules);
      return { snapshot, score, reasons };
    });

    const ranked = rankInstruments(scored, request.count);
    const summary = summarizeScores(scored);
    const best = ranked[0];

    this.logger.info(
      {
        source: batch.source,
        analyzed: summary.analyzedCount,
        returned: ranked.length,
        topCode: best?.snapshot.code,
      },
      'Recommendations computed'
    );

    return {
      source: batch.source,
      fetchedAt: batch.fetchedAt.toISOString(),
      requested: {
        count: request.count,
        minVolume: request.minVolume,
        useLive: request.useLive,
        rules: request.rules,
      },
      hasStrongCandidates: best !== undefined && best.score > 0,
      recommendations: ranked.map((item, index) => ({ rank: index + 1, ...item })),
      summary,
    };
  }
}
