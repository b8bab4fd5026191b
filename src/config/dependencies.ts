/**
 * Dependency Container
 * Instantiates and wires all adapters and services
 *
 * This is the single source of truth for dependency injection.
 * All concrete implementations are created here and injected into services.
 */

import { env } from '@/config/env';
import { TRACKED_UNIVERSE } from '@/constants/instruments';
import { FALLBACK_SNAPSHOTS } from '@/constants/fallbackSnapshots';
import { KisCredentials, SnapshotBatch } from '@/models';

// Adapter implementations
import { AxiosHttpClient } from '@/adapters/http/AxiosHttpClient';
import { KisTokenSource } from '@/adapters/kis/KisTokenSource';
import { KisQuoteProvider } from '@/adapters/kis/KisQuoteProvider';
import { InMemoryTtlCache } from '@/adapters/cache/InMemoryTtlCache';
import { LoggingProgressObserver } from '@/adapters/progress/LoggingProgressObserver';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';

// Service implementations
import { MarketSnapshotService } from '@/services/marketSnapshot.service';
import { RecommendationService } from '@/services/recommendation.service';

// ============================================================================
// ADAPTERS
// ============================================================================

export const kisHttpClient = new AxiosHttpClient(env.KIS_BASE_URL, env.KIS_HTTP_TIMEOUT_MS);
export const kisTokenSource = new KisTokenSource(kisHttpClient);
export const kisQuoteProvider = new KisQuoteProvider(kisHttpClient, kisTokenSource);

export const snapshotCache = new InMemoryTtlCache<SnapshotBatch>(
  env.SNAPSHOT_CACHE_TTL_SECONDS * 1000
);

/**
 * Credentials from the environment, used when a request brings none
 */
export const defaultCredentials: KisCredentials | null =
  env.KIS_APP_KEY && env.KIS_APP_SECRET
    ? {
        appKey: env.KIS_APP_KEY,
        appSecret: env.KIS_APP_SECRET,
        accountNumber: env.KIS_ACCOUNT_NUMBER || undefined,
      }
    : null;

// ============================================================================
// SERVICES
// ============================================================================

/**
 * Market Snapshot Service
 * Live or fallback universe snapshots behind a shared TTL cache
 */
export const marketSnapshotService = new MarketSnapshotService({
  quoteProvider: kisQuoteProvider,
  cache: snapshotCache,
  universe: TRACKED_UNIVERSE,
  fallback: FALLBACK_SNAPSHOTS,
  progressObserver: new LoggingProgressObserver(createLogger('UniverseFetch')),
  metrics,
  logger: createLogger('MarketSnapshotService'),
});

/**
 * Recommendation Service
 * Scores and ranks the universe for each request
 */
export const recommendationService = new RecommendationService(
  marketSnapshotService,
  defaultCredentials,
  createLogger('RecommendationService')
);
