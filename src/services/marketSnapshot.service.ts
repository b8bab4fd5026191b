import { createHash } from 'crypto';
import { KisCredentials, MarketSnapshot, SnapshotBatch } from '@/models';
import { SNAPSHOT_SOURCES } from '@/constants/instruments';
import { ConfigurationError } from '@/errors';
import { ICache } from '@/interfaces/ICache';
import { IFetchProgressObserver } from '@/interfaces/IFetchProgressObserver';
import { ILogger } from '@/interfaces/ILogger';
import { IMetrics } from '@/interfaces/IMetrics';
import { IQuoteProvider, QuoteResult } from '@/interfaces/IQuoteProvider';

/**
 * One step of a universe fetch
 */
export interface FetchProgress {
  /** 0-based position in the tracked universe */
  index: number;
  total: number;
  code: string;
  result: QuoteResult;
}

export interface MarketSnapshotServiceDeps {
  quoteProvider: IQuoteProvider;
  cache: ICache<SnapshotBatch>;
  universe: readonly string[];
  fallback: readonly MarketSnapshot[];
  progressObserver: IFetchProgressObserver;
  metrics: IMetrics;
  logger: ILogger;
  now?: () => Date;
}

function hasCredentials(credentials: KisCredentials | null): credentials is KisCredentials {
  return (
    credentials !== null &&
    credentials.appKey.trim().length > 0 &&
    credentials.appSecret.trim().length > 0
  );
}

/**
 * Cache key over the call's inputs. Secrets only enter it as a digest.
 */
export function snapshotCacheKey(credentials: KisCredentials | null, useLive: boolean): string {
  if (!hasCredentials(credentials)) {
    return `anonymous|live=${useLive}`;
  }
  const fingerprint = createHash('sha256')
    .update(`${credentials.appKey}\u0000${credentials.appSecret}`)
    .digest('hex')
    .slice(0, 16);
  return `${fingerprint}|live=${useLive}`;
}

/**
 * Market Snapshot Service
 * Retrieves the tracked universe from the quote provider or the fallback
 * dataset, and caches each batch for the configured TTL.
 */
export class MarketSnapshotService {
  private readonly quoteProvider: IQuoteProvider;
  private readonly cache: ICache<SnapshotBatch>;
  private readonly universe: readonly string[];
  private readonly fallback: readonly MarketSnapshot[];
  private readonly progressObserver: IFetchProgressObserver;
  private readonly metrics: IMetrics;
  private readonly logger: ILogger;
  private readonly now: () => Date;
  /** Loads in progress, keyed like the cache; concurrent misses share one */
  private readonly inFlight = new Map<string, Promise<SnapshotBatch>>();
  /** Bumped by refresh(); a load started under an older generation is not cached */
  private generation = 0;

  constructor(deps: MarketSnapshotServiceDeps) {
    this.quoteProvider = deps.quoteProvider;
    this.cache = deps.cache;
    this.universe = deps.universe;
    this.fallback = deps.fallback;
    this.progressObserver = deps.progressObserver;
    this.metrics = deps.metrics;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Snapshots for the whole tracked universe
   *
   * Live when requested with credentials and at least one quote succeeds;
   * otherwise the fallback dataset. Never a mixture of both.
   */
  async getUniverseSnapshots(
    credentials: KisCredentials | null,
    useLive: boolean
  ): Promise<SnapshotBatch> {
    const key = snapshotCacheKey(credentials, useLive);
    const cached = this.cache.get(key);
    if (cached) {
      this.metrics.incrementCounter('snapshot_cache_total', 1, { result: 'hit' });
      this.logger.debug({ source: cached.source }, 'Snapshot batch served from cache');
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.metrics.incrementCounter('snapshot_cache_total', 1, { result: 'shared' });
      return pending;
    }
    this.metrics.incrementCounter('snapshot_cache_total', 1, { result: 'miss' });

    const generation = this.generation;
    const load = this.loadBatch(credentials, useLive)
      .then((batch) => {
        if (generation === this.generation) {
          this.cache.set(key, batch);
        } else {
          this.logger.debug({ source: batch.source }, 'Cache refreshed during load, batch not stored');
        }
        this.metrics.incrementCounter('snapshot_batch_total', 1, { source: batch.source });
        return batch;
      })
      .finally(() => {
        if (this.inFlight.get(key) === load) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, load);
    return load;
  }

  /**
   * Drop every cached batch so the next call fetches again. Loads already
   * running still answer their callers but are not cached.
   */
  refresh(): number {
    this.generation += 1;
    this.inFlight.clear();
    const cleared = this.cache.clear();
    this.logger.info({ cleared }, 'Snapshot cache cleared');
    return cleared;
  }

  /**
   * Fetch the universe one instrument at a time, in universe order
   */
  async *streamUniverse(credentials: KisCredentials): AsyncGenerator<FetchProgress> {
    const total = this.universe.length;
    for (const [index, code] of this.universe.entries()) {
      const result = await this.quoteProvider.fetchQuote(code, credentials);
      yield { index, total, code, result };
    }
  }

  private async loadBatch(
    credentials: KisCredentials | null,
    useLive: boolean
  ): Promise<SnapshotBatch> {
    if (!useLive) {
      return this.fallbackBatch();
    }

    if (!hasCredentials(credentials)) {
      const error = new ConfigurationError('Live data requested without KIS app key and secret');
      this.logger.warn({ error: error.message }, 'Serving fallback data');
      return this.fallbackBatch();
    }

    const stopTimer = this.metrics.startTimer('snapshot_fetch_duration_ms');
    const snapshots: MarketSnapshot[] = [];

    for await (const { index, total, code, result } of this.streamUniverse(credentials)) {
      if (result.ok) {
        snapshots.push(result.snapshot);
        this.metrics.incrementCounter('quote_fetch_total', 1, { outcome: 'success' });
      } else {
        this.metrics.incrementCounter('quote_fetch_total', 1, { outcome: result.error.name });
        this.logger.debug(
          { code, error: result.error.name, message: result.error.message },
          'Quote skipped'
        );
      }
      this.progressObserver.onProgress(index + 1, total, code, result.ok);
    }

    stopTimer({ result: snapshots.length > 0 ? 'live' : 'empty' });

    if (snapshots.length === 0) {
      this.logger.warn(
        { attempted: this.universe.length },
        'No live quotes retrieved, serving fallback data'
      );
      return this.fallbackBatch();
    }

    this.logger.info(
      { fetched: snapshots.length, attempted: this.universe.length },
      'Live snapshot batch loaded'
    );

    return {
      source: SNAPSHOT_SOURCES.LIVE,
      snapshots: Object.freeze(snapshots),
      fetchedAt: this.now(),
    };
  }

  private fallbackBatch(): SnapshotBatch {
    return {
      source: SNAPSHOT_SOURCES.FALLBACK,
      snapshots: this.fallback,
      fetchedAt: this.now(),
    };
  }
}
