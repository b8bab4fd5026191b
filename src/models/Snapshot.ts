import { SnapshotSource } from '@/constants/instruments';
import { MarketSnapshot } from './MarketSnapshot';

/**
 * Result of one universe retrieval
 *
 * All snapshots share one source: a batch is never part live, part fallback.
 */
export interface SnapshotBatch {
  source: SnapshotSource;
  snapshots: readonly MarketSnapshot[];
  fetchedAt: Date;
}
