import { ICache } from '@/interfaces/ICache';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Process-local TTL cache
 *
 * Expiry is checked on read; expired entries are deleted lazily.
 * The clock is injectable so tests can move time deterministically.
 */
export class InMemoryTtlCache<T> implements ICache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  clear(): number {
    const dropped = this.entries.size;
    this.entries.clear();
    return dropped;
  }
}
