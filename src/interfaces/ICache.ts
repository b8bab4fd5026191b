/**
 * Keyed cache with per-entry expiry
 *
 * Stored values are shared between readers and must not be mutated.
 */
export interface ICache<T> {
  /** Fresh value for the key, or undefined when absent or expired */
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  /** Drop every entry; returns how many were dropped */
  clear(): number;
}
