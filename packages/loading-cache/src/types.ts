/** Status codes returned by `get`/`peek`. Loader codes other than these pass through unchanged. */
export const Status = {
  Success: 0,
  Failure: -1,
} as const;

export type StatusCode = number;

/** What the loader reports for a key. `value` is ignored unless `status` is `Status.Success`. */
export interface LoadResult<V> {
  value: V | undefined;
  status: StatusCode;
}

export type Loader<K, V> = (key: K) => LoadResult<V> | Promise<LoadResult<V>>;

/**
 * Why a lookup did not succeed.
 * - `not-found`: no entry and no loader
 * - `stale`: entry expired and no loader; the stale value is still returned
 * - `loader-failure`: the loader ran and returned a non-success status
 */
export type CacheError = 'not-found' | 'stale' | 'loader-failure';

export interface CacheResult<V> extends LoadResult<V> {
  error?: CacheError;
}

export interface CacheOptions<K, V> {
  /** Time-to-live in milliseconds, measured from the last write. Default: 0 (never expires). */
  ttlMs?: number;
  /** Maximum number of entries. The least recently used entry is evicted when exceeded. Default: 0 (unbounded). */
  maxEntries?: number;
  /**
   * Interval in ms between expiration sweeps. Values below one second are ignored.
   * The timer is `unref()`'d so it won't keep the process alive.
   */
  sweepIntervalMs?: number;
  /** Populates the cache on a miss and refreshes stale entries in the background. */
  loader?: Loader<K, V>;
  /**
   * How long a stale entry keeps being served as fresh once a background refresh
   * has been started for it. Default: 3000.
   */
  refreshGraceMs?: number;
  /** Callback invoked when an entry is removed from the cache. */
  onEvict?: (key: K, value: V, reason: EvictReason) => void;
  /** Callback invoked when a background refresh throws. */
  onRefreshError?: (key: K, error: unknown) => void;
}

export type EvictReason = 'expired' | 'evicted' | 'manual' | 'clear';

export interface CacheStats {
  hits: number;
  misses: number;
  stale: number;
  loads: number;
  evictions: number;
  size: number;
}

/** Arguments each event hands to its handlers. */
export interface CacheEventMap<K, V> {
  hit: [key: K, value: V];
  miss: [key: K];
  stale: [key: K, value: V];
  set: [key: K, value: V];
  evict: [key: K, value: V, reason: EvictReason];
  load: [key: K, value: V];
  /**
   * A background refresh did not replace the stale value. `status` is the
   * loader's code, or `Status.Failure` with `error` when the loader threw.
   */
  'refresh-failed': [key: K, status: StatusCode, error?: unknown];
}

export type CacheEvent = keyof CacheEventMap<unknown, unknown>;

export type CacheEventHandler<K, V, E extends CacheEvent> = (
  ...args: CacheEventMap<K, V>[E]
) => void;
