export { LoadingCache } from './loading-cache.js';
export { MIN_SWEEP_INTERVAL_MS } from './sweeper.js';
export { Status } from './types.js';
export type {
  CacheError,
  CacheEvent,
  CacheEventHandler,
  CacheEventMap,
  CacheOptions,
  CacheResult,
  CacheStats,
  EvictReason,
  LoadResult,
  Loader,
  StatusCode,
} from './types.js';
