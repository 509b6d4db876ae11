export { MemoryStore, getFallbackStore } from './memory-store';
export type { Clock, CacheEntry, MemoryStoreStats } from './memory-store';
export type { NetworkBackend } from './network-backend';
export { RedisBackend, DEFAULT_KEY_PREFIX } from './redis-backend';
export type { RedisBackendOptions } from './redis-backend';
export { StateStore } from './state-store';
export type { StoreMode, Schema, StateStoreOptions, StateStoreStats } from './state-store';
export { CacheSweeper, DEFAULT_SWEEP_INTERVAL_MS } from './cache-sweeper';
export type { Sweepable } from './cache-sweeper';
export { cacheAside, buildCacheKey } from './cache-aside';
export type { CacheAsideOptions, CacheKeyPart } from './cache-aside';
