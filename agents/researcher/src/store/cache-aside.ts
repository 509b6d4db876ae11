import { createHash } from 'crypto';
import type { Schema, StateStore } from './state-store';

export type CacheKeyPart = string | number | boolean | null | undefined;

export interface CacheAsideOptions<T> {
    store: StateStore;
    key: string;
    ttlSeconds: number;
    /** Cached values failing this schema are reloaded. */
    schema: Schema<T>;
    load: () => Promise<T>;
    /** Returning false keeps a loaded value out of the cache. */
    shouldCache?: (value: T) => boolean;
}

/**
 * Reads `key` from the store, or loads, stores and returns the value.
 * Errors from `load` propagate and nothing is cached.
 */
export async function cacheAside<T>(options: CacheAsideOptions<T>): Promise<T> {
    const { store, key, ttlSeconds, schema, load, shouldCache } = options;

    const cached = await store.getParsed(key, schema);
    if (cached !== undefined) return cached;

    const value = await load();
    if (shouldCache === undefined || shouldCache(value)) {
        await store.set(key, value, ttlSeconds);
    }
    return value;
}

/**
 * `<namespace>:<sha1 of the parts>`. Keeps keys short and stable whatever
 * the arguments look like.
 */
export function buildCacheKey(namespace: string, ...parts: CacheKeyPart[]): string {
    const digest = createHash('sha1').update(JSON.stringify(parts)).digest('hex');
    return `${namespace}:${digest}`;
}
