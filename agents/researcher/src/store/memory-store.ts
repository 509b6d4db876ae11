/**
 * In-process fallback backend.
 *
 * Holds serialized values with their insertion time and ttl; an entry is
 * absent once `now - insertedAt >= ttlMs`. Expired entries are evicted
 * lazily on read or by `sweepExpired`. Sorted indexes never expire.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';

export type Clock = () => number;

export interface CacheEntry {
    key: string;
    value: string;
    insertedAt: number;
    ttlMs: number;
}

export interface MemoryStoreStats {
    totalEntries: number;
    expiredEntries: number;
    activeEntries: number;
    estimatedSizeBytes: number;
    indexes: number;
}

export class MemoryStore {
    private entries: Map<string, CacheEntry> = new Map();
    private indexes: Map<string, Map<string, number>> = new Map();

    constructor(private readonly clock: Clock = Date.now) { }

    now(): number {
        return this.clock();
    }

    private isExpired(entry: CacheEntry, now: number): boolean {
        return now - entry.insertedAt >= entry.ttlMs;
    }

    get(key: string): string | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (this.isExpired(entry, this.clock())) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    /** `ttlMs` defaults to no expiry. */
    set(key: string, value: string, ttlMs: number = Number.POSITIVE_INFINITY): void {
        this.entries.set(key, { key, value, insertedAt: this.clock(), ttlMs });
    }

    delete(key: string): boolean {
        const entry = this.entries.get(key);
        this.entries.delete(key);
        return entry !== undefined && !this.isExpired(entry, this.clock());
    }

    exists(key: string): boolean {
        return this.get(key) !== undefined;
    }

    clear(): number {
        const removed = this.entries.size;
        this.entries.clear();
        this.indexes.clear();
        return removed;
    }

    /**
     * Evicts expired entries, yielding to the event loop after each eviction
     * so foreground calls are never held up by more than one delete.
     */
    async sweepExpired(): Promise<number> {
        let removed = 0;
        for (const key of Array.from(this.entries.keys())) {
            const entry = this.entries.get(key);
            if (entry && this.isExpired(entry, this.clock())) {
                this.entries.delete(key);
                removed++;
                await yieldToEventLoop();
            }
        }
        return removed;
    }

    indexAdd(index: string, member: string, score: number): void {
        let members = this.indexes.get(index);
        if (!members) {
            members = new Map();
            this.indexes.set(index, members);
        }
        members.set(member, score);
    }

    indexRemove(index: string, member: string): boolean {
        return this.indexes.get(index)?.delete(member) ?? false;
    }

    /** Members by score, highest first; ties ordered by member descending. */
    indexMembers(index: string): string[] {
        const members = this.indexes.get(index);
        if (!members) return [];
        return Array.from(members.entries())
            .sort(([a, scoreA], [b, scoreB]) => scoreB - scoreA || (a < b ? 1 : a > b ? -1 : 0))
            .map(([member]) => member);
    }

    indexCount(index: string): number {
        return this.indexes.get(index)?.size ?? 0;
    }

    stats(): MemoryStoreStats {
        const now = this.clock();
        let expired = 0;
        let size = 0;
        for (const entry of this.entries.values()) {
            if (this.isExpired(entry, now)) expired++;
            size += entry.value.length;
        }
        return {
            totalEntries: this.entries.size,
            expiredEntries: expired,
            activeEntries: this.entries.size - expired,
            estimatedSizeBytes: size,
            indexes: this.indexes.size
        };
    }
}

let fallbackStore: MemoryStore | null = null;

/**
 * Process-wide fallback store. Created once on first use and injected into
 * every StateStore; never torn down.
 */
export function getFallbackStore(): MemoryStore {
    if (!fallbackStore) {
        fallbackStore = new MemoryStore();
    }
    return fallbackStore;
}
