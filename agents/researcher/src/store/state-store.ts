/**
 * Dual-backend state store.
 *
 * Network backend first, in-process MemoryStore when it is unreachable.
 * The mode is decided by `connect()` and kept until an explicit
 * `reinitialize()`. While live, a failed network call is logged and that
 * one call is served by the fallback, so a single store can hold data in
 * both places. Callers treat it as best-effort, not strongly consistent.
 */

import { ValidationError, errorMessage } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import { z } from 'zod';
import { getFallbackStore } from './memory-store';
import type { MemoryStore, MemoryStoreStats } from './memory-store';
import type { NetworkBackend } from './network-backend';

export type StoreMode = 'network' | 'fallback';

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface StateStoreOptions {
    /** Omitted or null runs the store on the fallback only. */
    backend?: NetworkBackend | null;
    fallback?: MemoryStore;
    logger?: Logger;
}

export interface StateStoreStats extends MemoryStoreStats {
    mode: StoreMode;
    backend: string;
}

export class StateStore {
    private live = false;

    private constructor(
        private readonly backend: NetworkBackend | null,
        private readonly fallback: MemoryStore,
        private readonly logger?: Logger
    ) { }

    static async connect(options: StateStoreOptions = {}): Promise<StateStore> {
        const store = new StateStore(options.backend ?? null, options.fallback ?? getFallbackStore(), options.logger);
        await store.reinitialize();
        return store;
    }

    get mode(): StoreMode {
        return this.live ? 'network' : 'fallback';
    }

    /** Pings the network backend again and switches mode accordingly. */
    async reinitialize(): Promise<StoreMode> {
        if (!this.backend) {
            this.live = false;
            return this.mode;
        }
        try {
            await this.backend.ping();
            this.live = true;
            this.logger?.info(`State store connected to ${this.backend.name}`);
        } catch (e) {
            this.live = false;
            this.logger?.warn(`${this.backend.name} unreachable, using in-memory store: ${errorMessage(e)}`);
        }
        return this.mode;
    }

    private async attempt<T>(
        operation: string,
        target: string,
        network: (backend: NetworkBackend) => Promise<T>,
        fallback: () => T
    ): Promise<T> {
        if (this.live && this.backend) {
            try {
                return await network(this.backend);
            } catch (e) {
                this.logger?.warn(`${operation} ${target} failed on ${this.backend.name}, using in-memory store: ${errorMessage(e)}`);
            }
        }
        return fallback();
    }

    private async getRaw(key: string): Promise<string | undefined> {
        return this.attempt(
            'get',
            key,
            async backend => (await backend.get(key)) ?? undefined,
            () => this.fallback.get(key)
        );
    }

    /** Deserialized value, or undefined when absent, expired or unreadable. */
    async get(key: string): Promise<unknown> {
        const raw = await this.getRaw(key);
        if (raw === undefined) return undefined;
        try {
            return JSON.parse(raw);
        } catch (e) {
            this.logger?.warn(`Discarding unreadable value at ${key}: ${errorMessage(e)}`);
            return undefined;
        }
    }

    /** Like `get`, but a value failing `schema` counts as absent. */
    async getParsed<T>(key: string, schema: Schema<T>): Promise<T | undefined> {
        const value = await this.get(key);
        if (value === undefined) return undefined;
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            this.logger?.warn(`Discarding invalid value at ${key}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
            return undefined;
        }
        return parsed.data;
    }

    /**
     * Stores `value` as JSON. Without `ttlSeconds` the entry never expires.
     * Returns false when the value cannot be serialized.
     */
    async set(key: string, value: unknown, ttlSeconds?: number): Promise<boolean> {
        if (value === undefined) {
            throw new ValidationError(`Cannot store undefined at ${key}`);
        }
        if (ttlSeconds !== undefined && !(ttlSeconds > 0)) {
            throw new ValidationError(`TTL must be positive, got ${ttlSeconds}`);
        }

        let serialized: string;
        try {
            serialized = JSON.stringify(value);
        } catch (e) {
            this.logger?.error(`Cannot serialize value for ${key}: ${errorMessage(e)}`);
            return false;
        }

        await this.attempt(
            'set',
            key,
            backend => backend.set(key, serialized, ttlSeconds),
            () => this.fallback.set(key, serialized, ttlSeconds === undefined ? undefined : ttlSeconds * 1000)
        );
        return true;
    }

    /** Removes the key from both backends; true when it existed in either. */
    async delete(key: string): Promise<boolean> {
        const local = this.fallback.delete(key);
        const remote = await this.attempt('delete', key, backend => backend.delete(key), () => false);
        return local || remote;
    }

    async exists(key: string): Promise<boolean> {
        return this.attempt('exists', key, backend => backend.exists(key), () => this.fallback.exists(key));
    }

    /**
     * Drops every entry. In network mode this scans and deletes the whole
     * key prefix: never point it at a namespace shared with other services.
     */
    async clear(): Promise<number> {
        const local = this.fallback.clear();
        const remote = await this.attempt('clear', '*', backend => backend.clear(), () => 0);
        return local + remote;
    }

    async indexAdd(index: string, member: string, score: number): Promise<void> {
        await this.attempt(
            'indexAdd',
            index,
            backend => backend.indexAdd(index, member, score),
            () => this.fallback.indexAdd(index, member, score)
        );
    }

    async indexRemove(index: string, member: string): Promise<boolean> {
        const local = this.fallback.indexRemove(index, member);
        const remote = await this.attempt('indexRemove', index, backend => backend.indexRemove(index, member), () => false);
        return local || remote;
    }

    async indexMembers(index: string): Promise<string[]> {
        return this.attempt(
            'indexMembers',
            index,
            backend => backend.indexMembers(index),
            () => this.fallback.indexMembers(index)
        );
    }

    async indexCount(index: string): Promise<number> {
        return this.attempt(
            'indexCount',
            index,
            backend => backend.indexCount(index),
            () => this.fallback.indexCount(index)
        );
    }

    /** Evicts expired fallback entries. Network backends expire on their own, so this is 0 there. */
    async sweepExpired(): Promise<number> {
        if (this.live) return 0;
        return this.fallback.sweepExpired();
    }

    stats(): StateStoreStats {
        return {
            mode: this.mode,
            backend: this.live && this.backend ? this.backend.name : 'memory',
            ...this.fallback.stats()
        };
    }

    async close(): Promise<void> {
        if (!this.backend) return;
        try {
            await this.backend.close();
        } catch (e) {
            this.logger?.warn(`Closing ${this.backend.name} failed: ${errorMessage(e)}`);
        }
        this.live = false;
    }
}
