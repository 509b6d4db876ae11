/**
 * Redis implementation of the network backend.
 */

import Redis from 'ioredis';
import type { Logger } from '@content-research/shared';
import type { NetworkBackend } from './network-backend';

export interface RedisBackendOptions {
    host: string;
    port: number;
    db?: number;
    password?: string;
    keyPrefix?: string;
    connectTimeoutMs?: number;
    /** Reconnect attempts ioredis makes before giving up on a dropped connection. */
    maxReconnectAttempts?: number;
    logger?: Logger;
}

export const DEFAULT_KEY_PREFIX = 'crp:';

export class RedisBackend implements NetworkBackend {
    readonly name = 'redis';
    private redis: Redis;
    private keyPrefix: string;

    constructor(options: RedisBackendOptions) {
        this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
        const maxAttempts = options.maxReconnectAttempts ?? 3;
        const logger = options.logger;

        this.redis = new Redis({
            host: options.host,
            port: options.port,
            db: options.db ?? 0,
            password: options.password || undefined,
            keyPrefix: this.keyPrefix,
            lazyConnect: true,
            connectTimeout: options.connectTimeoutMs ?? 5000,
            maxRetriesPerRequest: 1,
            retryStrategy: (times: number) => (times > maxAttempts ? null : Math.min(times * 200, 2000))
        });

        // Without a listener ioredis re-emits connection errors as unhandled.
        this.redis.on('error', (err: Error) => {
            logger?.debug(`Redis connection error: ${err.message}`);
        });
    }

    async ping(): Promise<void> {
        // 'end' once the retry strategy has given up; connect() starts over.
        if (this.redis.status === 'wait' || this.redis.status === 'end') {
            await this.redis.connect();
        }
        await this.redis.ping();
    }

    async get(key: string): Promise<string | null> {
        return this.redis.get(key);
    }

    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        if (ttlSeconds !== undefined) {
            await this.redis.set(key, value, 'EX', Math.max(1, Math.ceil(ttlSeconds)));
        } else {
            await this.redis.set(key, value);
        }
    }

    async delete(key: string): Promise<boolean> {
        return (await this.redis.del(key)) > 0;
    }

    async exists(key: string): Promise<boolean> {
        return (await this.redis.exists(key)) > 0;
    }

    /**
     * SCAN + DEL over every key under the prefix. Unsafe when the prefix is
     * shared with other applications: their keys go too.
     */
    async clear(): Promise<number> {
        let cursor = '0';
        let removed = 0;
        do {
            // keyPrefix is not applied to SCAN patterns or its replies.
            const [next, keys] = await this.redis.scan(cursor, 'MATCH', `${this.keyPrefix}*`, 'COUNT', 100);
            cursor = next;
            if (keys.length > 0) {
                removed += await this.redis.del(...keys.map(k => k.slice(this.keyPrefix.length)));
            }
        } while (cursor !== '0');
        return removed;
    }

    async indexAdd(index: string, member: string, score: number): Promise<void> {
        await this.redis.zadd(index, score, member);
    }

    async indexRemove(index: string, member: string): Promise<boolean> {
        return (await this.redis.zrem(index, member)) > 0;
    }

    async indexMembers(index: string): Promise<string[]> {
        return this.redis.zrevrange(index, 0, -1);
    }

    async indexCount(index: string): Promise<number> {
        return this.redis.zcard(index);
    }

    async close(): Promise<void> {
        if (this.redis.status === 'wait' || this.redis.status === 'end') {
            this.redis.disconnect();
            return;
        }
        await this.redis.quit();
    }
}
