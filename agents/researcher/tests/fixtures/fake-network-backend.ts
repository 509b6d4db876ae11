import { NetworkError } from '@content-research/shared';
import { MemoryStore } from '../../src/store/memory-store';
import type { Clock } from '../../src/store/memory-store';
import type { NetworkBackend } from '../../src/store/network-backend';

/**
 * In-process NetworkBackend. `reachable = false` fails the ping;
 * `failing = true` fails every data call after connecting.
 */
export class FakeNetworkBackend implements NetworkBackend {
    readonly name = 'fake-redis';
    reachable = true;
    failing = false;
    closed = false;
    readonly calls: string[] = [];
    private data: MemoryStore;

    constructor(clock?: Clock) {
        this.data = new MemoryStore(clock);
    }

    private check(operation: string): void {
        this.calls.push(operation);
        if (this.failing) throw new NetworkError(`${operation}: connection reset`);
    }

    async ping(): Promise<void> {
        this.calls.push('ping');
        if (!this.reachable) throw new NetworkError('connect ECONNREFUSED 127.0.0.1:6379');
    }

    async get(key: string): Promise<string | null> {
        this.check('get');
        return this.data.get(key) ?? null;
    }

    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        this.check('set');
        this.data.set(key, value, ttlSeconds === undefined ? undefined : ttlSeconds * 1000);
    }

    async delete(key: string): Promise<boolean> {
        this.check('delete');
        return this.data.delete(key);
    }

    async exists(key: string): Promise<boolean> {
        this.check('exists');
        return this.data.exists(key);
    }

    async clear(): Promise<number> {
        this.check('clear');
        return this.data.clear();
    }

    async indexAdd(index: string, member: string, score: number): Promise<void> {
        this.check('indexAdd');
        this.data.indexAdd(index, member, score);
    }

    async indexRemove(index: string, member: string): Promise<boolean> {
        this.check('indexRemove');
        return this.data.indexRemove(index, member);
    }

    async indexMembers(index: string): Promise<string[]> {
        this.check('indexMembers');
        return this.data.indexMembers(index);
    }

    async indexCount(index: string): Promise<number> {
        this.check('indexCount');
        return this.data.indexCount(index);
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    /** Raw stored string, bypassing the failure switch. */
    peek(key: string): string | undefined {
        return this.data.get(key);
    }
}
