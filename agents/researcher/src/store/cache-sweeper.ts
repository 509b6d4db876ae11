import { errorMessage } from '@content-research/shared';
import type { Logger } from '@content-research/shared';

export interface Sweepable {
    sweepExpired(): Promise<number>;
}

export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 60 * 1000;

/**
 * Background task that evicts expired fallback entries on a fixed interval.
 * The timer is unref'd so it never keeps the process alive.
 */
export class CacheSweeper {
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<number> | null = null;

    constructor(
        private readonly store: Sweepable,
        private readonly intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS,
        private readonly logger?: Logger
    ) { }

    get running(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.runOnce();
        }, this.intervalMs);
        this.timer.unref();
        this.logger?.debug(`Cache sweeper started (every ${this.intervalMs}ms)`);
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
        this.logger?.debug('Cache sweeper stopped');
    }

    /** One sweep; overlapping calls share the sweep already in progress. Never rejects. */
    async runOnce(): Promise<number> {
        if (this.inFlight) return this.inFlight;
        this.inFlight = this.sweep();
        try {
            return await this.inFlight;
        } finally {
            this.inFlight = null;
        }
    }

    private async sweep(): Promise<number> {
        try {
            const removed = await this.store.sweepExpired();
            if (removed > 0) {
                this.logger?.info(`Evicted ${removed} expired cache entries`);
            }
            return removed;
        } catch (e) {
            this.logger?.error(`Cache sweep failed: ${errorMessage(e)}`);
            return 0;
        }
    }
}
