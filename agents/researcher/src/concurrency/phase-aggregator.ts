import { PhaseError, toError } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { FailureInfo } from './fan-out';

export interface PhaseFailure<R> {
    key: keyof R;
    failure: FailureInfo;
}

export interface PhaseOutcome<R> {
    values: R;
    failures: PhaseFailure<R>[];
}

type Assignment<R> = (values: R) => Promise<void>;

/**
 * Runs a fixed set of keyed sub-operations concurrently. Each settled value
 * is written to its own key; a failed sub-operation leaves that key at the
 * default produced by `defaults`.
 *
 * @example
 * const { values } = await new PhaseAggregator('search', () => ({ news: [], images: [] }))
 *     .add('news', () => search.news(query))
 *     .add('images', () => search.images(query))
 *     .run();
 */
export class PhaseAggregator<R extends object> {
    private readonly assignments: Array<{ key: keyof R; assign: Assignment<R> }> = [];

    constructor(
        private readonly phase: string,
        private readonly defaults: () => R,
        private readonly logger?: Logger
    ) { }

    add<K extends keyof R>(key: K, run: () => Promise<R[K]>): this {
        this.assignments.push({
            key,
            assign: async (values: R) => {
                values[key] = await run();
            }
        });
        return this;
    }

    get size(): number {
        return this.assignments.length;
    }

    async run(): Promise<PhaseOutcome<R>> {
        if (this.assignments.length === 0) {
            throw new PhaseError(this.phase, 'no operations configured');
        }

        const values = this.defaults();
        const settled = await Promise.allSettled(this.assignments.map(({ assign }) => assign(values)));

        const failures: PhaseFailure<R>[] = [];
        settled.forEach((result, index) => {
            if (result.status === 'fulfilled') return;
            const { key } = this.assignments[index];
            const error = toError(result.reason);
            this.logger?.warn(`[${this.phase}] ${String(key)} failed, using empty default: ${error.message}`);
            failures.push({ key, failure: { index, message: error.message, error } });
        });

        return { values, failures };
    }
}
