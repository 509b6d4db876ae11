import { CancelledError, ValidationError, toError } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import pLimit from 'p-limit';

export interface FailureInfo {
    index: number;
    message: string;
    error: Error;
}

export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; failure: FailureInfo };

export type UnitOfWork<T> = () => Promise<T>;

export interface FanOutOptions {
    concurrency: number;
    /** Checked before each unit starts; units not yet started resolve as cancelled. */
    signal?: AbortSignal;
    label?: string;
    logger?: Logger;
}

export const DEFAULT_SCRAPE_CONCURRENCY = 5;

export function succeeded<T>(outcome: Outcome<T>): outcome is { ok: true; value: T } {
    return outcome.ok;
}

/**
 * Runs every unit with at most `concurrency` in flight. The limiter queue is
 * FIFO, so a later unit never starts ahead of an earlier one. The result has
 * one outcome per unit, in input order.
 */
export async function fanOut<T>(units: ReadonlyArray<UnitOfWork<T>>, options: FanOutOptions): Promise<Outcome<T>[]> {
    const { concurrency, signal, label = 'fan-out', logger } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ValidationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    const limit = pLimit(concurrency);

    const fail = (index: number, cause: unknown): Outcome<T> => {
        const error = toError(cause);
        logger?.warn(`[${label}] unit ${index} failed: ${error.message}`);
        return { ok: false, failure: { index, message: error.message, error } };
    };

    const outcomes = await Promise.all(units.map((unit, index) => limit(async (): Promise<Outcome<T>> => {
        if (signal?.aborted) {
            return fail(index, new CancelledError(`${label} cancelled before unit ${index} started`));
        }
        try {
            return { ok: true, value: await unit() };
        } catch (e) {
            return fail(index, e);
        }
    })));

    const failed = outcomes.filter(o => !o.ok).length;
    logger?.debug(`[${label}] ${units.length - failed}/${units.length} units succeeded`, { concurrency });
    return outcomes;
}
