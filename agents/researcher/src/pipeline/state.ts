import { InvalidTransitionError } from '@content-research/shared';
import { PIPELINE_STATUSES } from '../types';
import type { PipelineState, PipelineStatus } from '../types';

export function createPipelineState(query: string, now: Date = new Date()): PipelineState {
    const timestamp = now.toISOString();
    return {
        query,
        searchResults: [],
        images: [],
        videos: [],
        scrapedContent: [],
        status: 'initialized',
        createdAt: timestamp,
        updatedAt: timestamp
    };
}

export function isFinished(status: PipelineStatus): boolean {
    return status === 'completed' || status === 'failed';
}

export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
    if (isFinished(from)) return false;
    if (to === 'failed') return true;
    return PIPELINE_STATUSES.indexOf(to) === PIPELINE_STATUSES.indexOf(from) + 1;
}

/**
 * Moves the state to `to`, which must be the next status in order or
 * `failed`. Stamps `updatedAt`.
 */
export function advanceStatus(state: PipelineState, to: PipelineStatus, now: Date = new Date()): PipelineState {
    if (!canTransition(state.status, to)) {
        throw new InvalidTransitionError(state.status, to);
    }
    state.status = to;
    state.updatedAt = now.toISOString();
    return state;
}
