import { InvalidArgumentError } from 'commander';
import { JobStatusSchema } from '../types';
import { SEARCH_TYPES } from './search-types';
import type { SearchType } from './search-types';
import type { JobStatus } from '../types';

function parseIntegerIn(value: string, min: number, max: number): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        throw new InvalidArgumentError(`Must be an integer between ${min} and ${max}.`);
    }
    return parsed;
}

export const parseMaxResults = (value: string): number => parseIntegerIn(value, 1, 10);

export const parsePort = (value: string): number => parseIntegerIn(value, 1, 65535);

export const parseLimit = (value: string): number => parseIntegerIn(value, 1, 1000);

export function parseHours(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive number of hours.');
    }
    return parsed;
}

export function parseJobStatus(value: string): JobStatus {
    const parsed = JobStatusSchema.safeParse(value);
    if (!parsed.success) {
        throw new InvalidArgumentError(`Must be one of: ${JobStatusSchema.options.join(', ')}.`);
    }
    return parsed.data;
}

export function parseSearchType(value: string): SearchType {
    const match = SEARCH_TYPES.find(type => type === value);
    if (!match) {
        throw new InvalidArgumentError(`Must be one of: ${SEARCH_TYPES.join(', ')}.`);
    }
    return match;
}
