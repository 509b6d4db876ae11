/**
 * Job Registry
 *
 * Sole mutator of job records. Each record lives at `job:<id>`; the sorted
 * index `jobs:list` orders ids by creation time. The two are written
 * separately and may disagree (a record can vanish while its id is still
 * indexed), so every read path skips ids it cannot resolve.
 */

import { errorMessage } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { StateStore } from '../store/state-store';
import { JobRecordSchema, TERMINAL_JOB_STATUSES } from '../types';
import type { JobRecord, JobResult, JobStatus } from '../types';

export const JOB_INDEX_KEY = 'jobs:list';

export type JobUpdate = Partial<Omit<JobRecord, 'jobId' | 'createdAt'>>;

export type DeleteOutcome = 'deleted' | 'not_found' | 'not_terminal';

export interface JobRegistryOptions {
    store: StateStore;
    logger?: Logger;
    clock?: () => number;
}

export function isTerminal(status: JobStatus): boolean {
    return TERMINAL_JOB_STATUSES.has(status);
}

export class JobRegistry {
    private store: StateStore;
    private logger?: Logger;
    private clock: () => number;
    private lastScore = Number.NEGATIVE_INFINITY;

    constructor(options: JobRegistryOptions) {
        this.store = options.store;
        this.logger = options.logger;
        this.clock = options.clock ?? Date.now;
    }

    private key(jobId: string): string {
        return `job:${jobId}`;
    }

    /** Writes the record and indexes it; false when the write fails. */
    async create(jobId: string, record: JobRecord): Promise<boolean> {
        const parsed = JobRecordSchema.safeParse({ ...record, jobId });
        if (!parsed.success) {
            this.logger?.warn(`Rejected job ${jobId}: ${parsed.error.issues[0]?.message ?? 'invalid record'}`);
            return false;
        }
        try {
            if (!(await this.store.set(this.key(jobId), parsed.data))) return false;
            await this.store.indexAdd(JOB_INDEX_KEY, jobId, this.nextScore(parsed.data.createdAt));
            this.logger?.debug(`Created job ${jobId}`);
            return true;
        } catch (e) {
            this.logger?.error(`Failed to create job ${jobId}: ${errorMessage(e)}`);
            return false;
        }
    }

    /** Strictly increasing, so jobs created in the same millisecond keep their order. */
    private nextScore(createdAt: number): number {
        this.lastScore = Math.max(createdAt, this.lastScore + 1);
        return this.lastScore;
    }

    async get(jobId: string): Promise<JobRecord | undefined> {
        return this.store.getParsed(this.key(jobId), JobRecordSchema);
    }

    async exists(jobId: string): Promise<boolean> {
        return (await this.get(jobId)) !== undefined;
    }

    /**
     * Read-modify-write merge of `fields`. False when the job is missing,
     * already terminal, or the merged record is invalid.
     */
    async update(jobId: string, fields: JobUpdate): Promise<boolean> {
        const current = await this.get(jobId);
        if (!current) {
            this.logger?.debug(`Update skipped, job ${jobId} not found`);
            return false;
        }
        if (isTerminal(current.status)) {
            this.logger?.warn(`Update skipped, job ${jobId} is already ${current.status}`);
            return false;
        }

        const merged = JobRecordSchema.safeParse({ ...current, ...fields, jobId, createdAt: current.createdAt });
        if (!merged.success) {
            this.logger?.warn(`Update of job ${jobId} rejected: ${merged.error.issues[0]?.message ?? 'invalid record'}`);
            return false;
        }
        return this.store.set(this.key(jobId), merged.data);
    }

    markRunning(jobId: string): Promise<boolean> {
        return this.update(jobId, { status: 'running', startedAt: this.clock() });
    }

    markCompleted(jobId: string, result: JobResult): Promise<boolean> {
        return this.update(jobId, { status: 'completed', completedAt: this.clock(), result });
    }

    markFailed(jobId: string, error: string, result?: JobResult): Promise<boolean> {
        return this.update(jobId, { status: 'failed', completedAt: this.clock(), error, result });
    }

    /** Only terminal jobs can be deleted. Deleting twice reports `not_found`. */
    async delete(jobId: string): Promise<DeleteOutcome> {
        const current = await this.get(jobId);
        if (!current) {
            await this.store.indexRemove(JOB_INDEX_KEY, jobId);
            return 'not_found';
        }
        if (!isTerminal(current.status)) return 'not_terminal';

        await this.store.delete(this.key(jobId));
        await this.store.indexRemove(JOB_INDEX_KEY, jobId);
        this.logger?.debug(`Deleted job ${jobId}`);
        return 'deleted';
    }

    /**
     * Most recent first, optionally filtered by status, at most `limit`.
     * Resolves every indexed id, so cost grows with the total job count.
     */
    async list(limit: number, status?: JobStatus): Promise<JobRecord[]> {
        if (limit <= 0) return [];
        const jobs: JobRecord[] = [];
        for (const record of await this.resolveAll()) {
            if (status && record.status !== status) continue;
            jobs.push(record);
            if (jobs.length >= limit) break;
        }
        return jobs;
    }

    async count(status?: JobStatus): Promise<number> {
        if (!status) {
            return (await this.resolveAll()).length;
        }
        return (await this.resolveAll()).filter(r => r.status === status).length;
    }

    /** Deletes terminal jobs that finished more than `maxAgeMs` ago; returns how many. */
    async purgeFinished(maxAgeMs: number): Promise<number> {
        const cutoff = this.clock() - maxAgeMs;
        let purged = 0;
        for (const record of await this.resolveAll()) {
            if (!isTerminal(record.status)) continue;
            if ((record.completedAt ?? record.createdAt) >= cutoff) continue;
            if ((await this.delete(record.jobId)) === 'deleted') purged++;
        }
        if (purged > 0) this.logger?.info(`Purged ${purged} finished jobs`);
        return purged;
    }

    private async resolveAll(): Promise<JobRecord[]> {
        try {
            const ids = await this.store.indexMembers(JOB_INDEX_KEY);
            const records: JobRecord[] = [];
            for (const id of ids) {
                const record = await this.get(id);
                if (record) records.push(record);
            }
            return records;
        } catch (e) {
            this.logger?.error(`Failed to read job index: ${errorMessage(e)}`);
            return [];
        }
    }
}
