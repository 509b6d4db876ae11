import { JOB_INDEX_KEY, JobRegistry } from '../src/jobs/job-registry';
import { MemoryStore } from '../src/store/memory-store';
import { StateStore } from '../src/store/state-store';
import type { JobRecord } from '../src/types';
import { jobResult } from './fixtures/data';

function pending(jobId: string, createdAt: number, query = `query ${jobId}`): JobRecord {
    return { jobId, status: 'pending', query, createdAt };
}

describe('JobRegistry', () => {
    let now: number;
    let store: StateStore;
    let registry: JobRegistry;

    beforeEach(async () => {
        now = 1_700_000_000_000;
        store = await StateStore.connect({ fallback: new MemoryStore(() => now) });
        registry = new JobRegistry({ store, clock: () => now });
    });

    it('should return the record it created', async () => {
        const record = pending('job-1', now);

        expect(await registry.create('job-1', record)).toBe(true);
        expect(await registry.get('job-1')).toEqual(record);
        expect(await registry.exists('job-1')).toBe(true);
        expect(await store.indexMembers(JOB_INDEX_KEY)).toEqual(['job-1']);
    });

    it('should reject an invalid record', async () => {
        expect(await registry.create('', pending('', now))).toBe(false);
        expect(await registry.count()).toBe(0);
    });

    it('should not update a job that does not exist', async () => {
        expect(await registry.update('missing', { status: 'running' })).toBe(false);
        expect(await registry.get('missing')).toBeUndefined();
    });

    it('should record the lifecycle timestamps', async () => {
        await registry.create('job-1', pending('job-1', now));

        now += 100;
        expect(await registry.markRunning('job-1')).toBe(true);
        now += 900;
        expect(await registry.markCompleted('job-1', jobResult())).toBe(true);

        const job = await registry.get('job-1');
        expect(job?.status).toBe('completed');
        expect(job?.startedAt).toBe(1_700_000_000_100);
        expect(job?.completedAt).toBe(1_700_000_001_000);
        expect(job?.result?.processingTimeMs).toBe(1234);
    });

    it('should keep jobId and createdAt through updates', async () => {
        await registry.create('job-1', pending('job-1', now));

        await registry.update('job-1', { query: 'renamed' });

        expect(await registry.get('job-1')).toEqual({ ...pending('job-1', now), query: 'renamed' });
    });

    it('should freeze a job once it is terminal', async () => {
        await registry.create('job-1', pending('job-1', now));
        await registry.markFailed('job-1', 'search provider down');

        expect(await registry.markCompleted('job-1', jobResult())).toBe(false);
        const job = await registry.get('job-1');
        expect(job?.status).toBe('failed');
        expect(job?.error).toBe('search provider down');
    });

    it('should list the most recent jobs first', async () => {
        for (let i = 1; i <= 5; i++) {
            await registry.create(`job-${i}`, pending(`job-${i}`, now + i));
        }

        const jobs = await registry.list(2);

        expect(jobs.map(j => j.jobId)).toEqual(['job-5', 'job-4']);
        expect(await registry.list(0)).toEqual([]);
        expect(await registry.count()).toBe(5);
    });

    it('should keep creation order for jobs created in the same millisecond', async () => {
        for (const id of ['b', 'a', 'd', 'c', 'e']) {
            await registry.create(id, pending(id, now));
        }

        expect((await registry.list(2)).map(j => j.jobId)).toEqual(['e', 'c']);
        expect(await store.indexMembers(JOB_INDEX_KEY)).toEqual(['e', 'c', 'd', 'a', 'b']);
        expect((await registry.get('e'))?.createdAt).toBe(now);
    });

    it('should filter by status before applying the limit', async () => {
        for (let i = 1; i <= 4; i++) {
            await registry.create(`job-${i}`, pending(`job-${i}`, now + i));
        }
        await registry.markRunning('job-1');
        await registry.markRunning('job-3');

        expect((await registry.list(10, 'running')).map(j => j.jobId)).toEqual(['job-3', 'job-1']);
        expect(await registry.count('pending')).toBe(2);
    });

    it('should delete only terminal jobs, and only once', async () => {
        await registry.create('job-1', pending('job-1', now));

        expect(await registry.delete('job-1')).toBe('not_terminal');

        await registry.markFailed('job-1', 'boom');
        expect(await registry.delete('job-1')).toBe('deleted');
        expect(await registry.delete('job-1')).toBe('not_found');
        expect(await store.indexCount(JOB_INDEX_KEY)).toBe(0);
    });

    it('should skip index entries whose record is gone', async () => {
        await registry.create('job-1', pending('job-1', now));
        await registry.create('job-2', pending('job-2', now + 1));
        await store.delete('job:job-2');

        expect((await registry.list(10)).map(j => j.jobId)).toEqual(['job-1']);
        expect(await registry.count()).toBe(1);
    });

    it('should purge finished jobs older than the cutoff', async () => {
        await registry.create('old', pending('old', now));
        await registry.create('recent', pending('recent', now + 1));
        await registry.create('active', pending('active', now + 2));
        await registry.markCompleted('old', jobResult());
        now += 10_000;
        await registry.markCompleted('recent', jobResult());
        now += 1_000;

        expect(await registry.purgeFinished(5_000)).toBe(1);
        expect((await registry.list(10)).map(j => j.jobId)).toEqual(['active', 'recent']);
    });
});
