import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JobRegistry } from '../src/jobs/job-registry';
import { JobRunner, UNSTORABLE_RESULT_ERROR } from '../src/jobs/job-runner';
import type { RunOptions } from '../src/pipeline/orchestrator';
import { MemoryStore } from '../src/store/memory-store';
import { StateStore } from '../src/store/state-store';
import { emptyVisualization } from '../src/types';
import type { PipelineResult } from '../src/types';
import { completedState, searchResult } from './fixtures/data';

function pipelineResult(overrides: Partial<PipelineResult> = {}): PipelineResult {
    return {
        state: completedState(),
        visualization: emptyVisualization(),
        report: '# Research Report: solar power\n',
        processingTimeMs: 42,
        ...overrides
    };
}

describe('JobRunner', () => {
    let reportsDir: string;
    let registry: JobRegistry;
    let ids: number;

    beforeEach(async () => {
        reportsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reports-'));
        const store = await StateStore.connect({ fallback: new MemoryStore() });
        registry = new JobRegistry({ store });
        ids = 0;
    });

    afterEach(() => {
        fs.rmSync(reportsDir, { recursive: true, force: true });
    });

    function createRunner(run: (query: string, options?: RunOptions) => Promise<PipelineResult>, dir: string | null = reportsDir) {
        return new JobRunner({ registry, pipeline: { run }, reportsDir: dir, idGenerator: () => `job-${++ids}` });
    }

    it('should return a pending job and complete it in the background', async () => {
        const run = vi.fn(async () => pipelineResult());
        const runner = createRunner(run);

        const job = await runner.submit({ query: 'solar power', includeImages: false, includeVideos: true, includeNews: true });

        expect(job).toMatchObject({ jobId: 'job-1', status: 'pending', query: 'solar power' });
        expect(runner.activeJobs).toBe(1);
        await runner.waitFor('job-1');

        const record = await registry.get('job-1');
        expect(record?.status).toBe('completed');
        expect(record?.result?.processingTimeMs).toBe(42);
        expect(record?.result?.reportPath).toBe(path.join(reportsDir, 'job-1.md'));
        expect(runner.activeJobs).toBe(0);
        expect(run).toHaveBeenCalledWith('solar power', expect.objectContaining({ includeImages: false, jobId: 'job-1' }));
    });

    it('should write the report and read it back', async () => {
        const runner = createRunner(async () => pipelineResult());

        await runner.submit({ query: 'solar power', includeImages: true, includeVideos: true, includeNews: true });
        await runner.drain();

        expect(fs.readFileSync(path.join(reportsDir, 'job-1.md'), 'utf-8')).toBe('# Research Report: solar power\n');
        expect(await runner.readReport('job-1')).toBe('# Research Report: solar power\n');
        expect(await runner.readReport('job-2')).toBeUndefined();
        expect(await runner.readReport('../etc/passwd')).toBeUndefined();
    });

    it('should record a failed pipeline with its error', async () => {
        const state = { ...completedState(), status: 'failed' as const };
        const runner = createRunner(async () => pipelineResult({ state, report: null, error: 'quota exceeded' }));

        await runner.submit({ query: 'q', includeImages: true, includeVideos: true, includeNews: true });
        await runner.drain();

        const record = await registry.get('job-1');
        expect(record?.status).toBe('failed');
        expect(record?.error).toBe('quota exceeded');
        expect(record?.result?.reportPath).toBeUndefined();
    });

    it('should mark the job failed when the pipeline throws', async () => {
        const runner = createRunner(async () => {
            throw new Error('unexpected');
        });

        await runner.submit({ query: 'q', includeImages: true, includeVideos: true, includeNews: true });
        await runner.drain();

        const record = await registry.get('job-1');
        expect(record?.status).toBe('failed');
        expect(record?.error).toBe('unexpected');
    });

    it('should fail a job whose result the registry rejects', async () => {
        const state = completedState();
        state.searchResults = [{ ...searchResult(1), credibility: Number.NaN }];
        const runner = createRunner(async () => pipelineResult({ state }));

        await runner.submit({ query: 'q', includeImages: true, includeVideos: true, includeNews: true });
        await runner.waitFor('job-1');

        const record = await registry.get('job-1');
        expect(record?.status).toBe('failed');
        expect(record?.error).toBe(UNSTORABLE_RESULT_ERROR);
        expect(record?.result).toBeUndefined();
        expect(runner.activeJobs).toBe(0);
    });

    it('should abort the signal of a cancelled job', async () => {
        let seen: AbortSignal | undefined;
        const runner = createRunner((_query, options) => new Promise(resolve => {
            seen = options?.signal;
            options?.signal?.addEventListener('abort', () => {
                resolve(pipelineResult({ state: { ...completedState(), status: 'failed' }, report: null, error: 'cancelled' }));
            });
        }));

        await runner.submit({ query: 'q', includeImages: true, includeVideos: true, includeNews: true });
        await vi.waitFor(() => expect(seen).toBeDefined());

        expect(runner.cancel('job-1')).toBe(true);
        await runner.waitFor('job-1');

        expect(seen?.aborted).toBe(true);
        expect((await registry.get('job-1'))?.status).toBe('failed');
        expect(runner.cancel('job-1')).toBe(false);
    });

    it('should not save reports when the reports directory is disabled', async () => {
        const runner = createRunner(async () => pipelineResult(), null);

        await runner.submit({ query: 'q', includeImages: true, includeVideos: true, includeNews: true });
        await runner.drain();

        expect((await registry.get('job-1'))?.result?.reportPath).toBeUndefined();
        expect(await runner.readReport('job-1')).toBeUndefined();
    });
});
