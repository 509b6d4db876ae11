import request from 'supertest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JobRegistry } from '../src/jobs/job-registry';
import { JobRunner } from '../src/jobs/job-runner';
import type { PipelineRunner } from '../src/jobs/job-runner';
import { createApp } from '../src/server';
import { MemoryStore } from '../src/store/memory-store';
import { StateStore } from '../src/store/state-store';
import { emptyVisualization } from '../src/types';
import { completedState, jobResult } from './fixtures/data';

describe('HTTP API', () => {
    let reportsDir: string;
    let store: StateStore;
    let registry: JobRegistry;
    let runner: JobRunner;
    let pipeline: PipelineRunner;

    beforeEach(async () => {
        reportsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'api-reports-'));
        store = await StateStore.connect({ fallback: new MemoryStore() });
        registry = new JobRegistry({ store });
        pipeline = {
            run: vi.fn(async () => ({
                state: completedState(),
                visualization: emptyVisualization(),
                report: '# Report',
                processingTimeMs: 10
            }))
        };
        runner = new JobRunner({ registry, pipeline, reportsDir, idGenerator: () => 'job-1' });
    });

    afterEach(async () => {
        await runner.drain();
        fs.rmSync(reportsDir, { recursive: true, force: true });
    });

    const app = () => createApp({ registry, runner, store });

    it('should report health', async () => {
        const res = await request(app()).get('/health');

        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ status: 'ok', store: 'fallback', activeJobs: 0 });
    });

    it('should accept a research request with 202', async () => {
        const res = await request(app()).post('/research').send({ query: 'solar power', maxResults: 3 });

        expect(res.status).toBe(202);
        expect(res.body).toEqual({
            jobId: 'job-1',
            status: 'pending',
            message: 'Research job created. Use /status/job-1 to check progress.',
            statusUrl: '/status/job-1'
        });

        await runner.drain();
        const status = await request(app()).get('/status/job-1');
        expect(status.status).toBe(200);
        expect(status.body.status).toBe('completed');
        expect(pipeline.run).toHaveBeenCalledWith('solar power', expect.objectContaining({ maxResults: 3, includeImages: true }));
    });

    it('should reject an empty query', async () => {
        const res = await request(app()).post('/research').send({ query: '   ' });

        expect(res.status).toBe(400);
        expect(res.body.code).toBe('VALIDATION_ERROR');
        expect(res.body.details).toBeInstanceOf(Array);
    });

    it('should reject malformed JSON', async () => {
        const res = await request(app()).post('/research').set('Content-Type', 'application/json').send('{"query":');

        expect(res.status).toBe(400);
        expect(res.body).toEqual({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
    });

    it('should 404 an unknown job', async () => {
        const res = await request(app()).get('/status/nope');

        expect(res.status).toBe(404);
        expect(res.body).toEqual({ error: 'Job nope not found', code: 'NOT_FOUND' });
    });

    it('should list jobs with totals', async () => {
        await registry.create('a', { jobId: 'a', status: 'pending', query: 'first', createdAt: 1000 });
        await registry.create('b', { jobId: 'b', status: 'pending', query: 'second', createdAt: 2000 });
        await registry.markCompleted('b', jobResult());

        const res = await request(app()).get('/jobs').query({ limit: 1 });

        expect(res.status).toBe(200);
        expect(res.body.total).toBe(2);
        expect(res.body.filtered).toBe(2);
        expect(res.body.jobs).toHaveLength(1);
        expect(res.body.jobs[0]).toMatchObject({ jobId: 'b', status: 'completed', query: 'second', createdAt: '1970-01-01T00:00:02.000Z' });

        const pendingOnly = await request(app()).get('/jobs').query({ status: 'pending' });
        expect(pendingOnly.body.filtered).toBe(1);
        expect(pendingOnly.body.jobs[0]).toEqual({
            jobId: 'a', status: 'pending', query: 'first', createdAt: '1970-01-01T00:00:01.000Z', completedAt: null
        });
    });

    it('should reject an unknown status filter', async () => {
        const res = await request(app()).get('/jobs').query({ status: 'archived' });

        expect(res.status).toBe(400);
    });

    it('should refuse to delete a job that is still running', async () => {
        await registry.create('a', { jobId: 'a', status: 'pending', query: 'q', createdAt: 1000 });
        await registry.markRunning('a');

        const res = await request(app()).delete('/jobs/a');

        expect(res.status).toBe(409);
        expect(res.body.code).toBe('CONFLICT');
    });

    it('should delete a finished job once', async () => {
        await registry.create('a', { jobId: 'a', status: 'pending', query: 'q', createdAt: 1000 });
        await registry.markFailed('a', 'boom');

        const first = await request(app()).delete('/jobs/a');
        const second = await request(app()).delete('/jobs/a');

        expect(first.status).toBe(200);
        expect(first.body).toEqual({ message: 'Job a deleted' });
        expect(second.status).toBe(404);
    });

    it('should serve a saved report as markdown', async () => {
        await request(app()).post('/research').send({ query: 'solar power' });
        await runner.drain();

        const res = await request(app()).get('/reports/job-1');

        expect(res.status).toBe(200);
        expect(res.headers['content-type']).toMatch(/^text\/markdown/);
        expect(res.text).toBe('# Report');
    });

    it('should refuse to cancel a finished job', async () => {
        await registry.create('a', { jobId: 'a', status: 'pending', query: 'q', createdAt: 1000 });
        await registry.markFailed('a', 'boom');

        const res = await request(app()).post('/jobs/a/cancel');

        expect(res.status).toBe(409);
    });

    it('should expose store statistics', async () => {
        const res = await request(app()).get('/cache/stats');

        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ mode: 'fallback', backend: 'memory' });
    });

    it('should require the api key when one is configured', async () => {
        const secured = createApp({ registry, runner, store, apiKey: 'test-secret' });

        expect((await request(secured).get('/health')).status).toBe(200);
        expect((await request(secured).get('/jobs')).status).toBe(401);
        expect((await request(secured).get('/jobs').set('x-api-key', 'test-secret')).status).toBe(200);
    });

    it('should 404 unknown routes', async () => {
        const res = await request(app()).get('/nowhere');

        expect(res.status).toBe(404);
        expect(res.body.code).toBe('NOT_FOUND');
    });
});
