import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AppError, errorMessage } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { RunOptions } from '../pipeline/orchestrator';
import type { JobRecord, JobResult, PipelineResult, ResearchRequest } from '../types';
import type { JobRegistry } from './job-registry';

export interface PipelineRunner {
    run(query: string, options?: RunOptions): Promise<PipelineResult>;
}

export interface JobRunnerOptions {
    registry: JobRegistry;
    pipeline: PipelineRunner;
    /** Reports are written to `<reportsDir>/<jobId>.md`; null disables saving. */
    reportsDir?: string | null;
    logger?: Logger;
    clock?: () => number;
    idGenerator?: () => string;
}

export const UNSTORABLE_RESULT_ERROR = 'Job result could not be stored';

interface ActiveJob {
    controller: AbortController;
    done: Promise<void>;
}

/**
 * Accepts research requests as jobs and runs each pipeline in the
 * background, recording its lifecycle in the registry.
 */
export class JobRunner {
    private registry: JobRegistry;
    private pipeline: PipelineRunner;
    private reportsDir: string | null;
    private logger?: Logger;
    private clock: () => number;
    private idGenerator: () => string;
    private active: Map<string, ActiveJob> = new Map();

    constructor(options: JobRunnerOptions) {
        this.registry = options.registry;
        this.pipeline = options.pipeline;
        this.reportsDir = options.reportsDir === undefined ? 'reports' : options.reportsDir;
        this.logger = options.logger;
        this.clock = options.clock ?? Date.now;
        this.idGenerator = options.idGenerator ?? uuidv4;
    }

    get activeJobs(): number {
        return this.active.size;
    }

    /** Creates a pending job and starts it without waiting for the run. */
    async submit(request: ResearchRequest): Promise<JobRecord> {
        const jobId = this.idGenerator();
        const record: JobRecord = {
            jobId,
            status: 'pending',
            query: request.query,
            createdAt: this.clock()
        };

        if (!(await this.registry.create(jobId, record))) {
            throw new AppError('Failed to create research job', 'JOB_CREATE_FAILED', 500);
        }

        const controller = new AbortController();
        const done = this.execute(jobId, request, controller.signal).finally(() => {
            this.active.delete(jobId);
        });
        this.active.set(jobId, { controller, done });
        this.logger?.info(`Job ${jobId} submitted`, { query: request.query });
        return record;
    }

    /** Aborts a job that is still running here; false if it is not. */
    cancel(jobId: string): boolean {
        const job = this.active.get(jobId);
        if (!job) return false;
        job.controller.abort();
        this.logger?.info(`Job ${jobId} cancellation requested`);
        return true;
    }

    async waitFor(jobId: string): Promise<void> {
        await this.active.get(jobId)?.done;
    }

    /** Resolves once every job running at call time has settled. */
    async drain(): Promise<void> {
        await Promise.all(Array.from(this.active.values(), job => job.done));
    }

    async readReport(jobId: string): Promise<string | undefined> {
        const reportPath = this.reportPath(jobId);
        if (!reportPath) return undefined;
        try {
            return await fs.readFile(reportPath, 'utf-8');
        } catch (e) {
            this.logger?.debug(`No report for job ${jobId}: ${errorMessage(e)}`);
            return undefined;
        }
    }

    private reportPath(jobId: string): string | null {
        if (!this.reportsDir || !/^[\w-]+$/.test(jobId)) return null;
        return path.join(this.reportsDir, `${jobId}.md`);
    }

    private async execute(jobId: string, request: ResearchRequest, signal: AbortSignal): Promise<void> {
        try {
            await this.registry.markRunning(jobId);
            const result = await this.pipeline.run(request.query, {
                includeImages: request.includeImages,
                includeVideos: request.includeVideos,
                includeNews: request.includeNews,
                maxResults: request.maxResults,
                signal,
                jobId
            });

            const jobResult: JobResult = {
                state: result.state,
                visualization: result.visualization,
                processingTimeMs: result.processingTimeMs,
                reportPath: result.report ? await this.saveReport(jobId, result.report) : undefined
            };

            if (result.state.status === 'completed') {
                if (await this.registry.markCompleted(jobId, jobResult)) {
                    this.logger?.info(`Job ${jobId} completed in ${result.processingTimeMs.toFixed(0)}ms`);
                } else {
                    await this.recordUnstorableResult(jobId);
                }
            } else if (await this.registry.markFailed(jobId, result.error ?? 'Pipeline failed', jobResult)) {
                this.logger?.warn(`Job ${jobId} failed: ${result.error ?? 'unknown error'}`);
            } else {
                await this.recordUnstorableResult(jobId);
            }
        } catch (e) {
            this.logger?.error(`Job ${jobId} crashed: ${errorMessage(e)}`);
            try {
                await this.registry.markFailed(jobId, errorMessage(e));
            } catch (inner) {
                this.logger?.error(`Could not record failure of job ${jobId}: ${errorMessage(inner)}`);
            }
        }
    }

    /** The result was rejected by the registry; fail the job without it. */
    private async recordUnstorableResult(jobId: string): Promise<void> {
        this.logger?.error(`Job ${jobId} result could not be stored`);
        if (!(await this.registry.markFailed(jobId, UNSTORABLE_RESULT_ERROR))) {
            this.logger?.error(`Could not record failure of job ${jobId}`);
        }
    }

    private async saveReport(jobId: string, report: string): Promise<string | undefined> {
        const reportPath = this.reportPath(jobId);
        if (!reportPath) return undefined;
        try {
            await fs.mkdir(path.dirname(reportPath), { recursive: true });
            await fs.writeFile(reportPath, report, 'utf-8');
            this.logger?.info(`Saved report to ${reportPath}`);
            return reportPath;
        } catch (e) {
            this.logger?.error(`Failed to save report for job ${jobId}: ${errorMessage(e)}`);
            return undefined;
        }
    }
}
