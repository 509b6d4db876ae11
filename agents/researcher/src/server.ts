import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import {
    AppError,
    AuthError,
    ConflictError,
    NotFoundError,
    ValidationError,
    errorMessage
} from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { ResearchServices } from './container';
import { isTerminal } from './jobs/job-registry';
import type { JobRegistry } from './jobs/job-registry';
import type { JobRunner } from './jobs/job-runner';
import type { StateStore } from './store/state-store';
import { JobStatusSchema, ResearchRequestSchema } from './types';
import type { JobRecord } from './types';

export interface AppDependencies {
    registry: JobRegistry;
    runner: JobRunner;
    store: StateStore;
    logger?: Logger;
    /** When set, every route but /health requires a matching `x-api-key` header. */
    apiKey?: string;
}

const ListJobsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(10),
    status: JobStatusSchema.optional()
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

function jobSummary(job: JobRecord) {
    return {
        jobId: job.jobId,
        status: job.status,
        query: job.query,
        createdAt: new Date(job.createdAt).toISOString(),
        completedAt: job.completedAt === undefined ? null : new Date(job.completedAt).toISOString()
    };
}

export function createApp(deps: AppDependencies): express.Express {
    const { registry, runner, store, logger, apiKey } = deps;
    const app = express();

    app.use(express.json({ limit: '100kb' }));

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            store: store.mode,
            activeJobs: runner.activeJobs,
            timestamp: new Date().toISOString()
        });
    });

    if (apiKey) {
        app.use((req, res, next) => {
            if (req.header('x-api-key') !== apiKey) {
                next(new AuthError('Invalid or missing API key'));
                return;
            }
            next();
        });
    }

    app.post('/research', asyncRoute(async (req, res) => {
        const parsed = ResearchRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            throw new ValidationError('Invalid research request', parsed.error.issues);
        }

        const job = await runner.submit(parsed.data);
        res.status(202).json({
            jobId: job.jobId,
            status: job.status,
            message: `Research job created. Use /status/${job.jobId} to check progress.`,
            statusUrl: `/status/${job.jobId}`
        });
    }));

    app.get('/status/:jobId', asyncRoute(async (req, res) => {
        const job = await registry.get(req.params.jobId);
        if (!job) throw new NotFoundError(`Job ${req.params.jobId} not found`);
        res.json(job);
    }));

    app.get('/reports/:jobId', asyncRoute(async (req, res) => {
        const report = await runner.readReport(req.params.jobId);
        if (report === undefined) throw new NotFoundError(`No report for job ${req.params.jobId}`);
        res.type('text/markdown').send(report);
    }));

    app.get('/jobs', asyncRoute(async (req, res) => {
        const parsed = ListJobsQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            throw new ValidationError('Invalid job listing query', parsed.error.issues);
        }
        const { limit, status } = parsed.data;

        const [total, filtered, jobs] = await Promise.all([
            registry.count(),
            registry.count(status),
            registry.list(limit, status)
        ]);
        res.json({ total, filtered, jobs: jobs.map(jobSummary) });
    }));

    app.delete('/jobs/:jobId', asyncRoute(async (req, res) => {
        const { jobId } = req.params;
        const outcome = await registry.delete(jobId);
        switch (outcome) {
            case 'not_found':
                throw new NotFoundError(`Job ${jobId} not found`);
            case 'not_terminal':
                throw new ConflictError('Cannot delete a job that is still running');
            case 'deleted':
                logger?.info(`Deleted job ${jobId}`);
                res.json({ message: `Job ${jobId} deleted` });
        }
    }));

    app.post('/jobs/:jobId/cancel', asyncRoute(async (req, res) => {
        const { jobId } = req.params;
        const job = await registry.get(jobId);
        if (!job) throw new NotFoundError(`Job ${jobId} not found`);
        if (isTerminal(job.status)) throw new ConflictError(`Job ${jobId} is already ${job.status}`);
        res.status(202).json({ jobId, cancelled: runner.cancel(jobId) });
    }));

    app.get('/cache/stats', (req, res) => {
        res.json(store.stats());
    });

    app.use((req, res) => {
        res.status(404).json({ error: `Route ${req.method} ${req.path} not found`, code: 'NOT_FOUND' });
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof AppError) {
            if (err.statusCode >= 500) logger?.error(`${req.method} ${req.path} failed: ${err.message}`);
            const body: Record<string, unknown> = { error: err.message, code: err.code };
            if (err instanceof ValidationError && err.details !== undefined) body.details = err.details;
            res.status(err.statusCode).json(body);
            return;
        }
        // body-parser marks malformed JSON with a 4xx status.
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
            return;
        }
        logger?.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);
        res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
    });

    return app;
}

/**
 * Starts the HTTP server and the cache sweeper; SIGINT/SIGTERM drain
 * running jobs and close the store before exiting.
 */
export async function startServer(services: ResearchServices): Promise<Server> {
    const { config, logger } = services;
    const app = createApp({
        registry: services.registry,
        runner: services.runner,
        store: services.store,
        logger: logger.child('http'),
        apiKey: config.server.apiKey
    });

    services.sweeper.start();

    const server = await new Promise<Server>((resolve, reject) => {
        const listening = app.listen(config.server.port, config.server.host, () => resolve(listening));
        listening.once('error', reject);
    });
    logger.info(`Research API listening on http://${config.server.host}:${config.server.port} (store: ${services.store.mode})`);

    const shutdown = async (signal: string): Promise<void> => {
        logger.info(`${signal} received, shutting down`);
        await new Promise<void>(resolve => server.close(() => resolve()));
        await services.shutdown();
        process.exit(0);
    };
    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));

    return server;
}
