/**
 * Builds the object graph for one process: store, registry, collaborators,
 * pipeline, job runner and cache sweeper. Tests pass their own backend and
 * collaborators; everything else comes from configuration.
 */

import { Logger, createTelemetry } from '@content-research/shared';
import type { Telemetry } from '@content-research/shared';
import type { ResearcherConfig } from './config';
import { JobRegistry } from './jobs/job-registry';
import { JobRunner } from './jobs/job-runner';
import type { PipelineCollaborators, SearchProvider } from './pipeline/collaborators';
import { ResearchPipeline } from './pipeline/orchestrator';
import { MarkdownReportRenderer } from './report/markdown-report';
import { LlmCredibilityScorer } from './services/credibility';
import { StoreDocumentSink } from './services/document-sink';
import { GoogleSearchClient } from './services/google-search';
import { LlmAnalyzer } from './services/llm-analyzer';
import { ChatClient } from './services/llm-client';
import { WebScraper } from './services/web-scraper';
import { CacheSweeper } from './store/cache-sweeper';
import { getFallbackStore } from './store/memory-store';
import type { MemoryStore } from './store/memory-store';
import type { NetworkBackend } from './store/network-backend';
import { RedisBackend } from './store/redis-backend';
import { StateStore } from './store/state-store';
import { ChartDataBuilder } from './visualization/chart-data';

export interface ResearchServicesOptions {
    config: ResearcherConfig;
    logger?: Logger;
    /** Overrides the Redis backend built from config; null runs on the fallback only. */
    backend?: NetworkBackend | null;
    fallback?: MemoryStore;
    collaborators?: Partial<PipelineCollaborators>;
    telemetry?: Telemetry;
}

export interface ResearchServices {
    config: ResearcherConfig;
    logger: Logger;
    store: StateStore;
    search: SearchProvider;
    registry: JobRegistry;
    pipeline: ResearchPipeline;
    runner: JobRunner;
    sweeper: CacheSweeper;
    telemetry: Telemetry;
    shutdown(): Promise<void>;
}

export function createRootLogger(config: ResearcherConfig): Logger {
    return new Logger({
        service: 'researcher',
        level: config.log.level,
        environment: config.log.environment ?? (process.env.NODE_ENV === 'production' ? 'production' : 'development')
    });
}

function createBackend(config: ResearcherConfig, logger: Logger): NetworkBackend | null {
    if (!config.redis.enabled) return null;
    return new RedisBackend({
        host: config.redis.host,
        port: config.redis.port,
        db: config.redis.db,
        password: config.redis.password,
        keyPrefix: config.redis.keyPrefix,
        connectTimeoutMs: config.redis.connectTimeoutMs,
        logger
    });
}

export async function createResearchServices(options: ResearchServicesOptions): Promise<ResearchServices> {
    const { config } = options;
    const logger = options.logger ?? createRootLogger(config);

    const backend = options.backend !== undefined ? options.backend : createBackend(config, logger.child('redis'));
    const store = await StateStore.connect({
        backend,
        fallback: options.fallback ?? getFallbackStore(),
        logger: logger.child('store')
    });

    const chat = new ChatClient({ config: config.llm, logger: logger.child('llm') });
    const collaborators: PipelineCollaborators = {
        search: new GoogleSearchClient({
            config: config.search,
            store,
            ttlSeconds: config.cache.searchTtlSeconds,
            logger: logger.child('search')
        }),
        scraper: new WebScraper({
            config: config.scraper,
            store,
            ttlSeconds: config.cache.scrapeTtlSeconds,
            logger: logger.child('scraper')
        }),
        sink: new StoreDocumentSink(store, config.cache.documentTtlSeconds, logger.child('documents')),
        analyzer: new LlmAnalyzer({ chat, maxTopics: config.llm.maxTopics, logger: logger.child('analysis') }),
        credibility: config.llm.apiKey ? new LlmCredibilityScorer(chat, logger.child('credibility')) : undefined,
        visualizer: new ChartDataBuilder(logger.child('charts')),
        renderer: new MarkdownReportRenderer(),
        ...options.collaborators
    };

    const telemetry = options.telemetry ?? createTelemetry('researcher', logger.child('telemetry'));
    const pipeline = new ResearchPipeline({
        collaborators,
        settings: config.pipeline,
        logger: logger.child('pipeline'),
        telemetry
    });
    const registry = new JobRegistry({ store, logger: logger.child('jobs') });
    const runner = new JobRunner({
        registry,
        pipeline,
        reportsDir: config.jobs.reportsDir,
        logger: logger.child('runner')
    });
    const sweeper = new CacheSweeper(store, config.cache.sweepIntervalSeconds * 1000, logger.child('sweeper'));

    return {
        config,
        logger,
        store,
        search: collaborators.search,
        registry,
        pipeline,
        runner,
        sweeper,
        telemetry,
        async shutdown(): Promise<void> {
            sweeper.stop();
            await runner.drain();
            await telemetry.shutdown();
            await store.close();
        }
    };
}
