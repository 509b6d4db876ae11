/**
 * Research Pipeline Orchestrator
 *
 * Sequences the phases of one research run:
 *   searching → scraping → storing → analyzing → visualizing → generating_report → completed
 *
 * Phases run one after another; parallelism happens only inside a phase,
 * through fanOut or a PhaseAggregator. Collaborator failures are absorbed
 * where the phase can continue without them. Anything else that escapes a
 * phase is caught once in `run`, which marks the state `failed` and still
 * returns a result.
 */

import { performance } from 'perf_hooks';
import { CancelledError, errorMessage, toError } from '@content-research/shared';
import type { Logger, Telemetry, TraceHandle } from '@content-research/shared';
import { DEFAULT_SCRAPE_CONCURRENCY, fanOut } from '../concurrency/fan-out';
import { PhaseAggregator } from '../concurrency/phase-aggregator';
import { emptyVisualization, scrapeFailure } from '../types';
import type {
    ImageResult,
    PipelineResult,
    PipelineState,
    PipelineStatus,
    SearchResult,
    VideoResult,
    VisualizationData
} from '../types';
import type { PipelineCollaborators } from './collaborators';
import { advanceStatus, createPipelineState, isFinished } from './state';

export interface PipelineSettings {
    /** Results per search source; twice this many links are scraped. */
    maxSearchResults: number;
    scrapeConcurrency: number;
    credibilityConcurrency: number;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
    maxSearchResults: 5,
    scrapeConcurrency: DEFAULT_SCRAPE_CONCURRENCY,
    credibilityConcurrency: DEFAULT_SCRAPE_CONCURRENCY
};

export interface RunOptions {
    includeImages?: boolean;
    includeVideos?: boolean;
    includeNews?: boolean;
    maxResults?: number;
    /** Checked before every phase and before each scrape starts. */
    signal?: AbortSignal;
    jobId?: string;
}

export interface ResearchPipelineOptions {
    collaborators: PipelineCollaborators;
    settings?: Partial<PipelineSettings>;
    logger?: Logger;
    telemetry?: Telemetry;
    /** Monotonic milliseconds for processingTimeMs. */
    timer?: () => number;
    clock?: () => Date;
}

interface SecondarySearches {
    news: SearchResult[];
    images: ImageResult[];
    videos: VideoResult[];
}

export class ResearchPipeline {
    private collaborators: PipelineCollaborators;
    private settings: PipelineSettings;
    private logger?: Logger;
    private telemetry?: Telemetry;
    private timer: () => number;
    private clock: () => Date;

    constructor(options: ResearchPipelineOptions) {
        this.collaborators = options.collaborators;
        this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...options.settings };
        this.logger = options.logger;
        this.telemetry = options.telemetry;
        this.timer = options.timer ?? (() => performance.now());
        this.clock = options.clock ?? (() => new Date());
    }

    async run(query: string, options: RunOptions = {}): Promise<PipelineResult> {
        const started = this.timer();
        const state = createPipelineState(query, this.clock());
        const trace = this.telemetry?.startTrace('research-pipeline', { query }, { jobId: options.jobId }) ?? null;
        this.logger?.info(`Starting pipeline for query: ${query}`, { jobId: options.jobId });

        try {
            await this.phase(state, 'searching', trace, options.signal, () => this.searchPhase(state, options));
            await this.phase(state, 'scraping', trace, options.signal, () => this.scrapePhase(state, options));
            await this.phase(state, 'storing', trace, options.signal, () => this.storePhase(state));
            await this.phase(state, 'analyzing', trace, options.signal, () => this.analyzePhase(state, options));
            const visualization = await this.phase(state, 'visualizing', trace, options.signal, () => this.visualizePhase(state));
            const report = await this.phase(state, 'generating_report', trace, options.signal, () => this.reportPhase(state, visualization));
            advanceStatus(state, 'completed', this.clock());

            const processingTimeMs = this.timer() - started;
            this.logger?.info(`Pipeline completed in ${processingTimeMs.toFixed(0)}ms`, { jobId: options.jobId });
            this.telemetry?.endTrace(trace, { status: state.status, processingTimeMs }, true);
            return { state, visualization, report, processingTimeMs };
        } catch (e) {
            const error = toError(e);
            if (!isFinished(state.status)) {
                advanceStatus(state, 'failed', this.clock());
            }
            const processingTimeMs = this.timer() - started;
            this.logger?.error(`Pipeline failed: ${error.message}`, { jobId: options.jobId });
            this.telemetry?.trackEvent(trace, 'pipeline_failed', { error: error.message }, 'ERROR');
            this.telemetry?.endTrace(trace, { status: state.status, error: error.message }, false);
            return {
                state,
                visualization: emptyVisualization(),
                report: null,
                processingTimeMs,
                error: error.message
            };
        }
    }

    private async phase<T>(
        state: PipelineState,
        status: PipelineStatus,
        trace: TraceHandle | null,
        signal: AbortSignal | undefined,
        body: () => Promise<T>
    ): Promise<T> {
        if (signal?.aborted) {
            throw new CancelledError(`Pipeline cancelled before ${status}`);
        }
        advanceStatus(state, status, this.clock());
        const span = this.telemetry?.startSpan(trace, status) ?? null;
        try {
            const output = await body();
            this.telemetry?.endSpan(span, undefined, true);
            return output;
        } catch (e) {
            this.telemetry?.endSpan(span, errorMessage(e), false);
            throw e;
        }
    }

    private limit(options: RunOptions): number {
        return options.maxResults ?? this.settings.maxSearchResults;
    }

    private async searchPhase(state: PipelineState, options: RunOptions): Promise<void> {
        const { search } = this.collaborators;
        const limit = this.limit(options);

        // Web search is the primary source; its failure fails the run.
        state.searchResults = await search.web(state.query, limit);

        const secondary = new PhaseAggregator<SecondarySearches>(
            'search',
            () => ({ news: [], images: [], videos: [] }),
            this.logger
        );
        if (options.includeNews ?? true) secondary.add('news', () => search.news(state.query, limit));
        if (options.includeImages ?? true) secondary.add('images', () => search.images(state.query, limit));
        if (options.includeVideos ?? true) secondary.add('videos', () => search.videos(state.query, limit));

        if (secondary.size > 0) {
            const { values } = await secondary.run();
            state.searchResults.push(...values.news);
            state.images = values.images;
            state.videos = values.videos;
        }

        this.logger?.info(
            `Search phase completed: ${state.searchResults.length} web results, ` +
            `${state.images.length} images, ${state.videos.length} videos`
        );
    }

    private async scrapePhase(state: PipelineState, options: RunOptions): Promise<void> {
        const urls = state.searchResults
            .map(r => r.link)
            .slice(0, this.limit(options) * 2);

        if (urls.length === 0) {
            this.logger?.warn('No URLs to scrape');
            return;
        }

        const { scraper } = this.collaborators;
        const outcomes = await fanOut(
            urls.map(url => () => scraper.scrape(url, options.signal)),
            { concurrency: this.settings.scrapeConcurrency, signal: options.signal, label: 'scrape', logger: this.logger }
        );

        state.scrapedContent = outcomes.map((outcome, i) =>
            outcome.ok ? outcome.value : scrapeFailure(urls[i], outcome.failure.message, this.clock())
        );

        const successful = state.scrapedContent.filter(c => c.type !== 'error').length;
        this.logger?.info(`Scraping phase completed: ${successful}/${urls.length} successful`);
    }

    private async storePhase(state: PipelineState): Promise<void> {
        const documents = state.scrapedContent.filter(c => c.type !== 'error');
        if (documents.length === 0) return;

        try {
            const stored = await this.collaborators.sink.persist(documents, state.query);
            if (stored) {
                this.logger?.info(`Stored ${documents.length} documents`);
            } else {
                this.logger?.warn('Document sink rejected the batch');
            }
        } catch (e) {
            this.logger?.warn(`Failed to store documents: ${errorMessage(e)}`);
        }
    }

    private async analyzePhase(state: PipelineState, options: RunOptions): Promise<void> {
        await this.scoreCredibility(state, options.signal);

        const documents = state.scrapedContent.filter(c => c.type !== 'error');
        if (documents.length === 0) {
            this.logger?.warn('No scraped content available for analysis');
            return;
        }

        try {
            state.analysis = await this.collaborators.analyzer.analyze(state.query, documents);
            this.logger?.info(`Analysis phase completed (${state.analysis.kind})`);
        } catch (e) {
            this.logger?.warn(`Analysis failed, continuing without it: ${errorMessage(e)}`);
        }
    }

    private async scoreCredibility(state: PipelineState, signal?: AbortSignal): Promise<void> {
        const scorer = this.collaborators.credibility;
        if (!scorer || state.searchResults.length === 0) return;

        const outcomes = await fanOut(
            state.searchResults.map(result => () => scorer.score(result, state.query)),
            { concurrency: this.settings.credibilityConcurrency, signal, label: 'credibility', logger: this.logger }
        );
        outcomes.forEach((outcome, i) => {
            if (!outcome.ok) return;
            if (!Number.isFinite(outcome.value)) {
                this.logger?.warn(`Ignoring non-numeric credibility for ${state.searchResults[i].link}`);
                return;
            }
            state.searchResults[i].credibility = Math.min(1, Math.max(0, outcome.value));
        });
    }

    private async visualizePhase(state: PipelineState): Promise<VisualizationData> {
        const analysis = state.analysis;
        if (!analysis) {
            this.logger?.warn('No analysis available for visualization');
            return emptyVisualization();
        }

        switch (analysis.kind) {
            case 'empty':
                this.logger?.info(`Nothing to visualize: ${analysis.reason}`);
                return emptyVisualization();
            case 'success':
                try {
                    return await this.collaborators.visualizer.visualize(analysis);
                } catch (e) {
                    this.logger?.warn(`Visualization failed: ${errorMessage(e)}`);
                    return emptyVisualization();
                }
        }
    }

    private async reportPhase(state: PipelineState, visualization: VisualizationData): Promise<string | null> {
        try {
            return await this.collaborators.renderer.render(state, visualization);
        } catch (e) {
            this.logger?.warn(`Report generation failed: ${errorMessage(e)}`);
            return null;
        }
    }
}
