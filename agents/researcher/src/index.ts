/**
 * Research pipeline: bounded fan-out, phase aggregation, dual-backend state
 * store, job registry and the orchestrator that ties them together.
 */

export * from './types';

export { fanOut, succeeded, DEFAULT_SCRAPE_CONCURRENCY } from './concurrency/fan-out';
export type { Outcome, UnitOfWork, FanOutOptions, FailureInfo } from './concurrency/fan-out';
export { PhaseAggregator } from './concurrency/phase-aggregator';
export type { PhaseOutcome, PhaseFailure } from './concurrency/phase-aggregator';

export * from './store';

export { JobRegistry, JOB_INDEX_KEY, isTerminal } from './jobs/job-registry';
export type { JobRegistryOptions, JobUpdate, DeleteOutcome } from './jobs/job-registry';
export { JobRunner } from './jobs/job-runner';
export type { JobRunnerOptions, PipelineRunner } from './jobs/job-runner';

export { createPipelineState, advanceStatus, canTransition, isFinished } from './pipeline/state';
export { ResearchPipeline, DEFAULT_PIPELINE_SETTINGS } from './pipeline/orchestrator';
export type { PipelineSettings, RunOptions, ResearchPipelineOptions } from './pipeline/orchestrator';
export type {
    SearchProvider,
    Scraper,
    DocumentSink,
    Analyzer,
    CredibilityScorer,
    Visualizer,
    ReportRenderer,
    PipelineCollaborators
} from './pipeline/collaborators';

export { GoogleSearchClient } from './services/google-search';
export { WebScraper, extractText } from './services/web-scraper';
export { StoreDocumentSink, documentKey } from './services/document-sink';
export { ChatClient } from './services/llm-client';
export type { ChatMessage, ChatCompleter } from './services/llm-client';
export { LlmAnalyzer } from './services/llm-analyzer';
export { LlmCredibilityScorer } from './services/credibility';
export { ChartDataBuilder } from './visualization/chart-data';
export { MarkdownReportRenderer, renderMarkdownReport } from './report/markdown-report';

export { loadConfig, ResearcherConfigSchema } from './config';
export type { ResearcherConfig } from './config';
export { createResearchServices, createRootLogger } from './container';
export type { ResearchServices, ResearchServicesOptions } from './container';
export { createApp, startServer } from './server';
export type { AppDependencies } from './server';
