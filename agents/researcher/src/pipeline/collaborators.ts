/**
 * Contracts of the external collaborators the pipeline drives. The
 * orchestrator depends on these only; concrete implementations live in
 * `services/`, `visualization/` and `report/`.
 */

import type {
    AnalysisResult,
    ImageResult,
    PipelineState,
    ScrapedContent,
    SearchResult,
    SuccessAnalysis,
    VideoResult,
    VisualizationData
} from '../types';

export interface SearchProvider {
    web(query: string, limit: number): Promise<SearchResult[]>;
    news(query: string, limit: number): Promise<SearchResult[]>;
    images(query: string, limit: number): Promise<ImageResult[]>;
    videos(query: string, limit: number): Promise<VideoResult[]>;
}

export interface Scraper {
    /** Resolves to an `error` marker rather than rejecting for per-page failures. */
    scrape(url: string, signal?: AbortSignal): Promise<ScrapedContent>;
}

export interface DocumentSink {
    persist(documents: ScrapedContent[], query: string): Promise<boolean>;
}

export interface Analyzer {
    analyze(query: string, documents: ScrapedContent[]): Promise<AnalysisResult>;
}

export interface CredibilityScorer {
    /** Score in [0, 1]. */
    score(result: SearchResult, query: string): Promise<number>;
}

export interface Visualizer {
    visualize(analysis: SuccessAnalysis): VisualizationData | Promise<VisualizationData>;
}

export interface ReportRenderer {
    render(state: PipelineState, visualization: VisualizationData): Promise<string | null>;
}

export interface PipelineCollaborators {
    search: SearchProvider;
    scraper: Scraper;
    sink: DocumentSink;
    analyzer: Analyzer;
    credibility?: CredibilityScorer;
    visualizer: Visualizer;
    renderer: ReportRenderer;
}
