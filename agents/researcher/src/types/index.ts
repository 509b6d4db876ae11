/**
 * Domain model for research runs and jobs.
 *
 * Every shape is a zod schema so that records coming back from the state
 * store or from an LLM are validated instead of trusted.
 */

import { z } from 'zod';

// ============================================================================
// Search
// ============================================================================

export const SearchResultSchema = z.object({
    title: z.string(),
    snippet: z.string(),
    link: z.string().url(),
    source: z.string(),
    credibility: z.number().min(0).max(1).optional()
});

export const ImageResultSchema = z.object({
    title: z.string(),
    link: z.string().url(),
    thumbnail: z.string().optional(),
    source: z.string(),
    altText: z.string().optional()
});

export const VideoResultSchema = z.object({
    title: z.string(),
    link: z.string().url(),
    thumbnail: z.string().optional(),
    snippet: z.string(),
    source: z.string(),
    duration: z.string().optional()
});

export type SearchResult = z.infer<typeof SearchResultSchema>;
export type ImageResult = z.infer<typeof ImageResultSchema>;
export type VideoResult = z.infer<typeof VideoResultSchema>;

// ============================================================================
// Scraping
// ============================================================================

export const CONTENT_TYPES = ['text', 'image', 'video', 'pdf', 'error'] as const;
export const ContentTypeSchema = z.enum(CONTENT_TYPES);
export type ContentType = z.infer<typeof ContentTypeSchema>;

export const ScrapedContentSchema = z.object({
    type: ContentTypeSchema,
    url: z.string(),
    rawText: z.string(),
    errorMessage: z.string().optional(),
    scrapedAt: z.string()
}).superRefine((content, ctx) => {
    if (content.type === 'error' && !content.errorMessage) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['errorMessage'], message: 'error content requires errorMessage' });
    }
    if (content.type !== 'error' && content.rawText.trim().length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rawText'], message: 'rawText cannot be empty unless type is error' });
    }
});

export type ScrapedContent = z.infer<typeof ScrapedContentSchema>;

export function scrapedText(url: string, rawText: string, scrapedAt: Date, type: Exclude<ContentType, 'error'> = 'text'): ScrapedContent {
    return { type, url, rawText, scrapedAt: scrapedAt.toISOString() };
}

export function scrapeFailure(url: string, errorMessage: string, scrapedAt: Date): ScrapedContent {
    return { type: 'error', url, rawText: '', errorMessage, scrapedAt: scrapedAt.toISOString() };
}

// ============================================================================
// Analysis
// ============================================================================

export const ENTITY_LABELS = ['PERSON', 'ORG', 'GPE', 'PRODUCT', 'EVENT', 'WORK_OF_ART', 'LAW', 'FAC'] as const;

export const EntitySchema = z.object({
    text: z.string().min(1),
    label: z.enum(ENTITY_LABELS),
    confidence: z.number().min(0).max(1).optional()
});

export const RelationshipSchema = z.object({
    fromEntity: z.string(),
    toEntity: z.string(),
    relationshipType: z.string(),
    confidence: z.number().min(0).max(1).optional()
});

export const TopicSchema = z.object({
    id: z.number().int(),
    label: z.string(),
    words: z.array(z.string()),
    weight: z.number().min(0).max(1)
});

export const SentimentSchema = z.object({
    polarity: z.number().min(-1).max(1),
    subjectivity: z.number().min(0).max(1),
    classification: z.enum(['positive', 'negative', 'neutral']),
    confidence: z.number().min(0).max(1).optional()
});

export const TimelineEventSchema = z.object({
    date: z.string(),
    event: z.string(),
    source: z.string(),
    confidence: z.number().min(0).max(1).optional()
});

export const RelatedQuerySchema = z.object({
    query: z.string(),
    source: z.string(),
    relevance: z.number().min(0).max(1).optional()
});

export type Entity = z.infer<typeof EntitySchema>;
export type Relationship = z.infer<typeof RelationshipSchema>;
export type Topic = z.infer<typeof TopicSchema>;
export type Sentiment = z.infer<typeof SentimentSchema>;
export type TimelineEvent = z.infer<typeof TimelineEventSchema>;
export type RelatedQuery = z.infer<typeof RelatedQuerySchema>;

export const SuccessAnalysisSchema = z.object({
    kind: z.literal('success'),
    query: z.string(),
    summary: z.string(),
    entities: z.array(EntitySchema),
    relationships: z.array(RelationshipSchema),
    topics: z.array(TopicSchema),
    sentiment: SentimentSchema,
    timeline: z.array(TimelineEventSchema),
    relatedQueries: z.array(RelatedQuerySchema),
    analyzedAt: z.string()
});

export const EmptyAnalysisSchema = z.object({
    kind: z.literal('empty'),
    query: z.string(),
    reason: z.string(),
    analyzedAt: z.string()
});

export const AnalysisResultSchema = z.discriminatedUnion('kind', [SuccessAnalysisSchema, EmptyAnalysisSchema]);

export type SuccessAnalysis = z.infer<typeof SuccessAnalysisSchema>;
export type EmptyAnalysis = z.infer<typeof EmptyAnalysisSchema>;
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

export const NEUTRAL_SENTIMENT: Sentiment = {
    polarity: 0,
    subjectivity: 0.5,
    classification: 'neutral',
    confidence: 0
};

// ============================================================================
// Visualization
// ============================================================================

export const GraphNodeSchema = z.object({
    id: z.number().int(),
    label: z.string(),
    type: z.string(),
    confidence: z.number()
});

export const GraphEdgeSchema = z.object({
    from: z.number().int(),
    to: z.number().int(),
    type: z.string(),
    confidence: z.number()
});

export const VisualizationDataSchema = z.object({
    nodes: z.array(GraphNodeSchema),
    edges: z.array(GraphEdgeSchema),
    timelineDates: z.array(z.string()),
    timelineEvents: z.array(z.string()),
    treemapLabels: z.array(z.string()),
    treemapParents: z.array(z.string()),
    treemapValues: z.array(z.number())
});

export type GraphNode = z.infer<typeof GraphNodeSchema>;
export type GraphEdge = z.infer<typeof GraphEdgeSchema>;
export type VisualizationData = z.infer<typeof VisualizationDataSchema>;

export function emptyVisualization(): VisualizationData {
    return {
        nodes: [],
        edges: [],
        timelineDates: [],
        timelineEvents: [],
        treemapLabels: [],
        treemapParents: [],
        treemapValues: []
    };
}

// ============================================================================
// Pipeline
// ============================================================================

export const PIPELINE_STATUSES = [
    'initialized',
    'searching',
    'scraping',
    'storing',
    'analyzing',
    'visualizing',
    'generating_report',
    'completed',
    'failed'
] as const;

export const PipelineStatusSchema = z.enum(PIPELINE_STATUSES);
export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;

export const PipelineStateSchema = z.object({
    query: z.string(),
    searchResults: z.array(SearchResultSchema),
    images: z.array(ImageResultSchema),
    videos: z.array(VideoResultSchema),
    scrapedContent: z.array(ScrapedContentSchema),
    analysis: AnalysisResultSchema.optional(),
    status: PipelineStatusSchema,
    createdAt: z.string(),
    updatedAt: z.string()
});

export type PipelineState = z.infer<typeof PipelineStateSchema>;

export interface PipelineResult {
    state: PipelineState;
    visualization: VisualizationData;
    report: string | null;
    processingTimeMs: number;
    error?: string;
}

// ============================================================================
// Jobs
// ============================================================================

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;
export const JobStatusSchema = z.enum(JOB_STATUSES);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed']);

export const JobResultSchema = z.object({
    state: PipelineStateSchema,
    visualization: VisualizationDataSchema,
    processingTimeMs: z.number(),
    reportPath: z.string().optional()
});

export type JobResult = z.infer<typeof JobResultSchema>;

export const JobRecordSchema = z.object({
    jobId: z.string().min(1),
    status: JobStatusSchema,
    query: z.string(),
    createdAt: z.number(),
    startedAt: z.number().optional(),
    completedAt: z.number().optional(),
    result: JobResultSchema.optional(),
    error: z.string().optional()
});

export type JobRecord = z.infer<typeof JobRecordSchema>;

export const ResearchRequestSchema = z.object({
    query: z.string().trim().min(1),
    includeImages: z.boolean().default(true),
    includeVideos: z.boolean().default(true),
    includeNews: z.boolean().default(true),
    maxResults: z.number().int().min(1).max(10).optional()
});

export type ResearchRequest = z.infer<typeof ResearchRequestSchema>;
