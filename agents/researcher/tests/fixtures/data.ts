import { createPipelineState } from '../../src/pipeline/state';
import { emptyVisualization, scrapedText } from '../../src/types';
import type {
    ImageResult,
    JobResult,
    PipelineState,
    ScrapedContent,
    SearchResult,
    SuccessAnalysis,
    VideoResult
} from '../../src/types';

export const FIXED_DATE = new Date('2024-03-01T12:00:00.000Z');

export function searchResult(i: number, source = 'web'): SearchResult {
    return {
        title: `Result ${i}`,
        snippet: `Snippet ${i}`,
        link: `https://example.com/${source}/${i}`,
        source
    };
}

export function imageResult(i: number): ImageResult {
    return { title: `Image ${i}`, link: `https://img.example.com/${i}.png`, source: 'google_images' };
}

export function videoResult(i: number): VideoResult {
    return { title: `Video ${i}`, link: `https://www.youtube.com/watch?v=${i}`, snippet: '', source: 'youtube' };
}

export function scraped(url: string, text = 'Solar panels convert sunlight into electricity for homes and industry.'): ScrapedContent {
    return scrapedText(url, text, FIXED_DATE);
}

export function successAnalysis(overrides: Partial<SuccessAnalysis> = {}): SuccessAnalysis {
    return {
        kind: 'success',
        query: 'solar power',
        summary: 'Solar adoption is growing.',
        entities: [
            { text: 'Tesla', label: 'ORG', confidence: 0.8 },
            { text: 'Elon Musk', label: 'PERSON', confidence: 0.8 }
        ],
        relationships: [{ fromEntity: 'Elon Musk', toEntity: 'Tesla', relationshipType: 'related_to', confidence: 0.7 }],
        topics: [{ id: 0, label: 'Energy', words: ['solar', 'grid', 'storage', 'panels'], weight: 1 }],
        sentiment: { polarity: 0.4, subjectivity: 0.3, classification: 'positive', confidence: 0.9 },
        timeline: [{ date: '2023', event: 'Record installations', source: 'analysis', confidence: 0.6 }],
        relatedQueries: [{ query: 'solar storage costs', source: 'analysis', relevance: 0.8 }],
        analyzedAt: FIXED_DATE.toISOString(),
        ...overrides
    };
}

export function completedState(query = 'solar power'): PipelineState {
    const state = createPipelineState(query, FIXED_DATE);
    state.status = 'completed';
    state.searchResults = [searchResult(1)];
    state.scrapedContent = [scraped('https://example.com/web/1')];
    return state;
}

export function jobResult(): JobResult {
    return {
        state: completedState(),
        visualization: emptyVisualization(),
        processingTimeMs: 1234
    };
}
