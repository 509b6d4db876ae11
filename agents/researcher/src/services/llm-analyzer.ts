/**
 * LLM-backed content analysis.
 *
 * The combined text of a run's documents goes through six independent
 * sub-analyses (summary, entities, sentiment, topics, timeline, related
 * queries) run side by side by a PhaseAggregator; any of them may fail and
 * leave its default. Relationships are derived afterwards from entity
 * co-occurrence.
 */

import type { Logger } from '@content-research/shared';
import { PhaseAggregator } from '../concurrency/phase-aggregator';
import type { Analyzer } from '../pipeline/collaborators';
import { ENTITY_LABELS, NEUTRAL_SENTIMENT, SentimentSchema } from '../types';
import type {
    AnalysisResult,
    Entity,
    RelatedQuery,
    Relationship,
    ScrapedContent,
    Sentiment,
    TimelineEvent,
    Topic
} from '../types';
import type { ChatCompleter } from './llm-client';
import { prompts } from './prompts';

export const MIN_DOCUMENT_LENGTH = 50;
export const MAX_COMBINED_LENGTH = 50_000;
export const MIN_COMBINED_LENGTH = 100;
const MAX_TIMELINE_EVENTS = 10;
const MAX_RELATIONSHIPS = 20;
const RELATED_QUERY_COUNT = 5;

type EntityLabel = typeof ENTITY_LABELS[number];

const LABEL_ALIASES: Partial<Record<string, EntityLabel>> = {
    PERSON: 'PERSON',
    PEOPLE: 'PERSON',
    ORG: 'ORG',
    ORGANIZATION: 'ORG',
    ORGANISATION: 'ORG',
    COMPANY: 'ORG',
    GPE: 'GPE',
    LOCATION: 'GPE',
    PLACE: 'GPE',
    COUNTRY: 'GPE',
    CITY: 'GPE',
    PRODUCT: 'PRODUCT',
    EVENT: 'EVENT',
    WORK_OF_ART: 'WORK_OF_ART',
    LAW: 'LAW',
    FAC: 'FAC',
    FACILITY: 'FAC'
};

const DATE_PATTERNS = [
    /\b(?:January|February|March|April|May|June|July|August|September|October|November|December)\s+\d{1,2},?\s+\d{4}\b/g,
    /\b\d{1,2}\/\d{1,2}\/\d{4}\b/g,
    /\b\d{4}-\d{2}-\d{2}\b/g
];

interface AnalysisParts {
    summary: string;
    entities: Entity[];
    sentiment: Sentiment;
    topics: Topic[];
    timeline: TimelineEvent[];
    relatedQueries: RelatedQuery[];
}

function stripListMarker(line: string): string {
    return line.trim().replace(/^(?:[-*•]|\d+[.)])\s*/, '').replace(/\*+/g, '').trim();
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Joins documents longer than 50 characters, capped at 50 000 characters. */
export function combineTexts(documents: ScrapedContent[]): string {
    const combined = documents
        .filter(d => d.type !== 'error' && d.rawText.trim().length > MIN_DOCUMENT_LENGTH)
        .map(d => d.rawText)
        .join('\n\n');
    return combined.slice(0, MAX_COMBINED_LENGTH);
}

/** Parses `Name | Type` lines, deduplicated by name and label. */
export function parseEntities(response: string): Entity[] {
    const entities = new Map<string, Entity>();
    for (const line of response.split('\n')) {
        const [rawName, rawType] = line.split('|');
        if (rawType === undefined) continue;
        const text = stripListMarker(rawName);
        const label = LABEL_ALIASES[rawType.trim().toUpperCase().replace(/\s+/g, '_')];
        if (!text || !label) continue;
        const key = `${text.toLowerCase()}|${label}`;
        if (!entities.has(key)) {
            entities.set(key, { text, label, confidence: 0.8 });
        }
    }
    return Array.from(entities.values());
}

/** Parses `SENTIMENT | POLARITY | CONFIDENCE`; anything else is neutral. */
export function parseSentiment(response: string): Sentiment {
    const parts = response.trim().split('|').map(p => p.trim());
    if (parts.length < 3) return { ...NEUTRAL_SENTIMENT, confidence: 0.5 };

    const polarity = Number(parts[1]);
    const confidence = Number(parts[2]);
    const parsed = SentimentSchema.safeParse({
        classification: parts[0].toLowerCase(),
        polarity: Number.isFinite(polarity) ? clamp(polarity, -1, 1) : Number.NaN,
        subjectivity: 0.5,
        confidence: Number.isFinite(confidence) ? clamp(confidence, 0, 1) : Number.NaN
    });
    return parsed.success ? parsed.data : { ...NEUTRAL_SENTIMENT, confidence: 0.5 };
}

/** Parses `Topic | word, word` lines; weight falls by 0.15 per position. */
export function parseTopics(response: string, maxTopics: number): Topic[] {
    const topics: Topic[] = [];
    response.trim().split('\n').slice(0, maxTopics).forEach((line, i) => {
        const [rawLabel, rawWords] = line.split('|');
        if (rawWords === undefined) return;
        const label = stripListMarker(rawLabel);
        if (!label) return;
        topics.push({
            id: i,
            label,
            words: rawWords.split(',').map(w => w.trim()).filter(Boolean).slice(0, 5),
            weight: clamp(1 - i * 0.15, 0, 1)
        });
    });
    return topics;
}

export function parseRelatedQueries(response: string, source: string): RelatedQuery[] {
    return response.trim().split('\n')
        .slice(0, RELATED_QUERY_COUNT)
        .map(stripListMarker)
        .filter(q => q.length > 3)
        .map(query => ({ query, source, relevance: 0.8 }));
}

/** Date mentions with up to 100 characters of context either side. */
export function extractTimeline(text: string, source: string): TimelineEvent[] {
    const events: TimelineEvent[] = [];
    for (const pattern of DATE_PATTERNS) {
        for (const match of text.matchAll(pattern)) {
            const start = match.index ?? 0;
            const end = start + match[0].length;
            const context = text.slice(Math.max(0, start - 100), Math.min(text.length, end + 100)).trim();
            events.push({ date: match[0], event: context.slice(0, 200), source, confidence: 0.6 });
            if (events.length >= MAX_TIMELINE_EVENTS) return events;
        }
    }
    return events;
}

/** Pairs of entities where the first is followed by the second on the same line. */
export function deriveRelationships(entities: Entity[], text: string): Relationship[] {
    const relationships: Relationship[] = [];
    for (let i = 0; i < entities.length; i++) {
        for (let j = i + 1; j < entities.length; j++) {
            const a = entities[i].text;
            const b = entities[j].text;
            const pattern = new RegExp(`(?<!\\w)${escapeRegExp(a)}(?!\\w).*?(?<!\\w)${escapeRegExp(b)}(?!\\w)`, 'i');
            if (!pattern.test(text)) continue;
            relationships.push({ fromEntity: a, toEntity: b, relationshipType: 'related_to', confidence: 0.7 });
            if (relationships.length >= MAX_RELATIONSHIPS) return relationships;
        }
    }
    return relationships;
}

export interface LlmAnalyzerOptions {
    chat: ChatCompleter;
    maxTopics?: number;
    logger?: Logger;
    clock?: () => Date;
}

export class LlmAnalyzer implements Analyzer {
    private chat: ChatCompleter;
    private maxTopics: number;
    private logger?: Logger;
    private clock: () => Date;

    constructor(options: LlmAnalyzerOptions) {
        this.chat = options.chat;
        this.maxTopics = options.maxTopics ?? 5;
        this.logger = options.logger;
        this.clock = options.clock ?? (() => new Date());
    }

    async analyze(query: string, documents: ScrapedContent[]): Promise<AnalysisResult> {
        this.logger?.info(`Starting analysis for query: ${query}`);
        const text = combineTexts(documents);
        if (text.trim().length < MIN_COMBINED_LENGTH) {
            this.logger?.warn('Insufficient text content for analysis');
            return {
                kind: 'empty',
                query,
                reason: 'Insufficient text content for analysis',
                analyzedAt: this.clock().toISOString()
            };
        }

        const source = documents.find(d => d.type !== 'error')?.url ?? 'unknown';
        const { values, failures } = await new PhaseAggregator<AnalysisParts>('analysis', () => ({
            summary: 'Analysis summary unavailable.',
            entities: [],
            sentiment: { ...NEUTRAL_SENTIMENT, confidence: 0.5 },
            topics: [],
            timeline: [],
            relatedQueries: []
        }), this.logger)
            .add('summary', () => this.chat.complete(prompts.summary(text)))
            .add('entities', async () => parseEntities(await this.chat.complete(prompts.entities(text))))
            .add('sentiment', async () => parseSentiment(await this.chat.complete(prompts.sentiment(text))))
            .add('topics', async () => parseTopics(await this.chat.complete(prompts.topics(text, this.maxTopics)), this.maxTopics))
            .add('timeline', async () => extractTimeline(text, source))
            .add('relatedQueries', async () => parseRelatedQueries(
                await this.chat.complete(prompts.relatedQueries(text, RELATED_QUERY_COUNT)),
                source
            ))
            .run();

        const relationships = deriveRelationships(values.entities, text);
        this.logger?.info(
            `Analysis completed: ${values.entities.length} entities, ${values.topics.length} topics, ` +
            `${values.timeline.length} timeline events`,
            { failedParts: failures.map(f => f.key) }
        );

        return {
            kind: 'success',
            query,
            summary: values.summary,
            entities: values.entities,
            relationships,
            topics: values.topics,
            sentiment: values.sentiment,
            timeline: values.timeline,
            relatedQueries: values.relatedQueries,
            analyzedAt: this.clock().toISOString()
        };
    }
}
