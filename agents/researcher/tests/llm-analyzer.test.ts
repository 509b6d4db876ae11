import {
    LlmAnalyzer,
    combineTexts,
    deriveRelationships,
    extractTimeline,
    parseEntities,
    parseRelatedQueries,
    parseSentiment,
    parseTopics
} from '../src/services/llm-analyzer';
import type { ChatCompleter, ChatMessage } from '../src/services/llm-client';
import { scrapeFailure } from '../src/types';
import { FIXED_DATE, scraped } from './fixtures/data';

const ARTICLE =
    'Tesla announced on March 5, 2024 that Elon Musk will expand solar production in Texas. ' +
    'The company also partners with Panasonic on batteries and home storage.';

const REPLIES: Array<[string, string]> = [
    ['summaries', 'Tesla is expanding solar production.'],
    ['named entity', '1. Tesla | ORGANIZATION\n- Elon Musk | person\nTesla | ORG\nSomething | UNKNOWN\nNo separator'],
    ['sentiment', 'Positive | 0.6 | 0.9'],
    ['topic extraction', 'Energy | solar, storage\n**Manufacturing** | factories'],
    ['related search queries', '1. solar battery storage\n2. ok\n3) Tesla solar roof']
];

function scriptedChat(overrides: Record<string, () => Promise<string>> = {}): ChatCompleter & { calls: ChatMessage[][] } {
    const calls: ChatMessage[][] = [];
    return {
        calls,
        async complete(messages: ChatMessage[]): Promise<string> {
            calls.push(messages);
            const system = messages[0].content;
            for (const [marker, reply] of REPLIES) {
                if (!system.includes(marker)) continue;
                const override = overrides[marker];
                return override ? override() : reply;
            }
            throw new Error(`Unexpected prompt: ${system}`);
        }
    };
}

describe('LlmAnalyzer', () => {
    it('should combine every sub-analysis into a success result', async () => {
        const analyzer = new LlmAnalyzer({ chat: scriptedChat(), clock: () => FIXED_DATE });

        const result = await analyzer.analyze('tesla solar', [scraped('https://example.com/a', ARTICLE)]);

        expect(result.kind).toBe('success');
        if (result.kind !== 'success') return;
        expect(result.summary).toBe('Tesla is expanding solar production.');
        expect(result.entities).toEqual([
            { text: 'Tesla', label: 'ORG', confidence: 0.8 },
            { text: 'Elon Musk', label: 'PERSON', confidence: 0.8 }
        ]);
        expect(result.relationships).toEqual([
            { fromEntity: 'Tesla', toEntity: 'Elon Musk', relationshipType: 'related_to', confidence: 0.7 }
        ]);
        expect(result.sentiment).toEqual({ classification: 'positive', polarity: 0.6, subjectivity: 0.5, confidence: 0.9 });
        expect(result.topics.map(t => t.label)).toEqual(['Energy', 'Manufacturing']);
        expect(result.timeline).toHaveLength(1);
        expect(result.timeline[0]).toMatchObject({ date: 'March 5, 2024', source: 'https://example.com/a' });
        expect(result.relatedQueries.map(q => q.query)).toEqual(['solar battery storage', 'Tesla solar roof']);
        expect(result.analyzedAt).toBe('2024-03-01T12:00:00.000Z');
    });

    it('should fall back to the default for a failed sub-analysis', async () => {
        const chat = scriptedChat({ summaries: async () => { throw new Error('rate limited'); } });

        const result = await new LlmAnalyzer({ chat }).analyze('q', [scraped('https://example.com/a', ARTICLE)]);

        expect(result.kind).toBe('success');
        if (result.kind !== 'success') return;
        expect(result.summary).toBe('Analysis summary unavailable.');
        expect(result.entities).toHaveLength(2);
    });

    it('should return an empty analysis when there is too little text', async () => {
        const chat = scriptedChat();

        const result = await new LlmAnalyzer({ chat, clock: () => FIXED_DATE }).analyze('q', [
            scraped('https://example.com/a', 'Too short to analyze.'),
            scrapeFailure('https://example.com/b', 'timeout', FIXED_DATE)
        ]);

        expect(result).toEqual({
            kind: 'empty',
            query: 'q',
            reason: 'Insufficient text content for analysis',
            analyzedAt: '2024-03-01T12:00:00.000Z'
        });
        expect(chat.calls).toHaveLength(0);
    });

    it('should ask for the configured number of topics', async () => {
        const chat = scriptedChat();

        await new LlmAnalyzer({ chat, maxTopics: 3 }).analyze('q', [scraped('https://example.com/a', ARTICLE)]);

        const topicPrompt = chat.calls.find(messages => messages[0].content.includes('topic extraction'));
        expect(topicPrompt?.[1].content).toMatch(/^Extract the top 3 topics/);
    });
});

describe('analysis parsers', () => {
    it('should drop short documents and error markers when combining', () => {
        const long = 'x'.repeat(60);
        const combined = combineTexts([
            scraped('https://a', long),
            scraped('https://b', 'short text'),
            scrapeFailure('https://c', 'boom', FIXED_DATE),
            scraped('https://d', long)
        ]);

        expect(combined).toBe(`${long}\n\n${long}`);
    });

    it('should read sentiment lines and clamp their numbers', () => {
        expect(parseSentiment('negative | -3 | 7')).toEqual({ classification: 'negative', polarity: -1, subjectivity: 0.5, confidence: 1 });
        expect(parseSentiment('garbage')).toEqual({ classification: 'neutral', polarity: 0, subjectivity: 0.5, confidence: 0.5 });
        expect(parseSentiment('ecstatic | 0.5 | 0.5').classification).toBe('neutral');
    });

    it('should weight topics by position', () => {
        const topics = parseTopics('A | a1, a2\nB | b1\nC | c1\nno separator', 10);

        expect(topics.map(t => t.label)).toEqual(['A', 'B', 'C']);
        expect(topics[0].weight).toBe(1);
        expect(topics[1].weight).toBeCloseTo(0.85);
        expect(topics[2].weight).toBeCloseTo(0.7);
        expect(parseTopics('A | a\nB | b\nC | c', 2)).toHaveLength(2);
    });

    it('should map entity type aliases', () => {
        expect(parseEntities('Paris | location\nUN | Organisation\nEiffel Tower | facility')).toEqual([
            { text: 'Paris', label: 'GPE', confidence: 0.8 },
            { text: 'UN', label: 'ORG', confidence: 0.8 },
            { text: 'Eiffel Tower', label: 'FAC', confidence: 0.8 }
        ]);
    });

    it('should keep at most five related queries longer than three characters', () => {
        const queries = parseRelatedQueries('one query\nabc\n- two query\nthree query\nfour query\nfive query\nsix query', 'src');

        expect(queries.map(q => q.query)).toEqual(['one query', 'two query', 'three query', 'four query']);
        expect(queries[0]).toEqual({ query: 'one query', source: 'src', relevance: 0.8 });
    });

    it('should find dates in all supported formats', () => {
        const text = 'Launched 2021-06-01. Updated 12/25/2022. Retired January 3, 2024.';

        const dates = extractTimeline(text, 'src').map(e => e.date);

        expect(dates).toEqual(['January 3, 2024', '12/25/2022', '2021-06-01']);
    });

    it('should only relate entities that appear in order on one line', () => {
        const entities = parseEntities('Alpha | ORG\nBeta | ORG');

        expect(deriveRelationships(entities, 'Alpha works with Beta')).toHaveLength(1);
        expect(deriveRelationships(entities, 'Beta works with Alpha')).toHaveLength(0);
        expect(deriveRelationships(entities, 'Alpha\nBeta')).toHaveLength(0);
    });

    it('should relate entities that begin or end with punctuation', () => {
        const entities = parseEntities('C++ | PRODUCT\nAT&T | ORG');

        expect(deriveRelationships(entities, 'C++ tooling ships with AT&T phones')).toEqual([
            { fromEntity: 'C++', toEntity: 'AT&T', relationshipType: 'related_to', confidence: 0.7 }
        ]);
        expect(deriveRelationships(entities, 'xC++ tooling ships with AT&T phones')).toHaveLength(0);
    });
});
