import type { ChatMessage } from './llm-client';
import type { SearchResult } from '../types';

function clip(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

function conversation(system: string, user: string): ChatMessage[] {
    return [
        { role: 'system', content: system },
        { role: 'user', content: user }
    ];
}

export const prompts = {
    summary: (text: string, words: number = 500): ChatMessage[] => conversation(
        'You are an expert at creating concise, informative summaries. Summarize the following content in a clear and comprehensive way.',
        `Please provide a comprehensive summary of the following content in approximately ${words} words:\n\n${clip(text, 10000)}`
    ),

    entities: (text: string): ChatMessage[] => conversation(
        'You are an expert at named entity recognition. Extract key entities from the text and categorize them as PERSON, ORGANIZATION, LOCATION, PRODUCT, EVENT, WORK_OF_ART, LAW or FACILITY.',
        `Extract and list all named entities from the following text. Format each entity as 'Entity Name | Type', one per line:\n\n${clip(text, 8000)}`
    ),

    sentiment: (text: string): ChatMessage[] => conversation(
        'You are an expert at sentiment analysis. Analyze the sentiment of the given text and provide a score.',
        'Analyze the sentiment of the following text. Respond with only: SENTIMENT | POLARITY | CONFIDENCE\n' +
        'where SENTIMENT is positive/negative/neutral, POLARITY is a number from -1.0 to 1.0, ' +
        `and CONFIDENCE is a number from 0.0 to 1.0.\n\n${clip(text, 5000)}`
    ),

    topics: (text: string, count: number): ChatMessage[] => conversation(
        'You are an expert at topic extraction. Identify the main topics and themes in the given text.',
        `Extract the top ${count} topics from the following text. For each topic, provide one line: Topic Name | Key Words (comma-separated)\n\n${clip(text, 8000)}`
    ),

    relatedQueries: (text: string, count: number): ChatMessage[] => conversation(
        'You are an expert at generating related search queries. Create relevant follow-up queries based on the given content.',
        `Based on the following content, generate ${count} related search queries that would help explore this topic further. List only the queries, one per line:\n\n${clip(text, 5000)}`
    ),

    credibility: (result: SearchResult, query: string): ChatMessage[] => conversation(
        'You are an expert at assessing source credibility and information quality. Evaluate the credibility of sources based on their title, snippet, and domain.',
        `Assess the credibility of the following search result for the query "${query}". Respond with only a credibility score from 0.0 to 1.0:\n\n` +
        `Title: ${result.title}\nSnippet: ${result.snippet}\nSource: ${result.source}\nURL: ${result.link}`
    )
};
