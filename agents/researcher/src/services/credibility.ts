import type { Logger } from '@content-research/shared';
import type { CredibilityScorer } from '../pipeline/collaborators';
import type { SearchResult } from '../types';
import type { ChatCompleter } from './llm-client';
import { prompts } from './prompts';

export const DEFAULT_CREDIBILITY = 0.5;

/** First number in the reply, clamped to [0, 1]; 0.5 when there is none. */
export function parseCredibility(response: string): number {
    const match = response.match(/-?\d+(?:\.\d+)?/);
    if (!match) return DEFAULT_CREDIBILITY;
    return Math.min(1, Math.max(0, Number(match[0])));
}

/**
 * Asks the model to rate a search result. Transport failures propagate so
 * the caller can leave the result unscored.
 */
export class LlmCredibilityScorer implements CredibilityScorer {
    constructor(private readonly chat: ChatCompleter, private readonly logger?: Logger) { }

    async score(result: SearchResult, query: string): Promise<number> {
        const score = parseCredibility(await this.chat.complete(prompts.credibility(result, query)));
        this.logger?.debug(`Credibility ${score.toFixed(2)} for ${result.link}`);
        return score;
    }
}
