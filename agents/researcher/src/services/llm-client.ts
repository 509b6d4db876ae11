import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ApiError, ConfigError } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { LlmConfig } from '../config';
import { toHttpError } from './http-errors';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatCompleter {
    complete(messages: ChatMessage[]): Promise<string>;
}

const ChatCompletionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({
            content: z.string().nullable()
        })
    })).min(1)
});

export interface ChatClientOptions {
    config: LlmConfig;
    logger?: Logger;
    http?: AxiosInstance;
}

/**
 * Client for any OpenAI-compatible `/chat/completions` endpoint.
 */
export class ChatClient implements ChatCompleter {
    private http: AxiosInstance;
    private config: LlmConfig;
    private logger?: Logger;

    constructor(options: ChatClientOptions) {
        this.config = options.config;
        this.logger = options.logger;
        this.http = options.http ?? axios.create({
            baseURL: this.config.baseUrl,
            timeout: this.config.timeoutMs,
            headers: {
                'Authorization': `Bearer ${this.config.apiKey ?? ''}`,
                'Content-Type': 'application/json'
            }
        });
    }

    async complete(messages: ChatMessage[]): Promise<string> {
        if (!this.config.apiKey) {
            throw new ConfigError('LLM calls require llm.apiKey (or OPENAI_API_KEY)');
        }

        let data: unknown;
        try {
            const response = await this.http.post('/chat/completions', {
                model: this.config.model,
                temperature: this.config.temperature,
                max_tokens: this.config.maxTokens,
                messages
            });
            data = response.data;
        } catch (e) {
            throw toHttpError(e, 'Chat completion');
        }

        const parsed = ChatCompletionSchema.safeParse(data);
        if (!parsed.success) {
            throw new ApiError('Chat completion returned an unexpected body', 502, 'Bad Gateway');
        }
        const content = (parsed.data.choices[0].message.content ?? '').trim();
        this.logger?.debug(`Chat completion returned ${content.length} characters`, { model: this.config.model });
        return content;
    }
}
