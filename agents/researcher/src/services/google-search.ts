/**
 * Google Custom Search JSON API client.
 *
 * Web, news, image and video searches share one endpoint and differ only in
 * query decoration and result mapping. Results are cached through the state
 * store when one is given.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigError } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { SearchProvider } from '../pipeline/collaborators';
import { buildCacheKey, cacheAside } from '../store/cache-aside';
import type { Schema, StateStore } from '../store/state-store';
import { ImageResultSchema, SearchResultSchema, VideoResultSchema } from '../types';
import type { ImageResult, SearchResult, VideoResult } from '../types';
import type { SearchConfig } from '../config';
import { toHttpError } from './http-errors';

const MAX_RESULTS_PER_REQUEST = 10;

const CseItemSchema = z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
    displayLink: z.string().optional(),
    image: z.object({
        thumbnailLink: z.string().optional()
    }).passthrough().optional(),
    pagemap: z.object({
        videoobject: z.array(z.object({
            thumbnailurl: z.string().optional(),
            duration: z.string().optional()
        }).passthrough()).optional()
    }).passthrough().optional()
}).passthrough();

const CseResponseSchema = z.object({
    items: z.array(CseItemSchema).optional()
}).passthrough();

type CseItem = z.infer<typeof CseItemSchema>;

export interface GoogleSearchOptions {
    config: SearchConfig;
    store?: StateStore;
    ttlSeconds?: number;
    logger?: Logger;
    http?: AxiosInstance;
}

export class GoogleSearchClient implements SearchProvider {
    private http: AxiosInstance;
    private config: SearchConfig;
    private store?: StateStore;
    private ttlSeconds: number;
    private logger?: Logger;

    constructor(options: GoogleSearchOptions) {
        this.config = options.config;
        this.store = options.store;
        this.ttlSeconds = options.ttlSeconds ?? 3600;
        this.logger = options.logger;
        this.http = options.http ?? axios.create({
            baseURL: this.config.baseUrl,
            timeout: this.config.timeoutMs
        });
    }

    async web(query: string, limit: number): Promise<SearchResult[]> {
        return this.cached('search:web', [query, limit], z.array(SearchResultSchema), async () => {
            const items = await this.request(query, limit);
            return this.mapAll(items, item => this.toSearchResult(item), SearchResultSchema);
        });
    }

    async news(query: string, limit: number): Promise<SearchResult[]> {
        const sites = this.config.newsSites.map(site => `site:${site}`).join(' OR ');
        const newsQuery = sites ? `${query} ${sites}` : query;
        return this.cached('search:news', [newsQuery, limit], z.array(SearchResultSchema), async () => {
            const items = await this.request(newsQuery, limit);
            const results = this.mapAll(items, item => this.toSearchResult(item), SearchResultSchema);
            this.logger?.info(`Found ${results.length} news articles`);
            return results;
        });
    }

    async images(query: string, limit: number): Promise<ImageResult[]> {
        return this.cached('search:images', [query, limit], z.array(ImageResultSchema), async () => {
            const items = await this.request(query, limit, { searchType: 'image' });
            const results = this.mapAll(items, item => ({
                title: item.title ?? 'No Title',
                link: item.link ?? '',
                thumbnail: item.image?.thumbnailLink,
                source: item.displayLink ?? 'Unknown Source'
            }), ImageResultSchema);
            this.logger?.info(`Found ${results.length} images`);
            return results;
        });
    }

    async videos(query: string, limit: number): Promise<VideoResult[]> {
        const videoQuery = `${query} video site:youtube.com`;
        return this.cached('search:videos', [videoQuery, limit], z.array(VideoResultSchema), async () => {
            const items = await this.request(videoQuery, limit);
            const youtube = items.filter(item => (item.link ?? '').includes('youtube.com'));
            const results = this.mapAll(youtube, item => {
                const video = item.pagemap?.videoobject?.[0];
                return {
                    title: item.title ?? 'No Title',
                    link: item.link ?? '',
                    thumbnail: video?.thumbnailurl,
                    snippet: item.snippet ?? 'No Description',
                    source: item.displayLink ?? 'Unknown Source',
                    duration: video?.duration
                };
            }, VideoResultSchema);
            this.logger?.info(`Found ${results.length} videos`);
            return results;
        });
    }

    private async cached<T>(namespace: string, parts: Array<string | number>, schema: Schema<T>, load: () => Promise<T>): Promise<T> {
        if (!this.store) return load();
        return cacheAside({
            store: this.store,
            key: buildCacheKey(namespace, ...parts),
            ttlSeconds: this.ttlSeconds,
            schema,
            load
        });
    }

    private async request(query: string, limit: number, extra: Record<string, string> = {}): Promise<CseItem[]> {
        const { apiKey, engineId } = this.config;
        if (!apiKey || !engineId) {
            throw new ConfigError('Google search requires search.apiKey and search.engineId');
        }

        this.logger?.debug(`Searching: ${query}`, extra);
        let data: unknown;
        try {
            const response = await this.http.get('', {
                params: {
                    key: apiKey,
                    cx: engineId,
                    q: query,
                    num: Math.min(Math.max(1, limit), MAX_RESULTS_PER_REQUEST),
                    ...extra
                }
            });
            data = response.data;
        } catch (e) {
            throw toHttpError(e, 'Google search');
        }

        const parsed = CseResponseSchema.safeParse(data);
        if (!parsed.success) {
            this.logger?.warn('Unexpected search response shape, treating as empty');
            return [];
        }
        return parsed.data.items ?? [];
    }

    private toSearchResult(item: CseItem): unknown {
        return {
            title: item.title ?? 'No Title',
            snippet: item.snippet ?? 'No Description',
            link: item.link ?? '',
            source: item.displayLink ?? 'Unknown Source'
        };
    }

    /** Maps and validates each item; items that fail validation are skipped. */
    private mapAll<T>(items: CseItem[], map: (item: CseItem) => unknown, schema: Schema<T>): T[] {
        const results: T[] = [];
        for (const item of items) {
            const parsed = schema.safeParse(map(item));
            if (parsed.success) {
                results.push(parsed.data);
            } else {
                this.logger?.warn(`Skipping unparseable search result: ${item.link ?? '<no link>'}`);
            }
        }
        return results;
    }
}
