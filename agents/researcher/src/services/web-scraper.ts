import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { errorMessage } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { Scraper } from '../pipeline/collaborators';
import { buildCacheKey, cacheAside } from '../store/cache-aside';
import type { StateStore } from '../store/state-store';
import { ScrapedContentSchema, scrapeFailure, scrapedText } from '../types';
import type { ScrapedContent } from '../types';
import type { ScraperConfig } from '../config';
import { toHttpError } from './http-errors';

const NOISE_SELECTORS = 'script, style, noscript, template, svg, nav, header, footer, aside, form, iframe';
const BLOCK_SELECTORS = 'h1, h2, h3, h4, h5, h6, p, li, blockquote, pre, td';

function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Readable text of an HTML page: the `article` or `main` element when
 * present, otherwise `body`, one block element per paragraph.
 */
export function extractText(html: string): string {
    const $ = cheerio.load(html);
    $(NOISE_SELECTORS).remove();

    const root = $('article').first().length > 0
        ? $('article').first()
        : $('main').first().length > 0 ? $('main').first() : $('body');

    const blocks: string[] = [];
    root.find(BLOCK_SELECTORS).each((_, el) => {
        // Nested blocks (li > p) would otherwise be emitted twice.
        if ($(el).find(BLOCK_SELECTORS).length > 0) return;
        const text = normalizeWhitespace($(el).text());
        if (text) blocks.push(text);
    });

    if (blocks.length > 0) return blocks.join('\n\n');
    return normalizeWhitespace(root.text());
}

export interface WebScraperOptions {
    config: ScraperConfig;
    store?: StateStore;
    ttlSeconds?: number;
    logger?: Logger;
    http?: AxiosInstance;
    clock?: () => Date;
}

/**
 * Fetches a page and extracts its text. Every failure resolves to an
 * `error` marker; only successful scrapes are cached.
 */
export class WebScraper implements Scraper {
    private http: AxiosInstance;
    private config: ScraperConfig;
    private store?: StateStore;
    private ttlSeconds: number;
    private logger?: Logger;
    private clock: () => Date;

    constructor(options: WebScraperOptions) {
        this.config = options.config;
        this.store = options.store;
        this.ttlSeconds = options.ttlSeconds ?? 7200;
        this.logger = options.logger;
        this.clock = options.clock ?? (() => new Date());
        this.http = options.http ?? axios.create({
            timeout: this.config.timeoutMs,
            maxContentLength: this.config.maxContentLength,
            maxRedirects: 5,
            responseType: 'text',
            headers: { 'User-Agent': this.config.userAgent }
        });
    }

    async scrape(url: string, signal?: AbortSignal): Promise<ScrapedContent> {
        if (!this.store) return this.fetch(url, signal);
        return cacheAside({
            store: this.store,
            key: buildCacheKey('scrape', url),
            ttlSeconds: this.ttlSeconds,
            schema: ScrapedContentSchema,
            load: () => this.fetch(url, signal),
            shouldCache: content => content.type !== 'error'
        });
    }

    private async fetch(url: string, signal?: AbortSignal): Promise<ScrapedContent> {
        this.logger?.info(`Scraping URL: ${url}`);
        let body: unknown;
        let contentType: string;
        try {
            const response = await this.http.get(url, { signal });
            body = response.data;
            contentType = String(response.headers['content-type'] ?? 'text/html').toLowerCase();
        } catch (e) {
            const error = toHttpError(e, `Download of ${url}`);
            this.logger?.warn(error.message);
            return scrapeFailure(url, error.message, this.clock());
        }

        if (typeof body !== 'string') {
            return scrapeFailure(url, 'Response body is not text', this.clock());
        }

        let text: string;
        try {
            if (contentType.includes('text/html') || contentType.includes('application/xhtml')) {
                text = extractText(body);
            } else if (contentType.startsWith('text/')) {
                text = body.trim();
            } else {
                return scrapeFailure(url, `Unsupported content type: ${contentType}`, this.clock());
            }
        } catch (e) {
            this.logger?.warn(`Failed to extract text from ${url}: ${errorMessage(e)}`);
            return scrapeFailure(url, errorMessage(e), this.clock());
        }

        if (text.length === 0) {
            return scrapeFailure(url, 'No text content extracted', this.clock());
        }

        const content = text.slice(0, this.config.maxTextLength);
        this.logger?.info(`Scraped ${content.length} characters from ${url}`);
        return scrapedText(url, content, this.clock());
    }
}
