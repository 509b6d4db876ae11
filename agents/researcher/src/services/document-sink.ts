import { createHash } from 'crypto';
import { errorMessage } from '@content-research/shared';
import type { Logger } from '@content-research/shared';
import type { DocumentSink } from '../pipeline/collaborators';
import type { StateStore } from '../store/state-store';
import type { ScrapedContent } from '../types';

export const DEFAULT_DOCUMENT_TTL_SECONDS = 7 * 24 * 3600;

export function documentKey(url: string): string {
    return `doc:${createHash('sha1').update(url).digest('hex')}`;
}

/**
 * Persists scraped documents in the state store under `doc:<sha1(url)>`.
 * Error markers are skipped. Returns false when any write fails.
 */
export class StoreDocumentSink implements DocumentSink {
    constructor(
        private readonly store: StateStore,
        private readonly ttlSeconds: number = DEFAULT_DOCUMENT_TTL_SECONDS,
        private readonly logger?: Logger
    ) { }

    async persist(documents: ScrapedContent[], query: string): Promise<boolean> {
        const storable = documents.filter(d => d.type !== 'error');
        let ok = true;
        for (const document of storable) {
            try {
                const written = await this.store.set(documentKey(document.url), { ...document, query }, this.ttlSeconds);
                ok = ok && written;
            } catch (e) {
                this.logger?.warn(`Failed to persist ${document.url}: ${errorMessage(e)}`);
                ok = false;
            }
        }
        this.logger?.debug(`Persisted ${storable.length} documents for "${query}"`);
        return ok;
    }
}
