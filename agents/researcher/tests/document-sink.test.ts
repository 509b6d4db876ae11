import { StoreDocumentSink, documentKey } from '../src/services/document-sink';
import { MemoryStore } from '../src/store/memory-store';
import { StateStore } from '../src/store/state-store';
import { scrapeFailure } from '../src/types';
import { FIXED_DATE, scraped } from './fixtures/data';

describe('StoreDocumentSink', () => {
    let now: number;
    let store: StateStore;

    beforeEach(async () => {
        now = 1_000_000;
        store = await StateStore.connect({ fallback: new MemoryStore(() => now) });
    });

    it('should key documents by a hash of their url', () => {
        expect(documentKey('https://example.com/a')).toMatch(/^doc:[0-9a-f]{40}$/);
        expect(documentKey('https://example.com/a')).toBe(documentKey('https://example.com/a'));
        expect(documentKey('https://example.com/a')).not.toBe(documentKey('https://example.com/b'));
    });

    it('should store documents with their query and skip error markers', async () => {
        const sink = new StoreDocumentSink(store, 60);
        const doc = scraped('https://example.com/a');

        const ok = await sink.persist([doc, scrapeFailure('https://example.com/b', 'timeout', FIXED_DATE)], 'solar');

        expect(ok).toBe(true);
        expect(await store.get(documentKey('https://example.com/a'))).toEqual({ ...doc, query: 'solar' });
        expect(await store.exists(documentKey('https://example.com/b'))).toBe(false);
    });

    it('should expire documents after the ttl', async () => {
        await new StoreDocumentSink(store, 60).persist([scraped('https://example.com/a')], 'solar');

        now += 61_000;

        expect(await store.get(documentKey('https://example.com/a'))).toBeUndefined();
    });

    it('should report failure when a write throws but keep writing the rest', async () => {
        const set = vi.spyOn(store, 'set').mockRejectedValueOnce(new Error('disk full'));
        const sink = new StoreDocumentSink(store, 60);

        const ok = await sink.persist([scraped('https://example.com/a'), scraped('https://example.com/c')], 'solar');

        expect(ok).toBe(false);
        expect(set).toHaveBeenCalledTimes(2);
        expect(await store.exists(documentKey('https://example.com/c'))).toBe(true);
    });
});
