import { PhaseError } from '@content-research/shared';
import { PhaseAggregator } from '../src/concurrency/phase-aggregator';

interface SearchFields {
    news: string[];
    images: string[];
    videos: string[];
}

const emptyFields = (): SearchFields => ({ news: [], images: [], videos: [] });

describe('PhaseAggregator', () => {
    it('should assign each value to its own key', async () => {
        const { values, failures } = await new PhaseAggregator('search', emptyFields)
            .add('news', async () => ['n1'])
            .add('images', async () => ['i1', 'i2'])
            .add('videos', async () => ['v1'])
            .run();

        expect(values).toEqual({ news: ['n1'], images: ['i1', 'i2'], videos: ['v1'] });
        expect(failures).toEqual([]);
    });

    it('should keep the default for a failed key and report it', async () => {
        const { values, failures } = await new PhaseAggregator('search', emptyFields)
            .add('news', async () => ['n1'])
            .add('images', async () => { throw new Error('quota exceeded'); })
            .add('videos', async () => ['v1'])
            .run();

        expect(values).toEqual({ news: ['n1'], images: [], videos: ['v1'] });
        expect(failures).toHaveLength(1);
        expect(failures[0].key).toBe('images');
        expect(failures[0].failure.message).toBe('quota exceeded');
    });

    it('should assign by key even when operations finish out of order', async () => {
        const slow = () => new Promise<string[]>(resolve => setTimeout(() => resolve(['slow']), 20));

        const { values } = await new PhaseAggregator('search', emptyFields)
            .add('news', slow)
            .add('images', async () => ['fast'])
            .run();

        expect(values.news).toEqual(['slow']);
        expect(values.images).toEqual(['fast']);
        expect(values.videos).toEqual([]);
    });

    it('should return all defaults when every operation fails', async () => {
        const { values, failures } = await new PhaseAggregator('search', emptyFields)
            .add('news', async () => { throw new Error('a'); })
            .add('videos', async () => { throw new Error('b'); })
            .run();

        expect(values).toEqual(emptyFields());
        expect(failures.map(f => f.key)).toEqual(['news', 'videos']);
    });

    it('should refuse to run with no operations', async () => {
        await expect(new PhaseAggregator('search', emptyFields).run()).rejects.toThrow(PhaseError);
    });
});
