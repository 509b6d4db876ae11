import { Command } from 'commander';
import { withServices } from '../cli-context';
import type { SearchProvider } from '../pipeline/collaborators';
import { parseMaxResults, parseSearchType } from './options';
import type { SearchType } from './search-types';

export interface SearchListing {
    title: string;
    link: string;
    snippet?: string;
}

interface SearchCommandOptions {
    maxResults: number;
    type: SearchType;
}

export async function runSearch(search: SearchProvider, query: string, type: SearchType, limit: number): Promise<SearchListing[]> {
    switch (type) {
        case 'web':
            return search.web(query, limit);
        case 'news':
            return search.news(query, limit);
        case 'images':
            return search.images(query, limit);
        case 'videos':
            return search.videos(query, limit);
    }
}

export function formatSearchResults(query: string, type: SearchType, results: SearchListing[]): string[] {
    const lines = [
        `Search results for: ${query}`,
        `Type: ${type}`,
        `Results: ${results.length}`,
        '-'.repeat(50)
    ];
    results.forEach((result, i) => {
        lines.push(`${i + 1}. ${result.title}`, `   ${result.link}`);
        if (result.snippet) lines.push(`   ${result.snippet}`);
        lines.push('');
    });
    return lines;
}

export const searchCommand = new Command('search')
    .description('Run a single search without scraping or analysis')
    .argument('<query>', 'Search query')
    .option('-n, --max-results <n>', 'Number of results (1-10)', parseMaxResults, 5)
    .option('-t, --type <type>', 'web, news, images or videos', parseSearchType, 'web')
    .action(async (query: string, opts: SearchCommandOptions) => {
        await withServices(async ({ search }) => {
            const results = await runSearch(search, query, opts.type, opts.maxResults);
            console.log(formatSearchResults(query, opts.type, results).join('\n'));
        });
    });
