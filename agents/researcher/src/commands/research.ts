import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { CLIUtils } from '@content-research/shared';
import { withServices } from '../cli-context';
import type { PipelineResult } from '../types';
import { parseMaxResults } from './options';

export function reportFileName(query: string, at: Date): string {
    const slug = query.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '').slice(0, 50) || 'research';
    return `${slug}-${at.toISOString().replace(/[:.]/g, '-')}.md`;
}

function printSummary(result: PipelineResult): void {
    const { state } = result;
    CLIUtils.printKeyValues({
        Status: state.status,
        Sources: state.searchResults.length,
        Scraped: `${state.scrapedContent.filter(c => c.type !== 'error').length}/${state.scrapedContent.length}`,
        Images: state.images.length,
        Videos: state.videos.length,
        Analysis: state.analysis?.kind ?? 'none',
        'Time (s)': (result.processingTimeMs / 1000).toFixed(1)
    });
}

interface ResearchCommandOptions {
    maxResults?: number;
    images: boolean;
    videos: boolean;
    news: boolean;
    output?: string;
}

export const researchCommand = new Command('research')
    .argument('<query>', 'Research query')
    .description('Run the research pipeline in this process and save the report')
    .option('-n, --max-results <n>', 'Search results to fetch (1-10)', parseMaxResults)
    .option('--no-images', 'Skip image search')
    .option('--no-videos', 'Skip video search')
    .option('--no-news', 'Skip news search')
    .option('-o, --output <file>', 'Report file (default: <reportsDir>/<slug>-<timestamp>.md)')
    .action(async (query: string, opts: ResearchCommandOptions) => {
        const result = await withServices(async services => {
            console.log(`🔎 Researching "${query}"...`);
            const result = await services.pipeline.run(query, {
                maxResults: opts.maxResults,
                includeImages: opts.images,
                includeVideos: opts.videos,
                includeNews: opts.news
            });

            if (result.report) {
                const file = opts.output ?? path.join(services.config.jobs.reportsDir, reportFileName(query, new Date()));
                await fs.mkdir(path.dirname(file), { recursive: true });
                await fs.writeFile(file, result.report, 'utf-8');
                CLIUtils.success(`Report saved to ${file}`);
            }
            return result;
        });

        printSummary(result);
        if (result.state.status !== 'completed') {
            CLIUtils.error(`Research failed: ${result.error ?? 'unknown error'}`);
            process.exitCode = 1;
        }
    });
