import * as fs from 'fs/promises';
import { Command } from 'commander';
import { CLIUtils, errorMessage } from '@content-research/shared';
import type { ResearcherConfig } from '../config';
import { loadCliConfig } from '../cli-context';

/** Credentials the pipeline needs but the configuration leaves unset. */
export function missingCredentials(config: ResearcherConfig): string[] {
    const missing: string[] = [];
    if (!config.llm.apiKey) missing.push('LLM API key not set (llm.apiKey or OPENAI_API_KEY)');
    if (!config.search.apiKey) missing.push('Search API key not set (search.apiKey or GOOGLE_API_KEY)');
    if (!config.search.engineId) missing.push('Search engine id not set (search.engineId or GOOGLE_CSE_ID)');
    return missing;
}

/** Creates the reports directory if needed; the error message when it cannot. */
export async function checkReportsDir(dir: string): Promise<string | undefined> {
    try {
        await fs.mkdir(dir, { recursive: true });
        await fs.access(dir, fs.constants.W_OK);
        return undefined;
    } catch (e) {
        return `Cannot write to reports directory ${dir}: ${errorMessage(e)}`;
    }
}

export const validateCommand = new Command('validate')
    .description('Check the configuration and report missing credentials')
    .action(async () => {
        console.log('Validating configuration...');
        const config = loadCliConfig();
        CLIUtils.success('Configuration file and environment parsed');

        const errors = missingCredentials(config);
        const dirError = await checkReportsDir(config.jobs.reportsDir);
        if (dirError) {
            errors.push(dirError);
        } else {
            CLIUtils.success(`Reports directory ${config.jobs.reportsDir} is writable`);
        }

        if (errors.length > 0) {
            console.log('\nValidation errors:');
            errors.forEach(error => CLIUtils.error(error));
            process.exitCode = 1;
            return;
        }
        CLIUtils.success('All validations passed');
    });
