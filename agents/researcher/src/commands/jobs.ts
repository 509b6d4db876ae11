import { Command } from 'commander';
import { CLIUtils } from '@content-research/shared';
import { withServices } from '../cli-context';
import type { JobStatus } from '../types';
import { parseHours, parseJobStatus, parseLimit } from './options';

function formatTime(epochMs: number | undefined): string {
    return epochMs === undefined ? '-' : new Date(epochMs).toISOString();
}

const jobs = new Command('jobs').description('Inspect and manage research jobs');

jobs.command('list')
    .description('List the most recent jobs')
    .option('-l, --limit <n>', 'Maximum jobs to show', parseLimit, 10)
    .option('-s, --status <status>', 'Only jobs in this status (pending|running|completed|failed)', parseJobStatus)
    .action(async (opts: { limit: number; status?: JobStatus }) => {
        await withServices(async ({ registry }) => {
            const [total, records] = await Promise.all([
                registry.count(opts.status),
                registry.list(opts.limit, opts.status)
            ]);
            CLIUtils.printTable(
                ['Job', 'Status', 'Query', 'Created', 'Completed'],
                records.map(job => [job.jobId, job.status, job.query, formatTime(job.createdAt), formatTime(job.completedAt)])
            );
            console.log(`\nShowing ${records.length} of ${total} job(s).`);
        });
    });

jobs.command('status <jobId>')
    .description('Show one job')
    .option('--json', 'Print the full record as JSON')
    .action(async (jobId: string, opts: { json?: boolean }) => {
        await withServices(async ({ registry }) => {
            const job = await registry.get(jobId);
            if (!job) {
                CLIUtils.error(`Job ${jobId} not found`);
                process.exitCode = 1;
                return;
            }
            if (opts.json) {
                console.log(JSON.stringify(job, null, 2));
                return;
            }
            CLIUtils.printKeyValues({
                Job: job.jobId,
                Status: job.status,
                Query: job.query,
                Created: formatTime(job.createdAt),
                Started: formatTime(job.startedAt),
                Completed: formatTime(job.completedAt),
                Report: job.result?.reportPath,
                Error: job.error
            });
        });
    });

jobs.command('delete <jobId>')
    .description('Delete a completed or failed job')
    .action(async (jobId: string) => {
        await withServices(async ({ registry }) => {
            const outcome = await registry.delete(jobId);
            switch (outcome) {
                case 'deleted':
                    CLIUtils.success(`Job ${jobId} deleted`);
                    return;
                case 'not_found':
                    CLIUtils.error(`Job ${jobId} not found`);
                    break;
                case 'not_terminal':
                    CLIUtils.error(`Job ${jobId} is still running and cannot be deleted`);
                    break;
            }
            process.exitCode = 1;
        });
    });

jobs.command('purge')
    .description('Delete finished jobs older than the retention window')
    .option('--older-than <hours>', 'Age in hours (default: jobs.retentionHours)', parseHours)
    .action(async (opts: { olderThan?: number }) => {
        await withServices(async ({ registry, config }) => {
            const hours = opts.olderThan ?? config.jobs.retentionHours;
            const removed = await registry.purgeFinished(hours * 3600 * 1000);
            CLIUtils.success(`Purged ${removed} job(s) older than ${hours}h`);
        });
    });

export const jobsCommand = jobs;
