import { Command } from 'commander';
import { CLIUtils } from '@content-research/shared';
import { withServices } from '../cli-context';

interface CacheOptions {
    stats?: boolean;
    clear?: boolean;
    sweep?: boolean;
}

export const cacheCommand = new Command('cache')
    .description('Inspect or maintain the state store')
    .option('--stats', 'Show store statistics')
    .option('--clear', 'Remove every cached entry and job')
    .option('--sweep', 'Evict expired in-memory entries now')
    .action(async (opts: CacheOptions) => {
        if (!opts.stats && !opts.clear && !opts.sweep) {
            console.log('Usage: researcher cache [--stats] [--clear] [--sweep]');
            return;
        }

        await withServices(async ({ store, sweeper }) => {
            if (opts.sweep) {
                const evicted = await sweeper.runOnce();
                CLIUtils.success(`Evicted ${evicted} expired entr${evicted === 1 ? 'y' : 'ies'}`);
            }
            if (opts.clear) {
                const removed = await CLIUtils.withSpinner('Clearing store', () => store.clear());
                CLIUtils.success(`Removed ${removed} entr${removed === 1 ? 'y' : 'ies'}`);
            }
            if (opts.stats) {
                const stats = store.stats();
                CLIUtils.printKeyValues({
                    Mode: stats.mode,
                    Backend: stats.backend,
                    'Fallback entries': stats.totalEntries,
                    Active: stats.activeEntries,
                    Expired: stats.expiredEntries,
                    'Approx. size (bytes)': stats.estimatedSizeBytes,
                    Indexes: stats.indexes
                });
            }
        });
    });
