#!/usr/bin/env node
import { CLIUtils, errorMessage } from '@content-research/shared';
import { cliContext } from './cli-context';
import { cacheCommand } from './commands/cache';
import { configCommand } from './commands/config';
import { jobsCommand } from './commands/jobs';
import { researchCommand } from './commands/research';
import { searchCommand } from './commands/search';
import { serveCommand } from './commands/serve';
import { validateCommand } from './commands/validate';

const program = CLIUtils.createProgram('researcher', 'Search, scrape, analyze and report on a topic');

program
    .option('--profile <profile>', 'Config profile (dev|prod|test)')
    .option('-c, --config-dir <dir>', 'Directory holding config[.<profile>].{yaml,yml,json}')
    .option('-v, --verbose', 'Enable debug logging', false)
    .hook('preAction', (thisCommand) => {
        const opts = thisCommand.opts<{ profile?: string; configDir?: string; verbose: boolean }>();
        cliContext.set({
            profile: opts.profile,
            configDir: opts.configDir,
            verbose: opts.verbose
        });
    });

program.addCommand(researchCommand);
program.addCommand(searchCommand);
program.addCommand(serveCommand);
program.addCommand(jobsCommand);
program.addCommand(cacheCommand);
program.addCommand(configCommand);
program.addCommand(validateCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    CLIUtils.error(errorMessage(error));
    process.exit(1);
});
