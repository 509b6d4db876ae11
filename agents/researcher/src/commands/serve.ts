import { Command } from 'commander';
import { loadCliConfig } from '../cli-context';
import { createResearchServices, createRootLogger } from '../container';
import { startServer } from '../server';
import { parsePort } from './options';

interface ServeOptions {
    port?: number;
    host?: string;
}

export const serveCommand = new Command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('--host <host>', 'Interface to bind')
    .action(async (opts: ServeOptions) => {
        const loaded = loadCliConfig();
        const config = {
            ...loaded,
            server: {
                ...loaded.server,
                port: opts.port ?? loaded.server.port,
                host: opts.host ?? loaded.server.host
            }
        };
        const services = await createResearchServices({ config, logger: createRootLogger(config) });
        await startServer(services);
    });
