import { Command } from 'commander';
import type { ResearcherConfig } from '../config';
import { loadCliConfig } from '../cli-context';

const SECRET_MASK = '********';

/** The resolved configuration with every credential replaced by a mask. */
export function redactConfig(config: ResearcherConfig): ResearcherConfig {
    const mask = (value: string | undefined) => (value ? SECRET_MASK : undefined);
    return {
        ...config,
        redis: { ...config.redis, password: mask(config.redis.password) },
        search: { ...config.search, apiKey: mask(config.search.apiKey) },
        llm: { ...config.llm, apiKey: mask(config.llm.apiKey) },
        server: { ...config.server, apiKey: mask(config.server.apiKey) }
    };
}

export const configCommand = new Command('config')
    .description('Print the resolved configuration (secrets masked)')
    .action(() => {
        console.log(JSON.stringify(redactConfig(loadCliConfig()), null, 2));
    });
