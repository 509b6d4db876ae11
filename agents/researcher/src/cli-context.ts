import { parseProfile } from '@content-research/shared';
import { loadConfig } from './config';
import type { ResearcherConfig } from './config';
import { createResearchServices, createRootLogger } from './container';
import type { ResearchServices } from './container';

export interface CliContextState {
    profile?: string;
    configDir?: string;
    verbose: boolean;
}

const state: CliContextState = {
    verbose: false
};

export const cliContext = {
    get: () => state,
    set: (newState: Partial<CliContextState>) => {
        Object.assign(state, newState);
    }
};

export function loadCliConfig(): ResearcherConfig {
    const { profile, configDir, verbose } = cliContext.get();
    const config = loadConfig({
        profile: profile ? parseProfile(profile) : undefined,
        configPaths: configDir ? [configDir] : undefined
    });
    return verbose ? { ...config, log: { ...config.log, level: 'debug' } } : config;
}

/**
 * Builds the services for one command, runs it and shuts everything down,
 * including on failure.
 */
export async function withServices<T>(action: (services: ResearchServices) => Promise<T>): Promise<T> {
    const config = loadCliConfig();
    const services = await createResearchServices({ config, logger: createRootLogger(config) });
    try {
        return await action(services);
    } finally {
        await services.shutdown();
    }
}
