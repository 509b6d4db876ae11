import { z } from 'zod';
import { ConfigLoader } from '@content-research/shared';
import type { ConfigProfile } from '@content-research/shared';

// Env values that look numeric are coerced to numbers by the loader.
const secret = z.preprocess(
    value => (typeof value === 'number' ? String(value) : value),
    z.string().min(1).optional()
);

const RedisConfigSchema = z.object({
    enabled: z.boolean().default(true),
    host: z.string().default('localhost'),
    port: z.number().int().positive().default(6379),
    db: z.number().int().min(0).default(0),
    password: secret,
    keyPrefix: z.string().default('crp:'),
    connectTimeoutMs: z.number().int().positive().default(5000)
});

const CacheConfigSchema = z.object({
    sweepIntervalSeconds: z.number().positive().default(3600),
    searchTtlSeconds: z.number().positive().default(3600),
    scrapeTtlSeconds: z.number().positive().default(7200),
    documentTtlSeconds: z.number().positive().default(7 * 24 * 3600)
});

const PipelineConfigSchema = z.object({
    maxSearchResults: z.number().int().min(1).max(10).default(5),
    scrapeConcurrency: z.number().int().positive().default(5),
    credibilityConcurrency: z.number().int().positive().default(5)
});

const SearchConfigSchema = z.object({
    apiKey: secret,
    engineId: secret,
    baseUrl: z.string().url().default('https://www.googleapis.com/customsearch/v1'),
    timeoutMs: z.number().int().positive().default(10000),
    newsSites: z.array(z.string()).default(['news.google.com', 'reuters.com', 'apnews.com', 'bbc.com', 'cnn.com'])
});

const ScraperConfigSchema = z.object({
    timeoutMs: z.number().int().positive().default(30000),
    maxContentLength: z.number().int().positive().default(10_000_000),
    maxTextLength: z.number().int().positive().default(100_000),
    userAgent: z.string().default('Mozilla/5.0 (compatible; ContentResearchBot/1.0)')
});

const LlmConfigSchema = z.object({
    apiKey: secret,
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
    model: z.string().default('gpt-4o-mini'),
    temperature: z.number().min(0).max(2).default(0),
    maxTokens: z.number().int().positive().default(2000),
    timeoutMs: z.number().int().positive().default(60000),
    maxTopics: z.number().int().positive().default(5)
});

const ServerConfigSchema = z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().positive().default(8000),
    apiKey: secret
});

const JobsConfigSchema = z.object({
    reportsDir: z.string().default('reports'),
    retentionHours: z.number().positive().default(7 * 24)
});

const LogConfigSchema = z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    environment: z.enum(['development', 'production', 'test']).optional()
});

export const ResearcherConfigSchema = z.object({
    redis: RedisConfigSchema.default({}),
    cache: CacheConfigSchema.default({}),
    pipeline: PipelineConfigSchema.default({}),
    search: SearchConfigSchema.default({}),
    scraper: ScraperConfigSchema.default({}),
    llm: LlmConfigSchema.default({}),
    server: ServerConfigSchema.default({}),
    jobs: JobsConfigSchema.default({}),
    log: LogConfigSchema.default({})
});

export type ResearcherConfig = z.infer<typeof ResearcherConfigSchema>;
export type RedisConfig = z.infer<typeof RedisConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ScraperConfig = z.infer<typeof ScraperConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    configPaths?: string[];
    profile?: ConfigProfile;
}

/**
 * Loads `config[.<profile>].{yaml,yml,json}` and `RESEARCHER_*` variables.
 * The conventional provider variables (GOOGLE_API_KEY, GOOGLE_CSE_ID,
 * OPENAI_API_KEY, API_KEY) fill in keys left unset.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResearcherConfig {
    const env = options.env ?? process.env;
    const config = new ConfigLoader({
        schema: ResearcherConfigSchema,
        appName: 'researcher',
        env,
        configPaths: options.configPaths,
        profile: options.profile
    }).load();

    return {
        ...config,
        search: {
            ...config.search,
            apiKey: config.search.apiKey ?? (env.GOOGLE_API_KEY || undefined),
            engineId: config.search.engineId ?? (env.GOOGLE_CSE_ID || undefined)
        },
        llm: {
            ...config.llm,
            apiKey: config.llm.apiKey ?? (env.OPENAI_API_KEY || undefined)
        },
        server: {
            ...config.server,
            apiKey: config.server.apiKey ?? (env.API_KEY || undefined)
        }
    };
}
