import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import * as yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { ConfigError } from '../errors';

// Load environment variables immediately
dotenv.config();

export type ConfigProfile = 'dev' | 'prod' | 'test' | 'default';

type ConfigTree = Record<string, unknown>;

export interface ConfigOptions<T extends z.ZodTypeAny> {
    schema: T;
    appName: string;
    profile?: ConfigProfile;
    configPaths?: string[];
    env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is ConfigTree {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseProfile(value: string | undefined): ConfigProfile {
    switch (value) {
        case 'dev':
        case 'prod':
        case 'test':
            return value;
        case 'development':
            return 'dev';
        case 'production':
            return 'prod';
        default:
            return 'default';
    }
}

/**
 * Layered configuration: config files, then `<APPNAME>_*` environment
 * variables (`__` separates nesting levels), validated by a zod schema.
 */
export class ConfigLoader<T extends z.ZodTypeAny> {
    private schema: T;
    private appName: string;
    private profile: ConfigProfile;
    private configPaths: string[];
    private env: NodeJS.ProcessEnv;

    constructor(options: ConfigOptions<T>) {
        this.schema = options.schema;
        this.appName = options.appName;
        this.env = options.env || process.env;
        this.profile = options.profile || parseProfile(this.env.NODE_ENV);
        this.configPaths = options.configPaths || [
            process.cwd(),
            path.join(os.homedir(), '.config', this.appName),
            path.join('/etc', this.appName)
        ];
    }

    public load(): z.infer<T> {
        let loadedConfig: ConfigTree = {};

        // Order: default -> profile specific
        const filesToTry = [
            'config',
            `config.${this.profile}`
        ];

        const extensions = ['.yaml', '.yml', '.json'];

        for (const dir of this.configPaths) {
            for (const fileBase of filesToTry) {
                for (const ext of extensions) {
                    const filePath = path.join(dir, fileBase + ext);
                    if (fs.existsSync(filePath)) {
                        try {
                            const content = fs.readFileSync(filePath, 'utf-8');
                            const parsed: unknown = ext === '.json' ? JSON.parse(content) : yaml.load(content);
                            if (isRecord(parsed)) {
                                loadedConfig = this.mergeDeep(loadedConfig, parsed);
                            }
                        } catch (e) {
                            console.warn(`Failed to load config file ${filePath}:`, e);
                        }
                    }
                }
            }
        }

        const envConfig = this.mapEnvToConfig(this.appName.toUpperCase().replace(/-/g, '_'));
        loadedConfig = this.mergeDeep(loadedConfig, envConfig);

        const result = this.schema.safeParse(loadedConfig);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid ${this.appName} configuration: ${issues}`);
        }
        return result.data;
    }

    private mergeDeep(target: ConfigTree, source: ConfigTree): ConfigTree {
        const merged: ConfigTree = { ...target };

        for (const key of Object.keys(source)) {
            const targetValue = merged[key];
            const sourceValue = source[key];

            if (Array.isArray(targetValue) && Array.isArray(sourceValue)) {
                merged[key] = targetValue.concat(sourceValue);
            } else if (isRecord(targetValue) && isRecord(sourceValue)) {
                merged[key] = this.mergeDeep(targetValue, sourceValue);
            } else {
                merged[key] = sourceValue;
            }
        }

        return merged;
    }

    private mapEnvToConfig(prefix: string): ConfigTree {
        const config: ConfigTree = {};
        for (const key of Object.keys(this.env)) {
            const raw = this.env[key];
            if (!key.startsWith(prefix + '_') || raw === undefined) continue;

            // RESEARCHER_REDIS__HOST -> ['redis', 'host']
            const configKey = key.slice(prefix.length + 1);
            const parts = configKey.split('__').map(p => this.toCamelCase(p.toLowerCase()));

            let current = config;
            for (const part of parts.slice(0, -1)) {
                const next = current[part];
                if (isRecord(next)) {
                    current = next;
                } else {
                    const created: ConfigTree = {};
                    current[part] = created;
                    current = created;
                }
            }

            current[parts[parts.length - 1]] = this.coerce(raw);
        }
        return config;
    }

    private coerce(value: string): string | number | boolean {
        if (value === 'true') return true;
        if (value === 'false') return false;
        if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
        return value;
    }

    private toCamelCase(str: string): string {
        return str.replace(/_([a-z])/g, (g) => g[1].toUpperCase());
    }
}
