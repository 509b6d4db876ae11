/**
 * Langfuse telemetry for research runs.
 *
 * - Traces: one per pipeline run
 * - Spans: one per phase
 * - Events: failures and state changes
 *
 * Every method accepts a null handle so callers never branch on whether
 * Langfuse is configured.
 */

import { Langfuse, LangfuseTraceClient, LangfuseSpanClient } from 'langfuse';
import type { Logger } from './logger';

export type TelemetryMetadata = Record<string, unknown>;

export interface TelemetryConfig {
    enabled: boolean;
    publicKey?: string;
    secretKey?: string;
    host?: string;
    serviceName: string;
}

export interface TraceHandle {
    trace: LangfuseTraceClient;
    name: string;
    startTime: number;
}

export interface SpanHandle {
    span: LangfuseSpanClient;
    name: string;
    startTime: number;
}

export type EventLevel = 'DEFAULT' | 'DEBUG' | 'WARNING' | 'ERROR';

function getConfig(serviceName: string, env: NodeJS.ProcessEnv): TelemetryConfig {
    const enabled = env.LANGFUSE_ENABLED !== 'false' &&
        !!(env.LANGFUSE_PUBLIC_KEY && env.LANGFUSE_SECRET_KEY);

    return {
        enabled,
        publicKey: env.LANGFUSE_PUBLIC_KEY,
        secretKey: env.LANGFUSE_SECRET_KEY,
        host: env.LANGFUSE_HOST || env.LANGFUSE_URL || 'https://cloud.langfuse.com',
        serviceName
    };
}

function truncate(value: unknown, max: number): string | undefined {
    if (value === undefined) return undefined;
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    return text.substring(0, max);
}

export class Telemetry {
    private langfuse: Langfuse | null = null;
    private config: TelemetryConfig;
    private logger?: Logger;

    constructor(serviceName: string, configOverrides?: Partial<TelemetryConfig>, logger?: Logger) {
        this.config = { ...getConfig(serviceName, process.env), ...configOverrides };
        this.logger = logger;

        if (this.config.enabled && this.config.publicKey && this.config.secretKey) {
            this.langfuse = new Langfuse({
                publicKey: this.config.publicKey,
                secretKey: this.config.secretKey,
                baseUrl: this.config.host
            });
            this.logger?.debug('Langfuse client initialized', { host: this.config.host });
        }
    }

    isEnabled(): boolean {
        return this.langfuse !== null;
    }

    startTrace(name: string, input?: unknown, metadata?: TelemetryMetadata): TraceHandle | null {
        if (!this.langfuse) return null;

        const trace = this.langfuse.trace({
            name,
            input,
            metadata: {
                service: this.config.serviceName,
                ...metadata
            },
            tags: [this.config.serviceName, name]
        });

        return { trace, name, startTime: Date.now() };
    }

    endTrace(handle: TraceHandle | null, output?: unknown, success: boolean = true): void {
        if (!handle) return;

        handle.trace.update({
            output: truncate(output, 1000),
            metadata: {
                durationMs: Date.now() - handle.startTime,
                success
            }
        });
    }

    startSpan(trace: TraceHandle | null, name: string, input?: unknown): SpanHandle | null {
        if (!trace) return null;

        const span = trace.trace.span({
            name,
            input: truncate(input, 500)
        });

        return { span, name, startTime: Date.now() };
    }

    endSpan(handle: SpanHandle | null, output?: unknown, success: boolean = true): void {
        if (!handle) return;

        handle.span.end({
            output: truncate(output, 500),
            statusMessage: success ? 'success' : 'failed',
            level: success ? 'DEFAULT' : 'ERROR',
            metadata: { durationMs: Date.now() - handle.startTime, success }
        });
    }

    trackEvent(
        trace: TraceHandle | null,
        name: string,
        data?: TelemetryMetadata,
        level: EventLevel = 'DEFAULT'
    ): void {
        if (!trace) return;

        trace.trace.event({
            name,
            level,
            metadata: data
        });
    }

    async shutdown(): Promise<void> {
        if (!this.langfuse) return;
        await this.langfuse.shutdownAsync();
    }
}

export function createTelemetry(serviceName: string, logger?: Logger): Telemetry {
    return new Telemetry(serviceName, undefined, logger);
}
