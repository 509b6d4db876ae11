/**
 * Shared utilities for the research packages
 */

export { Logger, initLogger, getLogger } from './logger';
export type { LoggerOptions, LogMeta } from './logger';

export {
    AppError,
    NetworkError,
    ApiError,
    ConfigError,
    ValidationError,
    NotFoundError,
    ConflictError,
    AuthError,
    PhaseError,
    InvalidTransitionError,
    CancelledError,
    toError,
    errorMessage
} from './errors';

export { ConfigLoader, parseProfile } from './config/loader';
export type { ConfigOptions, ConfigProfile } from './config/loader';

export { Telemetry, createTelemetry } from './telemetry';
export type {
    TelemetryConfig,
    TelemetryMetadata,
    TraceHandle,
    SpanHandle,
    EventLevel
} from './telemetry';

export { CLIUtils } from './cli';
export type { TableCell } from './cli';
