export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(message: string, code: string = 'INTERNAL_ERROR', statusCode: number = 500, isOperational: boolean = true) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this);
    }
}

export class NetworkError extends AppError {
    constructor(message: string) {
        super(message, 'NETWORK_ERROR', 503);
    }
}

/**
 * Non-2xx answer from an upstream HTTP API.
 */
export class ApiError extends AppError {
    constructor(message: string, public readonly status: number, public readonly statusText: string = '') {
        super(message, 'UPSTREAM_API_ERROR', 502);
    }
}

export class ConfigError extends AppError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', 500, false); // Usually fatal at startup
    }
}

export class ValidationError extends AppError {
    public readonly details: unknown;

    constructor(message: string, details?: unknown) {
        super(message, 'VALIDATION_ERROR', 400);
        this.details = details;
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 'NOT_FOUND', 404);
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super(message, 'CONFLICT', 409);
    }
}

export class AuthError extends AppError {
    constructor(message: string) {
        super(message, 'UNAUTHORIZED', 401);
    }
}

/**
 * A pipeline phase that cannot run at all (as opposed to one whose
 * sub-operations failed).
 */
export class PhaseError extends AppError {
    constructor(public readonly phase: string, message: string) {
        super(`[${phase}] ${message}`, 'PHASE_ERROR', 500);
    }
}

export class InvalidTransitionError extends AppError {
    constructor(public readonly from: string, public readonly to: string) {
        super(`Illegal status transition: ${from} -> ${to}`, 'INVALID_TRANSITION', 409);
    }
}

export class CancelledError extends AppError {
    constructor(message: string = 'Operation cancelled') {
        super(message, 'CANCELLED', 499);
    }
}

export function toError(value: unknown): Error {
    if (value instanceof Error) return value;
    if (typeof value === 'string') return new Error(value);
    try {
        return new Error(JSON.stringify(value));
    } catch {
        return new Error(String(value));
    }
}

export function errorMessage(value: unknown): string {
    return toError(value).message;
}
