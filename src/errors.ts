// src/errors.ts
// Error taxonomy shared by adapters, stages and the orchestrator

/**
 * Error codes carried by every CopilotError
 */
export enum ErrorCode {
    TRANSIENT_PROVIDER = 'TRANSIENT_PROVIDER',
    PERMANENT_PROVIDER = 'PERMANENT_PROVIDER',
    PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
    MALFORMED_OUTPUT = 'MALFORMED_OUTPUT',
    DATA_INTEGRITY = 'DATA_INTEGRITY',
    CONFIGURATION = 'CONFIGURATION',
}

export class CopilotError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        cause?: unknown
    ) {
        super(message);
        this.name = 'CopilotError';
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

/**
 * Rate limit, timeout or 5xx from a provider. Retried with backoff.
 */
export class TransientProviderError extends CopilotError {
    constructor(
        message: string,
        public readonly status?: number,
        cause?: unknown
    ) {
        super(ErrorCode.TRANSIENT_PROVIDER, message, cause);
        this.name = 'TransientProviderError';
    }
}

/**
 * Auth or configuration failure from a provider. Never retried.
 */
export class PermanentProviderError extends CopilotError {
    constructor(
        message: string,
        public readonly status?: number,
        cause?: unknown
    ) {
        super(ErrorCode.PERMANENT_PROVIDER, message, cause);
        this.name = 'PermanentProviderError';
    }
}

/**
 * Raised once a call has used up its retry ceiling on transient errors.
 */
export class ProviderUnavailableError extends CopilotError {
    constructor(
        public readonly operation: string,
        public readonly attempts: number,
        cause?: unknown
    ) {
        super(
            ErrorCode.PROVIDER_UNAVAILABLE,
            `${operation} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeError(cause)}`,
            cause
        );
        this.name = 'ProviderUnavailableError';
    }
}

/**
 * Model output that could not be parsed or fell outside the allowed vocabulary.
 * Each component degrades to its own default; this never reaches the caller.
 */
export class MalformedOutputError extends CopilotError {
    constructor(message: string, public readonly rawOutput?: string, cause?: unknown) {
        super(ErrorCode.MALFORMED_OUTPUT, message, cause);
        this.name = 'MalformedOutputError';
    }
}

/**
 * Broken chunk offsets or a boundary inside a sentence. Always a defect.
 */
export class DataIntegrityError extends CopilotError {
    constructor(message: string) {
        super(ErrorCode.DATA_INTEGRITY, message);
        this.name = 'DataIntegrityError';
    }
}

export class ConfigurationError extends CopilotError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.CONFIGURATION, message, cause);
        this.name = 'ConfigurationError';
    }
}

/**
 * Errors that end a pipeline run: permanent failures and exhausted retries.
 */
export function isFatalProviderError(error: unknown): error is PermanentProviderError | ProviderUnavailableError {
    return error instanceof PermanentProviderError || error instanceof ProviderUnavailableError;
}

/**
 * Whether the caller should try the whole operation again later
 */
export function isRetryAdvisable(error: unknown): boolean {
    if (error instanceof ProviderUnavailableError || error instanceof TransientProviderError) {
        return true;
    }
    return false;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return JSON.stringify(error) ?? String(error);
}
