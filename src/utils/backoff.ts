// src/utils/backoff.ts
// Exponential backoff policy and the retry loop every adapter call goes through

import {
    PermanentProviderError,
    ProviderUnavailableError,
    TransientProviderError,
    describeError
} from '../errors';
import { Clock, systemClock } from './clock';

export interface BackoffPolicy {
    maxAttempts: number;   // includes the first call
    baseDelayMs: number;
    maxDelayMs: number;
    jitter: number;        // 0-1, fraction of the delay that may be shaved off at random
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    jitter: 0.2
};

export interface RetryOptions {
    operation: string;
    clock?: Clock;
    random?: () => number;
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Delay before retry number `attempt` (1 = first retry)
 */
export function computeBackoffDelay(
    policy: BackoffPolicy,
    attempt: number,
    random: () => number = Math.random
): number {
    const exponential = policy.baseDelayMs * Math.pow(2, attempt - 1);
    const capped = Math.min(policy.maxDelayMs, exponential);
    const jitter = Math.min(1, Math.max(0, policy.jitter));
    return Math.round(capped * (1 - jitter * random()));
}

export function defaultIsRetryable(error: unknown): boolean {
    return error instanceof TransientProviderError;
}

/**
 * Run `operation` until it succeeds, a non-retryable error is thrown,
 * or the policy runs out of attempts (ProviderUnavailableError).
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: BackoffPolicy,
    options: RetryOptions
): Promise<T> {
    const clock = options.clock ?? systemClock;
    const random = options.random ?? Math.random;
    const isRetryable = options.isRetryable ?? defaultIsRetryable;
    const maxAttempts = Math.max(1, policy.maxAttempts);

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (!isRetryable(error)) {
                throw error;
            }
            lastError = error;
            if (attempt === maxAttempts) {
                break;
            }

            const delay = computeBackoffDelay(policy, attempt, random);
            console.warn(`[Retry] ${options.operation} attempt ${attempt}/${maxAttempts} failed: ${describeError(error)}. Retrying in ${delay}ms`);
            options.onRetry?.(attempt, delay, error);
            await clock.sleep(delay);
        }
    }

    throw new ProviderUnavailableError(options.operation, maxAttempts, lastError);
}

/**
 * Bound a single external call. A timeout counts as a transient failure.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
    if (timeoutMs <= 0) {
        return promise;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
            () => reject(new TransientProviderError(`${operation} timed out after ${timeoutMs}ms`)),
            timeoutMs
        );
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        if (timer) clearTimeout(timer);
    }
}

/**
 * Map an HTTP-ish status to the provider error taxonomy
 */
export function classifyProviderStatus(
    status: number | undefined,
    message: string,
    cause?: unknown
): TransientProviderError | PermanentProviderError {
    if (status === undefined || status === 408 || status === 429 || status >= 500) {
        return new TransientProviderError(message, status, cause);
    }
    return new PermanentProviderError(message, status, cause);
}
