// src/utils/index.ts

export { systemClock, VirtualClock } from './clock';
export type { Clock } from './clock';
export {
    DEFAULT_BACKOFF,
    computeBackoffDelay,
    defaultIsRetryable,
    withRetry,
    withTimeout,
    classifyProviderStatus
} from './backoff';
export type { BackoffPolicy, RetryOptions } from './backoff';
export { RateLimiter, unlimited } from './RateLimiter';
export type { RateLimiterOptions } from './RateLimiter';
export { runWithConcurrency } from './concurrency';
