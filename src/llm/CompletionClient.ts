// src/llm/CompletionClient.ts
// Ordered provider fallback (Groq first when configured, Gemini behind it)

import { ConfigurationError, isFatalProviderError } from '../errors';
import { BackoffPolicy, DEFAULT_BACKOFF, withRetry, withTimeout } from '../utils/backoff';
import { Clock, systemClock } from '../utils/clock';
import { RateLimiter } from '../utils/RateLimiter';
import { Completer, CompletionProvider, GenerationConfig } from './types';

export interface CompletionClientOptions {
    policy?: BackoffPolicy;
    limiter: RateLimiter;
    timeoutMs?: number;
    clock?: Clock;
    random?: () => number;
}

/**
 * CompletionClient - retry, timeout and rate limiting around each provider
 *
 * A provider that fails permanently or runs out of retries hands over to the
 * next one. When every provider has failed the last error is thrown.
 */
export class CompletionClient implements Completer {
    private providers: CompletionProvider[];
    private policy: BackoffPolicy;
    private limiter: RateLimiter;
    private timeoutMs: number;
    private clock: Clock;
    private random: () => number;

    constructor(providers: CompletionProvider[], options: CompletionClientOptions) {
        if (providers.length === 0) {
            throw new ConfigurationError('CompletionClient needs at least one provider');
        }
        this.providers = providers;
        this.policy = options.policy ?? DEFAULT_BACKOFF;
        this.limiter = options.limiter;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.clock = options.clock ?? systemClock;
        this.random = options.random ?? Math.random;
    }

    get providerNames(): string[] {
        return this.providers.map(provider => provider.name);
    }

    async complete(prompt: string, config: GenerationConfig): Promise<string> {
        let lastError: unknown;

        for (const [index, provider] of this.providers.entries()) {
            const operation = `${provider.name} completion`;
            try {
                return await withRetry(
                    () => this.limiter.schedule(() =>
                        withTimeout(provider.complete(prompt, config), this.timeoutMs, operation)
                    ),
                    this.policy,
                    { operation, clock: this.clock, random: this.random }
                );
            } catch (error) {
                if (!isFatalProviderError(error)) {
                    throw error;
                }
                lastError = error;
                if (index < this.providers.length - 1) {
                    console.warn(`[CompletionClient] ${provider.name} failed: ${error.message}, falling back to ${this.providers[index + 1].name}`);
                }
            }
        }

        console.error(`[CompletionClient] All providers failed (${this.providerNames.join(', ')})`);
        throw lastError;
    }
}
