import { describe, expect, it, vi } from 'vitest';
import {
    ConfigurationError,
    MalformedOutputError,
    PermanentProviderError,
    ProviderUnavailableError,
    TransientProviderError
} from '../errors';
import { VirtualClock } from '../utils/clock';
import { unlimited } from '../utils/RateLimiter';
import { CompletionClient } from './CompletionClient';
import { GenerationConfig, MODE_CONFIGS } from './types';

const policy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0 };

function provider(name: string, reply = `${name} reply`) {
    return { name, complete: vi.fn(async (_prompt: string, _config: GenerationConfig) => reply) };
}

function clientFor(providers: ReturnType<typeof provider>[], clock: VirtualClock) {
    return new CompletionClient(providers, { limiter: unlimited(clock), policy, timeoutMs: 0, clock });
}

describe('CompletionClient', () => {
    it('uses the first provider when it answers', async () => {
        const clock = new VirtualClock();
        const groq = provider('groq');
        const gemini = provider('gemini');

        await expect(clientFor([groq, gemini], clock).complete('prompt', MODE_CONFIGS.answer)).resolves.toBe('groq reply');
        expect(groq.complete).toHaveBeenCalledWith('prompt', MODE_CONFIGS.answer);
        expect(gemini.complete).not.toHaveBeenCalled();
    });

    it('falls back to the next provider on a permanent failure', async () => {
        const clock = new VirtualClock();
        const groq = provider('groq');
        groq.complete.mockRejectedValue(new PermanentProviderError('invalid api key', 401));
        const gemini = provider('gemini');

        await expect(clientFor([groq, gemini], clock).complete('prompt', MODE_CONFIGS.answer)).resolves.toBe('gemini reply');
        expect(groq.complete).toHaveBeenCalledTimes(1);
        expect(clock.sleeps).toEqual([]);
    });

    it('falls back once the first provider runs out of retries', async () => {
        const clock = new VirtualClock();
        const groq = provider('groq');
        groq.complete.mockRejectedValue(new TransientProviderError('rate limited', 429));
        const gemini = provider('gemini');

        await expect(clientFor([groq, gemini], clock).complete('prompt', MODE_CONFIGS.answer)).resolves.toBe('gemini reply');
        expect(groq.complete).toHaveBeenCalledTimes(3);
        expect(clock.sleeps).toEqual([100, 200]);
    });

    it('throws the last error when every provider fails', async () => {
        const clock = new VirtualClock();
        const groq = provider('groq');
        groq.complete.mockRejectedValue(new PermanentProviderError('invalid api key', 401));
        const gemini = provider('gemini');
        gemini.complete.mockRejectedValue(new TransientProviderError('overloaded', 503));

        const promise = clientFor([groq, gemini], clock).complete('prompt', MODE_CONFIGS.answer);

        await expect(promise).rejects.toBeInstanceOf(ProviderUnavailableError);
        await expect(promise).rejects.toThrow('gemini completion failed after 3 attempts: overloaded');
    });

    it('does not fall back on errors that are not provider failures', async () => {
        const clock = new VirtualClock();
        const groq = provider('groq');
        groq.complete.mockRejectedValue(new MalformedOutputError('empty completion'));
        const gemini = provider('gemini');

        await expect(clientFor([groq, gemini], clock).complete('prompt', MODE_CONFIGS.answer)).rejects.toBeInstanceOf(MalformedOutputError);
        expect(gemini.complete).not.toHaveBeenCalled();
    });

    it('needs at least one provider', () => {
        expect(() => clientFor([], new VirtualClock())).toThrow(ConfigurationError);
    });
});
