// src/rag/EmbeddingClient.ts
// Batched embedding calls with retry, timeout and the shared rate limiter
// Uses Gemini text-embedding-004 (768 dimensions) by default

import { ApiError, GoogleGenAI } from '@google/genai';
import { CopilotError, MalformedOutputError, TransientProviderError, describeError } from '../errors';
import { BackoffPolicy, DEFAULT_BACKOFF, classifyProviderStatus, withRetry, withTimeout } from '../utils/backoff';
import { Clock, systemClock } from '../utils/clock';
import { RateLimiter } from '../utils/RateLimiter';
import { EmbeddingVector } from './types';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-004';

/**
 * Provider boundary: one request, no retry. Failures are thrown as
 * TransientProviderError or PermanentProviderError.
 */
export interface EmbeddingProvider {
    readonly name: string;
    embed(texts: string[], modelId: string): Promise<EmbeddingVector[]>;
}

/**
 * Gemini embeddings through @google/genai
 */
export class GeminiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'gemini';
    private client: GoogleGenAI;

    constructor(apiKey: string) {
        this.client = new GoogleGenAI({ apiKey });
        console.log('[GeminiEmbeddingProvider] Initialized');
    }

    async embed(texts: string[], modelId: string): Promise<EmbeddingVector[]> {
        try {
            const result = await this.client.models.embedContent({
                model: modelId,
                contents: texts,
                config: { taskType: 'QUESTION_ANSWERING' }
            });

            return (result.embeddings ?? []).map((embedding, i) => {
                if (!embedding.values || embedding.values.length === 0) {
                    throw new MalformedOutputError(`No embedding values returned for input ${i}`);
                }
                return embedding.values;
            });
        } catch (error) {
            throw toGeminiProviderError(error, 'Gemini embedContent');
        }
    }
}

/**
 * Map anything thrown by @google/genai onto the provider error taxonomy.
 * Errors without an HTTP status (network, DNS, reset) are transient.
 */
export function toGeminiProviderError(error: unknown, operation: string): CopilotError {
    if (error instanceof CopilotError) return error;
    if (error instanceof ApiError) {
        return classifyProviderStatus(error.status, `${operation}: ${error.message}`, error);
    }
    return new TransientProviderError(`${operation}: ${describeError(error)}`, undefined, error);
}

export interface EmbeddingClientOptions {
    modelId?: string;
    batchSize?: number;
    policy?: BackoffPolicy;
    limiter: RateLimiter;
    timeoutMs?: number;
    clock?: Clock;
    random?: () => number;
}

/**
 * EmbeddingClient - the only producer of EmbeddingVectors
 *
 * Output has the same order and count as the input. An exhausted retry
 * budget surfaces as ProviderUnavailableError, never as empty vectors.
 */
export class EmbeddingClient {
    private provider: EmbeddingProvider;
    private modelId: string;
    private batchSize: number;
    private policy: BackoffPolicy;
    private limiter: RateLimiter;
    private timeoutMs: number;
    private clock: Clock;
    private random: () => number;

    constructor(provider: EmbeddingProvider, options: EmbeddingClientOptions) {
        this.provider = provider;
        this.modelId = options.modelId ?? DEFAULT_EMBEDDING_MODEL;
        this.batchSize = Math.max(1, options.batchSize ?? 10);
        this.policy = options.policy ?? DEFAULT_BACKOFF;
        this.limiter = options.limiter;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.clock = options.clock ?? systemClock;
        this.random = options.random ?? Math.random;
    }

    async embed(texts: string[]): Promise<EmbeddingVector[]> {
        const vectors: EmbeddingVector[] = [];

        for (let offset = 0; offset < texts.length; offset += this.batchSize) {
            const batch = texts.slice(offset, offset + this.batchSize);
            const operation = `${this.provider.name} embed batch ${offset / this.batchSize + 1} (${batch.length} texts)`;

            const batchVectors = await withRetry(
                () => this.limiter.schedule(() =>
                    withTimeout(this.provider.embed(batch, this.modelId), this.timeoutMs, operation)
                ),
                this.policy,
                { operation, clock: this.clock, random: this.random }
            );

            if (batchVectors.length !== batch.length) {
                throw new MalformedOutputError(`${operation}: expected ${batch.length} vectors, got ${batchVectors.length}`);
            }
            vectors.push(...batchVectors);
        }

        const dimension = vectors[0]?.length ?? 0;
        if (vectors.some(vector => vector.length !== dimension)) {
            throw new MalformedOutputError(`Embedding dimensions differ within one request (expected ${dimension})`);
        }

        return vectors;
    }

    /**
     * Embed a single text (queries)
     */
    async embedOne(text: string): Promise<EmbeddingVector> {
        const [vector] = await this.embed([text]);
        if (!vector) {
            throw new MalformedOutputError('No embedding returned for query');
        }
        return vector;
    }
}
