// src/config/settings.ts
// Typed settings for the segmentation engine and the query pipeline, read from the environment

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors';

const DEFAULT_RAG_ELIGIBLE_TOPICS = ['How-to', 'Product', 'Best practices', 'API/SDK', 'SSO'];

const csv = (fallback: string[]) =>
    z.string()
        .optional()
        .transform(value => value === undefined || value.trim() === ''
            ? fallback
            : value.split(',').map(item => item.trim()).filter(item => item.length > 0));

const bool = (fallback: boolean) =>
    z.string()
        .optional()
        .transform(value => value === undefined ? fallback : ['1', 'true', 'yes'].includes(value.toLowerCase()));

const CollectionSchema = z.object({
    name: z.string().min(1),
    label: z.string().min(1),
    k: z.number().int().positive()
});

export type KnowledgeCollection = z.infer<typeof CollectionSchema>;

const DEFAULT_COLLECTIONS: KnowledgeCollection[] = [
    { name: 'docs', label: 'Product Documentation', k: 3 },
    { name: 'developer', label: 'Developer Hub', k: 2 }
];

const collections = z.string()
    .optional()
    .transform((value, ctx) => {
        if (value === undefined || value.trim() === '') return DEFAULT_COLLECTIONS;
        try {
            return z.array(CollectionSchema).min(1).parse(JSON.parse(value));
        } catch (error) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `KNOWLEDGE_COLLECTIONS must be a JSON array of {name,label,k}: ${String(error)}` });
            return z.NEVER;
        }
    });

const EnvSchema = z.object({
    GEMINI_API_KEY: z.string().optional(),
    GROQ_API_KEY: z.string().optional(),
    GEMINI_EMBEDDING_MODEL: z.string().default('text-embedding-004'),
    GEMINI_COMPLETION_MODEL: z.string().default('gemini-2.5-flash'),
    GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
    DATABASE_PATH: z.string().default('copilot.db'),

    SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
    MIN_CHUNK_SIZE: z.coerce.number().int().positive().default(500),
    MAX_CHUNK_SIZE: z.coerce.number().int().positive().default(2000),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(10),

    RETRY_CEILING: z.coerce.number().int().positive().default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(30000),
    RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.2),
    CALL_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),

    INTER_CALL_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    RATE_LIMIT_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
    RATE_LIMIT_REQUESTS_PER_MINUTE: z.coerce.number().int().nonnegative().default(30),

    CONTEXT_CHAR_BUDGET: z.coerce.number().int().positive().default(6000),
    MIN_RETRIEVAL_SCORE: z.coerce.number().min(-1).max(1).default(0.25),
    RAG_ELIGIBLE_TOPICS: csv(DEFAULT_RAG_ELIGIBLE_TOPICS),
    KNOWLEDGE_COLLECTIONS: collections,

    PIPELINE_CONCURRENCY: z.coerce.number().int().positive().default(5),
    ROUTE_INELIGIBLE_TICKETS: bool(true)
});

export interface CoreSettings {
    geminiApiKey?: string;
    groqApiKey?: string;
    embeddingModel: string;
    completionModel: string;
    groqModel: string;
    databasePath: string;

    similarityThreshold: number;
    minChunkSize: number;
    maxChunkSize: number;
    batchSize: number;

    retryCeiling: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    retryJitter: number;
    callTimeoutMs: number;

    interCallDelayMs: number;
    rateLimitMinIntervalMs: number;
    rateLimitRequestsPerMinute: number;

    contextCharBudget: number;
    minRetrievalScore: number;
    ragEligibleTopics: string[];
    collections: KnowledgeCollection[];

    concurrency: number;
    routeIneligibleTickets: boolean;
}

/**
 * Build settings from an environment map.
 * Pass an explicit map in tests; the default reads `.env` into process.env first.
 */
export function loadSettings(env?: NodeJS.ProcessEnv): CoreSettings {
    let source = env;
    if (!source) {
        dotenv.config();
        source = process.env;
    }

    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigurationError(`Invalid configuration: ${detail}`);
    }

    const e = parsed.data;
    if (e.MIN_CHUNK_SIZE > e.MAX_CHUNK_SIZE) {
        throw new ConfigurationError(`MIN_CHUNK_SIZE (${e.MIN_CHUNK_SIZE}) must not exceed MAX_CHUNK_SIZE (${e.MAX_CHUNK_SIZE})`);
    }
    // A larger chunk could never enter the answer context
    if (e.CONTEXT_CHAR_BUDGET < e.MAX_CHUNK_SIZE) {
        throw new ConfigurationError(`CONTEXT_CHAR_BUDGET (${e.CONTEXT_CHAR_BUDGET}) must be at least MAX_CHUNK_SIZE (${e.MAX_CHUNK_SIZE})`);
    }

    return {
        geminiApiKey: e.GEMINI_API_KEY || undefined,
        groqApiKey: e.GROQ_API_KEY || undefined,
        embeddingModel: e.GEMINI_EMBEDDING_MODEL,
        completionModel: e.GEMINI_COMPLETION_MODEL,
        groqModel: e.GROQ_MODEL,
        databasePath: e.DATABASE_PATH,

        similarityThreshold: e.SIMILARITY_THRESHOLD,
        minChunkSize: e.MIN_CHUNK_SIZE,
        maxChunkSize: e.MAX_CHUNK_SIZE,
        batchSize: e.EMBEDDING_BATCH_SIZE,

        retryCeiling: e.RETRY_CEILING,
        retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
        retryMaxDelayMs: e.RETRY_MAX_DELAY_MS,
        retryJitter: e.RETRY_JITTER,
        callTimeoutMs: e.CALL_TIMEOUT_MS,

        interCallDelayMs: e.INTER_CALL_DELAY_MS,
        rateLimitMinIntervalMs: e.RATE_LIMIT_MIN_INTERVAL_MS,
        rateLimitRequestsPerMinute: e.RATE_LIMIT_REQUESTS_PER_MINUTE,

        contextCharBudget: e.CONTEXT_CHAR_BUDGET,
        minRetrievalScore: e.MIN_RETRIEVAL_SCORE,
        ragEligibleTopics: e.RAG_ELIGIBLE_TOPICS,
        collections: e.KNOWLEDGE_COLLECTIONS,

        concurrency: e.PIPELINE_CONCURRENCY,
        routeIneligibleTickets: e.ROUTE_INELIGIBLE_TICKETS
    };
}
