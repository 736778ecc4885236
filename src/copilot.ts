// src/copilot.ts
// Wires settings, providers, stores and stages into one object

import { CoreSettings } from './config/settings';
import { Taxonomy, loadTaxonomy, tagNames } from './config/taxonomy';
import { SqliteDatabase, openDatabase } from './db/database';
import { ConfigurationError } from './errors';
import { CompletionClient } from './llm/CompletionClient';
import { GeminiCompletionProvider, GroqCompletionProvider } from './llm/providers';
import { ResponseAssembler } from './llm/ResponseAssembler';
import { TicketClassifier } from './llm/TicketClassifier';
import { CompletionProvider } from './llm/types';
import { PipelineOrchestrator } from './pipeline/PipelineOrchestrator';
import { PipelineResult } from './pipeline/types';
import { EmbeddingClient, EmbeddingProvider, GeminiEmbeddingProvider } from './rag/EmbeddingClient';
import { IngestionManager } from './rag/IngestionManager';
import { RAGRetriever } from './rag/RAGRetriever';
import { SemanticChunker } from './rag/SemanticChunker';
import { SqliteVectorStore } from './rag/VectorStore';
import { TicketProcessor } from './tickets/TicketProcessor';
import { SqliteTicketStore } from './tickets/TicketStore';
import { BackoffPolicy } from './utils/backoff';
import { Clock, systemClock } from './utils/clock';
import { RateLimiter } from './utils/RateLimiter';

/**
 * Replace the real providers, database or clock (tests, local tooling)
 */
export interface CopilotOverrides {
    embeddingProvider?: EmbeddingProvider;
    completionProviders?: CompletionProvider[];
    db?: SqliteDatabase;
    taxonomy?: Taxonomy;
    clock?: Clock;
    random?: () => number;
}

export interface Copilot {
    settings: CoreSettings;
    taxonomy: Taxonomy;
    db: SqliteDatabase;
    limiter: RateLimiter;
    embeddings: EmbeddingClient;
    completions: CompletionClient;
    vectorStore: SqliteVectorStore;
    chunker: SemanticChunker;
    ingestion: IngestionManager;
    classifier: TicketClassifier;
    retriever: RAGRetriever;
    assembler: ResponseAssembler;
    orchestrator: PipelineOrchestrator;
    ticketStore: SqliteTicketStore;
    ticketProcessor: TicketProcessor;
    ask(query: string, signal?: AbortSignal): Promise<PipelineResult>;
    close(): void;
}

function completionProvidersFor(settings: CoreSettings): CompletionProvider[] {
    const providers: CompletionProvider[] = [];
    if (settings.groqApiKey) {
        providers.push(new GroqCompletionProvider(settings.groqApiKey, settings.groqModel));
    }
    if (settings.geminiApiKey) {
        providers.push(new GeminiCompletionProvider(settings.geminiApiKey, settings.completionModel));
    }
    if (providers.length === 0) {
        throw new ConfigurationError('No completion provider configured: set GROQ_API_KEY or GEMINI_API_KEY');
    }
    return providers;
}

function embeddingProviderFor(settings: CoreSettings): EmbeddingProvider {
    if (!settings.geminiApiKey) {
        throw new ConfigurationError('GEMINI_API_KEY is required for embeddings');
    }
    return new GeminiEmbeddingProvider(settings.geminiApiKey);
}

function assertKnownTopics(topics: readonly string[], taxonomy: Taxonomy): void {
    const known = tagNames(taxonomy.topics);
    const unknown = topics.filter(topic => !known.includes(topic));
    if (unknown.length > 0) {
        throw new ConfigurationError(`RAG_ELIGIBLE_TOPICS names unknown topic(s): ${unknown.join(', ')}`);
    }
}

export function createCopilot(settings: CoreSettings, overrides: CopilotOverrides = {}): Copilot {
    const clock = overrides.clock ?? systemClock;
    const random = overrides.random ?? Math.random;
    const taxonomy = overrides.taxonomy ?? loadTaxonomy();
    assertKnownTopics(settings.ragEligibleTopics, taxonomy);

    const embeddingProvider = overrides.embeddingProvider ?? embeddingProviderFor(settings);
    const completionProviders = overrides.completionProviders ?? completionProvidersFor(settings);
    const db = overrides.db ?? openDatabase(settings.databasePath);

    // One limiter for every external call made through this instance
    const limiter = new RateLimiter({
        minIntervalMs: settings.rateLimitMinIntervalMs,
        maxRequestsPerWindow: settings.rateLimitRequestsPerMinute,
        windowMs: 60000,
        clock
    });

    const policy: BackoffPolicy = {
        maxAttempts: settings.retryCeiling,
        baseDelayMs: settings.retryBaseDelayMs,
        maxDelayMs: settings.retryMaxDelayMs,
        jitter: settings.retryJitter
    };

    const embeddings = new EmbeddingClient(embeddingProvider, {
        modelId: settings.embeddingModel,
        batchSize: settings.batchSize,
        policy,
        limiter,
        timeoutMs: settings.callTimeoutMs,
        clock,
        random
    });
    const completions = new CompletionClient(completionProviders, {
        policy,
        limiter,
        timeoutMs: settings.callTimeoutMs,
        clock,
        random
    });

    const vectorStore = new SqliteVectorStore(db);
    const chunker = new SemanticChunker(embeddings, {
        similarityThreshold: settings.similarityThreshold,
        minChunkSize: settings.minChunkSize,
        maxChunkSize: settings.maxChunkSize
    });
    const ingestion = new IngestionManager(chunker, embeddings, vectorStore);

    const classifier = new TicketClassifier(completions, taxonomy, settings.ragEligibleTopics);
    const retriever = new RAGRetriever(embeddings, vectorStore, {
        collections: settings.collections,
        minScore: settings.minRetrievalScore,
        contextCharBudget: settings.contextCharBudget,
        ragEligibleTopics: settings.ragEligibleTopics
    });
    const assembler = new ResponseAssembler(completions);
    const orchestrator = new PipelineOrchestrator(classifier, retriever, assembler, {
        taxonomy,
        ragEligibleTopics: settings.ragEligibleTopics,
        interCallDelayMs: settings.interCallDelayMs,
        defaultMode: 'always_answer',
        clock
    });

    const ticketStore = new SqliteTicketStore(db);
    const ticketProcessor = new TicketProcessor(ticketStore, {
        run: (query, options) => orchestrator.run(query, {
            ...options,
            mode: settings.routeIneligibleTickets ? 'route_ineligible' : 'always_answer'
        })
    }, settings.concurrency);

    console.log(`[Copilot] Ready: embeddings via ${embeddingProvider.name}, completions via ${completions.providerNames.join(' -> ')}`);

    return {
        settings,
        taxonomy,
        db,
        limiter,
        embeddings,
        completions,
        vectorStore,
        chunker,
        ingestion,
        classifier,
        retriever,
        assembler,
        orchestrator,
        ticketStore,
        ticketProcessor,
        ask: (query, signal) => orchestrator.run(query, { mode: 'always_answer', signal }),
        close: () => db.close()
    };
}
