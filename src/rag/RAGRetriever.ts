// src/rag/RAGRetriever.ts
// Query -> per-collection search -> merge, dedup, score floor -> context budget

import { KnowledgeCollection } from '../config/settings';
import { describeError } from '../errors';
import { Classification } from '../llm/types';
import { EmbeddingVector, RankedPassage } from './types';
import { VectorIndex, comparePassages } from './VectorStore';

export const MAX_RETRIEVAL_QUERY_LENGTH = 500;

export interface QueryEmbedder {
    embedOne(text: string): Promise<EmbeddingVector>;
}

export interface RetrieverOptions {
    collections: KnowledgeCollection[];
    minScore: number;
    contextCharBudget: number;
    ragEligibleTopics: readonly string[];
}

function overlaps(a: RankedPassage, b: RankedPassage): boolean {
    return a.chunkRef.sourceId === b.chunkRef.sourceId
        && a.chunkRef.startOffset < b.chunkRef.endOffset
        && b.chunkRef.startOffset < a.chunkRef.endOffset;
}

/**
 * RAGRetriever - grounding passages for one query
 *
 * Flow:
 * 1. Embed the query (with a topic hint for answerable topics)
 * 2. Search each knowledge collection independently
 * 3. Merge, drop passages under the score floor, collapse overlaps
 * 4. Keep the rank-order prefix that fits the character budget
 *
 * An empty result means "no evidence", not an error. Embedding failures
 * propagate; a failing collection is skipped.
 */
export class RAGRetriever {
    private embedder: QueryEmbedder;
    private index: VectorIndex;
    private options: RetrieverOptions;
    private eligibleTopics: Set<string>;

    constructor(embedder: QueryEmbedder, index: VectorIndex, options: RetrieverOptions) {
        this.embedder = embedder;
        this.index = index;
        this.options = options;
        this.eligibleTopics = new Set(options.ragEligibleTopics);
    }

    async retrieve(query: string, classification: Classification | null): Promise<RankedPassage[]> {
        const retrievalQuery = this.buildRetrievalQuery(query, classification);
        const vector = await this.embedder.embedOne(retrievalQuery);

        const candidates: RankedPassage[] = [];
        for (const collection of this.options.collections) {
            try {
                const results = await this.index.search(collection.name, vector, collection.k);
                candidates.push(...results);
            } catch (error) {
                console.warn(`[RAGRetriever] Skipping ${collection.label}: ${describeError(error)}`);
            }
        }

        const qualified = candidates
            .filter(passage => passage.score >= this.options.minScore)
            .sort(comparePassages);

        const unique: RankedPassage[] = [];
        for (const passage of qualified) {
            if (!unique.some(kept => overlaps(kept, passage))) {
                unique.push(passage);
            }
        }

        const selected = this.applyBudget(unique);
        console.log(`[RAGRetriever] ${candidates.length} candidates, ${qualified.length} above ${this.options.minScore}, ${selected.length} selected`);
        return selected;
    }

    /**
     * Query text plus a topic hint when the topic is answerable, capped in length
     */
    buildRetrievalQuery(query: string, classification: Classification | null): string {
        const base = query.trim();
        const hint = classification && this.eligibleTopics.has(classification.topic)
            ? `\nTopic: ${classification.topic}`
            : '';
        return `${base}${hint}`.slice(0, MAX_RETRIEVAL_QUERY_LENGTH);
    }

    /**
     * Longest rank-order prefix whose snippets fit the budget
     */
    private applyBudget(passages: readonly RankedPassage[]): RankedPassage[] {
        const selected: RankedPassage[] = [];
        let used = 0;
        for (const passage of passages) {
            if (used + passage.snippet.length > this.options.contextCharBudget) break;
            selected.push(passage);
            used += passage.snippet.length;
        }
        return selected;
    }
}
