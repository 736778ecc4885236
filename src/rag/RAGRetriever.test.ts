import { describe, expect, it, vi } from 'vitest';
import { PermanentProviderError } from '../errors';
import { Classification } from '../llm/types';
import { RAGRetriever, RetrieverOptions } from './RAGRetriever';
import { EmbeddingVector, RankedPassage } from './types';
import { VectorIndex } from './VectorStore';

function passage(collection: string, sourceId: string, start: number, end: number, score: number): RankedPassage {
    return {
        chunkRef: { collection, sourceId, startOffset: start, endOffset: end },
        score,
        sourceUrl: `https://docs.example.com/${sourceId}`,
        title: sourceId,
        snippet: 'x'.repeat(end - start)
    };
}

const docsResults = [
    passage('docs', 'a', 0, 100, 0.9),
    passage('docs', 'a', 50, 150, 0.8),
    passage('docs', 'b', 0, 100, 0.2)
];
const developerResults = [
    passage('developer', 'd', 0, 100, 0.85),
    passage('developer', 'c', 0, 100, 0.85)
];

function fakeIndex(results: Record<string, RankedPassage[] | Error>) {
    const search = vi.fn(async (collection: string, _vector: EmbeddingVector, _k: number) => {
        const found = results[collection];
        if (found instanceof Error) throw found;
        return found ?? [];
    });
    const index: VectorIndex = {
        search,
        upsert: async () => 0,
        deleteSource: async () => 0,
        replaceSource: async () => 0,
        count: async () => 0
    };
    return { index, search };
}

const options: RetrieverOptions = {
    collections: [
        { name: 'docs', label: 'Product Documentation', k: 3 },
        { name: 'developer', label: 'Developer Hub', k: 2 }
    ],
    minScore: 0.25,
    contextCharBudget: 6000,
    ragEligibleTopics: ['How-to', 'SSO']
};

const classification = (topic: string): Classification => ({
    topic,
    topicTags: [topic],
    sentiment: 'Neutral',
    priority: 'P2 (Low)',
    confidenceTopic: 1,
    confidenceSentiment: 1,
    confidencePriority: 1
});

const keys = (passages: RankedPassage[]) => passages.map(p => `${p.chunkRef.sourceId}@${p.chunkRef.startOffset}`);

describe('RAGRetriever', () => {
    it('merges collections, applies the score floor and collapses overlapping chunks', async () => {
        const embedder = { embedOne: vi.fn(async () => [1, 0]) };
        const { index, search } = fakeIndex({ docs: docsResults, developer: developerResults });

        const passages = await new RAGRetriever(embedder, index, options).retrieve('How do I set up SSO?', classification('SSO'));

        expect(keys(passages)).toEqual(['a@0', 'c@0', 'd@0']);
        expect(embedder.embedOne).toHaveBeenCalledWith('How do I set up SSO?\nTopic: SSO');
        expect(search).toHaveBeenNthCalledWith(1, 'docs', [1, 0], 3);
        expect(search).toHaveBeenNthCalledWith(2, 'developer', [1, 0], 2);
    });

    it('keeps the rank-order prefix that fits the character budget', async () => {
        const embedder = { embedOne: async () => [1, 0] };
        const { index } = fakeIndex({ docs: docsResults, developer: developerResults });

        const passages = await new RAGRetriever(embedder, index, { ...options, contextCharBudget: 250 }).retrieve('q', null);

        expect(keys(passages)).toEqual(['a@0', 'c@0']);
    });

    it('skips a collection whose search fails', async () => {
        const embedder = { embedOne: async () => [1, 0] };
        const { index } = fakeIndex({ docs: docsResults, developer: new Error('database is locked') });

        const passages = await new RAGRetriever(embedder, index, options).retrieve('q', null);

        expect(keys(passages)).toEqual(['a@0']);
    });

    it('returns nothing when no passage clears the floor', async () => {
        const embedder = { embedOne: async () => [1, 0] };
        const { index } = fakeIndex({ docs: [passage('docs', 'b', 0, 10, 0.1)] });

        await expect(new RAGRetriever(embedder, index, options).retrieve('q', null)).resolves.toEqual([]);
    });

    it('lets embedding failures through', async () => {
        const embedder = { embedOne: async (): Promise<EmbeddingVector> => { throw new PermanentProviderError('invalid api key', 401); } };
        const { index } = fakeIndex({});

        await expect(new RAGRetriever(embedder, index, options).retrieve('q', null)).rejects.toBeInstanceOf(PermanentProviderError);
    });

    describe('buildRetrievalQuery', () => {
        const retriever = new RAGRetriever({ embedOne: async () => [] }, fakeIndex({}).index, options);

        it('adds a topic hint only for answerable topics', () => {
            expect(retriever.buildRetrievalQuery('  Reset my password  ', classification('How-to'))).toBe('Reset my password\nTopic: How-to');
            expect(retriever.buildRetrievalQuery('Refund please', classification('Billing'))).toBe('Refund please');
            expect(retriever.buildRetrievalQuery('Anything', null)).toBe('Anything');
        });

        it('caps the query length', () => {
            expect(retriever.buildRetrievalQuery('q'.repeat(600), classification('SSO'))).toHaveLength(500);
        });
    });
});
