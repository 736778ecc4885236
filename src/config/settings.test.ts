import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { loadSettings } from './settings';

describe('loadSettings', () => {
    it('applies defaults for an empty environment', () => {
        const settings = loadSettings({});

        expect(settings.geminiApiKey).toBeUndefined();
        expect(settings.embeddingModel).toBe('text-embedding-004');
        expect(settings.similarityThreshold).toBe(0.7);
        expect(settings.minChunkSize).toBe(500);
        expect(settings.maxChunkSize).toBe(2000);
        expect(settings.batchSize).toBe(10);
        expect(settings.retryCeiling).toBe(3);
        expect(settings.interCallDelayMs).toBe(1000);
        expect(settings.contextCharBudget).toBe(6000);
        expect(settings.minRetrievalScore).toBe(0.25);
        expect(settings.ragEligibleTopics).toEqual(['How-to', 'Product', 'Best practices', 'API/SDK', 'SSO']);
        expect(settings.collections).toEqual([
            { name: 'docs', label: 'Product Documentation', k: 3 },
            { name: 'developer', label: 'Developer Hub', k: 2 }
        ]);
        expect(settings.routeIneligibleTickets).toBe(true);
    });

    it('parses values from environment strings', () => {
        const settings = loadSettings({
            GEMINI_API_KEY: 'test-key',
            GROQ_API_KEY: '',
            SIMILARITY_THRESHOLD: '0.55',
            MIN_CHUNK_SIZE: '200',
            MAX_CHUNK_SIZE: '800',
            RAG_ELIGIBLE_TOPICS: 'How-to, SSO ,',
            KNOWLEDGE_COLLECTIONS: '[{"name":"kb","label":"Knowledge Base","k":4}]',
            ROUTE_INELIGIBLE_TICKETS: 'false',
            PIPELINE_CONCURRENCY: '2'
        });

        expect(settings.geminiApiKey).toBe('test-key');
        expect(settings.groqApiKey).toBeUndefined();
        expect(settings.similarityThreshold).toBe(0.55);
        expect(settings.minChunkSize).toBe(200);
        expect(settings.maxChunkSize).toBe(800);
        expect(settings.ragEligibleTopics).toEqual(['How-to', 'SSO']);
        expect(settings.collections).toEqual([{ name: 'kb', label: 'Knowledge Base', k: 4 }]);
        expect(settings.routeIneligibleTickets).toBe(false);
        expect(settings.concurrency).toBe(2);
    });

    it('rejects a threshold outside 0..1', () => {
        expect(() => loadSettings({ SIMILARITY_THRESHOLD: '1.5' })).toThrow(ConfigurationError);
    });

    it('rejects a minimum chunk size above the maximum', () => {
        expect(() => loadSettings({ MIN_CHUNK_SIZE: '900', MAX_CHUNK_SIZE: '300' })).toThrow(
            'MIN_CHUNK_SIZE (900) must not exceed MAX_CHUNK_SIZE (300)'
        );
    });

    it('rejects a context budget smaller than the largest chunk', () => {
        expect(() => loadSettings({ MAX_CHUNK_SIZE: '3000', CONTEXT_CHAR_BUDGET: '2500' })).toThrow(
            'CONTEXT_CHAR_BUDGET (2500) must be at least MAX_CHUNK_SIZE (3000)'
        );
    });

    it('rejects malformed knowledge collections', () => {
        expect(() => loadSettings({ KNOWLEDGE_COLLECTIONS: '[{"name":"kb"}]' })).toThrow(ConfigurationError);
        expect(() => loadSettings({ KNOWLEDGE_COLLECTIONS: 'not json' })).toThrow(ConfigurationError);
    });
});
