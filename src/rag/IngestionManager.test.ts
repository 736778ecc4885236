import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteDatabase, openDatabase } from '../db/database';
import { TransientProviderError } from '../errors';
import { IngestionManager } from './IngestionManager';
import { SemanticChunker } from './SemanticChunker';
import { SourceDocument } from './types';
import { SqliteVectorStore } from './VectorStore';

const doc = (slug: string, text: string): SourceDocument => ({
    url: `https://docs.example.com/${slug}`,
    title: `Guide: ${slug}`,
    text,
    collection: 'docs'
});

describe('IngestionManager', () => {
    let db: SqliteDatabase;
    let store: SqliteVectorStore;
    let manager: IngestionManager;
    const embedder = {
        embed: vi.fn(async (texts: string[]) => texts.map(text => {
            if (text.includes('boom')) throw new TransientProviderError('overloaded', 503);
            return [1, 0];
        }))
    };

    beforeEach(() => {
        db = openDatabase(':memory:');
        store = new SqliteVectorStore(db);
        const chunker = new SemanticChunker(null, { similarityThreshold: 0.7, minChunkSize: 1, maxChunkSize: 100 });
        manager = new IngestionManager(chunker, embedder, store);
    });

    afterEach(() => {
        db.close();
    });

    it('indexes every chunk with its provenance', async () => {
        const report = await manager.ingest([doc('setup', 'Alpha beta. Gamma delta.')]);

        expect(report).toEqual({
            documents: [{
                sourceId: 'https://docs.example.com/setup',
                collection: 'docs',
                status: 'indexed',
                chunks: 1,
                method: 'fallback',
                removed: 0
            }],
            indexed: 1,
            failed: 0,
            chunks: 1
        });

        const [hit] = await store.search('docs', [1, 0], 5);
        expect(hit.title).toBe('Guide: setup');
        expect(hit.sourceUrl).toBe('https://docs.example.com/setup');
        expect(hit.snippet).toBe('Alpha beta. Gamma delta.');
    });

    it('replaces the chunks of a re-ingested document', async () => {
        await manager.ingest([doc('setup', 'Alpha beta. Gamma delta.')]);

        const [report] = (await manager.ingest([doc('setup', 'Alpha beta.')])).documents;

        expect(report.removed).toBe(1);
        expect(await store.count('docs')).toBe(1);
        const [hit] = await store.search('docs', [1, 0], 5);
        expect(hit.chunkRef.endOffset).toBe(11);
    });

    it('keeps the indexed chunks when storing a re-ingested document fails', async () => {
        await manager.ingest([doc('setup', 'Alpha beta. Gamma delta.')]);
        db.exec(`
            CREATE TRIGGER reject_full BEFORE INSERT ON chunks WHEN NEW.text LIKE '%crash%'
            BEGIN SELECT RAISE(ABORT, 'database or disk is full'); END
        `);

        const [report] = (await manager.ingest([doc('setup', 'Alpha crash.')])).documents;

        expect(report.status).toBe('failed');
        expect(report.error).toBe('database or disk is full');
        expect(await store.count('docs')).toBe(1);
        const [hit] = await store.search('docs', [1, 0], 5);
        expect(hit.snippet).toBe('Alpha beta. Gamma delta.');
    });

    it('removes the chunks of a document that became empty', async () => {
        await manager.ingest([doc('setup', 'Alpha beta. Gamma delta.')]);

        const [report] = (await manager.ingest([doc('setup', '   ')])).documents;

        expect(report.status).toBe('empty');
        expect(report.removed).toBe(1);
        expect(await store.count('docs')).toBe(0);
    });

    it('keeps going after one document fails', async () => {
        const report = await manager.ingest([
            doc('one', 'First page.'),
            doc('two', 'This one goes boom.'),
            doc('three', 'Third page.')
        ]);

        expect(report.documents.map(d => d.status)).toEqual(['indexed', 'failed', 'indexed']);
        expect(report.documents[1].error).toBe('overloaded');
        expect(report).toMatchObject({ indexed: 2, failed: 1, chunks: 2 });
        expect(await store.count('docs')).toBe(2);
    });
});
