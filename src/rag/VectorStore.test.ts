import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteDatabase, openDatabase } from '../db/database';
import { DataIntegrityError } from '../errors';
import { IndexedChunk, SqliteVectorStore, blobToEmbedding, comparePassages, embeddingToBlob } from './VectorStore';

function indexedChunk(sourceId: string, start: number, text: string): IndexedChunk {
    return {
        sourceId,
        startOffset: start,
        endOffset: start + text.length,
        text,
        sizeChars: text.length,
        url: `https://docs.example.com/${sourceId}`,
        title: `Title of ${sourceId}`
    };
}

describe('SqliteVectorStore', () => {
    let db: SqliteDatabase;
    let store: SqliteVectorStore;

    beforeEach(() => {
        db = openDatabase(':memory:');
        store = new SqliteVectorStore(db);
    });

    afterEach(() => {
        db.close();
    });

    it('upserts idempotently on the chunk key', async () => {
        await store.upsert('docs', [indexedChunk('a', 0, 'First text.')], [[1, 0]]);
        await store.upsert('docs', [indexedChunk('a', 0, 'Other text.')], [[0, 1]]);

        expect(await store.count('docs')).toBe(1);
        const [hit] = await store.search('docs', [0, 1], 5);
        expect(hit.snippet).toBe('Other text.');
        expect(hit.score).toBe(1);
    });

    it('ranks by score, then source id, then offset', async () => {
        await store.upsert(
            'docs',
            [
                indexedChunk('b', 0, 'Beta.'),
                indexedChunk('a', 20, 'Alpha later.'),
                indexedChunk('a', 0, 'Alpha.'),
                indexedChunk('c', 0, 'Orthogonal.'),
                indexedChunk('d', 0, 'Diagonal.')
            ],
            [[1, 0], [1, 0], [1, 0], [0, 1], [1, 1]]
        );

        const results = await store.search('docs', [1, 0], 5);

        expect(results.map(r => [r.chunkRef.sourceId, r.chunkRef.startOffset])).toEqual([
            ['a', 0], ['a', 20], ['b', 0], ['d', 0], ['c', 0]
        ]);
        expect(results[3].score).toBeCloseTo(Math.SQRT1_2, 6);
        expect(results[4].score).toBe(0);
        expect(results[0]).toEqual({
            chunkRef: { collection: 'docs', sourceId: 'a', startOffset: 0, endOffset: 6 },
            score: 1,
            sourceUrl: 'https://docs.example.com/a',
            title: 'Title of a',
            snippet: 'Alpha.'
        });
    });

    it('returns at most k results and nothing for k = 0', async () => {
        await store.upsert('docs', [indexedChunk('a', 0, 'One.'), indexedChunk('b', 0, 'Two.')], [[1, 0], [0, 1]]);

        expect(await store.search('docs', [1, 0], 1)).toHaveLength(1);
        expect(await store.search('docs', [1, 0], 0)).toEqual([]);
    });

    it('keeps collections apart and applies the source filter', async () => {
        await store.upsert('docs', [indexedChunk('a', 0, 'One.'), indexedChunk('b', 0, 'Two.')], [[1, 0], [1, 0]]);
        await store.upsert('developer', [indexedChunk('c', 0, 'Three.')], [[1, 0]]);

        const filtered = await store.search('docs', [1, 0], 5, { sourceIds: ['b'] });

        expect(filtered.map(r => r.chunkRef.sourceId)).toEqual(['b']);
        expect(await store.search('docs', [1, 0], 5, { sourceIds: [] })).toEqual([]);
        expect(await store.count('developer')).toBe(1);
        expect(await store.count()).toBe(3);
    });

    it('deletes every chunk of one source', async () => {
        await store.upsert(
            'docs',
            [indexedChunk('a', 0, 'One.'), indexedChunk('a', 5, 'Two.'), indexedChunk('b', 0, 'Three.')],
            [[1, 0], [1, 0], [1, 0]]
        );

        expect(await store.deleteSource('docs', 'a')).toBe(2);
        expect(await store.count('docs')).toBe(1);
    });

    it('replaces the chunks of one source', async () => {
        await store.upsert('docs', [indexedChunk('a', 0, 'One.'), indexedChunk('a', 5, 'Two.'), indexedChunk('b', 0, 'Three.')], [[1, 0], [1, 0], [1, 0]]);

        expect(await store.replaceSource('docs', 'a', [indexedChunk('a', 0, 'Only one.')], [[0, 1]])).toBe(2);

        expect(await store.count('docs')).toBe(2);
        const [hit] = await store.search('docs', [0, 1], 1);
        expect(hit.snippet).toBe('Only one.');
    });

    it('keeps the previous chunks when writing the replacement fails', async () => {
        await store.upsert('docs', [indexedChunk('a', 0, 'One.'), indexedChunk('a', 5, 'Two.')], [[1, 0], [1, 0]]);
        db.exec(`
            CREATE TRIGGER reject_full BEFORE INSERT ON chunks WHEN NEW.text = 'Too much.'
            BEGIN SELECT RAISE(ABORT, 'database or disk is full'); END
        `);

        await expect(store.replaceSource('docs', 'a', [indexedChunk('a', 0, 'New.'), indexedChunk('a', 5, 'Too much.')], [[0, 1], [0, 1]]))
            .rejects.toThrow('database or disk is full');

        expect(await store.count('docs')).toBe(2);
        const hits = await store.search('docs', [1, 0], 5);
        expect(hits.map(hit => hit.snippet)).toEqual(['One.', 'Two.']);
    });

    it('refuses to replace a source with chunks of another source', async () => {
        await expect(store.replaceSource('docs', 'a', [indexedChunk('b', 0, 'Other.')], [[1, 0]])).rejects.toBeInstanceOf(DataIntegrityError);
    });

    it('rejects chunks without a vector each', async () => {
        await expect(store.upsert('docs', [indexedChunk('a', 0, 'One.')], [])).rejects.toBeInstanceOf(DataIntegrityError);
    });
});

describe('embedding blobs', () => {
    it('stores four bytes per dimension and reads the values back', () => {
        const blob = embeddingToBlob([0.5, -1.25, 3]);

        expect(blob).toHaveLength(12);
        expect(blobToEmbedding(blob)).toEqual([0.5, -1.25, 3]);
    });
});

describe('comparePassages', () => {
    it('orders equal scores by source id', () => {
        const passage = (sourceId: string, score: number) => ({
            chunkRef: { collection: 'docs', sourceId, startOffset: 0, endOffset: 1 },
            score,
            sourceUrl: '',
            title: '',
            snippet: ''
        });

        const sorted = [passage('b', 0.5), passage('a', 0.5), passage('c', 0.9)].sort(comparePassages);

        expect(sorted.map(p => p.chunkRef.sourceId)).toEqual(['c', 'a', 'b']);
    });
});
