// src/rag/VectorStore.ts
// SQLite-based vector storage with pure JS cosine similarity
// No native vector extension - works offline

import { DataIntegrityError } from '../errors';
import { SqliteDatabase } from '../db/database';
import { cosineSimilarity } from './similarity';
import { Chunk, EmbeddingVector, RankedPassage } from './types';

/**
 * Chunk plus the provenance shown in citations
 */
export interface IndexedChunk extends Chunk {
    url: string;
    title: string;
}

export interface SearchFilter {
    sourceIds?: string[];
}

/**
 * Vector store boundary. Upserts are idempotent per
 * (collection, sourceId, startOffset, endOffset).
 */
export interface VectorIndex {
    upsert(collection: string, chunks: IndexedChunk[], vectors: EmbeddingVector[]): Promise<number>;
    search(collection: string, vector: EmbeddingVector, k: number, filter?: SearchFilter): Promise<RankedPassage[]>;
    deleteSource(collection: string, sourceId: string): Promise<number>;
    /** Delete a source's chunks and write its new ones atomically; returns the number removed */
    replaceSource(collection: string, sourceId: string, chunks: IndexedChunk[], vectors: EmbeddingVector[]): Promise<number>;
    count(collection?: string): Promise<number>;
}

interface ChunkRow {
    collection: string;
    source_id: string;
    start_offset: number;
    end_offset: number;
    text: string;
    url: string;
    title: string;
    embedding: Buffer;
}

interface UpsertParams {
    collection: string;
    sourceId: string;
    startOffset: number;
    endOffset: number;
    text: string;
    sizeChars: number;
    url: string;
    title: string;
    embedding: Buffer;
}

/**
 * Deterministic ranking: score desc, then sourceId asc, then startOffset asc
 */
export function comparePassages(a: RankedPassage, b: RankedPassage): number {
    if (b.score !== a.score) return b.score - a.score;
    if (a.chunkRef.sourceId !== b.chunkRef.sourceId) return a.chunkRef.sourceId < b.chunkRef.sourceId ? -1 : 1;
    return a.chunkRef.startOffset - b.chunkRef.startOffset;
}

/**
 * SqliteVectorStore - SQLite-backed vector storage
 *
 * Uses binary BLOBs for embedding storage (768 float32s = 3072 bytes).
 * Similarity is computed in JS (fast enough for <10K chunks per collection).
 */
export class SqliteVectorStore implements VectorIndex {
    private db: SqliteDatabase;

    constructor(db: SqliteDatabase) {
        this.db = db;
    }

    async upsert(collection: string, chunks: IndexedChunk[], vectors: EmbeddingVector[]): Promise<number> {
        this.assertVectorPerChunk(chunks, vectors);
        const upsertAll = this.db.transaction(() => this.writeChunks(collection, chunks, vectors));
        upsertAll();
        return chunks.length;
    }

    async replaceSource(collection: string, sourceId: string, chunks: IndexedChunk[], vectors: EmbeddingVector[]): Promise<number> {
        this.assertVectorPerChunk(chunks, vectors);
        const foreign = chunks.find(chunk => chunk.sourceId !== sourceId);
        if (foreign) {
            throw new DataIntegrityError(`Cannot replace ${sourceId} with a chunk of ${foreign.sourceId}`);
        }

        const remove = this.db.prepare('DELETE FROM chunks WHERE collection = ? AND source_id = ?');
        const replace = this.db.transaction((): number => {
            const removed = remove.run(collection, sourceId).changes;
            this.writeChunks(collection, chunks, vectors);
            return removed;
        });
        return replace();
    }

    async search(collection: string, vector: EmbeddingVector, k: number, filter: SearchFilter = {}): Promise<RankedPassage[]> {
        if (k <= 0) return [];

        let query = 'SELECT collection, source_id, start_offset, end_offset, text, url, title, embedding FROM chunks WHERE collection = ?';
        const params: (string | number)[] = [collection];

        if (filter.sourceIds) {
            if (filter.sourceIds.length === 0) return [];
            query += ` AND source_id IN (${filter.sourceIds.map(() => '?').join(', ')})`;
            params.push(...filter.sourceIds);
        }

        const rows = this.db.prepare<(string | number)[], ChunkRow>(query).all(...params);

        const scored = rows.map(row => ({
            chunkRef: {
                collection: row.collection,
                sourceId: row.source_id,
                startOffset: row.start_offset,
                endOffset: row.end_offset
            },
            score: cosineSimilarity(vector, blobToEmbedding(row.embedding)),
            sourceUrl: row.url,
            title: row.title,
            snippet: row.text
        }));

        scored.sort(comparePassages);
        return scored.slice(0, k);
    }

    async deleteSource(collection: string, sourceId: string): Promise<number> {
        const result = this.db.prepare('DELETE FROM chunks WHERE collection = ? AND source_id = ?').run(collection, sourceId);
        return result.changes;
    }

    async count(collection?: string): Promise<number> {
        const row = collection === undefined
            ? this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM chunks').get()
            : this.db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM chunks WHERE collection = ?').get(collection);
        return row?.count ?? 0;
    }
    private assertVectorPerChunk(chunks: readonly IndexedChunk[], vectors: readonly EmbeddingVector[]): void {
        if (chunks.length !== vectors.length) {
            throw new DataIntegrityError(`Cannot upsert ${chunks.length} chunks with ${vectors.length} vectors`);
        }
    }

    // Callers wrap this in a transaction
    private writeChunks(collection: string, chunks: readonly IndexedChunk[], vectors: readonly EmbeddingVector[]): void {
        const upsert = this.db.prepare<UpsertParams>(`
            INSERT INTO chunks (collection, source_id, start_offset, end_offset, text, size_chars, url, title, embedding, updated_at)
            VALUES (@collection, @sourceId, @startOffset, @endOffset, @text, @sizeChars, @url, @title, @embedding, CURRENT_TIMESTAMP)
            ON CONFLICT(collection, source_id, start_offset, end_offset) DO UPDATE SET
                text = excluded.text,
                size_chars = excluded.size_chars,
                url = excluded.url,
                title = excluded.title,
                embedding = excluded.embedding,
                updated_at = excluded.updated_at
        `);

        chunks.forEach((chunk, i) => {
            upsert.run({
                collection,
                sourceId: chunk.sourceId,
                startOffset: chunk.startOffset,
                endOffset: chunk.endOffset,
                text: chunk.text,
                sizeChars: chunk.sizeChars,
                url: chunk.url,
                title: chunk.title,
                embedding: embeddingToBlob(vectors[i])
            });
        });
    }
}

/**
 * Convert embedding array to binary BLOB (Float32)
 */
export function embeddingToBlob(embedding: EmbeddingVector): Buffer {
    const buffer = Buffer.alloc(embedding.length * 4);
    for (let i = 0; i < embedding.length; i++) {
        buffer.writeFloatLE(embedding[i], i * 4);
    }
    return buffer;
}

/**
 * Convert binary BLOB back to embedding array
 */
export function blobToEmbedding(blob: Buffer): EmbeddingVector {
    const embedding: EmbeddingVector = [];
    for (let i = 0; i + 4 <= blob.length; i += 4) {
        embedding.push(blob.readFloatLE(i));
    }
    return embedding;
}
