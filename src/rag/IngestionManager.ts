// src/rag/IngestionManager.ts
// Scraped documents -> semantic chunks -> embeddings -> vector store

import { describeError } from '../errors';
import { SegmentationMethod, SemanticChunker } from './SemanticChunker';
import { EmbeddingVector, SourceDocument } from './types';
import { IndexedChunk, VectorIndex } from './VectorStore';

export interface ChunkEmbedder {
    embed(texts: string[]): Promise<EmbeddingVector[]>;
}

export interface DocumentReport {
    sourceId: string;
    collection: string;
    status: 'indexed' | 'empty' | 'failed';
    chunks: number;
    method?: SegmentationMethod;
    removed?: number;
    error?: string;
}

export interface IngestionReport {
    documents: DocumentReport[];
    indexed: number;
    failed: number;
    chunks: number;
}

/**
 * IngestionManager - periodic batch ingestion
 *
 * Each document replaces its own chunks in one transaction, so a re-ingested
 * page whose boundaries moved leaves nothing stale behind, and a failed write
 * keeps the previous chunks. One document failing never stops the rest of
 * the batch.
 */
export class IngestionManager {
    private chunker: SemanticChunker;
    private embedder: ChunkEmbedder;
    private index: VectorIndex;

    constructor(chunker: SemanticChunker, embedder: ChunkEmbedder, index: VectorIndex) {
        this.chunker = chunker;
        this.embedder = embedder;
        this.index = index;
    }

    async ingest(documents: readonly SourceDocument[]): Promise<IngestionReport> {
        const reports: DocumentReport[] = [];

        for (const document of documents) {
            reports.push(await this.ingestDocument(document));
        }

        const report: IngestionReport = {
            documents: reports,
            indexed: reports.filter(r => r.status === 'indexed').length,
            failed: reports.filter(r => r.status === 'failed').length,
            chunks: reports.reduce((sum, r) => sum + r.chunks, 0)
        };
        console.log(`[IngestionManager] Ingested ${report.indexed}/${documents.length} documents (${report.chunks} chunks, ${report.failed} failed)`);
        return report;
    }

    async ingestDocument(document: SourceDocument): Promise<DocumentReport> {
        const sourceId = document.url;
        const base = { sourceId, collection: document.collection };

        try {
            const segmentation = await this.chunker.segment(sourceId, document.text);
            if (segmentation.chunks.length === 0) {
                const removed = await this.index.deleteSource(document.collection, sourceId);
                return { ...base, status: 'empty', chunks: 0, method: segmentation.method, removed };
            }

            const vectors = await this.embedder.embed(segmentation.chunks.map(chunk => chunk.text));
            const indexed: IndexedChunk[] = segmentation.chunks.map(chunk => ({
                ...chunk,
                url: document.url,
                title: document.title
            }));

            const removed = await this.index.replaceSource(document.collection, sourceId, indexed, vectors);

            console.log(`[IngestionManager] ${sourceId}: ${indexed.length} chunks (${segmentation.method})`);
            return { ...base, status: 'indexed', chunks: indexed.length, method: segmentation.method, removed };
        } catch (error) {
            console.error(`[IngestionManager] Failed to ingest ${sourceId}:`, describeError(error));
            return { ...base, status: 'failed', chunks: 0, error: describeError(error) };
        }
    }
}
