// src/rag/types.ts
// Shared data model for segmentation and retrieval

/**
 * One sentence of the source text. `text === source.slice(startOffset, endOffset)`.
 */
export interface TextSpan {
    startOffset: number;
    endOffset: number;
    text: string;
}

export type EmbeddingVector = number[];

/**
 * Contiguous, sentence-aligned slice of a source document
 */
export interface Chunk {
    sourceId: string;
    startOffset: number;
    endOffset: number;
    text: string;
    sizeChars: number;
}

/**
 * Document handed over by the scraper: it knows nothing of how this was fetched
 */
export interface SourceDocument {
    url: string;
    title: string;
    text: string;
    collection: string;
}

export interface ChunkRef {
    collection: string;
    sourceId: string;
    startOffset: number;
    endOffset: number;
}

export interface RankedPassage {
    chunkRef: ChunkRef;
    score: number;
    sourceUrl: string;
    title: string;
    snippet: string;
}
