// src/rag/index.ts
// Barrel export for segmentation and retrieval modules

export { splitSentences } from './SentenceSplitter';
export { cosineSimilarity } from './similarity';

export {
    SemanticChunker,
    DEFAULT_CHUNKING_OPTIONS,
    proposeBoundaries,
    chunkFromEmbeddings,
    chunkWithoutEmbeddings,
    validateChunks
} from './SemanticChunker';
export type { ChunkingOptions, SentenceEmbedder, SegmentationMethod, SegmentationResult } from './SemanticChunker';

export { EmbeddingClient, GeminiEmbeddingProvider, DEFAULT_EMBEDDING_MODEL, toGeminiProviderError } from './EmbeddingClient';
export type { EmbeddingProvider, EmbeddingClientOptions } from './EmbeddingClient';

export { SqliteVectorStore, comparePassages, embeddingToBlob, blobToEmbedding } from './VectorStore';
export type { VectorIndex, IndexedChunk, SearchFilter } from './VectorStore';

export { RAGRetriever, MAX_RETRIEVAL_QUERY_LENGTH } from './RAGRetriever';
export type { QueryEmbedder, RetrieverOptions } from './RAGRetriever';

export { IngestionManager } from './IngestionManager';
export type { ChunkEmbedder, DocumentReport, IngestionReport } from './IngestionManager';

export type { TextSpan, EmbeddingVector, Chunk, SourceDocument, ChunkRef, RankedPassage } from './types';
