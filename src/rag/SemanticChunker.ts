// src/rag/SemanticChunker.ts
// Similarity-driven chunking: sentence embeddings decide where topics change,
// size limits decide the rest

import { ConfigurationError, DataIntegrityError, describeError } from '../errors';
import { splitSentences } from './SentenceSplitter';
import { cosineSimilarity } from './similarity';
import { Chunk, EmbeddingVector, TextSpan } from './types';

export interface ChunkingOptions {
    similarityThreshold: number;  // lower -> fewer boundaries
    minChunkSize: number;         // characters
    maxChunkSize: number;         // characters
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
    similarityThreshold: 0.7,
    minChunkSize: 500,
    maxChunkSize: 2000
};

/**
 * Anything that can turn sentences into vectors (normally the EmbeddingClient)
 */
export interface SentenceEmbedder {
    embed(texts: string[]): Promise<EmbeddingVector[]>;
}

export type SegmentationMethod = 'semantic' | 'fallback';

export interface SegmentationResult {
    sourceId: string;
    spans: TextSpan[];
    chunks: Chunk[];
    method: SegmentationMethod;
}

/**
 * Working unit while chunking. Covers spans[firstSpan..lastSpan]; `partial`
 * marks a piece cut out of a single sentence longer than maxChunkSize.
 */
interface Piece {
    start: number;
    end: number;
    firstSpan: number;
    lastSpan: number;
    partial: boolean;
}

const size = (piece: Piece) => piece.end - piece.start;

function union(a: Piece, b: Piece): Piece {
    return {
        start: Math.min(a.start, b.start),
        end: Math.max(a.end, b.end),
        firstSpan: Math.min(a.firstSpan, b.firstSpan),
        lastSpan: Math.max(a.lastSpan, b.lastSpan),
        partial: false
    };
}

/**
 * Indices i such that a boundary falls between sentence i and i + 1
 */
export function proposeBoundaries(vectors: readonly EmbeddingVector[], threshold: number): number[] {
    const boundaries: number[] = [];
    for (let i = 0; i < vectors.length - 1; i++) {
        if (cosineSimilarity(vectors[i], vectors[i + 1]) < threshold) {
            boundaries.push(i);
        }
    }
    return boundaries;
}

function groupSpans(spans: readonly TextSpan[], boundaries: readonly number[]): Piece[] {
    const pieces: Piece[] = [];
    let first = 0;
    for (const boundary of [...boundaries, spans.length - 1]) {
        if (boundary < first) continue;
        pieces.push({
            start: spans[first].startOffset,
            end: spans[boundary].endOffset,
            firstSpan: first,
            lastSpan: boundary,
            partial: false
        });
        first = boundary + 1;
    }
    return pieces;
}

/**
 * Undersized pieces merge into the following piece, the last one into the
 * preceding piece, until nothing is undersized or a single piece remains.
 */
function mergeUndersized(pieces: Piece[], minChunkSize: number): Piece[] {
    const result = [...pieces];
    while (result.length > 1) {
        const index = result.findIndex(piece => size(piece) < minChunkSize);
        if (index === -1) break;

        if (index === result.length - 1) {
            result.splice(index - 1, 2, union(result[index - 1], result[index]));
        } else {
            result.splice(index, 2, union(result[index], result[index + 1]));
        }
    }
    return result;
}

const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/**
 * Whether spans[first..last] may form one piece. A single sentence above
 * maxChunkSize always may (it is cut up later); the trailing piece of a
 * document may be undersized.
 */
function pieceFits(spans: readonly TextSpan[], first: number, last: number, options: ChunkingOptions, trailing: boolean): boolean {
    const length = spans[last].endOffset - spans[first].startOffset;
    if (first === last && length > options.maxChunkSize) return true;
    return length <= options.maxChunkSize && (trailing || length >= options.minChunkSize);
}

/**
 * result[i - first]: spans[first..i] can be cut into fitting pieces
 */
function prefixFeasibility(spans: readonly TextSpan[], first: number, last: number, options: ChunkingOptions): boolean[] {
    const feasible: boolean[] = [];
    for (let end = first; end <= last; end++) {
        let found = false;
        for (let start = end; start >= first && !found; start--) {
            if (start < end && spans[end].endOffset - spans[start].startOffset > options.maxChunkSize) break;
            found = pieceFits(spans, start, end, options, false) && (start === first || feasible[start - 1 - first]);
        }
        feasible.push(found);
    }
    return feasible;
}

/**
 * result[i - first]: spans[i..last] can be cut into fitting pieces
 */
function suffixFeasibility(
    spans: readonly TextSpan[],
    first: number,
    last: number,
    options: ChunkingOptions,
    trailing: boolean
): boolean[] {
    const feasible = new Array<boolean>(last - first + 1).fill(false);
    for (let start = last; start >= first; start--) {
        for (let end = start; end <= last; end++) {
            if (end > start && spans[end].endOffset - spans[start].startOffset > options.maxChunkSize) break;
            if (pieceFits(spans, start, end, options, trailing && end === last) && (end === last || feasible[end + 1 - first])) {
                feasible[start - first] = true;
                break;
            }
        }
    }
    return feasible;
}

/**
 * Split a single over-long sentence at the whitespace closest to its middle.
 * Hard cut at the middle when the sentence has no whitespace.
 */
function bisectSentence(text: string, piece: Piece): [Piece, Piece] {
    const middle = (piece.start + piece.end) / 2;
    let best = -1;
    for (let i = piece.start + 1; i < piece.end - 1; i++) {
        if (/\s/.test(text[i]) && (best === -1 || Math.abs(i - middle) < Math.abs(best - middle))) {
            best = i;
        }
    }

    let leftEnd: number;
    let rightStart: number;
    if (best === -1) {
        leftEnd = Math.floor(middle);
        // never between the halves of a surrogate pair
        if (isLowSurrogate(text.charCodeAt(leftEnd)) && leftEnd - 1 > piece.start) leftEnd--;
        rightStart = leftEnd;
    } else {
        leftEnd = best;
        while (leftEnd > piece.start && /\s/.test(text[leftEnd - 1])) leftEnd--;
        rightStart = best;
        while (rightStart < piece.end && /\s/.test(text[rightStart])) rightStart++;
    }

    return [
        { ...piece, end: leftEnd, partial: true },
        { ...piece, start: rightStart, partial: true }
    ];
}

/**
 * Split a multi-sentence piece at the sentence boundary closest to its middle,
 * considering only boundaries that leave both halves splittable within the
 * size limits (any boundary when none does).
 */
function bisectAtSentence(spans: readonly TextSpan[], piece: Piece, options: ChunkingOptions, trailing: boolean): [Piece, Piece] {
    const { firstSpan, lastSpan } = piece;
    const middle = (piece.start + piece.end) / 2;
    const prefix = prefixFeasibility(spans, firstSpan, lastSpan, options);
    const suffix = suffixFeasibility(spans, firstSpan, lastSpan, options, trailing);

    const closest = (candidates: number[]) => candidates.reduce((best, i) =>
        Math.abs(spans[i].endOffset - middle) < Math.abs(spans[best].endOffset - middle) ? i : best);

    const all = Array.from({ length: lastSpan - firstSpan }, (_, k) => firstSpan + k);
    const feasible = all.filter(i => prefix[i - firstSpan] && suffix[i + 1 - firstSpan]);
    const best = closest(feasible.length > 0 ? feasible : all);

    return [
        { start: piece.start, end: spans[best].endOffset, firstSpan, lastSpan: best, partial: false },
        { start: spans[best + 1].startOffset, end: piece.end, firstSpan: best + 1, lastSpan, partial: false }
    ];
}

/**
 * Recursively halve every piece above maxChunkSize. Each step yields two
 * strictly smaller pieces, so this terminates.
 */
function refineOversized(text: string, spans: readonly TextSpan[], pieces: Piece[], options: ChunkingOptions): Piece[] {
    const refine = (piece: Piece, trailing: boolean): Piece[] => {
        if (size(piece) <= options.maxChunkSize) return [piece];
        const [left, right] = piece.firstSpan === piece.lastSpan
            ? bisectSentence(text, piece)
            : bisectAtSentence(spans, piece, options, trailing);
        return [...refine(left, false), ...refine(right, trailing)];
    };
    return pieces.flatMap((piece, i) => refine(piece, i === pieces.length - 1));
}

/**
 * Refinement can leave small pieces behind; fold them into a neighbour
 * (following first) whenever the result still fits.
 */
function tidyUndersized(pieces: Piece[], minChunkSize: number, maxChunkSize: number): Piece[] {
    const result = [...pieces];
    let changed = true;
    while (changed && result.length > 1) {
        changed = false;
        for (let i = 0; i < result.length; i++) {
            if (size(result[i]) >= minChunkSize) continue;

            const next = result[i + 1];
            if (next && size(union(result[i], next)) <= maxChunkSize) {
                result.splice(i, 2, union(result[i], next));
                changed = true;
                break;
            }
            const previous = result[i - 1];
            if (previous && size(union(previous, result[i])) <= maxChunkSize) {
                result.splice(i - 1, 2, union(previous, result[i]));
                changed = true;
                break;
            }
        }
    }
    return result;
}

function meetsSizeInvariant(pieces: readonly Piece[], minChunkSize: number): boolean {
    return pieces.every((piece, i) => piece.partial || i === pieces.length - 1 || size(piece) >= minChunkSize);
}

/**
 * Sentence-aligned partition of the whole document that fits the size
 * limits, cutting outside `preferredCuts` as rarely as possible. Null when
 * no such partition exists.
 */
function repartition(spans: readonly TextSpan[], preferredCuts: ReadonlySet<number>, options: ChunkingOptions): Piece[] | null {
    const last = spans.length - 1;
    const cost: number[] = [];
    const firstOf: number[] = [];

    for (let end = 0; end <= last; end++) {
        let best = Infinity;
        let bestFirst = -1;
        for (let start = end; start >= 0; start--) {
            if (start < end && spans[end].endOffset - spans[start].startOffset > options.maxChunkSize) break;
            if (!pieceFits(spans, start, end, options, end === last)) continue;
            const before = start === 0 ? 0 : cost[start - 1];
            const total = before + (start > 0 && !preferredCuts.has(start - 1) ? 1 : 0);
            if (total < best) {
                best = total;
                bestFirst = start;
            }
        }
        cost.push(best);
        firstOf.push(bestFirst);
    }

    if (!Number.isFinite(cost[last])) return null;

    const pieces: Piece[] = [];
    for (let end = last; end >= 0; end = firstOf[end] - 1) {
        const first = firstOf[end];
        pieces.unshift({ start: spans[first].startOffset, end: spans[end].endOffset, firstSpan: first, lastSpan: end, partial: false });
    }
    return pieces;
}

function cutsOf(spans: readonly TextSpan[], pieces: readonly Piece[]): Set<number> {
    const cuts = new Set<number>();
    for (const piece of pieces.slice(0, -1)) {
        if (piece.end === spans[piece.lastSpan].endOffset) cuts.add(piece.lastSpan);
    }
    return cuts;
}

function toChunks(sourceId: string, text: string, pieces: readonly Piece[]): Chunk[] {
    return pieces.map(piece => ({
        sourceId,
        startOffset: piece.start,
        endOffset: piece.end,
        text: text.slice(piece.start, piece.end),
        sizeChars: piece.end - piece.start
    }));
}

function finish(sourceId: string, text: string, spans: readonly TextSpan[], pieces: Piece[], options: ChunkingOptions): Chunk[] {
    const merged = mergeUndersized(pieces, options.minChunkSize);
    const refined = refineOversized(text, spans, merged, options);
    const tidied = tidyUndersized(refined, options.minChunkSize, options.maxChunkSize);
    if (meetsSizeInvariant(tidied, options.minChunkSize)) {
        return toChunks(sourceId, text, tidied);
    }

    // Topic groups can leave an undersized piece that no neighbour can absorb
    const repaired = repartition(spans, cutsOf(spans, tidied), options);
    return toChunks(sourceId, text, repaired ? refineOversized(text, spans, repaired, options) : tidied);
}

/**
 * Pure semantic chunking: same spans, vectors and options give the same chunks
 */
export function chunkFromEmbeddings(
    sourceId: string,
    text: string,
    spans: readonly TextSpan[],
    vectors: readonly EmbeddingVector[],
    options: ChunkingOptions = DEFAULT_CHUNKING_OPTIONS
): Chunk[] {
    if (spans.length === 0) return [];
    if (vectors.length !== spans.length) {
        throw new DataIntegrityError(`Expected ${spans.length} sentence embeddings, got ${vectors.length}`);
    }

    const boundaries = proposeBoundaries(vectors, options.similarityThreshold);
    return finish(sourceId, text, spans, groupSpans(spans, boundaries), options);
}

/**
 * Fixed-size chunking that still respects sentences. Used whenever
 * embeddings are unavailable.
 */
export function chunkWithoutEmbeddings(
    sourceId: string,
    text: string,
    spans: readonly TextSpan[],
    options: ChunkingOptions = DEFAULT_CHUNKING_OPTIONS
): Chunk[] {
    if (spans.length === 0) return [];
    return finish(sourceId, text, spans, groupSpans(spans, []), options);
}

/**
 * Structural checks on a chunk sequence: offsets match the text, only
 * whitespace lies between chunks, no cut inside a sentence (unless that
 * sentence alone exceeds maxChunkSize) and no chunk above maxChunkSize.
 */
export function validateChunks(
    text: string,
    spans: readonly TextSpan[],
    chunks: readonly Chunk[],
    options: Pick<ChunkingOptions, 'maxChunkSize'>
): void {
    let previousEnd = 0;
    const cuts = new Set<number>();

    for (const [index, chunk] of chunks.entries()) {
        if (chunk.startOffset < previousEnd || chunk.endOffset <= chunk.startOffset || chunk.endOffset > text.length) {
            throw new DataIntegrityError(`Chunk ${index} has invalid offsets [${chunk.startOffset}, ${chunk.endOffset})`);
        }
        if (text.slice(chunk.startOffset, chunk.endOffset) !== chunk.text) {
            throw new DataIntegrityError(`Chunk ${index} text does not match source offsets`);
        }
        if (chunk.sizeChars !== chunk.endOffset - chunk.startOffset) {
            throw new DataIntegrityError(`Chunk ${index} reports size ${chunk.sizeChars}, spans ${chunk.endOffset - chunk.startOffset}`);
        }
        if (chunk.sizeChars > options.maxChunkSize) {
            throw new DataIntegrityError(`Chunk ${index} exceeds max size (${chunk.sizeChars} > ${options.maxChunkSize})`);
        }
        if (text.slice(previousEnd, chunk.startOffset).trim() !== '') {
            throw new DataIntegrityError(`Text before chunk ${index} is not covered by any chunk`);
        }
        cuts.add(chunk.startOffset);
        cuts.add(chunk.endOffset);
        previousEnd = chunk.endOffset;
    }

    if (text.slice(previousEnd).trim() !== '') {
        throw new DataIntegrityError('Text after the last chunk is not covered by any chunk');
    }

    for (const span of spans) {
        if (span.endOffset - span.startOffset > options.maxChunkSize) continue;
        for (let offset = span.startOffset + 1; offset < span.endOffset; offset++) {
            if (cuts.has(offset)) {
                throw new DataIntegrityError(`Chunk boundary at ${offset} splits sentence [${span.startOffset}, ${span.endOffset})`);
            }
        }
    }
}

/**
 * SemanticChunker - sentence split, embed, boundary detection, size passes
 *
 * Never fails on provider trouble: if sentence embeddings cannot be produced
 * the whole document goes through the fixed-size path instead.
 */
export class SemanticChunker {
    private readonly embedder: SentenceEmbedder | null;
    readonly options: ChunkingOptions;

    constructor(embedder: SentenceEmbedder | null, options: Partial<ChunkingOptions> = {}) {
        this.embedder = embedder;
        this.options = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
        if (this.options.minChunkSize > this.options.maxChunkSize) {
            throw new ConfigurationError(`minChunkSize (${this.options.minChunkSize}) exceeds maxChunkSize (${this.options.maxChunkSize})`);
        }
    }

    async segment(sourceId: string, text: string): Promise<SegmentationResult> {
        const spans = splitSentences(text);
        if (spans.length === 0) {
            return { sourceId, spans, chunks: [], method: 'fallback' };
        }

        let vectors: EmbeddingVector[] | null = null;
        if (spans.length > 1 && this.embedder) {
            try {
                vectors = await this.embedder.embed(spans.map(span => span.text));
                if (vectors.length !== spans.length) {
                    console.warn(`[SemanticChunker] ${sourceId}: got ${vectors.length} embeddings for ${spans.length} sentences, using fixed-size chunking`);
                    vectors = null;
                }
            } catch (error) {
                console.warn(`[SemanticChunker] ${sourceId}: embeddings unavailable (${describeError(error)}), using fixed-size chunking`);
                vectors = null;
            }
        }

        const chunks = vectors
            ? chunkFromEmbeddings(sourceId, text, spans, vectors, this.options)
            : chunkWithoutEmbeddings(sourceId, text, spans, this.options);

        validateChunks(text, spans, chunks, this.options);

        const method: SegmentationMethod = vectors ? 'semantic' : 'fallback';
        console.log(`[SemanticChunker] ${sourceId}: ${spans.length} sentences -> ${chunks.length} chunks (${method})`);
        return { sourceId, spans, chunks, method };
    }
}

