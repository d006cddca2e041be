import { CollectionId } from '../access-scope/types';

export interface ChunkId {
    documentId: string;
    offset: number;
}

export interface ChunkMetadata {
    documentName: string;
    uploaderRole?: string;
    /** Collection the index itself recorded for the chunk, when it records one. */
    collection?: string;
}

/** One similarity hit as the vector index reports it. */
export interface VectorMatch {
    chunkId: ChunkId;
    text: string;
    score: number;
    metadata: ChunkMetadata;
}

export interface VectorIndex {
    similaritySearch(collection: CollectionId, queryText: string, k: number, signal?: AbortSignal): Promise<VectorMatch[]>;
}

export const VECTOR_INDEX = Symbol('VECTOR_INDEX');

export interface DocumentChunk {
    id: ChunkId;
    /** `documentId#offset`, the dedup key. */
    key: string;
    collection: CollectionId;
    text: string;
    score: number;
    metadata: ChunkMetadata;
}

export interface RawHit {
    chunk: DocumentChunk;
    variantIndex: number;
}

export interface RetrievalFailure {
    collection: CollectionId;
    variantIndex: number;
    reason: string;
    timedOut: boolean;
}

export interface RetrievalOutcome {
    hits: RawHit[];
    failures: RetrievalFailure[];
    /** Number of (variant × collection) searches issued. */
    searches: number;
}

export interface RankedChunk extends DocumentChunk {
    matchCount: number;
    rank: number;
}

export interface RankedResult {
    chunks: RankedChunk[];
}

export interface RetrievalQuery {
    original: string;
    standalone: string;
    variants: string[];
}

export function chunkKey(id: ChunkId): string {
    return `${id.documentId}#${id.offset}`;
}
