/**
 * Shared type definitions for ingestion and retrieval
 */

/** Free-form tags stored beside each chunk. `source` scopes a dataset. */
export interface ChunkMetadata {
    source: string;
    crawled_at: string;
    chunk_size: number;
    url_path: string;
    [key: string]: unknown;
}

/**
 * A stored fragment of a page. `(url, chunk_number)` is the identity.
 */
export interface StoredChunk {
    url: string;
    chunk_number: number;
    title: string;
    summary: string;
    content: string;
    metadata: ChunkMetadata;
    embedding: number[];
}

/** A stored chunk returned from similarity search */
export interface ScoredChunk extends StoredChunk {
    similarity: number;
}

/**
 * Equality-AND filter over chunk metadata. `source` is the only field the
 * retrieval tools set today.
 */
export interface ChunkFilter {
    source: string;
    [field: string]: string;
}

export interface TitleAndSummary {
    title: string;
    summary: string;
}

export interface Enrichment extends TitleAndSummary {
    embedding: number[];
}

export type BlockType = "h1" | "h2" | "h3" | "h4" | "h5" | "h6" | "p" | "li" | "pre" | "tr";

export interface Block {
    type: BlockType;
    text: string;
    index: number;
    headingPath: string[];
}
