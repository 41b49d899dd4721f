import type { ChunkFilter, ScoredChunk, StoredChunk } from "../types";

/**
 * Durable chunk storage keyed by (url, chunk_number).
 *
 * Every method rejects with a StoreError when the backend reports a
 * failure; callers decide whether that failure is isolated or fatal.
 */
export interface ChunkStore {
    /** Insert or overwrite the chunk at (url, chunk_number). Last writer wins. */
    upsert(chunk: StoredChunk): Promise<void>;

    /** Distinct URLs with at least one chunk matching the filter, sorted */
    listDistinctUrls(filter: ChunkFilter): Promise<string[]>;

    /** Chunks of one URL matching the filter, ascending chunk_number */
    getOrderedChunks(url: string, filter: ChunkFilter): Promise<StoredChunk[]>;

    /**
     * Top-K chunks by similarity to `embedding` among those matching the
     * filter, most similar first, ties by (url, chunk_number). An empty
     * candidate set yields an empty array.
     */
    search(embedding: number[], topK: number, filter: ChunkFilter): Promise<ScoredChunk[]>;

    /** Delete every chunk of a URL matching the filter; returns how many went */
    deleteByUrl(url: string, filter: ChunkFilter): Promise<number>;

    /**
     * Make earlier upserts durable. Stores that write through on every
     * call leave it out.
     */
    flush?(): Promise<void>;
}
