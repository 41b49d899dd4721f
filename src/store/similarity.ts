import type { ScoredChunk, StoredChunk } from "../types";
import { compareChunkKeys } from "../utils/shared";

/**
 * Cosine similarity in [-1, 1]. A zero vector on either side scores 0,
 * which is how fallback embeddings end up at the bottom of every ranking.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    const n = Math.min(a.length, b.length);
    let dot = 0;
    let na = 0;
    let nb = 0;
    for (let i = 0; i < n; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        na += x * x;
        nb += y * y;
    }
    if (na === 0 || nb === 0) return 0;
    return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/**
 * Score candidates against the query and keep the best `topK`.
 * Sorted by similarity descending, ties by (url, chunk_number) ascending.
 */
export function rankBySimilarity(
    query: readonly number[],
    candidates: readonly StoredChunk[],
    topK: number
): ScoredChunk[] {
    if (topK <= 0) return [];

    const scored = candidates.map(chunk => ({
        ...chunk,
        similarity: cosineSimilarity(query, chunk.embedding),
    }));

    scored.sort((a, b) => {
        const d = b.similarity - a.similarity;
        if (d !== 0) return d;
        return compareChunkKeys(a, b);
    });

    return scored.slice(0, topK);
}
