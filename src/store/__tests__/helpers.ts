import type { StoredChunk } from "../../types";

export function makeChunk(
    url: string,
    chunkNumber: number,
    overrides: Partial<StoredChunk> = {}
): StoredChunk {
    return {
        url,
        chunk_number: chunkNumber,
        title: `${url} #${chunkNumber}`,
        summary: "summary",
        content: `content ${chunkNumber}`,
        metadata: {
            source: "test_source",
            crawled_at: "2026-01-02T03:04:05.000Z",
            chunk_size: 9,
            url_path: "/",
        },
        embedding: [1, 0],
        ...overrides,
    };
}
