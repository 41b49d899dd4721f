const HEADING_TAG = /^h[1-6]$/;

export function isHeadingTag(tag: string): boolean {
    return HEADING_TAG.test(tag);
}

/** 1-6 for h1-h6, otherwise null */
export function getHeadingLevel(tag: string): number | null {
    return isHeadingTag(tag) ? Number(tag.slice(1)) : null;
}

/** Collapse runs of whitespace to one space and trim */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/** Pathname of a URL, or "" when it does not parse */
export function urlPath(url: string): string {
    try {
        return new URL(url).pathname;
    } catch {
        return "";
    }
}

export interface ChunkKey {
    url: string;
    chunk_number: number;
}

/** Lexicographic by UTF-16 code unit, independent of the host locale */
export function compareStrings(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/** Ascending (url, chunk_number); the tie-break for equal similarity */
export function compareChunkKeys(a: ChunkKey, b: ChunkKey): number {
    return compareStrings(a.url, b.url) || a.chunk_number - b.chunk_number;
}
