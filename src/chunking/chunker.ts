/**
 * Split page markdown into ordered, size-bounded fragments.
 *
 * Boundary preference for each window of `maxSize` characters:
 *   1. a fenced code block crossing the window end pushes the end to the
 *      block's closing fence (the chunk may then exceed maxSize)
 *   2. the last blank line in the window
 *   3. the last period followed by whitespace
 *   4. exactly maxSize characters
 *
 * Paragraph and sentence breaks only count when they fall past
 * `minBreakRatio` of the window, so a break right at the start of a window
 * does not produce a tiny chunk.
 */

export interface ChunkOptions {
    /** Fraction of the window a paragraph/sentence break must lie beyond (default 0.3) */
    minBreakRatio?: number;
}

/** Character range of a fenced code block, end exclusive */
export interface CodeFence {
    start: number;
    end: number;
}

export const DEFAULT_CHUNK_SIZE = 5000;
const DEFAULT_MIN_BREAK_RATIO = 0.3;

const FENCE_LINE = /^ {0,3}(`{3,}|~{3,})[^\n]*$/gm;

/**
 * Locate fenced code blocks (``` or ~~~). A closing fence uses the same
 * character and is at least as long as the opening one. An unclosed fence
 * runs to the end of the text.
 */
export function findCodeFences(text: string): CodeFence[] {
    const fences: CodeFence[] = [];
    let open: { start: number; marker: string } | null = null;

    for (const match of text.matchAll(FENCE_LINE)) {
        const marker = match[1] ?? "";
        const index = match.index ?? 0;

        if (open === null) {
            open = { start: index, marker };
            continue;
        }

        const closes = marker[0] === open.marker[0]
            && marker.length >= open.marker.length
            && match[0].trim() === marker;
        if (closes) {
            fences.push({ start: open.start, end: index + match[0].length });
            open = null;
        }
    }

    if (open !== null) {
        fences.push({ start: open.start, end: text.length });
    }

    return fences;
}

function isInsideFence(position: number, fences: CodeFence[]): boolean {
    return fences.some(f => f.start < position && position < f.end);
}

/**
 * Last blank-line position in (minEnd, end) that is outside code fences.
 * The returned value is where the chunk should end.
 */
function findParagraphBreak(text: string, minEnd: number, end: number, fences: CodeFence[]): number | null {
    let i = text.lastIndexOf("\n\n", end - 2);
    while (i > minEnd) {
        if (!isInsideFence(i, fences)) return i;
        i = text.lastIndexOf("\n\n", i - 1);
    }
    return null;
}

/**
 * Last ". " style sentence end in (minEnd, end) outside code fences.
 * The period stays with the current chunk.
 */
function findSentenceBreak(text: string, minEnd: number, end: number, fences: CodeFence[]): number | null {
    for (let i = end - 2; i + 1 > minEnd; i--) {
        if (text[i] !== ".") continue;
        const next = text[i + 1];
        if (next === undefined || !/\s/.test(next)) continue;
        if (!isInsideFence(i, fences)) return i + 1;
    }
    return null;
}

/** Back off one code unit so a surrogate pair is never split */
function hardCut(text: string, start: number, end: number): number {
    const code = text.charCodeAt(end - 1);
    const isHighSurrogate = code >= 0xd800 && code <= 0xdbff;
    return isHighSurrogate && end - 1 > start ? end - 1 : end;
}

/**
 * Split `text` into trimmed, non-empty chunks. Concatenating the chunks
 * reproduces the input apart from whitespace at chunk boundaries.
 */
export function chunkText(
    text: string,
    maxSize: number = DEFAULT_CHUNK_SIZE,
    options: ChunkOptions = {}
): string[] {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
        throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
    }
    const { minBreakRatio = DEFAULT_MIN_BREAK_RATIO } = options;

    const fences = findCodeFences(text);
    const chunks: string[] = [];
    let start = 0;

    while (start < text.length) {
        let end = start + maxSize;

        if (end >= text.length) {
            const last = text.slice(start).trim();
            if (last.length > 0) chunks.push(last);
            break;
        }

        const crossing = fences.find(f => f.start < end && f.end > end);
        if (crossing !== undefined) {
            end = crossing.end;
        } else {
            const minEnd = start + Math.floor(maxSize * minBreakRatio);
            end = findParagraphBreak(text, minEnd, end, fences)
                ?? findSentenceBreak(text, minEnd, end, fences)
                ?? hardCut(text, start, end);
        }

        const chunk = text.slice(start, end).trim();
        if (chunk.length > 0) chunks.push(chunk);
        start = end;
    }

    return chunks;
}
