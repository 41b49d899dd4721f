import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ChunkFilter, ScoredChunk, StoredChunk } from "../types";
import type { ChunkStore } from "./types";
import { matchesFilter, validateFilter } from "./filter";
import { rankBySimilarity } from "./similarity";
import { compareStrings } from "../utils/shared";
import { StoreError, errorMessage } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

function keyOf(url: string, chunkNumber: number): string {
    return `${chunkNumber}\u0000${url}`;
}

function copyChunk(chunk: StoredChunk): StoredChunk {
    return {
        ...chunk,
        metadata: { ...chunk.metadata },
        embedding: [...chunk.embedding],
    };
}

/**
 * ChunkStore held in a Map. Used by tests and for local runs without a
 * database. Stored values are copies, so callers cannot mutate the store
 * through a returned object.
 */
export class MemoryChunkStore implements ChunkStore {
    protected readonly chunks = new Map<string, StoredChunk>();

    size(): number {
        return this.chunks.size;
    }

    all(): StoredChunk[] {
        return [...this.chunks.values()].map(copyChunk);
    }

    async upsert(chunk: StoredChunk): Promise<void> {
        if (!Number.isInteger(chunk.chunk_number) || chunk.chunk_number < 0) {
            throw new StoreError("upsert", `invalid chunk_number ${chunk.chunk_number} for ${chunk.url}`);
        }
        this.chunks.set(keyOf(chunk.url, chunk.chunk_number), copyChunk(chunk));
    }

    async listDistinctUrls(filter: ChunkFilter): Promise<string[]> {
        validateFilter(filter);
        const urls = new Set<string>();
        for (const chunk of this.chunks.values()) {
            if (matchesFilter(chunk.metadata, filter)) {
                urls.add(chunk.url);
            }
        }
        return [...urls].sort(compareStrings);
    }

    async getOrderedChunks(url: string, filter: ChunkFilter): Promise<StoredChunk[]> {
        validateFilter(filter);
        return [...this.chunks.values()]
            .filter(c => c.url === url && matchesFilter(c.metadata, filter))
            .sort((a, b) => a.chunk_number - b.chunk_number)
            .map(copyChunk);
    }

    async search(embedding: number[], topK: number, filter: ChunkFilter): Promise<ScoredChunk[]> {
        validateFilter(filter);
        const candidates = [...this.chunks.values()].filter(c => matchesFilter(c.metadata, filter));
        return rankBySimilarity(embedding, candidates, topK).map(c => ({
            ...copyChunk(c),
            similarity: c.similarity,
        }));
    }

    async deleteByUrl(url: string, filter: ChunkFilter): Promise<number> {
        validateFilter(filter);
        let removed = 0;
        for (const [key, chunk] of this.chunks) {
            if (chunk.url === url && matchesFilter(chunk.metadata, filter)) {
                this.chunks.delete(key);
                removed++;
            }
        }
        return removed;
    }
}

const PersistedChunkSchema = z.object({
    url: z.string(),
    chunk_number: z.number().int().nonnegative(),
    title: z.string(),
    summary: z.string(),
    content: z.string(),
    metadata: z.object({
        source: z.string(),
        crawled_at: z.string(),
        chunk_size: z.number(),
        url_path: z.string(),
    }).passthrough(),
    embedding: z.array(z.number()),
});

const PersistedFileSchema = z.object({
    version: z.literal(1),
    chunks: z.array(PersistedChunkSchema),
});

/**
 * MemoryChunkStore mirrored to a JSON file, for running the CLI's ingest
 * and retrieval commands as separate processes without a database.
 * The file is read by `open` and written by `flush`, which the
 * orchestrator calls after every page.
 */
export class JsonFileChunkStore extends MemoryChunkStore {
    private readonly filePath: string;
    private pending: Promise<void> = Promise.resolve();

    private constructor(filePath: string) {
        super();
        this.filePath = filePath;
    }

    static async open(filePath: string): Promise<JsonFileChunkStore> {
        const store = new JsonFileChunkStore(filePath);
        let raw: string;
        try {
            raw = await fs.readFile(filePath, "utf8");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                logger.debug(`No chunk file at ${filePath}; starting empty`);
                return store;
            }
            throw new StoreError("open", errorMessage(error));
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new StoreError("open", `${filePath} is not valid JSON: ${errorMessage(error)}`);
        }

        const parsed = PersistedFileSchema.safeParse(json);
        if (!parsed.success) {
            throw new StoreError("open", `${filePath} is not a chunk file: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        }
        for (const chunk of parsed.data.chunks) {
            await store.upsert(chunk);
        }
        logger.debug(`Loaded ${store.size()} chunks from ${filePath}`);
        return store;
    }

    getFilePath(): string {
        return this.filePath;
    }

    /**
     * Write every chunk to a sibling temp file, then rename it over the
     * chunk file so a reader never sees a partial write. Calls are queued;
     * each one writes the state current when its turn comes.
     */
    flush(): Promise<void> {
        const write = this.pending.then(() => this.writeFile());
        // The queue outlives a failed write; the caller still gets the rejection
        this.pending = write.catch(() => undefined);
        return write;
    }

    private async writeFile(): Promise<void> {
        const tempPath = `${this.filePath}.tmp`;
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            const body = JSON.stringify({ version: 1, chunks: this.all() });
            await fs.writeFile(tempPath, body, "utf8");
            await fs.rename(tempPath, this.filePath);
        } catch (error) {
            throw new StoreError("flush", errorMessage(error));
        }
    }
}
