import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ChunkFilter, ScoredChunk, StoredChunk } from "../types";
import type { ChunkStore } from "./types";
import { validateFilter } from "./filter";
import { compareStrings } from "../utils/shared";
import { StoreError } from "../errors";

/** PostgREST caps a response at 1000 rows by default */
const PAGE_SIZE = 1000;

export interface SupabaseStoreOptions {
    url: string;
    serviceKey: string;
    /** Table of chunks (default site_pages) */
    table?: string;
    /** SQL function for nearest-neighbour search (default match_site_pages) */
    matchFunction?: string;
}

/** pgvector columns come back from PostgREST as "[0.1,0.2,...]" */
const EmbeddingSchema = z.union([
    z.array(z.number()),
    z.string().transform((value, ctx) => {
        try {
            return z.array(z.number()).parse(JSON.parse(value));
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "embedding is not a vector literal" });
            return z.NEVER;
        }
    }),
    z.null().transform((): number[] => []),
]);

const RowSchema = z.object({
    url: z.string(),
    chunk_number: z.number().int(),
    title: z.string(),
    summary: z.string(),
    content: z.string(),
    metadata: z.object({
        source: z.string(),
        crawled_at: z.string().default(""),
        chunk_size: z.number().default(0),
        url_path: z.string().default(""),
    }).passthrough(),
    embedding: EmbeddingSchema.default([]),
});

const MatchRowSchema = RowSchema.extend({
    similarity: z.number().nullable().transform(v => v ?? 0),
});

const UrlRowSchema = z.object({ url: z.string() });

/**
 * Validate a row returned by the chunk table
 *
 * @throws {StoreError} when the row does not have the chunk shape
 */
export function rowToChunk(row: unknown): StoredChunk {
    const parsed = RowSchema.safeParse(row);
    if (!parsed.success) {
        throw new StoreError("read", `unexpected row shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
}

function rowToScoredChunk(row: unknown): ScoredChunk {
    const parsed = MatchRowSchema.safeParse(row);
    if (!parsed.success) {
        throw new StoreError("search", `unexpected row shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
}

/** `metadata->>field` equality filters for a PostgREST query */
function metadataColumn(field: string): string {
    return `metadata->>${field}`;
}

/**
 * ChunkStore on a Supabase (Postgres + pgvector) table with a unique
 * (url, chunk_number) constraint. Schema: sql/site_pages.sql.
 */
export class SupabaseChunkStore implements ChunkStore {
    private readonly client: SupabaseClient;
    private readonly table: string;
    private readonly matchFunction: string;

    constructor(client: SupabaseClient, options: Pick<SupabaseStoreOptions, "table" | "matchFunction"> = {}) {
        this.client = client;
        this.table = options.table ?? "site_pages";
        this.matchFunction = options.matchFunction ?? "match_site_pages";
    }

    static connect(options: SupabaseStoreOptions): SupabaseChunkStore {
        const client = createClient(options.url, options.serviceKey, {
            auth: { persistSession: false },
        });
        return new SupabaseChunkStore(client, options);
    }

    async upsert(chunk: StoredChunk): Promise<void> {
        const { error } = await this.client
            .from(this.table)
            .upsert({
                url: chunk.url,
                chunk_number: chunk.chunk_number,
                title: chunk.title,
                summary: chunk.summary,
                content: chunk.content,
                metadata: chunk.metadata,
                embedding: chunk.embedding,
            }, { onConflict: "url,chunk_number" });

        if (error) {
            throw new StoreError("upsert", `${chunk.url}#${chunk.chunk_number}: ${error.message}`);
        }
    }

    async listDistinctUrls(filter: ChunkFilter): Promise<string[]> {
        validateFilter(filter);
        const urls = new Set<string>();

        for (let from = 0; ; from += PAGE_SIZE) {
            let query = this.client.from(this.table).select("url");
            for (const [field, value] of Object.entries(filter)) {
                query = query.eq(metadataColumn(field), value);
            }
            const { data, error } = await query
                .order("url")
                .order("chunk_number")
                .range(from, from + PAGE_SIZE - 1);

            if (error) {
                throw new StoreError("listDistinctUrls", error.message);
            }
            const rows = z.array(UrlRowSchema).parse(data ?? []);
            for (const row of rows) {
                urls.add(row.url);
            }
            if (rows.length < PAGE_SIZE) break;
        }

        return [...urls].sort(compareStrings);
    }

    async getOrderedChunks(url: string, filter: ChunkFilter): Promise<StoredChunk[]> {
        validateFilter(filter);
        let query = this.client
            .from(this.table)
            .select("url, chunk_number, title, summary, content, metadata, embedding")
            .eq("url", url);
        for (const [field, value] of Object.entries(filter)) {
            query = query.eq(metadataColumn(field), value);
        }
        const { data, error } = await query.order("chunk_number");

        if (error) {
            throw new StoreError("getOrderedChunks", error.message);
        }
        return (data ?? []).map(rowToChunk);
    }

    async search(embedding: number[], topK: number, filter: ChunkFilter): Promise<ScoredChunk[]> {
        validateFilter(filter);
        if (topK <= 0) return [];

        const { data, error } = await this.client.rpc(this.matchFunction, {
            query_embedding: embedding,
            match_count: topK,
            filter,
        });

        if (error) {
            throw new StoreError("search", error.message);
        }
        if (!Array.isArray(data)) return [];
        return data.map(rowToScoredChunk);
    }

    async deleteByUrl(url: string, filter: ChunkFilter): Promise<number> {
        validateFilter(filter);
        let query = this.client
            .from(this.table)
            .delete({ count: "exact" })
            .eq("url", url);
        for (const [field, value] of Object.entries(filter)) {
            query = query.eq(metadataColumn(field), value);
        }
        const { count, error } = await query;

        if (error) {
            throw new StoreError("deleteByUrl", error.message);
        }
        return count ?? 0;
    }
}
