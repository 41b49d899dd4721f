import dotenv from "dotenv";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { UsageError } from "./errors";
import type { LogLevel } from "./utils/logger";

/**
 * Load `.env` once. When running from dist/ the project root's .env is
 * preferred; otherwise dotenv resolves it from the working directory.
 * Variables already present in the environment are never overridden.
 */
export function loadDotenv(): void {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const rootEnv = path.resolve(here, "../.env");
    if (fs.existsSync(rootEnv)) {
        dotenv.config({ path: rootEnv });
        return;
    }
    dotenv.config();
}

const positiveInt = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const optionalString = z.string().trim().min(1).optional();

const EnvSchema = z.object({
    DATASET_SOURCE: z.string().trim().min(1).default("sigchi__conference_events"),
    STORE: z.enum(["supabase", "memory"]).optional(),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    SUPABASE_TABLE: z.string().trim().min(1).default("site_pages"),
    SUPABASE_MATCH_FUNCTION: z.string().trim().min(1).default("match_site_pages"),
    MEMORY_STORE_PATH: z.string().trim().min(1).default(".confindex/chunks.json"),
    OPENAI_API_KEY: optionalString,
    LLM_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
    EMBEDDING_MODEL: z.string().trim().min(1).default("text-embedding-3-small"),
    EMBEDDING_DIMENSIONS: positiveInt(1536),
    CHUNK_SIZE: positiveInt(5000),
    MAX_CONCURRENT_FETCHES: positiveInt(5),
    FETCH_TIMEOUT_MS: positiveInt(30000),
    FETCH_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
    SEARCH_TOP_K: positiveInt(100),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type StoreKind = "supabase" | "memory";

export interface AppConfig {
    datasetSource: string;
    store: StoreKind;
    supabase: {
        url: string | undefined;
        serviceKey: string | undefined;
        table: string;
        matchFunction: string;
    };
    /** JSON file backing the memory store between CLI runs */
    memoryStorePath: string;
    openai: {
        apiKey: string | undefined;
        llmModel: string;
        embeddingModel: string;
    };
    embeddingDimensions: number;
    chunkSize: number;
    maxConcurrentFetches: number;
    fetchTimeoutMs: number;
    fetchRetries: number;
    searchTopK: number;
    logLevel: LogLevel;
}

/**
 * Parse configuration from an environment map. Empty strings count as unset
 * so that a copied .env.example with blank values still takes defaults.
 *
 * @throws {UsageError} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const raw: Record<string, string> = {};
    for (const key of Object.keys(EnvSchema.shape)) {
        const value = env[key]?.trim();
        if (value !== undefined && value !== "") {
            raw[key] = value;
        }
    }

    const parsed = EnvSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new UsageError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
    }

    const e = parsed.data;
    const store: StoreKind = e.STORE ?? (e.SUPABASE_URL !== undefined ? "supabase" : "memory");

    if (store === "supabase" && (e.SUPABASE_URL === undefined || e.SUPABASE_SERVICE_KEY === undefined)) {
        throw new UsageError("Invalid configuration:\n  STORE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_KEY");
    }

    return {
        datasetSource: e.DATASET_SOURCE,
        store,
        supabase: {
            url: e.SUPABASE_URL,
            serviceKey: e.SUPABASE_SERVICE_KEY,
            table: e.SUPABASE_TABLE,
            matchFunction: e.SUPABASE_MATCH_FUNCTION,
        },
        memoryStorePath: e.MEMORY_STORE_PATH,
        openai: {
            apiKey: e.OPENAI_API_KEY,
            llmModel: e.LLM_MODEL,
            embeddingModel: e.EMBEDDING_MODEL,
        },
        embeddingDimensions: e.EMBEDDING_DIMENSIONS,
        chunkSize: e.CHUNK_SIZE,
        maxConcurrentFetches: e.MAX_CONCURRENT_FETCHES,
        fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
        fetchRetries: e.FETCH_RETRIES,
        searchTopK: e.SEARCH_TOP_K,
        logLevel: e.LOG_LEVEL,
    };
}
