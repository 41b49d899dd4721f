import type { AppConfig } from "./config";
import type { ChunkStore } from "./store/types";
import type { InferenceClient } from "./enrichment/types";
import type { TitleAndSummary } from "./types";
import { Enricher } from "./enrichment/enricher";
import { OpenAIInferenceClient } from "./enrichment/openai-client";
import { HttpPageFetcher, type PageFetcher } from "./fetcher/page-fetcher";
import { IngestionOrchestrator } from "./ingest/orchestrator";
import { RetrievalFacade } from "./retrieval/facade";
import { JsonFileChunkStore } from "./store/memory-store";
import { SupabaseChunkStore } from "./store/supabase-store";
import { UsageError } from "./errors";

/**
 * Explicitly constructed service handles. Whoever creates them owns them
 * and calls `close()` when done.
 */
export interface Services {
    config: AppConfig;
    store: ChunkStore;
    enricher: Enricher;
    fetcher: PageFetcher;
    orchestrator: IngestionOrchestrator;
    retrieval: RetrievalFacade;
    /** Persist local state (the JSON chunk file) */
    close(): Promise<void>;
}

export interface ServiceOverrides {
    store?: ChunkStore;
    inference?: InferenceClient;
    fetcher?: PageFetcher;
}

/**
 * Stand-in used when no API key is configured and the command never needs
 * inference (listing or reading pages). Every call rejects.
 */
class MissingInferenceClient implements InferenceClient {
    async embed(): Promise<number[]> {
        throw new UsageError("OPENAI_API_KEY is not set");
    }

    async summarize(): Promise<TitleAndSummary> {
        throw new UsageError("OPENAI_API_KEY is not set");
    }
}

function createInference(config: AppConfig, requireInference: boolean): InferenceClient {
    const apiKey = config.openai.apiKey;
    if (apiKey === undefined) {
        if (requireInference) {
            throw new UsageError("OPENAI_API_KEY is required for ingestion and search");
        }
        return new MissingInferenceClient();
    }
    return new OpenAIInferenceClient({
        apiKey,
        llmModel: config.openai.llmModel,
        embeddingModel: config.openai.embeddingModel,
        dimensions: config.embeddingDimensions,
    });
}

async function createStore(config: AppConfig): Promise<ChunkStore> {
    if (config.store === "supabase") {
        const { url, serviceKey, table, matchFunction } = config.supabase;
        if (url === undefined || serviceKey === undefined) {
            throw new UsageError("STORE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_KEY");
        }
        return SupabaseChunkStore.connect({ url, serviceKey, table, matchFunction });
    }
    return JsonFileChunkStore.open(config.memoryStorePath);
}

export async function createServices(
    config: AppConfig,
    options: { requireInference?: boolean; overrides?: ServiceOverrides } = {}
): Promise<Services> {
    const { requireInference = false, overrides = {} } = options;

    const store = overrides.store ?? await createStore(config);
    const inference = overrides.inference ?? createInference(config, requireInference);
    const fetcher = overrides.fetcher ?? new HttpPageFetcher({ timeout: config.fetchTimeoutMs });
    const enricher = new Enricher(inference, { dimensions: config.embeddingDimensions });

    const orchestrator = new IngestionOrchestrator(
        { fetcher, enricher, store },
        {
            source: config.datasetSource,
            chunkSize: config.chunkSize,
            maxConcurrentFetches: config.maxConcurrentFetches,
            fetchRetries: config.fetchRetries,
        }
    );

    const retrieval = new RetrievalFacade(store, enricher, {
        source: config.datasetSource,
        topK: config.searchTopK,
    });

    return {
        config,
        store,
        enricher,
        fetcher,
        orchestrator,
        retrieval,
        async close() {
            await store.flush?.();
        },
    };
}
