/**
 * Library entry point: ingestion, storage and retrieval of conference pages
 */

export type {
    ChunkMetadata,
    StoredChunk,
    ScoredChunk,
    ChunkFilter,
    TitleAndSummary,
    Enrichment,
    Block,
    BlockType,
} from "./types";

export { UsageError, StoreError, errorMessage } from "./errors";
export { loadConfig, loadDotenv, type AppConfig, type StoreKind } from "./config";
export { createServices, type Services, type ServiceOverrides } from "./services";

export { chunkText, findCodeFences, DEFAULT_CHUNK_SIZE, type CodeFence, type ChunkOptions } from "./chunking/chunker";

export type { InferenceClient } from "./enrichment/types";
export { Enricher, buildSummaryInput, TITLE_FALLBACK, SUMMARY_FALLBACK } from "./enrichment/enricher";
export { OpenAIInferenceClient, parseTitleAndSummary } from "./enrichment/openai-client";

export type { ChunkStore } from "./store/types";
export { MemoryChunkStore, JsonFileChunkStore } from "./store/memory-store";
export { SupabaseChunkStore } from "./store/supabase-store";
export { cosineSimilarity, rankBySimilarity } from "./store/similarity";
export { matchesFilter, validateFilter } from "./store/filter";

export { HttpPageFetcher, type PageFetcher, type FetchResult } from "./fetcher/page-fetcher";
export { htmlToMarkdown, renderBlocks } from "./fetcher/markdown";

export {
    IngestionOrchestrator,
    type IngestOptions,
    type IngestReport,
    type PageReport,
    type PageStatus,
} from "./ingest/orchestrator";

export { RetrievalFacade, NO_PAGES, NO_RESULTS, SECTION_SEPARATOR, pageNotFound } from "./retrieval/facade";

export {
    ConferenceRecordSchema,
    ConferenceRecordListSchema,
    CONFERENCE_EXTRACTION_PROMPT,
    parseConferenceRecords,
    type ConferenceRecord,
} from "./conference";

export { createMcpServer, runStdioServer } from "./mcp/server";
