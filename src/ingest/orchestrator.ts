/**
 * Ingestion: fetch pages with bounded concurrency, chunk each page, then
 * enrich and store all of its chunks concurrently.
 */

import type { StoredChunk } from "../types";
import type { PageFetcher, FetchResult } from "../fetcher/page-fetcher";
import type { Enricher } from "../enrichment/enricher";
import type { ChunkStore } from "../store/types";
import { chunkText, DEFAULT_CHUNK_SIZE } from "../chunking/chunker";
import { runWithConcurrency } from "../utils/concurrency";
import { urlPath } from "../utils/shared";
import { UsageError, errorMessage } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export const DEFAULT_MAX_CONCURRENT_FETCHES = 5;

export type PageStatus =
    | "stored"          // Fetched; chunks enriched and handed to the store
    | "fetch_failed";   // Every fetch attempt failed

export interface PageReport {
    url: string;
    status: PageStatus;
    attempts: number;
    chunkCount: number;
    chunksStored: number;
    chunksFailed: number;
    error?: string;
    durationMs: number;
}

export interface IngestReport {
    pages: PageReport[];
    succeeded: number;
    failed: number;
    chunksStored: number;
    chunksFailed: number;
}

export interface DocumentResult {
    chunkCount: number;
    chunksStored: number;
    chunksFailed: number;
    errors: string[];
}

export interface IngestOptions {
    /** Pages fetched and processed at once (default 5) */
    maxConcurrentFetches?: number;
    /** Chunker window in characters (default 5000) */
    chunkSize?: number;
    /** Extra fetch attempts per URL after a failure (default 0) */
    fetchRetries?: number;
}

export interface OrchestratorDeps {
    fetcher: PageFetcher;
    enricher: Enricher;
    store: ChunkStore;
}

export interface OrchestratorSettings extends IngestOptions {
    /** Dataset tag written to metadata.source */
    source: string;
    /** Clock for crawled_at; injectable for tests */
    now?: () => Date;
}

/**
 * Coordinates the fetch → chunk → enrich → store pipeline.
 *
 * Failure isolation: a failed chunk does not fail its page, a failed page
 * does not fail the batch. Only an empty URL list is an error.
 */
export class IngestionOrchestrator {
    private readonly fetcher: PageFetcher;
    private readonly enricher: Enricher;
    private readonly store: ChunkStore;
    private readonly source: string;
    private readonly now: () => Date;
    private readonly defaults: Required<IngestOptions>;

    constructor(deps: OrchestratorDeps, settings: OrchestratorSettings) {
        if (settings.source.trim().length === 0) {
            throw new UsageError("Ingestion requires a non-empty source tag");
        }
        this.fetcher = deps.fetcher;
        this.enricher = deps.enricher;
        this.store = deps.store;
        this.source = settings.source;
        this.now = settings.now ?? (() => new Date());
        this.defaults = {
            maxConcurrentFetches: settings.maxConcurrentFetches ?? DEFAULT_MAX_CONCURRENT_FETCHES,
            chunkSize: settings.chunkSize ?? DEFAULT_CHUNK_SIZE,
            fetchRetries: settings.fetchRetries ?? 0,
        };
    }

    /**
     * Ingest every URL. Duplicate URLs are ingested once. Resolves with a
     * per-URL report; partial failure is reported, never thrown.
     *
     * @throws {UsageError} when no URLs are given or an option is out of range
     */
    async ingest(urls: readonly string[], options: IngestOptions = {}): Promise<IngestReport> {
        const cfg = { ...this.defaults, ...stripUndefined(options) };
        if (!Number.isInteger(cfg.maxConcurrentFetches) || cfg.maxConcurrentFetches < 1) {
            throw new UsageError(`maxConcurrentFetches must be a positive integer, got ${cfg.maxConcurrentFetches}`);
        }
        if (!Number.isInteger(cfg.chunkSize) || cfg.chunkSize < 1) {
            throw new UsageError(`chunkSize must be a positive integer, got ${cfg.chunkSize}`);
        }
        if (!Number.isInteger(cfg.fetchRetries) || cfg.fetchRetries < 0) {
            throw new UsageError(`fetchRetries must be a non-negative integer, got ${cfg.fetchRetries}`);
        }

        const unique = [...new Set(urls.map(u => u.trim()).filter(u => u.length > 0))];
        if (unique.length === 0) {
            throw new UsageError("No URLs to ingest");
        }
        if (unique.length < urls.length) {
            logger.debug(`Ignoring ${urls.length - unique.length} blank or duplicate URL(s)`);
        }

        logger.info(`Ingesting ${unique.length} URL(s), ${cfg.maxConcurrentFetches} at a time`);

        const outcomes = await runWithConcurrency(
            unique,
            url => this.ingestUrl(url, cfg.chunkSize, cfg.fetchRetries),
            cfg.maxConcurrentFetches
        );

        const pages = outcomes.map((outcome, i): PageReport => {
            if (outcome.status === "fulfilled") return outcome.value;
            // ingestUrl converts its own failures; this is a last-resort record
            return {
                url: unique[i] ?? "",
                status: "fetch_failed",
                attempts: 0,
                chunkCount: 0,
                chunksStored: 0,
                chunksFailed: 0,
                error: errorMessage(outcome.reason),
                durationMs: 0,
            };
        });

        const report: IngestReport = {
            pages,
            succeeded: pages.filter(p => p.status === "stored").length,
            failed: pages.filter(p => p.status !== "stored").length,
            chunksStored: pages.reduce((sum, p) => sum + p.chunksStored, 0),
            chunksFailed: pages.reduce((sum, p) => sum + p.chunksFailed, 0),
        };

        logger.info(
            `Ingestion finished: ${report.succeeded} succeeded, ${report.failed} failed; ` +
            `${report.chunksStored} chunk(s) stored, ${report.chunksFailed} failed`
        );
        return report;
    }

    private async fetchWithRetries(url: string, retries: number): Promise<{ result: FetchResult; attempts: number }> {
        let attempts = 0;
        let result: FetchResult;
        do {
            attempts++;
            result = await logger.timeAsync(`Fetch ${url}`, () => this.fetcher.fetch(url));
            if (result.success) break;
            if (attempts <= retries) {
                logger.debug(`Retrying ${url} after: ${result.error ?? "unknown error"}`);
            }
        } while (attempts <= retries);
        return { result, attempts };
    }

    private async ingestUrl(url: string, chunkSize: number, retries: number): Promise<PageReport> {
        const started = performance.now();
        const { result, attempts } = await this.fetchWithRetries(url, retries);

        if (!result.success) {
            logger.warn(`Failed: ${url} - Error: ${result.error ?? "unknown error"}`);
            return {
                url,
                status: "fetch_failed",
                attempts,
                chunkCount: 0,
                chunksStored: 0,
                chunksFailed: 0,
                error: result.error ?? "unknown error",
                durationMs: performance.now() - started,
            };
        }

        logger.info(`Successfully fetched: ${url}`);
        const doc = await this.processDocument(url, result.markdown, chunkSize);
        await this.flushPage(url, doc);
        const durationMs = performance.now() - started;
        logger.recordTiming(`Process ${url}`, durationMs);

        return {
            url,
            status: "stored",
            attempts,
            chunkCount: doc.chunkCount,
            chunksStored: doc.chunksStored,
            chunksFailed: doc.chunksFailed,
            ...(doc.errors.length > 0 && { error: doc.errors.join("; ") }),
            durationMs,
        };
    }

    /** Chunks that never reach durable storage are counted as failed */
    private async flushPage(url: string, doc: DocumentResult): Promise<void> {
        if (this.store.flush === undefined || doc.chunksStored === 0) return;
        try {
            await this.store.flush();
        } catch (error) {
            const message = errorMessage(error);
            logger.error(`Failed to persist ${url}: ${message}`);
            doc.chunksFailed += doc.chunksStored;
            doc.chunksStored = 0;
            doc.errors.push(message);
        }
    }

    /**
     * Build the stored form of one chunk. Enrichment never rejects, so this
     * only waits on inference.
     */
    async processChunk(content: string, chunkNumber: number, url: string): Promise<StoredChunk> {
        const { title, summary, embedding } = await this.enricher.enrich(content, url);
        return {
            url,
            chunk_number: chunkNumber,
            title,
            summary,
            content,
            metadata: {
                source: this.source,
                crawled_at: this.now().toISOString(),
                chunk_size: content.length,
                url_path: urlPath(url),
            },
            embedding,
        };
    }

    /**
     * Chunk a page and store all chunks concurrently. Numbering is fixed
     * before any chunk is enriched; completion order does not matter.
     */
    async processDocument(url: string, markdown: string, chunkSize: number = this.defaults.chunkSize): Promise<DocumentResult> {
        const chunks = chunkText(markdown, chunkSize);
        logger.debug(`${url}: ${chunks.length} chunk(s)`);

        const settled = await Promise.allSettled(
            chunks.map(async (content, chunkNumber) => {
                const chunk = await this.processChunk(content, chunkNumber, url);
                await this.store.upsert(chunk);
            })
        );

        const errors: string[] = [];
        let chunksStored = 0;
        settled.forEach((outcome, chunkNumber) => {
            if (outcome.status === "fulfilled") {
                chunksStored++;
            } else {
                const message = `chunk ${chunkNumber}: ${errorMessage(outcome.reason)}`;
                logger.error(`Failed to store ${url} ${message}`);
                errors.push(message);
            }
        });

        return {
            chunkCount: chunks.length,
            chunksStored,
            chunksFailed: chunks.length - chunksStored,
            errors,
        };
    }
}

function stripUndefined(options: IngestOptions): IngestOptions {
    const out: IngestOptions = {};
    if (options.maxConcurrentFetches !== undefined) out.maxConcurrentFetches = options.maxConcurrentFetches;
    if (options.chunkSize !== undefined) out.chunkSize = options.chunkSize;
    if (options.fetchRetries !== undefined) out.fetchRetries = options.fetchRetries;
    return out;
}
