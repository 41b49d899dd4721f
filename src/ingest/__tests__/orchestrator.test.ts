import { describe, it, expect, vi, beforeAll } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { IngestionOrchestrator } from "../orchestrator";
import { Enricher, TITLE_FALLBACK } from "../../enrichment/enricher";
import type { InferenceClient } from "../../enrichment/types";
import type { FetchResult, PageFetcher } from "../../fetcher/page-fetcher";
import { MemoryChunkStore, JsonFileChunkStore } from "../../store/memory-store";
import type { StoredChunk } from "../../types";
import { StoreError, UsageError } from "../../errors";
import Logger from "../../utils/logger";

const SOURCE = "test_source";
const FILTER = { source: SOURCE };
const NOW = new Date("2026-01-02T03:04:05.000Z");

/** Fetcher serving fixed pages; unknown URLs fail like a 404 */
class FakeFetcher implements PageFetcher {
    readonly calls: string[] = [];
    inFlight = 0;
    maxInFlight = 0;

    constructor(
        private readonly pages: Record<string, string>,
        private readonly delayMs = 0
    ) {}

    async fetch(url: string): Promise<FetchResult> {
        this.calls.push(url);
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            if (this.delayMs > 0) {
                await new Promise(resolve => setTimeout(resolve, this.delayMs));
            }
            const markdown = this.pages[url];
            if (markdown === undefined) {
                return { url, success: false, markdown: "", error: "HTTP 404: Not Found" };
            }
            return { url, success: true, markdown, error: null };
        } finally {
            this.inFlight--;
        }
    }
}

function fakeInference(overrides: Partial<InferenceClient> = {}): InferenceClient {
    return {
        embed: vi.fn(async () => [1, 0, 0]),
        summarize: vi.fn(async () => ({ title: "Title", summary: "Summary" })),
        ...overrides,
    };
}

function setup(
    pages: Record<string, string>,
    options: { store?: MemoryChunkStore; inference?: InferenceClient; delayMs?: number } = {}
) {
    const fetcher = new FakeFetcher(pages, options.delayMs);
    const store = options.store ?? new MemoryChunkStore();
    const enricher = new Enricher(options.inference ?? fakeInference(), { dimensions: 3 });
    const orchestrator = new IngestionOrchestrator(
        { fetcher, enricher, store },
        { source: SOURCE, chunkSize: 100, now: () => NOW }
    );
    return { fetcher, store, orchestrator };
}

beforeAll(() => {
    Logger.getInstance().setLevel("error");
});

describe("IngestionOrchestrator", () => {
    it("stores every chunk of a good page and reports a failed one", async () => {
        const { store, orchestrator } = setup({ "https://a.example/a": "a".repeat(250) });

        const report = await orchestrator.ingest(["https://a.example/a", "https://b.example/b"]);

        expect(report.succeeded).toBe(1);
        expect(report.failed).toBe(1);
        expect(report.chunksStored).toBe(3);
        expect(report.chunksFailed).toBe(0);

        const chunks = await store.getOrderedChunks("https://a.example/a", FILTER);
        expect(chunks.map(c => c.chunk_number)).toEqual([0, 1, 2]);
        expect(chunks.map(c => c.content.length)).toEqual([100, 100, 50]);
        expect(await store.listDistinctUrls(FILTER)).toEqual(["https://a.example/a"]);

        const failed = report.pages.find(p => p.url === "https://b.example/b");
        expect(failed?.status).toBe("fetch_failed");
        expect(failed?.error).toBe("HTTP 404: Not Found");
    });

    it("writes source, crawl time, size and path into metadata", async () => {
        const { store, orchestrator } = setup({ "https://conf.example/2026/dates": "Papers due March 3." });

        await orchestrator.ingest(["https://conf.example/2026/dates"]);

        const [chunk] = await store.getOrderedChunks("https://conf.example/2026/dates", FILTER);
        expect(chunk).toEqual({
            url: "https://conf.example/2026/dates",
            chunk_number: 0,
            title: "Title",
            summary: "Summary",
            content: "Papers due March 3.",
            metadata: {
                source: SOURCE,
                crawled_at: "2026-01-02T03:04:05.000Z",
                chunk_size: 19,
                url_path: "/2026/dates",
            },
            embedding: [1, 0, 0],
        });
    });

    it("never has more pages in flight than the limit", async () => {
        const pages: Record<string, string> = {};
        for (let i = 0; i < 6; i++) {
            pages[`https://p${i}.example/`] = `page ${i}`;
        }
        const { fetcher, orchestrator } = setup(pages, { delayMs: 5 });

        const report = await orchestrator.ingest(Object.keys(pages), { maxConcurrentFetches: 2 });

        expect(report.succeeded).toBe(6);
        expect(fetcher.maxInFlight).toBe(2);
    });

    it("keeps chunk count stable when a page is ingested again", async () => {
        const { store, orchestrator } = setup({ "https://a.example/a": "a".repeat(250) });

        await orchestrator.ingest(["https://a.example/a"]);
        await orchestrator.ingest(["https://a.example/a"]);

        expect(store.size()).toBe(3);
    });

    it("ingests a repeated URL once", async () => {
        const { fetcher, orchestrator } = setup({ "https://a.example/": "text" });

        const report = await orchestrator.ingest(["https://a.example/", " https://a.example/ ", "https://a.example/"]);

        expect(fetcher.calls).toEqual(["https://a.example/"]);
        expect(report.pages).toHaveLength(1);
    });

    it("rejects an empty URL list", async () => {
        const { orchestrator } = setup({});

        await expect(orchestrator.ingest([])).rejects.toThrow(UsageError);
        await expect(orchestrator.ingest(["  "])).rejects.toThrow("No URLs to ingest");
    });

    it("rejects a zero concurrency limit", async () => {
        const { orchestrator } = setup({ "https://a.example/": "text" });

        await expect(orchestrator.ingest(["https://a.example/"], { maxConcurrentFetches: 0 })).rejects.toThrow(UsageError);
    });

    it("requires a source tag", () => {
        const enricher = new Enricher(fakeInference(), { dimensions: 3 });
        expect(() => new IngestionOrchestrator(
            { fetcher: new FakeFetcher({}), enricher, store: new MemoryChunkStore() },
            { source: " " }
        )).toThrow(UsageError);
    });

    it("isolates a chunk the store refuses", async () => {
        class FlakyStore extends MemoryChunkStore {
            override async upsert(chunk: StoredChunk): Promise<void> {
                if (chunk.chunk_number === 1) {
                    throw new StoreError("upsert", "connection reset");
                }
                await super.upsert(chunk);
            }
        }
        const { store, orchestrator } = setup(
            { "https://a.example/a": "a".repeat(250) },
            { store: new FlakyStore() }
        );

        const report = await orchestrator.ingest(["https://a.example/a"]);

        const [page] = report.pages;
        expect(page?.status).toBe("stored");
        expect(page?.chunkCount).toBe(3);
        expect(page?.chunksStored).toBe(2);
        expect(page?.chunksFailed).toBe(1);
        expect(page?.error).toBe("chunk 1: upsert failed: connection reset");
        expect((await store.getOrderedChunks("https://a.example/a", FILTER)).map(c => c.chunk_number)).toEqual([0, 2]);
    });

    it("stores fallback titles when inference fails", async () => {
        const inference = fakeInference({
            summarize: vi.fn(async () => { throw new Error("quota exceeded"); }),
        });
        const { store, orchestrator } = setup({ "https://a.example/": "text" }, { inference });

        const report = await orchestrator.ingest(["https://a.example/"]);

        expect(report.chunksStored).toBe(1);
        const [chunk] = await store.getOrderedChunks("https://a.example/", FILTER);
        expect(chunk?.title).toBe(TITLE_FALLBACK);
    });

    it("stores a zero vector for a chunk whose embedding fails", async () => {
        const inference = fakeInference({
            embed: vi.fn(async (text: string) => {
                if (text === "b".repeat(100)) throw new Error("rate limited");
                return [1, 0, 0];
            }),
        });
        const { store, orchestrator } = setup(
            { "https://a.example/": "a".repeat(100) + "b".repeat(100) + "c".repeat(50) },
            { inference }
        );

        const report = await orchestrator.ingest(["https://a.example/"]);

        expect(report.chunksStored).toBe(3);
        expect(report.chunksFailed).toBe(0);
        const chunks = await store.getOrderedChunks("https://a.example/", FILTER);
        expect(chunks.map(c => c.embedding)).toEqual([[1, 0, 0], [0, 0, 0], [1, 0, 0]]);
        expect(chunks.map(c => c.title)).toEqual(["Title", "Title", "Title"]);
    });

    it("persists each page before reporting it", async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), "confindex-"));
        try {
            const file = path.join(dir, "chunks.json");
            const { orchestrator } = setup(
                { "https://a.example/a": "a".repeat(250) },
                { store: await JsonFileChunkStore.open(file) }
            );

            await orchestrator.ingest(["https://a.example/a"]);

            const reopened = await JsonFileChunkStore.open(file);
            expect(reopened.size()).toBe(3);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it("counts chunks as failed when the page cannot be persisted", async () => {
        class UnwritableStore extends MemoryChunkStore {
            async flush(): Promise<void> {
                throw new StoreError("flush", "disk full");
            }
        }
        const { orchestrator } = setup(
            { "https://a.example/a": "a".repeat(250) },
            { store: new UnwritableStore() }
        );

        const report = await orchestrator.ingest(["https://a.example/a"]);

        expect(report.chunksStored).toBe(0);
        expect(report.chunksFailed).toBe(3);
        expect(report.pages[0]?.error).toBe("flush failed: disk full");
    });

    it("retries a failed fetch when asked to", async () => {
        const { fetcher, orchestrator } = setup({});
        let attempt = 0;
        vi.spyOn(fetcher, "fetch").mockImplementation(async url => {
            attempt++;
            return attempt === 1
                ? { url, success: false, markdown: "", error: "HTTP 503: Service Unavailable" }
                : { url, success: true, markdown: "recovered", error: null };
        });

        const report = await orchestrator.ingest(["https://a.example/"], { fetchRetries: 1 });

        expect(report.pages[0]?.status).toBe("stored");
        expect(report.pages[0]?.attempts).toBe(2);
    });

    it("makes a single attempt by default", async () => {
        const { orchestrator } = setup({});

        const report = await orchestrator.ingest(["https://a.example/"]);

        expect(report.pages[0]?.attempts).toBe(1);
        expect(report.pages[0]?.status).toBe("fetch_failed");
    });
});
