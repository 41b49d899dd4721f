/**
 * Read-side operations used by the question-answering agent. The text
 * methods resolve even when the store fails; failures become an
 * "Error ..." line.
 */

import type { ChunkFilter } from "../types";
import type { ChunkStore } from "../store/types";
import type { Enricher } from "../enrichment/enricher";
import { errorMessage } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export const NO_RESULTS = "No relevant documentation found.";
export const NO_PAGES = "No conference pages have been indexed yet.";
export const SECTION_SEPARATOR = "\n\n---\n\n";
export const DEFAULT_SEARCH_TOP_K = 100;

export function pageNotFound(url: string): string {
    return `No content found for URL: ${url}`;
}

/** "CHI 2025 - Dates" -> "CHI 2025" */
export function pageTitleFrom(chunkTitle: string): string {
    return chunkTitle.split(" - ")[0] ?? chunkTitle;
}

export interface RetrievalFacadeOptions {
    /** Dataset the agent is allowed to see */
    source: string;
    /** Chunks returned per search (default 100) */
    topK?: number;
}

export class RetrievalFacade {
    private readonly store: ChunkStore;
    private readonly enricher: Enricher;
    private readonly filter: ChunkFilter;
    private readonly topK: number;

    constructor(store: ChunkStore, enricher: Enricher, options: RetrievalFacadeOptions) {
        this.store = store;
        this.enricher = enricher;
        this.filter = { source: options.source };
        this.topK = options.topK ?? DEFAULT_SEARCH_TOP_K;
    }

    /**
     * Embed the query and return the most similar chunks as markdown
     * sections separated by horizontal rules.
     */
    async searchDocumentation(query: string): Promise<string> {
        try {
            const embedding = await this.enricher.embed(query);
            const results = await this.store.search(embedding, this.topK, this.filter);

            if (results.length === 0) {
                return NO_RESULTS;
            }

            return results
                .map(chunk => `\n# ${chunk.title}\n\n${chunk.content}\n`)
                .join(SECTION_SEPARATOR);
        } catch (error) {
            logger.error(`Error retrieving documentation: ${errorMessage(error)}`);
            return `Error retrieving documentation: ${errorMessage(error)}`;
        }
    }

    /**
     * Distinct ingested URLs, sorted. A store failure rejects, so an outage
     * is never mistaken for an empty index.
     */
    async listPages(): Promise<string[]> {
        return this.store.listDistinctUrls(this.filter);
    }

    /**
     * The page list as text: one URL per line, NO_PAGES for an empty
     * index, or an "Error ..." line.
     */
    async listPagesText(): Promise<string> {
        try {
            const urls = await this.listPages();
            return urls.length > 0 ? urls.join("\n") : NO_PAGES;
        } catch (error) {
            logger.error(`Error retrieving documentation pages: ${errorMessage(error)}`);
            return `Error retrieving documentation pages: ${errorMessage(error)}`;
        }
    }

    /**
     * Reassemble a page from its chunks in chunk_number order, under a
     * heading taken from the first chunk's title.
     */
    async getPage(url: string): Promise<string> {
        try {
            const chunks = await this.store.getOrderedChunks(url, this.filter);
            const first = chunks[0];
            if (first === undefined) {
                return pageNotFound(url);
            }

            const parts = [`# ${pageTitleFrom(first.title)}\n`, ...chunks.map(c => c.content)];
            return parts.join("\n\n");
        } catch (error) {
            logger.error(`Error retrieving page content: ${errorMessage(error)}`);
            return `Error retrieving page content: ${errorMessage(error)}`;
        }
    }
}
