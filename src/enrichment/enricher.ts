import type { Enrichment, TitleAndSummary } from "../types";
import type { InferenceClient } from "./types";
import { errorMessage } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export const TITLE_FALLBACK = "Error processing title";
export const SUMMARY_FALLBACK = "Error processing summary";

/** Characters of a chunk sent for title/summary extraction */
export const SUMMARY_INPUT_CHARS = 1000;

export interface EnricherOptions {
    /** Length of every embedding; the zero-vector fallback has this length */
    dimensions: number;
}

/**
 * Prompt input for title/summary extraction: the URL plus the first
 * SUMMARY_INPUT_CHARS characters of the chunk.
 */
export function buildSummaryInput(content: string, url: string): string {
    return `URL: ${url}\n\nContent:\n${content.slice(0, SUMMARY_INPUT_CHARS)}...`;
}

/**
 * Produces title, summary and embedding for one chunk. Never rejects:
 * inference failures are logged and replaced with fixed fallbacks, so one
 * bad chunk cannot stop its siblings. Holds no per-call state, so any
 * number of enrichments may run concurrently on one instance.
 */
export class Enricher {
    private readonly client: InferenceClient;
    private readonly dimensions: number;

    constructor(client: InferenceClient, options: EnricherOptions) {
        if (!Number.isInteger(options.dimensions) || options.dimensions < 1) {
            throw new RangeError(`dimensions must be a positive integer, got ${options.dimensions}`);
        }
        this.client = client;
        this.dimensions = options.dimensions;
    }

    zeroVector(): number[] {
        return new Array<number>(this.dimensions).fill(0);
    }

    async summarize(content: string, url: string): Promise<TitleAndSummary> {
        try {
            const result = await this.client.summarize(buildSummaryInput(content, url));
            return { title: result.title, summary: result.summary };
        } catch (error) {
            logger.warn(`Title/summary failed for ${url}: ${errorMessage(error)}`);
            return { title: TITLE_FALLBACK, summary: SUMMARY_FALLBACK };
        }
    }

    /**
     * Embedding of the full text. A failed call, or a vector of the wrong
     * length, yields a zero vector of the configured dimensions.
     */
    async embed(text: string): Promise<number[]> {
        try {
            const embedding = await this.client.embed(text);
            if (embedding.length !== this.dimensions) {
                throw new Error(`expected ${this.dimensions} dimensions, got ${embedding.length}`);
            }
            return embedding;
        } catch (error) {
            logger.warn(`Embedding failed: ${errorMessage(error)}`);
            return this.zeroVector();
        }
    }

    async enrich(content: string, url: string): Promise<Enrichment> {
        const [extracted, embedding] = await Promise.all([
            this.summarize(content, url),
            this.embed(content),
        ]);
        return { ...extracted, embedding };
    }
}
