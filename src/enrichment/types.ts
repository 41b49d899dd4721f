import type { TitleAndSummary } from "../types";

/**
 * Remote inference used during enrichment. Both calls may reject; the
 * Enricher turns failures into fallbacks.
 */
export interface InferenceClient {
    /** Fixed-length embedding of `text` */
    embed(text: string): Promise<number[]>;
    /**
     * Title and summary for a prompt built by the Enricher
     * (URL line plus the leading part of a chunk)
     */
    summarize(input: string): Promise<TitleAndSummary>;
}
