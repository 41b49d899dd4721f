/**
 * Page fetcher: one GET per URL, HTML rendered to markdown
 */

import { htmlToMarkdown } from "./markdown";
import { errorMessage } from "../errors";

export interface FetchResult {
    url: string;
    success: boolean;
    markdown: string;
    error: string | null;
}

/**
 * Anything that turns a URL into page text. Implementations must not
 * throw: every failure is reported as `success: false` with an error.
 */
export interface PageFetcher {
    fetch(url: string): Promise<FetchResult>;
}

export interface HttpPageFetcherOptions {
    /** Per-request timeout in ms (default 30000) */
    timeout?: number;
    userAgent?: string;
}

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; confindex/0.1; conference page indexer)";
const DEFAULT_TIMEOUT_MS = 30000;

function failure(url: string, error: string): FetchResult {
    return { url, success: false, markdown: "", error };
}

/**
 * Fetches with the global `fetch` and converts the response body. HTML is
 * cleaned and rendered to markdown; text/plain and text/markdown bodies are
 * used as they are. No retries here: the orchestrator owns retry policy.
 */
export class HttpPageFetcher implements PageFetcher {
    private readonly timeout: number;
    private readonly userAgent: string;

    constructor(options: HttpPageFetcherOptions = {}) {
        this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    }

    async fetch(url: string): Promise<FetchResult> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);

        try {
            const response = await fetch(url, {
                signal: controller.signal,
                headers: {
                    "User-Agent": this.userAgent,
                    "Accept": "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8",
                    "Accept-Language": "en-US,en;q=0.5",
                },
                redirect: "follow",
            });

            if (!response.ok) {
                return failure(url, `HTTP ${response.status}: ${response.statusText}`);
            }

            const contentType = response.headers.get("content-type") ?? "";
            const body = await response.text();

            let markdown: string;
            if (contentType.includes("text/html") || contentType.includes("application/xhtml")) {
                markdown = htmlToMarkdown(body);
            } else if (contentType.startsWith("text/")) {
                markdown = body.trim();
            } else {
                return failure(url, `Unsupported content type: ${contentType || "unknown"}`);
            }

            if (markdown.length === 0) {
                return failure(url, "No extractable content");
            }

            return { url, success: true, markdown, error: null };
        } catch (error) {
            if (error instanceof Error && error.name === "AbortError") {
                return failure(url, `Timeout after ${this.timeout}ms`);
            }
            return failure(url, errorMessage(error));
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
