import { describe, it, expect, vi } from "vitest";
import { HttpPageFetcher } from "../page-fetcher";

function stubFetch(impl: () => Promise<Response>) {
    const fn = vi.fn(impl);
    vi.stubGlobal("fetch", fn);
    return fn;
}

const PAGE = `<html>
<head><title>Conf 2026</title></head>
<body>
<nav><a href="/">Home</a></nav>
<main>
<h1>Conf 2026</h1>
<p>June 1-4, Lisbon.</p>
</main>
</body>
</html>`;

describe("HttpPageFetcher", () => {
    it("renders an HTML page to markdown", async () => {
        const fetchMock = stubFetch(async () => new Response(PAGE, {
            status: 200,
            headers: { "content-type": "text/html; charset=utf-8" },
        }));

        const result = await new HttpPageFetcher().fetch("https://conf.example/");

        expect(result).toEqual({
            url: "https://conf.example/",
            success: true,
            markdown: "# Conf 2026\n\nJune 1-4, Lisbon.",
            error: null,
        });
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("uses text bodies as they are", async () => {
        stubFetch(async () => new Response("  # Notes\n\nplain  ", {
            status: 200,
            headers: { "content-type": "text/markdown" },
        }));

        const result = await new HttpPageFetcher().fetch("https://conf.example/notes.md");

        expect(result.markdown).toBe("# Notes\n\nplain");
    });

    it("reports HTTP errors", async () => {
        stubFetch(async () => new Response("gone", { status: 404, statusText: "Not Found" }));

        const result = await new HttpPageFetcher().fetch("https://conf.example/missing");

        expect(result).toEqual({
            url: "https://conf.example/missing",
            success: false,
            markdown: "",
            error: "HTTP 404: Not Found",
        });
    });

    it("rejects binary content", async () => {
        stubFetch(async () => new Response("%PDF", {
            status: 200,
            headers: { "content-type": "application/pdf" },
        }));

        const result = await new HttpPageFetcher().fetch("https://conf.example/cfp.pdf");

        expect(result.error).toBe("Unsupported content type: application/pdf");
    });

    it("fails a page with no text", async () => {
        stubFetch(async () => new Response("<html><body><script>x()</script></body></html>", {
            status: 200,
            headers: { "content-type": "text/html" },
        }));

        const result = await new HttpPageFetcher().fetch("https://conf.example/");

        expect(result.success).toBe(false);
        expect(result.error).toBe("No extractable content");
    });

    it("reports network errors without throwing", async () => {
        stubFetch(async () => {
            throw new TypeError("fetch failed");
        });

        const result = await new HttpPageFetcher().fetch("https://conf.example/");

        expect(result.success).toBe(false);
        expect(result.error).toBe("fetch failed");
    });

    it("reports an aborted request as a timeout", async () => {
        stubFetch(async () => {
            const error = new Error("This operation was aborted");
            error.name = "AbortError";
            throw error;
        });

        const result = await new HttpPageFetcher({ timeout: 50 }).fetch("https://conf.example/");

        expect(result.error).toBe("Timeout after 50ms");
    });
});
