import { describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import { rowToChunk } from "../supabase-store";
import { StoreError } from "../../errors";

const row = {
    url: "https://chi.example/2026/",
    chunk_number: 0,
    title: "CHI 2026 - Overview",
    summary: "Dates and venue.",
    content: "# CHI 2026",
    metadata: {
        source: "sigchi__conference_events",
        crawled_at: "2026-01-02T03:04:05.000Z",
        chunk_size: 10,
        url_path: "/2026/",
    },
    embedding: [0.5, -0.5],
};

describe("rowToChunk", () => {
    it("accepts a row with an array embedding", () => {
        expect(rowToChunk(row)).toEqual(row);
    });

    it("parses a pgvector text literal", () => {
        expect(rowToChunk({ ...row, embedding: "[0.25,0.75]" }).embedding).toEqual([0.25, 0.75]);
    });

    it("maps a null embedding to an empty vector", () => {
        expect(rowToChunk({ ...row, embedding: null }).embedding).toEqual([]);
    });

    it("fills missing metadata fields and keeps extra ones", () => {
        const chunk = rowToChunk({ ...row, metadata: { source: "s", track: "papers" } });

        expect(chunk.metadata).toEqual({
            source: "s",
            crawled_at: "",
            chunk_size: 0,
            url_path: "",
            track: "papers",
        });
    });

    it("rejects a row without a url", () => {
        const { url: _url, ...rest } = row;
        expect(() => rowToChunk(rest)).toThrow(StoreError);
    });

    it("rejects an embedding literal that is not a vector", () => {
        expect(() => rowToChunk({ ...row, embedding: "not a vector" })).toThrow(/^read failed: unexpected row shape/);
    });
});

describe("match_site_pages", () => {
    it("compares filter fields as text like the other queries", async () => {
        const sql = await fs.readFile(new URL("../../../sql/site_pages.sql", import.meta.url), "utf8");

        expect(sql).not.toContain("metadata @> filter");
        expect(sql).toContain("from jsonb_each_text(filter) as f");
        expect(sql).toContain("where site_pages.metadata ->> f.key is distinct from f.value");
    });
});
