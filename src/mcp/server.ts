/**
 * MCP tool surface for the conference question-answering agent
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { RetrievalFacade } from "../retrieval/facade";
import { CONFERENCE_EXTRACTION_PROMPT } from "../conference";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export interface McpServerInfo {
    name?: string;
    version?: string;
}

/**
 * Build an MCP server exposing the three retrieval tools and the extraction
 * prompt. Tool handlers always answer with text from the facade's text methods.
 */
export function createMcpServer(retrieval: RetrievalFacade, info: McpServerInfo = {}): McpServer {
    const server = new McpServer({
        name: info.name ?? "confindex",
        version: info.version ?? "0.1.0",
    });

    server.tool(
        "retrieve_relevant_documentation",
        `Retrieve the indexed conference page fragments most relevant to a question (semantic search).

Use this FIRST for any question about conferences: names, dates, venues, deadlines, themes.

RETURNS: Up to 100 fragments as markdown sections ("# <fragment title>" then its text), separated by "---", most relevant first.`,
        {
            user_query: z.string().describe("The user's question or a search query about conferences"),
        },
        async ({ user_query }) => {
            const text = await retrieval.searchDocumentation(user_query);
            return {
                content: [
                    {
                        type: "text",
                        text,
                    },
                ],
            };
        }
    );

    server.tool(
        "list_conferences",
        `List the URLs of every indexed conference page, one per line, sorted.

Use this to find a page to read in full with get_page_content.`,
        async () => {
            return {
                content: [{ type: "text", text: await retrieval.listPagesText() }],
            };
        }
    );

    server.tool(
        "get_page_content",
        `Read one indexed conference page in full, reassembled from its stored fragments in order.

RETURNS: "# <page title>" followed by the page text, or a "No content found" message for a URL that was never indexed.`,
        {
            url: z.string().describe("Exact URL as returned by list_conferences"),
        },
        async ({ url }) => {
            const text = await retrieval.getPage(url);
            return {
                content: [
                    {
                        type: "text",
                        text,
                    },
                ],
            };
        }
    );

    server.prompt(
        "extract_conferences",
        "Instructions for answering with a JSON array of conference records (title, dates, location, description)",
        () => ({
            messages: [
                {
                    role: "user",
                    content: {
                        type: "text",
                        text: CONFERENCE_EXTRACTION_PROMPT,
                    },
                },
            ],
        })
    );

    return server;
}

/**
 * Serve over stdio until the client disconnects
 */
export async function runStdioServer(retrieval: RetrievalFacade, info: McpServerInfo = {}): Promise<void> {
    const server = createMcpServer(retrieval, info);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info("MCP server listening on stdio");
}
