#!/usr/bin/env node

import { loadConfig, loadDotenv } from "./config";
import { createServices } from "./services";
import { parseCliArgs, type CliCommand } from "./cli-args";
import { executeCommand } from "./commands";
import { runStdioServer } from "./mcp/server";
import { UsageError, errorMessage } from "./errors";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
confindex - Conference page indexer and retrieval server

Fetches conference web pages, splits them into chunks, titles, summarizes
and embeds each chunk, and stores them for semantic search. Exposes the
index to MCP clients through three retrieval tools.

COMMANDS:
  ingest <url...> [options]   Fetch, chunk, enrich and store pages
    --file, -f <path>           Read URLs from a file (one per line, # comments)
    --concurrency, -c <n>       Pages processed at once (default: 5)
    --chunk-size <n>            Chunk size in characters (default: 5000)
    --retries <n>               Extra fetch attempts per URL (default: 0)

  search <query>              Semantic search over indexed chunks
  pages                       List indexed page URLs
  page <url>                  Print one page reassembled from its chunks
  purge <url>                 Delete every chunk of one page

  mcp                         Start the MCP server on stdio
  help, --help                Show this help message

OPTIONS:
  --timing, -t                Print a timing breakdown when done
  --debug                     Verbose logging

ENVIRONMENT:
  OPENAI_API_KEY              Required for ingest, search and mcp
  SUPABASE_URL                Use the Supabase store (with SUPABASE_SERVICE_KEY)
  MEMORY_STORE_PATH           Chunk file for the local store (default: .confindex/chunks.json)

EXAMPLES:
  confindex ingest https://chi2025.acm.org/ https://uist.acm.org/2025/
  confindex ingest --file conferences.txt --concurrency 3
  confindex search "When is the CHI 2025 paper deadline?"
  confindex page https://chi2025.acm.org/
`;

function needsInference(command: CliCommand): boolean {
    return command.kind === "ingest" || command.kind === "search" || command.kind === "mcp";
}

async function main(): Promise<number> {
    const { command, debug, timing } = parseCliArgs(process.argv.slice(2));

    if (command.kind === "help") {
        console.log(HELP_TEXT);
        return 0;
    }

    loadDotenv();
    const config = loadConfig();
    logger.setLevel(debug ? "debug" : config.logLevel);
    logger.setTimingEnabled(timing);

    const services = await createServices(config, { requireInference: needsInference(command) });

    if (command.kind === "mcp") {
        // Runs until the client closes stdin
        await runStdioServer(services.retrieval);
        return 0;
    }

    try {
        const result = await executeCommand(command, services);
        for (const line of result.lines) console.log(line);
        return result.exitCode;
    } finally {
        if (timing) logger.printTimings();
    }
}

main()
    .then(code => {
        if (code !== 0) process.exitCode = code;
    })
    .catch((error: unknown) => {
        if (error instanceof UsageError) {
            console.error(`${error.message}\nRun 'confindex --help' for usage.`);
            process.exit(2);
        }
        console.error(`Unexpected error: ${errorMessage(error)}`);
        process.exit(1);
    });
