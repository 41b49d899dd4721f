import type { Services } from "./services";
import { readUrlFile, type CliCommand } from "./cli-args";
import type { IngestReport } from "./ingest/orchestrator";
import { UsageError } from "./errors";

export interface CommandResult {
    exitCode: number;
    /** Lines for stdout, printed by the caller */
    lines: string[];
}

export function formatReport(report: IngestReport): string[] {
    const lines = [""];
    for (const page of report.pages) {
        const symbol = page.status === "stored" && page.chunksFailed === 0 ? "✓" : "✗";
        if (page.status === "stored") {
            lines.push(`  ${symbol} ${page.url} (${page.chunksStored}/${page.chunkCount} chunks)`);
        } else {
            lines.push(`  ${symbol} ${page.url} - ${page.error ?? "fetch failed"}`);
        }
    }
    lines.push(
        "",
        `${report.succeeded} page(s) ingested, ${report.failed} failed; ` +
        `${report.chunksStored} chunk(s) stored, ${report.chunksFailed} failed`,
        ""
    );
    return lines;
}

export async function runCommand(command: CliCommand, services: Services): Promise<CommandResult> {
    switch (command.kind) {
        case "ingest": {
            const fromFile = command.file !== undefined ? await readUrlFile(command.file) : [];
            const urls = [...command.urls, ...fromFile];
            if (urls.length === 0) {
                throw new UsageError("ingest requires at least one URL or --file");
            }
            const report = await services.orchestrator.ingest(urls, {
                ...(command.concurrency !== undefined && { maxConcurrentFetches: command.concurrency }),
                ...(command.chunkSize !== undefined && { chunkSize: command.chunkSize }),
                ...(command.retries !== undefined && { fetchRetries: command.retries }),
            });
            // Partial failure is still a successful run
            return { exitCode: report.succeeded > 0 ? 0 : 1, lines: formatReport(report) };
        }

        case "search":
            return { exitCode: 0, lines: [await services.retrieval.searchDocumentation(command.query)] };

        case "pages": {
            const urls = await services.retrieval.listPages();
            return { exitCode: 0, lines: urls.length > 0 ? urls : ["No pages indexed."] };
        }

        case "page":
            return { exitCode: 0, lines: [await services.retrieval.getPage(command.url)] };

        case "purge": {
            const removed = await services.store.deleteByUrl(command.url, { source: services.config.datasetSource });
            return { exitCode: 0, lines: [`Removed ${removed} chunk(s) for ${command.url}`] };
        }

        case "mcp":
        case "help":
            return { exitCode: 0, lines: [] };
    }
}

/**
 * Run a command and close the services. The result is handed back only
 * after close succeeds, so nothing is reported as stored that was not
 * persisted.
 */
export async function executeCommand(command: CliCommand, services: Services): Promise<CommandResult> {
    return runCommand(command, services).finally(() => services.close());
}
