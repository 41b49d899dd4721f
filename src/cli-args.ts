import fs from "node:fs/promises";
import { UsageError } from "./errors";

export type CliCommand =
    | { kind: "ingest"; urls: string[]; file?: string; concurrency?: number; chunkSize?: number; retries?: number }
    | { kind: "search"; query: string }
    | { kind: "pages" }
    | { kind: "page"; url: string }
    | { kind: "purge"; url: string }
    | { kind: "mcp" }
    | { kind: "help" };

export interface CliArgs {
    command: CliCommand;
    debug: boolean;
    timing: boolean;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
    if (value === undefined) {
        throw new UsageError(`${flag} requires a value`);
    }
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
    }
    return n;
}

function parseNonNegativeInt(flag: string, value: string | undefined): number {
    if (value === "0") return 0;
    return parsePositiveInt(flag, value);
}

function requireOne(command: string, positionals: string[], what: string): string {
    const [value, ...rest] = positionals;
    if (value === undefined || rest.length > 0) {
        throw new UsageError(`${command} takes exactly one ${what}`);
    }
    return value;
}

/**
 * Parse argv (without the node and script entries)
 *
 * @throws {UsageError} for unknown commands, unknown flags and bad values
 */
export function parseCliArgs(argv: string[]): CliArgs {
    // pnpm/npm pass a standalone "--" through
    const args = argv.filter(a => a !== "--");
    const [name, ...rest] = args;

    let debug = false;
    let timing = false;
    let file: string | undefined;
    let concurrency: number | undefined;
    let chunkSize: number | undefined;
    let retries: number | undefined;
    const positionals: string[] = [];

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i] ?? "";
        const nextArg = rest[i + 1];

        if (arg === "--debug") {
            debug = true;
        } else if (arg === "--timing" || arg === "-t") {
            timing = true;
        } else if (arg === "--file" || arg === "-f") {
            if (nextArg === undefined) throw new UsageError(`${arg} requires a path`);
            file = nextArg;
            i++;
        } else if (arg === "--concurrency" || arg === "-c") {
            concurrency = parsePositiveInt(arg, nextArg);
            i++;
        } else if (arg === "--chunk-size") {
            chunkSize = parsePositiveInt(arg, nextArg);
            i++;
        } else if (arg === "--retries") {
            retries = parseNonNegativeInt(arg, nextArg);
            i++;
        } else if (arg.startsWith("-") && arg.length > 1) {
            throw new UsageError(`Unknown option: ${arg}`);
        } else {
            positionals.push(arg);
        }
    }

    let command: CliCommand;
    switch (name) {
        case "ingest":
            command = {
                kind: "ingest",
                urls: positionals,
                ...(file !== undefined && { file }),
                ...(concurrency !== undefined && { concurrency }),
                ...(chunkSize !== undefined && { chunkSize }),
                ...(retries !== undefined && { retries }),
            };
            break;
        case "search":
            if (positionals.length === 0) throw new UsageError("search requires a query");
            command = { kind: "search", query: positionals.join(" ") };
            break;
        case "pages":
            command = { kind: "pages" };
            break;
        case "page":
            command = { kind: "page", url: requireOne("page", positionals, "URL") };
            break;
        case "purge":
            command = { kind: "purge", url: requireOne("purge", positionals, "URL") };
            break;
        case "mcp":
            command = { kind: "mcp" };
            break;
        case undefined:
        case "help":
        case "--help":
        case "-h":
            command = { kind: "help" };
            break;
        default:
            throw new UsageError(`Unknown command: ${name}`);
    }

    return { command, debug, timing };
}

/**
 * URLs from a list file: one per line, blank lines and # comments skipped
 */
export function parseUrlList(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith("#"));
}

export async function readUrlFile(filePath: string): Promise<string[]> {
    try {
        return parseUrlList(await fs.readFile(filePath, "utf8"));
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            throw new UsageError(`URL file not found: ${filePath}`);
        }
        throw error;
    }
}
