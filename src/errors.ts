/**
 * Raised for structural problems with a request or configuration:
 * nothing to ingest, an empty filter, an unparsable environment.
 * No partial work is attempted when this is thrown.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

/** A storage backend reported a failed call. */
export class StoreError extends Error {
    readonly operation: string;

    constructor(operation: string, message: string) {
        super(`${operation} failed: ${message}`);
        this.name = "StoreError";
        this.operation = operation;
    }
}

/** Render an unknown thrown value as a single-line message */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    return "Unknown error";
}
