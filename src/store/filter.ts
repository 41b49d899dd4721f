import type { ChunkFilter, ChunkMetadata } from "../types";
import { UsageError } from "../errors";

/**
 * Reject filters that would silently match everything or nothing useful
 *
 * @throws {UsageError}
 */
export function validateFilter(filter: ChunkFilter): ChunkFilter {
    if (filter.source.trim().length === 0) {
        throw new UsageError("Filter requires a non-empty source");
    }
    for (const [field, value] of Object.entries(filter)) {
        if (field.trim().length === 0) {
            throw new UsageError("Filter field names must be non-empty");
        }
        if (typeof value !== "string") {
            throw new UsageError(`Filter value for ${field} must be a string`);
        }
    }
    return filter;
}

/**
 * Equality-AND over metadata fields. Non-string metadata values compare by
 * their string form, matching how the database reads `metadata->>field`.
 */
export function matchesFilter(metadata: ChunkMetadata, filter: ChunkFilter): boolean {
    return Object.entries(filter).every(([field, expected]) => {
        const actual = metadata[field];
        if (actual === undefined || actual === null) return false;
        return String(actual) === expected;
    });
}
