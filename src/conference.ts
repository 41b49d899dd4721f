/**
 * Answer shape for the conference question-answering agent. The agent
 * builds these from retrieved chunks; ingestion never writes them.
 */

import { z } from "zod";

const IsoDate = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .refine(isCalendarDate, "not a calendar date");

// Date.parse rolls 2025-02-30 over to March, so compare the round trip
function isCalendarDate(value: string): boolean {
    const time = Date.parse(`${value}T00:00:00Z`);
    return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

export const ConferenceRecordSchema = z.object({
    title: z.string().min(1),
    dates: z.object({
        start: IsoDate.nullable(),
        end: IsoDate.nullable(),
    }),
    location: z.string().min(1).nullable(),
    description: z.string(),
});

export type ConferenceRecord = z.infer<typeof ConferenceRecordSchema>;

export const ConferenceRecordListSchema = z.array(ConferenceRecordSchema);

/**
 * Instructions handed to the agent (served as the MCP prompt
 * `extract_conferences`).
 */
export const CONFERENCE_EXTRACTION_PROMPT = `You extract structured data about upcoming academic conferences from the indexed conference pages.
Only help with this task; for anything else, describe what you can do.

Return a JSON array. Each entry describes one conference with these keys:
- "title": full name of the conference, including its year
- "dates": {"start": "YYYY-MM-DD", "end": "YYYY-MM-DD"}; use null for a date the pages do not give
- "location": city and country of the venue, or null if not stated
- "description": a short summary of the conference's focus and themes

Work from the documentation tools, not from memory:
1. Start with retrieve_relevant_documentation for the user's question.
2. Use list_conferences to see which pages are indexed and get_page_content to read one in full.
3. If the pages do not contain the answer, say so plainly instead of guessing.
Do not ask before using a tool.

Example:
[
    {
        "title": "Example Symposium on Interactive Systems 2026",
        "dates": { "start": "2026-05-11", "end": "2026-05-14" },
        "location": "Lisbon, Portugal",
        "description": "A single-track symposium on the design and evaluation of interactive systems."
    }
]`;

/**
 * Validate an agent's JSON answer against the record schema
 *
 * @throws {z.ZodError} when the answer does not match
 * @throws {SyntaxError} when the answer is not JSON
 */
export function parseConferenceRecords(json: string): ConferenceRecord[] {
    return ConferenceRecordListSchema.parse(JSON.parse(json));
}
