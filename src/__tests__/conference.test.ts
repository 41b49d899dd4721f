import { describe, it, expect } from "vitest";
import { ConferenceRecordSchema, parseConferenceRecords } from "../conference";

const record = {
    title: "Example Symposium 2026",
    dates: { start: "2026-05-11", end: "2026-05-14" },
    location: "Lisbon, Portugal",
    description: "Interactive systems.",
};

describe("ConferenceRecordSchema", () => {
    it("accepts a complete record", () => {
        expect(ConferenceRecordSchema.parse(record)).toEqual(record);
    });

    it("accepts unknown dates and location", () => {
        const partial = { ...record, dates: { start: null, end: null }, location: null };

        expect(ConferenceRecordSchema.safeParse(partial).success).toBe(true);
    });

    it("rejects dates that are not YYYY-MM-DD", () => {
        const bad = { ...record, dates: { start: "May 11, 2026", end: null } };

        expect(ConferenceRecordSchema.safeParse(bad).success).toBe(false);
    });

    it("rejects a day the month does not have", () => {
        const bad = { ...record, dates: { start: "2026-02-30", end: null } };

        expect(ConferenceRecordSchema.safeParse(bad).success).toBe(false);
    });

    it("rejects a record without a title", () => {
        expect(ConferenceRecordSchema.safeParse({ ...record, title: "" }).success).toBe(false);
    });
});

describe("parseConferenceRecords", () => {
    it("parses an agent's JSON answer", () => {
        expect(parseConferenceRecords(JSON.stringify([record]))).toEqual([record]);
    });

    it("throws on text that is not JSON", () => {
        expect(() => parseConferenceRecords("Here are the conferences:")).toThrow(SyntaxError);
    });
});
