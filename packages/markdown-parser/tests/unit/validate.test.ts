import { describe, expect, test } from "vitest";
import type { RangedEvent } from "@/events";
import { parseMarkdown } from "@/parse-markdown";
import { findEventViolations } from "@/validate";

describe("findEventViolations", () => {
    test("accepts the events of a parse", () => {
        const input = "# a\n\n- b *c*";
        expect(findEventViolations(input, parseMarkdown(input).events)).toEqual([]);
    });

    test("reports ranges past the end of the input", () => {
        const events: RangedEvent[] = [{ range: { start: 0, end: 5 }, event: { type: "text" } }];
        expect(findEventViolations("abc", events)).toEqual(["event 0 (text 0..5): range out of bounds for input of length 3"]);
    });

    test("reports ranges that split a surrogate pair", () => {
        const events: RangedEvent[] = [{ range: { start: 1, end: 2 }, event: { type: "text" } }];
        expect(findEventViolations("\u{1F600}", events)).toEqual(["event 0 (text 1..2): range splits a surrogate pair"]);
    });

    test("reports mismatched and unmatched end events", () => {
        const mismatched: RangedEvent[] = [
            { range: { start: 0, end: 1 }, event: { type: "start", tag: { type: "paragraph" } } },
            { range: { start: 0, end: 1 }, event: { type: "end", tag: "emphasis" } },
        ];
        expect(findEventViolations("a", mismatched)).toEqual(["event 1 (end 0..1): end(emphasis) does not match start(paragraph)"]);

        const unmatched: RangedEvent[] = [{ range: { start: 0, end: 0 }, event: { type: "end", tag: "paragraph" } }];
        expect(findEventViolations("a", unmatched)).toEqual(["event 0 (end 0..0): end(paragraph) does not match any open tag"]);
    });

    test("reports unclosed tags", () => {
        const events: RangedEvent[] = [{ range: { start: 0, end: 1 }, event: { type: "start", tag: { type: "paragraph" } } }];
        expect(findEventViolations("a", events)).toEqual(["start(paragraph) is never closed"]);
    });

    test("reports overlapping leaves", () => {
        const events: RangedEvent[] = [
            { range: { start: 0, end: 2 }, event: { type: "text" } },
            { range: { start: 1, end: 3 }, event: { type: "text" } },
        ];
        expect(findEventViolations("abc", events)).toEqual(["event 1 (text 1..3): overlaps the previous leaf ending at 2"]);
    });
});
