import { describe, expect, test } from "vitest";
import { blockPhase } from "@/block-parser";
import { nodeAt } from "../test-helpers";

describe("blockPhase - Paragraphs", () => {
    test("joins consecutive lines into one paragraph", () => {
        const paragraph = nodeAt(blockPhase("Hello\nWorld").children, 0, "paragraph");
        expect(paragraph.start).toBe(0);
        expect(paragraph.end).toBe(11);
        expect(paragraph.lines).toEqual([
            { start: 0, end: 5 },
            { start: 6, end: 11 },
        ]);
    });

    test("splits paragraphs on blank lines", () => {
        expect(blockPhase("a\n\nb").children.map(child => child.type)).toEqual(["paragraph", "paragraph"]);
    });

    test("starts after leading spaces", () => {
        const paragraph = nodeAt(blockPhase("   a").children, 0, "paragraph");
        expect(paragraph.start).toBe(3);
        expect(paragraph.lines).toEqual([{ start: 3, end: 4 }]);
    });

    test("ends before trailing spaces but keeps them in the line", () => {
        const paragraph = nodeAt(blockPhase("a  ").children, 0, "paragraph");
        expect(paragraph.end).toBe(1);
        expect(paragraph.lines).toEqual([{ start: 0, end: 3 }]);
    });

    test("handles CRLF line endings", () => {
        const paragraph = nodeAt(blockPhase("a\r\nb").children, 0, "paragraph");
        expect(paragraph.end).toBe(4);
        expect(paragraph.lines).toEqual([
            { start: 0, end: 1 },
            { start: 3, end: 4 },
        ]);
    });
});
