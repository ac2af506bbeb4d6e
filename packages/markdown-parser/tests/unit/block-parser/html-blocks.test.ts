import { describe, expect, test } from "vitest";
import { blockPhase } from "@/block-parser";
import { nodeAt } from "../test-helpers";

describe("blockPhase - HTML Blocks", () => {
    test("keeps every line of a block-level tag until a blank line", () => {
        const html = nodeAt(blockPhase("<div>\nhi\n</div>").children, 0, "html_block");
        expect(html.lines).toEqual([
            { start: 0, end: 6 },
            { start: 6, end: 9 },
            { start: 9, end: 15 },
        ]);
        expect(html.end).toBe(15);
        expect(html.endCondition).toBeNull();
    });

    test("ends a block-level tag at a blank line", () => {
        const result = blockPhase("<div>\n\nx");
        expect(result.children.map(child => child.type)).toEqual(["html_block", "paragraph"]);
    });

    test("closes a comment on its opening line", () => {
        const result = blockPhase("<!-- a -->\nb");
        expect(nodeAt(result.children, 0, "html_block").lines).toEqual([{ start: 0, end: 11 }]);
        expect(nodeAt(result.children, 1, "paragraph").lines).toEqual([{ start: 11, end: 12 }]);
    });

    test("runs a comment until its end marker", () => {
        const result = blockPhase("<!--\nx\n-->\ny");
        const html = nodeAt(result.children, 0, "html_block");
        expect(html.lines).toEqual([
            { start: 0, end: 5 },
            { start: 5, end: 7 },
            { start: 7, end: 11 },
        ]);
        expect(html.end).toBe(10);
        expect(result.children[1].type).toBe("paragraph");
    });

    test("does not let an arbitrary tag interrupt a paragraph", () => {
        const paragraph = nodeAt(blockPhase("a\n<span>").children, 0, "paragraph");
        expect(paragraph.lines.length).toBe(2);
    });
});
