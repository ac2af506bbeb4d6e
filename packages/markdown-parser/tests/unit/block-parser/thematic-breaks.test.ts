import { describe, expect, test } from "vitest";
import { blockPhase } from "@/block-parser";

describe("blockPhase - Thematic Breaks", () => {
    test("parses three asterisks", () => {
        expect(blockPhase("***").children).toEqual([{ type: "thematic_break", start: 0, end: 3 }]);
    });

    test("allows spaces between the characters", () => {
        expect(blockPhase(" - - -").children).toEqual([{ type: "thematic_break", start: 1, end: 6 }]);
    });

    test("prefers a thematic break over a list item", () => {
        expect(blockPhase("- - -").children[0].type).toBe("thematic_break");
    });

    test("interrupts a paragraph", () => {
        expect(blockPhase("a\n***").children.map(child => child.type)).toEqual(["paragraph", "thematic_break"]);
    });

    test("underlines a paragraph as a heading when made of hyphens", () => {
        expect(blockPhase("Foo\n---").children.map(child => child.type)).toEqual(["heading"]);
    });
});
