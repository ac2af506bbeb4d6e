import { describe, expect, test } from "vitest";
import { blockPhase } from "@/block-parser";
import { nodeAt } from "../test-helpers";

describe("blockPhase - Reference Definitions", () => {
    test("collects a definition under its normalized label", () => {
        const result = blockPhase('[Foo]: /url "title"\n\nText');
        expect(result.refDefinitions.get("foo")).toEqual({ label: "foo", url: "/url", title: "title" });
        expect(result.children.length).toBe(1);
        expect(nodeAt(result.children, 0, "paragraph").lines).toEqual([{ start: 21, end: 25 }]);
    });

    test("keeps the first of two definitions with the same label", () => {
        const result = blockPhase("[a]: /one\n[a]: /two");
        expect(result.refDefinitions.get("a")?.url).toBe("/one");
        expect(result.children).toEqual([]);
    });

    test("only reads definitions at the start of a paragraph", () => {
        const result = blockPhase("Hello\n[a]: /b");
        expect(result.refDefinitions.size).toBe(0);
        expect(nodeAt(result.children, 0, "paragraph").lines.length).toBe(2);
    });

    test("moves the paragraph start past extracted definitions", () => {
        const result = blockPhase("[a]: /b\nText");
        const paragraph = nodeAt(result.children, 0, "paragraph");
        expect(paragraph.start).toBe(8);
        expect(paragraph.lines).toEqual([{ start: 8, end: 12 }]);
    });
});
