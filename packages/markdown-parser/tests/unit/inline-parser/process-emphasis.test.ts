import { describe, expect, test } from "vitest";
import type { InlineNode, TextNode } from "@/ast";
import { processEmphasis } from "@/inline-parser/parse-inlines-with-delimiter-stack";

const textNode = (start: number, end: number): TextNode => ({ type: "text", start, end, replacement: null });

function delimiter(node: TextNode, canOpen: boolean, canClose: boolean) {
    const count = node.end - node.start;
    return { node, char: "*" as const, count, origCount: count, canOpen, canClose };
}

describe("processEmphasis", () => {
    test("handles single asterisk emphasis", () => {
        const opener = textNode(6, 7);
        const closer = textNode(12, 13);
        const nodes: InlineNode[] = [textNode(0, 6), opener, textNode(7, 12), closer];
        const delims = [delimiter(opener, true, false), delimiter(closer, false, true)];
        processEmphasis(nodes, delims, 0);
        expect(nodes).toEqual([
            textNode(0, 6),
            { type: "emphasis", start: 6, end: 13, children: [textNode(7, 12)] },
        ]);
        expect(delims).toEqual([]);
    });

    test("handles double asterisk strong emphasis", () => {
        const opener = textNode(0, 2);
        const closer = textNode(3, 5);
        const nodes: InlineNode[] = [opener, textNode(2, 3), closer];
        processEmphasis(nodes, [delimiter(opener, true, false), delimiter(closer, false, true)], 0);
        expect(nodes).toEqual([{ type: "strong", start: 0, end: 5, children: [textNode(2, 3)] }]);
    });

    test("nests emphasis inside strong for a triple run", () => {
        const opener = textNode(0, 3);
        const closer = textNode(4, 7);
        const nodes: InlineNode[] = [opener, textNode(3, 4), closer];
        processEmphasis(nodes, [delimiter(opener, true, false), delimiter(closer, false, true)], 0);
        expect(nodes).toEqual([
            {
                type: "emphasis",
                start: 0,
                end: 7,
                children: [{ type: "strong", start: 1, end: 6, children: [textNode(3, 4)] }],
            },
        ]);
    });

    test("drops a closer with no opener when it cannot open", () => {
        const closer = textNode(1, 2);
        const nodes: InlineNode[] = [textNode(0, 1), closer];
        const delims = [delimiter(closer, false, true)];
        processEmphasis(nodes, delims, 0);
        expect(nodes).toEqual([textNode(0, 1), textNode(1, 2)]);
        expect(delims).toEqual([]);
    });

    test("ignores delimiters below the bottom", () => {
        const opener = textNode(0, 1);
        const closer = textNode(2, 3);
        const nodes: InlineNode[] = [opener, textNode(1, 2), closer];
        const delims = [delimiter(opener, true, false), delimiter(closer, false, true)];
        processEmphasis(nodes, delims, 1);
        expect(nodes).toEqual([textNode(0, 1), textNode(1, 2), textNode(2, 3)]);
        expect(delims.length).toBe(1);
    });
});
