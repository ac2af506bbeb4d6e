import { describe, expect, test } from "vitest";
import { borrowed, owned } from "@/source-events";
import { tokenize } from "@/tokenizer";

describe("tokenize", () => {
    test("marks decoded text as owned and source slices as borrowed", () => {
        expect(tokenize("a &amp; b")).toEqual([
            { range: { start: 0, end: 9 }, event: { type: "start", tag: { type: "paragraph" } } },
            { range: { start: 0, end: 2 }, event: { type: "text", text: borrowed(0, 2) } },
            { range: { start: 2, end: 7 }, event: { type: "text", text: owned("&") } },
            { range: { start: 7, end: 9 }, event: { type: "text", text: borrowed(7, 9) } },
            { range: { start: 0, end: 9 }, event: { type: "end", tag: "paragraph" } },
        ]);
    });

    test("merges text that meets in the source", () => {
        expect(tokenize("\\*a")[1]).toEqual({ range: { start: 1, end: 3 }, event: { type: "text", text: borrowed(1, 3) } });
    });

    test("keeps the backticks in a code span's range but not in its content", () => {
        expect(tokenize("`` a ``")[1]).toEqual({
            range: { start: 0, end: 7 },
            event: { type: "code", content: borrowed(3, 4) },
        });
    });

    test("borrows the info string of a fenced code block", () => {
        expect(tokenize("```js\nx\n```")[0]).toEqual({
            range: { start: 0, end: 11 },
            event: { type: "start", tag: { type: "code_block", kind: { type: "fenced", info: borrowed(3, 5) } } },
        });
    });

    test("emits one text event per code block line", () => {
        const events = tokenize("```\na\nb\n```").map(entry => entry.event.type);
        expect(events).toEqual(["start", "text", "text", "end"]);
    });

    test("borrows footnote labels", () => {
        expect(tokenize("a[^1]")[2]).toEqual({
            range: { start: 1, end: 5 },
            event: { type: "footnote_reference", label: borrowed(3, 4) },
        });
    });

    test("emits math events when math is enabled", () => {
        expect(tokenize("$$x$$", { math: true })[1]).toEqual({
            range: { start: 0, end: 5 },
            event: { type: "display_math", content: borrowed(2, 3) },
        });
    });

    test("emits the content of a metadata block as text", () => {
        expect(tokenize("+++\na = 1\n+++")).toEqual([
            { range: { start: 0, end: 13 }, event: { type: "start", tag: { type: "metadata_block", kind: "pluses" } } },
            { range: { start: 4, end: 9 }, event: { type: "text", text: borrowed(4, 9) } },
            { range: { start: 0, end: 13 }, event: { type: "end", tag: "metadata_block" } },
        ]);
    });

    test("emits heading attributes as borrowed strings", () => {
        expect(tokenize("## T {#x .y z}")[0].event).toEqual({
            type: "start",
            tag: { type: "heading", level: 2, id: borrowed(7, 8), classes: [borrowed(10, 11)], attrs: [[borrowed(12, 13), null]] },
        });
    });
});
