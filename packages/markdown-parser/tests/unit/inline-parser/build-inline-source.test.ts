import { describe, expect, test } from "vitest";
import { buildInlineSource, isContiguous, toSourceSpan } from "@/inline-parser";

describe("buildInlineSource", () => {
    const source = "ab  \r\ncd  ";
    const src = buildInlineSource(source, [
        { start: 0, end: 4 },
        { start: 6, end: 10 },
    ]);

    test("joins segments with a newline and trims the last one", () => {
        expect(src.virtual).toBe("ab  \ncd");
    });

    test("maps each virtual character to its source offsets", () => {
        expect(src.startAt).toEqual([0, 1, 2, 3, 4, 6, 7]);
        expect(src.endAfter).toEqual([1, 2, 3, 4, 6, 7, 8]);
    });

    test("maps the joining newline onto the whole line terminator", () => {
        expect(toSourceSpan(src, 4, 5)).toEqual({ start: 4, end: 6 });
    });

    test("maps an empty range at the end to the end of the content", () => {
        expect(toSourceSpan(src, 7, 7)).toEqual({ start: 8, end: 8 });
    });

    test("reports whether a range crosses a line", () => {
        expect(isContiguous(src, 0, 4)).toBe(true);
        expect(isContiguous(src, 3, 6)).toBe(false);
    });
});
