import { describe, expect, test } from "vitest";
import { dashSubstitutions, dashWidth, smartQuote } from "@/inline-parser/smart-punctuation";

describe("dashSubstitutions", () => {
    test("turns two hyphens into an en dash and three into an em dash", () => {
        expect(dashSubstitutions(2)).toEqual(["–"]);
        expect(dashSubstitutions(3)).toEqual(["—"]);
    });

    test("uses only em dashes for multiples of three", () => {
        expect(dashSubstitutions(6)).toEqual(["—", "—"]);
    });

    test("uses only en dashes for other even runs", () => {
        expect(dashSubstitutions(4)).toEqual(["–", "–"]);
    });

    test("puts em dashes before en dashes in mixed runs", () => {
        expect(dashSubstitutions(5)).toEqual(["—", "–"]);
        expect(dashSubstitutions(7)).toEqual(["—", "–", "–"]);
    });

    test("covers every hyphen of the run", () => {
        const widths = dashSubstitutions(11).map(dashWidth);
        expect(widths.reduce((sum, width) => sum + width, 0)).toBe(11);
    });
});

describe("smartQuote", () => {
    test("opens a quote that can only open", () => {
        expect(smartQuote("'", true, false)).toBe("‘");
        expect(smartQuote('"', true, false)).toBe("“");
    });

    test("closes a quote inside a word", () => {
        expect(smartQuote("'", true, true)).toBe("’");
        expect(smartQuote('"', true, true)).toBe("”");
    });

    test("closes a quote that can only close", () => {
        expect(smartQuote('"', false, true)).toBe("”");
    });
});
