import { describe, expect, test } from "vitest";
import { DEFAULT_PARSE_OPTIONS, resolveParseOptions } from "@/options";

describe("resolveParseOptions", () => {
    test("fills every option from the defaults", () => {
        expect(resolveParseOptions()).toEqual(DEFAULT_PARSE_OPTIONS);
    });

    test("keeps explicit values, including false and zero", () => {
        const resolved = resolveParseOptions({ tables: false, math: true, substitutionLengthThreshold: 0 });
        expect(resolved.tables).toBe(false);
        expect(resolved.math).toBe(true);
        expect(resolved.substitutionLengthThreshold).toBe(0);
        expect(resolved.footnotes).toBe(true);
    });
});
