import { describe, expect, test } from "vitest";
import { autolinkEvents, findLinks, parseLinksOnly } from "@/autolink-scanner";
import { describeEvents } from "./test-helpers";

describe("findLinks", () => {
    test("returns absolute spans", () => {
        expect(findLinks("x https://a.b", 10)).toEqual([{ start: 12, end: 23 }]);
    });

    test("ignores bare domains, emails and protocol-relative links", () => {
        expect(findLinks("see example.com or a@b.co and //c.d", 0)).toEqual([]);
    });

    test("links URLs of any scheme followed by ://", () => {
        expect(findLinks("see file:///etc/hosts and ssh://host", 0)).toEqual([
            { start: 4, end: 21 },
            { start: 26, end: 36 },
        ]);
    });

    test("drops trailing punctuation from URLs of other schemes", () => {
        expect(findLinks("open zed://settings.", 0)).toEqual([{ start: 5, end: 19 }]);
        expect(findLinks("(ssh://host)", 0)).toEqual([{ start: 1, end: 11 }]);
    });

    test("does not link a scheme with nothing after it", () => {
        expect(findLinks("ssh:// alone", 0)).toEqual([]);
    });

    test("counts offsets in string indices", () => {
        expect(findLinks("\u00e9 https://a.b \u00fc", 0)).toEqual([{ start: 2, end: 13 }]);
        expect(findLinks("\u{1F600} https://a.b", 0)).toEqual([{ start: 3, end: 14 }]);
    });

    test("ignores mailto links", () => {
        expect(findLinks("mailto:a@b.co", 0)).toEqual([]);
    });
});

describe("parseLinksOnly", () => {
    test("links every URL in the text", () => {
        const input = "see https://a.b and http://c.d/e";
        expect(describeEvents(input, parseLinksOnly(input))).toEqual([
            'text 0..4 "see "',
            "start(link) 4..15",
            'text 4..15 "https://a.b"',
            "end(link) 4..15",
            'text 15..20 " and "',
            "start(link) 20..32",
            'text 20..32 "http://c.d/e"',
            "end(link) 20..32",
        ]);
    });

    test("links other schemes without markdown parsing", () => {
        const input = "a ssh://host *b*";
        expect(describeEvents(input, parseLinksOnly(input))).toEqual([
            'text 0..2 "a "',
            "start(link) 2..12",
            'text 2..12 "ssh://host"',
            "end(link) 2..12",
            'text 12..16 " *b*"',
        ]);
    });

    test("returns a single text event when there is nothing to link", () => {
        expect(parseLinksOnly("no links here")).toEqual([{ range: { start: 0, end: 13 }, event: { type: "text" } }]);
    });

    test("returns nothing for empty text", () => {
        expect(parseLinksOnly("")).toEqual([]);
    });
});

describe("autolinkEvents", () => {
    test("scans only the given range", () => {
        const source = "https://a.b x https://c.d";
        expect(describeEvents(source, autolinkEvents(source, { start: 11, end: 14 }))).toEqual(['text 11..14 " x "']);
    });

    test("is stable when run again over its own text events", () => {
        const source = "go to https://a.b now";
        const first = autolinkEvents(source, { start: 0, end: source.length });
        let inLink = false;
        const again = first.flatMap(entry => {
            if (entry.event.type === "start") inLink = true;
            if (entry.event.type === "end") inLink = false;
            return entry.event.type === "text" && !inLink ? autolinkEvents(source, entry.range) : [entry];
        });
        expect(again).toEqual(first);
    });
});
