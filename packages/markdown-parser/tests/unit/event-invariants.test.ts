import { describe, expect, test } from "vitest";
import { parseMarkdown } from "@/parse-markdown";
import { findEventViolations } from "@/validate";

const documents: Record<string, string> = {
    headings: "# One\n\nTwo\n===\n\n### Three {#t .x}\n",
    lists: "- a\n- [x] b\n  - c\n\n1. d\n\n   e\n",
    quotes: "> a\n> > b\nlazy\n",
    code: "```ts\nconst x = 1;\n```\n\n    indented\n\n`inline` and ``double``\n",
    links: "[a](/b) ![c](d.png) <https://e.f> [ref]\n\n[ref]: /r \"T\"\n",
    autolinks: "visit https://example.test/path, then http://x.y\n",
    substitutions: "\"quoted\" -- it's... &copy; &#x1F600; \\*\n",
    emoji: "\u{1F600} *\u{1F601}* **\u{1F602}**\n",
    tables: "| a | b |\n|:-|-:|\n| \u{1F600} | *x* |\n",
    footnotes: "Text[^n].\n\n[^n]: Note.\n",
    html: "<div>\n*x*\n</div>\n\na <span>b</span> c\n",
    metadata: "+++\nkey = 1\n+++\n# After\n",
    breaks: "a  \nb\\\nc\nd\r\ne\r\n",
    crossed: "~~gone~~ and *nested **strong***\n",
    empty: "",
};

describe("parseMarkdown event invariants", () => {
    for (const [name, input] of Object.entries(documents)) {
        test(`holds for ${name}`, () => {
            expect(findEventViolations(input, parseMarkdown(input).events)).toEqual([]);
        });
    }

    test("holds with every extension toggled off", () => {
        const options = {
            tables: false,
            footnotes: false,
            strikethrough: false,
            tasklists: false,
            smartPunctuation: false,
            headingAttributes: false,
            plusesMetadataBlocks: false,
        };
        for (const input of Object.values(documents)) {
            expect(findEventViolations(input, parseMarkdown(input, options).events)).toEqual([]);
        }
    });

    test("holds with math and yaml metadata on", () => {
        const input = "---\ntitle: t\n---\n\n$a$ and $$b$$\n";
        expect(findEventViolations(input, parseMarkdown(input, { math: true, yamlMetadataBlocks: true }).events)).toEqual([]);
    });
});
