import type { MarkdownEvent, MarkdownTagKind, RangedEvent } from "./events";

const LEAF_EVENTS = new Set<MarkdownEvent["type"]>(["text", "substituted_text", "code", "html", "inline_html"]);

function splitsSurrogatePair(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) return false;
  const before = text.charCodeAt(offset - 1);
  const after = text.charCodeAt(offset);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/**
 * Checks an event list against the guarantees `parseMarkdown` makes about it:
 * ranges in bounds and on character boundaries, start/end pairs balanced, and
 * leaf ranges in order without overlap. Returns one message per violation.
 */
export function findEventViolations(text: string, events: RangedEvent[]): string[] {
  const violations: string[] = [];
  const open: MarkdownTagKind[] = [];
  let leafEnd = 0;

  events.forEach(({ range, event }, idx) => {
    const where = `event ${idx} (${event.type} ${range.start}..${range.end})`;
    if (range.start < 0 || range.start > range.end || range.end > text.length) {
      violations.push(`${where}: range out of bounds for input of length ${text.length}`);
    }
    if (splitsSurrogatePair(text, range.start) || splitsSurrogatePair(text, range.end)) {
      violations.push(`${where}: range splits a surrogate pair`);
    }

    if (event.type === "start") {
      open.push(event.tag.type);
    } else if (event.type === "end") {
      const expected = open.pop();
      if (expected !== event.tag) {
        violations.push(`${where}: end(${event.tag}) does not match ${expected ? `start(${expected})` : "any open tag"}`);
      }
    } else if (LEAF_EVENTS.has(event.type)) {
      if (range.start < leafEnd) {
        violations.push(`${where}: overlaps the previous leaf ending at ${leafEnd}`);
      }
      leafEnd = Math.max(leafEnd, range.end);
    }
  });

  for (const tag of open) {
    violations.push(`start(${tag}) is never closed`);
  }
  return violations;
}
