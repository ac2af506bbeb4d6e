import LinkifyIt from "linkify-it";
import type { ByteRange, RangedEvent } from "./events";

// Scheme-qualified URLs only: no bare domains, emails, IPs or protocol-relative links.
const linkify = new LinkifyIt()
  .set({ fuzzyLink: false, fuzzyEmail: false, fuzzyIP: false })
  .add("mailto:", null)
  .add("//", null);

const SCHEME_RE = /([A-Za-z][A-Za-z0-9+.-]*):\/\//g;
// after `scheme:`; must not end on trailing punctuation
const GENERIC_TAIL_RE = /^\/\/[^\s<>"]*[^\s<>"'.,:;!?)\]}]/;

const knownSchemes = new Set(["http", "https", "ftp", "mailto"]);

function validateGenericTail(text: string, pos: number): number {
  const tail = text.slice(pos).match(GENERIC_TAIL_RE);
  return tail ? tail[0].length : 0;
}

/**
 * linkify-it only matches schemes it knows by name, so every other
 * `scheme://` in `text` is registered before matching. Registration depends
 * only on the scheme, so results do not depend on earlier calls.
 */
function registerSchemes(text: string) {
  for (const [, name] of text.matchAll(SCHEME_RE)) {
    const scheme = name.toLowerCase();
    if (knownSchemes.has(scheme)) continue;
    knownSchemes.add(scheme);
    linkify.add(`${scheme}:`, { validate: validateGenericTail });
  }
}

/** Absolute spans of bare URLs in `text`, which starts at `offset` in the source. */
export function findLinks(text: string, offset: number): ByteRange[] {
  registerSchemes(text);
  const matches = linkify.match(text);
  if (!matches) return [];
  const spans: ByteRange[] = [];
  let cursor = 0;
  for (const match of matches) {
    if (match.index < cursor) continue;
    spans.push({ start: offset + match.index, end: offset + match.lastIndex });
    cursor = match.lastIndex;
  }
  return spans;
}

/**
 * Events for one plain-text range: text gaps around an autolink for each bare
 * URL found in it. Empty gaps produce no event.
 */
export function autolinkEvents(source: string, range: ByteRange): RangedEvent[] {
  const events: RangedEvent[] = [];
  let cursor = range.start;
  for (const link of findLinks(source.slice(range.start, range.end), range.start)) {
    if (link.start > cursor) {
      events.push({ range: { start: cursor, end: link.start }, event: { type: "text" } });
    }
    events.push(
      {
        range: link,
        event: {
          type: "start",
          tag: { type: "link", linkType: "autolink", destUrl: source.slice(link.start, link.end), title: "", id: "" },
        },
      },
      { range: { ...link }, event: { type: "text" } },
      { range: { ...link }, event: { type: "end", tag: "link" } },
    );
    cursor = link.end;
  }
  if (range.end > cursor) {
    events.push({ range: { start: cursor, end: range.end }, event: { type: "text" } });
  }
  return events;
}

/** Autolinks bare URLs in `text` without any markdown parsing. */
export function parseLinksOnly(text: string): RangedEvent[] {
  return autolinkEvents(text, { start: 0, end: text.length });
}
