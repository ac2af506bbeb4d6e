import { decodeHTMLStrict } from "entities";
import type { RefDefinition, Span } from "./ast";

/** One input line. `end` excludes the terminator, `next` is where the following line starts. */
export interface Line extends Span {
  next: number;
}

export interface ListMarker {
  ordered: boolean;
  start: number;
  /** Bullet character, or the ordered delimiter (`.` or `)`). */
  marker: string;
  /** Offset of the first marker character. */
  markerStart: number;
  /** Offset just past the marker. */
  markerEnd: number;
  /** Offset where item content starts, after the spaces following the marker. */
  contentStart: number;
  /** Columns from the line position to the item content. */
  contentIndent: number;
  /** True when nothing follows the marker on this line. */
  empty: boolean;
}

export interface HtmlBlockStart {
  endCondition: RegExp | null;
  canInterruptParagraph: boolean;
}

const TAB_STOP = 4;

export const ENTITY_RE = /^&(?:#[xX][0-9a-fA-F]{1,6}|#[0-9]{1,7}|[A-Za-z][A-Za-z0-9]{1,31});/;
const ESCAPABLE_RE = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/;

export function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let start = 0;
  while (start < text.length) {
    let end = start;
    while (end < text.length && text[end] !== "\n" && text[end] !== "\r") end++;
    let next = end;
    if (text[next] === "\r") next++;
    if (text[next] === "\n") next++;
    lines.push({ start, end, next });
    start = next;
  }
  return lines;
}

export function isBlankFrom(text: string, pos: number, end: number): boolean {
  for (let i = pos; i < end; i++) {
    if (text[i] !== " " && text[i] !== "\t") return false;
  }
  return true;
}

/** Columns of leading whitespace at `pos`, and the offset of the first other character. */
export function measureIndent(text: string, pos: number, end: number): { columns: number; offset: number } {
  let columns = 0;
  let offset = pos;
  while (offset < end) {
    if (text[offset] === " ") columns++;
    else if (text[offset] === "\t") columns += TAB_STOP - (columns % TAB_STOP);
    else break;
    offset++;
  }
  return { columns, offset };
}

/** Consumes up to `columns` columns of whitespace. A tab that straddles the limit is consumed whole. */
export function skipColumns(text: string, pos: number, end: number, columns: number): number {
  let consumed = 0;
  let offset = pos;
  while (offset < end && consumed < columns) {
    if (text[offset] === " ") consumed++;
    else if (text[offset] === "\t") consumed += TAB_STOP - (consumed % TAB_STOP);
    else break;
    offset++;
  }
  return offset;
}

export function trimEndOffset(text: string, start: number, end: number): number {
  while (end > start && (text[end - 1] === " " || text[end - 1] === "\t")) end--;
  return end;
}

export function normalizeRefLabel(str: string) {
  return str.trim().toLowerCase().replace(/\s+/g, " ");
}

/** Resolves backslash escapes and character references. */
export function unescapeString(raw: string): string {
  return raw.replace(/\\([!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~])|&(?:#[xX][0-9a-fA-F]{1,6}|#[0-9]{1,7}|[A-Za-z][A-Za-z0-9]{1,31});/g, (match, escaped?: string) => {
    if (escaped !== undefined) return escaped;
    return decodeHTMLStrict(match);
  });
}

export function parseRefDefLine(line: string): RefDefinition | null {
  const re = /^[ ]{0,3}\[((?:[^\]\\]|\\.)+)\]:[ \t]*(?:<([^<>\n]*)>|(\S+))(?:[ \t]+(?:"((?:[^"\\]|\\.)*)"|'((?:[^'\\]|\\.)*)'|\(((?:[^()\\]|\\.)*)\)))?[ \t]*$/;
  const m = line.match(re);
  if (!m) return null;
  const label = m[1];
  if (label.trim() === "" || label.startsWith("^")) return null;
  const url = unescapeString(m[2] ?? m[3] ?? "");
  const rawTitle = m[4] ?? m[5] ?? m[6];
  return { label, url, title: rawTitle === undefined ? "" : unescapeString(rawTitle) };
}

const BLOCK_TAG_NAMES =
  "address|article|aside|base|basefont|blockquote|body|caption|center|col|colgroup|dd|details|dialog|dir|div|dl|dt|fieldset|figcaption|figure|footer|form|frame|frameset|h1|h2|h3|h4|h5|h6|head|header|hr|html|iframe|legend|li|link|main|menu|menuitem|nav|noframes|ol|optgroup|option|p|param|search|section|summary|table|tbody|td|tfoot|th|thead|title|tr|track|ul";

export function tryHtmlBlockOpen(rest: string): HtmlBlockStart | null {
  if (/^<(script|pre|style|textarea)(?:[\s>]|$)/i.test(rest)) {
    return { endCondition: /<\/(script|pre|style|textarea)>/i, canInterruptParagraph: true };
  }
  if (rest.startsWith("<!--")) return { endCondition: /-->/, canInterruptParagraph: true };
  if (rest.startsWith("<?")) return { endCondition: /\?>/, canInterruptParagraph: true };
  if (/^<![A-Za-z]/.test(rest)) return { endCondition: />/, canInterruptParagraph: true };
  if (rest.startsWith("<![CDATA[")) return { endCondition: /\]\]>/, canInterruptParagraph: true };
  if (new RegExp(`^</?(?:${BLOCK_TAG_NAMES})(?:[\\s/>]|$)`, "i").test(rest)) {
    return { endCondition: null, canInterruptParagraph: true };
  }
  if (/^(?:<[A-Za-z][A-Za-z0-9-]*(?:\s+[A-Za-z_:][\w.:-]*(?:\s*=\s*(?:[^\s"'=<>`]+|'[^']*'|"[^"]*"))?)*\s*\/?>|<\/[A-Za-z][A-Za-z0-9-]*\s*>)[ \t]*$/.test(rest)) {
    return { endCondition: null, canInterruptParagraph: false };
  }
  return null;
}

export function parseListMarker(text: string, pos: number, end: number): ListMarker | null {
  const { columns: leading, offset: markerStart } = measureIndent(text, pos, end);
  if (leading > 3) return null;

  let ordered = false;
  let start = 1;
  let marker: string;
  let markerEnd: number;
  const first = text[markerStart];
  if (first === "-" || first === "+" || first === "*") {
    marker = first;
    markerEnd = markerStart + 1;
  } else {
    const m = text.slice(markerStart, Math.min(end, markerStart + 10)).match(/^(\d{1,9})([.)])/);
    if (!m) return null;
    ordered = true;
    start = parseInt(m[1], 10);
    marker = m[2];
    markerEnd = markerStart + m[0].length;
  }

  if (markerEnd < end && text[markerEnd] !== " " && text[markerEnd] !== "\t") return null;

  const after = measureIndent(text, markerEnd, end);
  const markerWidth = leading + (markerEnd - markerStart);
  const empty = after.offset >= end;
  let contentStart = after.offset;
  let contentIndent = markerWidth + after.columns;
  if (empty) {
    contentStart = end;
    contentIndent = markerWidth + 1;
  } else if (after.columns > 4) {
    // five or more spaces: the content is indented code, only one space belongs to the marker
    contentStart = markerEnd + 1;
    contentIndent = markerWidth + 1;
  }
  return { ordered, start, marker, markerStart, markerEnd, contentStart, contentIndent, empty };
}

export function isThematicBreakLine(rest: string): boolean {
  const t = rest.replace(/[ \t]+/g, "");
  return /^(?:\*{3,}|-{3,}|_{3,})$/.test(t);
}

export function isEscapable(ch: string | undefined): boolean {
  return ch !== undefined && ESCAPABLE_RE.test(ch);
}
