import { decodeHTMLStrict } from "entities";
import type { DocumentNode, InlineNode, OpenBlock, RefDefinition, Span } from "./ast";
import type { DebugTrace } from "./debug";
import {
  isLeftFlanking,
  isPunctuation,
  isRightFlanking,
  parseInlinesWithDelimiterStack,
} from "./inline-parser/parse-inlines-with-delimiter-stack";
import { ELLIPSIS, dashSubstitutions, dashWidth, smartQuote } from "./inline-parser/smart-punctuation";
import type { ResolvedParseOptions } from "./options";
import { ENTITY_RE, isEscapable, trimEndOffset } from "./parser-helpers";

/**
 * The content of one inline container: its line segments joined with `\n`.
 * `startAt[i]` and `endAfter[i]` give the source offsets covered by virtual
 * character `i`; a joining newline covers the line terminator it stands for.
 */
export interface InlineSource {
  source: string;
  virtual: string;
  startAt: number[];
  endAfter: number[];
}

/** Lexer output. Offsets are into the virtual string. */
export type InlineToken =
  | { type: "text"; start: number; end: number; replacement: string | null }
  | { type: "delim"; char: "*" | "_" | "~"; start: number; end: number; canOpen: boolean; canClose: boolean }
  | { type: "code_span"; start: number; end: number; contentStart: number; contentEnd: number }
  | { type: "raw_html"; start: number; end: number }
  | { type: "autolink"; start: number; end: number; email: boolean }
  | { type: "lbracket"; start: number; end: number; image: boolean }
  | { type: "rbracket"; start: number; end: number }
  | { type: "softbreak"; start: number; end: number }
  | { type: "br"; start: number; end: number }
  | { type: "footnote_ref"; start: number; end: number }
  | { type: "math"; start: number; end: number; display: boolean; contentStart: number; contentEnd: number };

export function buildInlineSource(source: string, segments: Span[]): InlineSource {
  const parts: string[] = [];
  const startAt: number[] = [];
  const endAfter: number[] = [];
  segments.forEach((segment, idx) => {
    const last = idx === segments.length - 1;
    const end = last ? trimEndOffset(source, segment.start, segment.end) : segment.end;
    parts.push(source.slice(segment.start, end));
    for (let p = segment.start; p < end; p++) {
      startAt.push(p);
      endAfter.push(p + 1);
    }
    if (!last) {
      parts.push("\n");
      startAt.push(segment.end);
      endAfter.push(segment.end + terminatorLength(source, segment.end));
    }
  });
  return { source, virtual: parts.join(""), startAt, endAfter };
}

function terminatorLength(source: string, pos: number): number {
  if (source[pos] === "\r" && source[pos + 1] === "\n") return 2;
  return source[pos] === "\r" || source[pos] === "\n" ? 1 : 0;
}

/** Source span of the virtual range `[start, end)`. */
export function toSourceSpan(src: InlineSource, start: number, end: number): Span {
  let from: number;
  if (start < src.startAt.length) from = src.startAt[start];
  else from = src.endAfter.length > 0 ? src.endAfter[src.endAfter.length - 1] : 0;
  const to = end > start ? src.endAfter[end - 1] : from;
  return { start: from, end: to };
}

/** True when the virtual range `[start, end)` maps onto one contiguous source slice. */
export function isContiguous(src: InlineSource, start: number, end: number): boolean {
  for (let i = start; i < end; i++) {
    if (src.virtual[i] === "\n") return false;
  }
  return true;
}

export function walkBlockTreeAndParseInlines(
  root: DocumentNode,
  source: string,
  options: ResolvedParseOptions,
  trace: DebugTrace,
) {
  const refMap = root.refDefinitions;
  function recurse(node: OpenBlock) {
    switch (node.type) {
      case "document":
      case "blockquote":
      case "list":
      case "list_item":
      case "footnote_definition":
        for (const child of node.children) {
          recurse(child);
        }
        break;
      case "paragraph":
      case "heading":
        node.children = parseInlineSegments(source, node.lines, refMap, options, trace);
        break;
      case "table":
        for (const row of [node.head, ...node.rows]) {
          for (const cell of row.cells) {
            cell.children = parseInlineSegments(source, [cell], refMap, options, trace);
          }
        }
        break;
      default:
        break;
    }
  }
  for (const child of root.children) {
    trace.log(`Inline parsing for node type: ${child.type}`);
    recurse(child);
  }
}

export function parseInlineSegments(
  source: string,
  segments: Span[],
  refMap: Map<string, RefDefinition>,
  options: ResolvedParseOptions,
  trace: DebugTrace,
): InlineNode[] {
  if (segments.length === 0) return [];
  const src = buildInlineSource(source, segments);
  const tokens = lexInline(src.virtual, options);
  return parseInlinesWithDelimiterStack(tokens, src, refMap, trace);
}

const AUTOLINK_URI_RE = /^<([A-Za-z][A-Za-z0-9+.-]{1,31}:[^<>\s\x00-\x1f]*)>/;
const AUTOLINK_EMAIL_RE =
  /^<([a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*)>/;
const INLINE_HTML_RE = new RegExp(
  "^(?:" +
    [
      "<[A-Za-z][A-Za-z0-9-]*(?:\\s+[A-Za-z_:][\\w.:-]*(?:\\s*=\\s*(?:[^\\s\"'=<>`]+|'[^']*'|\"[^\"]*\"))?)*\\s*/?>",
      "</[A-Za-z][A-Za-z0-9-]*\\s*>",
      "<!---?>",
      "<!--[\\s\\S]*?-->",
      "<\\?[\\s\\S]*?\\?>",
      "<![A-Za-z][^>]*>",
      "<!\\[CDATA\\[[\\s\\S]*?\\]\\]>",
    ].join("|") +
    ")",
);
const FOOTNOTE_REF_RE = /^\[\^([^\]\s]+)\]/;

export function lexInline(line: string, options: ResolvedParseOptions): InlineToken[] {
  const tokens: InlineToken[] = [];
  let textStart = 0;
  let i = 0;

  const flushText = (upTo: number) => {
    if (upTo > textStart) {
      tokens.push({ type: "text", start: textStart, end: upTo, replacement: null });
    }
  };
  const push = (token: InlineToken) => {
    flushText(token.start);
    tokens.push(token);
    i = token.end;
    textStart = i;
  };
  const substitute = (start: number, end: number, replacement: string) => {
    push({ type: "text", start, end, replacement });
  };

  while (i < line.length) {
    const c = line[i];

    if (c === "\\") {
      const next = line[i + 1];
      if (next === "\n") {
        push({ type: "br", start: i, end: i + 2 });
        continue;
      }
      if (isEscapable(next)) {
        flushText(i);
        tokens.push({ type: "text", start: i + 1, end: i + 2, replacement: null });
        i += 2;
        textStart = i;
        continue;
      }
      i++;
      continue;
    }

    if (c === "\n") {
      let wsStart = i;
      while (wsStart > textStart && (line[wsStart - 1] === " " || line[wsStart - 1] === "\t")) wsStart--;
      const trailing = line.slice(wsStart, i);
      flushText(wsStart);
      textStart = wsStart;
      if (trailing.length >= 2 && !trailing.includes("\t")) {
        push({ type: "br", start: wsStart, end: i + 1 });
      } else {
        textStart = i;
        push({ type: "softbreak", start: i, end: i + 1 });
      }
      continue;
    }

    if (c === "`") {
      let j = i + 1;
      while (j < line.length && line[j] === "`") j++;
      const runLen = j - i;
      const close = findBacktickRun(line, j, runLen);
      if (close === -1) {
        i = j;
        continue;
      }
      push({ type: "code_span", start: i, end: close + runLen, contentStart: j, contentEnd: close });
      continue;
    }

    if (c === "<") {
      const rest = line.slice(i);
      const uri = rest.match(AUTOLINK_URI_RE);
      const email = uri ? null : rest.match(AUTOLINK_EMAIL_RE);
      const auto = uri ?? email;
      if (auto) {
        push({ type: "autolink", start: i, end: i + auto[0].length, email: email !== null });
        continue;
      }
      const html = rest.match(INLINE_HTML_RE);
      if (html) {
        push({ type: "raw_html", start: i, end: i + html[0].length });
        continue;
      }
      i++;
      continue;
    }

    if (c === "*" || c === "_" || (c === "~" && options.strikethrough)) {
      let j = i + 1;
      while (j < line.length && line[j] === c) j++;
      if (c === "~" && j - i > 2) {
        i = j;
        continue;
      }
      const before = i > 0 ? line[i - 1] : "";
      const after = j < line.length ? line[j] : "";
      const left = isLeftFlanking(before, after);
      const right = isRightFlanking(before, after);
      let canOpen = left;
      let canClose = right;
      if (c === "_") {
        canOpen = left && (!right || isPunctuation(before));
        canClose = right && (!left || isPunctuation(after));
      }
      push({ type: "delim", char: c, start: i, end: j, canOpen, canClose });
      continue;
    }

    if (c === "[") {
      const footnote = options.footnotes ? line.slice(i).match(FOOTNOTE_REF_RE) : null;
      if (footnote) {
        push({ type: "footnote_ref", start: i, end: i + footnote[0].length });
        continue;
      }
      push({ type: "lbracket", start: i, end: i + 1, image: false });
      continue;
    }
    if (c === "!" && line[i + 1] === "[") {
      push({ type: "lbracket", start: i, end: i + 2, image: true });
      continue;
    }
    if (c === "]") {
      push({ type: "rbracket", start: i, end: i + 1 });
      continue;
    }

    if (c === "&") {
      const entity = line.slice(i).match(ENTITY_RE);
      if (entity) {
        const decoded = decodeHTMLStrict(entity[0]);
        if (decoded !== entity[0]) {
          substitute(i, i + entity[0].length, decoded);
          continue;
        }
      }
      i++;
      continue;
    }

    if (c === "$" && options.math) {
      const math = matchMath(line, i);
      if (math) {
        push(math);
        continue;
      }
      i++;
      continue;
    }

    if (options.smartPunctuation) {
      if (c === "." && line.startsWith("...", i)) {
        substitute(i, i + 3, ELLIPSIS);
        continue;
      }
      if (c === "-" && line[i + 1] === "-") {
        let j = i;
        while (j < line.length && line[j] === "-") j++;
        let at = i;
        for (const dash of dashSubstitutions(j - i)) {
          substitute(at, at + dashWidth(dash), dash);
          at += dashWidth(dash);
        }
        continue;
      }
      if (c === "'" || c === '"') {
        const before = i > 0 ? line[i - 1] : "";
        const after = i + 1 < line.length ? line[i + 1] : "";
        substitute(i, i + 1, smartQuote(c, isLeftFlanking(before, after), isRightFlanking(before, after)));
        continue;
      }
    }

    i++;
  }
  flushText(line.length);
  return tokens;
}

function findBacktickRun(line: string, from: number, runLen: number): number {
  let pos = from;
  while (pos < line.length) {
    const idx = line.indexOf("`", pos);
    if (idx === -1) return -1;
    let end = idx;
    while (end < line.length && line[end] === "`") end++;
    if (end - idx === runLen) return idx;
    pos = end;
  }
  return -1;
}

function matchMath(line: string, i: number): InlineToken | null {
  const display = line.startsWith("$$", i);
  const delimiter = display ? "$$" : "$";
  const contentStart = i + delimiter.length;
  const close = line.indexOf(delimiter, contentStart);
  if (close <= contentStart) return null;
  const content = line.slice(contentStart, close);
  if (!display && (/^\s/.test(content) || /\s$/.test(content))) return null;
  return { type: "math", start: i, end: close + delimiter.length, display, contentStart, contentEnd: close };
}
