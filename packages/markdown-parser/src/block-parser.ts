import type {
  BlockNode,
  BlockquoteNode,
  CodeBlockNode,
  ContainerNode,
  DocumentNode,
  FootnoteDefinitionNode,
  HeadingAttributes,
  HeadingNode,
  HtmlBlockNode,
  ListItemNode,
  ListNode,
  MetadataBlockNode,
  OpenBlock,
  ParagraphNode,
  Span,
  TableNode,
  TableRowNode,
  ThematicBreakNode,
} from "./ast";
import type { Alignment, HeadingLevel } from "./events";
import { disabledTrace, type DebugTrace } from "./debug";
import { DEFAULT_PARSE_OPTIONS, type ResolvedParseOptions } from "./options";
import {
  isBlankFrom,
  isThematicBreakLine,
  measureIndent,
  normalizeRefLabel,
  parseListMarker,
  parseRefDefLine,
  skipColumns,
  splitLines,
  trimEndOffset,
  tryHtmlBlockOpen,
  type Line,
} from "./parser-helpers";

export interface BlockState {
  text: string;
  doc: DocumentNode;
  stack: OpenBlock[];
  options: ResolvedParseOptions;
  trace: DebugTrace;
}

const ATX_RE = /^(#{1,6})(?=[ \t]|$)/;
const FENCE_RE = /^(`{3,}|~{3,})/;
const SETEXT_RE = /^(=+|-+)[ \t]*$/;
const FOOTNOTE_DEF_RE = /^\[\^([^\]\s]+)\]:[ \t]*/;
const TASK_MARKER_RE = /^\[([ xX])\](?=[ \t]+\S)/;

export function blockPhase(
  text: string,
  options: ResolvedParseOptions = DEFAULT_PARSE_OPTIONS,
  trace: DebugTrace = disabledTrace,
): DocumentNode {
  const lines = splitLines(text);
  const doc: DocumentNode = {
    type: "document",
    start: 0,
    end: text.length,
    children: [],
    refDefinitions: new Map(),
  };
  const state: BlockState = { text, doc, stack: [doc], options, trace };

  let first = 0;
  const metadata = tryMetadataBlock(text, lines, options);
  if (metadata) {
    trace.log(`Metadata block (${metadata.node.kind}) spans lines 0-${metadata.nextLine - 1}`);
    doc.children.push(metadata.node);
    first = metadata.nextLine;
  }

  for (let i = first; i < lines.length; i++) {
    if (trace.enabled) {
      trace.log(`Line ${i}: ${JSON.stringify(text.slice(lines[i].start, lines[i].end))}, Stack: [${state.stack.map(n => n.type).join(", ")}]`);
    }
    processLine(state, lines[i]);
  }

  while (state.stack.length > 1) {
    closeBlock(state);
  }
  return doc;
}

function tryMetadataBlock(
  text: string,
  lines: Line[],
  options: ResolvedParseOptions,
): { node: MetadataBlockNode; nextLine: number } | null {
  if (lines.length < 2) return null;
  const opening = text.slice(lines[0].start, trimEndOffset(text, lines[0].start, lines[0].end));
  let kind: MetadataBlockNode["kind"];
  if (opening === "+++" && options.plusesMetadataBlocks) {
    kind = "pluses";
  } else if (opening === "---" && options.yamlMetadataBlocks && !isBlankFrom(text, lines[1].start, lines[1].end)) {
    kind = "yaml";
  } else {
    return null;
  }

  for (let i = 1; i < lines.length; i++) {
    const candidate = text.slice(lines[i].start, trimEndOffset(text, lines[i].start, lines[i].end));
    if (candidate === opening || (kind === "yaml" && candidate === "...")) {
      const content = i > 1 ? { start: lines[1].start, end: lines[i - 1].end } : null;
      return {
        node: { type: "metadata_block", kind, start: 0, end: lines[i].end, content },
        nextLine: i + 1,
      };
    }
  }
  return null;
}

function processLine(state: BlockState, line: Line) {
  const { text, stack } = state;
  const end = line.end;
  let pos = line.start;

  let matched = 1;
  while (matched < stack.length) {
    const block = stack[matched];
    if (!canContainLine(state, block, pos, end)) break;
    pos = consumeContainerMarkers(state, block, pos, end);
    matched++;
  }

  const allMatched = matched === stack.length;
  const tip = stack[stack.length - 1];
  const blank = isBlankFrom(text, pos, end);

  if (!allMatched && tip.type === "paragraph" && !blank && !interruptsParagraph(state, pos, end)) {
    state.trace.log(`Lazy continuation line for paragraph at ${tip.start}`);
    appendParagraphLine(state, tip, pos, end);
    return;
  }

  while (stack.length > matched) {
    closeBlock(state);
  }

  const container = stack[stack.length - 1];
  if (container.type === "code_block") {
    continueCodeBlock(state, container, line, pos);
    return;
  }
  if (container.type === "html_block") {
    container.lines.push({ start: pos, end: line.next });
    extendOpenBlocks(state, trimEndOffset(text, pos, end));
    if (container.endCondition && container.endCondition.test(text.slice(pos, end))) {
      closeBlock(state);
    }
    return;
  }

  const next = tryOpenNewContainers(state, line, pos);
  if (next === null) return;
  pos = next;

  if (isBlankFrom(text, pos, end)) {
    // an item opened on this line with nothing after its marker is not a blank line
    if (blank) handleBlankLine(state);
    return;
  }

  const top = stack[stack.length - 1];
  if (top.type === "paragraph") {
    appendParagraphLine(state, top, pos, end);
    return;
  }
  if (top.type === "table") {
    top.rows.push(parseTableRow(text, pos, end, top.alignments.length));
    extendOpenBlocks(state, trimEndOffset(text, pos, end));
    settleLooseLists(state);
    return;
  }
  openParagraph(state, pos, end);
}

export function canContainLine(state: BlockState, container: OpenBlock, pos: number, end: number): boolean {
  const { text } = state;
  const blank = isBlankFrom(text, pos, end);
  switch (container.type) {
    case "document":
    case "list":
      return true;
    case "blockquote": {
      const { columns, offset } = measureIndent(text, pos, end);
      return columns <= 3 && text[offset] === ">";
    }
    case "list_item":
      return blank || measureIndent(text, pos, end).columns >= container.contentIndent;
    case "footnote_definition":
      return blank || measureIndent(text, pos, end).columns >= 4;
    case "paragraph":
      return !blank;
    case "code_block":
      return container.fence !== null || blank || measureIndent(text, pos, end).columns >= 4;
    case "html_block":
      return container.endCondition !== null || !blank;
    case "table":
      return !blank && !interruptsTable(state, pos, end);
    default:
      return false;
  }
}

export function consumeContainerMarkers(state: BlockState, container: OpenBlock, pos: number, end: number): number {
  const { text } = state;
  switch (container.type) {
    case "blockquote": {
      let offset = measureIndent(text, pos, end).offset + 1;
      if (text[offset] === " " || text[offset] === "\t") offset++;
      return offset;
    }
    case "list_item":
      return skipColumns(text, pos, end, container.contentIndent);
    case "footnote_definition":
      return skipColumns(text, pos, end, 4);
    case "code_block":
      return container.fence ? pos : skipColumns(text, pos, end, 4);
    default:
      return pos;
  }
}

/**
 * Opens every block that starts at `pos`. Returns the offset of the remaining
 * inline content, or null when the line has been fully consumed.
 */
export function tryOpenNewContainers(state: BlockState, line: Line, pos: number): number | null {
  const { text, stack, options } = state;
  const end = line.end;

  while (!isBlankFrom(text, pos, end)) {
    const top = stack[stack.length - 1];
    const { columns, offset } = measureIndent(text, pos, end);
    const rest = text.slice(offset, end);

    if (columns >= 4) {
      if (top.type === "paragraph" || top.type === "table") return pos;
      const contentStart = skipColumns(text, pos, end, 4);
      const code: CodeBlockNode = {
        type: "code_block",
        start: contentStart,
        end,
        fence: null,
        info: null,
        lines: [{ start: contentStart, end: line.next }],
      };
      addBlock(state, code);
      stack.push(code);
      extendOpenBlocks(state, end);
      settleLooseLists(state);
      return null;
    }

    if (rest.startsWith(">")) {
      closeParagraphIfOpen(state);
      const quote: BlockquoteNode = { type: "blockquote", start: offset, end, children: [] };
      addBlock(state, quote);
      stack.push(quote);
      state.trace.log(`Opened blockquote at ${offset}`);
      pos = offset + 1;
      if (text[pos] === " " || text[pos] === "\t") pos++;
      continue;
    }

    const atx = parseAtxHeading(state, offset, end);
    if (atx) {
      closeParagraphIfOpen(state);
      addBlock(state, atx);
      extendOpenBlocks(state, atx.end);
      settleLooseLists(state);
      return null;
    }

    const fence = rest.match(FENCE_RE);
    if (fence && !(fence[1][0] === "`" && rest.slice(fence[1].length).includes("`"))) {
      closeParagraphIfOpen(state);
      const infoStart = measureIndent(text, offset + fence[1].length, end).offset;
      const infoEnd = Math.max(infoStart, trimEndOffset(text, infoStart, end));
      const code: CodeBlockNode = {
        type: "code_block",
        start: offset,
        end: trimEndOffset(text, offset, end),
        fence: { char: fence[1][0] === "`" ? "`" : "~", length: fence[1].length, indent: columns },
        info: { start: infoStart, end: infoEnd },
        lines: [],
      };
      addBlock(state, code);
      stack.push(code);
      extendOpenBlocks(state, code.end);
      settleLooseLists(state);
      state.trace.log(`Opened fenced code block with info ${JSON.stringify(text.slice(infoStart, infoEnd))}`);
      return null;
    }

    const html = tryHtmlBlockOpen(rest);
    if (html && (top.type !== "paragraph" || html.canInterruptParagraph)) {
      closeParagraphIfOpen(state);
      const block: HtmlBlockNode = {
        type: "html_block",
        start: offset,
        end: trimEndOffset(text, offset, end),
        lines: [{ start: offset, end: line.next }],
        endCondition: html.endCondition,
      };
      addBlock(state, block);
      extendOpenBlocks(state, block.end);
      settleLooseLists(state);
      if (!html.endCondition || !html.endCondition.test(rest)) {
        stack.push(block);
      }
      return null;
    }

    if (options.tables && top.type === "paragraph" && top.lines.length === 1 && !top.taskMarker) {
      const table = tryOpenTable(state, top, offset, end);
      if (table) {
        replaceChild(state, top, table);
        stack.pop();
        stack.push(table);
        extendOpenBlocks(state, table.end);
        state.trace.log(`Paragraph at ${top.start} became a table with ${table.alignments.length} columns`);
        return null;
      }
    }

    if (top.type === "paragraph" && SETEXT_RE.test(rest)) {
      extractRefDefinitions(state, top);
      if (top.lines.length > 0) {
        const heading = paragraphToSetextHeading(state, top, rest[0] === "=" ? 1 : 2, trimEndOffset(text, offset, end));
        replaceChild(state, top, heading);
        stack.pop();
        extendOpenBlocks(state, heading.end);
        return null;
      }
      stack.pop();
      removeNodeChild(stack[stack.length - 1], top);
    }

    if (isThematicBreakLine(rest)) {
      closeParagraphIfOpen(state);
      const rule: ThematicBreakNode = { type: "thematic_break", start: offset, end: trimEndOffset(text, offset, end) };
      addBlock(state, rule);
      extendOpenBlocks(state, rule.end);
      settleLooseLists(state);
      return null;
    }

    const footnote = options.footnotes ? rest.match(FOOTNOTE_DEF_RE) : null;
    if (footnote) {
      closeParagraphIfOpen(state);
      const definition: FootnoteDefinitionNode = {
        type: "footnote_definition",
        start: offset,
        end: trimEndOffset(text, offset, end),
        label: { start: offset + 2, end: offset + 2 + footnote[1].length },
        children: [],
      };
      addBlock(state, definition);
      stack.push(definition);
      pos = offset + footnote[0].length;
      continue;
    }

    const marker = parseListMarker(text, pos, end);
    if (marker && (top.type !== "paragraph" || (!marker.empty && (!marker.ordered || marker.start === 1)))) {
      closeParagraphIfOpen(state);
      let list = stack[stack.length - 1];
      if (list.type !== "list" || list.ordered !== marker.ordered || list.marker !== marker.marker) {
        const created: ListNode = {
          type: "list",
          start: marker.markerStart,
          end,
          ordered: marker.ordered,
          startNumber: marker.ordered ? marker.start : null,
          marker: marker.marker,
          tight: true,
          pendingBlank: false,
          children: [],
        };
        addBlock(state, created);
        stack.push(created);
        list = created;
        state.trace.log(`Opened ${marker.ordered ? "ordered" : "bullet"} list at ${marker.markerStart}`);
      } else if (list.pendingBlank) {
        list.tight = false;
        list.pendingBlank = false;
      }
      const item: ListItemNode = {
        type: "list_item",
        start: marker.markerStart,
        end: marker.markerEnd,
        contentIndent: marker.contentIndent,
        children: [],
      };
      list.children.push(item);
      stack.push(item);
      extendOpenBlocks(state, marker.markerEnd);
      pos = marker.contentStart;
      continue;
    }

    return pos;
  }
  return pos;
}

function continueCodeBlock(state: BlockState, code: CodeBlockNode, line: Line, pos: number) {
  const { text } = state;
  if (code.fence) {
    if (isClosingFence(text, pos, line.end, code.fence.char, code.fence.length)) {
      code.end = trimEndOffset(text, pos, line.end);
      extendOpenBlocks(state, code.end);
      state.stack.pop();
      return;
    }
    const contentStart = skipColumns(text, pos, line.end, code.fence.indent);
    code.lines.push({ start: contentStart, end: line.next });
    extendOpenBlocks(state, line.end);
    return;
  }
  code.lines.push({ start: pos, end: line.next });
  if (!isBlankFrom(text, pos, line.end)) {
    extendOpenBlocks(state, line.end);
  }
}

function isClosingFence(text: string, pos: number, end: number, char: string, length: number): boolean {
  const { columns, offset } = measureIndent(text, pos, end);
  if (columns > 3) return false;
  let run = offset;
  while (run < end && text[run] === char) run++;
  return run - offset >= length && isBlankFrom(text, run, end);
}

export function handleBlankLine(state: BlockState) {
  for (const block of state.stack) {
    if (block.type === "list") {
      block.pendingBlank = true;
    }
  }
  state.trace.log(`Blank line, stack: [${state.stack.map(n => n.type).join(", ")}]`);
}

/** A list that saw a blank line and then received more content is loose. */
function settleLooseLists(state: BlockState) {
  for (const block of state.stack) {
    if (block.type === "list" && block.pendingBlank) {
      block.tight = false;
      block.pendingBlank = false;
    }
  }
}

function openParagraph(state: BlockState, pos: number, end: number) {
  const { text, stack, options } = state;
  const contentStart = measureIndent(text, pos, end).offset;
  const paragraph: ParagraphNode = {
    type: "paragraph",
    start: contentStart,
    end: trimEndOffset(text, contentStart, end),
    lines: [],
    children: [],
    taskMarker: null,
  };

  let lineStart = contentStart;
  const parent = stack[stack.length - 1];
  if (options.tasklists && parent.type === "list_item" && parent.children.length === 0) {
    const task = text.slice(contentStart, end).match(TASK_MARKER_RE);
    if (task) {
      paragraph.taskMarker = { start: contentStart, end: contentStart + 3, checked: task[1] !== " " };
      lineStart = measureIndent(text, contentStart + 3, end).offset;
    }
  }
  paragraph.lines.push({ start: lineStart, end });

  addBlock(state, paragraph);
  stack.push(paragraph);
  extendOpenBlocks(state, paragraph.end);
  settleLooseLists(state);
}

function appendParagraphLine(state: BlockState, paragraph: ParagraphNode, pos: number, end: number) {
  const { text } = state;
  const contentStart = measureIndent(text, pos, end).offset;
  paragraph.lines.push({ start: contentStart, end });
  extendOpenBlocks(state, trimEndOffset(text, contentStart, end));
}

/** Sets the end of every open block to `offset` unless it already reaches further. */
function extendOpenBlocks(state: BlockState, offset: number) {
  for (let i = 1; i < state.stack.length; i++) {
    const block = state.stack[i];
    if (block.end < offset) block.end = offset;
  }
}

/**
 * Whether a line that left some containers unmatched starts a block of its
 * own instead of lazily continuing the open paragraph. The paragraph is not
 * the innermost matched container here, so any list marker counts.
 */
function interruptsParagraph(state: BlockState, pos: number, end: number): boolean {
  const { text, options } = state;
  const { columns, offset } = measureIndent(text, pos, end);
  if (columns >= 4) return false;
  const rest = text.slice(offset, end);
  if (rest.startsWith(">") || ATX_RE.test(rest) || FENCE_RE.test(rest) || isThematicBreakLine(rest)) {
    return true;
  }
  if (tryHtmlBlockOpen(rest)) return true;
  if (options.footnotes && FOOTNOTE_DEF_RE.test(rest)) return true;
  return parseListMarker(text, pos, end) !== null;
}

function interruptsTable(state: BlockState, pos: number, end: number): boolean {
  const { text } = state;
  const { columns, offset } = measureIndent(text, pos, end);
  if (columns >= 4) return false;
  const rest = text.slice(offset, end);
  return (
    rest.startsWith(">") ||
    ATX_RE.test(rest) ||
    FENCE_RE.test(rest) ||
    isThematicBreakLine(rest) ||
    tryHtmlBlockOpen(rest) !== null
  );
}

export function parseAtxHeading(state: BlockState, offset: number, end: number): HeadingNode | null {
  const { text, options } = state;
  const m = text.slice(offset, end).match(ATX_RE);
  if (!m) return null;
  const level = headingLevel(m[1].length);
  const contentStart = measureIndent(text, offset + m[1].length, end).offset;
  let contentEnd = trimEndOffset(text, contentStart, end);

  let attributes: HeadingAttributes | null = null;
  if (options.headingAttributes) {
    const split = splitHeadingAttributes(text, contentStart, contentEnd);
    contentEnd = split.end;
    attributes = split.attributes;
  }

  let closing = contentEnd;
  while (closing > contentStart && text[closing - 1] === "#") closing--;
  if (closing < contentEnd && (closing === contentStart || text[closing - 1] === " " || text[closing - 1] === "\t")) {
    contentEnd = trimEndOffset(text, contentStart, closing);
  }

  return {
    type: "heading",
    level,
    start: offset,
    end: trimEndOffset(text, offset, end),
    lines: contentEnd > contentStart ? [{ start: contentStart, end: contentEnd }] : [],
    attributes,
    children: [],
  };
}

function paragraphToSetextHeading(state: BlockState, paragraph: ParagraphNode, level: HeadingLevel, end: number): HeadingNode {
  const { text, options } = state;
  const lines = paragraph.lines.map(l => ({ start: l.start, end: trimEndOffset(text, l.start, l.end) }));
  let attributes: HeadingAttributes | null = null;
  const last = lines[lines.length - 1];
  if (options.headingAttributes) {
    const split = splitHeadingAttributes(text, last.start, last.end);
    last.end = split.end;
    attributes = split.attributes;
  }
  return {
    type: "heading",
    level,
    start: paragraph.start,
    end,
    lines: lines.filter(l => l.end > l.start),
    attributes,
    children: [],
  };
}

/** Splits a trailing `{#id .class key=value}` block off heading content. */
export function splitHeadingAttributes(
  text: string,
  start: number,
  end: number,
): { end: number; attributes: HeadingAttributes | null } {
  if (end <= start || text[end - 1] !== "}") return { end, attributes: null };
  const open = text.lastIndexOf("{", end - 1);
  if (open < start) return { end, attributes: null };
  const inner = text.slice(open + 1, end - 1);
  if (inner.includes("{") || inner.includes("}")) return { end, attributes: null };

  const attributes: HeadingAttributes = { id: null, classes: [], attrs: [] };
  for (const token of inner.matchAll(/\S+/g)) {
    const tokenStart = open + 1 + (token.index ?? 0);
    const tokenEnd = tokenStart + token[0].length;
    if (token[0].startsWith("#")) {
      if (token[0].length > 1) attributes.id = { start: tokenStart + 1, end: tokenEnd };
    } else if (token[0].startsWith(".")) {
      if (token[0].length > 1) attributes.classes.push({ start: tokenStart + 1, end: tokenEnd });
    } else {
      const eq = token[0].indexOf("=");
      if (eq === -1) {
        attributes.attrs.push([{ start: tokenStart, end: tokenEnd }, null]);
      } else if (eq > 0) {
        attributes.attrs.push([
          { start: tokenStart, end: tokenStart + eq },
          { start: tokenStart + eq + 1, end: tokenEnd },
        ]);
      }
    }
  }
  return { end: trimEndOffset(text, start, open), attributes };
}

function headingLevel(hashes: number): HeadingLevel {
  switch (hashes) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    default:
      return 6;
  }
}

function tryOpenTable(state: BlockState, header: ParagraphNode, offset: number, end: number): TableNode | null {
  const { text } = state;
  const alignments = parseDelimiterRow(text, offset, end);
  if (!alignments) return null;
  const headerLine = header.lines[0];
  const headerCells = splitTableRow(text, headerLine.start, headerLine.end);
  if (headerCells.length !== alignments.length) return null;

  return {
    type: "table",
    start: header.start,
    end: trimEndOffset(text, offset, end),
    alignments,
    head: parseTableRow(text, headerLine.start, headerLine.end, alignments.length),
    rows: [],
  };
}

export function parseDelimiterRow(text: string, start: number, end: number): Alignment[] | null {
  const rest = text.slice(start, trimEndOffset(text, start, end));
  if (!rest.includes("|")) return null;
  const cells = splitTableRow(text, start, end);
  const alignments: Alignment[] = [];
  for (const cell of cells) {
    const value = text.slice(cell.start, cell.end);
    if (!/^:?-+:?$/.test(value)) return null;
    const left = value.startsWith(":");
    const right = value.endsWith(":");
    alignments.push(left && right ? "center" : left ? "left" : right ? "right" : "none");
  }
  return alignments.length > 0 ? alignments : null;
}

/** Trimmed cell spans of a table row, split on unescaped pipes. */
export function splitTableRow(text: string, start: number, end: number): Span[] {
  let from = measureIndent(text, start, end).offset;
  let to = trimEndOffset(text, from, end);
  if (text[from] === "|") from++;
  if (to > from && text[to - 1] === "|" && text[to - 2] !== "\\") to--;

  const cells: Span[] = [];
  let cellStart = from;
  for (let i = from; i <= to; i++) {
    if (i === to || (text[i] === "|" && text[i - 1] !== "\\")) {
      const cellFrom = measureIndent(text, cellStart, i).offset;
      cells.push({ start: cellFrom, end: trimEndOffset(text, cellFrom, i) });
      cellStart = i + 1;
    }
  }
  return cells;
}

function parseTableRow(text: string, start: number, end: number, columns: number): TableRowNode {
  const rowStart = measureIndent(text, start, end).offset;
  const rowEnd = trimEndOffset(text, rowStart, end);
  const spans = splitTableRow(text, start, end).slice(0, columns);
  while (spans.length < columns) spans.push({ start: rowEnd, end: rowEnd });
  return {
    type: "table_row",
    start: rowStart,
    end: rowEnd,
    cells: spans.map(span => ({ type: "table_cell", start: span.start, end: span.end, children: [] })),
  };
}

function isContainer(node: OpenBlock): node is ContainerNode {
  return (
    node.type === "document" ||
    node.type === "blockquote" ||
    node.type === "list" ||
    node.type === "list_item" ||
    node.type === "footnote_definition"
  );
}

/** Adds `child` to the innermost container, closing leaf blocks and item-less lists above it. */
export function addBlock(state: BlockState, child: BlockNode) {
  const { stack } = state;
  for (;;) {
    const parent = stack[stack.length - 1];
    if (isContainer(parent) && parent.type !== "list") {
      parent.children.push(child);
      return;
    }
    closeBlock(state);
  }
}

export function closeBlock(state: BlockState) {
  const { stack, text } = state;
  const block = stack.pop();
  if (!block) return;
  state.trace.log(`Closing block of type: ${block.type}`);

  if (block.type === "paragraph") {
    extractRefDefinitions(state, block);
    if (block.lines.length === 0) {
      removeNodeChild(stack[stack.length - 1], block);
    }
  } else if (block.type === "code_block" && !block.fence) {
    while (block.lines.length > 0 && isBlankFrom(text, block.lines[block.lines.length - 1].start, lineEnd(text, block.lines[block.lines.length - 1]))) {
      block.lines.pop();
    }
    const last = block.lines[block.lines.length - 1];
    if (last) block.end = lineEnd(text, last);
  }
}

function lineEnd(text: string, span: Span): number {
  let end = span.end;
  while (end > span.start && (text[end - 1] === "\n" || text[end - 1] === "\r")) end--;
  return end;
}

function extractRefDefinitions(state: BlockState, paragraph: ParagraphNode) {
  const { text, doc } = state;
  if (paragraph.taskMarker) return;
  while (paragraph.lines.length > 0) {
    const first = paragraph.lines[0];
    const def = parseRefDefLine(text.slice(first.start, first.end));
    if (!def) break;
    const label = normalizeRefLabel(def.label);
    if (!doc.refDefinitions.has(label)) {
      state.trace.log(`Found reference definition: [${def.label}]: ${def.url}`);
      doc.refDefinitions.set(label, { label, url: def.url, title: def.title });
    }
    paragraph.lines.shift();
  }
  if (paragraph.lines.length > 0) {
    paragraph.start = paragraph.lines[0].start;
  }
}

export function closeParagraphIfOpen(state: BlockState) {
  const top = state.stack[state.stack.length - 1];
  if (top.type === "paragraph" || top.type === "table") {
    closeBlock(state);
  }
}

function replaceChild(state: BlockState, previous: BlockNode, next: BlockNode) {
  const parent = state.stack[state.stack.length - 2];
  if (!parent || !isContainer(parent)) return;
  const siblings: BlockNode[] = parent.children;
  const idx = siblings.indexOf(previous);
  if (idx !== -1) siblings[idx] = next;
}

export function removeNodeChild(parent: OpenBlock, child: BlockNode) {
  if (!isContainer(parent)) return;
  const siblings: BlockNode[] = parent.children;
  const idx = siblings.indexOf(child);
  if (idx !== -1) siblings.splice(idx, 1);
}
