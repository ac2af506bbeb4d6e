import type { BlockNode, InlineNode, TableRowNode } from "./ast";
import { blockPhase } from "./block-parser";
import { disabledTrace, type DebugTrace } from "./debug";
import type { ByteRange } from "./events";
import { walkBlockTreeAndParseInlines } from "./inline-parser";
import { resolveParseOptions, type ParseOptions } from "./options";
import {
  borrowed,
  owned,
  type SourceEntry,
  type SourceEvent,
  type SourceStr,
  type SourceTag,
} from "./source-events";

/**
 * Parses `text` into the underlying offset-tagged event stream. Every text
 * payload says whether it is a slice of `text` (borrowed) or a replacement
 * string (owned).
 */
export function tokenize(text: string, options: ParseOptions = {}, trace: DebugTrace = disabledTrace): SourceEntry[] {
  const resolved = resolveParseOptions(options);
  const doc = blockPhase(text, resolved, trace);
  walkBlockTreeAndParseInlines(doc, text, resolved, trace);

  const emitter = new SourceEventEmitter();
  for (const block of doc.children) {
    emitter.block(block, false);
  }
  trace.log(`Tokenizer produced ${emitter.entries.length} source events`);
  return emitter.entries;
}

class SourceEventEmitter {
  readonly entries: SourceEntry[] = [];

  private push(range: ByteRange, event: SourceEvent) {
    this.entries.push({ range: { start: range.start, end: range.end }, event });
  }

  private open(range: ByteRange, tag: SourceTag, body: () => void) {
    this.push(range, { type: "start", tag });
    body();
    this.push(range, { type: "end", tag: tag.type });
  }

  /** Adjacent slices that meet in the source become one text event. */
  private text(start: number, end: number, replacement: string | null) {
    if (replacement === null) {
      const last = this.entries[this.entries.length - 1];
      if (last && last.event.type === "text" && last.event.text.kind === "borrowed" && last.range.end === start) {
        last.range.end = end;
        last.event.text = borrowed(last.range.start, end);
        return;
      }
      this.push({ start, end }, { type: "text", text: borrowed(start, end) });
      return;
    }
    this.push({ start, end }, { type: "text", text: owned(replacement) });
  }

  block(node: BlockNode, tight: boolean) {
    switch (node.type) {
      case "metadata_block":
        this.open(node, { type: "metadata_block", kind: node.kind }, () => {
          if (node.content) this.text(node.content.start, node.content.end, null);
        });
        break;
      case "paragraph": {
        const body = () => {
          if (node.taskMarker) {
            this.push(node.taskMarker, { type: "task_list_marker", checked: node.taskMarker.checked });
          }
          this.inlines(node.children);
        };
        if (tight) body();
        else this.open(node, { type: "paragraph" }, body);
        break;
      }
      case "heading": {
        const attributes = node.attributes;
        this.open(
          node,
          {
            type: "heading",
            level: node.level,
            id: attributes?.id ? borrowed(attributes.id.start, attributes.id.end) : null,
            classes: attributes ? attributes.classes.map(c => borrowed(c.start, c.end)) : [],
            attrs: attributes
              ? attributes.attrs.map(([key, value]): [SourceStr, SourceStr | null] => [
                  borrowed(key.start, key.end),
                  value ? borrowed(value.start, value.end) : null,
                ])
              : [],
          },
          () => this.inlines(node.children),
        );
        break;
      }
      case "blockquote":
        this.open(node, { type: "blockquote" }, () => this.blocks(node.children, false));
        break;
      case "code_block": {
        const kind = node.fence && node.info
          ? { type: "fenced" as const, info: borrowed(node.info.start, node.info.end) }
          : { type: "indented" as const };
        this.open(node, { type: "code_block", kind }, () => {
          for (const line of node.lines) {
            this.push(line, { type: "text", text: borrowed(line.start, line.end) });
          }
        });
        break;
      }
      case "html_block":
        this.open(node, { type: "html_block" }, () => {
          for (const line of node.lines) {
            this.push(line, { type: "html" });
          }
        });
        break;
      case "list":
        this.open(node, { type: "list", start: node.startNumber }, () => {
          for (const item of node.children) {
            this.block(item, node.tight);
          }
        });
        break;
      case "list_item":
        this.open(node, { type: "list_item" }, () => this.blocks(node.children, tight));
        break;
      case "thematic_break":
        this.push(node, { type: "rule" });
        break;
      case "table":
        this.open(node, { type: "table", alignments: [...node.alignments] }, () => {
          this.open(node.head, { type: "table_head" }, () => this.cells(node.head));
          for (const row of node.rows) {
            this.open(row, { type: "table_row" }, () => this.cells(row));
          }
        });
        break;
      case "footnote_definition":
        this.open(node, { type: "footnote_definition", label: borrowed(node.label.start, node.label.end) }, () =>
          this.blocks(node.children, false),
        );
        break;
    }
  }

  private blocks(nodes: BlockNode[], tight: boolean) {
    for (const node of nodes) {
      this.block(node, tight);
    }
  }

  private cells(row: TableRowNode) {
    for (const cell of row.cells) {
      this.open(cell, { type: "table_cell" }, () => this.inlines(cell.children));
    }
  }

  private inlines(nodes: InlineNode[]) {
    for (const node of nodes) {
      this.inline(node);
    }
  }

  private inline(node: InlineNode) {
    switch (node.type) {
      case "text":
        if (node.end > node.start || node.replacement) this.text(node.start, node.end, node.replacement);
        break;
      case "code_span":
        this.push(node, { type: "code", content: node.content });
        break;
      case "emphasis":
      case "strong":
      case "strikethrough":
        this.open(node, { type: node.type }, () => this.inlines(node.children));
        break;
      case "link":
      case "image":
        this.open(
          node,
          { type: node.type, linkType: node.linkType, destUrl: node.destination, title: node.title, id: node.id },
          () => this.inlines(node.children),
        );
        break;
      case "raw_html":
        this.push(node, { type: "inline_html" });
        break;
      case "footnote_reference":
        this.push(node, { type: "footnote_reference", label: borrowed(node.label.start, node.label.end) });
        break;
      case "softbreak":
        this.push(node, { type: "soft_break" });
        break;
      case "linebreak":
        this.push(node, { type: "hard_break" });
        break;
      case "math":
        this.push(node, node.display ? { type: "display_math", content: node.content } : { type: "inline_math", content: node.content });
        break;
    }
  }
}
