import type {
  Alignment,
  ByteRange,
  HeadingLevel,
  LinkType,
  MetadataBlockKind,
} from "./events";

/**
 * A string produced by the tokenizer. `borrowed` strings are slices of the
 * input and carry only their offsets; `owned` strings differ from the input
 * (unescaped, decoded or substituted) and carry their own value.
 */
export type SourceStr =
  | { kind: "borrowed"; start: number; end: number }
  | { kind: "owned"; value: string }

export const EMPTY_SOURCE_STR: SourceStr = { kind: "owned", value: "" };

export function borrowed(start: number, end: number): SourceStr {
  return { kind: "borrowed", start, end };
}

export function owned(value: string): SourceStr {
  return { kind: "owned", value };
}

export function resolveSourceStr(str: SourceStr, source: string): string {
  return str.kind === "borrowed" ? source.slice(str.start, str.end) : str.value;
}

type SourceLink<T extends string> = {
  type: T;
  linkType: LinkType;
  destUrl: SourceStr;
  title: SourceStr;
  id: SourceStr;
};

export type SourceCodeBlockKind =
  | { type: "indented" }
  | { type: "fenced"; info: SourceStr };

export type SourceTag =
  | { type: "paragraph" }
  | {
      type: "heading";
      level: HeadingLevel;
      id: SourceStr | null;
      classes: SourceStr[];
      attrs: [SourceStr, SourceStr | null][];
    }
  | { type: "blockquote" }
  | { type: "code_block"; kind: SourceCodeBlockKind }
  | { type: "html_block" }
  | { type: "list"; start: number | null }
  | { type: "list_item" }
  | { type: "footnote_definition"; label: SourceStr }
  | { type: "table"; alignments: Alignment[] }
  | { type: "table_head" }
  | { type: "table_row" }
  | { type: "table_cell" }
  | { type: "emphasis" }
  | { type: "strong" }
  | { type: "strikethrough" }
  | SourceLink<"link">
  | SourceLink<"image">
  | { type: "metadata_block"; kind: MetadataBlockKind }
  | { type: "definition_list" }
  | { type: "definition_list_title" }
  | { type: "definition_list_definition" };

export type SourceTagKind = SourceTag["type"];

/** The tokenizer's event stream, before normalization. */
export type SourceEvent =
  | { type: "start"; tag: SourceTag }
  | { type: "end"; tag: SourceTagKind }
  | { type: "text"; text: SourceStr }
  /** `content` excludes the backtick delimiters; the event range includes them. */
  | { type: "code"; content: SourceStr }
  | { type: "html" }
  | { type: "inline_html" }
  | { type: "footnote_reference"; label: SourceStr }
  | { type: "soft_break" }
  | { type: "hard_break" }
  | { type: "rule" }
  | { type: "task_list_marker"; checked: boolean }
  | { type: "inline_math"; content: SourceStr }
  | { type: "display_math"; content: SourceStr };

export interface SourceEntry {
  range: ByteRange;
  event: SourceEvent;
}
