/**
 * Half-open `[start, end)` offsets into the exact string that was parsed.
 * Offsets are string indices (UTF-16 code units), not UTF-8 bytes: slice the
 * input string with them, never a `Buffer`.
 */
export interface ByteRange {
  start: number
  end: number
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

export type Alignment = "none" | "left" | "center" | "right"

export type LinkType =
  | "inline"
  | "reference"
  | "collapsed"
  | "shortcut"
  | "autolink"
  | "email"

export type MetadataBlockKind = "pluses" | "yaml"

export type CodeBlockKind =
  | { type: "indented" }
  /** `language` is the fence's info string and may be empty. */
  | { type: "fenced"; language: string }

type TagBase<T extends string> = { type: T }
type LinkLike<T extends string> = TagBase<T> & {
  linkType: LinkType
  destUrl: string
  title: string
  /** Reference label, e.g. `world` in `[hello][world]`. Empty for inline links. */
  id: string
}

/**
 * Payload of a `start` event. Everything is owned: no field points back into
 * the tokenizer's buffers.
 */
export type MarkdownTag =
  | TagBase<"paragraph">
  | (TagBase<"heading"> & {
      level: HeadingLevel
      id: string | null
      classes: string[]
      /** `[attr, value]`; `value` is null for a bare `attr`. */
      attrs: [string, string | null][]
    })
  | TagBase<"blockquote">
  | (TagBase<"code_block"> & { kind: CodeBlockKind })
  | TagBase<"html_block">
  /** `start` is the first number of an ordered list, null for bullet lists. */
  | (TagBase<"list"> & { start: number | null })
  | TagBase<"list_item">
  | (TagBase<"footnote_definition"> & { label: string })
  | (TagBase<"table"> & { alignments: Alignment[] })
  | TagBase<"table_head">
  | TagBase<"table_row">
  | TagBase<"table_cell">
  | TagBase<"emphasis">
  | TagBase<"strong">
  | TagBase<"strikethrough">
  | LinkLike<"link">
  | LinkLike<"image">
  | (TagBase<"metadata_block"> & { kind: MetadataBlockKind })
  | TagBase<"definition_list">
  | TagBase<"definition_list_title">
  | TagBase<"definition_list_definition">

export type MarkdownTagKind = MarkdownTag["type"]

export type MarkdownEvent =
  /** Events between a `start` and its `end` are inside that element. */
  | { type: "start"; tag: MarkdownTag }
  | { type: "end"; tag: MarkdownTagKind }
  /** Text whose content is the source slice at the event's range. */
  | { type: "text" }
  /** Text that differs from the source, e.g. a decoded entity or a curly quote. */
  | { type: "substituted_text"; text: string }
  | { type: "code" }
  | { type: "html" }
  | { type: "inline_html" }
  | { type: "footnote_reference" }
  | { type: "soft_break" }
  | { type: "hard_break" }
  | { type: "rule" }
  | { type: "task_list_marker"; checked: boolean }

export interface RangedEvent {
  range: ByteRange
  event: MarkdownEvent
}

export interface ParsedMarkdown {
  events: RangedEvent[]
  /** Info strings of every fenced code block, including the empty one. */
  languages: Set<string>
}
