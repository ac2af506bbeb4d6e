import type { Alignment, HeadingLevel, LinkType, MetadataBlockKind } from "./events"
import type { SourceStr } from "./source-events"

/** Absolute offsets into the parsed string. */
export interface Span {
  start: number
  end: number
}

export interface RefDefinition {
  label: string
  url: string
  title: string
}

export interface HeadingAttributes {
  id: Span | null
  classes: Span[]
  attrs: [Span, Span | null][]
}

export interface TaskMarker extends Span {
  checked: boolean
}

export interface Fence {
  char: "`" | "~"
  length: number
  indent: number
}

type NodeBase<T extends string> = Span & { type: T }

export type DocumentNode = NodeBase<"document"> & { children: BlockNode[] } & {
  refDefinitions: Map<string, RefDefinition>
}

export type ParagraphNode = NodeBase<"paragraph"> & { children: InlineNode[] } & {
  lines: Span[]
  taskMarker: TaskMarker | null
}
export type HeadingNode = NodeBase<"heading"> & { children: InlineNode[] } & {
  level: HeadingLevel
  lines: Span[]
  attributes: HeadingAttributes | null
}
export type BlockquoteNode = NodeBase<"blockquote"> & { children: BlockNode[] }
export type ListNode = NodeBase<"list"> & { children: ListItemNode[] } & {
  ordered: boolean
  /** First number of an ordered list, null for bullet lists. */
  startNumber: number | null
  marker: string
  tight: boolean
  pendingBlank: boolean
}
export type ListItemNode = NodeBase<"list_item"> & { children: BlockNode[] } & {
  contentIndent: number
}
export type CodeBlockNode = NodeBase<"code_block"> & {
  fence: Fence | null
  info: Span | null
  lines: Span[]
}
export type HtmlBlockNode = NodeBase<"html_block"> & {
  lines: Span[]
  /** Null when the block ends at the next blank line. */
  endCondition: RegExp | null
}
export type ThematicBreakNode = NodeBase<"thematic_break">
export type TableCellNode = NodeBase<"table_cell"> & { children: InlineNode[] }
export type TableRowNode = NodeBase<"table_row"> & { cells: TableCellNode[] }
export type TableNode = NodeBase<"table"> & {
  alignments: Alignment[]
  head: TableRowNode
  rows: TableRowNode[]
}
export type FootnoteDefinitionNode = NodeBase<"footnote_definition"> & { children: BlockNode[] } & {
  label: Span
}
export type MetadataBlockNode = NodeBase<"metadata_block"> & {
  kind: MetadataBlockKind
  content: Span | null
}

export type BlockNode =
  | ParagraphNode
  | HeadingNode
  | BlockquoteNode
  | ListNode
  | ListItemNode
  | CodeBlockNode
  | HtmlBlockNode
  | ThematicBreakNode
  | TableNode
  | FootnoteDefinitionNode
  | MetadataBlockNode

export type ContainerNode = DocumentNode | BlockquoteNode | ListNode | ListItemNode | FootnoteDefinitionNode

/** Anything that can sit on the block parser's open-block stack. */
export type OpenBlock = DocumentNode | BlockNode

/** `replacement` is null when the text is the source slice at the node's span. */
export type TextNode = NodeBase<"text"> & { replacement: string | null }
/** The span includes the backtick runs; `content` is the normalized code. */
export type CodeSpanNode = NodeBase<"code_span"> & { content: SourceStr }
export type EmphasisNode = NodeBase<"emphasis"> & { children: InlineNode[] }
export type StrongNode = NodeBase<"strong"> & { children: InlineNode[] }
export type StrikethroughNode = NodeBase<"strikethrough"> & { children: InlineNode[] }
type LinkFields = {
  linkType: LinkType
  destination: SourceStr
  title: SourceStr
  id: SourceStr
}
export type LinkNode = NodeBase<"link"> & { children: InlineNode[] } & LinkFields
export type ImageNode = NodeBase<"image"> & { children: InlineNode[] } & LinkFields
export type RawHtmlNode = NodeBase<"raw_html">
export type FootnoteReferenceNode = NodeBase<"footnote_reference"> & { label: Span }
export type SoftBreakNode = NodeBase<"softbreak">
export type LineBreakNode = NodeBase<"linebreak">
export type MathNode = NodeBase<"math"> & { display: boolean; content: SourceStr }

export type InlineNode =
  | TextNode
  | CodeSpanNode
  | EmphasisNode
  | StrongNode
  | StrikethroughNode
  | LinkNode
  | ImageNode
  | RawHtmlNode
  | FootnoteReferenceNode
  | SoftBreakNode
  | LineBreakNode
  | MathNode
