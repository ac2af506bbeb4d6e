export { parseMarkdown, parseMarkdownWithDebug } from "./parse-markdown";
export { findLinks, parseLinksOnly } from "./autolink-scanner";
export { tokenize } from "./tokenizer";
export { toOwnedTag } from "./tag-mapper";
export { verifySubstitution } from "./offset-verifier";
export { findEventViolations } from "./validate";
export { DEFAULT_PARSE_OPTIONS, resolveParseOptions } from "./options";
export type { ParseOptions, ResolvedParseOptions } from "./options";
export { logger } from "./logger";
export type {
  Alignment,
  ByteRange,
  CodeBlockKind,
  HeadingLevel,
  LinkType,
  MarkdownEvent,
  MarkdownTag,
  MarkdownTagKind,
  MetadataBlockKind,
  ParsedMarkdown,
  RangedEvent,
} from "./events";
export type { SourceEntry, SourceEvent, SourceStr, SourceTag, SourceTagKind } from "./source-events";
