import type { MarkdownTag } from "./events";
import { resolveSourceStr, type SourceStr, type SourceTag } from "./source-events";

/**
 * Converts a tokenizer tag into an owned tag. Borrowed strings are resolved
 * against `source`; lists are copied.
 */
export function toOwnedTag(tag: SourceTag, source: string): MarkdownTag {
  const resolve = (str: SourceStr) => resolveSourceStr(str, source);
  switch (tag.type) {
    case "heading":
      return {
        type: "heading",
        level: tag.level,
        id: tag.id ? resolve(tag.id) : null,
        classes: tag.classes.map(resolve),
        attrs: tag.attrs.map(([attr, value]): [string, string | null] => [resolve(attr), value ? resolve(value) : null]),
      };
    case "code_block":
      return {
        type: "code_block",
        kind: tag.kind.type === "fenced" ? { type: "fenced", language: resolve(tag.kind.info) } : { type: "indented" },
      };
    case "list":
      return { type: "list", start: tag.start };
    case "footnote_definition":
      return { type: "footnote_definition", label: resolve(tag.label) };
    case "table":
      return { type: "table", alignments: [...tag.alignments] };
    case "link":
    case "image":
      return {
        type: tag.type,
        linkType: tag.linkType,
        destUrl: resolve(tag.destUrl),
        title: resolve(tag.title),
        id: resolve(tag.id),
      };
    case "metadata_block":
      return { type: "metadata_block", kind: tag.kind };
    default:
      return { type: tag.type };
  }
}
