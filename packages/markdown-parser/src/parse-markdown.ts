import { autolinkEvents } from "./autolink-scanner";
import { createDebugTrace, disabledTrace, type DebugTrace } from "./debug";
import type { ByteRange, ParsedMarkdown, RangedEvent } from "./events";
import { verifySubstitution } from "./offset-verifier";
import { resolveParseOptions, type ParseOptions } from "./options";
import { resolveSourceStr } from "./source-events";
import { toOwnedTag } from "./tag-mapper";
import { tokenize } from "./tokenizer";

interface SubstitutedRun {
  range: ByteRange;
  chunks: string[];
}

/**
 * Parses markdown into a flat list of range-annotated events plus the set of
 * fenced code block languages. Ranges index into `text` itself.
 */
export function parseMarkdown(text: string, options: ParseOptions = {}): ParsedMarkdown {
  const trace = options.debug ? createDebugTrace(true) : disabledTrace;
  return normalizeEvents(text, options, trace);
}

export function parseMarkdownWithDebug(
  text: string,
  options: ParseOptions = {},
): ParsedMarkdown & { logs: string[] } {
  const trace = createDebugTrace(true);
  const parsed = normalizeEvents(text, { ...options, debug: true }, trace);
  return { ...parsed, logs: trace.messages() };
}

function normalizeEvents(text: string, options: ParseOptions, trace: DebugTrace): ParsedMarkdown {
  const resolved = resolveParseOptions(options);
  const events: RangedEvent[] = [];
  const languages = new Set<string>();
  // open explicit links and images; an image may sit inside a link
  let linkDepth = 0;
  let withinMetadata = false;
  const run: SubstitutedRun = { range: { start: 0, end: 0 }, chunks: [] };

  const flush = () => {
    if (run.chunks.length === 0) return;
    events.push({ range: { ...run.range }, event: { type: "substituted_text", text: run.chunks.join("") } });
    run.chunks = [];
  };

  for (const { range, event } of tokenize(text, resolved, trace)) {
    if (withinMetadata) {
      if (event.type === "end" && event.tag === "metadata_block") {
        withinMetadata = false;
      }
      continue;
    }
    if (event.type !== "text") flush();

    switch (event.type) {
      case "start": {
        const tag = toOwnedTag(event.tag, text);
        if (tag.type === "metadata_block") {
          withinMetadata = true;
          trace.log(`Suppressing metadata block at ${range.start}-${range.end}`);
          break;
        }
        if (tag.type === "link" || tag.type === "image") linkDepth++;
        if (tag.type === "code_block" && tag.kind.type === "fenced") languages.add(tag.kind.language);
        events.push({ range, event: { type: "start", tag } });
        break;
      }
      case "end":
        if (event.tag === "link" || event.tag === "image") linkDepth = Math.max(0, linkDepth - 1);
        events.push({ range, event: { type: "end", tag: event.tag } });
        break;
      case "code":
        events.push({ range: { start: range.start + 1, end: range.end - 1 }, event: { type: "code" } });
        break;
      case "text": {
        if (event.text.kind === "owned") {
          verifySubstitution(text, range, event.text.value, resolved.substitutionLengthThreshold);
          if (run.chunks.length === 0) run.range.start = range.start;
          run.range.end = range.end;
          run.chunks.push(resolveSourceStr(event.text, text));
          break;
        }
        flush();
        if (linkDepth > 0) {
          if (range.end > range.start) events.push({ range, event: { type: "text" } });
        } else {
          events.push(...autolinkEvents(text, range));
        }
        break;
      }
      case "html":
      case "inline_html":
      case "footnote_reference":
      case "soft_break":
      case "hard_break":
      case "rule":
        events.push({ range, event: { type: event.type } });
        break;
      case "task_list_marker":
        events.push({ range, event: { type: "task_list_marker", checked: event.checked } });
        break;
      case "inline_math":
      case "display_math":
        break;
    }
  }
  flush();

  trace.log(`Normalized ${events.length} events, ${languages.size} languages`);
  return { events, languages };
}
