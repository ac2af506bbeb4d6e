import type { InlineNode, LinkNode, RefDefinition, Span, TextNode } from "@/ast"
import type { DebugTrace } from "@/debug"
import type { LinkType } from "@/events"
import { isContiguous, toSourceSpan, type InlineSource, type InlineToken } from "@/inline-parser"
import { isEscapable, normalizeRefLabel, unescapeString } from "@/parser-helpers"
import { EMPTY_SOURCE_STR, borrowed, owned, type SourceStr } from "@/source-events"

interface Delimiter {
  node: TextNode
  char: "*" | "_" | "~"
  /** Characters still available for matching. */
  count: number
  origCount: number
  canOpen: boolean
  canClose: boolean
}

interface BracketOpener {
  node: TextNode
  image: boolean
  active: boolean
  /** Length of the delimiter list when the bracket was seen. */
  delimBottom: number
  start: number
  end: number
}

interface LinkTail {
  end: number
  linkType: LinkType
  destination: SourceStr
  title: SourceStr
  id: SourceStr
}

export function parseInlinesWithDelimiterStack(
  inlineTokens: InlineToken[],
  src: InlineSource,
  referenceMap: Map<string, RefDefinition>,
  trace: DebugTrace
): InlineNode[] {
  const nodes: InlineNode[] = []
  const delims: Delimiter[] = []
  const brackets: BracketOpener[] = []

  const textNode = (start: number, end: number, replacement: string | null = null): TextNode => ({
    type: "text",
    ...toSourceSpan(src, start, end),
    replacement,
  })

  for (let index = 0; index < inlineTokens.length; index++) {
    const currentToken = inlineTokens[index]
    const span = toSourceSpan(src, currentToken.start, currentToken.end)
    switch (currentToken.type) {
      case "text":
        nodes.push(textNode(currentToken.start, currentToken.end, currentToken.replacement))
        break
      case "delim": {
        const node = textNode(currentToken.start, currentToken.end)
        nodes.push(node)
        const runLength = currentToken.end - currentToken.start
        delims.push({
          node,
          char: currentToken.char,
          count: runLength,
          origCount: runLength,
          canOpen: currentToken.canOpen,
          canClose: currentToken.canClose,
        })
        break
      }
      case "code_span":
        nodes.push({ type: "code_span", ...span, content: codeSpanContent(src, currentToken.contentStart, currentToken.contentEnd) })
        break
      case "raw_html":
        nodes.push({ type: "raw_html", ...span })
        break
      case "autolink": {
        const inner = toSourceSpan(src, currentToken.start + 1, currentToken.end - 1)
        nodes.push({
          type: "link",
          ...span,
          linkType: currentToken.email ? "email" : "autolink",
          destination: borrowed(inner.start, inner.end),
          title: EMPTY_SOURCE_STR,
          id: EMPTY_SOURCE_STR,
          children: [{ type: "text", ...inner, replacement: null }],
        })
        break
      }
      case "softbreak":
        nodes.push({ type: "softbreak", ...span })
        break
      case "br":
        nodes.push({ type: "linebreak", ...span })
        break
      case "footnote_ref":
        nodes.push({ type: "footnote_reference", ...span, label: toSourceSpan(src, currentToken.start + 2, currentToken.end - 1) })
        break
      case "math":
        nodes.push({
          type: "math",
          ...span,
          display: currentToken.display,
          content: sourceStrFor(src, currentToken.contentStart, currentToken.contentEnd, false),
        })
        break
      case "lbracket": {
        const node = textNode(currentToken.start, currentToken.end)
        nodes.push(node)
        brackets.push({
          node,
          image: currentToken.image,
          active: true,
          delimBottom: delims.length,
          start: currentToken.start,
          end: currentToken.end,
        })
        break
      }
      case "rbracket": {
        const opener = brackets.pop()
        const tail = opener && opener.active ? matchLinkTail(src, opener, currentToken.end, referenceMap) : null
        const resumeAt = tail ? tokenIndexAfter(inlineTokens, index + 1, tail.end) : -1
        if (!opener || !tail || resumeAt === -1) {
          nodes.push(textNode(currentToken.start, currentToken.end))
          break
        }

        const openerIndex = nodes.indexOf(opener.node)
        const children = nodes.splice(openerIndex + 1)
        nodes.pop()
        processEmphasis(children, delims, opener.delimBottom)
        delims.length = opener.delimBottom

        const linkSpan: Span = {
          start: toSourceSpan(src, opener.start, opener.end).start,
          end: toSourceSpan(src, tail.end - 1, tail.end).end,
        }
        const fields = { linkType: tail.linkType, destination: tail.destination, title: tail.title, id: tail.id }
        if (opener.image) {
          nodes.push({ type: "image", ...linkSpan, ...fields, children })
        } else {
          const link: LinkNode = { type: "link", ...linkSpan, ...fields, children }
          nodes.push(link)
          // links may not contain other links
          for (const earlier of brackets) {
            if (!earlier.image) earlier.active = false
          }
        }
        trace.log(`Matched ${tail.linkType} ${opener.image ? "image" : "link"} at ${linkSpan.start}-${linkSpan.end}`)
        index = resumeAt - 1
        break
      }
    }
  }

  processEmphasis(nodes, delims, 0)
  return nodes
}

/**
 * Index of the first token at or after `end`. Plain text that straddles `end`
 * is cut there in place, leaving its remainder as that token; any other
 * straddling token gives -1.
 */
function tokenIndexAfter(tokens: InlineToken[], from: number, end: number): number {
  for (let k = from; k < tokens.length; k++) {
    const token = tokens[k]
    if (token.start >= end) return k
    if (token.end > end) {
      if (token.type !== "text" || token.replacement !== null) return -1
      tokens[k] = { ...token, start: end }
      return k
    }
  }
  return tokens.length
}

function matchLinkTail(
  src: InlineSource,
  opener: BracketOpener,
  pos: number,
  referenceMap: Map<string, RefDefinition>
): LinkTail | null {
  const v = src.virtual
  if (v[pos] === "(") {
    const inline = parseInlineLinkTail(v, pos)
    if (inline) {
      return {
        end: inline.end,
        linkType: "inline",
        destination: sourceStrFor(src, inline.destStart, inline.destEnd, true),
        title: inline.title ? sourceStrFor(src, inline.title.start, inline.title.end, true) : EMPTY_SOURCE_STR,
        id: EMPTY_SOURCE_STR,
      }
    }
  }

  const labelText = v.slice(opener.end, pos - 1)
  if (v[pos] === "[") {
    const close = findLabelEnd(v, pos)
    if (close !== -1) {
      const label = v.slice(pos + 1, close)
      const collapsed = label.trim() === ""
      const def = referenceMap.get(normalizeRefLabel(collapsed ? labelText : label))
      if (!def) return null
      return {
        end: close + 1,
        linkType: collapsed ? "collapsed" : "reference",
        destination: owned(def.url),
        title: def.title ? owned(def.title) : EMPTY_SOURCE_STR,
        id: collapsed ? sourceStrFor(src, opener.end, pos - 1, false) : sourceStrFor(src, pos + 1, close, false),
      }
    }
  }

  const def = referenceMap.get(normalizeRefLabel(labelText))
  if (!def) return null
  return {
    end: pos,
    linkType: "shortcut",
    destination: owned(def.url),
    title: def.title ? owned(def.title) : EMPTY_SOURCE_STR,
    id: sourceStrFor(src, opener.end, pos - 1, false),
  }
}

function findLabelEnd(v: string, pos: number): number {
  for (let j = pos + 1; j < v.length && j - pos <= 1000; j++) {
    if (v[j] === "\\") {
      j++
      continue
    }
    if (v[j] === "[") return -1
    if (v[j] === "]") return j
  }
  return -1
}

export function parseInlineLinkTail(
  v: string,
  pos: number
): { end: number; destStart: number; destEnd: number; title: Span | null } | null {
  let i = skipLinkSpace(v, pos + 1)
  let destStart: number
  let destEnd: number

  if (v[i] === "<") {
    let j = i + 1
    while (j < v.length && v[j] !== ">" && v[j] !== "<" && v[j] !== "\n") {
      if (v[j] === "\\") j++
      j++
    }
    if (v[j] !== ">") return null
    destStart = i + 1
    destEnd = j
    i = j + 1
  } else {
    let depth = 0
    let j = i
    while (j < v.length) {
      const ch = v[j]
      if (ch === "\\" && isEscapable(v[j + 1])) {
        j += 2
        continue
      }
      if (ch === "(") depth++
      else if (ch === ")") {
        if (depth === 0) break
        depth--
      } else if (/\s/.test(ch) || ch < " ") break
      j++
    }
    if (depth !== 0) return null
    destStart = i
    destEnd = j
    i = j
  }

  const afterDestination = i
  i = skipLinkSpace(v, i)
  let title: Span | null = null
  const opening = v[i]
  if (i > afterDestination && (opening === '"' || opening === "'" || opening === "(")) {
    const closing = opening === "(" ? ")" : opening
    let j = i + 1
    while (j < v.length && v[j] !== closing) {
      if (opening === "(" && v[j] === "(") return null
      if (v[j] === "\\") j++
      j++
    }
    if (j >= v.length) return null
    title = { start: i + 1, end: j }
    i = skipLinkSpace(v, j + 1)
  }

  if (v[i] !== ")") return null
  return { end: i + 1, destStart, destEnd, title }
}

function skipLinkSpace(v: string, i: number): number {
  while (i < v.length && (v[i] === " " || v[i] === "\t" || v[i] === "\n")) i++
  return i
}

/**
 * A borrowed string when the virtual range is a plain source slice, otherwise
 * an owned one. With `unescape`, backslash escapes and entities force an owned
 * string holding the resolved value.
 */
function sourceStrFor(src: InlineSource, start: number, end: number, unescape: boolean): SourceStr {
  const raw = src.virtual.slice(start, end)
  if (unescape && (raw.includes("\\") || raw.includes("&"))) {
    return owned(unescapeString(raw))
  }
  if (!isContiguous(src, start, end)) return owned(raw)
  const span = toSourceSpan(src, start, end)
  return borrowed(span.start, span.end)
}

function codeSpanContent(src: InlineSource, start: number, end: number): SourceStr {
  const normalized = src.virtual.slice(start, end).replace(/\n/g, " ")
  let from = start
  let to = end
  if (normalized.length >= 2 && normalized.startsWith(" ") && normalized.endsWith(" ") && /[^ ]/.test(normalized)) {
    from++
    to--
  }
  if (isContiguous(src, from, to)) {
    const span = toSourceSpan(src, from, to)
    return borrowed(span.start, span.end)
  }
  return owned(normalized.slice(from - start, to - start))
}

function wrapDelimited(kind: "emphasis" | "strong" | "strikethrough", start: number, end: number, children: InlineNode[]): InlineNode {
  switch (kind) {
    case "emphasis":
      return { type: "emphasis", start, end, children }
    case "strong":
      return { type: "strong", start, end, children }
    case "strikethrough":
      return { type: "strikethrough", start, end, children }
  }
}

/**
 * Matches delimiter runs above `bottom` and wraps the nodes between each pair.
 * Matched characters are trimmed off the delimiter text nodes; nodes left
 * empty are removed.
 */
export function processEmphasis(nodes: InlineNode[], delims: Delimiter[], bottom: number) {
  let closerPos = bottom
  while (closerPos < delims.length) {
    const closer = delims[closerPos]
    if (!closer.canClose) {
      closerPos++
      continue
    }

    let openerPos = closerPos - 1
    for (; openerPos >= bottom; openerPos--) {
      const opener = delims[openerPos]
      if (opener.char !== closer.char || !opener.canOpen) continue
      if (closer.char === "~") {
        if (opener.count === closer.count) break
        continue
      }
      const multipleOfThree = (opener.origCount + closer.origCount) % 3 === 0
      if ((opener.canClose || closer.canOpen) && multipleOfThree && (opener.origCount % 3 !== 0 || closer.origCount % 3 !== 0)) {
        continue
      }
      break
    }

    if (openerPos < bottom) {
      if (!closer.canOpen) delims.splice(closerPos, 1)
      else closerPos++
      continue
    }

    const opener = delims[openerPos]
    const used = closer.char === "~" ? closer.count : opener.count >= 2 && closer.count >= 2 ? 2 : 1
    opener.count -= used
    opener.node.end -= used
    closer.count -= used
    closer.node.start += used

    const openerIndex = nodes.indexOf(opener.node)
    const closerIndex = nodes.indexOf(closer.node)
    const middleContent = nodes.splice(openerIndex + 1, closerIndex - openerIndex - 1)
    const kind = closer.char === "~" ? "strikethrough" : used === 2 ? "strong" : "emphasis"
    nodes.splice(openerIndex + 1, 0, wrapDelimited(kind, opener.node.end, closer.node.start, middleContent))

    delims.splice(openerPos + 1, closerPos - openerPos - 1)
    closerPos = openerPos + 1

    if (opener.count === 0) {
      nodes.splice(nodes.indexOf(opener.node), 1)
      delims.splice(openerPos, 1)
      closerPos--
    }
    if (closer.count === 0) {
      nodes.splice(nodes.indexOf(closer.node), 1)
      delims.splice(closerPos, 1)
    }
  }
}

export function isWhitespace(ch: string): boolean {
  return ch === "" || /\s/u.test(ch)
}

export function isPunctuation(ch: string): boolean {
  return ch !== "" && /[\p{P}\p{S}]/u.test(ch)
}

export function isLeftFlanking(previousChar: string, nextChar: string): boolean {
  if (isWhitespace(nextChar)) return false
  return !isPunctuation(nextChar) || isWhitespace(previousChar) || isPunctuation(previousChar)
}

export function isRightFlanking(previousChar: string, nextChar: string): boolean {
  if (isWhitespace(previousChar)) return false
  return !isPunctuation(previousChar) || isWhitespace(nextChar) || isPunctuation(nextChar)
}
