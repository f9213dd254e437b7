/**
 * Wikitext → Markdown formatter
 *
 * Block rules (headers, lists, rules) are decided per line; inline rules
 * (links, external links, emphasis) per token within a line. Templates are
 * resolved first, over the whole fragment, since they may span lines.
 *
 * The formatter never throws: malformed constructs are passed through and
 * reported in `diagnostics`. Formatting its own output returns it unchanged,
 * headings aside: a line starting with `#` is always a numbered list item.
 */

import type { Diagnostic, FormatContext, FormatResult } from './types.js'
import { findLinks, matchSpan } from './scanner.js'
import { preprocess } from './preprocess.js'
import { renderTemplates } from './templates.js'
import { resolveEmphasis } from './emphasis.js'
import { resolveLink, LINK_TRAIL } from './links.js'
import { convertTable, isTableStart } from './tables.js'

const WIKI_HEADING = /^(={1,6})\s*(.+?)\s*\1\s*$/
const LIST_ITEM = /^([*#]+)\s*(.*)$/
const HORIZONTAL_RULE = /^-{4,}\s*$/
const EXTERNAL_LINK = /^\[((?:https?|ftp):\/\/[^\s\]]+|mailto:[^\s\]]+)(?:\s+([^\]]*))?\]/i
const APOSTROPHE = 39

type InlineToken =
  | { type: 'text'; value: string }
  | { type: 'markup'; value: string }
  | { type: 'quotes'; length: number; before: string }

interface OutputLine {
  /** One line, or several for a table */
  text: string
  /** Headings and tables get a blank line on both sides */
  block: boolean
}

/**
 * Format a wikitext fragment as Markdown.
 */
export function formatWikitext(wiki: string, ctx: FormatContext = {}): FormatResult {
  return formatMarkup(preprocess(wiki), ctx)
}

/**
 * Format wikitext that already went through `preprocess`.
 */
export function formatMarkup(markup: string, ctx: FormatContext = {}): FormatResult {
  const diagnostics: Diagnostic[] = []
  let text = renderTemplates(markup, diagnostics)
  text = joinMultilineLinks(text)

  const lines = text.split('\n')
  const out: OutputLine[] = []

  let i = 0
  while (i < lines.length) {
    const line = lines[i] ?? ''

    if (isTableStart(line)) {
      const table = convertTable(lines, i, cell => formatInline(cell, ctx, diagnostics), diagnostics)
      if (table) {
        for (const block of table.blocks) out.push({ text: block, block: true })
        i = table.next
        continue
      }
      diagnostics.push({
        kind: 'malformed-markup',
        message: 'Unclosed table passed through',
        detail: line.trim().slice(0, 40),
      })
    }

    const formatted = formatLine(line, ctx, diagnostics)
    if (formatted) out.push(formatted)
    i++
  }

  return { markdown: isolateBlocks(out).join('\n'), diagnostics }
}

function formatLine(line: string, ctx: FormatContext, diagnostics: Diagnostic[]): OutputLine | undefined {
  const heading = WIKI_HEADING.exec(line)
  if (heading) {
    const level = (heading[1] ?? '').length
    // Level 1 is the page title, which is not repeated in the body
    if (level === 1) return undefined
    const content = formatInline(heading[2] ?? '', ctx, diagnostics)
    return { text: `${'#'.repeat(level - 1)} ${content}`, block: true }
  }

  if (HORIZONTAL_RULE.test(line)) {
    return { text: '---', block: false }
  }

  const item = LIST_ITEM.exec(line)
  if (item && !isEmphasisLine(line)) {
    const markers = item[1] ?? ''
    const marker = markers.endsWith('#') ? '1.' : '-'
    const indent = '  '.repeat(markers.length - 1)
    const content = formatInline(item[2] ?? '', ctx, diagnostics)
    return { text: `${indent}${marker} ${content}`, block: false }
  }

  return { text: formatInline(line, ctx, diagnostics), block: false }
}

/**
 * Format the inline constructs of a single line.
 */
export function formatInline(line: string, ctx: FormatContext = {}, diagnostics: Diagnostic[] = []): string {
  const tokens: InlineToken[] = []
  let buf = ''
  const flush = (): void => {
    if (buf) tokens.push({ type: 'text', value: buf })
    buf = ''
  }

  let i = 0
  while (i < line.length) {
    const c = line[i]

    if (c === '[' && line[i + 1] === '[') {
      const end = matchSpan(line, i, 'bracket')
      if (end === -1) {
        diagnostics.push({
          kind: 'malformed-markup',
          message: 'Unclosed link brackets passed through',
          detail: line.slice(i, i + 40),
        })
        buf += '[['
        i += 2
        continue
      }
      const raw = line.slice(i, end)
      // Markdown embed (`![[...]]`) from an earlier pass
      if (line[i - 1] === '!') {
        buf += raw
        i = end
        continue
      }
      const trail = LINK_TRAIL.exec(line.slice(end))?.[0] ?? ''
      const rendered = resolveLink(raw, trail, ctx)
      if (rendered === undefined) {
        buf += raw
        i = end
        continue
      }
      flush()
      tokens.push({ type: 'markup', value: rendered })
      i = end + trail.length
      continue
    }

    if (c === '[') {
      const ext = EXTERNAL_LINK.exec(line.slice(i))
      if (ext) {
        const url = ext[1] ?? ''
        const label = (ext[2] ?? '').trim()
        flush()
        tokens.push({
          type: 'markup',
          value: label ? `[${formatInline(label, ctx, diagnostics)}](${url})` : `<${url}>`,
        })
        i += ext[0].length
        continue
      }
    }

    if (c === "'" && line[i + 1] === "'") {
      let length = 0
      while (line.charCodeAt(i + length) === APOSTROPHE) length++
      flush()
      tokens.push({ type: 'quotes', length, before: line.slice(Math.max(0, i - 2), i) })
      i += length
      continue
    }

    buf += c
    i++
  }
  flush()

  const quotes = tokens.flatMap(t => (t.type === 'quotes' ? [t] : []))
  const emphasis = resolveEmphasis(quotes.map(q => q.length), quotes.map(q => q.before))
  let run = 0
  return tokens
    .map(t => (t.type === 'quotes' ? emphasis[run++] ?? '' : t.value))
    .join('')
}

/**
 * A line opening with an asterisk run glued to text, where the same run
 * appears again later (`**Gandalf** is`), is Markdown emphasis rather
 * than a list item.
 */
function isEmphasisLine(line: string): boolean {
  const m = /^(\*+)[^\s*]/.exec(line)
  if (!m) return false
  const run = m[1] ?? ''
  return line.indexOf(run, run.length + 1) !== -1
}

/** Collapse newlines inside `[[...]]` so links survive line splitting */
function joinMultilineLinks(text: string): string {
  const spans = findLinks(text).filter(s => s.body.includes('\n'))
  if (spans.length === 0) return text
  let out = ''
  let last = 0
  for (const span of spans) {
    out += text.slice(last, span.start) + span.body.replace(/\s*\n\s*/g, ' ')
    last = span.end
  }
  return out + text.slice(last)
}

/** Ensure a blank line before and after every heading and table */
function isolateBlocks(lines: readonly OutputLine[]): string[] {
  const result: string[] = []
  lines.forEach((line, i) => {
    const prev = result[result.length - 1]
    if (line.block && prev !== undefined && prev.trim() !== '') result.push('')
    result.push(line.text)
    const next = lines[i + 1]
    if (line.block && next !== undefined && next.text.trim() !== '') result.push('')
  })
  return result
}
