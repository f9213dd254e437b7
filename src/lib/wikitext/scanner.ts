/**
 * Balanced-span scanner for wikitext
 *
 * Locates top-level `{{...}}` templates and `[[...]]` links by counting
 * nesting depth, and splits template bodies on top-level pipes. Every
 * other component works on the spans found here instead of running
 * ad-hoc regexes over the whole page.
 */

import type { Span, TemplateSpan, TemplateParam, ParsedTemplate } from './types.js'

// Character codes for the hot loop
const OPEN_BRACE = 123    // {
const CLOSE_BRACE = 125   // }
const OPEN_BRACKET = 91   // [
const CLOSE_BRACKET = 93  // ]
const PIPE = 124          // |
const EQUALS = 61         // =

type Delimiter = 'brace' | 'bracket'

const CODES: Record<Delimiter, [number, number]> = {
  brace: [OPEN_BRACE, CLOSE_BRACE],
  bracket: [OPEN_BRACKET, CLOSE_BRACKET],
}

/**
 * Find the end (exclusive) of a doubled-delimiter span opening at `start`.
 * Returns -1 when the span never closes.
 */
export function matchSpan(text: string, start: number, delimiter: Delimiter): number {
  const [open, close] = CODES[delimiter]
  let depth = 0
  let i = start
  const len = text.length

  while (i < len - 1) {
    const c = text.charCodeAt(i)
    if (c === open && text.charCodeAt(i + 1) === open) {
      depth++
      i += 2
      continue
    }
    if (c === close && text.charCodeAt(i + 1) === close) {
      depth--
      i += 2
      if (depth === 0) return i
      continue
    }
    i++
  }
  return -1
}

function findSpans(text: string, delimiter: Delimiter): Span[] {
  const [open] = CODES[delimiter]
  const spans: Span[] = []
  const len = text.length
  let i = 0

  while (i < len - 1) {
    if (text.charCodeAt(i) === open && text.charCodeAt(i + 1) === open) {
      const end = matchSpan(text, i, delimiter)
      if (end !== -1) {
        spans.push({ start: i, end, body: text.slice(i, end) })
        i = end
        continue
      }
      // Unbalanced opener: skip it, keep scanning
      i += 2
      continue
    }
    i++
  }
  return spans
}

/**
 * Normalize a template name: trim, underscores to spaces, collapse
 * whitespace, lowercase, drop an explicit `Template:` prefix.
 */
export function normalizeTemplateName(name: string): string {
  return name
    .replace(/_/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .replace(/^template:\s*/, '')
}

/**
 * Top-level `{{...}}` spans. Nested templates stay inside their parent.
 */
export function findTemplates(text: string): TemplateSpan[] {
  return findSpans(text, 'brace').map(span => ({
    ...span,
    name: normalizeTemplateName(splitTemplateParams(span.body)[0] ?? ''),
  }))
}

/**
 * Top-level `[[...]]` spans. Links nested in file captions stay inside
 * their parent.
 */
export function findLinks(text: string): Span[] {
  return findSpans(text, 'bracket')
}

/**
 * Index of the first `char` outside nested `{{}}`/`[[]]`, or -1.
 */
export function indexAtTopLevel(text: string, charCode: number): number {
  let braces = 0
  let brackets = 0
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i)
    const next = text.charCodeAt(i + 1)
    if (c === OPEN_BRACE && next === OPEN_BRACE) { braces++; i++; continue }
    if (c === CLOSE_BRACE && next === CLOSE_BRACE && braces > 0) { braces--; i++; continue }
    if (c === OPEN_BRACKET && next === OPEN_BRACKET) { brackets++; i++; continue }
    if (c === CLOSE_BRACKET && next === CLOSE_BRACKET && brackets > 0) { brackets--; i++; continue }
    if (c === charCode && braces === 0 && brackets === 0) return i
  }
  return -1
}

/**
 * Split the inside of a template (outer braces optional) on top-level
 * pipes. The first element is the template name as written.
 */
export function splitTemplateParams(body: string): string[] {
  let inner = body
  if (inner.startsWith('{{') && inner.endsWith('}}')) inner = inner.slice(2, -2)

  const parts: string[] = []
  let rest = inner
  let idx = indexAtTopLevel(rest, PIPE)
  while (idx !== -1) {
    parts.push(rest.slice(0, idx))
    rest = rest.slice(idx + 1)
    idx = indexAtTopLevel(rest, PIPE)
  }
  parts.push(rest)
  return parts
}

/**
 * Parse a template into its name and parameters.
 * `key=value` parameters are named; the others get positional keys
 * "1", "2", ... in order of appearance.
 */
export function parseTemplate(body: string): ParsedTemplate {
  const [head = '', ...rest] = splitTemplateParams(body)
  const params: TemplateParam[] = []
  let position = 0

  for (const part of rest) {
    const eq = indexAtTopLevel(part, EQUALS)
    if (eq > 0) {
      const key = part.slice(0, eq).trim()
      if (key.length > 0) {
        params.push({ key, value: part.slice(eq + 1).trim(), positional: false })
        continue
      }
    }
    position++
    params.push({ key: String(position), value: part.trim(), positional: true })
  }

  return { rawName: head.trim(), name: normalizeTemplateName(head), params }
}

/**
 * Value of a parameter by key (first match), or undefined.
 */
export function getParam(template: ParsedTemplate, key: string): string | undefined {
  return template.params.find(p => p.key === key)?.value
}

/**
 * Remove spans from text in a single pass.
 */
export function stripSpans(text: string, spans: readonly { start: number; end: number }[]): string {
  if (spans.length === 0) return text
  const sorted = [...spans].sort((a, b) => a.start - b.start)
  const parts: string[] = []
  let lastEnd = 0
  for (const s of sorted) {
    if (s.start > lastEnd) parts.push(text.slice(lastEnd, s.start))
    lastEnd = Math.max(lastEnd, s.end)
  }
  if (lastEnd < text.length) parts.push(text.slice(lastEnd))
  return parts.join('')
}
