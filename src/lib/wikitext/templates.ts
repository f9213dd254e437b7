/**
 * Inline template policy
 *
 * A short allow-list of templates that only wrap text keeps that text;
 * every other `{{...}}` is dropped and reported as `unhandled-template`.
 * Templates are never evaluated.
 */

import type { Diagnostic, ParsedTemplate } from './types.js'
import { findTemplates, getParam, parseTemplate } from './scanner.js'

export type TemplateRenderer = (template: ParsedTemplate) => string

const firstParam: TemplateRenderer = t => getParam(t, '1') ?? ''

/** Templates rendered to (wiki)text; keys are normalized names */
export const TEXT_TEMPLATES: Readonly<Record<string, TemplateRenderer>> = {
  'nowrap': firstParam,
  'nobr': firstParam,
  'small': firstParam,
  'lang': t => getParam(t, '2') ?? getParam(t, 'text') ?? '',
  'quote': t => {
    const text = getParam(t, 'text') ?? getParam(t, '1') ?? ''
    return text ? `> ${text}` : ''
  },
  'main': t => {
    const targets = t.params.filter(p => p.positional && p.value).map(p => `[[${p.value}]]`)
    return targets.length > 0 ? `Main article: ${targets.join(', ')}` : ''
  },
}

/** Nested templates inside rendered text are expanded this many levels */
const MAX_DEPTH = 8

/**
 * Replace every top-level template in `text` according to the policy.
 * Unbalanced `{{` is left in place and reported as malformed markup.
 */
export function renderTemplates(text: string, diagnostics: Diagnostic[], depth: number = 0): string {
  const spans = findTemplates(text)
  let out = ''
  let last = 0

  for (const span of spans) {
    out += text.slice(last, span.start)
    last = span.end

    const renderer = TEXT_TEMPLATES[span.name]
    if (!renderer || depth >= MAX_DEPTH) {
      diagnostics.push({
        kind: 'unhandled-template',
        message: `Dropped template {{${span.name}}}`,
        detail: span.name,
      })
      continue
    }
    out += renderTemplates(renderer(parseTemplate(span.body)), diagnostics, depth + 1)
  }
  out += text.slice(last)

  if (depth === 0 && out.includes('{{')) {
    diagnostics.push({
      kind: 'malformed-markup',
      message: 'Unbalanced template braces passed through',
      detail: excerpt(out, out.indexOf('{{')),
    })
  }
  return out
}

function excerpt(text: string, at: number): string {
  return text.slice(at, at + 40).split('\n')[0] ?? ''
}
