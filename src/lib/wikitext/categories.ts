/**
 * Category declarations → tags
 */

import { findLinks, indexAtTopLevel } from './scanner.js'
import { isCategoryLink } from './links.js'

const PIPE = 124

export interface CategoryExtraction {
  /** Text with every category declaration removed */
  text: string
  /** Category names as written, in order of appearance */
  categories: string[]
  /** Normalized tags, deduplicated, in order of first appearance */
  tags: string[]
}

/**
 * Normalize a category or type name into a tag: trimmed, lowercase, runs
 * of whitespace and underscores collapsed to one `_`. May return '' for
 * names with no usable characters; callers drop those.
 */
export function normalizeTag(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[\s_]+/g, '_')
    .replace(/^_+|_+$/g, '')
}

/**
 * Remove `[[Category:Name]]` / `[[Category:Name|sort key]]` declarations
 * and collect their tags. A line left holding only whitespace after the
 * removal is dropped entirely.
 */
export function extractCategories(text: string): CategoryExtraction {
  const categories: string[] = []
  const tags = new Set<string>()
  const kept: string[] = []

  for (const line of text.split('\n')) {
    const spans = findLinks(line).filter(s => isCategoryLink(s.body))
    if (spans.length === 0) {
      kept.push(line)
      continue
    }

    let rest = ''
    let last = 0
    for (const span of spans) {
      rest += line.slice(last, span.start)
      last = span.end

      const inner = span.body.slice(2, -2)
      const afterPrefix = inner.slice(inner.indexOf(':') + 1)
      const pipe = indexAtTopLevel(afterPrefix, PIPE)
      const name = (pipe === -1 ? afterPrefix : afterPrefix.slice(0, pipe)).trim()
      if (name.length === 0) continue

      categories.push(name)
      const tag = normalizeTag(name)
      if (tag.length > 0) tags.add(tag)
    }
    rest = (rest + line.slice(last)).trimEnd()

    if (rest.trim().length > 0) kept.push(rest)
  }

  return { text: kept.join('\n'), categories, tags: [...tags] }
}
