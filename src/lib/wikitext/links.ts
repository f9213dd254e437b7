/**
 * Internal link resolution: `[[Target|Alias]]` → vault cross-reference
 */

import type { WikiLink, FormatContext } from './types.js'
import { indexAtTopLevel } from './scanner.js'
import { isFileTarget, resolveImage, renderImageEmbed, DEFAULT_IMAGE_DIR } from './images.js'

const PIPE = 124
const CATEGORY_PREFIX = /^\s*category\s*:/i

/** Letters directly after `]]` that MediaWiki folds into the link text */
export const LINK_TRAIL = /^[a-z]+/

/**
 * Normalize a page title: underscores to spaces, whitespace collapsed,
 * trimmed. Case is preserved.
 */
export function normalizeTitle(title: string): string {
  return title.replace(/_/g, ' ').replace(/\s+/g, ' ').trim()
}

/** True for `[[Category:...]]` (but not the `[[:Category:...]]` link form) */
export function isCategoryLink(raw: string): boolean {
  return CATEGORY_PREFIX.test(raw.slice(2, -2))
}

/**
 * Parse a `[[...]]` token. Returns undefined when the brackets hold no
 * target at all (`[[]]`, `[[|x]]`).
 *
 * Without an alias the display text is the target exactly as written, so
 * `[[Foo_Bar]]` keeps showing "Foo_Bar" while linking to "Foo Bar".
 */
export function parseWikiLink(raw: string, trail: string = ''): WikiLink | undefined {
  let inner = raw.slice(2, -2)
  const pipe = indexAtTopLevel(inner, PIPE)
  let alias: string | undefined
  if (pipe !== -1) {
    alias = inner.slice(pipe + 1).trim()
    // `\|` is a pipe escaped inside a Markdown table
    inner = inner.slice(0, pipe).replace(/\\$/, '')
    if (alias.length === 0) alias = undefined
  }

  // Leading colon: visible link into a special namespace
  const written = inner.trim().replace(/^:\s*/, '')
  let target = written
  let anchor: string | undefined
  const hash = written.indexOf('#')
  if (hash !== -1) {
    anchor = written.slice(hash + 1).trim()
    target = written.slice(0, hash)
  }
  target = normalizeTitle(target)
  if (target.length === 0 && !anchor) return undefined

  const link: WikiLink = { target, display: (alias ?? written) + trail }
  if (anchor) link.anchor = anchor
  return link
}

/** Render a link as `[[Target]]` or `[[Target|Display]]` */
export function renderWikiLink(link: WikiLink): string {
  const full = link.anchor ? `${link.target}#${link.anchor}` : link.target
  return link.display === full ? `[[${full}]]` : `[[${full}|${link.display}]]`
}

/**
 * Resolve one `[[...]]` token to Markdown.
 *
 * - category declarations render to nothing (they are metadata)
 * - file links become image embeds and are reported via `onImage`
 * - everything else becomes a cross-reference; the target is reported
 *   via `onLink` whether or not a page exists for it
 *
 * Returns undefined when the token is not a usable link; the caller keeps
 * the raw text.
 */
export function resolveLink(raw: string, trail: string, ctx: FormatContext = {}): string | undefined {
  if (isCategoryLink(raw)) return trail

  const inner = raw.slice(2, -2)
  if (isFileTarget(inner)) {
    const pipe = indexAtTopLevel(inner, PIPE)
    const name = pipe === -1 ? inner : inner.slice(0, pipe)
    const image = resolveImage(name, ctx.imageDir ?? DEFAULT_IMAGE_DIR)
    if (image.filename.length === 0) return undefined
    ctx.onImage?.(image)
    return renderImageEmbed(image) + trail
  }

  const link = parseWikiLink(raw, trail)
  if (!link) return undefined
  if (link.target.length > 0) ctx.onLink?.(link.target)
  return renderWikiLink(link)
}
