/**
 * Redirect page detection
 */

import { normalizeTitle } from './links.js'

const REDIRECT_PATTERN = /^\s*#REDIRECT\s*:?\s*\[\[([^\]|#]+)/i

/**
 * Target of a redirect page: the `<redirect title>` attribute from the
 * dump when present, else the `#REDIRECT [[Target]]` line of the body.
 */
export function getRedirectTarget(page: { text: string; redirect?: string }): string | undefined {
  if (page.redirect !== undefined && page.redirect.trim().length > 0) {
    return normalizeTitle(page.redirect)
  }
  const match = REDIRECT_PATTERN.exec(page.text)
  const target = match?.[1] ? normalizeTitle(match[1]) : ''
  return target.length > 0 ? target : undefined
}
