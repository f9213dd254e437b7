/**
 * Paragraph unwrapping for converted Markdown
 */

// Lines that stand on their own: list items, headings, quotes, tables,
// rules, embeds
const BLOCK_LINE = /^(\s*[-*+]\s+|\s*\d+\.\s|\s*#|\s*>|\s*\||\s*\{\||\s*!|---\s*$)/
const FENCE = /^(```|~~~)/

/**
 * Join consecutive plain-text lines into one line per paragraph, the way
 * MediaWiki renders single newlines. Blank lines, block lines and fenced
 * code are left as they are; trailing whitespace is removed.
 */
export function unwrapParagraphs(text: string): string {
  const lines = text.split('\n').map(line => line.trimEnd())
  const out: string[] = []
  const buffer: string[] = []
  let inFence = false

  const flush = (): void => {
    if (buffer.length > 0) out.push(buffer.join(' '))
    buffer.length = 0
  }

  for (const line of lines) {
    const stripped = line.trim()

    if (FENCE.test(stripped)) {
      flush()
      inFence = !inFence
      out.push(line)
      continue
    }
    if (inFence) {
      out.push(line)
      continue
    }

    if (stripped.length === 0) {
      flush()
      out.push('')
    } else if (BLOCK_LINE.test(line)) {
      flush()
      out.push(line)
    } else {
      buffer.push(stripped)
    }
  }
  flush()
  return out.join('\n')
}

/** Collapse runs of blank lines to one and trim the ends */
export function tidyBlankLines(text: string): string {
  return text.replace(/\n[ \t]*\n(?:[ \t]*\n)+/g, '\n\n').trim()
}
