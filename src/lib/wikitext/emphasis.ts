/**
 * Apostrophe-run emphasis (`''italic''`, `'''bold'''`, `'''''both'''''`)
 *
 * Works on the run lengths of one line, in order. Precedence is explicit:
 * a run of 5 is bold+italic, 3 is bold, 2 is italic; a run of 4 is one
 * literal apostrophe followed by bold, and longer runs keep the extra
 * apostrophes literally in front of a run of 5. When a line holds an odd
 * number of both italic and bold runs, one bold run is read as a literal
 * apostrophe plus italic (`''Frodo'''s`), picked the way MediaWiki does.
 * Openers that are still open at the end of the line are emitted as written.
 */

type EmphasisKind = 'bold' | 'italic'

interface Part {
  kind: EmphasisKind
  matched: boolean
}

const MARKDOWN: Record<EmphasisKind, string> = { bold: '**', italic: '*' }
const WIKI: Record<EmphasisKind, string> = { bold: "'''", italic: "''" }

interface Run {
  /** Apostrophes kept literally in front */
  prefix: string
  /** 0, 2, 3 or 5 */
  n: number
}

function normalizeRun(length: number): Run {
  if (length < 2) return { prefix: "'".repeat(length), n: 0 }
  if (length === 4) return { prefix: "'", n: 3 }
  if (length > 5) return { prefix: "'".repeat(length - 5), n: 5 }
  return { prefix: '', n: length }
}

/**
 * Index of the bold run to split when italics and bolds are both odd:
 * one after a single-letter word first, then after a longer word, then
 * after a space.
 */
function boldRunToSplit(runs: readonly Run[], before: readonly string[]): number {
  let singleLetter = -1
  let multiLetter = -1
  let space = -1
  runs.forEach((run, i) => {
    if (run.n !== 3) return
    const text = before[i] ?? ''
    const x1 = text.charAt(text.length - 1)
    const x2 = text.charAt(text.length - 2)
    if (x1 === ' ') {
      if (space === -1) space = i
    } else if (x2 === ' ') {
      if (singleLetter === -1) singleLetter = i
    } else if (multiLetter === -1) {
      multiLetter = i
    }
  })
  if (singleLetter !== -1) return singleLetter
  if (multiLetter !== -1) return multiLetter
  return space
}

/**
 * Resolve the apostrophe runs of a line into their Markdown replacements.
 * `before` holds, per run, the text just in front of it (two characters
 * are enough) and only matters for lines with odd italic and bold counts.
 *
 * @example
 * resolveEmphasis([3, 3])  // ['**', '**']
 * resolveEmphasis([2, 3])  // ['*', "'*"]  (''Frodo'''s)
 * resolveEmphasis([2])     // ["''"]  (never closed)
 */
export function resolveEmphasis(runs: readonly number[], before: readonly string[] = []): string[] {
  const open: Part[] = []
  const prefixes: string[] = []
  const parts: Part[][] = []

  const find = (kind: EmphasisKind): Part | undefined => open.find(p => p.kind === kind)

  const normalized = runs.map(normalizeRun)
  const italics = normalized.filter(r => r.n === 2 || r.n === 5).length
  const bolds = normalized.filter(r => r.n === 3 || r.n === 5).length
  if (italics % 2 === 1 && bolds % 2 === 1) {
    const run = normalized[boldRunToSplit(normalized, before)]
    if (run) {
      run.prefix += "'"
      run.n = 2
    }
  }

  for (const { prefix, n } of normalized) {

    const here: Part[] = []
    const openPart = (kind: EmphasisKind): void => {
      const part: Part = { kind, matched: false }
      here.push(part)
      open.push(part)
    }
    const closePart = (part: Part): void => {
      part.matched = true
      open.splice(open.indexOf(part), 1)
      here.push({ kind: part.kind, matched: true })
    }

    const bold = find('bold')
    const italic = find('italic')
    if (n === 2) {
      if (italic) closePart(italic)
      else openPart('italic')
    } else if (n === 3) {
      if (bold) closePart(bold)
      else openPart('bold')
    } else if (n === 5) {
      if (bold && italic) {
        // innermost first
        for (const part of [...open].reverse()) closePart(part)
      } else if (bold) {
        closePart(bold)
        openPart('italic')
      } else if (italic) {
        closePart(italic)
        openPart('bold')
      } else {
        openPart('bold')
        openPart('italic')
      }
    }

    prefixes.push(prefix)
    parts.push(here)
  }

  return parts.map((here, i) =>
    (prefixes[i] ?? '') + here.map(p => (p.matched ? MARKDOWN[p.kind] : WIKI[p.kind])).join('')
  )
}
