/**
 * Wiki tables (`{| ... |}`) → Markdown pipe tables
 *
 * Handles captions (`|+`), row breaks (`|-`), header cells (`!`, `!!`),
 * data cells (`|`, `||`) and cell attributes (`style="..." | text`).
 * The first row becomes the header row. Tables nesting other tables are
 * dropped whole; Markdown has nothing to put them in.
 */

import type { Diagnostic } from './types.js'
import { indexAtTopLevel } from './scanner.js'

const PIPE = 124

export interface TableConversion {
  /** Markdown blocks: the caption, if any, then the table */
  blocks: string[]
  /** Index of the first line after the table */
  next: number
}

export function isTableStart(line: string): boolean {
  return line.trimStart().startsWith('{|')
}

/**
 * Convert the table opening at `lines[start]`.
 * Returns undefined when the table is never closed.
 */
export function convertTable(
  lines: readonly string[],
  start: number,
  formatCell: (text: string) => string,
  diagnostics: Diagnostic[]
): TableConversion | undefined {
  const end = findTableEnd(lines, start)
  if (end === -1) return undefined

  const body = lines.slice(start + 1, end).map(l => l.trim())
  const next = end + 1

  if (body.some(isTableStart)) {
    diagnostics.push({
      kind: 'unhandled-table',
      message: 'Dropped nested table',
      detail: (lines[start] ?? '').trim().slice(0, 40),
    })
    return { blocks: [], next }
  }

  let caption: string | undefined
  const rows: string[][] = []
  let row: string[] = []
  const endRow = (): void => {
    if (row.length > 0) rows.push(row)
    row = []
  }

  for (const line of body) {
    if (line.startsWith('|+')) {
      caption = cellContent(line.slice(2))
    } else if (line.startsWith('|-')) {
      endRow()
    } else if (line.startsWith('!')) {
      row.push(...splitCells(line.slice(1), ['!!', '||']).map(cellContent))
    } else if (line.startsWith('|')) {
      row.push(...splitCells(line.slice(1), ['||']).map(cellContent))
    } else if (line && row.length > 0) {
      // continuation of the last cell
      row[row.length - 1] = `${row[row.length - 1] ?? ''} ${line}`.trim()
    }
  }
  endRow()

  const blocks: string[] = []
  if (caption) blocks.push(formatCell(caption))
  const header = rows[0]
  if (!header) return { blocks, next }

  const width = Math.max(...rows.map(r => r.length))
  const render = (cells: readonly string[]): string => {
    const padded = Array.from({ length: width }, (_, i) => escapePipes(formatCell(cells[i] ?? '')))
    return `| ${padded.join(' | ')} |`
  }
  const table = [
    render(header),
    `| ${Array.from({ length: width }, () => '---').join(' | ')} |`,
    ...rows.slice(1).map(render),
  ]
  blocks.push(table.join('\n'))
  return { blocks, next }
}

/** Index of the `|}` closing the table at `start`, or -1 */
function findTableEnd(lines: readonly string[], start: number): number {
  let depth = 0
  for (let i = start; i < lines.length; i++) {
    const line = (lines[i] ?? '').trimStart()
    if (line.startsWith('{|')) depth++
    else if (line.startsWith('|}')) depth--
    if (depth === 0) return i
  }
  return -1
}

/** Split on doubled separators outside `[[...]]` and `{{...}}` */
function splitCells(text: string, separators: readonly string[]): string[] {
  const cells: string[] = []
  let rest = text
  let idx = firstSeparator(rest, separators)
  while (idx !== -1) {
    cells.push(rest.slice(0, idx))
    rest = rest.slice(idx + 2)
    idx = firstSeparator(rest, separators)
  }
  cells.push(rest)
  return cells
}

function firstSeparator(text: string, separators: readonly string[]): number {
  let best = -1
  for (const sep of separators) {
    const code = sep.charCodeAt(0)
    let from = 0
    while (from < text.length) {
      const idx = indexAtTopLevel(text.slice(from), code)
      if (idx === -1) break
      const at = from + idx
      if (text.charCodeAt(at + 1) === code) {
        if (best === -1 || at < best) best = at
        break
      }
      from = at + 1
    }
  }
  return best
}

/** Cell text without its attributes */
function cellContent(cell: string): string {
  const idx = indexAtTopLevel(cell, PIPE)
  return (idx === -1 ? cell : cell.slice(idx + 1)).trim()
}

function escapePipes(text: string): string {
  return text.replace(/\\?\|/g, '\\|')
}
