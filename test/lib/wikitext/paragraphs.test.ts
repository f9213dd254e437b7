/**
 * Tests for paragraph unwrapping
 */

import { describe, it, expect } from 'vitest'
import { tidyBlankLines, unwrapParagraphs } from '../../../src/lib/wikitext/paragraphs.js'

describe('unwrapParagraphs', () => {
  it('should join plain lines of one paragraph', () => {
    expect(unwrapParagraphs('one\ntwo\n\n- item\nthree')).toBe('one two\n\n- item\nthree')
  })

  it('should leave headings, quotes and embeds on their own lines', () => {
    const text = '# Title\n> quoted\n![[images/Ring.png]]\n---'
    expect(unwrapParagraphs(text)).toBe(text)
  })

  it('should leave fenced code untouched', () => {
    const text = '```\na\nb\n```'
    expect(unwrapParagraphs(text)).toBe(text)
  })

  it('should drop trailing whitespace', () => {
    expect(unwrapParagraphs('a  \nb\t')).toBe('a b')
  })
})

describe('tidyBlankLines', () => {
  it('should collapse blank runs and trim the ends', () => {
    expect(tidyBlankLines('\n\na\n\n\n\nb\n')).toBe('a\n\nb')
  })

  it('should keep single blank lines', () => {
    expect(tidyBlankLines('a\n\nb')).toBe('a\n\nb')
  })
})
