/**
 * Tests for the wikitext → Markdown formatter
 */

import { describe, it, expect, vi } from 'vitest'
import { formatWikitext, formatInline } from '../../../src/lib/wikitext/format.js'
import type { Diagnostic, ImageReference } from '../../../src/lib/wikitext/types.js'

const md = (wiki: string): string => formatWikitext(wiki).markdown

describe('formatWikitext', () => {
  describe('emphasis', () => {
    it('should convert bold to Markdown', () => {
      const result = md("x '''y''' z")
      expect(result).toBe('x **y** z')
      expect(result).not.toContain("'''")
    })

    it("should read a bold run after an odd italic run as apostrophe plus italic", () => {
      expect(md("''Frodo'''s ring")).toBe("*Frodo'*s ring")
    })

    it('should convert italic and bold-italic', () => {
      expect(md("''Red Book''")).toBe('*Red Book*')
      expect(md("'''''One Ring'''''")).toBe('***One Ring***')
    })
  })

  describe('block structure', () => {
    it('should demote wiki headings by one level and isolate them', () => {
      expect(md('== History ==\nText')).toBe('# History\n\nText')
      expect(md('=== Early life ===')).toBe('## Early life')
    })

    it('should drop a level-1 heading', () => {
      expect(md('= Title =\nBody')).toBe('Body')
    })

    it('should convert bullet and numbered lists', () => {
      expect(md('* one\n** two\n# first')).toBe('- one\n  - two\n1. first')
    })

    it('should read a lone hash line as a numbered list item', () => {
      expect(md('Steps:\n\n# Take the ring\n\nDone.')).toBe('Steps:\n\n1. Take the ring\n\nDone.')
      expect(md('#Take the ring')).toBe('1. Take the ring')
    })

    it('should convert horizontal rules', () => {
      expect(md('----')).toBe('---')
    })
  })

  describe('links', () => {
    it('should keep internal links and report their targets', () => {
      const onLink = vi.fn()
      const result = formatWikitext("'''Gandalf''' is a wizard. See [[Frodo|the hobbit]].", { onLink })
      expect(result.markdown).toBe('**Gandalf** is a wizard. See [[Frodo|the hobbit]].')
      expect(onLink).toHaveBeenCalledWith('Frodo')
      expect(result.diagnostics).toEqual([])
    })

    it('should fold link trails into the display text', () => {
      expect(md('[[Hobbit]]s live here')).toBe('[[Hobbit|Hobbits]] live here')
    })

    it('should join links broken over several lines', () => {
      expect(md('[[Frodo\nBaggins]]')).toBe('[[Frodo Baggins]]')
    })

    it('should convert external links', () => {
      expect(md('[https://example.org Example site]')).toBe('[Example site](https://example.org)')
      expect(md('[https://example.org]')).toBe('<https://example.org>')
    })

    it('should turn file links into embeds and report the image', () => {
      const images: ImageReference[] = []
      const result = formatWikitext('[[File:Bag End.png|thumb|The hole]]', {
        onImage: image => images.push(image),
      })
      expect(result.markdown).toBe('![[images/Bag_End.png]]')
      expect(images).toEqual([{ filename: 'Bag_End.png', path: 'images/Bag_End.png' }])
    })

    it('should map images into the configured directory', () => {
      expect(formatWikitext('[[Image:Ring.png]]', { imageDir: 'assets' }).markdown).toBe('![[assets/Ring.png]]')
    })
  })

  describe('templates', () => {
    it('should drop unknown templates with a diagnostic', () => {
      const result = formatWikitext('Hi {{citation needed}} there')
      expect(result.markdown).toBe('Hi  there')
      expect(result.diagnostics).toEqual([
        { kind: 'unhandled-template', message: 'Dropped template {{citation needed}}', detail: 'citation needed' },
      ])
    })

    it('should keep the text of wrapping templates', () => {
      const result = formatWikitext('{{nowrap|Middle-earth}}')
      expect(result.markdown).toBe('Middle-earth')
      expect(result.diagnostics).toEqual([])
    })

    it('should render main-article hatnotes as links', () => {
      expect(md('{{main|Shire}}')).toBe('Main article: [[Shire]]')
    })
  })

  describe('malformed markup', () => {
    it('should pass unclosed link brackets through', () => {
      const result = formatWikitext('See [[Frodo')
      expect(result.markdown).toBe('See [[Frodo')
      expect(result.diagnostics.map(d => d.kind)).toEqual(['malformed-markup'])
    })

    it('should pass unbalanced template braces through', () => {
      const result = formatWikitext('{{foo')
      expect(result.markdown).toBe('{{foo')
      expect(result.diagnostics).toEqual([
        { kind: 'malformed-markup', message: 'Unbalanced template braces passed through', detail: '{{foo' },
      ])
    })
  })

  describe('tables', () => {
    it('should convert a simple table to a pipe table', () => {
      expect(md('{| class="wikitable"\n|-\n! A !! B\n|-\n| 1 || 2\n|}')).toBe('| A | B |\n| --- | --- |\n| 1 | 2 |')
    })

    it('should emit the caption and isolate the table', () => {
      const wiki = 'Members:\n{|\n|+ The Fellowship\n! Name\n! Race\n|-\n| [[Frodo]] || Hobbit\n|-\n| style="color:grey" | [[Gandalf|Mithrandir]]\n|}\nAfter.'
      expect(md(wiki)).toBe(
        'Members:\n\nThe Fellowship\n\n| Name | Race |\n| --- | --- |\n| [[Frodo]] | Hobbit |\n| [[Gandalf\\|Mithrandir]] |  |\n\nAfter.'
      )
    })

    it('should report links found in cells', () => {
      const onLink = vi.fn()
      formatWikitext('{|\n| [[Shire]]\n|}', { onLink })
      expect(onLink).toHaveBeenCalledWith('Shire')
    })

    it('should append continuation lines to the last cell', () => {
      expect(md('{|\n! Place\n|-\n| Bag\nEnd\n|}')).toBe('| Place |\n| --- |\n| Bag End |')
    })

    it('should drop nested tables with a diagnostic', () => {
      const result = formatWikitext('Before\n{|\n| outer\n{|\n| inner\n|}\n|}\nAfter')
      expect(result.markdown).toBe('Before\nAfter')
      expect(result.diagnostics).toEqual([
        { kind: 'unhandled-table', message: 'Dropped nested table', detail: '{|' },
      ])
    })

    it('should pass an unclosed table through', () => {
      const result = formatWikitext('{|\n| cell')
      expect(result.markdown).toBe('{|\n| cell')
      expect(result.diagnostics.map(d => d.kind)).toEqual(['malformed-markup'])
    })
  })

  it('should decode entities and strip comments', () => {
    expect(md('Fish &amp; chips&nbsp;today<!-- note -->')).toBe('Fish & chips today')
  })

  describe('idempotence', () => {
    const outputs = [
      '**Gandalf** is a wizard. See [[Frodo|the hobbit]].',
      'Steps:\n\n1. Take the ring\n\nDone.',
      '| A | B |\n| --- | --- |\n| [[Frodo\\|the hobbit]] | 2 |',
      '- one\n  - two\n1. first',
      '*Red Book* and ***One Ring***',
      '![[images/Bag_End.png]]',
      '[Example site](https://example.org)',
    ]

    for (const output of outputs) {
      it(`should return ${JSON.stringify(output)} unchanged`, () => {
        expect(md(output)).toBe(output)
      })
    }

    it('should be stable over formatter output', () => {
      const once = md("'''Sting''' glows. [[Bilbo]]s sword.\n* [[Mirkwood]]\n{|\n! Blade\n|-\n| ''Sting''\n|}")
      expect(md(once)).toBe(once)
    })
  })
})

describe('formatInline', () => {
  it('should leave existing embeds alone', () => {
    const onLink = vi.fn()
    expect(formatInline('![[images/Bag_End.png]]', { onLink })).toBe('![[images/Bag_End.png]]')
    expect(onLink).not.toHaveBeenCalled()
  })

  it('should leave plain text alone', () => {
    expect(formatInline('A plain line')).toBe('A plain line')
  })

  it('should collect diagnostics into the given array', () => {
    const diagnostics: Diagnostic[] = []
    formatInline('[[unclosed', {}, diagnostics)
    expect(diagnostics).toHaveLength(1)
  })
})
