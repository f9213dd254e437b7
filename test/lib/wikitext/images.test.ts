/**
 * Tests for image name mapping
 */

import { describe, it, expect } from 'vitest'
import {
  canonicalFilename,
  isFileTarget,
  parseImageValue,
  renderImageEmbed,
  resolveImage,
} from '../../../src/lib/wikitext/images.js'

describe('isFileTarget', () => {
  it('should match every file namespace', () => {
    expect(isFileTarget('File:Frodo.jpg')).toBe(true)
    expect(isFileTarget('image : Frodo.jpg')).toBe(true)
    expect(isFileTarget(':Media:Ring.ogg')).toBe(true)
  })

  it('should not match other targets', () => {
    expect(isFileTarget('Filed:Report')).toBe(false)
    expect(isFileTarget('Frodo Baggins')).toBe(false)
  })
})

describe('canonicalFilename', () => {
  it('should drop the prefix and use underscores', () => {
    expect(canonicalFilename('File:frodo  baggins.jpg')).toBe('Frodo_baggins.jpg')
  })

  it('should return an empty name for a bare prefix', () => {
    expect(canonicalFilename('File:')).toBe('')
  })
})

describe('resolveImage', () => {
  it('should place the file under the image directory', () => {
    expect(resolveImage('Bag End.png')).toEqual({ filename: 'Bag_End.png', path: 'images/Bag_End.png' })
    expect(resolveImage('x.png', 'media')).toEqual({ filename: 'X.png', path: 'media/X.png' })
  })

  it('should replace characters that are unsafe in paths', () => {
    expect(resolveImage('Image:a/b?.png')).toEqual({ filename: 'A/b?.png', path: 'images/A_b_.png' })
  })
})

describe('parseImageValue', () => {
  it('should accept bare, prefixed and linked names', () => {
    expect(parseImageValue('frodo.jpg')).toBe('Frodo.jpg')
    expect(parseImageValue('File:Frodo.jpg')).toBe('Frodo.jpg')
    expect(parseImageValue('[[File:Frodo.jpg|200px|Frodo]]')).toBe('Frodo.jpg')
  })

  it('should return undefined for empty values', () => {
    expect(parseImageValue('   ')).toBeUndefined()
    expect(parseImageValue('[[File:]]')).toBeUndefined()
  })
})

describe('renderImageEmbed', () => {
  it('should render an embed of the local path', () => {
    expect(renderImageEmbed({ filename: 'Ring.png', path: 'images/Ring.png' })).toBe('![[images/Ring.png]]')
  })
})
