/**
 * File name → local vault path mapping for images
 */

import type { ImageReference } from './types.js'

/** Namespaces that address uploaded files */
export const FILE_NAMESPACES = ['file', 'image', 'media'] as const

const FILE_NS_PREFIX = new RegExp(`^\\s*:?\\s*(?:${FILE_NAMESPACES.join('|')})\\s*:`, 'i')
const UNSAFE_PATH_CHARS = /[\\/*?:"<>|]/g

export const DEFAULT_IMAGE_DIR = 'images'

/** True when a link target points into a file namespace */
export function isFileTarget(target: string): boolean {
  return FILE_NS_PREFIX.test(target)
}

/**
 * Canonical wiki file name: namespace prefix removed, whitespace runs to
 * underscores, first letter upper-cased (MediaWiki stores it that way).
 */
export function canonicalFilename(name: string): string {
  const bare = name.replace(FILE_NS_PREFIX, '').trim().replace(/[\s_]+/g, '_')
  if (bare.length === 0) return ''
  return bare.charAt(0).toUpperCase() + bare.slice(1)
}

/** Map a wiki file name to its reference under the image directory */
export function resolveImage(name: string, imageDir: string = DEFAULT_IMAGE_DIR): ImageReference {
  const filename = canonicalFilename(name)
  const local = filename.replace(UNSAFE_PATH_CHARS, '_')
  return { filename, path: `${imageDir}/${local}` }
}

/**
 * File name referenced by an image-field value. Accepts a bare name
 * (`Frodo.jpg`), a prefixed one (`File:Frodo.jpg`) or a full file link
 * (`[[File:Frodo.jpg|200px]]`). Returns undefined for empty values.
 */
export function parseImageValue(value: string): string | undefined {
  let v = value.trim()
  if (v.startsWith('[[') && v.endsWith(']]')) v = v.slice(2, -2)
  const pipe = v.indexOf('|')
  if (pipe !== -1) v = v.slice(0, pipe)
  const filename = canonicalFilename(v)
  return filename.length > 0 ? filename : undefined
}

/** Obsidian embed for a resolved image */
export function renderImageEmbed(image: ImageReference): string {
  return `![[${image.path}]]`
}
