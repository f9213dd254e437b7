/**
 * Noun inflection for infobox tag inference
 */

import pluralize from 'pluralize'
import type { Inflector } from './types.js'
import { normalizeTag } from './categories.js'

/** English rules from the `pluralize` package */
export const englishInflector: Inflector = {
  singularize: (word: string) => pluralize.singular(word),
}

/**
 * Tag inferred from an infobox type: lowercased, the last word
 * singularized, words joined with `_`.
 *
 * @example
 * inferTypeTag('Locations', englishInflector)            // 'location'
 * inferTypeTag('Fictional Characters', englishInflector) // 'fictional_character'
 */
export function inferTypeTag(type: string, inflector: Inflector = englishInflector): string | undefined {
  const words = type.toLowerCase().split(/[\s_]+/).filter(w => w.length > 0)
  const last = words.pop()
  if (last === undefined) return undefined
  words.push(inflector.singularize(last))
  const tag = normalizeTag(words.join('_'))
  return tag.length > 0 ? tag : undefined
}
