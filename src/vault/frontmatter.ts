/**
 * YAML frontmatter for converted notes
 */

import matter from 'gray-matter';
import type { Infobox } from '../lib/wikitext/types.js';
import type { Frontmatter, FrontmatterValue } from './types.js';

/** Keys owned by the converter; infobox fields with these names get a prefix */
const RESERVED_KEYS = new Set(['title', 'tags', 'infobox']);

const LINK_TOKEN = /\[\[[^\]]+\]\]/g;
// Separators left between links (", ", " and ", "/", "<br>") are not parts
const SEPARATOR = /^(?:[\s,;/|·•&]|and|or|<br\s*\/?>)*$/i;

/**
 * Split a value holding links mixed with text into its parts.
 * Values with a single part stay strings.
 *
 * @example
 * splitLinkedValue('[[Shire]], [[Bree]]')        // ['[[Shire]]', '[[Bree]]']
 * splitLinkedValue('[[Bag End]] (formerly)')     // ['[[Bag End]]', '(formerly)']
 * splitLinkedValue('[[Hobbit]]')                 // '[[Hobbit]]'
 */
export function splitLinkedValue(value: string): FrontmatterValue {
  const parts: string[] = [];
  let last = 0;
  for (const match of value.matchAll(LINK_TOKEN)) {
    const index = match.index ?? 0;
    const before = value.slice(last, index).trim();
    if (before && !SEPARATOR.test(before)) parts.push(before);
    parts.push(match[0]);
    last = index + match[0].length;
  }
  const rest = value.slice(last).trim();
  if (rest && !SEPARATOR.test(rest)) parts.push(rest);

  return parts.length > 1 ? parts : value;
}

/**
 * Frontmatter in output order: `title`, `tags`, `infobox` (the type),
 * then the infobox fields in template order.
 */
export function buildFrontmatter(title: string, tags: readonly string[], infobox?: Infobox): Frontmatter {
  const data: Frontmatter = { title };
  if (tags.length > 0) data['tags'] = [...tags];
  if (infobox) {
    if (infobox.type !== undefined) data['infobox'] = infobox.type;
    for (const field of infobox.fields) {
      const key = RESERVED_KEYS.has(field.key) ? `infobox_${field.key}` : field.key;
      data[key] = splitLinkedValue(field.value);
    }
  }
  return data;
}

/**
 * Note content: frontmatter, one blank line, body, trailing newline.
 * Without frontmatter the note is just the body.
 */
export function renderDocument(body: string, frontmatter: Frontmatter): string {
  const text = body.trim();
  if (Object.keys(frontmatter).length === 0) {
    return `${text}\n`;
  }
  return matter.stringify(`\n${text}`, frontmatter);
}
