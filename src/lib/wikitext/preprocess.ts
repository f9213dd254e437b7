/**
 * Markup cleanup applied before translation
 *
 * Removes what has no Markdown counterpart (comments, magic words,
 * references, tag blocks like `<syntaxhighlight>`), turns the HTML tags
 * editors use for formatting into wiki markup, and decodes entities last
 * so that an escaped `&lt;b&gt;` stays literal text.
 */

const HTML_COMMENT = /<!--[\s\S]*?-->/g
const MAGIC_WORDS = /__(?:NOTOC|TOC|FORCETOC|NOEDITSECTION|NEWSECTIONLINK|NONEWSECTIONLINK|NOGALLERY|HIDDENCAT|INDEX|NOINDEX|STATICREDIRECT|DISAMBIG|NOTITLECONVERT|NOCONTENTCONVERT)__/g
const LINE_ENDINGS = /\r\n?/g

/** Tags whose whole content is dropped */
const IGNORE_TAGS = [
  'table', 'code', 'score', 'data', 'categorytree', 'charinsert', 'hiero', 'imagemap',
  'inputbox', 'references', 'source', 'syntaxhighlight', 'timeline', 'maplink',
] as const

function buildIgnoreTagsPattern(tags: readonly string[]): RegExp {
  const tagGroup = tags.join('|')
  return new RegExp(`< ?(?:${tagGroup})\\b[^>]{0,200}>(?:[^<]|<(?!\\s?/\\s?(?:${tagGroup})\\s?>))*< ?/ ?(?:${tagGroup}) ?>`, 'gi')
}

const IGNORE_TAGS_BLOCK = buildIgnoreTagsPattern(IGNORE_TAGS)
const REF_PAIRED = /<ref(?:\s[^>]{0,200})?>[\s\S]{0,4000}?<\/ref\s*>/gi
const SELF_CLOSE_TAG = /<\s*(?:ref|references|data|span|div)\b[^>]{0,200}\/\s*>/gi
const ITALIC_TAG = /<i>([^<]*(?:<(?!\/i>)[^<]*)*)<\/i>/gi
const BOLD_TAG = /<b>([^<]*(?:<(?!\/b>)[^<]*)*)<\/b>/gi
const BR_TAG = / ?<\s*br\s*\/?\s*> ?/gi
const INLINE_TAG = /<\/?\s*(?:p|sub|sup|span|nowiki|div|u|s|small|big|center|del|ins|abbr|font|tr|td|th|pre|hr|blockquote|poem|cite)\b[^>]{0,200}>/gi

// Named entities editors type by hand; numeric ones are decoded by code point
const HTML_ENTITY_MAP: Record<string, string> = {
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  minus: '−',
  amp: '&',
  quot: '"',
  apos: "'",
  lt: '<',
  gt: '>',
  hellip: '…',
  middot: '·',
  bull: '•',
  times: '×',
  deg: '°',
  laquo: '«',
  raquo: '»',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
}

const HTML_ENTITY_PATTERN = /&(?:#(\d{1,7})|#x([0-9a-f]{1,6})|([a-z]+));/gi
const MAX_CODE_POINT = 0x10ffff

function decodeEntity(match: string, dec: string | undefined, hex: string | undefined, name: string | undefined): string {
  if (name !== undefined) return HTML_ENTITY_MAP[name.toLowerCase()] ?? match
  const code = dec !== undefined ? Number.parseInt(dec, 10) : Number.parseInt(hex ?? '', 16)
  return Number.isNaN(code) || code === 0 || code > MAX_CODE_POINT ? match : String.fromCodePoint(code)
}

/**
 * Normalize line endings, remove comments, magic words, references and
 * ignored tag blocks, rewrite `<b>`/`<i>`/`<br>` and decode HTML entities.
 */
export function preprocess(wiki: string): string {
  return wiki
    .replace(LINE_ENDINGS, '\n')
    .replace(HTML_COMMENT, '')
    .replace(MAGIC_WORDS, '')
    .replace(SELF_CLOSE_TAG, '')
    .replace(REF_PAIRED, '')
    .replace(IGNORE_TAGS_BLOCK, '')
    .replace(ITALIC_TAG, "''$1''")
    .replace(BOLD_TAG, "'''$1'''")
    .replace(BR_TAG, '\n')
    .replace(INLINE_TAG, '')
    .replace(HTML_ENTITY_PATTERN, decodeEntity)
}
