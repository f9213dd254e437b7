/**
 * Wikitext → Markdown translation
 */

export * from './types.js'
export {
  matchSpan,
  findTemplates,
  findLinks,
  parseTemplate,
  getParam,
  normalizeTemplateName,
  splitTemplateParams,
  stripSpans,
} from './scanner.js'
export { preprocess } from './preprocess.js'
export { renderTemplates, TEXT_TEMPLATES } from './templates.js'
export type { TemplateRenderer } from './templates.js'
export { resolveEmphasis } from './emphasis.js'
export {
  normalizeTitle,
  parseWikiLink,
  renderWikiLink,
  resolveLink,
  isCategoryLink,
} from './links.js'
export {
  isFileTarget,
  canonicalFilename,
  resolveImage,
  parseImageValue,
  renderImageEmbed,
  DEFAULT_IMAGE_DIR,
} from './images.js'
export { formatWikitext, formatMarkup, formatInline } from './format.js'
export { extractCategories, normalizeTag } from './categories.js'
export type { CategoryExtraction } from './categories.js'
export { extractInfobox, normalizeFieldKey, isImageField, infoboxType } from './infobox.js'
export type { InfoboxOptions, InfoboxExtraction } from './infobox.js'
export { englishInflector, inferTypeTag } from './inflector.js'
export { getRedirectTarget } from './redirect.js'
export { unwrapParagraphs, tidyBlankLines } from './paragraphs.js'
