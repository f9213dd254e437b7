/**
 * Infobox extraction
 *
 * The first top-level template named `Infobox ...` (or listed in the
 * configured known templates) becomes the page's structured metadata.
 * Later infoboxes stay in the body and go through the inline template
 * policy like any other template.
 */

import type { Diagnostic, FormatContext, Infobox, InfoboxField, ImageReference } from './types.js'
import { findTemplates, normalizeTemplateName, parseTemplate, stripSpans } from './scanner.js'
import { formatMarkup } from './format.js'
import { parseImageValue, resolveImage, DEFAULT_IMAGE_DIR } from './images.js'

const INFOBOX_PREFIX = /^\s*(?:template\s*:\s*)?infobox[\s_]*/i
const IMAGE_FIELD = /^(?:image|img|photo|picture|logo|cover)\d*$|_image$/

export interface InfoboxOptions {
  /** Extra template names (any case, spaces or underscores) that carry fields */
  knownTemplates?: Iterable<string>
}

export interface InfoboxExtraction {
  /** Text with the infobox removed */
  text: string
  infobox?: Infobox
  diagnostics: Diagnostic[]
}

/** Normalize a parameter name into a frontmatter key */
export function normalizeFieldKey(key: string): string {
  return key.trim().toLowerCase().replace(/:/g, '').replace(/\s+/g, '_')
}

export function isImageField(key: string): boolean {
  return IMAGE_FIELD.test(key)
}

/**
 * Type name carried by an infobox template name, or undefined for a bare
 * `{{Infobox}}`. Known templates are their own type.
 */
export function infoboxType(rawName: string, known: ReadonlySet<string>): string | undefined {
  if (known.has(normalizeTemplateName(rawName))) {
    return rawName.replace(/^\s*template\s*:\s*/i, '').replace(/_/g, ' ').trim()
  }
  const type = rawName.replace(INFOBOX_PREFIX, '').replace(/_/g, ' ').trim()
  return type.length > 0 ? type : undefined
}

/**
 * Find and remove the page's infobox. Expects preprocessed text (see
 * `preprocess`). Field values are formatted as
 * Markdown; image fields resolve to local image paths and are reported
 * through `ctx.onImage` like inline file links.
 */
export function extractInfobox(
  text: string,
  options: InfoboxOptions = {},
  ctx: FormatContext = {}
): InfoboxExtraction {
  const known = new Set([...(options.knownTemplates ?? [])].map(normalizeTemplateName))
  const span = findTemplates(text).find(t => t.name.startsWith('infobox') || known.has(t.name))
  if (!span) return { text, diagnostics: [] }

  const template = parseTemplate(span.body)
  const diagnostics: Diagnostic[] = []
  const fields: InfoboxField[] = []
  const images: ImageReference[] = []

  for (const param of template.params) {
    if (param.positional || param.value.length === 0) continue
    const key = normalizeFieldKey(param.key)
    if (key.length === 0) continue

    let value: string
    if (isImageField(key)) {
      const filename = parseImageValue(param.value)
      if (filename === undefined) continue
      const image = resolveImage(filename, ctx.imageDir ?? DEFAULT_IMAGE_DIR)
      images.push(image)
      ctx.onImage?.(image)
      value = image.path
    } else {
      const formatted = formatMarkup(param.value, ctx)
      diagnostics.push(...formatted.diagnostics)
      value = formatted.markdown.trim()
      if (value.length === 0) continue
    }

    // Repeated keys: the last value wins, the first position is kept
    const existing = fields.find(f => f.key === key)
    if (existing) existing.value = value
    else fields.push({ key, value })
  }

  const infobox: Infobox = { templateName: template.rawName, fields, images }
  const type = infoboxType(template.rawName, known)
  if (type !== undefined) infobox.type = type

  return { text: stripSpans(text, [span]), infobox, diagnostics }
}
