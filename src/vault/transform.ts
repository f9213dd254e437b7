/**
 * Page transformer: one dump page → one vault note
 *
 * Pure apart from the run-scoped context it is handed. File names are
 * allocated, tags recorded and link targets noted only once the whole
 * page has been converted, so a page never leaves partial state behind.
 */

import type { WikiPage } from '../ingest/types.js';
import type { Diagnostic, FormatContext, ImageReference, Inflector } from '../lib/wikitext/types.js';
import type {
  ConversionContext,
  PageDocument,
  SkipReason,
  TransformOptions,
} from './types.js';
import { preprocess } from '../lib/wikitext/preprocess.js';
import { extractCategories } from '../lib/wikitext/categories.js';
import { extractInfobox } from '../lib/wikitext/infobox.js';
import { formatMarkup } from '../lib/wikitext/format.js';
import { englishInflector, inferTypeTag } from '../lib/wikitext/inflector.js';
import { getRedirectTarget } from '../lib/wikitext/redirect.js';
import { unwrapParagraphs, tidyBlankLines } from '../lib/wikitext/paragraphs.js';
import { DEFAULT_IMAGE_DIR } from '../lib/wikitext/images.js';
import { TagIndex } from './tag-index.js';
import { FilenameAllocator } from './filenames.js';
import { buildFrontmatter, renderDocument } from './frontmatter.js';

export const DEFAULT_TRANSFORM_OPTIONS: TransformOptions = {
  skipRedirects: false,
  imageDir: DEFAULT_IMAGE_DIR,
  indexDir: '_indexes',
  infoboxTemplates: [],
  unwrapParagraphs: true,
};

/**
 * Fresh context for one run
 */
export function createConversionContext(
  options: Partial<TransformOptions> = {},
  inflector: Inflector = englishInflector
): ConversionContext {
  return {
    options: { ...DEFAULT_TRANSFORM_OPTIONS, ...options },
    tagIndex: new TagIndex(),
    filenames: new FilenameAllocator(),
    inflector,
    referencedTitles: new Set(),
  };
}

/**
 * Why `transformPage` returned null for a page
 */
export function skipReason(page: WikiPage): SkipReason {
  return getRedirectTarget(page) !== undefined ? 'redirect' : 'empty';
}

/** Collects link targets and images reported by the formatter */
function createCollector(imageDir: string): FormatContext & { links: string[]; images: ImageReference[] } {
  const links: string[] = [];
  const images: ImageReference[] = [];
  const seenLinks = new Set<string>();
  const seenImages = new Set<string>();
  return {
    imageDir,
    links,
    images,
    onLink(target) {
      if (seenLinks.has(target)) return;
      seenLinks.add(target);
      links.push(target);
    },
    onImage(image) {
      if (seenImages.has(image.filename)) return;
      seenImages.add(image.filename);
      images.push(image);
    },
  };
}

/**
 * Convert one page.
 *
 * Returns null for a redirect when `skipRedirects` is set and for a page
 * with an empty body; `skipReason` tells which.
 */
export function transformPage(page: WikiPage, context: ConversionContext): PageDocument | null {
  const { options } = context;

  const target = getRedirectTarget(page);
  if (target !== undefined) {
    if (options.skipRedirects) return null;
    const note = context.filenames.allocate(page.title);
    context.referencedTitles.add(target);
    return {
      title: page.title,
      kind: 'redirect',
      path: FilenameAllocator.pathFor(note),
      content: `Redirect to [[${target}]]\n`,
      tags: [],
      frontmatter: {},
      images: [],
      links: [target],
      diagnostics: [],
    };
  }

  if (page.text.trim() === '') return null;

  const collector = createCollector(options.imageDir);
  const diagnostics: Diagnostic[] = [];

  const categories = extractCategories(preprocess(page.text));
  const extraction = extractInfobox(categories.text, { knownTemplates: options.infoboxTemplates }, collector);
  diagnostics.push(...extraction.diagnostics);

  const formatted = formatMarkup(extraction.text, collector);
  diagnostics.push(...formatted.diagnostics);

  const tags = new Set(categories.tags);
  const type = extraction.infobox?.type;
  if (type !== undefined) {
    const inferred = inferTypeTag(type, context.inflector);
    if (inferred !== undefined) tags.add(inferred);
  }
  const sortedTags = [...tags].sort();

  let body = formatted.markdown;
  if (options.unwrapParagraphs) body = unwrapParagraphs(body);
  body = tidyBlankLines(body);

  const frontmatter = buildFrontmatter(page.title, sortedTags, extraction.infobox);
  const content = renderDocument(body, frontmatter);

  const note = context.filenames.allocate(page.title);
  context.tagIndex.record(sortedTags, { title: page.title, note });
  for (const link of collector.links) context.referencedTitles.add(link);

  return {
    title: page.title,
    kind: 'article',
    path: FilenameAllocator.pathFor(note),
    content,
    tags: sortedTags,
    frontmatter,
    images: collector.images,
    links: collector.links,
    diagnostics,
  };
}
