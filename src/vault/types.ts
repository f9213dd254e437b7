/**
 * Type definitions for vault output
 */

import type { Diagnostic, ImageReference, Inflector } from '../lib/wikitext/types.js';
import type { TagIndex } from './tag-index.js';
import type { FilenameAllocator } from './filenames.js';

/** Frontmatter value: a string, or the parts of a linked value */
export type FrontmatterValue = string | string[];

/** Ordered frontmatter: `title`, `tags`, `infobox`, then infobox fields */
export type Frontmatter = Record<string, FrontmatterValue>;

/** A converted page, ready to write */
export interface PageDocument {
  title: string;
  kind: 'article' | 'redirect';
  /** Path relative to the vault root, e.g. `Gandalf.md` */
  path: string;
  /** Full file content */
  content: string;
  /** Sorted, deduplicated */
  tags: string[];
  frontmatter: Frontmatter;
  images: ImageReference[];
  /** Normalized link targets, in order of first appearance */
  links: string[];
  diagnostics: Diagnostic[];
}

/** A generated tag index note */
export interface IndexDocument {
  tag: string;
  path: string;
  content: string;
  /** Titles listed, sorted */
  pages: string[];
}

/** Per-run options of the page transformer */
export interface TransformOptions {
  skipRedirects: boolean;
  imageDir: string;
  indexDir: string;
  infoboxTemplates: readonly string[];
  unwrapParagraphs: boolean;
}

/**
 * Run-scoped state passed into every page transformation.
 * Created once per run; nothing here outlives it.
 */
export interface ConversionContext {
  readonly options: TransformOptions;
  readonly tagIndex: TagIndex;
  readonly filenames: FilenameAllocator;
  readonly inflector: Inflector;
  /** Every link target seen so far */
  readonly referencedTitles: Set<string>;
}

/** Why a page produced no document */
export type SkipReason = 'redirect' | 'empty';

/** One failed write or download */
export interface FailureRecord {
  kind: 'write' | 'download';
  /** Vault path or image file name */
  target: string;
  message: string;
}

/** Outcome of a conversion run */
export interface ConversionSummary {
  pagesSeen: number;
  articlesWritten: number;
  redirectsWritten: number;
  redirectsSkipped: number;
  emptySkipped: number;
  filteredByNamespace: number;
  indexesWritten: number;
  imagesDownloaded: number;
  imagesFailed: number;
  failures: FailureRecord[];
  /** Diagnostics reported by the translator, all pages */
  warnings: number;
  /** Link targets with no note written for them, sorted */
  danglingLinks: string[];
  /** True when the run stopped on its abort signal */
  aborted: boolean;
  durationMs: number;
}
