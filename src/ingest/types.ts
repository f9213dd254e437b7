/**
 * Type definitions for dump ingestion
 */

import type { Logger } from '../lib/logger.js';

/** One page of a MediaWiki XML export (latest revision) */
export interface WikiPage {
  /** Page title, unique within the dump */
  title: string;
  /** Page id (0 when the export omits it) */
  id: number;
  /** Namespace (0 = article, 14 = category, ...) */
  ns: number;
  /** Raw wikitext of the latest revision */
  text: string;
  /** Latest revision timestamp ('' when absent) */
  timestamp: string;
  /** Redirect target from the `<redirect title>` element */
  redirect?: string;
}

/** Compression of a dump file */
export type CompressionType = 'gzip' | 'none' | 'auto';

export interface ParserOptions {
  logger?: Logger;
  /** Source name used in error messages */
  source?: string;
}

export interface ReadPagesOptions extends ParserOptions {
  compression?: CompressionType;
  /** Namespace ids to keep; unset keeps every page */
  namespaces?: readonly number[];
  /** Called for each page dropped by the namespace filter */
  onFiltered?: (page: WikiPage) => void;
  signal?: AbortSignal;
}
