/**
 * Dump ingestion
 *
 * Streaming components to read, decompress and parse MediaWiki XML
 * exports one page at a time.
 *
 * @example
 * ```typescript
 * import { readPages } from './ingest/index.js';
 *
 * for await (const page of readPages('wiki-pages-current.xml.gz')) {
 *   console.log(page.title, page.ns);
 * }
 * ```
 */

export type {
  WikiPage,
  CompressionType,
  ParserOptions,
  ReadPagesOptions,
} from './types.js';

export {
  createDecompressor,
  detectCompression,
  detectCompressionFromExtension,
} from './decompress.js';

export {
  createMediaWikiParser,
  createNamespaceFilter,
} from './parse-xml.js';

export {
  openDump,
  parsePages,
  readPages,
} from './source.js';
