/**
 * Conversion driver
 *
 * dump → pages → transformer → writer, then images, then tag indexes.
 * Pages are converted one at a time in dump order; only image downloads
 * overlap. Write and download failures are recorded and the run goes on;
 * malformed XML ends the run before indexes are written.
 */

import { ReadableStream } from 'node:stream/web';
import type { WikiPage } from '../ingest/types.js';
import type { ImageReference, Inflector } from '../lib/wikitext/types.js';
import type { ConverterConfig } from '../lib/config-schema.js';
import type { ConversionSummary, PageDocument } from './types.js';
import type { VaultWriter } from './writer.js';
import { parsePages, readPages } from '../ingest/source.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { WriteError, describeError } from '../lib/errors.js';
import { createConversionContext, skipReason, transformPage } from './transform.js';
import { downloadImages } from './download.js';

/** A dump file path, a stream of XML bytes, or pages already parsed */
export type DumpSource = string | ReadableStream<Uint8Array> | AsyncIterable<WikiPage> | Iterable<WikiPage>;

export interface ConvertOptions {
  writer: VaultWriter;
  logger?: Logger;
  signal?: AbortSignal;
  inflector?: Inflector;
  /** Download images when `imageBaseUrl` is set (default true) */
  downloadImages?: boolean;
  /** Initial delay between download retries */
  retryDelayMs?: number;
  /** Called after each page is handled */
  onPage?: (title: string, document: PageDocument | null) => void;
}

/** Key links and titles are matched on: first letter is case-insensitive */
function titleKey(title: string): string {
  return title.charAt(0).toUpperCase() + title.slice(1);
}

async function* filterNamespaces(
  pages: AsyncIterable<WikiPage> | Iterable<WikiPage>,
  namespaces: readonly number[] | undefined,
  onFiltered: (page: WikiPage) => void
): AsyncGenerator<WikiPage, void, undefined> {
  const keep = namespaces ? new Set(namespaces) : null;
  for await (const page of pages) {
    if (keep && !keep.has(page.ns)) onFiltered(page);
    else yield page;
  }
}

function openSource(
  source: DumpSource,
  config: ConverterConfig,
  log: Logger,
  onFiltered: (page: WikiPage) => void
): AsyncIterable<WikiPage> {
  const readOptions = { namespaces: config.namespaces, onFiltered, logger: log.child('ingest') };
  if (typeof source === 'string') {
    return readPages(source, readOptions);
  }
  if (source instanceof ReadableStream) {
    return parsePages(source, readOptions);
  }
  return filterNamespaces(source, config.namespaces, onFiltered);
}

function emptySummary(): ConversionSummary {
  return {
    pagesSeen: 0,
    articlesWritten: 0,
    redirectsWritten: 0,
    redirectsSkipped: 0,
    emptySkipped: 0,
    filteredByNamespace: 0,
    indexesWritten: 0,
    imagesDownloaded: 0,
    imagesFailed: 0,
    failures: [],
    warnings: 0,
    danglingLinks: [],
    aborted: false,
    durationMs: 0,
  };
}

/**
 * Convert a dump into a vault.
 *
 * @throws {InputError} When the dump cannot be read or is not well-formed XML
 *
 * @example
 * ```typescript
 * const summary = await convertDump('wiki.xml', parseConverterConfig({ skipRedirects: true }), {
 *   writer: new FileSystemVaultWriter('./vault'),
 * });
 * console.log(summary.articlesWritten);
 * ```
 */
export async function convertDump(
  source: DumpSource,
  config: ConverterConfig,
  options: ConvertOptions
): Promise<ConversionSummary> {
  const startTime = Date.now();
  const log = options.logger ?? createLogger('convert');
  const { writer, signal } = options;
  const summary = emptySummary();

  const context = createConversionContext(
    {
      skipRedirects: config.skipRedirects,
      imageDir: config.imageDir,
      indexDir: config.indexDir,
      infoboxTemplates: config.infoboxTemplates,
      unwrapParagraphs: config.unwrapParagraphs,
    },
    options.inflector
  );

  const writtenTitles = new Set<string>();
  const images = new Map<string, ImageReference>();

  const onFiltered = (page: WikiPage): void => {
    summary.pagesSeen++;
    summary.filteredByNamespace++;
    log.debug('Page outside selected namespaces', { title: page.title, ns: page.ns });
  };

  log.info('Conversion started', { source: typeof source === 'string' ? source : 'stream' });

  for await (const page of openSource(source, config, log, onFiltered)) {
    if (signal?.aborted) {
      summary.aborted = true;
      break;
    }
    summary.pagesSeen++;

    const document = transformPage(page, context);
    options.onPage?.(page.title, document);

    if (!document) {
      const reason = skipReason(page);
      if (reason === 'redirect') summary.redirectsSkipped++;
      else summary.emptySkipped++;
      log.debug('Page skipped', { title: page.title, reason });
      continue;
    }

    for (const diagnostic of document.diagnostics) {
      log.warn(diagnostic.message, { page: page.title, kind: diagnostic.kind, detail: diagnostic.detail });
    }
    summary.warnings += document.diagnostics.length;

    try {
      await writer.write(document.path, document.content);
    } catch (error) {
      if (!(error instanceof WriteError)) throw error;
      summary.failures.push({ kind: 'write', target: document.path, message: describeError(error) });
      log.error('Note not written', { page: page.title, path: document.path, error });
      continue;
    }

    writtenTitles.add(titleKey(document.title));
    if (document.kind === 'redirect') summary.redirectsWritten++;
    else summary.articlesWritten++;
    log.debug('Note written', { title: page.title, path: document.path, tags: document.tags });

    for (const image of document.images) {
      if (!images.has(image.filename)) images.set(image.filename, image);
    }
  }

  if (signal?.aborted) summary.aborted = true;

  if (summary.aborted) {
    log.warn('Conversion aborted, images and indexes not written', { pagesSeen: summary.pagesSeen });
    summary.durationMs = Date.now() - startTime;
    return summary;
  }

  if (config.imageBaseUrl && options.downloadImages !== false && images.size > 0) {
    const imageLog = log.withOperation('images');
    imageLog.info('Downloading images', { count: images.size, concurrency: config.downloadConcurrency });
    const result = await downloadImages([...images.values()], {
      baseUrl: config.imageBaseUrl,
      writer,
      concurrency: config.downloadConcurrency,
      signal,
      retryDelayMs: options.retryDelayMs,
    });
    summary.imagesDownloaded = result.downloaded;
    summary.imagesFailed = result.failures.length;
    summary.failures.push(...result.failures);
    for (const failure of result.failures) {
      imageLog.warn('Image not downloaded', { file: failure.target, error: failure.message });
    }
  }

  for (const index of context.tagIndex.build(config.indexDir)) {
    try {
      await writer.write(index.path, index.content);
      summary.indexesWritten++;
    } catch (error) {
      if (!(error instanceof WriteError)) throw error;
      summary.failures.push({ kind: 'write', target: index.path, message: describeError(error) });
      log.error('Index not written', { tag: index.tag, path: index.path, error });
    }
  }

  summary.danglingLinks = [...context.referencedTitles]
    .filter((title) => !writtenTitles.has(titleKey(title)))
    .sort();
  if (summary.danglingLinks.length > 0) {
    log.warn('Links to notes not in the vault', {
      kind: 'unresolved-link',
      count: summary.danglingLinks.length,
    });
  }

  summary.durationMs = Date.now() - startTime;
  log.info('Conversion finished', {
    articles: summary.articlesWritten,
    redirects: summary.redirectsWritten,
    indexes: summary.indexesWritten,
    failures: summary.failures.length,
    durationMs: summary.durationMs,
  });
  return summary;
}
