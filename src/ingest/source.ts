/**
 * Dump sources: file → (gunzip) → XML parser → pages
 */

import { createReadStream } from 'node:fs';
import { open } from 'node:fs/promises';
import { Readable } from 'node:stream';
import type { ReadableStream } from 'node:stream/web';
import type { CompressionType, ReadPagesOptions, WikiPage } from './types.js';
import { createDecompressor, detectCompression, detectCompressionFromExtension } from './decompress.js';
import { createMediaWikiParser, createNamespaceFilter } from './parse-xml.js';
import { InputError, describeError } from '../lib/errors.js';

async function readHeader(path: string): Promise<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    const header = new Uint8Array(2);
    const { bytesRead } = await handle.read(header, 0, 2, 0);
    return header.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Open a dump file as a stream of XML bytes, decompressing `.gz` files.
 * With 'auto' the extension decides, then the magic bytes.
 *
 * @throws {InputError} When the file cannot be opened
 */
export async function openDump(
  path: string,
  compression: CompressionType = 'auto'
): Promise<ReadableStream<Uint8Array>> {
  let header: Uint8Array;
  try {
    header = await readHeader(path);
  } catch (error) {
    throw new InputError(`Cannot read dump ${path}: ${describeError(error)}`, { path, cause: error });
  }

  let type = compression === 'auto' ? detectCompressionFromExtension(path) : compression;
  if (type === 'auto') {
    type = detectCompression(header);
  }

  return Readable.toWeb(createReadStream(path)).pipeThrough(createDecompressor(type));
}

/**
 * Parse pages from a stream of XML bytes.
 * Iteration stops (and the stream is cancelled) once `signal` aborts.
 */
export async function* parsePages(
  bytes: ReadableStream<Uint8Array>,
  options: ReadPagesOptions = {}
): AsyncGenerator<WikiPage, void, undefined> {
  const { logger, source } = options;
  let pages = bytes.pipeThrough(createMediaWikiParser({ logger, source }));
  if (options.namespaces) {
    pages = pages.pipeThrough(createNamespaceFilter(options.namespaces, options.onFiltered));
  }

  for await (const page of pages) {
    if (options.signal?.aborted) return;
    yield page;
  }
}

/**
 * Stream the pages of a dump file
 *
 * @example
 * ```typescript
 * for await (const page of readPages('dump.xml.gz', { namespaces: [0] })) {
 *   console.log(page.title);
 * }
 * ```
 */
export async function* readPages(
  path: string,
  options: ReadPagesOptions = {}
): AsyncGenerator<WikiPage, void, undefined> {
  const bytes = await openDump(path, options.compression ?? 'auto');
  yield* parsePages(bytes, { source: path, ...options });
}
