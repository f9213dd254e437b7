/**
 * Dump decompression (gzip) and format detection
 */

import { DecompressionStream, TransformStream } from 'node:stream/web';
import type { CompressionType } from './types.js';

/** Magic bytes for compression format detection */
const GZIP_MAGIC = [0x1f, 0x8b] as const;

/**
 * Create a decompression stream for a resolved compression type.
 *
 * @example
 * ```typescript
 * const xml = bytes.pipeThrough(createDecompressor('gzip'));
 * ```
 */
export function createDecompressor(type: Exclude<CompressionType, 'auto'>): TransformStream<Uint8Array, Uint8Array> {
  if (type === 'gzip') {
    return new DecompressionStream('gzip');
  }
  return new TransformStream<Uint8Array, Uint8Array>();
}

/**
 * Detect compression from the first bytes of a file
 */
export function detectCompression(header: Uint8Array): Exclude<CompressionType, 'auto'> {
  return header[0] === GZIP_MAGIC[0] && header[1] === GZIP_MAGIC[1] ? 'gzip' : 'none';
}

/**
 * Detect compression from a file extension; 'auto' when the name says nothing
 */
export function detectCompressionFromExtension(filename: string): CompressionType {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.gz') || lower.endsWith('.gzip')) {
    return 'gzip';
  }
  if (lower.endsWith('.xml')) {
    return 'none';
  }
  return 'auto';
}
