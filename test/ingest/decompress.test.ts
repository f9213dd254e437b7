/**
 * Tests for the decompression module
 */

import { describe, it, expect } from 'vitest';
import { gzipSync } from 'node:zlib';
import {
  createDecompressor,
  detectCompression,
  detectCompressionFromExtension,
} from '../../src/ingest/decompress.js';
import { collectStream, createXmlStream } from '../helpers.js';
import { ReadableStream } from 'node:stream/web';

function concat(chunks: Uint8Array[]): string {
  return chunks.map((chunk) => new TextDecoder().decode(chunk, { stream: true })).join('');
}

function bytesStream(data: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      const chunkSize = Math.ceil(data.length / 3);
      for (let i = 0; i < data.length; i += chunkSize) {
        controller.enqueue(data.slice(i, Math.min(i + chunkSize, data.length)));
      }
      controller.close();
    },
  });
}

describe('createDecompressor', () => {
  it('should decompress gzip data', async () => {
    const text = '<mediawiki><page><title>Shire</title></page></mediawiki>';
    const compressed = new Uint8Array(gzipSync(new TextEncoder().encode(text)));

    const output = await collectStream(bytesStream(compressed).pipeThrough(createDecompressor('gzip')));
    expect(concat(output)).toBe(text);
  });

  it('should pass uncompressed data through', async () => {
    const output = await collectStream(createXmlStream('<mediawiki/>', 2).pipeThrough(createDecompressor('none')));
    expect(concat(output)).toBe('<mediawiki/>');
  });
});

describe('detectCompression', () => {
  it('should recognize the gzip magic bytes', () => {
    expect(detectCompression(new Uint8Array([0x1f, 0x8b]))).toBe('gzip');
    expect(detectCompression(new TextEncoder().encode('<?'))).toBe('none');
    expect(detectCompression(new Uint8Array([]))).toBe('none');
  });
});

describe('detectCompressionFromExtension', () => {
  it('should map extensions to compression types', () => {
    expect(detectCompressionFromExtension('wiki.xml.gz')).toBe('gzip');
    expect(detectCompressionFromExtension('WIKI.XML.GZIP')).toBe('gzip');
    expect(detectCompressionFromExtension('wiki.xml')).toBe('none');
    expect(detectCompressionFromExtension('wiki.dump')).toBe('auto');
  });
});
