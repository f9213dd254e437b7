/**
 * Test helpers and utilities
 */

import { ReadableStream } from 'node:stream/web';
import type { WikiPage } from '../src/ingest/types.js';
import { Logger, type LogEntry } from '../src/lib/logger.js';

/**
 * Create a mock WikiPage for testing
 */
export function createMockWikiPage(overrides: Partial<WikiPage> = {}): WikiPage {
  return {
    title: 'Test Page',
    id: 1,
    ns: 0,
    text: 'This is test content.',
    timestamp: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

/**
 * Create a byte stream from a string, split into `chunks` pieces
 */
export function createXmlStream(xml: string, chunks = 1): ReadableStream<Uint8Array> {
  const data = new TextEncoder().encode(xml);
  const chunkSize = Math.max(1, Math.ceil(data.length / chunks));
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (let i = 0; i < data.length; i += chunkSize) {
        controller.enqueue(data.slice(i, Math.min(i + chunkSize, data.length)));
      }
      controller.close();
    },
  });
}

/**
 * Collect all items from a readable stream into an array
 */
export async function collectStream<T>(stream: ReadableStream<T>): Promise<T[]> {
  const reader = stream.getReader();
  const items: T[] = [];

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    items.push(value);
  }

  return items;
}

/**
 * Collect all items from an async iterable into an array
 */
export async function collectAsyncIterable<T>(
  iterable: AsyncIterable<T>
): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Logger writing JSON entries into an array
 */
export function createCapturingLogger(level: 'debug' | 'info' = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const capture = (line: string): void => {
    entries.push(JSON.parse(line));
  };
  const logger = new Logger({ level, format: 'json', context: 'test', sink: { stdout: capture, stderr: capture } });
  return { logger, entries };
}

/**
 * Create a fetch Response with a binary or text body
 */
export function createMockFetchResponse(
  body: string | Uint8Array | null,
  options: { status?: number; statusText?: string } = {}
): Response {
  const { status = 200, statusText = 'OK' } = options;
  return new Response(body, { status, statusText });
}

/**
 * Create sample MediaWiki XML content
 */
export function createSampleXml(pages: WikiPage[]): string {
  const pageXml = pages.map(page => `
  <page>
    <title>${escapeXml(page.title)}</title>
    <ns>${page.ns}</ns>
    <id>${page.id}</id>
    ${page.redirect ? `<redirect title="${escapeXml(page.redirect)}" />` : ''}
    <revision>
      <timestamp>${page.timestamp}</timestamp>
      <text xml:space="preserve">${escapeXml(page.text)}</text>
    </revision>
  </page>`).join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<mediawiki xmlns="http://www.mediawiki.org/xml/export-0.11/" version="0.11">
  <siteinfo>
    <sitename>Middle Wiki</sitename>
  </siteinfo>
${pageXml}
</mediawiki>`;
}

/**
 * Escape XML special characters
 */
function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
