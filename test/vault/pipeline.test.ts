/**
 * Tests for the conversion driver
 */

import { describe, it, expect, vi } from 'vitest';
import { convertDump } from '../../src/vault/pipeline.js';
import { MemoryVaultWriter } from '../../src/vault/writer.js';
import { parseConverterConfig } from '../../src/lib/config-schema.js';
import { InputError, WriteError } from '../../src/lib/errors.js';
import type { WikiPage } from '../../src/ingest/types.js';
import {
  createCapturingLogger,
  createMockFetchResponse,
  createMockWikiPage,
  createSampleXml,
  createXmlStream,
} from '../helpers.js';

const PAGES: WikiPage[] = [
  createMockWikiPage({
    title: 'Gandalf',
    id: 1,
    text: "[[Category:Characters]]\n'''Gandalf''' is a wizard. See [[Frodo|the hobbit]].",
  }),
  createMockWikiPage({ title: 'Gandalf the Grey', id: 2, text: '#REDIRECT [[Gandalf]]' }),
  createMockWikiPage({
    title: 'Frodo',
    id: 3,
    text: '{{Infobox Character|name=Frodo|race=Hobbit}}\nFrodo lives in [[Bag End]].',
  }),
  createMockWikiPage({ title: 'Talk:Frodo', id: 4, ns: 1, text: 'Discussion.' }),
  createMockWikiPage({ title: 'Blank', id: 5, text: '' }),
];

/** Fails the writes of one path */
class FailingWriter extends MemoryVaultWriter {
  constructor(private readonly failPath: string) {
    super();
  }

  override async write(path: string, content: string | Uint8Array): Promise<void> {
    if (path === this.failPath) throw new WriteError('disk full', path);
    await super.write(path, content);
  }
}

describe('convertDump', () => {
  it('should write notes and indexes and summarize the run', async () => {
    const writer = new MemoryVaultWriter();
    const { logger } = createCapturingLogger();

    const summary = await convertDump(PAGES, parseConverterConfig({ namespaces: [0] }), { writer, logger });

    expect(writer.paths()).toEqual([
      'Frodo.md',
      'Gandalf the Grey.md',
      'Gandalf.md',
      '_indexes/_character.md',
      '_indexes/_characters.md',
    ]);
    expect(writer.read('Gandalf.md')).toBe(
      '---\ntitle: Gandalf\ntags:\n  - characters\n---\n\n**Gandalf** is a wizard. See [[Frodo|the hobbit]].\n'
    );
    expect(writer.read('Gandalf the Grey.md')).toBe('Redirect to [[Gandalf]]\n');
    expect(writer.read('_indexes/_character.md')).toBe('# Character Index\n\n- [[Frodo]]\n');
    expect(summary).toMatchObject({
      pagesSeen: 5,
      articlesWritten: 2,
      redirectsWritten: 1,
      redirectsSkipped: 0,
      emptySkipped: 1,
      filteredByNamespace: 1,
      indexesWritten: 2,
      imagesDownloaded: 0,
      failures: [],
      warnings: 0,
      danglingLinks: ['Bag End'],
      aborted: false,
    });
  });

  it('should leave redirects out when skipRedirects is set', async () => {
    const writer = new MemoryVaultWriter();
    const { logger } = createCapturingLogger();

    const summary = await convertDump(PAGES, parseConverterConfig({ skipRedirects: true }), { writer, logger });

    expect(writer.files.has('Gandalf the Grey.md')).toBe(false);
    expect(summary.redirectsSkipped).toBe(1);
    expect(summary.redirectsWritten).toBe(0);
    // Without a namespace filter the talk page is converted too
    expect(summary.articlesWritten).toBe(3);
    expect(writer.read('_indexes/_characters.md')).toBe('# Characters Index\n\n- [[Gandalf]]\n');
  });

  it('should record write failures and keep going', async () => {
    const writer = new FailingWriter('Gandalf.md');
    const { logger } = createCapturingLogger();

    const summary = await convertDump(PAGES, parseConverterConfig({ namespaces: [0] }), { writer, logger });

    expect(summary.failures).toEqual([{ kind: 'write', target: 'Gandalf.md', message: 'disk full' }]);
    expect(summary.articlesWritten).toBe(1);
    expect(summary.indexesWritten).toBe(2);
    expect(summary.danglingLinks).toEqual(['Bag End', 'Gandalf']);
  });

  it('should count and log template diagnostics', async () => {
    const { logger, entries } = createCapturingLogger();
    const page = createMockWikiPage({ title: 'Sting', text: 'A sword.{{citation needed}}' });

    const summary = await convertDump([page], parseConverterConfig({}), { writer: new MemoryVaultWriter(), logger });

    expect(summary.warnings).toBe(1);
    expect(entries.find((e) => e.level === 'warn')).toMatchObject({
      message: 'Dropped template {{citation needed}}',
      data: { page: 'Sting', kind: 'unhandled-template', detail: 'citation needed' },
    });
  });

  it('should stop without indexes when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const writer = new MemoryVaultWriter();
    const { logger } = createCapturingLogger();

    const summary = await convertDump(PAGES, parseConverterConfig({}), { writer, logger, signal: controller.signal });

    expect(summary.aborted).toBe(true);
    expect(summary.pagesSeen).toBe(0);
    expect(writer.paths()).toEqual([]);
  });

  it('should download referenced images when a base URL is set', async () => {
    const fetchMock = vi.fn(async () => createMockFetchResponse(new Uint8Array([9])));
    vi.stubGlobal('fetch', fetchMock);
    const writer = new MemoryVaultWriter();
    const { logger } = createCapturingLogger();
    const pages = [
      createMockWikiPage({ title: 'Ring', text: '[[File:Ring.png]] Precious.' }),
      createMockWikiPage({ title: 'Gollum', text: '[[File:Ring.png|thumb]] Mine.' }),
    ];

    const summary = await convertDump(pages, parseConverterConfig({ imageBaseUrl: 'https://example.org/files' }), {
      writer,
      logger,
      retryDelayMs: 0,
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(summary.imagesDownloaded).toBe(1);
    expect(writer.files.get('images/Ring.png')).toEqual(new Uint8Array([9]));
  });

  it('should not download images when downloads are off', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const { logger } = createCapturingLogger();

    const summary = await convertDump(
      [createMockWikiPage({ text: '[[File:Ring.png]]' })],
      parseConverterConfig({ imageBaseUrl: 'https://example.org/files' }),
      { writer: new MemoryVaultWriter(), logger, downloadImages: false }
    );

    expect(fetchMock).not.toHaveBeenCalled();
    expect(summary.imagesDownloaded).toBe(0);
  });

  it('should read pages from an XML byte stream', async () => {
    const writer = new MemoryVaultWriter();
    const { logger } = createCapturingLogger();
    const xml = createSampleXml(PAGES.slice(0, 3));

    const summary = await convertDump(createXmlStream(xml, 4), parseConverterConfig({}), { writer, logger });

    expect(summary.articlesWritten).toBe(2);
    expect(summary.redirectsWritten).toBe(1);
    expect(writer.read('Frodo.md')).toBe(
      '---\ntitle: Frodo\ntags:\n  - character\ninfobox: Character\nname: Frodo\nrace: Hobbit\n---\n\nFrodo lives in [[Bag End]].\n'
    );
  });

  it('should fail on malformed XML before writing indexes', async () => {
    const writer = new MemoryVaultWriter();
    const { logger } = createCapturingLogger();
    const xml = '<mediawiki><page><title>A</title><revision><text>[[Category:X]] a</text></revision></page><page><title>B';

    await expect(convertDump(createXmlStream(xml), parseConverterConfig({}), { writer, logger })).rejects.toThrow(
      InputError
    );
    expect(writer.paths().filter((p) => p.startsWith('_indexes/'))).toEqual([]);
  });
});
