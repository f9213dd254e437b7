/**
 * Tests for dump sources
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { gzipSync } from 'node:zlib';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readPages } from '../../src/ingest/source.js';
import { InputError } from '../../src/lib/errors.js';
import type { WikiPage } from '../../src/ingest/types.js';
import { collectAsyncIterable, createCapturingLogger, createMockWikiPage, createSampleXml } from '../helpers.js';

const PAGES = [
  createMockWikiPage({ title: 'Shire', id: 1, text: 'Green hills.' }),
  createMockWikiPage({ title: 'Talk:Shire', id: 2, ns: 1, text: 'Sources?' }),
  createMockWikiPage({ title: 'Bree', id: 3, text: 'A village.' }),
];

describe('readPages', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wiki2vault-dump-'));
    const xml = createSampleXml(PAGES);
    await writeFile(join(dir, 'dump.xml'), xml);
    await writeFile(join(dir, 'dump.xml.gz'), gzipSync(xml));
    // Compressed, with a name that says nothing
    await writeFile(join(dir, 'dump.bin'), gzipSync(xml));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read an uncompressed dump', async () => {
    const { logger } = createCapturingLogger();
    const pages = await collectAsyncIterable(readPages(join(dir, 'dump.xml'), { logger }));
    expect(pages).toEqual(PAGES);
  });

  it('should read a gzip dump', async () => {
    const { logger } = createCapturingLogger();
    const pages = await collectAsyncIterable(readPages(join(dir, 'dump.xml.gz'), { logger }));
    expect(pages.map((p) => p.title)).toEqual(['Shire', 'Talk:Shire', 'Bree']);
  });

  it('should detect gzip from the magic bytes', async () => {
    const { logger } = createCapturingLogger();
    const pages = await collectAsyncIterable(readPages(join(dir, 'dump.bin'), { logger }));
    expect(pages).toHaveLength(3);
  });

  it('should filter namespaces and report dropped pages', async () => {
    const { logger } = createCapturingLogger();
    const filtered: WikiPage[] = [];
    const pages = await collectAsyncIterable(
      readPages(join(dir, 'dump.xml'), { logger, namespaces: [0], onFiltered: (page) => filtered.push(page) })
    );
    expect(pages.map((p) => p.title)).toEqual(['Shire', 'Bree']);
    expect(filtered.map((p) => p.title)).toEqual(['Talk:Shire']);
  });

  it('should stop when the signal aborts', async () => {
    const { logger } = createCapturingLogger();
    const controller = new AbortController();
    const titles: string[] = [];
    for await (const page of readPages(join(dir, 'dump.xml'), { logger, signal: controller.signal })) {
      titles.push(page.title);
      controller.abort();
    }
    expect(titles).toEqual(['Shire']);
  });

  it('should throw an InputError for a missing file', async () => {
    const error = await collectAsyncIterable(readPages(join(dir, 'missing.xml'))).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InputError);
    expect(error).toMatchObject({ path: join(dir, 'missing.xml') });
  });
});
