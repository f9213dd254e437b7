/**
 * Streaming XML parser for MediaWiki export files
 *
 * SAX parsing inside a TransformStream: bytes in, WikiPage objects out,
 * one page resident at a time. Works with every export schema version
 * since only element names are matched.
 */

import { TransformStream } from 'node:stream/web';
import Saxophone from 'saxophone';
import type { WikiPage, ParserOptions } from './types.js';
import { createLogger } from '../lib/logger.js';
import { InputError } from '../lib/errors.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('ingest:parse-xml');

type Field = 'title' | 'id' | 'ns' | 'text' | 'timestamp';

/** Elements whose text is captured, keyed by `parent/child` */
const FIELDS = new Map<string, Field>([
  ['page/title', 'title'],
  ['page/id', 'id'],
  ['page/ns', 'ns'],
  ['revision/text', 'text'],
  ['revision/timestamp', 'timestamp'],
]);

/** Page under construction */
interface PageDraft {
  title?: string;
  id?: number;
  ns?: number;
  text?: string;
  timestamp?: string;
  redirect?: string;
}

/**
 * Create a streaming MediaWiki XML parser.
 *
 * Malformed XML errors the stream with an `InputError`; pages already
 * emitted stay emitted. A page without a title is dropped with a warning.
 *
 * @example
 * ```typescript
 * const pages = byteStream.pipeThrough(createMediaWikiParser());
 * for await (const page of pages) {
 *   console.log(page.title);
 * }
 * ```
 */
export function createMediaWikiParser(options: ParserOptions = {}): TransformStream<Uint8Array, WikiPage> {
  const log = options.logger ?? getLog();
  const source = options.source ?? 'input';
  const sax = new Saxophone();

  // Open element names, outermost first
  const stack: string[] = [];
  let draft: PageDraft | null = null;
  let capture: Field | null = null;
  let buffer = '';
  let inRevision = false;

  const ready: WikiPage[] = [];
  let failure: InputError | null = null;
  // Settles a pending flush when the parser errors after end()
  let settle: ((error: InputError) => void) | null = null;

  const fail = (error: Error): void => {
    if (failure) return;
    failure = new InputError(`Malformed XML in ${source}: ${error.message}`, { path: source, cause: error });
    settle?.(failure);
  };

  const finishPage = (): void => {
    if (!draft) return;
    const { title } = draft;
    if (title === undefined || title.trim() === '') {
      log.warn('Page without title dropped', { id: draft.id });
      return;
    }
    const page: WikiPage = {
      title,
      id: draft.id ?? 0,
      ns: draft.ns ?? 0,
      text: draft.text ?? '',
      timestamp: draft.timestamp ?? '',
    };
    if (draft.redirect !== undefined) page.redirect = draft.redirect;
    ready.push(page);
  };

  sax.on('tagopen', (tag) => {
    const name = tag.name.toLowerCase();
    const parent = stack[stack.length - 1] ?? '';

    if (name === 'page') {
      draft = {};
      inRevision = false;
    } else if (name === 'revision' && draft) {
      // Later revisions replace earlier ones
      inRevision = true;
    } else if (name === 'redirect' && draft) {
      const title = Saxophone.parseAttrs(tag.attrs)['title'];
      if (title !== undefined) draft.redirect = Saxophone.parseEntities(title);
    }

    if (tag.isSelfClosing) {
      // <text bytes="0" /> is an empty body
      if (draft && inRevision && name === 'text' && parent === 'revision') draft.text = '';
      return;
    }

    stack.push(name);
    const field = draft ? FIELDS.get(`${parent}/${name}`) : undefined;
    if (field) {
      capture = field;
      buffer = '';
    }
  });

  sax.on('tagclose', (tag) => {
    const name = tag.name.toLowerCase();
    stack.pop();

    if (capture && draft) {
      const value = buffer;
      switch (capture) {
        case 'title':
          draft.title = value.trim();
          break;
        case 'id':
          draft.id = Number.parseInt(value, 10) || 0;
          break;
        case 'ns':
          draft.ns = Number.parseInt(value, 10) || 0;
          break;
        case 'text':
          draft.text = value;
          break;
        case 'timestamp':
          draft.timestamp = value.trim();
          break;
      }
      capture = null;
      buffer = '';
    }

    if (name === 'revision') {
      inRevision = false;
    } else if (name === 'page') {
      finishPage();
      draft = null;
    }
  });

  sax.on('text', (node) => {
    if (capture) buffer += Saxophone.parseEntities(node.contents);
  });

  sax.on('cdata', (node) => {
    if (capture) buffer += node.contents;
  });

  sax.on('error', fail);

  const drain = (controller: { enqueue(page: WikiPage): void }): void => {
    let page = ready.shift();
    while (page) {
      controller.enqueue(page);
      page = ready.shift();
    }
  };

  return new TransformStream<Uint8Array, WikiPage>(
    {
      transform(chunk, controller) {
        if (failure) {
          controller.error(failure);
          return;
        }
        sax.write(chunk);
        drain(controller);
      },

      flush(controller) {
        return new Promise<void>((resolve, reject) => {
          if (failure) {
            reject(failure);
            return;
          }
          settle = reject;
          sax.on('finish', () => {
            drain(controller);
            resolve();
          });
          sax.end();
        });
      },
    },
    { highWaterMark: 64 * 1024 },
    { highWaterMark: 100 }
  );
}

/**
 * Keep pages of the given namespaces. Dropped pages are reported through
 * `onFiltered`.
 */
export function createNamespaceFilter(
  namespaces: readonly number[] = [0],
  onFiltered?: (page: WikiPage) => void
): TransformStream<WikiPage, WikiPage> {
  const nsSet = new Set(namespaces);

  return new TransformStream<WikiPage, WikiPage>({
    transform(page, controller) {
      if (nsSet.has(page.ns)) {
        controller.enqueue(page);
      } else {
        onFiltered?.(page);
      }
    },
  });
}
