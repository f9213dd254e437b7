/**
 * Run-scoped tag → pages index
 *
 * Pages are recorded while the run streams; index notes are built once
 * at the end. The mapping only grows: nothing is ever removed, and
 * recording after `build()` is an error.
 */

import type { IndexDocument } from './types.js';
import { StateError } from '../lib/errors.js';
import { INDEX_FILE_PREFIX } from '../lib/constants.js';
import { cleanFilename, FilenameAllocator } from './filenames.js';

/** A page as listed in an index */
export interface IndexedPage {
  title: string;
  /** Note name (file name without extension) */
  note: string;
}

/** `fictional_character` → `Fictional Character` */
export function tagTitle(tag: string): string {
  return tag
    .split('_')
    .filter((w) => w.length > 0)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

function compareTitles(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class TagIndex {
  private readonly entries = new Map<string, Map<string, IndexedPage>>();
  private built = false;

  /**
   * Record a page under each of its tags.
   *
   * @throws {StateError} After `build()`
   */
  record(tags: Iterable<string>, page: IndexedPage): void {
    if (this.built) {
      throw new StateError(`Cannot record "${page.title}": tag index already built`);
    }
    for (const tag of tags) {
      let pages = this.entries.get(tag);
      if (!pages) {
        pages = new Map();
        this.entries.set(tag, pages);
      }
      if (!pages.has(page.title)) pages.set(page.title, page);
    }
  }

  /** Tags recorded so far, sorted */
  tags(): string[] {
    return [...this.entries.keys()].sort(compareTitles);
  }

  /** Titles recorded under a tag, sorted */
  pagesFor(tag: string): string[] {
    return [...(this.entries.get(tag)?.keys() ?? [])].sort(compareTitles);
  }

  get size(): number {
    return this.entries.size;
  }

  get isBuilt(): boolean {
    return this.built;
  }

  /**
   * Build one index note per tag and close the index.
   *
   * @example
   * // _indexes/_characters.md
   * // # Characters Index
   * //
   * // - [[Frodo]]
   * // - [[Gandalf]]
   */
  build(indexDir: string): IndexDocument[] {
    this.built = true;
    return this.tags().map((tag) => {
      const pages = [...(this.entries.get(tag)?.values() ?? [])].sort((a, b) => compareTitles(a.title, b.title));
      const lines = pages.map((p) => (p.note === p.title ? `- [[${p.title}]]` : `- [[${p.note}|${p.title}]]`));
      return {
        tag,
        path: FilenameAllocator.pathFor(`${INDEX_FILE_PREFIX}${cleanFilename(tag)}`, indexDir),
        content: `# ${tagTitle(tag)} Index\n\n${lines.join('\n')}\n`,
        pages: pages.map((p) => p.title),
      };
    });
  }
}
