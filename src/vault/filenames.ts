/**
 * Title → note file name
 */

import { NOTE_EXTENSION } from '../lib/constants.js';

const UNSAFE_FILENAME_CHARS = /[\\/*?:"<>|]/g;

/** Replace characters not allowed in file names with `_` */
export function cleanFilename(title: string): string {
  return title.trim().replace(UNSAFE_FILENAME_CHARS, '_');
}

/**
 * Hands out unique note names for a run. A repeated name gets `_1`, `_2`,
 * ... appended. Names compare case-insensitively so notes stay distinct on
 * case-insensitive file systems.
 */
export class FilenameAllocator {
  private readonly taken = new Set<string>();

  /** Note name (no extension) for a title */
  allocate(title: string): string {
    const base = cleanFilename(title);
    let name = base;
    let n = 0;
    while (this.taken.has(name.toLowerCase())) {
      n++;
      name = `${base}_${n}`;
    }
    this.taken.add(name.toLowerCase());
    return name;
  }

  /** Vault path for a note name */
  static pathFor(name: string, dir?: string): string {
    const file = `${name}${NOTE_EXTENSION}`;
    return dir ? `${dir}/${file}` : file;
  }

  get size(): number {
    return this.taken.size;
  }
}
