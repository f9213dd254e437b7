/**
 * Vault writers
 *
 * The driver writes notes, indexes and images through `VaultWriter`. The
 * file system writer is used for real runs; the in-memory writer backs
 * dry runs and tests.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { WriteError, describeError } from '../lib/errors.js';

export interface VaultWriter {
  /**
   * Write a file at a path relative to the vault root, creating parent
   * directories as needed.
   *
   * @throws {WriteError}
   */
  write(path: string, content: string | Uint8Array): Promise<void>;
}

/**
 * Writes under a root directory on disk
 */
export class FileSystemVaultWriter implements VaultWriter {
  private readonly createdDirs = new Set<string>();

  constructor(readonly root: string) {}

  async write(path: string, content: string | Uint8Array): Promise<void> {
    const fullPath = join(this.root, path);
    try {
      const dir = dirname(fullPath);
      if (!this.createdDirs.has(dir)) {
        await mkdir(dir, { recursive: true });
        this.createdDirs.add(dir);
      }
      await writeFile(fullPath, content);
    } catch (error) {
      throw new WriteError(`Failed to write ${path}: ${describeError(error)}`, path, { cause: error });
    }
  }
}

/**
 * Keeps files in a map keyed by vault path
 */
export class MemoryVaultWriter implements VaultWriter {
  readonly files = new Map<string, string | Uint8Array>();

  async write(path: string, content: string | Uint8Array): Promise<void> {
    this.files.set(path, content);
  }

  /** Text content of a written file */
  read(path: string): string | undefined {
    const content = this.files.get(path);
    if (content === undefined || typeof content === 'string') return content;
    return new TextDecoder().decode(content);
  }

  paths(): string[] {
    return [...this.files.keys()].sort();
  }
}
