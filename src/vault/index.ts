/**
 * Vault output: page transformer, tag indexes, writers and the
 * conversion driver
 */

export type {
  PageDocument,
  IndexDocument,
  Frontmatter,
  FrontmatterValue,
  TransformOptions,
  ConversionContext,
  ConversionSummary,
  FailureRecord,
  SkipReason,
} from './types.js';

export { cleanFilename, FilenameAllocator } from './filenames.js';
export { TagIndex, tagTitle, type IndexedPage } from './tag-index.js';
export { buildFrontmatter, renderDocument, splitLinkedValue } from './frontmatter.js';
export {
  createConversionContext,
  transformPage,
  skipReason,
  DEFAULT_TRANSFORM_OPTIONS,
} from './transform.js';
export { type VaultWriter, FileSystemVaultWriter, MemoryVaultWriter } from './writer.js';
export {
  downloadImage,
  downloadImages,
  imageUrl,
  type DownloadOptions,
  type DownloadResult,
} from './download.js';
export { convertDump, type ConvertOptions, type DumpSource } from './pipeline.js';
