/**
 * wiki2vault - Main Library Entry Point
 *
 * Re-exports the translator, the dump reader and the vault output layer
 * for library consumers.
 */

// ============================================================================
// WIKITEXT - Wikitext → Markdown translation (pure, synchronous)
// ============================================================================
export {
  formatWikitext,
  formatMarkup,
  formatInline,
  preprocess,
  extractCategories,
  extractInfobox,
  normalizeTag,
  normalizeTitle,
  parseWikiLink,
  resolveLink,
  resolveImage,
  getRedirectTarget,
  englishInflector,
  inferTypeTag,
  unwrapParagraphs,
  findTemplates,
  findLinks,
  parseTemplate,
} from './lib/wikitext/index.js'

export type {
  Diagnostic,
  DiagnosticKind,
  FormatContext,
  FormatResult,
  Infobox,
  InfoboxField,
  ImageReference,
  Inflector,
  WikiLink,
} from './lib/wikitext/index.js'

// ============================================================================
// INGEST - Streaming MediaWiki XML reader
// ============================================================================
export { readPages, parsePages, openDump, createMediaWikiParser } from './ingest/index.js'
export type { WikiPage, ReadPagesOptions } from './ingest/index.js'

// ============================================================================
// VAULT - Notes, tag indexes and the conversion driver
// ============================================================================
export {
  convertDump,
  transformPage,
  createConversionContext,
  TagIndex,
  FileSystemVaultWriter,
  MemoryVaultWriter,
} from './vault/index.js'

export type {
  PageDocument,
  IndexDocument,
  ConversionContext,
  ConversionSummary,
  VaultWriter,
  ConvertOptions,
  DumpSource,
} from './vault/index.js'

// ============================================================================
// CONFIG & ERRORS
// ============================================================================
export {
  ConverterConfigSchema,
  parseConverterConfig,
  type ConverterConfig,
  type ConverterConfigInput,
} from './lib/config-schema.js'

export {
  InputError,
  ConfigError,
  WriteError,
  DownloadError,
  StateError,
  isTypedError,
  isFatal,
  describeError,
} from './lib/errors.js'

export { createLogger, Logger, setLoggerProvider, type LoggerProvider } from './lib/logger.js'
