/**
 * Configuration Schema Validation
 *
 * Zod schema for the converter configuration, merged from `.wiki2vaultrc`
 * files, environment variables and CLI flags.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_DOWNLOAD_CONCURRENCY, MAX_DOWNLOAD_CONCURRENCY } from './constants.js';

/** Directory inside the vault: relative, no `..` segments */
const vaultDir = z
  .string()
  .min(1)
  .refine(
    (p) => !/^([\\/]|[a-zA-Z]:)/.test(p) && !p.split(/[\\/]/).includes('..'),
    { message: 'must be a relative path inside the vault' }
  );

/**
 * Converter Configuration Schema
 */
export const ConverterConfigSchema = z
  .object({
    /** Drop redirect pages instead of writing pointer notes */
    skipRedirects: z.boolean().default(false),

    /** Vault root */
    outputDir: z.string().min(1).default('./vault'),

    /** Image directory, relative to the vault root */
    imageDir: vaultDir.default('images'),

    /** Tag index directory, relative to the vault root */
    indexDir: vaultDir.default('_indexes'),

    /** Base URL image file names are appended to; unset disables downloads */
    imageBaseUrl: z.string().url().optional(),

    /** Template names treated as infoboxes besides `Infobox ...` */
    infoboxTemplates: z.array(z.string().min(1)).default([]),

    /** Namespace ids to convert; unset converts every page */
    namespaces: z.array(z.number().int()).optional(),

    /** Join hard-wrapped lines into paragraphs */
    unwrapParagraphs: z.boolean().default(true),

    /** Parallel image downloads */
    downloadConcurrency: z
      .number()
      .int()
      .min(1)
      .max(MAX_DOWNLOAD_CONCURRENCY)
      .default(DEFAULT_DOWNLOAD_CONCURRENCY),
  })
  .strict();

/** Validated configuration, defaults applied */
export type ConverterConfig = z.output<typeof ConverterConfigSchema>;

/** Configuration as written in files or built from flags */
export type ConverterConfigInput = z.input<typeof ConverterConfigSchema>;

/**
 * Validate configuration
 *
 * @throws {ConfigError} With one line per issue
 */
export function parseConverterConfig(config: unknown): ConverterConfig {
  const result = ConverterConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }
  return result.data;
}

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
