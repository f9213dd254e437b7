/**
 * Convert Command
 *
 * Convert a MediaWiki XML dump into a Markdown vault.
 */

import { Command } from 'commander';
import {
  color,
  createSpinner,
  formatDuration,
  formatNumber,
  formatTable,
  loadConfig,
  fatal,
  warn,
  parseIntegerList,
  parseList,
  resolvePath,
  supportsColor,
  stripAnsi,
} from './utils.js';
import { convertDump } from '../vault/pipeline.js';
import { FileSystemVaultWriter, MemoryVaultWriter, type VaultWriter } from '../vault/writer.js';
import type { ConversionSummary } from '../vault/types.js';
import type { ConverterConfig, ConverterConfigInput } from '../lib/config-schema.js';
import { createLogger } from '../lib/logger.js';
import { describeError, isFatal } from '../lib/errors.js';

/** Convert command options */
export interface ConvertCliOptions {
  skipRedirects?: boolean;
  imageBaseUrl?: string;
  infoboxTemplates?: string;
  namespaces?: string;
  unwrap: boolean;
  concurrency?: string;
  dryRun: boolean;
  json: boolean;
  verbose: boolean;
}

/**
 * Config overrides from command-line flags. Flags that were not given stay
 * undefined so lower-precedence sources apply.
 */
export function buildOverrides(outputDir: string | undefined, options: ConvertCliOptions): ConverterConfigInput {
  const overrides: ConverterConfigInput = {
    outputDir,
    imageBaseUrl: options.imageBaseUrl,
    skipRedirects: options.skipRedirects ? true : undefined,
    infoboxTemplates: options.infoboxTemplates ? parseList(options.infoboxTemplates) : undefined,
    namespaces: options.namespaces ? parseIntegerList(options.namespaces) : undefined,
    downloadConcurrency: options.concurrency ? Number(options.concurrency) : undefined,
  };
  if (!options.unwrap) {
    overrides.unwrapParagraphs = false;
  }
  return overrides;
}

/**
 * Merged configuration for a run; flag parsing errors surface as ConfigError
 */
export async function resolveConfig(outputDir: string | undefined, options: ConvertCliOptions): Promise<ConverterConfig> {
  return loadConfig(buildOverrides(outputDir, options));
}

/**
 * Summary table printed at the end of a run
 */
export function renderSummary(summary: ConversionSummary): string {
  const rows = [
    { metric: 'Pages seen', count: formatNumber(summary.pagesSeen) },
    { metric: 'Articles written', count: formatNumber(summary.articlesWritten) },
    { metric: 'Redirects written', count: formatNumber(summary.redirectsWritten) },
    { metric: 'Redirects skipped', count: formatNumber(summary.redirectsSkipped) },
    { metric: 'Empty pages skipped', count: formatNumber(summary.emptySkipped) },
    { metric: 'Outside namespaces', count: formatNumber(summary.filteredByNamespace) },
    { metric: 'Tag indexes', count: formatNumber(summary.indexesWritten) },
    { metric: 'Images downloaded', count: formatNumber(summary.imagesDownloaded) },
    { metric: 'Images failed', count: formatNumber(summary.imagesFailed) },
    { metric: 'Warnings', count: formatNumber(summary.warnings) },
    { metric: 'Dangling links', count: formatNumber(summary.danglingLinks.length) },
  ];

  const lines = [formatTable(rows, ['metric', 'count'])];
  if (summary.failures.length > 0) {
    lines.push('', `  ${color.warning('Failures:')}`);
    for (const failure of summary.failures) {
      lines.push(`    ${failure.kind} ${failure.target}: ${failure.message}`);
    }
  }
  return lines.join('\n');
}

export const convertCommand = new Command('convert')
  .description('Convert a MediaWiki XML dump into a Markdown vault')
  .argument('<input>', 'Dump file (.xml or .xml.gz)')
  .argument('[outputDir]', 'Vault directory (default ./vault)')
  .option('--skip-redirects', 'Do not write redirect pages')
  .option('--image-base-url <url>', 'Download referenced images from this URL')
  .option('--infobox-templates <list>', 'Extra templates to treat as infoboxes (comma-separated)')
  .option('--namespaces <list>', 'Namespace ids to convert (comma-separated)')
  .option('--no-unwrap', 'Keep the line breaks inside paragraphs')
  .option('-c, --concurrency <n>', 'Parallel image downloads')
  .option('--dry-run', 'Convert without writing files', false)
  .option('--json', 'Print the summary as JSON', false)
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (input: string, outputDir: string | undefined, options: ConvertCliOptions) => {
    let logger = createLogger('convert');
    if (options.verbose) {
      logger = logger.reconfigure({ level: 'debug' });
    }
    if (options.json) {
      // JSON summary owns stdout
      logger = logger.reconfigure({ sink: { stdout: (line) => console.error(line), stderr: (line) => console.error(line) } });
    }

    const config = await resolveConfig(outputDir, options).catch((error: unknown) =>
      fatal(describeError(error))
    );

    const vaultDir = resolvePath(config.outputDir);
    const inputPath = resolvePath(input);
    const writer: VaultWriter = options.dryRun ? new MemoryVaultWriter() : new FileSystemVaultWriter(vaultDir);

    if (!options.json) {
      console.log('\n  wiki2vault\n');
      console.log(`  Input:          ${color.cyan(inputPath)}`);
      console.log(`  Vault:          ${color.cyan(vaultDir)}`);
      console.log(`  Skip redirects: ${config.skipRedirects ? color.green('yes') : color.gray('no')}`);
      if (config.imageBaseUrl) {
        console.log(`  Images from:    ${color.cyan(config.imageBaseUrl)}`);
      }
      if (config.namespaces) {
        console.log(`  Namespaces:     ${color.cyan(config.namespaces.join(', '))}`);
      }
      console.log('');
      if (options.dryRun) {
        console.log(color.yellow('  Dry run mode - no files will be written.\n'));
      }
    }

    // Abort controller for graceful shutdown
    const abortController = new AbortController();
    const shutdown = (): void => {
      if (abortController.signal.aborted) return;
      warn('Interrupted, stopping after the current page');
      abortController.abort();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    const spinner = options.json || !supportsColor() ? null : createSpinner('Converting pages...');
    let converted = 0;

    try {
      const summary = await convertDump(inputPath, config, {
        writer,
        logger,
        signal: abortController.signal,
        downloadImages: !options.dryRun,
        onPage: (title) => {
          converted++;
          if (spinner && converted % 100 === 0) {
            spinner.update(`Converting pages... ${formatNumber(converted)} (${title})`);
          }
        },
      });

      const seconds = summary.durationMs / 1000;
      spinner?.success(`Converted ${formatNumber(summary.pagesSeen)} pages in ${formatDuration(seconds)}`);

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        const table = renderSummary(summary);
        console.log(`\n${supportsColor() ? table : stripAnsi(table)}\n`);
        if (summary.aborted) {
          warn('Conversion was interrupted; tag indexes were not written');
        }
      }
    } catch (error) {
      spinner?.fail('Conversion failed');
      if (isFatal(error)) {
        fatal(describeError(error));
      }
      throw error;
    } finally {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
    }
  });
