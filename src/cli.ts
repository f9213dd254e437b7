#!/usr/bin/env node
/**
 * wiki2vault CLI
 *
 * Convert MediaWiki XML dumps into Markdown vaults.
 */

import { Command } from 'commander';
import { convertCommand } from './cli/convert.js';

const program = new Command()
  .name('wiki2vault')
  .description('Convert MediaWiki XML dumps into Markdown vaults')
  .version('0.1.0');

// Register commands
program.addCommand(convertCommand);

// Format command (inline since it's simple)
program
  .command('format')
  .description('Translate one wikitext file to Markdown on stdout')
  .argument('<file>', 'Wikitext file')
  .option('--infobox-templates <list>', 'Extra templates to treat as infoboxes (comma-separated)')
  .action(async (file: string, options: { infoboxTemplates?: string }) => {
    const { readFile } = await import('node:fs/promises');
    const { basename, extname } = await import('node:path');
    const { fatal, parseList, resolvePath } = await import('./cli/utils.js');
    const { createConversionContext, transformPage } = await import('./vault/transform.js');
    const { describeError } = await import('./lib/errors.js');

    const text = await readFile(resolvePath(file), 'utf-8').catch((error: unknown) =>
      fatal(`Cannot read ${file}: ${describeError(error)}`)
    );

    const context = createConversionContext({
      infoboxTemplates: options.infoboxTemplates ? parseList(options.infoboxTemplates) : [],
    });
    const title = basename(file, extname(file));
    const document = transformPage({ title, id: 0, ns: 0, text, timestamp: '' }, context);

    if (document) {
      process.stdout.write(document.content);
    }
    for (const diagnostic of document?.diagnostics ?? []) {
      console.error(`${diagnostic.kind}: ${diagnostic.message}`);
    }
  });

// Parse arguments
await program.parseAsync(process.argv);
