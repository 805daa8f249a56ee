#!/usr/bin/env node

import fs from 'node:fs/promises';
import { Command } from 'commander';
import { getConverterConfig, normalizeBaseUrl } from './config';
import { Converter } from './converter';
import { parseMarkdownFile, stringifyMarkdownFile } from './metadata';
import { isRecord } from './validation';

interface ToMarkdownOptions {
  output?: string;
  baseUrl?: string;
  workItem?: string;
  field: string;
}

interface ToAdfOptions {
  output?: string;
  strict?: boolean;
  quiet?: boolean;
}

const program = new Command();

// Global debug flag
let isDebugMode = false;

// Helper function for detailed error logging
function logError(message: string, error: Error | unknown) {
  console.error(`Error: ${message}`);
  if (error instanceof Error) {
    console.error(error.message);
    if (isDebugMode && error.stack) {
      console.error(error.stack);
    }
  } else {
    console.error(String(error));
  }
}

/**
 * Accept a bare document, `{ document }`, or an issue payload with the
 * document under `fields.<field>`.
 */
function extractDocument(value: unknown, field: string): unknown {
  if (!isRecord(value) || value.type === 'doc') {
    return value;
  }
  if ('document' in value) {
    return value.document;
  }
  if (isRecord(value.fields) && field in value.fields) {
    return value.fields[field];
  }
  return value;
}

async function writeOutput(text: string, output?: string) {
  if (output) {
    await fs.writeFile(output, text);
    console.error(`Wrote ${output}`);
    return;
  }
  process.stdout.write(text);
}

program
  .name('adfmd')
  .description('Convert between Atlassian Document Format and Markdown')
  .version('1.0.0')
  .option('--debug', 'Enable debug mode with detailed error logging');

program
  .command('to-markdown')
  .description('Render an ADF JSON file as Markdown')
  .argument('<input-file>', 'ADF JSON file')
  .option('-o, --output <file>', 'Output file path')
  .option('--base-url <url>', 'Site URL used to build mention links')
  .option('--work-item <key>', 'Work item key recorded in the front matter')
  .option('--field <name>', 'Field holding the document in an issue payload', 'description')
  .action(async (file: string, options: ToMarkdownOptions) => {
    try {
      isDebugMode = program.opts().debug || false;

      const config = getConverterConfig();
      const baseUrl = options.baseUrl !== undefined ? normalizeBaseUrl(options.baseUrl) : config.baseUrl;
      if (isDebugMode) {
        console.error('DEBUG: to-markdown options:', { ...options, baseUrl });
      }

      const raw: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
      const adf = extractDocument(raw, options.field);

      const converter = new Converter({ baseUrl });
      const validation = converter.validate(adf);
      if (!validation.valid) {
        console.warn(`⚠ ${file} is not a valid ADF document: ${validation.errors.join('; ')}`);
      }

      let markdown = converter.toMarkdown(adf);
      if (options.workItem) {
        markdown = stringifyMarkdownFile(markdown, {
          workItem: options.workItem,
          field: options.field,
          baseUrl: baseUrl ?? undefined,
        });
      } else if (markdown) {
        markdown += '\n';
      }

      await writeOutput(markdown, options.output);
    } catch (error: unknown) {
      logError('Rendering to Markdown failed', error);
      process.exit(1);
    }
  });

program
  .command('to-adf')
  .description('Parse a Markdown file into ADF JSON')
  .argument('<input-file>', 'Markdown file')
  .option('-o, --output <file>', 'Output file path')
  .option('--strict', 'Exit with status 1 when the Markdown produced warnings')
  .option('--quiet', 'Do not print warnings')
  .action(async (file: string, options: ToAdfOptions) => {
    try {
      isDebugMode = program.opts().debug || false;

      const config = getConverterConfig();
      const { content, metadata } = parseMarkdownFile(await fs.readFile(file, 'utf-8'));
      if (isDebugMode) {
        console.error('DEBUG: front matter:', metadata);
      }

      const { document, warnings } = new Converter({ baseUrl: config.baseUrl }).toADF(content);
      if (config.trackWarnings && !options.quiet) {
        for (const warning of warnings) {
          console.warn(`⚠ ${warning}`);
        }
      }

      const payload = metadata.workItem
        ? { workItem: metadata.workItem, field: metadata.field ?? 'description', document }
        : document;
      await writeOutput(`${JSON.stringify(payload, null, 2)}\n`, options.output);

      if (options.strict && warnings.length > 0) {
        console.error(`Error: ${warnings.length} warning(s) in ${file}`);
        process.exit(1);
      }
    } catch (error: unknown) {
      logError('Parsing Markdown failed', error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logError('Command failed', error);
  process.exit(1);
});
