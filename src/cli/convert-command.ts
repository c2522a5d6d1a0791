import fs from 'node:fs';
import { getGlobalConfigPath, loadConfig, resolveOutputDir, type Config } from '../config/loader.js';
import { convertBatch, discoverDocuments } from '../pipeline/batch.js';
import type { BatchSummary, DocumentResult } from '../pipeline/types.js';
import type { ParagraphSource } from '../ingest/types.js';
import type { OutlineDiagnostic } from '../outline/types.js';
import { CliUsageError, FileNotFoundError } from '../errors.js';
import { takeSwitches, takeValueFlags } from './flag-utils.js';
import { createProgressReporter } from './progress.js';
import { boldText, dimText, greenText, redText, yellowText } from './terminal.js';

interface ConvertCommandOptions {
  input: string;
  outputDir: string;
  config: Config;
  concurrency: number;
  quiet: boolean;
  verbose: boolean;
  json: boolean;
}

/**
 * Resolves to the batch summary; the caller decides the exit code from
 * `summary.failed`.
 */
export async function handleConvertCommand(args: string[], source?: ParagraphSource): Promise<BatchSummary> {
  const options = parseConvertFlags(args);
  return runConvert(options, source);
}

function parseConvertFlags(args: string[]): ConvertCommandOptions {
  const switches = takeSwitches(args, {
    quiet: ['--quiet', '-q'],
    verbose: ['--verbose'],
    json: ['--json'],
    globalConfig: ['--global-config', '-G'],
  });
  const flags = takeValueFlags(args, {
    input: ['--input', '-i'],
    output: ['--output', '-o'],
    config: ['--config', '-c'],
    concurrency: ['--concurrency'],
  });

  const input = flags.input ?? args.shift();
  if (!input) {
    throw new CliUsageError('Usage: docxtasks convert --input <file|dir> [--output <dir>]');
  }
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }

  const config = loadConfig(switches.has('globalConfig') ? getGlobalConfigPath() : flags.config);

  return {
    input,
    outputDir: resolveOutputDir(config, flags.output),
    config,
    concurrency: parseConcurrency(flags.concurrency, config.processing.concurrency),
    quiet: switches.has('quiet'),
    verbose: switches.has('verbose'),
    json: switches.has('json'),
  };
}

function parseConcurrency(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new CliUsageError(`Invalid --concurrency '${raw}'. Expected a positive integer.`);
  }
  return value;
}

export function resolveInputFiles(input: string): string[] {
  if (!fs.existsSync(input)) {
    throw new FileNotFoundError(input);
  }
  if (fs.statSync(input).isDirectory()) {
    return discoverDocuments(input);
  }
  return [input];
}

async function runConvert(options: ConvertCommandOptions, source?: ParagraphSource): Promise<BatchSummary> {
  const { input, outputDir, config, concurrency, quiet, verbose, json } = options;
  const files = resolveInputFiles(input);

  if (files.length === 0) {
    if (json) {
      console.log(JSON.stringify({ success: true, input, outputDir, succeeded: 0, failed: 0, documents: [] }, null, 2));
    } else if (!quiet) {
      console.log(`${yellowText('warning:')} no .docx files found in ${input}`);
    }
    return { results: [], succeeded: 0, failed: 0 };
  }

  if (!quiet && !json) {
    console.log(`Converting ${files.length} document(s) into ${boldText(outputDir)}`);
  }

  const progress = createProgressReporter(files.length, !quiet && !json && files.length > 1);
  let summary: BatchSummary;
  try {
    summary = await convertBatch(files, {
      outputDir,
      config,
      source,
      concurrency,
      onProgress: progress.onProgress,
    });
  } finally {
    progress.stop();
  }

  if (json) {
    console.log(
      JSON.stringify(
        {
          success: summary.failed === 0,
          input,
          outputDir,
          succeeded: summary.succeeded,
          failed: summary.failed,
          documents: summary.results.map(toJsonResult),
        },
        null,
        2
      )
    );
    return summary;
  }

  for (const result of summary.results) {
    printResult(result, { quiet, verbose });
  }

  if (!quiet || summary.failed > 0) {
    console.log('');
    const failedText = summary.failed > 0 ? redText(`${summary.failed} failed`) : dimText('0 failed');
    console.log(`${greenText(`${summary.succeeded} succeeded`)}, ${failedText}`);
  }

  return summary;
}

function printResult(result: DocumentResult, flags: { quiet: boolean; verbose: boolean }): void {
  if (!result.ok) {
    console.error(`${redText('✗')} ${result.filePath}: ${result.reason}`);
    return;
  }
  if (flags.quiet) return;

  console.log(
    `${greenText('✓')} ${result.filePath} ${dimText('→')} ${result.outputPath} ${dimText(
      `(${result.productTypeCount} product types, ${result.rowCount} rows)`
    )}`
  );
  for (const diagnostic of result.diagnostics) {
    printDiagnostic(diagnostic, flags.verbose);
  }
}

export function printDiagnostic(diagnostic: OutlineDiagnostic, verbose: boolean): void {
  const location = diagnostic.paragraph === undefined ? '' : `¶${diagnostic.paragraph + 1}: `;
  if (diagnostic.level === 'warning') {
    console.log(`  ${yellowText('warning:')} ${location}${diagnostic.message}`);
  } else if (verbose) {
    console.log(`  ${dimText(`${diagnostic.level}: ${location}${diagnostic.message}`)}`);
  }
}

function toJsonResult(result: DocumentResult): Record<string, unknown> {
  if (result.ok) {
    return {
      file: result.filePath,
      ok: true,
      output: result.outputPath,
      rows: result.rowCount,
      productTypes: result.productTypeCount,
      warnings: result.diagnostics.filter((d) => d.level === 'warning').map((d) => d.message),
    };
  }
  return { file: result.filePath, ok: false, kind: result.kind, reason: result.reason };
}

export function printConvertHelp(): void {
  const lines = [
    'Usage: docxtasks convert [options] [input]',
    '',
    'Convert .docx outlines into task import CSV files (one per document).',
    '',
    'Options:',
    '  --input, -i <path>      Input .docx file or directory of .docx files',
    '  --output, -o <dir>      Output directory (default: config output.directory)',
    '  --config, -c <path>     Path to config file',
    '  --concurrency <n>       Documents converted at once (default: 4)',
    '  --quiet, -q             Only report failures',
    '  --verbose               Also show debug notes from the outline pass',
    '  --json                  Output as JSON',
    '',
    'Examples:',
    '  docxtasks convert -i specs/ -o csv/',
    '  docxtasks convert "Section 09 91 23.docx"',
  ];
  console.log(lines.join('\n'));
}
