import { getGlobalConfigPath, loadConfig, type Config } from '../config/loader.js';
import { formatRowsPreview } from '../export/preview.js';
import { DocxParagraphSource } from '../ingest/docx-reader.js';
import type { ParagraphSource } from '../ingest/types.js';
import { buildRows, documentNameFromPath } from '../pipeline/convert.js';
import { toRecord } from '../rows/flattener.js';
import { printDiagnostic } from './convert-command.js';
import { CliUsageError } from '../errors.js';
import { takeSwitches, takeValueFlags } from './flag-utils.js';
import { dimText } from './terminal.js';

interface PreviewOptions {
  file: string;
  config: Config;
  json: boolean;
  verbose: boolean;
}

export async function handlePreviewCommand(
  args: string[],
  source: ParagraphSource = new DocxParagraphSource()
): Promise<void> {
  const options = parsePreviewFlags(args);
  const paragraphs = await source.read(options.file);
  const { rows, diagnostics } = buildRows(paragraphs, documentNameFromPath(options.file), options.config);

  if (options.json) {
    console.log(JSON.stringify(rows.map(toRecord), null, 2));
    return;
  }

  console.log(formatRowsPreview(rows));
  console.log('');
  console.log(dimText(`${rows.length} rows`));
  for (const diagnostic of diagnostics) {
    printDiagnostic(diagnostic, options.verbose);
  }
}

function parsePreviewFlags(args: string[]): PreviewOptions {
  const switches = takeSwitches(args, {
    json: ['--json'],
    verbose: ['--verbose'],
    globalConfig: ['--global-config', '-G'],
  });
  const flags = takeValueFlags(args, { config: ['--config', '-c'] });

  const file = args.shift();
  if (!file) {
    throw new CliUsageError('Usage: docxtasks preview <file.docx>');
  }
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }

  return {
    file,
    config: loadConfig(switches.has('globalConfig') ? getGlobalConfigPath() : flags.config),
    json: switches.has('json'),
    verbose: switches.has('verbose'),
  };
}

export function printPreviewHelp(): void {
  const lines = [
    'Usage: docxtasks preview <file.docx> [options]',
    '',
    'Show the task tree a document would produce, without writing a CSV.',
    '',
    'Options:',
    '  --config, -c <path>  Path to config file',
    '  --verbose            Also show debug notes from the outline pass',
    '  --json               Output rows as JSON records',
  ];
  console.log(lines.join('\n'));
}
