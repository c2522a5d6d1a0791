import { getGlobalConfigPath, loadConfig, type Config } from '../config/loader.js';
import { DocxParagraphSource } from '../ingest/docx-reader.js';
import type { ParagraphSource } from '../ingest/types.js';
import { findSectionMarker } from '../outline/extractor.js';
import { resolveMatchingRules } from '../outline/matching.js';
import { summarizeStructure } from '../outline/structure.js';
import { CliUsageError } from '../errors.js';
import { takeSwitches, takeValueFlags } from './flag-utils.js';
import { boldText, cyanText, dimText } from './terminal.js';

interface InspectOptions {
  file: string;
  config: Config;
  json: boolean;
}

export async function handleInspectCommand(
  args: string[],
  source: ParagraphSource = new DocxParagraphSource()
): Promise<void> {
  const { file, config, json } = parseInspectFlags(args);
  const paragraphs = await source.read(file);
  const rules = resolveMatchingRules(config);
  const summary = summarizeStructure(paragraphs, rules);
  const marker = findSectionMarker(paragraphs, rules);

  if (json) {
    console.log(JSON.stringify({ file, ...summary, sectionMarker: marker }, null, 2));
    return;
  }

  const { headingCounts } = summary;
  console.log(boldText(file));
  console.log(`  Paragraphs:        ${summary.paragraphCount}`);
  console.log(`  Section headings:  ${headingCounts.section}`);
  console.log(`  Product types:     ${headingCounts.productType}`);
  console.log(`  Manufacturers:     ${headingCounts.manufacturer}`);
  console.log(`  Descriptions:      ${headingCounts.description}`);
  console.log(
    marker
      ? `  Products section:  ${cyanText(marker.labelText)} ${dimText(`(paragraph ${marker.position + 1})`)}`
      : `  Products section:  ${dimText('(not found)')}`
  );
}

function parseInspectFlags(args: string[]): InspectOptions {
  const switches = takeSwitches(args, { json: ['--json'], globalConfig: ['--global-config', '-G'] });
  const flags = takeValueFlags(args, { config: ['--config', '-c'] });

  const file = args.shift();
  if (!file) {
    throw new CliUsageError('Usage: docxtasks inspect <file.docx>');
  }
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }

  const config = loadConfig(switches.has('globalConfig') ? getGlobalConfigPath() : flags.config);
  return { file, config, json: switches.has('json') };
}

export function printInspectHelp(): void {
  const lines = [
    'Usage: docxtasks inspect <file.docx> [options]',
    '',
    'Count headings per outline level and locate the products section.',
    '',
    'Options:',
    '  --config, -c <path>  Path to config file',
    '  --json               Output as JSON',
  ];
  console.log(lines.join('\n'));
}
