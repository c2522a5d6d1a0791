import { boldText, dimText } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = `${boldText('docxtasks')}: ${dimText('Word outlines to task import CSV')}`;

  const lines = [
    title,
    '',
    'Usage: docxtasks <command> [options]',
    '',
    formatSection('Commands', [
      ['help', 'Show this help'],
      ['convert', 'Convert .docx files into task import CSV files'],
      ['preview <file>', 'Show the task tree for one document'],
      ['inspect <file>', 'Count outline headings and locate the products section'],
      ['config', 'Manage configuration'],
    ]),
    '',
    formatSection('Global flags', [
      ['--config, -c <path>', 'Path to config file'],
      ['--json', 'Output as JSON'],
      ['--help, -h', 'Show help'],
      ['--version', 'Show version'],
    ]),
    '',
    formatSection('Outline', [
      ['Heading 1', 'Section; the second "Products" heading opens the products region'],
      ['Heading 2', 'Product type (task under the document task)'],
      ['Heading 3', 'Manufacturer, when the text names one (subtask of the product type)'],
      ['Heading 4', 'Description line, collected into the manufacturer notes'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .docxtasks.json (walks up from cwd)'],
      ['Global config', '~/.config/docxtasks/config.json'],
    ]),
    '',
    dimText('Run `docxtasks <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = boldText(title);
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => `  ${boldText(name.padEnd(maxLen))}  ${dimText(desc)}`);
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
