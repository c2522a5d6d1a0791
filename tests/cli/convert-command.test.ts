import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { h1, h2, h3 } from '../helpers/paragraphs.js';

const outline = [h1('Products'), h1('Products'), h2('TypeA'), h3('Manufacturer: X')];

let tempDir: string;
let inputDir: string;
let outputDir: string;
let configPath: string;
let logSpy: ReturnType<typeof vi.spyOn>;
let errSpy: ReturnType<typeof vi.spyOn>;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docxtasks-cli-convert-'));
  inputDir = path.join(tempDir, 'specs');
  outputDir = path.join(tempDir, 'csv');
  configPath = path.join(tempDir, 'none.json');
  fs.mkdirSync(inputDir);
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  logSpy.mockRestore();
  errSpy.mockRestore();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function lines(spy: ReturnType<typeof vi.spyOn>): string[] {
  return spy.mock.calls.map((c: unknown[]) => String(c[0] ?? ''));
}

// The command and the in-memory source must share one module graph so the
// error classes they throw are the same ones the pipeline checks against.
async function loadCommand() {
  vi.resetModules();
  const command = await import('../../src/cli/convert-command.js');
  const helpers = await import('../helpers/paragraphs.js');
  return { ...command, MemoryParagraphSource: helpers.MemoryParagraphSource };
}

describe('docxtasks convert command', () => {
  it('converts a single file and prints a summary', async () => {
    const { handleConvertCommand, MemoryParagraphSource } = await loadCommand();
    const filePath = path.join(inputDir, 'One.docx');
    fs.writeFileSync(filePath, '');

    const summary = await handleConvertCommand(
      ['-i', filePath, '-o', outputDir, '-c', configPath],
      new MemoryParagraphSource({ 'One.docx': outline })
    );

    expect(summary.succeeded).toBe(1);
    expect(lines(logSpy)).toEqual([
      `Converting 1 document(s) into ${outputDir}`,
      `✓ ${filePath} → ${path.join(outputDir, 'One.csv')} (1 product types, 3 rows)`,
      '',
      '1 succeeded, 0 failed',
    ]);
    expect(fs.existsSync(path.join(outputDir, 'One.csv'))).toBe(true);
  });

  it('converts every document in a directory and reports failures on stderr', async () => {
    const { handleConvertCommand, MemoryParagraphSource } = await loadCommand();
    for (const name of ['A.docx', 'B.docx']) {
      fs.writeFileSync(path.join(inputDir, name), '');
    }

    const summary = await handleConvertCommand(
      [inputDir, '--output', outputDir, '--config', configPath, '--quiet'],
      new MemoryParagraphSource({ 'A.docx': outline })
    );

    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(1);
    const missing = path.join(inputDir, 'B.docx');
    expect(lines(errSpy)).toEqual([`✗ ${missing}: ${missing}: file does not exist`]);
    expect(lines(logSpy)).toEqual(['', '1 succeeded, 1 failed']);
  });

  it('prints warnings from the outline pass', async () => {
    const { handleConvertCommand, MemoryParagraphSource } = await loadCommand();
    const filePath = path.join(inputDir, 'Draft.docx');
    fs.writeFileSync(filePath, '');

    await handleConvertCommand(
      [filePath, '-o', outputDir, '-c', configPath],
      new MemoryParagraphSource({ 'Draft.docx': [h1('Scope')] })
    );

    expect(lines(logSpy)).toContain('  warning: Products section not found');
  });

  it('reports unreadable documents in JSON output', async () => {
    const { handleConvertCommand } = await loadCommand();
    const filePath = path.join(inputDir, 'corrupt.docx');
    fs.writeFileSync(filePath, 'not a zip archive');

    const summary = await handleConvertCommand(['--input', inputDir, '-o', outputDir, '-c', configPath, '--json']);

    expect(summary.failed).toBe(1);
    const output: unknown = JSON.parse(lines(logSpy)[0] ?? '');
    expect(output).toMatchObject({
      success: false,
      input: inputDir,
      outputDir,
      succeeded: 0,
      failed: 1,
      documents: [{ file: filePath, ok: false, kind: 'ingestion' }],
    });
  });

  it('reports an empty directory without failing', async () => {
    const { handleConvertCommand } = await loadCommand();

    const summary = await handleConvertCommand([inputDir, '-o', outputDir, '-c', configPath, '--json']);

    expect(summary).toEqual({ results: [], succeeded: 0, failed: 0 });
    expect(JSON.parse(lines(logSpy)[0] ?? '')).toEqual({
      success: true,
      input: inputDir,
      outputDir,
      succeeded: 0,
      failed: 0,
      documents: [],
    });
  });

  it('rejects a missing input path', async () => {
    const { handleConvertCommand } = await loadCommand();
    const missing = path.join(tempDir, 'nowhere');

    await expect(handleConvertCommand([missing, '-c', configPath])).rejects.toThrow(`File not found: ${missing}`);
  });

  it('validates its flags', async () => {
    const { handleConvertCommand } = await loadCommand();

    await expect(handleConvertCommand([])).rejects.toThrow('Usage: docxtasks convert --input <file|dir>');
    await expect(handleConvertCommand([inputDir, '-c', configPath, '--concurrency', '0'])).rejects.toThrow(
      "Invalid --concurrency '0'. Expected a positive integer."
    );
    await expect(handleConvertCommand([inputDir, 'extra', '-c', configPath])).rejects.toThrow(
      'Unexpected arguments: extra'
    );
  });
});
