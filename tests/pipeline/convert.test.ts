import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildRows, convertDocument, documentNameFromPath } from '../../src/pipeline/convert.js';
import { IdentityError } from '../../src/errors.js';
import type { Paragraph } from '../../src/schema/index.js';
import { MemoryParagraphSource, defaultConfig, h1, h2, h3, h4, para } from '../helpers/paragraphs.js';

const specParagraphs = [
  h1('Products'),
  para('Table of contents'),
  h1('Products'),
  h2('TypeA'),
  h3('Manufacturer: X'),
  h4('Desc 1'),
];

describe('documentNameFromPath', () => {
  it('drops the directory and extension', () => {
    expect(documentNameFromPath(path.join('specs', 'Section 08 71 00.docx'))).toBe('Section 08 71 00');
  });
});

describe('buildRows', () => {
  it('extracts, flattens and validates in memory', () => {
    const { tree, rows, diagnostics } = buildRows(specParagraphs, 'Spec', defaultConfig());

    expect(tree.sectionMarker).toEqual({ position: 2, labelText: 'Products' });
    expect(rows.map((r) => r.taskName)).toEqual(['Spec', 'TypeA', 'Manufacturer: X']);
    expect(diagnostics.filter((d) => d.level === 'warning')).toEqual([]);
  });

  it('takes column defaults from config', () => {
    const config = defaultConfig();
    config.tasks.defaultSection = 'Submittals';
    config.tasks.defaultProject = 'Tower B';
    config.tasks.rootNotes = 'Imported';

    const { rows } = buildRows(specParagraphs, 'Spec', config);

    expect(rows[0]).toMatchObject({ sectionColumn: 'Submittals', project: 'Tower B', notes: 'Imported' });
    expect(rows[2]).toMatchObject({ sectionColumn: 'Submittals', project: 'Tower B' });
  });

  it('returns the root row alone when there is no products section', () => {
    const { rows, diagnostics } = buildRows([h1('Scope'), h2('TypeA')], 'Spec', defaultConfig());

    expect(rows).toHaveLength(1);
    expect(diagnostics).toEqual([{ level: 'warning', message: 'Products section not found' }]);
  });

  it('throws when the document name is blank', () => {
    expect(() => buildRows(specParagraphs, '  ', defaultConfig())).toThrow(IdentityError);
  });
});

describe('convertDocument', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docxtasks-convert-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes one CSV named after the document', async () => {
    const source = new MemoryParagraphSource({ 'Spec.docx': specParagraphs });

    const result = await convertDocument(path.join('specs', 'Spec.docx'), {
      outputDir: tempDir,
      config: defaultConfig(),
      source,
    });

    const outputPath = path.join(tempDir, 'Spec.csv');
    expect(result).toMatchObject({
      ok: true,
      documentName: 'Spec',
      outputPath,
      rowCount: 3,
      productTypeCount: 1,
    });
    const lines = fs.readFileSync(outputPath, 'utf-8').split('\n');
    expect(lines[0]).toBe('Task Name,Section/Column,Assignee,Due Date,Priority,Notes,Parent Task,Project');
    expect(lines[1]).toBe('Spec,CA Submittal Check-list,,,,Root task for document,,');
    expect(lines[2]).toBe('TypeA,CA Submittal Check-list,,,,,Spec,');
  });

  it('reports a document that cannot be read', async () => {
    const filePath = path.join('specs', 'Missing.docx');

    const result = await convertDocument(filePath, {
      outputDir: tempDir,
      config: defaultConfig(),
      source: new MemoryParagraphSource({}),
    });

    expect(result).toEqual({
      ok: false,
      filePath,
      kind: 'ingestion',
      reason: `${filePath}: file does not exist`,
      diagnostics: [],
    });
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });

  it('reports a document whose name is blank', async () => {
    const source = new MemoryParagraphSource({ ' .docx': specParagraphs });

    const result = await convertDocument(' .docx', { outputDir: tempDir, config: defaultConfig(), source });

    expect(result).toMatchObject({
      ok: false,
      kind: 'identity',
      reason: 'Document name is empty; the root task cannot be named',
    });
  });

  it('reports an unexpected error while building rows', async () => {
    const unreadable: Paragraph = {
      styleLabel: 'Heading 1',
      get text(): string {
        throw new RangeError('text unavailable');
      },
    };
    const source = new MemoryParagraphSource({ 'Spec.docx': [unreadable] });

    const result = await convertDocument('Spec.docx', { outputDir: tempDir, config: defaultConfig(), source });

    expect(result).toEqual({
      ok: false,
      filePath: 'Spec.docx',
      kind: 'internal',
      reason: 'text unavailable',
      diagnostics: [],
    });
  });

  it('reports an output location that cannot be written', async () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const source = new MemoryParagraphSource({ 'Spec.docx': specParagraphs });

    const result = await convertDocument('Spec.docx', { outputDir: blocker, config: defaultConfig(), source });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.kind).toBe('write');
    expect(result.reason.startsWith(`Could not write ${path.join(blocker, 'Spec.csv')}: `)).toBe(true);
    expect(result.diagnostics.length).toBeGreaterThan(0);
  });
});
