import path from 'node:path';
import { ConversionError, IngestionError, RowValidationError, errorMessage } from '../errors.js';
import { writeCsvFile } from '../export/csv-writer.js';
import { DocxParagraphSource } from '../ingest/docx-reader.js';
import type { ParagraphSource } from '../ingest/types.js';
import { extractOutline } from '../outline/extractor.js';
import { resolveMatchingRules } from '../outline/matching.js';
import type { OutlineDiagnostic } from '../outline/types.js';
import { flattenTree } from '../rows/flattener.js';
import { validateRows } from '../rows/validate.js';
import type { Config } from '../config/loader.js';
import type { DocumentTree, Paragraph, TaskRow } from '../schema/index.js';
import type { ConvertOptions, DocumentResult } from './types.js';

export function documentNameFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export interface BuiltRows {
  tree: DocumentTree;
  rows: TaskRow[];
  diagnostics: OutlineDiagnostic[];
}

/**
 * Extract, flatten and validate in memory. Throws IdentityError or
 * RowValidationError.
 */
export function buildRows(paragraphs: readonly Paragraph[], documentName: string, config: Config): BuiltRows {
  const { tree, diagnostics } = extractOutline(paragraphs, {
    documentName,
    rules: resolveMatchingRules(config),
  });

  const rows = flattenTree(tree, {
    sectionColumn: config.tasks.defaultSection,
    project: config.tasks.defaultProject,
    rootNotes: config.tasks.rootNotes,
  });

  const validation = validateRows(rows);
  if (!validation.valid) {
    throw new RowValidationError(validation.errors);
  }

  return { tree, rows, diagnostics };
}

/**
 * Never rejects for a document problem: every failure comes back as an
 * `ok: false` result with its kind.
 */
export async function convertDocument(filePath: string, options: ConvertOptions): Promise<DocumentResult> {
  const { outputDir, config } = options;
  const source = options.source ?? new DocxParagraphSource();
  const documentName = documentNameFromPath(filePath);
  let diagnostics: OutlineDiagnostic[] = [];

  try {
    const paragraphs = await readParagraphs(source, filePath);
    const built = buildRows(paragraphs, documentName, config);
    diagnostics = built.diagnostics;

    const outputPath = path.join(outputDir, `${documentName}.csv`);
    try {
      writeCsvFile(built.rows, outputPath, config.output);
    } catch (error) {
      throw new ConversionError(`Could not write ${outputPath}: ${errorMessage(error)}`, 'write');
    }

    return {
      ok: true,
      filePath,
      documentName,
      outputPath,
      rowCount: built.rows.length,
      productTypeCount: built.tree.productTypes.length,
      diagnostics,
    };
  } catch (error) {
    if (error instanceof ConversionError) {
      return { ok: false, filePath, kind: error.kind, reason: error.message, diagnostics };
    }
    return { ok: false, filePath, kind: 'internal', reason: errorMessage(error), diagnostics };
  }
}

/**
 * Any error from the source counts as the document being unreadable.
 */
async function readParagraphs(source: ParagraphSource, filePath: string): Promise<Paragraph[]> {
  try {
    return await source.read(filePath);
  } catch (error) {
    if (error instanceof ConversionError) throw error;
    throw new IngestionError(filePath, errorMessage(error));
  }
}
