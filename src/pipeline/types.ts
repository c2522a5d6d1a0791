import type { Config } from '../config/loader.js';
import type { ConversionFailureKind } from '../errors.js';
import type { ParagraphSource } from '../ingest/types.js';
import type { OutlineDiagnostic } from '../outline/types.js';

export interface ConvertOptions {
  outputDir: string;
  config: Config;
  /** Defaults to reading .docx files with mammoth. */
  source?: ParagraphSource;
}

export interface BatchOptions extends ConvertOptions {
  concurrency?: number;
  onProgress?: (done: number, total: number, result: DocumentResult) => void;
}

export interface DocumentSuccess {
  ok: true;
  filePath: string;
  documentName: string;
  outputPath: string;
  rowCount: number;
  productTypeCount: number;
  diagnostics: OutlineDiagnostic[];
}

export interface DocumentFailure {
  ok: false;
  filePath: string;
  kind: ConversionFailureKind;
  reason: string;
  diagnostics: OutlineDiagnostic[];
}

export type DocumentResult = DocumentSuccess | DocumentFailure;

export interface BatchSummary {
  results: DocumentResult[];
  succeeded: number;
  failed: number;
}
