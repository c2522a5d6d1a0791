import fs from 'node:fs';
import path from 'node:path';
import { convertDocument } from './convert.js';
import type { BatchOptions, BatchSummary, DocumentResult } from './types.js';

const DOCX_EXTENSION = '.docx';
// Word keeps an owner file named "~$<name>.docx" next to open documents.
const LOCK_FILE_PREFIX = '~$';

export function discoverDocuments(inputDir: string): string[] {
  return fs
    .readdirSync(inputDir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => name.toLowerCase().endsWith(DOCX_EXTENSION) && !name.startsWith(LOCK_FILE_PREFIX))
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(inputDir, name));
}

/**
 * Converts every file with at most `concurrency` documents in flight.
 * Results keep the order of `filePaths`.
 */
export async function convertBatch(filePaths: readonly string[], options: BatchOptions): Promise<BatchSummary> {
  const total = filePaths.length;
  const concurrency = Math.max(1, Math.min(options.concurrency ?? options.config.processing.concurrency, total));
  const results = new Array<DocumentResult | undefined>(total);

  // Fails here rather than once per document.
  fs.mkdirSync(options.outputDir, { recursive: true });

  let next = 0;
  let done = 0;

  const worker = async (): Promise<void> => {
    while (next < total) {
      const index = next++;
      const filePath = filePaths[index];
      if (filePath === undefined) return;

      const result = await convertDocument(filePath, options);
      results[index] = result;
      done++;
      options.onProgress?.(done, total, result);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  const completed = results.filter((result): result is DocumentResult => result !== undefined);
  const succeeded = completed.filter((result) => result.ok).length;
  return { results: completed, succeeded, failed: completed.length - succeeded };
}
