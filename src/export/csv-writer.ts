import fs from 'node:fs';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { TASK_COLUMNS, type TaskRow } from '../schema/index.js';
import { toRecord } from '../rows/flattener.js';

export type CsvEncoding = 'utf-8' | 'utf16le' | 'latin1';

export interface CsvWriteOptions {
  encoding: CsvEncoding;
  /** Prefix a byte order mark so spreadsheet apps detect the encoding. */
  bom: boolean;
}

const BOM = '\uFEFF';

export function renderCsv(rows: readonly TaskRow[]): string {
  const sheet = XLSX.utils.json_to_sheet(rows.map(toRecord), { header: [...TASK_COLUMNS] });
  return XLSX.utils.sheet_to_csv(sheet);
}

export function writeCsvFile(rows: readonly TaskRow[], outputPath: string, options: CsvWriteOptions): void {
  const dir = path.dirname(path.resolve(outputPath));
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const csv = renderCsv(rows);
  fs.writeFileSync(outputPath, options.bom ? BOM + csv : csv, { encoding: options.encoding });
}
