export { renderCsv, writeCsvFile } from './csv-writer.js';
export type { CsvEncoding, CsvWriteOptions } from './csv-writer.js';
export { formatRowsPreview } from './preview.js';
