export { buildRows, convertDocument, documentNameFromPath } from './convert.js';
export type { BuiltRows } from './convert.js';
export { convertBatch, discoverDocuments } from './batch.js';
export type {
  BatchOptions,
  BatchSummary,
  ConvertOptions,
  DocumentFailure,
  DocumentResult,
  DocumentSuccess,
} from './types.js';
