export { composeNotes, flattenTree, toRecord } from './flattener.js';
export { sanitizeField } from './sanitize.js';
export { validateRows } from './validate.js';
export type { FlattenDefaults, RowValidationResult } from './types.js';
