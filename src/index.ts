export * from './schema/index.js';
export * from './outline/index.js';
export * from './rows/index.js';
export * from './ingest/index.js';
export * from './export/index.js';
export * from './pipeline/index.js';
export { ConfigSchema, getConfigValue, loadConfig, type Config } from './config/loader.js';
export { ConversionError, IdentityError, IngestionError, RowValidationError } from './errors.js';
export type { ConversionFailureKind } from './errors.js';
