/**
 * Why a single document did not convert. `internal` covers anything thrown by
 * the outline or row code that is not one of the typed failures below.
 */
export type ConversionFailureKind = 'ingestion' | 'identity' | 'validation' | 'write' | 'internal';

export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly kind: ConversionFailureKind
  ) {
    super(message);
    this.name = 'ConversionError';
  }
}

export class IngestionError extends ConversionError {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`${filePath}: ${reason}`, 'ingestion');
    this.name = 'IngestionError';
  }
}

export class IdentityError extends ConversionError {
  constructor() {
    super('Document name is empty; the root task cannot be named', 'identity');
    this.name = 'IdentityError';
  }
}

export class RowValidationError extends ConversionError {
  constructor(public readonly errors: string[]) {
    super(`Task rows failed validation: ${errors.join('; ')}`, 'validation');
    this.name = 'RowValidationError';
  }
}

// Command line input problems. The CLI prints the message and exits 1.

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class FileNotFoundError extends CliUsageError {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
