/**
 * Error types raised by the conversion pipeline
 */

export class SheetDocsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid environment variable or rules file
 */
export class ConfigurationError extends SheetDocsError {}

/**
 * A candidate workbook could not be opened or read
 */
export class ParseFailureError extends SheetDocsError {
  readonly filepath: string;

  constructor(filepath: string, cause: unknown) {
    super(`Failed to read workbook ${filepath}: ${errorMessage(cause)}`, { cause });
    this.filepath = filepath;
  }
}

/**
 * An output file could not be written
 */
export class WriteFailureError extends SheetDocsError {
  readonly filepath: string;

  constructor(filepath: string, cause: unknown) {
    super(`Failed to write ${filepath}: ${errorMessage(cause)}`, { cause });
    this.filepath = filepath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
