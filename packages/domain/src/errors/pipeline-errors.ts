/**
 * Base class for failures that make a file unusable for the pipeline.
 * Carries the HTTP status the API answers with.
 */
export class FileProcessingError extends Error {
  readonly status: number = 422;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileProcessingError';
  }
}

/** Buffer is not a recognised tabular format, or cannot be decoded as one. */
export class ParseError extends FileProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

/** A normalization step needs a column the table does not have. */
export class SchemaError extends FileProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaError';
  }
}
