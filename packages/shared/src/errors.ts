/**
 * Error Taxonomy
 *
 * Per-document errors (extraction, embedding, validation) are captured into
 * that document's Decision. ConfigurationError is fatal at startup.
 */

export type ErrorCode =
  | 'EXTRACTION_FAILED'
  | 'EMBEDDING_FAILED'
  | 'CONFIGURATION_INVALID'
  | 'DECISION_INVALID'
  | 'UNEXPECTED';

export class ExtractionError extends Error {
  public readonly code: ErrorCode = 'EXTRACTION_FAILED';
  public readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
    this.filePath = filePath;
  }
}

export class EmbeddingError extends Error {
  public readonly code: ErrorCode = 'EMBEDDING_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingError';
  }
}

export class ConfigurationError extends Error {
  public readonly code: ErrorCode = 'CONFIGURATION_INVALID';
  public readonly problems: readonly string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}:\n  - ${problems.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Raised when a Decision would break the data-model invariant.
 * Never expected in correct operation.
 */
export class ValidationError extends Error {
  public readonly code: ErrorCode = 'DECISION_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/** Serializable error shape recorded in decision traces and reports. */
export interface ErrorDetail {
  type: string;
  code: ErrorCode;
  message: string;
}

export function toErrorDetail(error: unknown): ErrorDetail {
  if (
    error instanceof ExtractionError ||
    error instanceof EmbeddingError ||
    error instanceof ConfigurationError ||
    error instanceof ValidationError
  ) {
    return { type: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { type: error.name || 'Error', code: 'UNEXPECTED', message: error.message };
  }
  return { type: 'Error', code: 'UNEXPECTED', message: String(error) };
}
