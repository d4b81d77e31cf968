/**
 * Error taxonomy for validation runs.
 *
 * Only ConfigurationError stops a run. The ProcessingError subclasses are
 * caught per document and recorded in that document's outcome.
 */

export type ProcessingErrorKind =
  | 'DocumentUnreadable'
  | 'ComparatorServiceError'
  | 'ComparatorResponseMalformed';

/**
 * Missing credential, invalid environment, or unusable required input
 * (no master data, no documents, no "Patient ID" column).
 */
export class ConfigurationError extends Error {
  public readonly issues: readonly string[];

  public constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export abstract class ProcessingError extends Error {
  public abstract readonly kind: ProcessingErrorKind;
  public readonly filename?: string;

  public constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.filename = filename;
  }
}

/** The bytes are not a readable PDF (corrupt, encrypted, empty). */
export class DocumentUnreadableError extends ProcessingError {
  public readonly kind = 'DocumentUnreadable';

  public constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = 'DocumentUnreadableError';
  }
}

/** Network failure, non-2xx answer or timeout from the language-model service. */
export class ComparatorServiceError extends ProcessingError {
  public readonly kind = 'ComparatorServiceError';
  public readonly status?: number;

  public constructor(
    message: string,
    filename?: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, filename, options);
    this.name = 'ComparatorServiceError';
    this.status = options?.status;
  }
}

/** The model answered, but not in the agreed JSON shape. */
export class ComparatorResponseMalformedError extends ProcessingError {
  public readonly kind = 'ComparatorResponseMalformed';
  public readonly rawResponse: string;

  public constructor(
    message: string,
    rawResponse: string,
    filename?: string,
    options?: { cause?: unknown },
  ) {
    super(message, filename, options);
    this.name = 'ComparatorResponseMalformedError';
    this.rawResponse = rawResponse;
  }
}

export function isProcessingError(error: unknown): error is ProcessingError {
  return error instanceof ProcessingError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
