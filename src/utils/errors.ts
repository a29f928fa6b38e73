export type ExtractionErrorKind = 'no-page' | 'fetch-failed' | 'no-infobox' | 'pattern-mismatch';

/**
 * Raised when a fact cannot be pulled from a subject's page
 */
export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly subject: string;

  constructor(kind: ExtractionErrorKind, subject: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
    this.kind = kind;
    this.subject = subject;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}
