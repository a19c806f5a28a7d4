/**
 * Why a classification request could not be analysed
 */
export type ClassificationFailureReason =
  | 'DOCUMENT_OPEN_FAILED'
  | 'PAGE_INDEX_OUT_OF_RANGE'
  | 'PAGE_LOAD_FAILED';

/**
 * ClassificationError
 *
 * Thrown when the document or page cannot be acquired. No label or partial
 * metrics accompany it.
 */
export class ClassificationError extends Error {
  constructor(
    public readonly reason: ClassificationFailureReason,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ClassificationError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ClassificationError from unknown error with context
   */
  static fromError(
    reason: ClassificationFailureReason,
    context: string,
    error: unknown,
  ): ClassificationError {
    return new ClassificationError(
      reason,
      `${context}: ${ClassificationError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
