/**
 * Error kinds raised by the translation core
 *
 * - CONFIG_ERROR: missing credentials or invalid configuration; never retried
 * - CONTENT_ERROR: extracted or translated text failed structural validation
 * - PROCESSING_ERROR: the vision extraction call failed
 * - PROVIDER_ERROR: transient upstream failure (network, rate limit, timeout)
 * - TRANSLATION_ERROR: chunk translation retries exhausted
 * - ALREADY_EXISTS: a job with the same processId was already started
 * - NOT_FOUND: no job for the processId
 * - INVALID_STATE: the job is already completed or failed
 * - VALIDATION_ERROR: an argument is out of range
 */
export type TranslationErrorCode =
  | 'CONFIG_ERROR'
  | 'CONTENT_ERROR'
  | 'PROCESSING_ERROR'
  | 'PROVIDER_ERROR'
  | 'TRANSLATION_ERROR'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'VALIDATION_ERROR';

/**
 * TranslationError
 *
 * Single error class for the translation core, discriminated by `code`.
 */
export class TranslationError extends Error {
  readonly code: TranslationErrorCode;

  constructor(
    code: TranslationErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'TranslationError';
    this.code = code;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create TranslationError from unknown error with context.
   *
   * A TranslationError passes through unchanged so its code survives.
   */
  static fromError(
    code: TranslationErrorCode,
    context: string,
    error: unknown,
  ): TranslationError {
    if (error instanceof TranslationError) return error;
    return new TranslationError(
      code,
      `${context}: ${TranslationError.getErrorMessage(error)}`,
      { cause: error },
    );
  }

  static isRetryable(error: TranslationError): boolean {
    return error.code === 'PROVIDER_ERROR' || error.code === 'CONTENT_ERROR';
  }
}
