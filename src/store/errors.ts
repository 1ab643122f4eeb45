/**
 * Persistence errors.
 *
 * @packageDocumentation
 */

/**
 * Kind of persistence failure.
 *
 * - parse_error: the document is not valid JSON
 * - schema_error: unknown layout or a schema version newer than this build
 * - file_error: the file could not be read or written
 * - validation_error: a field has the wrong type or value
 * - corruption_error: the document is empty or breaks a record invariant
 */
export type StoreErrorType =
  | 'parse_error'
  | 'schema_error'
  | 'file_error'
  | 'validation_error'
  | 'corruption_error';

/**
 * Error thrown when a feature record cannot be loaded or saved.
 */
export class FeatureStoreError extends Error {
  /** The type of persistence error. */
  public readonly errorType: StoreErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new FeatureStoreError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of persistence error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: StoreErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'FeatureStoreError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}
