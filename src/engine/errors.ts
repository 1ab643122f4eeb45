/**
 * Errors raised by the feature engine's command surface.
 *
 * @packageDocumentation
 */

/**
 * Error codes for command validation failures.
 */
export type FeatureEngineErrorCode =
  | 'FEATURE_NOT_FOUND'
  | 'UNKNOWN_PRODUCT'
  | 'SLUG_CONFLICT'
  | 'UNKNOWN_TRACK'
  | 'UNKNOWN_ACTION'
  | 'INVALID_ARTIFACT_TYPE'
  | 'MALFORMED_PAYLOAD'
  | 'NOT_CONFIGURED';

/**
 * Error thrown when a command names something that does not exist or
 * carries unusable input.
 */
export class FeatureEngineError extends Error {
  /** Error code for programmatic handling. */
  public readonly code: FeatureEngineErrorCode;
  /** Slug of the feature the command addressed, if any. */
  public readonly slug: string | undefined;

  /**
   * Creates a new FeatureEngineError.
   *
   * @param code - Error code.
   * @param message - Human-readable error message.
   * @param slug - Feature the command addressed.
   */
  constructor(code: FeatureEngineErrorCode, message: string, slug?: string) {
    super(message);
    this.name = 'FeatureEngineError';
    this.code = code;
    this.slug = slug;
  }
}
