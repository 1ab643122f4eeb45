/**
 * Errors raised by track mutators.
 *
 * @packageDocumentation
 */

import type { TrackName } from '../feature/types.js';

/**
 * Error codes for rejected track operations.
 */
export type TrackErrorCode =
  | 'TRACK_NOT_STARTED'
  | 'INVALID_TRACK_TRANSITION'
  | 'UNKNOWN_APPROVER'
  | 'VERSION_REGRESSION'
  | 'MALFORMED_PAYLOAD'
  | 'UNKNOWN_ACTION'
  | 'NOT_FOUND';

/**
 * Error thrown when a track mutator rejects an operation.
 */
export class TrackOperationError extends Error {
  /** Error code for programmatic handling. */
  public readonly code: TrackErrorCode;
  /** Track the operation targeted. */
  public readonly track: TrackName;

  /**
   * Creates a new TrackOperationError.
   *
   * @param code - Error code.
   * @param track - Track the operation targeted.
   * @param message - Human-readable message.
   */
  constructor(code: TrackErrorCode, track: TrackName, message: string) {
    super(message);
    this.name = 'TrackOperationError';
    this.code = code;
    this.track = track;
  }
}
