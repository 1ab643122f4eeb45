/**
 * Feature Lifecycle Engine
 *
 * Tracks product features from the first signal to generated outputs:
 * a phase machine, four parallel tracks with quality gates, a decision gate
 * and duplicate detection over feature names.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Engine
export * from './engine/index.js';

// Feature records and their types
export * from './feature/index.js';

// Phase machine
export {
  BACKWARD_TRANSITIONS,
  FORWARD_TRANSITIONS,
  InvalidTransitionError,
  TERMINAL_PHASES,
  advancePhase,
  createTransitionError,
  getValidTargets,
  isPhase,
  isTerminalPhase,
  isValidTransition,
  operatorTransition,
  type OperatorAction,
  type OperatorPhase,
  type TransitionErrorCode,
} from './lifecycle/phases.js';

// Tracks
export {
  TRACK_ACTIONS,
  TrackOperationError,
  applyTrackAction,
  isTrackAction,
  type TrackAction,
  type TrackActionContext,
  type TrackErrorCode,
} from './tracks/index.js';

// Quality and decision gates
export * from './gates/index.js';

// Duplicate detection
export * from './aliases/index.js';

// Persistence
export * from './store/index.js';

// Configuration
export * from './config/index.js';

// Logging
export { Logger, getLogger, setDebugLogging } from './utils/logger.js';
