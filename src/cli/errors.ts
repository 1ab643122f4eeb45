/**
 * Error suggestion system for the feature lifecycle CLI.
 *
 * Classifies failures, maps them to exit codes and adds contextual
 * suggestions to help users resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { FeatureEngineError } from '../engine/index.js';
import { GateNotReadyError } from '../gates/index.js';
import { InvalidTransitionError } from '../lifecycle/phases.js';
import { FeatureStoreError } from '../store/index.js';
import { TrackOperationError, type TrackErrorCode } from '../tracks/index.js';
import { ArgumentError } from './args.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Kinds of failure a command can end with.
 */
export type ErrorType =
  | 'gate_not_ready'
  | 'invalid_input'
  | 'invalid_transition'
  | 'persistence'
  | 'configuration'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Exit code for gate and policy outcomes.
 */
export const POLICY_EXIT_CODE = 2;

/**
 * Exit code for invalid input and failures.
 */
export const ERROR_EXIT_CODE = 1;

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  gate_not_ready: [
    {
      text: 'Resolve the blockers listed above',
      action: 'feature-lifecycle check <slug>',
    },
    {
      text: 'Approve anyway; the blockers stay on record',
      action: 'feature-lifecycle approve <slug> <reason> --force',
    },
  ],

  invalid_input: [
    {
      text: 'Check the command arguments',
      action: 'feature-lifecycle help <command>',
    },
    {
      text: 'List the known features',
      action: 'feature-lifecycle list',
    },
  ],

  invalid_transition: [
    {
      text: "Check the feature's current phase and track statuses",
      action: 'feature-lifecycle check <slug>',
    },
  ],

  persistence: [
    {
      text: 'Inspect the feature file in the features directory',
    },
    {
      text: 'Restore the file from version control if it was edited by hand',
      action: 'git checkout -- <features dir>/<slug>.json',
    },
  ],

  configuration: [
    {
      text: 'Check config.yaml for the field named above',
    },
    {
      text: 'Rule out environment overrides',
      action: 'env | grep FEATURE_ENGINE_',
    },
  ],

  unknown: [
    {
      text: 'Re-run with debug logging for more detail',
      action: 'FEATURE_ENGINE_DEBUG=true feature-lifecycle <command>',
    },
  ],
};

const INPUT_TRACK_ERRORS: ReadonlySet<TrackErrorCode> = new Set<TrackErrorCode>([
  'MALFORMED_PAYLOAD',
  'UNKNOWN_APPROVER',
  'UNKNOWN_ACTION',
  'NOT_FOUND',
]);

/**
 * Classifies a thrown value.
 *
 * @param error - The caught value.
 * @returns The error type.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof GateNotReadyError) {
    return 'gate_not_ready';
  }
  if (
    error instanceof FeatureEngineError ||
    error instanceof ArgumentError ||
    (error instanceof TrackOperationError && INPUT_TRACK_ERRORS.has(error.code))
  ) {
    return 'invalid_input';
  }
  if (error instanceof InvalidTransitionError || error instanceof TrackOperationError) {
    return 'invalid_transition';
  }
  if (error instanceof FeatureStoreError) {
    return 'persistence';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'configuration';
  }
  return 'unknown';
}

/**
 * Exit code of a failure type.
 *
 * @param errorType - The type of error.
 * @returns 2 for gate outcomes, 1 otherwise.
 */
export function exitCodeFor(errorType: ErrorType): number {
  return errorType === 'gate_not_ready' ? POLICY_EXIT_CODE : ERROR_EXIT_CODE;
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param errorType - The type of error.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  errorType: ErrorType,
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;
  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  ERROR_SUGGESTIONS[errorType].forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}
