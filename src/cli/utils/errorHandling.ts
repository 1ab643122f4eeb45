/**
 * Shared error handling utilities for CLI commands.
 *
 * Turns failures into command results so every command reports errors the
 * same way.
 */

import { classifyError, exitCodeFor, formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult } from '../types.js';
import type { DisplayOptions } from './displayUtils.js';

/**
 * Converts a thrown value into a failed command result.
 *
 * @param error - The caught value.
 * @param display - Display options for the message.
 * @returns Exit code 2 for gate outcomes, 1 otherwise, with suggestions.
 */
export function toErrorResult(error: unknown, display: DisplayOptions): CliCommandResult {
  const errorType = classifyError(error);
  const message = error instanceof Error ? error.message : String(error);
  return {
    success: false,
    exitCode: exitCodeFor(errorType),
    message: formatErrorWithSuggestions(message, errorType, display),
  };
}

/**
 * Runs a command, prints its message and sets the process exit code.
 *
 * - On success: prints to stdout
 * - On a failed result or a thrown error: prints to stderr
 *
 * @param fn - The command to run.
 * @param display - Display options for error messages.
 */
export function withErrorHandling(fn: () => CliCommandResult, display: DisplayOptions): void {
  let result: CliCommandResult;
  try {
    result = fn();
  } catch (error) {
    result = toErrorResult(error, display);
  }

  if (result.message !== '') {
    if (result.success) {
      process.stdout.write(result.message + '\n');
    } else {
      process.stderr.write(result.message + '\n');
    }
  }
  process.exitCode = result.exitCode;
}
