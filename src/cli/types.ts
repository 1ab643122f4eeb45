/**
 * CLI types and interfaces for the feature lifecycle CLI.
 */

import type { FeatureEngine } from '../engine/index.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Options shared by every command.
 */
export interface CliOptions {
  /** Path to config.yaml. */
  config?: string | undefined;
  product?: string | undefined;
  priority?: string | undefined;
  actor?: string | undefined;
  /** Track action payload as JSON text. */
  payload?: string | undefined;
  phase?: string | undefined;
  force: boolean;
  confirm: boolean;
  json: boolean;
  help: boolean;
}

/**
 * Parsed command line.
 */
export interface ParsedArgs {
  command: string;
  positionals: string[];
  options: CliOptions;
}

/**
 * CLI command context.
 */
export interface CliContext {
  engine: FeatureEngine;
  /** Actor recorded on mutations. */
  actor: string;
  display: DisplayOptions;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  success: boolean;
  /**
   * Exit code: 0 on success, 2 for gate and policy outcomes, 1 for errors.
   */
  exitCode: number;
  /**
   * Text to display; stdout on success, stderr otherwise.
   */
  message: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext, args: ParsedArgs) => CliCommandResult;

/**
 * Builds the context of a command from its options.
 */
export type CliContextFactory = (options: CliOptions) => CliContext;
