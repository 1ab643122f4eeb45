/**
 * Helpers shared by the command handlers.
 */

import { ArgumentError } from '../args.js';
import type { CliCommandResult, ParsedArgs } from '../types.js';

/**
 * A successful result.
 *
 * @param message - Text for stdout.
 * @returns Exit code 0.
 */
export function ok(message: string): CliCommandResult {
  return { success: true, exitCode: 0, message };
}

/**
 * A gate or policy outcome that stops the command.
 *
 * @param message - Text for stderr.
 * @returns Exit code 2.
 */
export function policyOutcome(message: string): CliCommandResult {
  return { success: false, exitCode: 2, message };
}

/**
 * Serializes a value for `--json` output.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Returns a positional argument.
 *
 * @param args - Parsed arguments.
 * @param index - Position after the command.
 * @param name - Argument name for the error message.
 * @param usage - Usage line for the error message.
 * @returns The argument.
 * @throws ArgumentError when it is missing.
 */
export function positional(args: ParsedArgs, index: number, name: string, usage: string): string {
  const value = args.positionals[index];
  if (value === undefined || value === '') {
    throw new ArgumentError(`Missing ${name}. Usage: ${usage}`);
  }
  return value;
}

/**
 * Joins the positionals from `index` on, for free text such as a title or
 * a reason.
 *
 * @throws ArgumentError when there are none.
 */
export function restText(args: ParsedArgs, index: number, name: string, usage: string): string {
  const text = args.positionals.slice(index).join(' ').trim();
  if (text === '') {
    throw new ArgumentError(`Missing ${name}. Usage: ${usage}`);
  }
  return text;
}
