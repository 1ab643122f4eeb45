/**
 * Command-line argument parsing.
 *
 * @packageDocumentation
 */

import type { CliOptions, ParsedArgs } from './types.js';

/**
 * Error thrown for an unknown option or a missing option value.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

type ValueOption = 'config' | 'product' | 'priority' | 'actor' | 'payload' | 'phase';
type FlagOption = 'force' | 'confirm' | 'json' | 'help';

const VALUE_OPTIONS: Readonly<Record<string, ValueOption>> = {
  '--config': 'config',
  '-c': 'config',
  '--product': 'product',
  '-p': 'product',
  '--priority': 'priority',
  '--actor': 'actor',
  '--payload': 'payload',
  '--phase': 'phase',
};

const FLAG_OPTIONS: Readonly<Record<string, FlagOption>> = {
  '--force': 'force',
  '--confirm': 'confirm',
  '--json': 'json',
  '--help': 'help',
  '-h': 'help',
};

/**
 * Splits arguments into the command, its positionals and the options.
 *
 * Options may appear anywhere after the command, as `--name value` or
 * `--name=value`. A lone `--` ends option parsing.
 *
 * @param args - Arguments after the program name.
 * @returns The parsed command line; the command is empty when none was given.
 * @throws ArgumentError for an unknown option or a missing value.
 *
 * @example
 * ```typescript
 * parseArgs(['start', 'OTP', 'Checkout', '--product', 'meal-kit']);
 * // { command: 'start', positionals: ['OTP', 'Checkout'], options: { product: 'meal-kit', ... } }
 * ```
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CliOptions = { force: false, confirm: false, json: false, help: false };
  const positionals: string[] = [];
  let command = '';
  let literal = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (literal || !arg.startsWith('-') || arg === '-') {
      if (command === '') {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }
    if (arg === '--') {
      literal = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const flag = FLAG_OPTIONS[name];
    if (flag !== undefined) {
      if (eq !== -1) {
        throw new ArgumentError(`Option ${name} does not take a value`);
      }
      options[flag] = true;
      continue;
    }

    const key = VALUE_OPTIONS[name];
    if (key === undefined) {
      throw new ArgumentError(`Unknown option: ${name}`);
    }
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new ArgumentError(`Option ${name} requires a value`);
    }
    options[key] = value;
  }

  return { command, positionals, options };
}
