#!/usr/bin/env node

/**
 * Feature lifecycle CLI entry point.
 *
 * This is the main entry point for the 'feature-lifecycle' CLI command.
 */

import { getDisplayOptions } from './app.js';
import { runCli } from './run.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  withErrorHandling(() => runCli(args), getDisplayOptions());
}

main();
