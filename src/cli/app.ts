/**
 * Builds the CLI context: configuration, logging, the record store and the
 * engine.
 */

import { loadConfig, type EnvRecord } from '../config/index.js';
import { DEFAULT_ACTOR, FeatureEngine } from '../engine/index.js';
import { FileFeatureStore } from '../store/index.js';
import { setDebugLogging } from '../utils/logger.js';
import type { CliContext, CliOptions } from './types.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/** Config file read when `--config` is not given. */
export const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * Display options for the current terminal.
 *
 * @param env - Environment; `NO_COLOR` turns colors off.
 * @returns Colors only on a TTY.
 */
export function getDisplayOptions(env: EnvRecord = process.env): DisplayOptions {
  return {
    colors: process.stdout.isTTY === true && env['NO_COLOR'] === undefined,
    unicode: true,
  };
}

/**
 * Creates and initializes the CLI context.
 *
 * @param options - Parsed command options.
 * @param env - Environment for config overrides and the default actor.
 * @returns The context.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export function createCliApp(options: CliOptions, env: EnvRecord = process.env): CliContext {
  const config = loadConfig(options.config ?? DEFAULT_CONFIG_PATH, env);
  setDebugLogging(config.logging.debug);

  return {
    engine: new FeatureEngine({ config, store: new FileFeatureStore(config.paths.features) }),
    actor: options.actor ?? env['USER'] ?? DEFAULT_ACTOR,
    display: getDisplayOptions(env),
  };
}
