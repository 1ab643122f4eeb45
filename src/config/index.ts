/**
 * Configuration module for config.yaml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { applyEnvOverrides, type EnvRecord } from './env.js';
import { loadConfigFile } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

export {
  ConfigParseError,
  getDefaultConfig,
  isRecord,
  loadConfigFile,
  parseConfig,
  resolveGateConfig,
} from './parser.js';
export type {
  AliasConfig,
  Config,
  GateConfig,
  LoggingConfig,
  PartialConfig,
  PathConfig,
  ProductConfig,
} from './types.js';
export {
  DEFAULT_ALIASES,
  DEFAULT_CONFIG,
  DEFAULT_GATES,
  DEFAULT_LOGGING,
  DEFAULT_ORGANIZATION,
  DEFAULT_PATHS,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';

/**
 * Loads a config file, applies environment overrides and validates the result.
 *
 * @param filePath - Path to config.yaml; a missing file yields the defaults.
 * @param env - Environment to read overrides from.
 * @returns The effective configuration.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export function loadConfig(filePath: string, env: EnvRecord = process.env): Config {
  const config = applyEnvOverrides(loadConfigFile(filePath), env);
  assertConfigValid(config);
  return config;
}
