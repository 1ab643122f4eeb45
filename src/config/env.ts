/**
 * Environment variable overrides for configuration.
 *
 * FEATURE_ENGINE_<SECTION>_<FIELD> maps to config.<section>.<field>. Gate
 * overrides apply to the global defaults and to every configured product, so
 * an operator can relax or tighten a gate across the whole store at once.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { type: 'string'; description: string; apply: (o: PartialConfig, v: string) => void }
  | { type: 'number'; description: string; apply: (o: PartialConfig, v: number) => void }
  | { type: 'boolean'; description: string; apply: (o: PartialConfig, v: boolean) => void }
  | { type: 'list'; description: string; apply: (o: PartialConfig, v: string[]) => void };

/**
 * Supported environment variables.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  FEATURE_ENGINE_PATHS_FEATURES: {
    type: 'string',
    description: 'Directory holding the feature records',
    apply: (o, v) => {
      o.paths = { ...o.paths, features: v };
    },
  },
  FEATURE_ENGINE_GATES_CONTEXT_DRAFT_THRESHOLD: {
    type: 'number',
    description: 'Minimum challenge score for a v1 context document',
    apply: (o, v) => {
      o.gates = { ...o.gates, context_draft_threshold: v };
    },
  },
  FEATURE_ENGINE_GATES_CONTEXT_REVIEW_THRESHOLD: {
    type: 'number',
    description: 'Minimum challenge score for a v2 context document',
    apply: (o, v) => {
      o.gates = { ...o.gates, context_review_threshold: v };
    },
  },
  FEATURE_ENGINE_GATES_CONTEXT_APPROVED_THRESHOLD: {
    type: 'number',
    description: 'Minimum challenge score for a v3 context document',
    apply: (o, v) => {
      o.gates = { ...o.gates, context_approved_threshold: v };
    },
  },
  FEATURE_ENGINE_GATES_FIGMA_REQUIRED: {
    type: 'boolean',
    description: 'Whether the design track needs a Figma reference',
    apply: (o, v) => {
      o.gates = { ...o.gates, figma_required: v };
    },
  },
  FEATURE_ENGINE_GATES_REQUIRED_BC_APPROVERS: {
    type: 'list',
    description: 'Comma-separated business case approvers',
    apply: (o, v) => {
      o.gates = { ...o.gates, required_bc_approvers: v };
    },
  },
  FEATURE_ENGINE_ALIASES_SIMILARITY_THRESHOLD: {
    type: 'number',
    description: 'Similarity at which an existing feature is a duplicate candidate',
    apply: (o, v) => {
      o.aliases = { ...o.aliases, similarity_threshold: v };
    },
  },
  FEATURE_ENGINE_LOGGING_DEBUG: {
    type: 'boolean',
    description: 'Write debug-level log entries',
    apply: (o, v) => {
      o.logging = { ...o.logging, debug: v };
    },
  },
  // Shortcut
  FEATURE_ENGINE_DEBUG: {
    type: 'boolean',
    description: 'Shortcut for FEATURE_ENGINE_LOGGING_DEBUG',
    apply: (o, v) => {
      o.logging = { ...o.logging, debug: v };
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Splits a comma-separated list, dropping empty items.
 *
 * @param value - The raw value.
 * @returns Trimmed, non-empty items.
 */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Coerces a raw value and applies it to the overrides.
 *
 * @param mapping - Mapping of the variable.
 * @param overrides - Overrides being built.
 * @param value - Raw environment value.
 * @param envVar - Variable name for error reporting.
 */
function applyMapping(
  mapping: EnvMapping,
  overrides: PartialConfig,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(overrides, value);
      return;
    case 'number':
      mapping.apply(overrides, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(overrides, coerceToBoolean(value, envVar));
      return;
    case 'list':
      mapping.apply(overrides, coerceToList(value));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads FEATURE_ENGINE_* variables and returns configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ FEATURE_ENGINE_GATES_FIGMA_REQUIRED: 'false' });
 * console.log(result.overrides.gates?.figma_required); // false
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(mapping, overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  const products: Config['products'] = {};
  for (const [productId, product] of Object.entries(base.products)) {
    products[productId] = { ...product, gates: { ...product.gates, ...partial.gates } };
  }

  return {
    paths: { ...base.paths, ...partial.paths },
    gates: { ...base.gates, ...partial.gates },
    aliases: { ...base.aliases, ...partial.aliases },
    logging: { ...base.logging, ...partial.logging },
    products,
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
