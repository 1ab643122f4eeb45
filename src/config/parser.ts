/**
 * YAML configuration parser for config.yaml.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import {
  DEFAULT_ALIASES,
  DEFAULT_CONFIG,
  DEFAULT_GATES,
  DEFAULT_LOGGING,
  DEFAULT_ORGANIZATION,
  DEFAULT_PATHS,
} from './defaults.js';
import type {
  AliasConfig,
  Config,
  GateConfig,
  LoggingConfig,
  PathConfig,
  ProductConfig,
} from './types.js';
import { getErrorCode, safeReadFileSync } from '../utils/safe-fs.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Checks whether a parsed YAML value is a mapping.
 *
 * @param value - Value to check.
 * @returns True for plain objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a section is a mapping, or absent.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The mapping, or undefined when the section is absent.
 * @throws ConfigParseError if value is present but not a mapping.
 */
function validateSection(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected mapping, got ${Array.isArray(value) ? 'array' : typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a list of strings.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns A copy of the list.
 * @throws ConfigParseError if value is not a list of strings.
 */
function validateStringList(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected list of strings`);
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Parses a gates section over a base gate configuration.
 *
 * @param raw - Raw YAML mapping for the gates section.
 * @param base - Values used for absent fields.
 * @param prefix - Field path prefix for error messages.
 * @returns Validated gate configuration.
 */
function parseGates(
  raw: Record<string, unknown> | undefined,
  base: GateConfig,
  prefix: string
): GateConfig {
  const result: GateConfig = { ...base, required_bc_approvers: [...base.required_bc_approvers] };
  if (raw === undefined) {
    return result;
  }

  if ('context_draft_threshold' in raw) {
    result.context_draft_threshold = validateNumber(
      raw.context_draft_threshold,
      `${prefix}.context_draft_threshold`
    );
  }
  if ('context_review_threshold' in raw) {
    result.context_review_threshold = validateNumber(
      raw.context_review_threshold,
      `${prefix}.context_review_threshold`
    );
  }
  if ('context_approved_threshold' in raw) {
    result.context_approved_threshold = validateNumber(
      raw.context_approved_threshold,
      `${prefix}.context_approved_threshold`
    );
  }
  if ('figma_required' in raw) {
    result.figma_required = validateBoolean(raw.figma_required, `${prefix}.figma_required`);
  }
  if ('required_bc_approvers' in raw) {
    result.required_bc_approvers = validateStringList(
      raw.required_bc_approvers,
      `${prefix}.required_bc_approvers`
    );
  }

  return result;
}

/**
 * Parses path configuration from raw YAML data.
 *
 * @param raw - Raw YAML mapping for the paths section.
 * @returns Validated path configuration merged with defaults.
 */
function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw !== undefined && 'features' in raw) {
    result.features = validateString(raw.features, 'paths.features');
  }
  return result;
}

/**
 * Parses duplicate detection settings from raw YAML data.
 *
 * @param raw - Raw YAML mapping for the aliases section.
 * @returns Validated alias configuration merged with defaults.
 */
function parseAliases(raw: Record<string, unknown> | undefined): AliasConfig {
  const result: AliasConfig = { ...DEFAULT_ALIASES };
  if (raw !== undefined && 'similarity_threshold' in raw) {
    result.similarity_threshold = validateNumber(
      raw.similarity_threshold,
      'aliases.similarity_threshold'
    );
  }
  return result;
}

/**
 * Parses logging settings from raw YAML data.
 *
 * @param raw - Raw YAML mapping for the logging section.
 * @returns Validated logging configuration merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses the products section. Each product's gates are merged over the
 * already parsed global gate defaults.
 *
 * @param raw - Raw YAML mapping for the products section.
 * @param gateDefaults - Global gate configuration.
 * @returns Products keyed by id.
 */
function parseProducts(
  raw: Record<string, unknown> | undefined,
  gateDefaults: GateConfig
): Record<string, ProductConfig> {
  const products: Record<string, ProductConfig> = {};
  if (raw === undefined) {
    return products;
  }

  for (const [productId, value] of Object.entries(raw)) {
    const prefix = `products.${productId}`;
    const section = validateSection(value, prefix) ?? {};
    products[productId] = {
      name: 'name' in section ? validateString(section.name, `${prefix}.name`) : productId,
      organization:
        'organization' in section
          ? validateString(section.organization, `${prefix}.organization`)
          : DEFAULT_ORGANIZATION,
      gates: parseGates(validateSection(section.gates, `${prefix}.gates`), gateDefaults, `${prefix}.gates`),
    };
  }

  return products;
}

/**
 * Parses a YAML string into a validated Config object.
 *
 * @param yamlContent - Raw YAML content.
 * @returns Validated configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid YAML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * gates:
 *   context_review_threshold: 70
 * products:
 *   meal-kit:
 *     gates:
 *       required_bc_approvers: [Dave Manager]
 * `);
 * console.log(config.products['meal-kit']?.gates.context_review_threshold); // 70
 * ```
 */
export function parseConfig(yamlContent: string): Config {
  let parsed: unknown;

  try {
    parsed = yaml.load(yamlContent);
  } catch (error) {
    const yamlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid YAML syntax: ${yamlError.message}`, yamlError);
  }

  const root = validateSection(parsed, '(root)') ?? {};
  const gates = parseGates(validateSection(root.gates, 'gates'), DEFAULT_GATES, 'gates');

  return {
    paths: parsePaths(validateSection(root.paths, 'paths')),
    gates,
    aliases: parseAliases(validateSection(root.aliases, 'aliases')),
    logging: parseLogging(validateSection(root.logging, 'logging')),
    products: parseProducts(validateSection(root.products, 'products'), gates),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return {
    ...DEFAULT_CONFIG,
    paths: { ...DEFAULT_CONFIG.paths },
    gates: { ...DEFAULT_GATES, required_bc_approvers: [...DEFAULT_GATES.required_bc_approvers] },
    aliases: { ...DEFAULT_CONFIG.aliases },
    logging: { ...DEFAULT_CONFIG.logging },
    products: {},
  };
}

/**
 * Reads and parses a config file. A missing file yields the defaults.
 *
 * @param filePath - Path to config.yaml.
 * @returns Parsed configuration.
 * @throws ConfigParseError when the file exists but cannot be read or parsed.
 */
export function loadConfigFile(filePath: string): Config {
  let content: string;
  try {
    content = safeReadFileSync(filePath);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return getDefaultConfig();
    }
    const fileError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(
      `Failed to read config file "${filePath}": ${fileError.message}`,
      fileError
    );
  }
  return parseConfig(content);
}

/**
 * Returns the gate policy for a product: the product's merged gates when the
 * product is configured, otherwise the global defaults.
 *
 * @param config - Loaded configuration.
 * @param productId - Product identifier.
 * @returns The product's gate configuration.
 */
export function resolveGateConfig(config: Config, productId: string): GateConfig {
  return config.products[productId]?.gates ?? config.gates;
}
