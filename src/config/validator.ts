/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser cannot: score thresholds lie within 0..100 and do not
 * decrease from draft to approved, the similarity threshold lies within (0, 1],
 * and approver names are non-empty. Product gate overrides are checked the
 * same way as the global defaults.
 *
 * @packageDocumentation
 */

import type { Config, GateConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Validates a score threshold is within 0..100.
 *
 * @param value - The threshold value to validate.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validateScoreRange(value: number, fieldPath: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    errors.push({
      field: fieldPath,
      value,
      message: `Threshold '${fieldPath}' must be between 0 and 100, got ${String(value)}`,
    });
  }
}

/**
 * Validates one gate configuration.
 *
 * @param gates - The gate configuration to validate.
 * @param prefix - Field path prefix (`gates` or `products.<id>.gates`).
 * @param errors - Array to accumulate errors into.
 */
function validateGates(gates: GateConfig, prefix: string, errors: ValidationError[]): void {
  validateScoreRange(gates.context_draft_threshold, `${prefix}.context_draft_threshold`, errors);
  validateScoreRange(gates.context_review_threshold, `${prefix}.context_review_threshold`, errors);
  validateScoreRange(
    gates.context_approved_threshold,
    `${prefix}.context_approved_threshold`,
    errors
  );

  if (gates.context_review_threshold < gates.context_draft_threshold) {
    errors.push({
      field: `${prefix}.context_review_threshold`,
      value: gates.context_review_threshold,
      message: `'${prefix}.context_review_threshold' must not be lower than context_draft_threshold (${String(gates.context_draft_threshold)})`,
    });
  }
  if (gates.context_approved_threshold < gates.context_review_threshold) {
    errors.push({
      field: `${prefix}.context_approved_threshold`,
      value: gates.context_approved_threshold,
      message: `'${prefix}.context_approved_threshold' must not be lower than context_review_threshold (${String(gates.context_review_threshold)})`,
    });
  }

  gates.required_bc_approvers.forEach((approver, index) => {
    if (approver.trim() === '') {
      errors.push({
        field: `${prefix}.required_bc_approvers[${String(index)}]`,
        value: approver,
        message: 'Approver names must not be empty',
      });
    }
  });
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(yamlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.paths.features.trim() === '') {
    errors.push({
      field: 'paths.features',
      value: config.paths.features,
      message: "'paths.features' must not be empty",
    });
  }

  validateGates(config.gates, 'gates', errors);

  const similarity = config.aliases.similarity_threshold;
  if (!Number.isFinite(similarity) || similarity <= 0 || similarity > 1) {
    errors.push({
      field: 'aliases.similarity_threshold',
      value: similarity,
      message: `'aliases.similarity_threshold' must be greater than 0 and at most 1, got ${String(similarity)}`,
    });
  }

  for (const [productId, product] of Object.entries(config.products)) {
    validateGates(product.gates, `products.${productId}.gates`, errors);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError listing every failing field.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
