/**
 * Default configuration values for config.yaml.
 *
 * @packageDocumentation
 */

import type { AliasConfig, Config, GateConfig, LoggingConfig, PathConfig } from './types.js';

/**
 * Default gate policy: v1 has no score minimum, v2 needs 60, v3 needs 85,
 * Figma is required and no business case approvers are configured.
 */
export const DEFAULT_GATES: GateConfig = {
  context_draft_threshold: 0,
  context_review_threshold: 60,
  context_approved_threshold: 85,
  figma_required: true,
  required_bc_approvers: [],
};

/**
 * Default path configuration relative to the working directory.
 */
export const DEFAULT_PATHS: PathConfig = {
  features: '.features',
};

/**
 * Default duplicate detection settings.
 */
export const DEFAULT_ALIASES: AliasConfig = {
  similarity_threshold: 0.6,
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Organization recorded on features whose product does not name one.
 */
export const DEFAULT_ORGANIZATION = 'default';

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  gates: DEFAULT_GATES,
  aliases: DEFAULT_ALIASES,
  logging: DEFAULT_LOGGING,
  products: {},
};
