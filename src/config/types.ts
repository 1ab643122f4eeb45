/**
 * Configuration types for config.yaml parsing.
 *
 * @packageDocumentation
 */

/**
 * Quality gate thresholds and policy for one product.
 *
 * Passed explicitly to the gate evaluator, the decision gate controller and
 * the track state machines; nothing reads configuration from global state.
 */
export interface GateConfig {
  /** Minimum challenge score for a v1 context document (0 means no minimum). */
  context_draft_threshold: number;
  /** Minimum challenge score for a v2 context document. */
  context_review_threshold: number;
  /** Minimum challenge score for a v3 context document to complete the track. */
  context_approved_threshold: number;
  /** Whether the design track needs a Figma reference to complete. */
  figma_required: boolean;
  /** Stakeholders who must approve the business case. */
  required_bc_approvers: string[];
}

/**
 * Path configuration.
 */
export interface PathConfig {
  /** Directory holding one JSON record per feature. */
  features: string;
}

/**
 * Duplicate detection settings.
 */
export interface AliasConfig {
  /** Jaccard similarity at or above which an existing feature is a duplicate candidate. */
  similarity_threshold: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level entries are written. */
  debug: boolean;
}

/**
 * Per-product settings.
 */
export interface ProductConfig {
  /** Display name of the product. */
  name: string;
  /** Organization the product belongs to; copied onto every new feature. */
  organization: string;
  /** Gate overrides, already merged over the global gate defaults. */
  gates: GateConfig;
}

/**
 * Complete configuration object parsed from config.yaml.
 */
export interface Config {
  /** Filesystem locations. */
  paths: PathConfig;
  /** Gate defaults applied to every product. */
  gates: GateConfig;
  /** Duplicate detection settings. */
  aliases: AliasConfig;
  /** Logging settings. */
  logging: LoggingConfig;
  /** Known products keyed by product id. */
  products: Record<string, ProductConfig>;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  paths?: Partial<PathConfig>;
  gates?: Partial<GateConfig>;
  aliases?: Partial<AliasConfig>;
  logging?: Partial<LoggingConfig>;
}
