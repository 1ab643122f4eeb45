/**
 * Interfaces of the systems the engine hands work to.
 *
 * @packageDocumentation
 */

import type { FeatureRecord } from '../feature/types.js';

/**
 * Creates the knowledge graph entity of a new feature.
 */
export interface BrainEntityCreator {
  /**
   * Called once per feature, before the record is first saved.
   *
   * @param record - The new record.
   * @returns Reference of the created entity.
   */
  create(record: FeatureRecord): string;
}

/**
 * Renders the final documents of an approved feature.
 */
export interface OutputGenerator {
  /**
   * @param record - A feature in `output_generation`.
   * @param documents - Names of the documents to produce.
   * @returns Paths of the generated files.
   */
  generate(record: FeatureRecord, documents: readonly string[]): string[];
}
