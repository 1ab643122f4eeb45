/**
 * JSON serialization of feature records.
 *
 * @packageDocumentation
 */

import { isRecord } from '../config/parser.js';
import { CURRENT_SCHEMA_VERSION, type FeatureRecord } from '../feature/types.js';
import { FeatureStoreError } from './errors.js';
import { migrateV1 } from './migrate.js';
import { decodeFeatureRecord } from './schema.js';

/**
 * A decoded record and the schema version it was stored with.
 */
export interface DeserializeResult {
  record: FeatureRecord;
  /** Schema version found in the document; lower than current when migrated. */
  storedVersion: number;
}

/**
 * Serializes a record as pretty-printed JSON with a trailing newline.
 *
 * @param record - The record to serialize.
 * @returns JSON text.
 */
export function serializeFeature(record: FeatureRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}

/**
 * Parses, migrates and validates a stored record.
 *
 * A document without `schema_version` is a v1 document.
 *
 * @param json - Stored JSON text.
 * @returns The record and its stored schema version.
 * @throws FeatureStoreError with `corruption_error` for empty input,
 *   `parse_error` for invalid JSON, `schema_error` for an unknown layout or a
 *   newer schema, or the decoder's `validation_error`/`corruption_error`.
 */
export function deserializeFeature(json: string): DeserializeResult {
  if (json.trim() === '') {
    throw new FeatureStoreError('Feature document is empty', 'corruption_error', {
      details: 'The file exists but contains no data',
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new FeatureStoreError(
      `Failed to parse feature JSON: ${parseError.message}`,
      'parse_error',
      { cause: parseError, details: 'The document does not contain valid JSON' }
    );
  }

  if (!isRecord(data)) {
    throw new FeatureStoreError('Invalid feature document: expected an object', 'schema_error', {
      details: `Received ${Array.isArray(data) ? 'array' : data === null ? 'null' : typeof data} instead of object`,
    });
  }

  const version = data['schema_version'] ?? 1;
  if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
    throw new FeatureStoreError(
      'Invalid feature document: schema_version must be a positive integer',
      'schema_error'
    );
  }
  if (version > CURRENT_SCHEMA_VERSION) {
    throw new FeatureStoreError(
      `Unsupported schema_version ${String(version)}; newest known is ${String(CURRENT_SCHEMA_VERSION)}`,
      'schema_error',
      { details: 'The record was written by a newer release' }
    );
  }

  const current = version < CURRENT_SCHEMA_VERSION ? migrateV1(data) : data;
  return { record: decodeFeatureRecord(current), storedVersion: version };
}
