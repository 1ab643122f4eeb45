/**
 * Feature record persistence behind a key-value interface.
 *
 * Records are keyed by slug. Writes are last-writer-wins; there is no locking
 * between processes.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { isValidSlug } from '../feature/record.js';
import type { FeatureRecord } from '../feature/types.js';
import { getLogger } from '../utils/logger.js';
import {
  getErrorCode,
  safeExistsSync,
  safeMkdirSync,
  safeReadFileSync,
  safeReaddirSync,
  safeRenameSync,
  safeUnlinkSync,
  safeWriteFileSync,
} from '../utils/safe-fs.js';
import { FeatureStoreError } from './errors.js';
import { deserializeFeature, serializeFeature } from './serialization.js';

const logger = getLogger('FeatureStore');

/**
 * Key-value storage of feature records.
 */
export interface FeatureStore {
  /** Returns the record, or undefined when no record has the key. */
  load(key: string): FeatureRecord | undefined;
  save(key: string, record: FeatureRecord): void;
  exists(key: string): boolean;
  /** All keys, sorted. */
  list(): string[];
}

function checkKey(key: string): void {
  if (!isValidSlug(key)) {
    throw new FeatureStoreError(`Invalid feature key '${key}'`, 'validation_error', {
      details: 'Keys are lowercase slugs of letters, digits and single dashes',
    });
  }
}

function decode(key: string, json: string, source: string): FeatureRecord {
  try {
    const { record, storedVersion } = deserializeFeature(json);
    if (record.slug !== key) {
      throw new FeatureStoreError(
        `Record slug '${record.slug}' does not match its key '${key}'`,
        'corruption_error'
      );
    }
    if (storedVersion < record.schema_version) {
      logger.debug('feature_migrated', { key, fromVersion: storedVersion, toVersion: record.schema_version });
    }
    return record;
  } catch (error) {
    if (error instanceof FeatureStoreError) {
      logger.error('feature_load_failed', { key, errorType: error.errorType, message: error.message });
      throw new FeatureStoreError(
        `Error loading feature from ${source}: ${error.message}`,
        error.errorType,
        { cause: error.cause, details: error.details }
      );
    }
    throw error;
  }
}

/**
 * Stores one pretty-printed JSON file per feature: `<directory>/<slug>.json`.
 */
export class FileFeatureStore implements FeatureStore {
  private readonly directory: string;

  /**
   * Creates a file store. The directory is created on first save.
   *
   * @param directory - Features directory.
   */
  constructor(directory: string) {
    this.directory = directory;
  }

  /**
   * Path of the file holding a key.
   *
   * @param key - Feature slug.
   * @returns The file path.
   */
  pathFor(key: string): string {
    checkKey(key);
    return join(this.directory, `${key}.json`);
  }

  load(key: string): FeatureRecord | undefined {
    const filePath = this.pathFor(key);
    let content: string;
    try {
      content = safeReadFileSync(filePath);
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return undefined;
      }
      const fileError = error instanceof Error ? error : new Error(String(error));
      logger.error('feature_load_failed', { key, errorType: 'file_error', message: fileError.message });
      throw new FeatureStoreError(
        `Failed to read feature file "${filePath}": ${fileError.message}`,
        'file_error',
        { cause: fileError }
      );
    }

    const record = decode(key, content, `"${filePath}"`);
    logger.debug('feature_loaded', { key });
    return record;
  }

  /**
   * Writes the record to a temporary file in the same directory and renames
   * it over the target.
   *
   * @param key - Feature slug.
   * @param record - Record to store.
   * @throws FeatureStoreError with `file_error` when the write fails; the
   *   temporary file is removed and the previous file is left intact.
   */
  save(key: string, record: FeatureRecord): void {
    const filePath = this.pathFor(key);
    const json = serializeFeature(record);
    const tempPath = join(this.directory, `.${key}-${randomUUID()}.tmp`);

    try {
      safeMkdirSync(this.directory, { recursive: true });
      safeWriteFileSync(tempPath, json);
      safeRenameSync(tempPath, filePath);
    } catch (error) {
      this.removeTemp(tempPath);
      const fileError = error instanceof Error ? error : new Error(String(error));
      logger.error('feature_save_failed', { key, message: fileError.message });
      throw new FeatureStoreError(
        `Failed to save feature to "${filePath}": ${fileError.message}`,
        'file_error',
        { cause: fileError, details: 'Check that the directory exists and is writable' }
      );
    }

    logger.debug('feature_saved', { key, path: filePath });
  }

  exists(key: string): boolean {
    return safeExistsSync(this.pathFor(key));
  }

  list(): string[] {
    if (!safeExistsSync(this.directory)) {
      return [];
    }
    return safeReaddirSync(this.directory)
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .filter(isValidSlug);
  }

  private removeTemp(tempPath: string): void {
    if (!safeExistsSync(tempPath)) {
      return;
    }
    try {
      safeUnlinkSync(tempPath);
    } catch (cleanupError) {
      logger.warn('temp_file_cleanup_failed', {
        path: tempPath,
        message: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
  }
}

/**
 * Keeps serialized records in memory. Records go through the same
 * serialization as the file store, so loads return fresh copies.
 */
export class MemoryFeatureStore implements FeatureStore {
  private readonly documents = new Map<string, string>();

  /**
   * Creates a memory store.
   *
   * @param documents - Stored JSON documents by key, e.g. legacy fixtures.
   */
  constructor(documents: Readonly<Record<string, string>> = {}) {
    for (const [key, json] of Object.entries(documents)) {
      checkKey(key);
      this.documents.set(key, json);
    }
  }

  load(key: string): FeatureRecord | undefined {
    checkKey(key);
    const json = this.documents.get(key);
    return json === undefined ? undefined : decode(key, json, `memory key '${key}'`);
  }

  save(key: string, record: FeatureRecord): void {
    checkKey(key);
    this.documents.set(key, serializeFeature(record));
    logger.debug('feature_saved', { key });
  }

  exists(key: string): boolean {
    checkKey(key);
    return this.documents.has(key);
  }

  list(): string[] {
    return [...this.documents.keys()].sort();
  }

  /**
   * Raw stored document, for inspection.
   *
   * @param key - Feature slug.
   * @returns The JSON text, or undefined.
   */
  raw(key: string): string | undefined {
    return this.documents.get(key);
  }
}
