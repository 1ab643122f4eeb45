/**
 * Feature record persistence.
 *
 * @packageDocumentation
 */

export { FeatureStoreError } from './errors.js';
export type { StoreErrorType } from './errors.js';
export { deserializeFeature, serializeFeature } from './serialization.js';
export type { DeserializeResult } from './serialization.js';
export { decodeFeatureRecord } from './schema.js';
export { migrateV1 } from './migrate.js';
export { FileFeatureStore, MemoryFeatureStore } from './store.js';
export type { FeatureStore } from './store.js';
