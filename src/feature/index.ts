/**
 * Feature record model.
 *
 * @packageDocumentation
 */

export * from './types.js';
export {
  addAlias,
  appendDecision,
  createEmptyTracks,
  createFeatureRecord,
  deriveOverallStatus,
  generateSlug,
  getOpenPhaseEntry,
  isArtifactType,
  isPriority,
  isTrackDone,
  isTrackName,
  isValidSlug,
  setArtifact,
} from './record.js';
export type { NewFeatureInput } from './record.js';
