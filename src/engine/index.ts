/**
 * Feature engine command surface.
 *
 * @packageDocumentation
 */

export { DEFAULT_ACTOR, FeatureEngine } from './engine.js';
export type {
  DecisionGateInput,
  FeatureCheck,
  FeatureEngineOptions,
  FeatureSummary,
  GateVerdict,
  StartFeatureInput,
  StartFeatureResult,
  TrackCheck,
} from './engine.js';
export { FeatureEngineError } from './errors.js';
export type { FeatureEngineErrorCode } from './errors.js';
export type { BrainEntityCreator, OutputGenerator } from './collaborators.js';
