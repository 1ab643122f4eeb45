/**
 * Types for quality gate evaluation and the decision gate.
 *
 * @packageDocumentation
 */

import type { Metadata, Phase, TrackName } from '../feature/types.js';

/**
 * How much a failing check matters.
 *
 * - BLOCKING: the feature cannot proceed past the decision gate
 * - REQUIRED: must pass for the track to pass, but does not stop proceeding
 * - ADVISORY: reported only
 */
export type GateLevel = 'BLOCKING' | 'REQUIRED' | 'ADVISORY';

export const GATE_LEVELS: readonly GateLevel[] = Object.freeze([
  'BLOCKING',
  'REQUIRED',
  'ADVISORY',
] as const);

/**
 * One evaluated check.
 */
export interface GateCheck {
  /** Stable check identifier, e.g. `estimate_provided`. */
  readonly name: string;
  readonly level: GateLevel;
  readonly passed: boolean;
  /** Facts the verdict was based on. */
  readonly evidence: Metadata;
  /** Human-readable verdict. */
  readonly message: string;
}

export type TrackGateStatus = 'PASS' | 'INCOMPLETE';

/**
 * Gate result of one track.
 */
export interface TrackGateResult {
  readonly track: TrackName;
  readonly status: TrackGateStatus;
  /** Checks in evaluation order. */
  readonly checks: readonly GateCheck[];
  /** Failing BLOCKING and REQUIRED checks, as `[<Track label>] <message>`. */
  readonly blockers: readonly string[];
  /** True iff every BLOCKING check passed. */
  readonly can_proceed: boolean;
}

export type DecisionStatus = 'READY' | 'NOT_READY';

/**
 * Outcome of validating a feature at the decision gate.
 */
export interface DecisionResult {
  readonly status: DecisionStatus;
  /** Track blockers in track order, then cross-cutting blockers. */
  readonly blockers: readonly string[];
  /** Per-track results for the tracks active in `phase`. */
  readonly tracks: readonly TrackGateResult[];
  /** Cross-cutting checks. */
  readonly checks: readonly GateCheck[];
  /** Phase the evaluation was scoped to. */
  readonly phase: Phase;
}
