/**
 * Design track: a design spec plus wireframe and Figma references. The two
 * references are stored in the record's artifacts map, so mutators return the
 * updated artifacts alongside the track.
 *
 * @packageDocumentation
 */

import type {
  Artifacts,
  DesignFacts,
  DesignStatus,
  DesignTrackState,
} from '../feature/types.js';
import { TrackOperationError } from './errors.js';
import {
  activityStatus,
  commitFacts,
  requireStarted,
  type DeriveEnv,
  type TrackContext,
  type TrackDefinition,
} from './machine.js';

function deriveDesignStatus(facts: DesignFacts, env: DeriveEnv): DesignStatus {
  const common = activityStatus(facts);
  if (common !== undefined) {
    return common;
  }
  const hasFigma = env.artifacts.figma !== undefined;
  if (facts.spec !== null && (hasFigma || !env.gates.figma_required)) {
    return 'complete';
  }
  if (hasFigma) {
    return 'figma_attached';
  }
  if (env.artifacts.wireframes !== undefined) {
    return 'wireframes_ready';
  }
  return 'in_progress';
}

/**
 * Design track definition.
 */
export const DESIGN_TRACK: TrackDefinition<DesignStatus, DesignFacts> = {
  name: 'design',
  transitions: new Map<DesignStatus, readonly DesignStatus[]>([
    ['not_started', ['in_progress', 'wireframes_ready', 'figma_attached']],
    ['in_progress', ['wireframes_ready', 'figma_attached', 'complete', 'blocked']],
    ['wireframes_ready', ['figma_attached', 'complete', 'blocked']],
    ['figma_attached', ['complete', 'blocked']],
    ['blocked', ['in_progress', 'wireframes_ready', 'figma_attached', 'complete']],
    ['complete', ['blocked']],
  ]),
  derive: deriveDesignStatus,
};

/**
 * Result of a design mutation.
 */
export interface DesignUpdate {
  track: DesignTrackState;
  artifacts: Artifacts;
}

function requireRef(ref: string): void {
  if (ref.trim() === '') {
    throw new TrackOperationError('MALFORMED_PAYLOAD', 'design', 'Reference must not be empty');
  }
}

/**
 * Records the design spec document reference. Each call is a new revision.
 *
 * @param state - Design track state.
 * @param ref - Spec document reference.
 * @param ctx - Actor, time, policy and current artifacts.
 * @returns Updated track state.
 */
export function recordDesignSpec(
  state: DesignTrackState,
  ref: string,
  ctx: TrackContext
): DesignTrackState {
  requireStarted(DESIGN_TRACK, state);
  requireRef(ref);
  return commitFacts(
    DESIGN_TRACK,
    state,
    { ...state.metadata, spec: { ref, recorded_by: ctx.actor, recorded_at: ctx.now } },
    ctx,
    state.version + 1
  );
}

function attachDesignArtifact(
  state: DesignTrackState,
  kind: 'wireframes' | 'figma',
  ref: string,
  ctx: TrackContext
): DesignUpdate {
  requireStarted(DESIGN_TRACK, state);
  requireRef(ref);
  const artifacts: Artifacts = { ...ctx.artifacts };
  artifacts[kind] = ref;
  return {
    track: commitFacts(DESIGN_TRACK, state, state.metadata, { ...ctx, artifacts }),
    artifacts,
  };
}

/**
 * Attaches wireframes. Wireframes are advisory for completion.
 *
 * @param state - Design track state.
 * @param ref - Wireframes reference.
 * @param ctx - Actor, time, policy and current artifacts.
 * @returns Updated track state and artifacts.
 */
export function attachWireframes(
  state: DesignTrackState,
  ref: string,
  ctx: TrackContext
): DesignUpdate {
  return attachDesignArtifact(state, 'wireframes', ref, ctx);
}

/**
 * Attaches the Figma reference.
 *
 * @param state - Design track state.
 * @param ref - Figma reference.
 * @param ctx - Actor, time, policy and current artifacts.
 * @returns Updated track state and artifacts.
 */
export function attachFigma(state: DesignTrackState, ref: string, ctx: TrackContext): DesignUpdate {
  return attachDesignArtifact(state, 'figma', ref, ctx);
}

/**
 * Recomputes the design status after the artifacts map changed outside the
 * design track. A track that has not started is left as is.
 *
 * @param state - Design track state.
 * @param env - Policy and the new artifacts.
 * @returns Updated track state.
 */
export function refreshDesignStatus(state: DesignTrackState, env: DeriveEnv): DesignTrackState {
  if (state.metadata.started_at === null) {
    return state;
  }
  return commitFacts(DESIGN_TRACK, state, state.metadata, env);
}

