/**
 * Shared track state machine machinery.
 *
 * A track's status is never set directly. Each mutator records a fact, then
 * {@link commitFacts} derives the new status from the facts and checks the
 * move against the track's transition table.
 *
 * @packageDocumentation
 */

import type { GateConfig } from '../config/types.js';
import {
  TRACK_LABELS,
  type Artifacts,
  type TrackActivity,
  type TrackName,
  type TrackState,
  type TrackStatus,
} from '../feature/types.js';
import { getLogger } from '../utils/logger.js';
import { TrackOperationError } from './errors.js';

const logger = getLogger('TrackStateMachine');

/**
 * Allowed status changes, keyed by source status. Staying in the same status
 * is always allowed.
 */
export type TransitionTable<S extends TrackStatus> = ReadonlyMap<S, readonly S[]>;

/**
 * Inputs besides the facts that a status may depend on.
 */
export interface DeriveEnv {
  /** The product's gate policy. */
  gates: GateConfig;
  /** The record's artifacts map. */
  artifacts: Artifacts;
}

/**
 * Who performs a mutation and when, with the policy in force.
 */
export interface TrackContext extends DeriveEnv {
  actor: string;
  /** Mutation time (ISO 8601). */
  now: string;
}

/**
 * Static description of one track.
 */
export interface TrackDefinition<S extends TrackStatus, F extends TrackActivity> {
  readonly name: TrackName;
  readonly transitions: TransitionTable<S>;
  /** Status implied by the facts; see {@link activityStatus}. */
  readonly derive: (facts: F, env: DeriveEnv) => S;
}

/**
 * Status shared by every track before `start` and while blocked, or undefined
 * when the track-specific rules apply.
 *
 * @param facts - Recorded facts.
 * @returns `not_started`, `blocked` or undefined.
 */
export function activityStatus(facts: TrackActivity): 'not_started' | 'blocked' | undefined {
  if (facts.started_at === null) {
    return 'not_started';
  }
  if (facts.blocked !== null) {
    return 'blocked';
  }
  return undefined;
}

/**
 * Throws unless `from -> to` is in the track's table.
 *
 * @param definition - Track definition.
 * @param from - Current status.
 * @param to - Derived status.
 * @throws TrackOperationError with code INVALID_TRACK_TRANSITION.
 */
export function assertTransition<S extends TrackStatus, F extends TrackActivity>(
  definition: TrackDefinition<S, F>,
  from: S,
  to: S
): void {
  if (from === to) {
    return;
  }
  const allowed = definition.transitions.get(from) ?? [];
  if (!allowed.includes(to)) {
    throw new TrackOperationError(
      'INVALID_TRACK_TRANSITION',
      definition.name,
      `${TRACK_LABELS[definition.name]} track cannot move from '${from}' to '${to}'`
    );
  }
}

/**
 * Stores new facts and the status derived from them.
 *
 * @param definition - Track definition.
 * @param state - Current track state.
 * @param facts - Updated facts.
 * @param env - Gate policy and artifacts.
 * @param version - Document revision after the mutation.
 * @returns The new track state.
 * @throws TrackOperationError when the derived move is not in the table.
 */
export function commitFacts<S extends TrackStatus, F extends TrackActivity>(
  definition: TrackDefinition<S, F>,
  state: TrackState<S, F>,
  facts: F,
  env: DeriveEnv,
  version: number = state.version
): TrackState<S, F> {
  const next = definition.derive(facts, env);
  assertTransition(definition, state.status, next);

  if (next !== state.status) {
    logger.debug('track_status_changed', {
      track: definition.name,
      fromStatus: state.status,
      toStatus: next,
    });
  }

  return { status: next, version, metadata: facts };
}

/**
 * Throws unless the track has been started.
 *
 * @param definition - Track definition.
 * @param state - Current track state.
 * @throws TrackOperationError with code TRACK_NOT_STARTED.
 */
export function requireStarted<S extends TrackStatus, F extends TrackActivity>(
  definition: TrackDefinition<S, F>,
  state: TrackState<S, F>
): void {
  if (state.metadata.started_at === null) {
    throw new TrackOperationError(
      'TRACK_NOT_STARTED',
      definition.name,
      `${TRACK_LABELS[definition.name]} track has not been started`
    );
  }
}

/**
 * Starts a track.
 *
 * @param definition - Track definition.
 * @param state - Current track state.
 * @param ctx - Actor, time and policy.
 * @returns The started track.
 * @throws TrackOperationError if the track was already started.
 */
export function startTrack<S extends TrackStatus, F extends TrackActivity>(
  definition: TrackDefinition<S, F>,
  state: TrackState<S, F>,
  ctx: TrackContext
): TrackState<S, F> {
  if (state.metadata.started_at !== null) {
    throw new TrackOperationError(
      'INVALID_TRACK_TRANSITION',
      definition.name,
      `${TRACK_LABELS[definition.name]} track already started (status: ${state.status})`
    );
  }
  logger.debug('track_started', { track: definition.name, actor: ctx.actor });
  return commitFacts(
    definition,
    state,
    { ...state.metadata, started_at: ctx.now, started_by: ctx.actor },
    ctx
  );
}

/**
 * Blocks a started track.
 *
 * @param definition - Track definition.
 * @param state - Current track state.
 * @param reason - Why the track is blocked.
 * @param ctx - Actor, time and policy.
 * @returns The blocked track.
 * @throws TrackOperationError if the track is not started or already blocked.
 */
export function blockTrack<S extends TrackStatus, F extends TrackActivity>(
  definition: TrackDefinition<S, F>,
  state: TrackState<S, F>,
  reason: string,
  ctx: TrackContext
): TrackState<S, F> {
  requireStarted(definition, state);
  if (state.metadata.blocked !== null) {
    throw new TrackOperationError(
      'INVALID_TRACK_TRANSITION',
      definition.name,
      `${TRACK_LABELS[definition.name]} track is already blocked: ${state.metadata.blocked.reason}`
    );
  }
  logger.debug('track_blocked', { track: definition.name, actor: ctx.actor, reason });
  return commitFacts(
    definition,
    state,
    { ...state.metadata, blocked: { reason, blocked_by: ctx.actor, blocked_at: ctx.now } },
    ctx
  );
}

/**
 * Lifts the block of a track; the status returns to what its facts imply.
 *
 * @param definition - Track definition.
 * @param state - Current track state.
 * @param ctx - Actor, time and policy.
 * @returns The unblocked track.
 * @throws TrackOperationError if the track is not blocked.
 */
export function unblockTrack<S extends TrackStatus, F extends TrackActivity>(
  definition: TrackDefinition<S, F>,
  state: TrackState<S, F>,
  ctx: TrackContext
): TrackState<S, F> {
  requireStarted(definition, state);
  if (state.metadata.blocked === null) {
    throw new TrackOperationError(
      'INVALID_TRACK_TRANSITION',
      definition.name,
      `${TRACK_LABELS[definition.name]} track is not blocked`
    );
  }
  logger.debug('track_unblocked', { track: definition.name, actor: ctx.actor });
  return commitFacts(definition, state, { ...state.metadata, blocked: null }, ctx);
}
