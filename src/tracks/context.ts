/**
 * Context track: the context document moves through versions v1 → v2 → v3,
 * each scored by a challenge. The track completes once v3 scores at or above
 * the approved threshold.
 *
 * @packageDocumentation
 */

import type { GateConfig } from '../config/types.js';
import type {
  ContextFacts,
  ContextStatus,
  ContextSubmission,
  ContextTrackState,
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

/**
 * Highest context document version.
 */
export const MAX_CONTEXT_VERSION = 3;

/**
 * Minimum challenge score for a document version.
 *
 * @param gates - Gate policy.
 * @param version - Document version (1 to 3).
 * @returns The configured threshold.
 */
export function thresholdForVersion(gates: GateConfig, version: number): number {
  if (version <= 1) {
    return gates.context_draft_threshold;
  }
  if (version === 2) {
    return gates.context_review_threshold;
  }
  return gates.context_approved_threshold;
}

/**
 * Returns the current (last) submission.
 *
 * @param facts - Context facts.
 * @returns The latest submission, if any.
 */
export function latestSubmission(facts: ContextFacts): ContextSubmission | undefined {
  return facts.submissions[facts.submissions.length - 1];
}

function deriveContextStatus(facts: ContextFacts, env: DeriveEnv): ContextStatus {
  const common = activityStatus(facts);
  if (common !== undefined) {
    return common;
  }
  const latest = latestSubmission(facts);
  if (latest === undefined) {
    return 'in_progress';
  }
  if (latest.score === null) {
    return 'pending_challenge';
  }
  if (
    latest.version === MAX_CONTEXT_VERSION &&
    latest.score >= env.gates.context_approved_threshold
  ) {
    return 'complete';
  }
  return 'in_progress';
}

/**
 * Context track definition.
 */
export const CONTEXT_TRACK: TrackDefinition<ContextStatus, ContextFacts> = {
  name: 'context',
  transitions: new Map<ContextStatus, readonly ContextStatus[]>([
    ['not_started', ['in_progress']],
    ['in_progress', ['pending_challenge', 'complete', 'blocked']],
    ['pending_challenge', ['in_progress', 'complete', 'blocked']],
    ['blocked', ['in_progress', 'pending_challenge', 'complete']],
    ['complete', ['blocked']],
  ]),
  derive: deriveContextStatus,
};

function validateScore(score: number): void {
  if (!Number.isFinite(score) || score < 0 || score > 100) {
    throw new TrackOperationError(
      'MALFORMED_PAYLOAD',
      'context',
      `Challenge score must be between 0 and 100, got ${String(score)}`
    );
  }
}

/**
 * A context document submission.
 */
export interface ContextVersionInput {
  /** Version 1 to 3. */
  version: number;
  /** Challenge score when already known. */
  score?: number | null | undefined;
  /** Reference to the document content. */
  document?: string | null | undefined;
}

/**
 * Submits a context document version.
 *
 * The version must equal the current one (a resubmission) or follow it.
 *
 * @param state - Context track state.
 * @param input - Submission.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 * @throws TrackOperationError for lower versions (VERSION_REGRESSION), skipped
 *   versions, out-of-range versions or scores, or a track that is not started.
 */
export function submitContextVersion(
  state: ContextTrackState,
  input: ContextVersionInput,
  ctx: TrackContext
): ContextTrackState {
  requireStarted(CONTEXT_TRACK, state);

  const { version } = input;
  const score = input.score ?? null;
  if (!Number.isInteger(version) || version < 1 || version > MAX_CONTEXT_VERSION) {
    throw new TrackOperationError(
      'MALFORMED_PAYLOAD',
      'context',
      `Context version must be 1, 2 or 3, got ${String(version)}`
    );
  }
  if (score !== null) {
    validateScore(score);
  }

  const current = state.version;
  if (version < current) {
    throw new TrackOperationError(
      'VERSION_REGRESSION',
      'context',
      `Cannot submit v${String(version)} after v${String(current)} (status: ${state.status})`
    );
  }
  if (version > current + 1) {
    throw new TrackOperationError(
      'INVALID_TRACK_TRANSITION',
      'context',
      `Cannot skip from v${String(current)} to v${String(version)}`
    );
  }

  const submission: ContextSubmission = {
    version,
    score,
    document: input.document ?? null,
    submitted_by: ctx.actor,
    submitted_at: ctx.now,
    challenged_at: score === null ? null : ctx.now,
  };

  return commitFacts(
    CONTEXT_TRACK,
    state,
    { ...state.metadata, submissions: [...state.metadata.submissions, submission] },
    ctx,
    version
  );
}

/**
 * Records the challenge score of the current submission.
 *
 * @param state - Context track state.
 * @param score - Score 0..100.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 * @throws TrackOperationError when nothing was submitted yet (NOT_FOUND).
 */
export function recordContextChallenge(
  state: ContextTrackState,
  score: number,
  ctx: TrackContext
): ContextTrackState {
  requireStarted(CONTEXT_TRACK, state);
  validateScore(score);

  const latest = latestSubmission(state.metadata);
  if (latest === undefined) {
    throw new TrackOperationError('NOT_FOUND', 'context', 'No context document has been submitted');
  }

  const submissions = [
    ...state.metadata.submissions.slice(0, -1),
    { ...latest, score, challenged_at: ctx.now },
  ];

  return commitFacts(CONTEXT_TRACK, state, { ...state.metadata, submissions }, ctx);
}
