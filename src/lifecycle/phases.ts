/**
 * Phase state machine for the feature lifecycle.
 *
 * Implements the lifecycle transitions:
 * - Forward chain (initialization → signal_analysis → ... → complete)
 * - The single backward edge decision_gate → parallel_tracks (on rejection)
 * - Operator transitions to archived/deferred from any non-terminal phase
 *
 * Every transition closes the open history entry and opens a new one at the
 * same instant, so the history stays a contiguous chain.
 *
 * @packageDocumentation
 */

import { appendDecision, getOpenPhaseEntry } from '../feature/record.js';
import { PHASES, type FeatureRecord, type Metadata, type Phase } from '../feature/types.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('PhaseStateMachine');

/**
 * Valid forward transitions. Each phase has at most one successor.
 */
export const FORWARD_TRANSITIONS: ReadonlyMap<Phase, Phase> = new Map<Phase, Phase>([
  ['initialization', 'signal_analysis'],
  ['signal_analysis', 'context_doc'],
  ['context_doc', 'parallel_tracks'],
  ['parallel_tracks', 'decision_gate'],
  ['decision_gate', 'output_generation'],
  ['output_generation', 'complete'],
]);

/**
 * Valid backward transitions.
 */
export const BACKWARD_TRANSITIONS: ReadonlyMap<Phase, readonly Phase[]> = new Map<
  Phase,
  readonly Phase[]
>([['decision_gate', ['parallel_tracks']]]);

/**
 * Phases with no outgoing edges.
 */
export const TERMINAL_PHASES: ReadonlySet<Phase> = new Set<Phase>([
  'complete',
  'archived',
  'deferred',
]);

/**
 * Phases that only an operator action can enter.
 */
export type OperatorPhase = 'archived' | 'deferred';

/**
 * Error codes for transition failures.
 */
export type TransitionErrorCode =
  | 'INVALID_TRANSITION' // Target phase is not reachable from current phase
  | 'TERMINAL_PHASE' // Record is in a terminal phase
  | 'OPERATOR_ONLY'; // Target phase needs an operator action

/**
 * Error thrown when a phase transition is not allowed.
 */
export class InvalidTransitionError extends Error {
  /** Error code for programmatic handling. */
  public readonly code: TransitionErrorCode;
  /** The attempted source phase. */
  public readonly fromPhase: Phase;
  /** The attempted target phase. */
  public readonly toPhase: Phase;

  /**
   * Creates a new InvalidTransitionError.
   *
   * @param code - Error code.
   * @param message - Human-readable message.
   * @param fromPhase - Source phase.
   * @param toPhase - Target phase.
   */
  constructor(code: TransitionErrorCode, message: string, fromPhase: Phase, toPhase: Phase) {
    super(message);
    this.name = 'InvalidTransitionError';
    this.code = code;
    this.fromPhase = fromPhase;
    this.toPhase = toPhase;
  }
}

export function isPhase(value: string): value is Phase {
  return PHASES.some((phase) => phase === value);
}

export function isTerminalPhase(phase: Phase): boolean {
  return TERMINAL_PHASES.has(phase);
}

export function isOperatorPhase(phase: Phase): phase is OperatorPhase {
  return phase === 'archived' || phase === 'deferred';
}

/**
 * Lists phases reachable from a phase through `advancePhase`.
 *
 * @param from - Source phase.
 * @returns Forward successor first, then backward targets.
 */
export function getValidTargets(from: Phase): readonly Phase[] {
  const targets: Phase[] = [];
  const forward = FORWARD_TRANSITIONS.get(from);
  if (forward !== undefined) {
    targets.push(forward);
  }
  targets.push(...(BACKWARD_TRANSITIONS.get(from) ?? []));
  return targets;
}

/**
 * Checks if a transition is valid through `advancePhase`.
 *
 * @param from - Source phase.
 * @param to - Target phase.
 * @returns True if the edge exists.
 */
export function isValidTransition(from: Phase, to: Phase): boolean {
  return getValidTargets(from).includes(to);
}

/**
 * Builds the error for a transition that is not allowed.
 *
 * @param from - Source phase.
 * @param to - Target phase.
 * @returns The error to throw.
 */
export function createTransitionError(from: Phase, to: Phase): InvalidTransitionError {
  if (isTerminalPhase(from)) {
    return new InvalidTransitionError(
      'TERMINAL_PHASE',
      `Phase '${from}' is terminal and does not support transitions`,
      from,
      to
    );
  }
  if (isOperatorPhase(to)) {
    return new InvalidTransitionError(
      'OPERATOR_ONLY',
      `Phase '${to}' can only be entered through an operator action`,
      from,
      to
    );
  }
  return new InvalidTransitionError(
    'INVALID_TRANSITION',
    `Invalid transition from '${from}' to '${to}'. Valid transitions: ${getValidTargets(from).join(', ')}`,
    from,
    to
  );
}

/**
 * Moves the record into a phase without checking the edge.
 *
 * The new entry's timestamp never precedes the open entry's, even when the
 * clock steps backwards.
 *
 * @param record - Feature record.
 * @param target - Phase to enter.
 * @param metadata - Metadata of the new entry.
 * @param now - Transition time (ISO 8601).
 * @returns Updated record.
 */
function enterPhase(
  record: FeatureRecord,
  target: Phase,
  metadata: Metadata,
  now: string
): FeatureRecord {
  const open = getOpenPhaseEntry(record);
  const at = open !== undefined && open.entered_at > now ? open.entered_at : now;

  const history = record.phase_history.map((entry, index) =>
    index === record.phase_history.length - 1 ? { ...entry, exited_at: at } : entry
  );
  history.push({ phase: target, entered_at: at, exited_at: null, metadata });

  logger.debug('phase_transition', {
    slug: record.slug,
    fromPhase: record.current_phase,
    toPhase: target,
  });

  return { ...record, current_phase: target, phase_history: history };
}

/**
 * Advances a feature to a target phase.
 *
 * Advancing to the current phase is a no-op that returns the same record,
 * so retried calls are harmless.
 *
 * @param record - Feature record.
 * @param target - Phase to enter.
 * @param now - Transition time (ISO 8601).
 * @param metadata - Metadata of the new history entry.
 * @returns Updated record.
 * @throws InvalidTransitionError if the target is not reachable.
 *
 * @example
 * ```typescript
 * const next = advancePhase(record, 'signal_analysis', new Date().toISOString());
 * ```
 */
export function advancePhase(
  record: FeatureRecord,
  target: Phase,
  now: string,
  metadata: Metadata = {}
): FeatureRecord {
  if (target === record.current_phase) {
    return record;
  }
  if (!isValidTransition(record.current_phase, target)) {
    throw createTransitionError(record.current_phase, target);
  }
  return enterPhase(record, target, metadata, now);
}

/**
 * Who performed an operator action and why.
 */
export interface OperatorAction {
  actor: string;
  reason: string;
  /** Action time (ISO 8601). */
  now: string;
}

/**
 * Archives or defers a feature. Allowed from any non-terminal phase; records
 * the operator in the history entry and appends a Decision.
 *
 * @param record - Feature record.
 * @param target - `archived` or `deferred`.
 * @param action - Operator and reason.
 * @returns Updated record.
 * @throws InvalidTransitionError from a terminal phase.
 */
export function operatorTransition(
  record: FeatureRecord,
  target: OperatorPhase,
  action: OperatorAction
): FeatureRecord {
  const from = record.current_phase;
  if (isTerminalPhase(from)) {
    throw createTransitionError(from, target);
  }

  const moved = enterPhase(
    record,
    target,
    { operator: action.actor, reason: action.reason, previous_phase: from },
    action.now
  );

  logger.info(target === 'archived' ? 'feature_archived' : 'feature_deferred', {
    slug: record.slug,
    fromPhase: from,
    actor: action.actor,
  });

  return appendDecision(moved, {
    phase: target,
    decision: target === 'archived' ? 'Archive feature' : 'Defer feature',
    rationale: action.reason,
    decided_by: action.actor,
    timestamp: action.now,
    metadata: { outcome: target, from_phase: from },
  });
}
