/**
 * Decision gate: validates a feature's readiness and records approvals and
 * rejections as decisions.
 *
 * A forced approval bypasses the blockers but never clears them; they stay in
 * the decision metadata and later validations keep reporting them.
 *
 * @packageDocumentation
 */

import type { GateConfig } from '../config/types.js';
import { appendDecision } from '../feature/record.js';
import type { EngineeringFacts, FeatureRecord, Phase, TrackName } from '../feature/types.js';
import {
  InvalidTransitionError,
  advancePhase,
  createTransitionError,
  isTerminalPhase,
} from '../lifecycle/phases.js';
import { unmitigatedHighRisks, unresolvedBlockingDependencies } from '../tracks/engineering.js';
import { getLogger } from '../utils/logger.js';
import { QualityGateEvaluator, formatBlocker } from './evaluator.js';
import type { DecisionResult, GateCheck } from './types.js';

const logger = getLogger('DecisionGateController');

/**
 * Tracks evaluated in a phase. Phases not listed evaluate every track and the
 * cross-cutting checks.
 */
const PHASE_SCOPE: ReadonlyMap<Phase, readonly TrackName[]> = new Map<Phase, readonly TrackName[]>(
  [['context_doc', ['context']]]
);

const CROSS_CUTTING_LABELS: Readonly<Record<string, string>> = {
  blocking_dependencies_resolved: 'Dependencies',
  no_unmitigated_high_risks: 'Risks',
};

/**
 * Error thrown when approval is requested for a feature that is not ready.
 */
export class GateNotReadyError extends Error {
  public readonly code = 'GATE_NOT_READY';
  /** Blockers at the time of the request. */
  public readonly blockers: readonly string[];
  /** The full validation result. */
  public readonly result: DecisionResult;

  /**
   * Creates a new GateNotReadyError.
   *
   * @param result - The NOT_READY validation result.
   */
  constructor(result: DecisionResult) {
    super(
      `Decision gate not ready: ${String(result.blockers.length)} blocker(s)\n` +
        result.blockers.map((blocker) => `  - ${blocker}`).join('\n')
    );
    this.name = 'GateNotReadyError';
    this.blockers = result.blockers;
    this.result = result;
  }
}

/**
 * Checks that span tracks.
 *
 * @param facts - Engineering facts, where dependencies and risks live.
 * @returns Dependency and risk checks, both BLOCKING.
 */
export function crossCuttingChecks(facts: EngineeringFacts): GateCheck[] {
  const dependencies = unresolvedBlockingDependencies(facts);
  const risks = unmitigatedHighRisks(facts);
  return [
    {
      name: 'blocking_dependencies_resolved',
      level: 'BLOCKING',
      passed: dependencies.length === 0,
      evidence: { unresolved: dependencies.map((dep) => dep.name) },
      message:
        dependencies.length === 0
          ? 'No unresolved blocking dependencies'
          : `Unresolved blocking dependencies: ${dependencies.map((dep) => dep.name).join(', ')}`,
    },
    {
      name: 'no_unmitigated_high_risks',
      level: 'BLOCKING',
      passed: risks.length === 0,
      evidence: { unmitigated: risks.map((risk) => risk.id) },
      message:
        risks.length === 0
          ? 'No high-impact risk without mitigation'
          : `High-impact risks without mitigation: ${risks.map((risk) => risk.risk).join(', ')}`,
    },
  ];
}

/**
 * An approval or rejection request.
 */
export interface GateDecisionInput {
  reason: string;
  actor: string;
  /** Decision time (ISO 8601). */
  now: string;
  /** Approve despite blockers. Ignored for rejections. */
  force?: boolean | undefined;
}

/**
 * Validates features at the decision gate and records its outcome.
 */
export class DecisionGateController {
  private readonly evaluator: QualityGateEvaluator;

  /**
   * Creates a controller.
   *
   * @param gates - The product's gate policy.
   */
  constructor(gates: GateConfig) {
    this.evaluator = new QualityGateEvaluator(gates);
  }

  /**
   * Evaluates readiness.
   *
   * @param record - The feature.
   * @param phase - Phase to scope the evaluation to; `context_doc` checks the
   *   Context track alone.
   * @returns READY iff every evaluated track passes and, outside
   *   `context_doc`, both cross-cutting checks pass.
   */
  validate(record: FeatureRecord, phase: Phase = 'decision_gate'): DecisionResult {
    const scope = PHASE_SCOPE.get(phase);
    const tracks = this.evaluator.evaluateAll(record, scope);
    const checks = scope === undefined ? crossCuttingChecks(record.tracks.engineering.metadata) : [];

    const blockers = [
      ...tracks.flatMap((track) => track.blockers),
      ...checks
        .filter((item) => !item.passed)
        .map((item) => formatBlocker(CROSS_CUTTING_LABELS[item.name] ?? item.name, item.message)),
    ];

    const result: DecisionResult = {
      status: blockers.length === 0 ? 'READY' : 'NOT_READY',
      blockers,
      tracks,
      checks,
      phase,
    };

    logger.debug('decision_gate_validated', {
      slug: record.slug,
      phase,
      status: result.status,
      blockers: blockers.length,
    });
    return result;
  }

  /**
   * Approves the decision gate and moves the feature to
   * `output_generation`, passing through `decision_gate` when needed.
   *
   * @param record - A feature in `parallel_tracks` or `decision_gate`.
   * @param input - Reason, actor, time and the force flag.
   * @returns The updated record.
   * @throws InvalidTransitionError from any other phase.
   * @throws GateNotReadyError when NOT_READY and not forced.
   */
  approve(record: FeatureRecord, input: GateDecisionInput): FeatureRecord {
    const from = record.current_phase;
    if (from !== 'parallel_tracks' && from !== 'decision_gate') {
      throw createTransitionError(from, 'output_generation');
    }

    const result = this.validate(record);
    const ready = result.status === 'READY';
    if (!ready && input.force !== true) {
      logger.info('gate_not_ready', { slug: record.slug, blockers: result.blockers.length });
      throw new GateNotReadyError(result);
    }

    const forced = !ready;
    let next = from === 'parallel_tracks' ? advancePhase(record, 'decision_gate', input.now) : record;
    next = appendDecision(next, {
      phase: 'decision_gate',
      decision: input.reason,
      rationale: forced
        ? `Approved with ${String(result.blockers.length)} open blocker(s)`
        : 'All quality gates passed',
      decided_by: input.actor,
      timestamp: input.now,
      metadata: forced
        ? { outcome: 'approved', forced, bypassed_blockers: [...result.blockers] }
        : { outcome: 'approved', forced },
    });
    next = advancePhase(next, 'output_generation', input.now, { gate_outcome: 'approved', forced });

    logger.info(forced ? 'decision_gate_forced' : 'decision_gate_approved', {
      slug: record.slug,
      actor: input.actor,
      bypassedBlockers: forced ? result.blockers.length : 0,
    });
    return next;
  }

  /**
   * Rejects the decision gate and sends the feature back to
   * `parallel_tracks`. Tracks are left untouched.
   *
   * @param record - A feature in `parallel_tracks` or `decision_gate`.
   * @param input - Reason, actor and time.
   * @returns The updated record.
   * @throws InvalidTransitionError from any other phase.
   */
  reject(record: FeatureRecord, input: GateDecisionInput): FeatureRecord {
    const from = record.current_phase;
    if (from !== 'parallel_tracks' && from !== 'decision_gate') {
      throw isTerminalPhase(from)
        ? createTransitionError(from, 'parallel_tracks')
        : new InvalidTransitionError(
            'INVALID_TRANSITION',
            `Decision gate can only be rejected from 'parallel_tracks' or 'decision_gate'; feature is in '${from}'`,
            from,
            'parallel_tracks'
          );
    }

    const result = this.validate(record);
    const moved = advancePhase(record, 'parallel_tracks', input.now, { gate_outcome: 'rejected' });

    logger.info('decision_gate_rejected', { slug: record.slug, actor: input.actor });

    return appendDecision(moved, {
      phase: 'decision_gate',
      decision: input.reason,
      rationale: `Rejected with ${String(result.blockers.length)} open blocker(s)`,
      decided_by: input.actor,
      timestamp: input.now,
      metadata: { outcome: 'rejected', blockers: [...result.blockers] },
    });
  }
}
