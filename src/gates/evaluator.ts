/**
 * Quality gate evaluation.
 *
 * Each track has an ordered list of checks evaluated against its facts and
 * the product's gate policy. A track passes when every BLOCKING and REQUIRED
 * check passes; it may proceed when every BLOCKING check passes.
 *
 * @packageDocumentation
 */

import type { GateConfig } from '../config/types.js';
import {
  TRACK_LABELS,
  TRACK_NAMES,
  type BusinessCaseFacts,
  type ContextFacts,
  type DesignFacts,
  type EngineeringFacts,
  type FeatureRecord,
  type TrackName,
} from '../feature/types.js';
import { approvalOutcome, currentRoundVerdicts, pendingApprovers } from '../tracks/business-case.js';
import { MAX_CONTEXT_VERSION, latestSubmission, thresholdForVersion } from '../tracks/context.js';
import { proposedAdrs, unmitigatedHighRisks } from '../tracks/engineering.js';
import { getLogger } from '../utils/logger.js';
import type { GateCheck, GateLevel, TrackGateResult } from './types.js';

const logger = getLogger('QualityGateEvaluator');

/**
 * Formats a blocker string.
 *
 * @param label - Track or concern label.
 * @param message - Failure message.
 * @returns `[<label>] <message>`.
 */
export function formatBlocker(label: string, message: string): string {
  return `[${label}] ${message}`;
}

function check(
  name: string,
  level: GateLevel,
  passed: boolean,
  message: string,
  evidence: GateCheck['evidence'] = {}
): GateCheck {
  return { name, level, passed, evidence, message };
}

function contextChecks(facts: ContextFacts, gates: GateConfig): GateCheck[] {
  const latest = latestSubmission(facts);
  if (latest === undefined) {
    return [
      check('context_submitted', 'BLOCKING', false, 'Context document not submitted'),
      check('context_score_threshold', 'BLOCKING', false, 'No challenge score recorded'),
      check(
        'context_approved_version',
        'REQUIRED',
        false,
        `Context document has not reached approved v${String(MAX_CONTEXT_VERSION)}`
      ),
    ];
  }

  const version = `v${String(latest.version)}`;
  const threshold = thresholdForVersion(gates, latest.version);
  const evidence = { version: latest.version, score: latest.score, threshold };

  let scoreCheck: GateCheck;
  if (latest.score === null) {
    scoreCheck = check(
      'context_score_threshold',
      'BLOCKING',
      false,
      `Context ${version} has not been challenged`,
      evidence
    );
  } else if (latest.score < threshold) {
    scoreCheck = check(
      'context_score_threshold',
      'BLOCKING',
      false,
      `Context ${version} score ${String(latest.score)} is below threshold ${String(threshold)}`,
      evidence
    );
  } else {
    scoreCheck = check(
      'context_score_threshold',
      'BLOCKING',
      true,
      `Context ${version} score ${String(latest.score)} meets threshold ${String(threshold)}`,
      evidence
    );
  }

  const approved =
    latest.version === MAX_CONTEXT_VERSION &&
    latest.score !== null &&
    latest.score >= gates.context_approved_threshold;

  return [
    check('context_submitted', 'BLOCKING', true, `Context ${version} submitted`, {
      version: latest.version,
      document: latest.document,
    }),
    scoreCheck,
    check(
      'context_approved_version',
      'REQUIRED',
      approved,
      approved
        ? `Context v${String(MAX_CONTEXT_VERSION)} approved`
        : `Context document has not reached approved v${String(MAX_CONTEXT_VERSION)}`,
      { version: latest.version, threshold: gates.context_approved_threshold }
    ),
  ];
}

function designChecks(
  facts: DesignFacts,
  record: FeatureRecord,
  gates: GateConfig
): GateCheck[] {
  const figma = record.artifacts.figma ?? null;
  const wireframes = record.artifacts.wireframes ?? null;
  return [
    check(
      'design_spec_provided',
      'REQUIRED',
      facts.spec !== null,
      facts.spec !== null ? 'Design spec provided' : 'Design spec not provided',
      { spec: facts.spec?.ref ?? null }
    ),
    check(
      'figma_provided',
      gates.figma_required ? 'BLOCKING' : 'ADVISORY',
      figma !== null,
      figma !== null ? 'Figma design attached' : 'Figma design not attached',
      { figma, figma_required: gates.figma_required }
    ),
    check(
      'wireframes_provided',
      'ADVISORY',
      wireframes !== null,
      wireframes !== null ? 'Wireframes attached' : 'Wireframes not attached',
      { wireframes }
    ),
  ];
}

function approvalMessage(facts: BusinessCaseFacts, gates: GateConfig): string {
  const required = gates.required_bc_approvers;
  switch (approvalOutcome(facts, required)) {
    case 'not_submitted':
      return 'Business case not submitted for approval';
    case 'rejected': {
      const dissenters = currentRoundVerdicts(facts)
        .filter((verdict) => !verdict.approved)
        .map((verdict) => verdict.approver);
      return `Business case rejected by: ${dissenters.join(', ')}`;
    }
    case 'pending':
      return required.length > 0
        ? `Awaiting approval from: ${pendingApprovers(facts, required).join(', ')}`
        : 'Awaiting stakeholder approval';
    case 'approved':
      return 'Business case approved';
  }
}

function businessCaseChecks(facts: BusinessCaseFacts, gates: GateConfig): GateCheck[] {
  const required = gates.required_bc_approvers;
  return [
    check(
      'stakeholder_approval',
      'BLOCKING',
      approvalOutcome(facts, required) === 'approved',
      approvalMessage(facts, gates),
      {
        round: facts.rounds.length,
        required_approvers: [...required],
        pending_approvers: pendingApprovers(facts, required),
      }
    ),
    check(
      'assumptions_documented',
      'ADVISORY',
      facts.assumptions !== null,
      facts.assumptions !== null
        ? 'Business case assumptions documented'
        : 'Business case assumptions not documented'
    ),
  ];
}

function engineeringChecks(facts: EngineeringFacts): GateCheck[] {
  const proposed = proposedAdrs(facts);
  const unmitigated = unmitigatedHighRisks(facts);
  const { estimate } = facts;
  return [
    check(
      'components_identified',
      'REQUIRED',
      facts.components.length > 0,
      facts.components.length > 0
        ? `${String(facts.components.length)} component(s) identified`
        : 'No components identified',
      { components: facts.components.map((component) => component.name) }
    ),
    check(
      'adrs_decided',
      'BLOCKING',
      proposed.length === 0,
      proposed.length === 0
        ? 'No ADRs awaiting a decision'
        : `ADRs still proposed: ${proposed.map((adr) => `ADR-${String(adr.number)}`).join(', ')}`,
      { proposed: proposed.map((adr) => adr.number) }
    ),
    check(
      'estimate_provided',
      'BLOCKING',
      estimate !== null,
      estimate !== null
        ? `Estimate ${estimate.overall} (${estimate.confidence} confidence)`
        : 'Estimate not provided',
      { estimate: estimate?.overall ?? null, requested: facts.estimate_requested }
    ),
    check(
      'high_risks_mitigated',
      'BLOCKING',
      unmitigated.length === 0,
      unmitigated.length === 0
        ? 'All high-impact risks mitigated'
        : `High-impact risks without mitigation: ${unmitigated.map((risk) => risk.risk).join(', ')}`,
      { unmitigated: unmitigated.map((risk) => risk.id) }
    ),
  ];
}

/**
 * Builds a track result from its checks.
 *
 * @param track - Track the checks belong to.
 * @param checks - Checks in evaluation order.
 * @returns The aggregated result.
 */
export function summarizeChecks(track: TrackName, checks: readonly GateCheck[]): TrackGateResult {
  const failing = checks.filter((item) => !item.passed && item.level !== 'ADVISORY');
  return {
    track,
    status: failing.length === 0 ? 'PASS' : 'INCOMPLETE',
    checks,
    blockers: failing.map((item) => formatBlocker(TRACK_LABELS[track], item.message)),
    can_proceed: checks.every((item) => item.passed || item.level !== 'BLOCKING'),
  };
}

/**
 * Evaluates the quality gates of a feature's tracks under one gate policy.
 */
export class QualityGateEvaluator {
  private readonly gates: GateConfig;

  /**
   * Creates an evaluator.
   *
   * @param gates - The product's gate policy.
   */
  constructor(gates: GateConfig) {
    this.gates = gates;
  }

  /**
   * Evaluates one track.
   *
   * @param record - The feature.
   * @param track - Track to evaluate.
   * @returns The track's gate result.
   */
  evaluateTrack(record: FeatureRecord, track: TrackName): TrackGateResult {
    const checks = this.checksFor(record, track);
    const result = summarizeChecks(track, checks);
    logger.debug('gate_evaluated', {
      slug: record.slug,
      track,
      status: result.status,
      blockers: result.blockers.length,
    });
    return result;
  }

  private checksFor(record: FeatureRecord, track: TrackName): GateCheck[] {
    switch (track) {
      case 'context':
        return contextChecks(record.tracks.context.metadata, this.gates);
      case 'design':
        return designChecks(record.tracks.design.metadata, record, this.gates);
      case 'business_case':
        return businessCaseChecks(record.tracks.business_case.metadata, this.gates);
      case 'engineering':
        return engineeringChecks(record.tracks.engineering.metadata);
    }
  }

  /**
   * Evaluates the given tracks in track order.
   *
   * @param record - The feature.
   * @param tracks - Tracks to evaluate; all four by default.
   * @returns One result per track.
   */
  evaluateAll(
    record: FeatureRecord,
    tracks: readonly TrackName[] = TRACK_NAMES
  ): TrackGateResult[] {
    return TRACK_NAMES.filter((track) => tracks.includes(track)).map((track) =>
      this.evaluateTrack(record, track)
    );
  }
}
