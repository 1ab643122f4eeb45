/**
 * Business case track: assumptions are documented, then the case is submitted
 * for stakeholder approval in rounds. Within the current round one dissent
 * rejects the case; approval needs every configured approver.
 *
 * @packageDocumentation
 */

import type {
  ApprovalType,
  BusinessCaseFacts,
  BusinessCaseStatus,
  BusinessCaseTrackState,
  Metadata,
  StakeholderApproval,
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
 * Latest verdict of each approver in the current round, in recording order.
 *
 * @param facts - Business case facts.
 * @returns Verdicts of the current round; empty before the first submission.
 */
export function currentRoundVerdicts(facts: BusinessCaseFacts): StakeholderApproval[] {
  const round = facts.rounds.length;
  const latest = new Map<string, StakeholderApproval>();
  for (const approval of facts.approvals) {
    if (approval.round === round) {
      latest.delete(approval.approver);
      latest.set(approval.approver, approval);
    }
  }
  return [...latest.values()];
}

/**
 * Required approvers who have not approved in the current round.
 *
 * @param facts - Business case facts.
 * @param required - Configured approvers.
 * @returns Names still pending, in configuration order.
 */
export function pendingApprovers(facts: BusinessCaseFacts, required: readonly string[]): string[] {
  const approved = new Set(
    currentRoundVerdicts(facts)
      .filter((verdict) => verdict.approved)
      .map((verdict) => verdict.approver)
  );
  return required.filter((approver) => !approved.has(approver));
}

/**
 * Outcome of the current approval round, ignoring whether the track is
 * blocked.
 */
export type ApprovalOutcome = 'not_submitted' | 'pending' | 'rejected' | 'approved';

/**
 * Evaluates the current approval round.
 *
 * @param facts - Business case facts.
 * @param required - Configured approvers; when empty, one approval suffices.
 * @returns The round's outcome.
 */
export function approvalOutcome(
  facts: BusinessCaseFacts,
  required: readonly string[]
): ApprovalOutcome {
  if (facts.rounds.length === 0) {
    return 'not_submitted';
  }
  const verdicts = currentRoundVerdicts(facts);
  if (verdicts.some((verdict) => !verdict.approved)) {
    return 'rejected';
  }
  const approved =
    required.length > 0
      ? pendingApprovers(facts, required).length === 0
      : verdicts.some((verdict) => verdict.approved);
  return approved ? 'approved' : 'pending';
}

const STATUS_BY_OUTCOME: Readonly<Record<ApprovalOutcome, BusinessCaseStatus>> = {
  not_submitted: 'in_progress',
  pending: 'pending_approval',
  rejected: 'rejected',
  approved: 'approved',
};

function deriveBusinessCaseStatus(facts: BusinessCaseFacts, env: DeriveEnv): BusinessCaseStatus {
  return (
    activityStatus(facts) ??
    STATUS_BY_OUTCOME[approvalOutcome(facts, env.gates.required_bc_approvers)]
  );
}

/**
 * Business case track definition. There is no `complete` state; `approved`
 * is the success state.
 */
export const BUSINESS_CASE_TRACK: TrackDefinition<BusinessCaseStatus, BusinessCaseFacts> = {
  name: 'business_case',
  transitions: new Map<BusinessCaseStatus, readonly BusinessCaseStatus[]>([
    ['not_started', ['in_progress']],
    ['in_progress', ['pending_approval', 'blocked']],
    ['pending_approval', ['approved', 'rejected', 'blocked']],
    ['rejected', ['pending_approval', 'blocked']],
    ['approved', ['blocked']],
    ['blocked', ['in_progress', 'pending_approval', 'approved', 'rejected']],
  ]),
  derive: deriveBusinessCaseStatus,
};

/**
 * Assumption fields to set; absent fields keep their value.
 */
export interface AssumptionsInput {
  baseline_metrics?: Metadata | null | undefined;
  impact_assumptions?: Metadata | null | undefined;
  investment_estimate?: string | null | undefined;
}

/**
 * Documents or updates the business case assumptions.
 *
 * @param state - Business case track state.
 * @param input - Fields to set.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function updateAssumptions(
  state: BusinessCaseTrackState,
  input: AssumptionsInput,
  ctx: TrackContext
): BusinessCaseTrackState {
  requireStarted(BUSINESS_CASE_TRACK, state);
  const previous = state.metadata.assumptions;
  return commitFacts(
    BUSINESS_CASE_TRACK,
    state,
    {
      ...state.metadata,
      assumptions: {
        baseline_metrics: input.baseline_metrics ?? previous?.baseline_metrics ?? {},
        impact_assumptions: input.impact_assumptions ?? previous?.impact_assumptions ?? {},
        investment_estimate: input.investment_estimate ?? previous?.investment_estimate ?? null,
        updated_by: ctx.actor,
        updated_at: ctx.now,
      },
    },
    ctx
  );
}

/**
 * Submits the business case for approval, opening a new round. Verdicts of
 * earlier rounds no longer count.
 *
 * @param state - Business case track state.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 * @throws TrackOperationError when the case is already approved.
 */
export function submitForApproval(
  state: BusinessCaseTrackState,
  ctx: TrackContext
): BusinessCaseTrackState {
  requireStarted(BUSINESS_CASE_TRACK, state);
  const round = state.metadata.rounds.length + 1;
  return commitFacts(
    BUSINESS_CASE_TRACK,
    state,
    {
      ...state.metadata,
      rounds: [...state.metadata.rounds, { round, submitted_by: ctx.actor, submitted_at: ctx.now }],
    },
    ctx,
    round
  );
}

/**
 * A stakeholder verdict.
 */
export interface ApprovalInput {
  approver: string;
  approved: boolean;
  approval_type?: ApprovalType | undefined;
  reference?: string | null | undefined;
  notes?: string | null | undefined;
}

/**
 * Records a stakeholder's approval or dissent in the current round.
 *
 * @param state - Business case track state.
 * @param input - The verdict.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 * @throws TrackOperationError with UNKNOWN_APPROVER when approvers are
 *   configured and this one is not among them, or INVALID_TRACK_TRANSITION
 *   before the first submission.
 */
export function recordApproval(
  state: BusinessCaseTrackState,
  input: ApprovalInput,
  ctx: TrackContext
): BusinessCaseTrackState {
  requireStarted(BUSINESS_CASE_TRACK, state);

  const required = ctx.gates.required_bc_approvers;
  if (required.length > 0 && !required.includes(input.approver)) {
    throw new TrackOperationError(
      'UNKNOWN_APPROVER',
      'business_case',
      `Unknown approver '${input.approver}'. Configured approvers: ${required.join(', ')}`
    );
  }

  const round = state.metadata.rounds.length;
  if (round === 0) {
    throw new TrackOperationError(
      'INVALID_TRACK_TRANSITION',
      'business_case',
      'Business case has not been submitted for approval'
    );
  }

  const approval: StakeholderApproval = {
    approver: input.approver,
    approved: input.approved,
    approval_type: input.approval_type ?? 'verbal',
    reference: input.reference ?? null,
    notes: input.notes ?? null,
    round,
    recorded_at: ctx.now,
  };

  return commitFacts(
    BUSINESS_CASE_TRACK,
    state,
    { ...state.metadata, approvals: [...state.metadata.approvals, approval] },
    ctx
  );
}
