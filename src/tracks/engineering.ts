/**
 * Engineering track: components, ADRs, estimate, risks, dependencies and
 * technical decisions.
 *
 * The track completes once it has at least one component, no ADR is still
 * `proposed`, an estimate is recorded and every high-impact risk carries a
 * mitigation.
 *
 * @packageDocumentation
 */

import type {
  Adr,
  AdrStatus,
  Dependency,
  DependencyStatus,
  EngineeringFacts,
  EngineeringStatus,
  EngineeringTrackState,
  EstimateSize,
  Level,
  RiskStatus,
  TechnicalRisk,
} from '../feature/types.js';
import { TrackOperationError } from './errors.js';
import {
  activityStatus,
  commitFacts,
  requireStarted,
  type TrackContext,
  type TrackDefinition,
} from './machine.js';

export function isRiskMitigated(risk: TechnicalRisk): boolean {
  return risk.mitigation !== null && risk.mitigation.trim() !== '';
}

/**
 * High-impact risks without a mitigation.
 *
 * @param facts - Engineering facts.
 * @returns The offending risks.
 */
export function unmitigatedHighRisks(facts: EngineeringFacts): TechnicalRisk[] {
  return facts.risks.filter((risk) => risk.impact === 'high' && !isRiskMitigated(risk));
}

/**
 * Blocking dependencies that are not resolved.
 *
 * @param facts - Engineering facts.
 * @returns The offending dependencies.
 */
export function unresolvedBlockingDependencies(facts: EngineeringFacts): Dependency[] {
  return facts.dependencies.filter((dep) => dep.blocking && dep.status !== 'resolved');
}

export function proposedAdrs(facts: EngineeringFacts): Adr[] {
  return facts.adrs.filter((adr) => adr.status === 'proposed');
}

function deriveEngineeringStatus(facts: EngineeringFacts): EngineeringStatus {
  const common = activityStatus(facts);
  if (common !== undefined) {
    return common;
  }
  if (
    facts.components.length > 0 &&
    proposedAdrs(facts).length === 0 &&
    facts.estimate !== null &&
    unmitigatedHighRisks(facts).length === 0
  ) {
    return 'complete';
  }
  if (facts.estimate_requested && facts.estimate === null) {
    return 'estimation_pending';
  }
  return 'in_progress';
}

/**
 * Engineering track definition. `not_started -> complete` is not an edge.
 */
export const ENGINEERING_TRACK: TrackDefinition<EngineeringStatus, EngineeringFacts> = {
  name: 'engineering',
  transitions: new Map<EngineeringStatus, readonly EngineeringStatus[]>([
    ['not_started', ['in_progress']],
    ['in_progress', ['estimation_pending', 'complete', 'blocked']],
    ['estimation_pending', ['in_progress', 'complete', 'blocked']],
    ['complete', ['blocked']],
    ['blocked', ['in_progress', 'estimation_pending', 'complete']],
  ]),
  derive: deriveEngineeringStatus,
};

function commit(
  state: EngineeringTrackState,
  facts: EngineeringFacts,
  ctx: TrackContext,
  version?: number
): EngineeringTrackState {
  return commitFacts(ENGINEERING_TRACK, state, facts, ctx, version ?? state.version);
}

function notFound(message: string): TrackOperationError {
  return new TrackOperationError('NOT_FOUND', 'engineering', message);
}

function duplicate(message: string): TrackOperationError {
  return new TrackOperationError('MALFORMED_PAYLOAD', 'engineering', message);
}

/**
 * Identifies a component the feature touches.
 *
 * @param state - Engineering track state.
 * @param input - Component name and optional description.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function addComponent(
  state: EngineeringTrackState,
  input: { name: string; description?: string | null | undefined },
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  const key = input.name.toLowerCase();
  if (state.metadata.components.some((component) => component.name.toLowerCase() === key)) {
    throw duplicate(`Component '${input.name}' already exists`);
  }
  return commit(
    state,
    {
      ...state.metadata,
      components: [
        ...state.metadata.components,
        {
          name: input.name,
          description: input.description ?? null,
          added_by: ctx.actor,
          added_at: ctx.now,
        },
      ],
    },
    ctx
  );
}

export interface AdrInput {
  title: string;
  context?: string | undefined;
  decision?: string | undefined;
  consequences?: string | undefined;
  status?: AdrStatus | undefined;
  /** Number of an ADR this one replaces; that ADR becomes `superseded`. */
  supersedes?: number | null | undefined;
}

/**
 * Creates an ADR with the next sequential number.
 *
 * @param state - Engineering track state.
 * @param input - ADR content; status defaults to `proposed`.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 * @throws TrackOperationError when the superseded ADR does not exist.
 */
export function createAdr(
  state: EngineeringTrackState,
  input: AdrInput,
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  const number = state.metadata.adrs.length + 1;
  const supersedes = input.supersedes ?? null;

  let adrs = state.metadata.adrs;
  if (supersedes !== null) {
    if (!adrs.some((adr) => adr.number === supersedes)) {
      throw notFound(`ADR ${String(supersedes)} not found`);
    }
    adrs = adrs.map((adr) =>
      adr.number === supersedes
        ? { ...adr, status: 'superseded', superseded_by: number, updated_at: ctx.now }
        : adr
    );
  }

  const adr: Adr = {
    number,
    title: input.title,
    status: input.status ?? 'proposed',
    context: input.context ?? '',
    decision: input.decision ?? '',
    consequences: input.consequences ?? '',
    author: ctx.actor,
    created_at: ctx.now,
    updated_at: ctx.now,
    superseded_by: null,
  };

  return commit(state, { ...state.metadata, adrs: [...adrs, adr] }, ctx);
}

/**
 * Changes the status of an ADR.
 *
 * @param state - Engineering track state.
 * @param number - ADR number.
 * @param status - New status.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function updateAdrStatus(
  state: EngineeringTrackState,
  number: number,
  status: AdrStatus,
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  if (!state.metadata.adrs.some((adr) => adr.number === number)) {
    throw notFound(`ADR ${String(number)} not found`);
  }
  return commit(
    state,
    {
      ...state.metadata,
      adrs: state.metadata.adrs.map((adr) =>
        adr.number === number ? { ...adr, status, updated_at: ctx.now } : adr
      ),
    },
    ctx
  );
}

/**
 * Marks that an estimate has been asked for.
 *
 * @param state - Engineering track state.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function requestEstimate(
  state: EngineeringTrackState,
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  return commit(state, { ...state.metadata, estimate_requested: true }, ctx);
}

export interface EstimateInput {
  overall: EstimateSize;
  confidence?: Level | undefined;
  breakdown?: Record<string, EstimateSize> | undefined;
  assumptions?: string[] | undefined;
}

/**
 * Records or revises the estimate. Each call is a new revision.
 *
 * @param state - Engineering track state.
 * @param input - T-shirt size estimate.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function recordEstimate(
  state: EngineeringTrackState,
  input: EstimateInput,
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  return commit(
    state,
    {
      ...state.metadata,
      estimate: {
        overall: input.overall,
        confidence: input.confidence ?? 'medium',
        breakdown: input.breakdown ?? {},
        assumptions: input.assumptions ?? [],
        estimated_by: ctx.actor,
        estimated_at: ctx.now,
      },
    },
    ctx,
    state.version + 1
  );
}

export interface RiskInput {
  risk: string;
  impact?: Level | undefined;
  likelihood?: Level | undefined;
  mitigation?: string | null | undefined;
  owner?: string | null | undefined;
}

/**
 * Records a technical risk with the next sequential id.
 *
 * @param state - Engineering track state.
 * @param input - Risk details; impact and likelihood default to `medium`.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function addRisk(
  state: EngineeringTrackState,
  input: RiskInput,
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  const mitigation = input.mitigation ?? null;
  const risk: TechnicalRisk = {
    id: state.metadata.risks.length + 1,
    risk: input.risk,
    impact: input.impact ?? 'medium',
    likelihood: input.likelihood ?? 'medium',
    mitigation,
    owner: input.owner ?? null,
    status: mitigation !== null && mitigation.trim() !== '' ? 'mitigating' : 'identified',
  };
  return commit(state, { ...state.metadata, risks: [...state.metadata.risks, risk] }, ctx);
}

/**
 * Sets the mitigation of a risk.
 *
 * @param state - Engineering track state.
 * @param input - Risk id, mitigation and optional new status.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function mitigateRisk(
  state: EngineeringTrackState,
  input: { id: number; mitigation: string; status?: RiskStatus | undefined },
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  if (!state.metadata.risks.some((risk) => risk.id === input.id)) {
    throw notFound(`Risk ${String(input.id)} not found`);
  }
  return commit(
    state,
    {
      ...state.metadata,
      risks: state.metadata.risks.map((risk) =>
        risk.id === input.id
          ? { ...risk, mitigation: input.mitigation, status: input.status ?? 'mitigating' }
          : risk
      ),
    },
    ctx
  );
}

export interface DependencyInput {
  name: string;
  type?: string | undefined;
  description?: string | undefined;
  blocking?: boolean | undefined;
  status?: DependencyStatus | undefined;
  owner?: string | null | undefined;
  eta?: string | null | undefined;
}

/**
 * Records a dependency on another team, system or vendor.
 *
 * @param state - Engineering track state.
 * @param input - Dependency details; not blocking and `pending` by default.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function addDependency(
  state: EngineeringTrackState,
  input: DependencyInput,
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  if (state.metadata.dependencies.some((dep) => dep.name === input.name)) {
    throw duplicate(`Dependency '${input.name}' already exists`);
  }
  const dependency: Dependency = {
    name: input.name,
    type: input.type ?? 'internal',
    description: input.description ?? '',
    blocking: input.blocking ?? false,
    status: input.status ?? 'pending',
    owner: input.owner ?? null,
    eta: input.eta ?? null,
  };
  return commit(
    state,
    { ...state.metadata, dependencies: [...state.metadata.dependencies, dependency] },
    ctx
  );
}

/**
 * Updates the status of a dependency.
 *
 * @param state - Engineering track state.
 * @param input - Dependency name, new status and optional ETA.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function updateDependency(
  state: EngineeringTrackState,
  input: { name: string; status: DependencyStatus; eta?: string | null | undefined },
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  if (!state.metadata.dependencies.some((dep) => dep.name === input.name)) {
    throw notFound(`Dependency '${input.name}' not found`);
  }
  return commit(
    state,
    {
      ...state.metadata,
      dependencies: state.metadata.dependencies.map((dep) =>
        dep.name === input.name
          ? { ...dep, status: input.status, eta: input.eta === undefined ? dep.eta : input.eta }
          : dep
      ),
    },
    ctx
  );
}

export interface TechnicalDecisionInput {
  decision: string;
  rationale: string;
  category?: string | undefined;
  related_adr?: number | null | undefined;
}

/**
 * Records a technical decision that does not warrant an ADR.
 *
 * @param state - Engineering track state.
 * @param input - Decision and rationale.
 * @param ctx - Actor, time and policy.
 * @returns Updated track state.
 */
export function recordTechnicalDecision(
  state: EngineeringTrackState,
  input: TechnicalDecisionInput,
  ctx: TrackContext
): EngineeringTrackState {
  requireStarted(ENGINEERING_TRACK, state);
  const relatedAdr = input.related_adr ?? null;
  if (relatedAdr !== null && !state.metadata.adrs.some((adr) => adr.number === relatedAdr)) {
    throw notFound(`ADR ${String(relatedAdr)} not found`);
  }
  return commit(
    state,
    {
      ...state.metadata,
      technical_decisions: [
        ...state.metadata.technical_decisions,
        {
          decision: input.decision,
          rationale: input.rationale,
          category: input.category ?? 'general',
          related_adr: relatedAdr,
          decided_by: ctx.actor,
          decided_at: ctx.now,
        },
      ],
    },
    ctx
  );
}
