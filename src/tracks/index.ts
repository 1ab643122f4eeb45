/**
 * Track state machines and the action dispatcher used by the engine.
 *
 * @packageDocumentation
 */

import type { GateConfig } from '../config/types.js';
import {
  ADR_STATUSES,
  APPROVAL_TYPES,
  DEPENDENCY_STATUSES,
  ESTIMATE_SIZES,
  LEVELS,
  RISK_STATUSES,
  type BusinessCaseTrackState,
  type ContextTrackState,
  type DesignTrackState,
  type EngineeringTrackState,
  type EstimateSize,
  type FeatureRecord,
  type TrackName,
} from '../feature/types.js';
import { getLogger } from '../utils/logger.js';
import {
  BUSINESS_CASE_TRACK,
  recordApproval,
  submitForApproval,
  updateAssumptions,
} from './business-case.js';
import { CONTEXT_TRACK, recordContextChallenge, submitContextVersion } from './context.js';
import {
  DESIGN_TRACK,
  attachFigma,
  attachWireframes,
  recordDesignSpec,
  type DesignUpdate,
} from './design.js';
import {
  ENGINEERING_TRACK,
  addComponent,
  addDependency,
  addRisk,
  createAdr,
  mitigateRisk,
  recordEstimate,
  recordTechnicalDecision,
  requestEstimate,
  updateAdrStatus,
  updateDependency,
} from './engineering.js';
import { TrackOperationError } from './errors.js';
import { blockTrack, startTrack, unblockTrack, type TrackContext } from './machine.js';
import {
  optionalBoolean,
  optionalNumber,
  optionalObject,
  optionalString,
  optionalStringList,
  readPayload,
  requireBoolean,
  requireNumber,
  requireOneOf,
  requireString,
  type PayloadReader,
} from './payload.js';

export * from './business-case.js';
export * from './context.js';
export * from './design.js';
export * from './engineering.js';
export * from './errors.js';
export * from './machine.js';
export { readPayload } from './payload.js';
export type { PayloadReader } from './payload.js';

const logger = getLogger('TrackDispatcher');

/**
 * Actions accepted by each track.
 */
export const TRACK_ACTIONS = {
  context: ['start', 'block', 'unblock', 'submit_version', 'record_challenge'],
  design: ['start', 'block', 'unblock', 'record_spec', 'attach_wireframes', 'attach_figma'],
  business_case: [
    'start',
    'block',
    'unblock',
    'update_assumptions',
    'submit_for_approval',
    'record_approval',
  ],
  engineering: [
    'start',
    'block',
    'unblock',
    'add_component',
    'create_adr',
    'update_adr_status',
    'request_estimate',
    'record_estimate',
    'add_risk',
    'mitigate_risk',
    'add_dependency',
    'update_dependency',
    'record_technical_decision',
  ],
} as const satisfies Record<TrackName, readonly string[]>;

export type TrackAction<T extends TrackName> = (typeof TRACK_ACTIONS)[T][number];

/**
 * Checks whether a track accepts an action.
 *
 * @param track - Track name.
 * @param action - Action name.
 * @returns True if the action is known for the track.
 */
export function isTrackAction<T extends TrackName>(
  track: T,
  action: string
): action is TrackAction<T> {
  const allowed: readonly string[] = TRACK_ACTIONS[track];
  return allowed.includes(action);
}

/**
 * Who performs a track action and the policy in force.
 */
export interface TrackActionContext {
  actor: string;
  now: string;
  gates: GateConfig;
}

function applyContextAction(
  state: ContextTrackState,
  action: TrackAction<'context'>,
  reader: PayloadReader,
  ctx: TrackContext
): ContextTrackState {
  switch (action) {
    case 'start':
      return startTrack(CONTEXT_TRACK, state, ctx);
    case 'block':
      return blockTrack(CONTEXT_TRACK, state, requireString(reader, 'reason'), ctx);
    case 'unblock':
      return unblockTrack(CONTEXT_TRACK, state, ctx);
    case 'submit_version':
      return submitContextVersion(
        state,
        {
          version: requireNumber(reader, 'version'),
          score: optionalNumber(reader, 'score'),
          document: optionalString(reader, 'document'),
        },
        ctx
      );
    case 'record_challenge':
      return recordContextChallenge(state, requireNumber(reader, 'score'), ctx);
  }
}

function applyDesignAction(
  state: DesignTrackState,
  action: TrackAction<'design'>,
  reader: PayloadReader,
  ctx: TrackContext
): DesignUpdate {
  switch (action) {
    case 'start':
      return { track: startTrack(DESIGN_TRACK, state, ctx), artifacts: ctx.artifacts };
    case 'block':
      return {
        track: blockTrack(DESIGN_TRACK, state, requireString(reader, 'reason'), ctx),
        artifacts: ctx.artifacts,
      };
    case 'unblock':
      return { track: unblockTrack(DESIGN_TRACK, state, ctx), artifacts: ctx.artifacts };
    case 'record_spec':
      return {
        track: recordDesignSpec(state, requireString(reader, 'ref'), ctx),
        artifacts: ctx.artifacts,
      };
    case 'attach_wireframes':
      return attachWireframes(state, requireString(reader, 'ref'), ctx);
    case 'attach_figma':
      return attachFigma(state, requireString(reader, 'ref'), ctx);
  }
}

function applyBusinessCaseAction(
  state: BusinessCaseTrackState,
  action: TrackAction<'business_case'>,
  reader: PayloadReader,
  ctx: TrackContext
): BusinessCaseTrackState {
  switch (action) {
    case 'start':
      return startTrack(BUSINESS_CASE_TRACK, state, ctx);
    case 'block':
      return blockTrack(BUSINESS_CASE_TRACK, state, requireString(reader, 'reason'), ctx);
    case 'unblock':
      return unblockTrack(BUSINESS_CASE_TRACK, state, ctx);
    case 'update_assumptions':
      return updateAssumptions(
        state,
        {
          baseline_metrics: optionalObject(reader, 'baseline_metrics'),
          impact_assumptions: optionalObject(reader, 'impact_assumptions'),
          investment_estimate: optionalString(reader, 'investment_estimate'),
        },
        ctx
      );
    case 'submit_for_approval':
      return submitForApproval(state, ctx);
    case 'record_approval':
      return recordApproval(
        state,
        {
          approver: requireString(reader, 'approver'),
          approved: requireBoolean(reader, 'approved'),
          approval_type: requireOneOf(reader, 'approval_type', APPROVAL_TYPES, 'verbal'),
          reference: optionalString(reader, 'reference'),
          notes: optionalString(reader, 'notes'),
        },
        ctx
      );
  }
}

function readBreakdown(reader: PayloadReader): Record<string, EstimateSize> {
  const raw = optionalObject(reader, 'breakdown') ?? {};
  const breakdown: Record<string, EstimateSize> = {};
  for (const [key, value] of Object.entries(raw)) {
    const size = ESTIMATE_SIZES.find((candidate) => candidate === value);
    if (size === undefined) {
      throw new TrackOperationError(
        'MALFORMED_PAYLOAD',
        reader.track,
        `Field 'breakdown.${key}' must be one of ${ESTIMATE_SIZES.join(', ')}`
      );
    }
    breakdown[key] = size;
  }
  return breakdown;
}

function applyEngineeringAction(
  state: EngineeringTrackState,
  action: TrackAction<'engineering'>,
  reader: PayloadReader,
  ctx: TrackContext
): EngineeringTrackState {
  switch (action) {
    case 'start':
      return startTrack(ENGINEERING_TRACK, state, ctx);
    case 'block':
      return blockTrack(ENGINEERING_TRACK, state, requireString(reader, 'reason'), ctx);
    case 'unblock':
      return unblockTrack(ENGINEERING_TRACK, state, ctx);
    case 'add_component':
      return addComponent(
        state,
        { name: requireString(reader, 'name'), description: optionalString(reader, 'description') },
        ctx
      );
    case 'create_adr':
      return createAdr(
        state,
        {
          title: requireString(reader, 'title'),
          context: optionalString(reader, 'context') ?? undefined,
          decision: optionalString(reader, 'decision') ?? undefined,
          consequences: optionalString(reader, 'consequences') ?? undefined,
          status: requireOneOf(reader, 'status', ADR_STATUSES, 'proposed'),
          supersedes: optionalNumber(reader, 'supersedes'),
        },
        ctx
      );
    case 'update_adr_status':
      return updateAdrStatus(
        state,
        requireNumber(reader, 'number'),
        requireOneOf(reader, 'status', ADR_STATUSES),
        ctx
      );
    case 'request_estimate':
      return requestEstimate(state, ctx);
    case 'record_estimate':
      return recordEstimate(
        state,
        {
          overall: requireOneOf(reader, 'overall', ESTIMATE_SIZES),
          confidence: requireOneOf(reader, 'confidence', LEVELS, 'medium'),
          breakdown: readBreakdown(reader),
          assumptions: optionalStringList(reader, 'assumptions'),
        },
        ctx
      );
    case 'add_risk':
      return addRisk(
        state,
        {
          risk: requireString(reader, 'risk'),
          impact: requireOneOf(reader, 'impact', LEVELS, 'medium'),
          likelihood: requireOneOf(reader, 'likelihood', LEVELS, 'medium'),
          mitigation: optionalString(reader, 'mitigation'),
          owner: optionalString(reader, 'owner'),
        },
        ctx
      );
    case 'mitigate_risk':
      return mitigateRisk(
        state,
        {
          id: requireNumber(reader, 'id'),
          mitigation: requireString(reader, 'mitigation'),
          status: requireOneOf(reader, 'status', RISK_STATUSES, 'mitigating'),
        },
        ctx
      );
    case 'add_dependency':
      return addDependency(
        state,
        {
          name: requireString(reader, 'name'),
          type: optionalString(reader, 'type') ?? undefined,
          description: optionalString(reader, 'description') ?? undefined,
          blocking: optionalBoolean(reader, 'blocking', false),
          status: requireOneOf(reader, 'status', DEPENDENCY_STATUSES, 'pending'),
          owner: optionalString(reader, 'owner'),
          eta: optionalString(reader, 'eta'),
        },
        ctx
      );
    case 'update_dependency':
      return updateDependency(
        state,
        {
          name: requireString(reader, 'name'),
          status: requireOneOf(reader, 'status', DEPENDENCY_STATUSES),
          eta: reader.fields['eta'] === undefined ? undefined : optionalString(reader, 'eta'),
        },
        ctx
      );
    case 'record_technical_decision':
      return recordTechnicalDecision(
        state,
        {
          decision: requireString(reader, 'decision'),
          rationale: requireString(reader, 'rationale'),
          category: optionalString(reader, 'category') ?? undefined,
          related_adr: optionalNumber(reader, 'related_adr'),
        },
        ctx
      );
  }
}

function unknownAction(track: TrackName, action: string): TrackOperationError {
  const allowed: readonly string[] = TRACK_ACTIONS[track];
  return new TrackOperationError(
    'UNKNOWN_ACTION',
    track,
    `Unknown ${track} action '${action}'. Valid actions: ${allowed.join(', ')}`
  );
}

function dispatch(
  record: FeatureRecord,
  track: TrackName,
  action: string,
  reader: PayloadReader,
  ctx: TrackContext
): FeatureRecord {
  const { tracks } = record;
  switch (track) {
    case 'context':
      if (!isTrackAction('context', action)) {
        throw unknownAction(track, action);
      }
      return {
        ...record,
        tracks: { ...tracks, context: applyContextAction(tracks.context, action, reader, ctx) },
      };
    case 'design': {
      if (!isTrackAction('design', action)) {
        throw unknownAction(track, action);
      }
      const result = applyDesignAction(tracks.design, action, reader, ctx);
      return {
        ...record,
        tracks: { ...tracks, design: result.track },
        artifacts: result.artifacts,
      };
    }
    case 'business_case':
      if (!isTrackAction('business_case', action)) {
        throw unknownAction(track, action);
      }
      return {
        ...record,
        tracks: {
          ...tracks,
          business_case: applyBusinessCaseAction(tracks.business_case, action, reader, ctx),
        },
      };
    case 'engineering':
      if (!isTrackAction('engineering', action)) {
        throw unknownAction(track, action);
      }
      return {
        ...record,
        tracks: {
          ...tracks,
          engineering: applyEngineeringAction(tracks.engineering, action, reader, ctx),
        },
      };
  }
}

/**
 * Applies one action to one track of a record.
 *
 * The payload is validated here. Design actions may also change the record's
 * artifacts.
 *
 * @param record - The feature.
 * @param track - Target track.
 * @param action - Action name from {@link TRACK_ACTIONS}.
 * @param payload - Untrusted action payload.
 * @param context - Actor, time and the product's gate policy.
 * @returns The updated record.
 * @throws TrackOperationError when the action is unknown, the payload is
 *   malformed, or the track rejects the operation.
 */
export function applyTrackAction(
  record: FeatureRecord,
  track: TrackName,
  action: string,
  payload: unknown,
  context: TrackActionContext
): FeatureRecord {
  const reader = readPayload(track, payload);
  const ctx: TrackContext = { ...context, artifacts: record.artifacts };
  const updated = dispatch(record, track, action, reader, ctx);

  logger.debug('track_action_applied', {
    slug: record.slug,
    track,
    action,
    status: updated.tracks[track].status,
  });
  return updated;
}
