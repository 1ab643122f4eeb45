/**
 * Record builders shared by the test suites.
 *
 * @packageDocumentation
 */

import { DEFAULT_GATES } from '../config/defaults.js';
import type { GateConfig } from '../config/types.js';
import { createFeatureRecord, type NewFeatureInput } from '../feature/record.js';
import type { FeatureRecord, Phase, TrackName } from '../feature/types.js';
import { FORWARD_TRANSITIONS, advancePhase } from '../lifecycle/phases.js';
import { applyTrackAction } from '../tracks/index.js';

export const TEST_NOW = '2026-01-05T09:00:00.000Z';

export const APPROVERS = ['Dave Manager', 'Jack Approver'];

/** Default gates with two required business case approvers. */
export const APPROVER_GATES: GateConfig = { ...DEFAULT_GATES, required_bc_approvers: APPROVERS };

export function newFeature(overrides: Partial<NewFeatureInput> = {}): FeatureRecord {
  return createFeatureRecord({
    title: 'OTP Checkout Recovery',
    productId: 'meal-kit',
    organization: 'growth-division',
    priority: 'P2',
    createdBy: 'alice',
    createdAt: TEST_NOW,
    ...overrides,
  });
}

/**
 * Walks the forward chain until `target` is the current phase.
 */
export function moveTo(record: FeatureRecord, target: Phase): FeatureRecord {
  let current = record;
  while (current.current_phase !== target) {
    const next = FORWARD_TRANSITIONS.get(current.current_phase);
    if (next === undefined) {
      throw new Error(`Cannot reach '${target}' from '${record.current_phase}'`);
    }
    current = advancePhase(current, next, TEST_NOW);
  }
  return current;
}

export function act(
  record: FeatureRecord,
  track: TrackName,
  action: string,
  payload: unknown = {},
  gates: GateConfig = APPROVER_GATES
): FeatureRecord {
  return applyTrackAction(record, track, action, payload, { actor: 'alice', now: TEST_NOW, gates });
}

export interface ReadyFeatureOptions {
  gates?: GateConfig;
  /** Record the engineering estimate; true by default. */
  estimate?: boolean;
}

/**
 * A feature in `parallel_tracks` whose gates all pass, unless the estimate is
 * left out.
 */
export function readyFeature(options: ReadyFeatureOptions = {}): FeatureRecord {
  const gates = options.gates ?? APPROVER_GATES;
  let record = moveTo(newFeature(), 'parallel_tracks');

  record = act(record, 'context', 'start', {}, gates);
  record = act(record, 'context', 'submit_version', { version: 1, score: 50 }, gates);
  record = act(record, 'context', 'submit_version', { version: 2, score: 72 }, gates);
  record = act(record, 'context', 'submit_version', { version: 3, score: 90 }, gates);

  record = act(record, 'design', 'start', {}, gates);
  record = act(record, 'design', 'record_spec', { ref: 'docs/design.md' }, gates);
  record = act(record, 'design', 'attach_figma', { ref: 'https://figma.example/otp' }, gates);

  record = act(record, 'business_case', 'start', {}, gates);
  record = act(
    record,
    'business_case',
    'update_assumptions',
    { investment_estimate: '2 sprints' },
    gates
  );
  record = act(record, 'business_case', 'submit_for_approval', {}, gates);
  const approvers =
    gates.required_bc_approvers.length > 0 ? gates.required_bc_approvers : ['Sponsor'];
  for (const approver of approvers) {
    record = act(record, 'business_case', 'record_approval', { approver, approved: true }, gates);
  }

  record = act(record, 'engineering', 'start', {}, gates);
  record = act(record, 'engineering', 'add_component', { name: 'checkout-api' }, gates);
  if (options.estimate ?? true) {
    record = act(record, 'engineering', 'record_estimate', { overall: 'M' }, gates);
  }
  return record;
}
