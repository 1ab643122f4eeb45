import { describe, it, expect } from 'vitest';
import { DEFAULT_GATES } from '../config/defaults.js';
import { createFeatureRecord } from '../feature/record.js';
import type { FeatureRecord } from '../feature/types.js';
import { TrackOperationError } from './errors.js';
import { applyTrackAction, isTrackAction, type TrackActionContext } from './index.js';

const ctx: TrackActionContext = {
  actor: 'alice',
  now: '2026-01-11T10:00:00.000Z',
  gates: DEFAULT_GATES,
};

function newRecord(): FeatureRecord {
  return createFeatureRecord({
    title: 'OTP Checkout Recovery',
    productId: 'meal-kit',
    organization: 'default',
    priority: 'P2',
    createdBy: 'alice',
    createdAt: '2026-01-05T09:00:00.000Z',
  });
}

function trackError(fn: () => unknown): TrackOperationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TrackOperationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a TrackOperationError');
}

describe('isTrackAction', () => {
  it('knows the actions of each track', () => {
    expect(isTrackAction('context', 'submit_version')).toBe(true);
    expect(isTrackAction('design', 'submit_version')).toBe(false);
    expect(isTrackAction('engineering', 'record_technical_decision')).toBe(true);
  });
});

describe('applyTrackAction', () => {
  it('applies context actions from JSON payloads', () => {
    let record = applyTrackAction(newRecord(), 'context', 'start', undefined, ctx);
    record = applyTrackAction(record, 'context', 'submit_version', { version: 1, score: 40 }, ctx);

    expect(record.tracks.context.status).toBe('in_progress');
    expect(record.tracks.context.version).toBe(1);
  });

  it('writes design references into the artifacts map', () => {
    let record = applyTrackAction(newRecord(), 'design', 'start', {}, ctx);
    record = applyTrackAction(record, 'design', 'record_spec', { ref: 'docs/design.md' }, ctx);
    record = applyTrackAction(
      record,
      'design',
      'attach_figma',
      { ref: 'https://figma.example/file' },
      ctx
    );

    expect(record.artifacts).toEqual({ figma: 'https://figma.example/file' });
    expect(record.tracks.design.status).toBe('complete');
  });

  it('drives the engineering track to completion', () => {
    let record = applyTrackAction(newRecord(), 'engineering', 'start', null, ctx);
    record = applyTrackAction(record, 'engineering', 'add_component', { name: 'api' }, ctx);
    record = applyTrackAction(
      record,
      'engineering',
      'record_estimate',
      { overall: 'L', confidence: 'high', assumptions: ['No new vendor'] },
      ctx
    );

    expect(record.tracks.engineering.status).toBe('complete');
    expect(record.tracks.engineering.metadata.estimate?.confidence).toBe('high');
  });

  it('leaves the input record untouched', () => {
    const record = newRecord();
    applyTrackAction(record, 'business_case', 'start', undefined, ctx);
    expect(record.tracks.business_case.status).toBe('not_started');
  });

  it('rejects unknown actions', () => {
    const error = trackError(() => applyTrackAction(newRecord(), 'context', 'approve', {}, ctx));
    expect(error.code).toBe('UNKNOWN_ACTION');
    expect(error.message).toBe(
      "Unknown context action 'approve'. Valid actions: start, block, unblock, submit_version, record_challenge"
    );
  });

  it('rejects payloads that are not objects', () => {
    const error = trackError(() => applyTrackAction(newRecord(), 'context', 'start', [1], ctx));
    expect(error.code).toBe('MALFORMED_PAYLOAD');
    expect(error.message).toBe('Payload must be an object, got array');
  });

  it('rejects fields of the wrong type', () => {
    const record = applyTrackAction(newRecord(), 'context', 'start', undefined, ctx);
    const error = trackError(() =>
      applyTrackAction(record, 'context', 'submit_version', { version: '2' }, ctx)
    );
    expect(error.message).toBe("Field 'version' must be a number, got string");
  });

  it('rejects values outside a closed set', () => {
    let record = applyTrackAction(newRecord(), 'business_case', 'start', undefined, ctx);
    record = applyTrackAction(record, 'business_case', 'submit_for_approval', undefined, ctx);
    const submitted = record;

    const error = trackError(() =>
      applyTrackAction(
        submitted,
        'business_case',
        'record_approval',
        { approver: 'Dave Manager', approved: true, approval_type: 'fax' },
        ctx
      )
    );
    expect(error.message).toBe(
      "Field 'approval_type' must be one of verbal, written, email, slack, meeting, got 'fax'"
    );
  });

  it('validates estimate breakdown sizes', () => {
    const record = applyTrackAction(newRecord(), 'engineering', 'start', undefined, ctx);
    const error = trackError(() =>
      applyTrackAction(
        record,
        'engineering',
        'record_estimate',
        { overall: 'M', breakdown: { api: 'XXL' } },
        ctx
      )
    );
    expect(error.message).toBe("Field 'breakdown.api' must be one of S, M, L, XL");
  });

  it('requires a reason to block', () => {
    const record = applyTrackAction(newRecord(), 'design', 'start', undefined, ctx);
    const error = trackError(() => applyTrackAction(record, 'design', 'block', {}, ctx));
    expect(error.message).toBe("Field 'reason' must be a non-empty string, got undefined");
  });
});
