import { describe, it, expect } from 'vitest';
import { DEFAULT_GATES } from '../config/defaults.js';
import { createEmptyTracks } from '../feature/record.js';
import type { EngineeringTrackState } from '../feature/types.js';
import {
  ENGINEERING_TRACK,
  addComponent,
  addDependency,
  addRisk,
  createAdr,
  mitigateRisk,
  proposedAdrs,
  recordEstimate,
  recordTechnicalDecision,
  requestEstimate,
  unmitigatedHighRisks,
  unresolvedBlockingDependencies,
  updateAdrStatus,
  updateDependency,
} from './engineering.js';
import { TrackOperationError } from './errors.js';
import { startTrack, type TrackContext } from './machine.js';

const ctx: TrackContext = {
  actor: 'erin',
  now: '2026-01-10T10:00:00.000Z',
  gates: DEFAULT_GATES,
  artifacts: {},
};

function started(): EngineeringTrackState {
  return startTrack(ENGINEERING_TRACK, createEmptyTracks().engineering, ctx);
}

function errorCode(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof TrackOperationError) {
      return error.code;
    }
    throw error;
  }
  return 'none';
}

describe('engineering track status', () => {
  it('waits for a requested estimate, then completes', () => {
    let track = addComponent(started(), { name: 'checkout-api' }, ctx);
    expect(track.status).toBe('in_progress');

    track = requestEstimate(track, ctx);
    expect(track.status).toBe('estimation_pending');

    track = recordEstimate(track, { overall: 'M', breakdown: { backend: 'S' } }, ctx);
    expect(track.status).toBe('complete');
    expect(track.version).toBe(1);
    expect(track.metadata.estimate).toEqual({
      overall: 'M',
      confidence: 'medium',
      breakdown: { backend: 'S' },
      assumptions: [],
      estimated_by: 'erin',
      estimated_at: ctx.now,
    });
  });

  it('does not complete while an ADR is proposed', () => {
    let track = createAdr(started(), { title: 'Use SMS provider' }, ctx);
    track = addComponent(track, { name: 'checkout-api' }, ctx);
    track = recordEstimate(track, { overall: 'L' }, ctx);
    expect(track.status).toBe('in_progress');
    expect(proposedAdrs(track.metadata).map((adr) => adr.number)).toEqual([1]);

    track = updateAdrStatus(track, 1, 'accepted', ctx);
    expect(track.status).toBe('complete');
  });

  it('does not complete while a high-impact risk lacks a mitigation', () => {
    let track = addRisk(started(), { risk: 'SMS delivery delays', impact: 'high' }, ctx);
    track = addComponent(track, { name: 'checkout-api' }, ctx);
    track = recordEstimate(track, { overall: 'S' }, ctx);
    expect(track.status).toBe('in_progress');
    expect(unmitigatedHighRisks(track.metadata)).toHaveLength(1);

    track = mitigateRisk(track, { id: 1, mitigation: 'Fallback to email' }, ctx);
    expect(track.status).toBe('complete');
    expect(track.metadata.risks[0]?.status).toBe('mitigating');
  });

  it('keeps complete final for new proposed ADRs', () => {
    let track = addComponent(started(), { name: 'checkout-api' }, ctx);
    track = recordEstimate(track, { overall: 'S' }, ctx);
    const complete = track;

    expect(errorCode(() => createAdr(complete, { title: 'Late change' }, ctx))).toBe(
      'INVALID_TRACK_TRANSITION'
    );
  });
});

describe('engineering facts', () => {
  it('supersedes an earlier ADR', () => {
    let track = createAdr(started(), { title: 'Poll for status', status: 'accepted' }, ctx);
    track = createAdr(track, { title: 'Use webhooks', supersedes: 1 }, ctx);

    const [first, second] = track.metadata.adrs;
    expect(first?.status).toBe('superseded');
    expect(first?.superseded_by).toBe(2);
    expect(second?.number).toBe(2);
    expect(second?.status).toBe('proposed');
  });

  it('marks a risk recorded with a mitigation as mitigating', () => {
    const track = addRisk(
      started(),
      { risk: 'Vendor lock-in', impact: 'high', mitigation: 'Adapter layer' },
      ctx
    );
    expect(track.metadata.risks[0]).toEqual({
      id: 1,
      risk: 'Vendor lock-in',
      impact: 'high',
      likelihood: 'medium',
      mitigation: 'Adapter layer',
      owner: null,
      status: 'mitigating',
    });
    expect(unmitigatedHighRisks(track.metadata)).toEqual([]);
  });

  it('tracks blocking dependencies until resolved', () => {
    let track = addDependency(
      started(),
      { name: 'payments-team', blocking: true, eta: '2026-02-01' },
      ctx
    );
    expect(unresolvedBlockingDependencies(track.metadata)).toHaveLength(1);

    track = updateDependency(track, { name: 'payments-team', status: 'resolved' }, ctx);
    expect(unresolvedBlockingDependencies(track.metadata)).toEqual([]);
    expect(track.metadata.dependencies[0]?.eta).toBe('2026-02-01');
  });

  it('records technical decisions with defaults', () => {
    let track = createAdr(started(), { title: 'Use webhooks' }, ctx);
    track = recordTechnicalDecision(
      track,
      { decision: 'Retry three times', rationale: 'Provider SLA', related_adr: 1 },
      ctx
    );
    expect(track.metadata.technical_decisions).toEqual([
      {
        decision: 'Retry three times',
        rationale: 'Provider SLA',
        category: 'general',
        related_adr: 1,
        decided_by: 'erin',
        decided_at: ctx.now,
      },
    ]);
  });

  it('rejects duplicate components regardless of case', () => {
    const track = addComponent(started(), { name: 'Checkout' }, ctx);
    expect(errorCode(() => addComponent(track, { name: 'checkout' }, ctx))).toBe(
      'MALFORMED_PAYLOAD'
    );
  });

  it('reports missing ADRs, risks and dependencies', () => {
    const track = started();
    expect(errorCode(() => updateAdrStatus(track, 9, 'accepted', ctx))).toBe('NOT_FOUND');
    expect(errorCode(() => mitigateRisk(track, { id: 3, mitigation: 'x' }, ctx))).toBe(
      'NOT_FOUND'
    );
    expect(
      errorCode(() => updateDependency(track, { name: 'nobody', status: 'resolved' }, ctx))
    ).toBe('NOT_FOUND');
    expect(
      errorCode(() =>
        recordTechnicalDecision(track, { decision: 'a', rationale: 'b', related_adr: 4 }, ctx)
      )
    ).toBe('NOT_FOUND');
    expect(errorCode(() => createAdr(track, { title: 'New', supersedes: 2 }, ctx))).toBe(
      'NOT_FOUND'
    );
  });

  it('requires a started track', () => {
    expect(
      errorCode(() => addComponent(createEmptyTracks().engineering, { name: 'api' }, ctx))
    ).toBe('TRACK_NOT_STARTED');
  });
});
