import { describe, it, expect } from 'vitest';
import { DEFAULT_GATES } from '../config/defaults.js';
import { createEmptyTracks } from '../feature/record.js';
import { CONTEXT_TRACK, recordContextChallenge, submitContextVersion } from './context.js';
import { ENGINEERING_TRACK } from './engineering.js';
import { TrackOperationError } from './errors.js';
import {
  activityStatus,
  assertTransition,
  blockTrack,
  startTrack,
  unblockTrack,
  type TrackContext,
} from './machine.js';

const ctx: TrackContext = {
  actor: 'alice',
  now: '2026-01-05T10:00:00.000Z',
  gates: DEFAULT_GATES,
  artifacts: {},
};

function catchTrackError(fn: () => unknown): TrackOperationError {
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

describe('activityStatus', () => {
  it('reports not_started, blocked or nothing', () => {
    const facts = createEmptyTracks().context.metadata;
    expect(activityStatus(facts)).toBe('not_started');

    const started = { ...facts, started_at: ctx.now, started_by: 'alice' };
    expect(activityStatus(started)).toBeUndefined();

    const blocked = {
      ...started,
      blocked: { reason: 'waiting', blocked_by: 'alice', blocked_at: ctx.now },
    };
    expect(activityStatus(blocked)).toBe('blocked');
  });
});

describe('assertTransition', () => {
  it('rejects moves missing from the table', () => {
    const error = catchTrackError(() =>
      assertTransition(ENGINEERING_TRACK, 'not_started', 'complete')
    );
    expect(error.code).toBe('INVALID_TRACK_TRANSITION');
    expect(error.track).toBe('engineering');
    expect(error.message).toBe("Engineering track cannot move from 'not_started' to 'complete'");
  });

  it('always allows staying in place', () => {
    expect(() => assertTransition(CONTEXT_TRACK, 'complete', 'complete')).not.toThrow();
  });
});

describe('startTrack', () => {
  it('moves not_started to in_progress and records who started it', () => {
    const track = startTrack(CONTEXT_TRACK, createEmptyTracks().context, ctx);

    expect(track.status).toBe('in_progress');
    expect(track.version).toBe(0);
    expect(track.metadata.started_by).toBe('alice');
    expect(track.metadata.started_at).toBe(ctx.now);
  });

  it('rejects a second start', () => {
    const track = startTrack(CONTEXT_TRACK, createEmptyTracks().context, ctx);
    const error = catchTrackError(() => startTrack(CONTEXT_TRACK, track, ctx));
    expect(error.code).toBe('INVALID_TRACK_TRANSITION');
    expect(error.message).toBe('Context track already started (status: in_progress)');
  });
});

describe('blockTrack / unblockTrack', () => {
  it('requires a started track', () => {
    const error = catchTrackError(() =>
      blockTrack(CONTEXT_TRACK, createEmptyTracks().context, 'waiting', ctx)
    );
    expect(error.code).toBe('TRACK_NOT_STARTED');
    expect(error.message).toBe('Context track has not been started');
  });

  it('returns to the status the facts imply', () => {
    let track = startTrack(CONTEXT_TRACK, createEmptyTracks().context, ctx);
    track = submitContextVersion(track, { version: 1 }, ctx);
    expect(track.status).toBe('pending_challenge');

    track = blockTrack(CONTEXT_TRACK, track, 'legal review', ctx);
    expect(track.status).toBe('blocked');
    expect(track.metadata.blocked).toEqual({
      reason: 'legal review',
      blocked_by: 'alice',
      blocked_at: ctx.now,
    });

    track = unblockTrack(CONTEXT_TRACK, track, ctx);
    expect(track.status).toBe('pending_challenge');
    expect(track.metadata.blocked).toBeNull();
  });

  it('can block a complete track and restore it', () => {
    let track = startTrack(CONTEXT_TRACK, createEmptyTracks().context, ctx);
    track = submitContextVersion(track, { version: 1, score: 70 }, ctx);
    track = submitContextVersion(track, { version: 2, score: 70 }, ctx);
    track = submitContextVersion(track, { version: 3 }, ctx);
    track = recordContextChallenge(track, 90, ctx);
    expect(track.status).toBe('complete');

    track = blockTrack(CONTEXT_TRACK, track, 'scope change', ctx);
    expect(track.status).toBe('blocked');
    expect(unblockTrack(CONTEXT_TRACK, track, ctx).status).toBe('complete');
  });

  it('rejects blocking twice and unblocking an unblocked track', () => {
    const started = startTrack(CONTEXT_TRACK, createEmptyTracks().context, ctx);
    const blocked = blockTrack(CONTEXT_TRACK, started, 'waiting', ctx);

    expect(catchTrackError(() => blockTrack(CONTEXT_TRACK, blocked, 'again', ctx)).message).toBe(
      'Context track is already blocked: waiting'
    );
    expect(catchTrackError(() => unblockTrack(CONTEXT_TRACK, started, ctx)).message).toBe(
      'Context track is not blocked'
    );
  });

  it('does not modify the input state', () => {
    const started = startTrack(CONTEXT_TRACK, createEmptyTracks().context, ctx);
    blockTrack(CONTEXT_TRACK, started, 'waiting', ctx);
    expect(started.status).toBe('in_progress');
    expect(started.metadata.blocked).toBeNull();
  });
});
