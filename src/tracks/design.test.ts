import { describe, it, expect } from 'vitest';
import { DEFAULT_GATES } from '../config/defaults.js';
import { createEmptyTracks } from '../feature/record.js';
import type { DesignTrackState } from '../feature/types.js';
import {
  DESIGN_TRACK,
  attachFigma,
  attachWireframes,
  recordDesignSpec,
  refreshDesignStatus,
} from './design.js';
import { TrackOperationError } from './errors.js';
import { startTrack, type TrackContext } from './machine.js';

const ctx: TrackContext = {
  actor: 'dana',
  now: '2026-01-08T10:00:00.000Z',
  gates: DEFAULT_GATES,
  artifacts: {},
};

function started(context: TrackContext = ctx): DesignTrackState {
  return startTrack(DESIGN_TRACK, createEmptyTracks().design, context);
}

describe('design track', () => {
  it('needs the spec and Figma when Figma is required', () => {
    let track = recordDesignSpec(started(), 'docs/design.md', ctx);
    expect(track.status).toBe('in_progress');
    expect(track.version).toBe(1);

    const wireframes = attachWireframes(track, 'https://wire.example/1', ctx);
    track = wireframes.track;
    expect(track.status).toBe('wireframes_ready');
    expect(wireframes.artifacts).toEqual({ wireframes: 'https://wire.example/1' });

    const figma = attachFigma(track, 'https://figma.example/file', {
      ...ctx,
      artifacts: wireframes.artifacts,
    });
    expect(figma.track.status).toBe('complete');
    expect(figma.artifacts).toEqual({
      wireframes: 'https://wire.example/1',
      figma: 'https://figma.example/file',
    });
  });

  it('completes on the spec alone when Figma is optional', () => {
    const optional: TrackContext = { ...ctx, gates: { ...DEFAULT_GATES, figma_required: false } };
    const track = recordDesignSpec(started(optional), 'docs/design.md', optional);
    expect(track.status).toBe('complete');
  });

  it('reports figma_attached before the spec exists', () => {
    const { track } = attachFigma(started(), 'https://figma.example/file', ctx);
    expect(track.status).toBe('figma_attached');
  });

  it('counts each spec recording as a revision', () => {
    let track = recordDesignSpec(started(), 'docs/design.md', ctx);
    track = recordDesignSpec(track, 'docs/design-v2.md', ctx);
    expect(track.version).toBe(2);
    expect(track.metadata.spec?.ref).toBe('docs/design-v2.md');
  });

  it('rejects empty references', () => {
    expect(() => recordDesignSpec(started(), '  ', ctx)).toThrow(TrackOperationError);
  });

  it('starts directly in figma_attached when Figma was attached beforehand', () => {
    const artifacts = { figma: 'https://figma.example/file' };
    const track = startTrack(DESIGN_TRACK, createEmptyTracks().design, { ...ctx, artifacts });
    expect(track.status).toBe('figma_attached');
  });
});

describe('refreshDesignStatus', () => {
  it('leaves an unstarted track alone', () => {
    const track = createEmptyTracks().design;
    expect(
      refreshDesignStatus(track, { gates: DEFAULT_GATES, artifacts: { figma: 'x' } })
    ).toBe(track);
  });

  it('picks up artifacts attached outside the track', () => {
    const track = recordDesignSpec(started(), 'docs/design.md', ctx);
    const refreshed = refreshDesignStatus(track, {
      gates: DEFAULT_GATES,
      artifacts: { figma: 'https://figma.example/file' },
    });
    expect(refreshed.status).toBe('complete');
  });
});
