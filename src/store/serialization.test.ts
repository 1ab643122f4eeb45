import { describe, expect, it } from 'vitest';
import { readyFeature, newFeature } from '../testing/fixtures.js';
import { FeatureStoreError, deserializeFeature, serializeFeature } from './index.js';

const LEGACY_DOCUMENT = {
  slug: 'mea-otp-checkout-recovery',
  title: 'OTP Checkout Recovery',
  product_id: 'meal-kit',
  created: '2025-11-01T10:00:00.000Z',
  created_by: 'alice',
  engine: {
    current_phase: 'parallel_tracks',
    phase_history: [
      {
        phase: 'initialization',
        entered: '2025-11-01T10:00:00.000Z',
        completed: '2025-11-02T10:00:00.000Z',
      },
      {
        phase: 'signal_analysis',
        entered: '2025-11-02T10:00:00.000Z',
        completed: '2025-11-03T10:00:00.000Z',
        note: 'fast-tracked',
      },
      {
        phase: 'context_doc',
        entered: '2025-11-03T10:00:00.000Z',
        completed: '2025-11-04T10:00:00.000Z',
      },
      { phase: 'parallel_tracks', entered: '2025-11-04T10:00:00.000Z', completed: null },
    ],
    tracks: {
      context: { status: 'complete', current_version: 3 },
      design: { status: 'blocked', current_version: 1 },
      business_case: { status: 'not_started' },
      engineering: { status: 'in_progress', current_version: 0 },
    },
  },
  artifacts: {
    wireframes_url: 'https://wireframes.example/otp',
    figma: null,
    notion: 'https://notion.example/otp',
  },
  decisions: [
    {
      phase: 'signal_analysis',
      decision: 'Proceed',
      decided_by: 'alice',
      date: '2025-11-03T10:00:00.000Z',
      source: 'standup',
    },
  ],
  aliases: {
    primary_name: 'OTP Checkout Recovery',
    known_aliases: ['OTP Recovery', 'otp recovery', 'Checkout OTP'],
  },
};

function expectStoreError(json: string, errorType: FeatureStoreError['errorType']): FeatureStoreError {
  try {
    deserializeFeature(json);
  } catch (error) {
    expect(error).toBeInstanceOf(FeatureStoreError);
    if (error instanceof FeatureStoreError) {
      expect(error.errorType).toBe(errorType);
      return error;
    }
  }
  throw new Error('Expected deserializeFeature to throw');
}

describe('serializeFeature', () => {
  it('writes two-space indented JSON with a trailing newline', () => {
    const json = serializeFeature(newFeature());

    expect(json.endsWith('}\n')).toBe(true);
    expect(json).toMatch(/^ {2}"schema_version": 2,$/m);
  });
});

describe('deserializeFeature', () => {
  it('round-trips a record with facts on every track', () => {
    const record = readyFeature();

    const { record: loaded, storedVersion } = deserializeFeature(serializeFeature(record));

    expect(loaded).toEqual(record);
    expect(storedVersion).toBe(2);
  });

  it('rejects empty content as corruption', () => {
    expectStoreError('  \n', 'corruption_error');
  });

  it('rejects invalid JSON as a parse error', () => {
    const error = expectStoreError('{"slug": ', 'parse_error');
    expect(error.cause).toBeInstanceOf(SyntaxError);
  });

  it('rejects a non-object document', () => {
    const error = expectStoreError('[1, 2]', 'schema_error');
    expect(error.details).toBe('Received array instead of object');
  });

  it('rejects a newer schema version', () => {
    const error = expectStoreError(
      JSON.stringify({ ...newFeature(), schema_version: 3 }),
      'schema_error'
    );
    expect(error.message).toBe('Unsupported schema_version 3; newest known is 2');
  });

  it('rejects a non-integer schema version', () => {
    expectStoreError(JSON.stringify({ ...newFeature(), schema_version: '2' }), 'schema_error');
  });

  it('reports the dotted path of a mistyped field', () => {
    const error = expectStoreError(
      JSON.stringify({ ...newFeature(), priority: 'P9' }),
      'validation_error'
    );
    expect(error.message).toBe(
      "Invalid feature record: 'priority' must be one of P0, P1, P2, P3, got string"
    );
  });

  it('rejects a history whose open entry disagrees with the current phase', () => {
    const error = expectStoreError(
      JSON.stringify({ ...newFeature(), current_phase: 'context_doc' }),
      'corruption_error'
    );
    expect(error.message).toBe(
      "Corrupted feature record: current_phase 'context_doc' does not match the open phase_history entry 'initialization'"
    );
  });

  describe('legacy documents', () => {
    const { record, storedVersion } = deserializeFeature(JSON.stringify(LEGACY_DOCUMENT));

    it('reports the stored version and upgrades the record', () => {
      expect(storedVersion).toBe(1);
      expect(record.schema_version).toBe(2);
    });

    it('fills fields the old layout did not have', () => {
      expect(record.created_at).toBe('2025-11-01T10:00:00.000Z');
      expect(record.organization).toBe('default');
      expect(record.priority).toBe('P2');
      expect(record.brain_entity).toBeNull();
    });

    it('renames phase timestamps and keeps extra keys as metadata', () => {
      expect(record.current_phase).toBe('parallel_tracks');
      expect(record.phase_history[1]).toEqual({
        phase: 'signal_analysis',
        entered_at: '2025-11-02T10:00:00.000Z',
        exited_at: '2025-11-03T10:00:00.000Z',
        metadata: { note: 'fast-tracked' },
      });
      expect(record.phase_history[3]?.exited_at).toBeNull();
    });

    it('moves decision dates to timestamps', () => {
      expect(record.decisions).toEqual([
        {
          phase: 'signal_analysis',
          decision: 'Proceed',
          rationale: '',
          decided_by: 'alice',
          timestamp: '2025-11-03T10:00:00.000Z',
          metadata: { source: 'standup' },
        },
      ]);
    });

    it('derives track status from the empty facts', () => {
      expect(record.tracks.context.status).toBe('in_progress');
      expect(record.tracks.context.version).toBe(3);
      expect(record.tracks.context.metadata.submissions).toEqual([]);
      expect(record.tracks.design.status).toBe('blocked');
      expect(record.tracks.design.metadata.blocked).toEqual({
        reason: 'Blocked before migration',
        blocked_by: 'alice',
        blocked_at: '2025-11-01T10:00:00.000Z',
      });
      expect(record.tracks.business_case.status).toBe('not_started');
      expect(record.tracks.business_case.metadata.started_at).toBeNull();
      expect(record.tracks.engineering.status).toBe('in_progress');
    });

    it('renames artifacts and drops empty or unknown ones', () => {
      expect(record.artifacts).toEqual({ wireframes: 'https://wireframes.example/otp' });
    });

    it('keeps legacy statuses and unknown artifacts on the open phase entry', () => {
      expect(record.phase_history[3]?.metadata).toEqual({
        migration: {
          from_schema_version: 1,
          legacy_track_status: { context: 'complete' },
          dropped_artifacts: { notion: 'https://notion.example/otp' },
        },
      });
      expect(record.phase_history[1]?.metadata.migration).toBeUndefined();
    });

    it('leaves an approved business case traceable after migration', () => {
      const approved = {
        ...LEGACY_DOCUMENT,
        engine: {
          ...LEGACY_DOCUMENT.engine,
          tracks: {
            ...LEGACY_DOCUMENT.engine.tracks,
            business_case: { status: 'approved', current_version: 2 },
          },
        },
      };

      const migrated = deserializeFeature(JSON.stringify(approved)).record;

      expect(migrated.tracks.business_case.status).toBe('in_progress');
      expect(migrated.tracks.business_case.version).toBe(2);
      expect(migrated.phase_history[3]?.metadata.migration).toEqual({
        from_schema_version: 1,
        legacy_track_status: { context: 'complete', business_case: 'approved' },
        dropped_artifacts: { notion: 'https://notion.example/otp' },
      });
      expect(deserializeFeature(serializeFeature(migrated)).record).toEqual(migrated);
    });

    it('flattens aliases without the title or case duplicates', () => {
      expect(record.aliases).toEqual(['OTP Recovery', 'Checkout OTP']);
    });

    it('serializes in the current layout', () => {
      const again = deserializeFeature(serializeFeature(record));
      expect(again.storedVersion).toBe(2);
      expect(again.record).toEqual(record);
    });
  });
});
