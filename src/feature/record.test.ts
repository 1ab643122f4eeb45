import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  addAlias,
  appendDecision,
  createFeatureRecord,
  deriveOverallStatus,
  generateSlug,
  isArtifactType,
  isValidSlug,
  setArtifact,
} from './record.js';
import type { FeatureRecord } from './types.js';

function newRecord(): FeatureRecord {
  return createFeatureRecord({
    title: 'OTP Checkout Recovery',
    productId: 'meal-kit',
    organization: 'growth-division',
    priority: 'P2',
    createdBy: 'alice',
    createdAt: '2026-01-05T09:00:00.000Z',
  });
}

describe('generateSlug', () => {
  it('prefixes the first three characters of the product', () => {
    expect(generateSlug('OTP Checkout Recovery', 'meal-kit')).toBe('mea-otp-checkout-recovery');
  });

  it('drops punctuation and collapses dashes', () => {
    expect(generateSlug('  Faster -- checkout!! (v2) ', 'pantry')).toBe('pan-faster-checkout-v2');
  });

  it('always yields a valid slug when the title has a letter or digit', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }).filter((title) => /[a-z0-9]/i.test(title)),
        (title) => isValidSlug(generateSlug(title, 'meal-kit'))
      )
    );
  });
});

describe('isValidSlug', () => {
  it('rejects path separators, uppercase and empty parts', () => {
    expect(isValidSlug('mea-ok')).toBe(true);
    expect(isValidSlug('../etc')).toBe(false);
    expect(isValidSlug('Mea-ok')).toBe(false);
    expect(isValidSlug('mea--ok')).toBe(false);
    expect(isValidSlug('')).toBe(false);
  });
});

describe('createFeatureRecord', () => {
  it('starts in initialization with every track not started', () => {
    const record = newRecord();

    expect(record.slug).toBe('mea-otp-checkout-recovery');
    expect(record.schema_version).toBe(2);
    expect(record.current_phase).toBe('initialization');
    expect(record.phase_history).toEqual([
      {
        phase: 'initialization',
        entered_at: '2026-01-05T09:00:00.000Z',
        exited_at: null,
        metadata: {},
      },
    ]);
    expect(record.tracks.context.status).toBe('not_started');
    expect(record.tracks.design.status).toBe('not_started');
    expect(record.tracks.business_case.status).toBe('not_started');
    expect(record.tracks.engineering.status).toBe('not_started');
    expect(record.brain_entity).toBeNull();
  });
});

describe('record updates', () => {
  it('appends decisions without touching the input', () => {
    const record = newRecord();
    const updated = appendDecision(record, {
      phase: 'initialization',
      decision: 'Proceed',
      rationale: 'Signal is strong',
      decided_by: 'alice',
      timestamp: '2026-01-05T10:00:00.000Z',
      metadata: {},
    });

    expect(updated.decisions).toHaveLength(1);
    expect(record.decisions).toHaveLength(0);
  });

  it('adds and replaces artifacts', () => {
    const first = setArtifact(newRecord(), 'figma', 'https://figma.example/a');
    const second = setArtifact(first, 'figma', 'https://figma.example/b');

    expect(first.artifacts).toEqual({ figma: 'https://figma.example/a' });
    expect(second.artifacts).toEqual({ figma: 'https://figma.example/b' });
  });

  it('recognizes artifact types', () => {
    expect(isArtifactType('jira_epic')).toBe(true);
    expect(isArtifactType('slides')).toBe(false);
  });

  it('adds aliases as a case-insensitive set and never the title', () => {
    let record = newRecord();
    record = addAlias(record, 'OTP Recovery');
    record = addAlias(record, 'otp recovery');
    record = addAlias(record, 'otp checkout recovery');
    record = addAlias(record, '   ');

    expect(record.aliases).toEqual(['OTP Recovery']);
  });
});

describe('deriveOverallStatus', () => {
  it('moves from To Do to In Progress to Done', () => {
    const record = newRecord();
    expect(deriveOverallStatus(record)).toBe('To Do');

    const started: FeatureRecord = {
      ...record,
      tracks: { ...record.tracks, design: { ...record.tracks.design, status: 'in_progress' } },
    };
    expect(deriveOverallStatus(started)).toBe('In Progress');

    const done: FeatureRecord = {
      ...record,
      tracks: {
        context: { ...record.tracks.context, status: 'complete' },
        design: { ...record.tracks.design, status: 'complete' },
        business_case: { ...record.tracks.business_case, status: 'approved' },
        engineering: { ...record.tracks.engineering, status: 'complete' },
      },
    };
    expect(deriveOverallStatus(done)).toBe('Done');
  });
});
