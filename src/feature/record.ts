/**
 * Construction and small pure updates of feature records.
 *
 * Every function returns a new record; inputs are never mutated.
 *
 * @packageDocumentation
 */

import {
  ARTIFACT_TYPES,
  CURRENT_SCHEMA_VERSION,
  PRIORITIES,
  TRACK_NAMES,
  type Artifacts,
  type ArtifactType,
  type Decision,
  type FeatureRecord,
  type FeatureTracks,
  type Metadata,
  type OverallStatus,
  type PhaseEntry,
  type Priority,
  type TrackActivity,
  type TrackName,
} from './types.js';

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

/**
 * Lowercases, turns spaces into dashes, drops everything that is not a
 * letter, digit or dash, and collapses repeated dashes.
 *
 * @param value - Text to slugify.
 * @returns The slugified text, possibly empty.
 */
function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/ /g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .split('-')
    .filter((part) => part !== '')
    .join('-');
}

/**
 * Derives a feature slug from its title and product.
 *
 * @param title - Feature title.
 * @param productId - Owning product.
 * @returns Slug such as `mea-otp-checkout-recovery`.
 *
 * @example
 * ```typescript
 * generateSlug('OTP Checkout Recovery', 'meal-kit'); // 'mea-otp-checkout-recovery'
 * ```
 */
export function generateSlug(title: string, productId: string): string {
  return slugify(`${productId.slice(0, 3)}-${slugify(title)}`);
}

/**
 * Checks that a slug is lowercase alphanumeric words joined by single dashes.
 *
 * @param slug - Candidate slug.
 * @returns True if valid.
 */
export function isValidSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}

export function isArtifactType(value: string): value is ArtifactType {
  return ARTIFACT_TYPES.some((type) => type === value);
}

export function isTrackName(value: string): value is TrackName {
  return TRACK_NAMES.some((name) => name === value);
}

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}

function emptyActivity(): TrackActivity {
  return { started_at: null, started_by: null, blocked: null };
}

/**
 * Creates the four tracks in their initial state.
 *
 * @returns Tracks with no recorded facts.
 */
export function createEmptyTracks(): FeatureTracks {
  return {
    context: {
      status: 'not_started',
      version: 0,
      metadata: { ...emptyActivity(), submissions: [] },
    },
    design: {
      status: 'not_started',
      version: 0,
      metadata: { ...emptyActivity(), spec: null },
    },
    business_case: {
      status: 'not_started',
      version: 0,
      metadata: { ...emptyActivity(), assumptions: null, rounds: [], approvals: [] },
    },
    engineering: {
      status: 'not_started',
      version: 0,
      metadata: {
        ...emptyActivity(),
        components: [],
        adrs: [],
        estimate: null,
        estimate_requested: false,
        risks: [],
        dependencies: [],
        technical_decisions: [],
      },
    },
  };
}

/**
 * Input for {@link createFeatureRecord}.
 */
export interface NewFeatureInput {
  title: string;
  productId: string;
  organization: string;
  priority: Priority;
  createdBy: string;
  /** Creation time (ISO 8601). */
  createdAt: string;
  brainEntity?: string | null | undefined;
  /** Metadata of the initial phase entry. */
  metadata?: Metadata | undefined;
}

/**
 * Creates a new record in the `initialization` phase with all tracks
 * not started.
 *
 * @param input - Feature details.
 * @returns The new record.
 */
export function createFeatureRecord(input: NewFeatureInput): FeatureRecord {
  return {
    schema_version: CURRENT_SCHEMA_VERSION,
    slug: generateSlug(input.title, input.productId),
    title: input.title,
    product_id: input.productId,
    organization: input.organization,
    created_at: input.createdAt,
    created_by: input.createdBy,
    priority: input.priority,
    brain_entity: input.brainEntity ?? null,
    current_phase: 'initialization',
    phase_history: [
      {
        phase: 'initialization',
        entered_at: input.createdAt,
        exited_at: null,
        metadata: input.metadata ?? {},
      },
    ],
    tracks: createEmptyTracks(),
    artifacts: {},
    decisions: [],
    aliases: [],
  };
}

/**
 * Returns the open phase history entry.
 *
 * @param record - Feature record.
 * @returns The last history entry, or undefined for an empty history.
 */
export function getOpenPhaseEntry(record: FeatureRecord): PhaseEntry | undefined {
  return record.phase_history[record.phase_history.length - 1];
}

/**
 * Appends a decision to the record.
 *
 * @param record - Feature record.
 * @param decision - Decision to append.
 * @returns Updated record.
 */
export function appendDecision(record: FeatureRecord, decision: Decision): FeatureRecord {
  return { ...record, decisions: [...record.decisions, decision] };
}

/**
 * Adds or replaces an artifact reference.
 *
 * @param record - Feature record.
 * @param type - Artifact kind.
 * @param ref - Reference such as a URL.
 * @returns Updated record.
 */
export function setArtifact(record: FeatureRecord, type: ArtifactType, ref: string): FeatureRecord {
  const artifacts: Artifacts = { ...record.artifacts };
  artifacts[type] = ref;
  return { ...record, artifacts };
}

/**
 * Adds an alias unless it equals the title or an existing alias,
 * ignoring case.
 *
 * @param record - Feature record.
 * @param alias - Alternative name.
 * @returns Updated record, or the same record when nothing was added.
 */
export function addAlias(record: FeatureRecord, alias: string): FeatureRecord {
  const trimmed = alias.trim();
  const key = trimmed.toLowerCase();
  if (
    trimmed === '' ||
    record.title.toLowerCase() === key ||
    record.aliases.some((existing) => existing.toLowerCase() === key)
  ) {
    return record;
  }
  return { ...record, aliases: [...record.aliases, trimmed] };
}

/**
 * Whether a track has reached its success state.
 *
 * @param record - Feature record.
 * @param track - Track to check.
 * @returns True for a complete track, or an approved business case.
 */
export function isTrackDone(record: FeatureRecord, track: TrackName): boolean {
  switch (track) {
    case 'context':
      return record.tracks.context.status === 'complete';
    case 'design':
      return record.tracks.design.status === 'complete';
    case 'business_case':
      return record.tracks.business_case.status === 'approved';
    case 'engineering':
      return record.tracks.engineering.status === 'complete';
  }
}

/**
 * Derives overall progress from the tracks.
 *
 * @param record - Feature record.
 * @returns `Done` when every track succeeded, `In Progress` when any started.
 */
export function deriveOverallStatus(record: FeatureRecord): OverallStatus {
  if (TRACK_NAMES.every((track) => isTrackDone(record, track))) {
    return 'Done';
  }
  if (TRACK_NAMES.some((track) => record.tracks[track].status !== 'not_started')) {
    return 'In Progress';
  }
  return 'To Do';
}
