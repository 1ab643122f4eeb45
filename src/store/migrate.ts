/**
 * Migration of legacy (schema v1) feature documents.
 *
 * The v1 layout nested phase and track state under `engine`, used `created`,
 * `entered`/`completed` and `date` timestamps, flattened entry metadata into
 * the entry itself, kept tracks as `{status, current_version}` and stored
 * aliases as `{primary_name, known_aliases}`. Migration produces a v2 document
 * that is then decoded like any other.
 *
 * Legacy track statuses the derived ones do not reproduce, and artifacts with
 * no current type, are kept under `migration` in the metadata of the open
 * phase entry.
 *
 * @packageDocumentation
 */

import { isRecord } from '../config/parser.js';
import { createEmptyTracks, isArtifactType } from '../feature/record.js';
import {
  CURRENT_SCHEMA_VERSION,
  TRACK_NAMES,
  type TrackActivity,
} from '../feature/types.js';

type Doc = Record<string, unknown>;

const LEGACY_ARTIFACT_NAMES: Readonly<Record<string, string>> = {
  wireframes_url: 'wireframes',
};

function section(value: unknown): Doc {
  return isRecord(value) ? value : {};
}

function without(source: Doc, keys: readonly string[]): Doc {
  return Object.fromEntries(Object.entries(source).filter(([key]) => !keys.includes(key)));
}

function migratePhaseEntry(value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  const rest = without(value, ['phase', 'entered', 'completed', 'metadata']);
  return {
    phase: value['phase'],
    entered_at: value['entered'],
    exited_at: value['completed'] ?? null,
    metadata: { ...rest, ...section(value['metadata']) },
  };
}

function migrateDecision(value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  const rest = without(value, ['date', 'phase', 'decision', 'rationale', 'decided_by', 'metadata']);
  return {
    phase: value['phase'],
    decision: value['decision'],
    rationale: value['rationale'] ?? '',
    decided_by: value['decided_by'],
    timestamp: value['date'],
    metadata: { ...rest, ...section(value['metadata']) },
  };
}

interface MigratedTracks {
  tracks: Doc;
  /** Legacy statuses that differ from the derived ones, by track. */
  legacyStatus: Record<string, string>;
}

/**
 * Legacy tracks carried only a status. A started track keeps no facts, so it
 * becomes `in_progress`, or `blocked` with the legacy block as its reason.
 */
function migrateTracks(value: unknown, createdAt: unknown, createdBy: unknown): MigratedTracks {
  const legacy = section(value);
  const empty = createEmptyTracks();
  const migrated: Doc = {};
  const legacyStatus: Record<string, string> = {};

  for (const name of TRACK_NAMES) {
    const track = section(legacy[name]);
    const status = typeof track['status'] === 'string' ? track['status'] : 'not_started';
    const version = track['current_version'] ?? 0;
    const started = status !== 'not_started';
    const actor = typeof createdBy === 'string' && createdBy !== '' ? createdBy : 'unknown';

    const activity: TrackActivity = {
      started_at: started && typeof createdAt === 'string' ? createdAt : null,
      started_by: started ? actor : null,
      blocked:
        status === 'blocked' && typeof createdAt === 'string'
          ? { reason: 'Blocked before migration', blocked_by: actor, blocked_at: createdAt }
          : null,
    };

    let derived = 'not_started';
    if (activity.started_at !== null) {
      derived = activity.blocked !== null ? 'blocked' : 'in_progress';
    }

    if (status !== derived) {
      legacyStatus[name] = status;
    }
    migrated[name] = {
      status: derived,
      version,
      metadata: { ...empty[name].metadata, ...activity },
    };
  }
  return { tracks: migrated, legacyStatus };
}

interface MigratedArtifacts {
  artifacts: Doc;
  /** Non-empty references under names with no current artifact type. */
  dropped: Doc;
}

function migrateArtifacts(value: unknown): MigratedArtifacts {
  const artifacts: Doc = {};
  const dropped: Doc = {};
  for (const [key, ref] of Object.entries(section(value))) {
    if (ref === null || ref === undefined) {
      continue;
    }
    const name = LEGACY_ARTIFACT_NAMES[key] ?? key;
    if (isArtifactType(name)) {
      artifacts[name] = ref;
    } else {
      dropped[key] = ref;
    }
  }
  return { artifacts, dropped };
}

/**
 * Adds the migration note to the open entry. A history without one is left
 * for the decoder to reject.
 */
function annotateOpenEntry(history: unknown, note: Doc): unknown {
  if (!Array.isArray(history)) {
    return history;
  }
  let openIndex = -1;
  history.forEach((entry: unknown, index) => {
    if (isRecord(entry) && (entry['exited_at'] === null || entry['exited_at'] === undefined)) {
      openIndex = index;
    }
  });
  return history.map((entry: unknown, index) =>
    index === openIndex && isRecord(entry)
      ? { ...entry, metadata: { ...section(entry['metadata']), migration: note } }
      : entry
  );
}

function migrateAliases(value: unknown, title: unknown): unknown {
  if (Array.isArray(value)) {
    return value;
  }
  const legacy = section(value);
  const names: unknown[] = [];
  const seen = new Set<string>(typeof title === 'string' ? [title.toLowerCase()] : []);
  const candidates: unknown[] = [
    legacy['primary_name'],
    ...(Array.isArray(legacy['known_aliases']) ? legacy['known_aliases'] : []),
  ];
  for (const candidate of candidates) {
    if (typeof candidate !== 'string' || candidate.trim() === '') {
      continue;
    }
    const key = candidate.trim().toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      names.push(candidate.trim());
    }
  }
  return names;
}

/**
 * Converts a v1 document to the current layout. Fields are carried over as
 * found; the result still has to be decoded.
 *
 * @param legacy - Parsed v1 document.
 * @returns A document in the current layout.
 */
export function migrateV1(legacy: Doc): Doc {
  const engine = isRecord(legacy['engine']) ? legacy['engine'] : legacy;
  const createdAt = legacy['created'] ?? legacy['created_at'];
  const createdBy = legacy['created_by'];
  const { tracks, legacyStatus } = migrateTracks(engine['tracks'], createdAt, createdBy);
  const { artifacts, dropped } = migrateArtifacts(legacy['artifacts']);
  const history = Array.isArray(engine['phase_history'])
    ? engine['phase_history'].map(migratePhaseEntry)
    : engine['phase_history'];

  return {
    schema_version: CURRENT_SCHEMA_VERSION,
    slug: legacy['slug'],
    title: legacy['title'],
    product_id: legacy['product_id'],
    organization: legacy['organization'] ?? 'default',
    created_at: createdAt,
    created_by: typeof createdBy === 'string' && createdBy !== '' ? createdBy : 'unknown',
    priority: legacy['priority'] ?? 'P2',
    brain_entity: legacy['brain_entity'] ?? null,
    current_phase: engine['current_phase'] ?? 'initialization',
    phase_history: annotateOpenEntry(history, {
      from_schema_version: 1,
      legacy_track_status: legacyStatus,
      dropped_artifacts: dropped,
    }),
    tracks,
    artifacts,
    decisions: Array.isArray(legacy['decisions'])
      ? legacy['decisions'].map(migrateDecision)
      : (legacy['decisions'] ?? []),
    aliases: migrateAliases(legacy['aliases'], legacy['title']),
  };
}
