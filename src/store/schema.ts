/**
 * Decoding of persisted feature records.
 *
 * Every field is narrowed from `unknown`; the first mismatch throws a
 * `validation_error` naming the field's dotted path. Structural invariants of
 * the phase history are checked afterwards and reported as
 * `corruption_error`.
 *
 * @packageDocumentation
 */

import { isRecord } from '../config/parser.js';
import { isArtifactType, isValidSlug } from '../feature/record.js';
import {
  ADR_STATUSES,
  APPROVAL_TYPES,
  DEPENDENCY_STATUSES,
  ESTIMATE_SIZES,
  LEVELS,
  PHASES,
  PRIORITIES,
  RISK_STATUSES,
  type Adr,
  type ApprovalRound,
  type Artifacts,
  type BlockFact,
  type BusinessCaseAssumptions,
  type BusinessCaseFacts,
  type ContextFacts,
  type ContextSubmission,
  type Decision,
  type Dependency,
  type DesignFacts,
  type DesignSpecRef,
  type EngineeringComponent,
  type EngineeringEstimate,
  type EngineeringFacts,
  type EstimateSize,
  type FeatureRecord,
  type FeatureTracks,
  type Metadata,
  type PhaseEntry,
  type StakeholderApproval,
  type TechnicalDecision,
  type TechnicalRisk,
  type TrackActivity,
  type TrackState,
  type TrackStatus,
} from '../feature/types.js';
import { BUSINESS_CASE_TRACK } from '../tracks/business-case.js';
import { CONTEXT_TRACK } from '../tracks/context.js';
import { DESIGN_TRACK } from '../tracks/design.js';
import { ENGINEERING_TRACK } from '../tracks/engineering.js';
import type { TrackDefinition } from '../tracks/machine.js';
import { FeatureStoreError } from './errors.js';

type Decode<T> = (value: unknown, path: string) => T;

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function invalid(path: string, expected: string, value: unknown): FeatureStoreError {
  return new FeatureStoreError(
    `Invalid feature record: '${path}' must be ${expected}, got ${describeValue(value)}`,
    'validation_error'
  );
}

function corrupted(message: string): FeatureStoreError {
  return new FeatureStoreError(`Corrupted feature record: ${message}`, 'corruption_error');
}

function object(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw invalid(path, 'an object', value);
  }
  return value;
}

const metadata: Decode<Metadata> = object;

function string(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw invalid(path, 'a string', value);
  }
  return value;
}

function integer(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw invalid(path, 'an integer', value);
  }
  return value;
}

function number(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(path, 'a number', value);
  }
  return value;
}

function boolean(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw invalid(path, 'a boolean', value);
  }
  return value;
}

function nullable<T>(decode: Decode<T>): Decode<T | null> {
  return (value, path) => (value === null || value === undefined ? null : decode(value, path));
}

function list<T>(decode: Decode<T>): Decode<T[]> {
  return (value, path) => {
    if (!Array.isArray(value)) {
      throw invalid(path, 'a list', value);
    }
    return value.map((item: unknown, index) => decode(item, `${path}[${String(index)}]`));
  };
}

function oneOf<T extends string>(allowed: readonly T[]): Decode<T> {
  return (value, path) => {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw invalid(path, `one of ${allowed.join(', ')}`, value);
    }
    return match;
  };
}

const nullableString = nullable(string);
const nullableInteger = nullable(integer);
const stringList = list(string);

/**
 * Reads fields of one object, prefixing paths.
 */
class Fields {
  private readonly source: Record<string, unknown>;
  private readonly path: string;

  constructor(value: unknown, path: string) {
    this.source = object(value, path);
    this.path = path;
  }

  get<T>(field: string, decode: Decode<T>): T {
    return decode(this.source[field], this.path === '' ? field : `${this.path}.${field}`);
  }
}

const blockFact: Decode<BlockFact> = (value, path) => {
  const f = new Fields(value, path);
  return {
    reason: f.get('reason', string),
    blocked_by: f.get('blocked_by', string),
    blocked_at: f.get('blocked_at', string),
  };
};

function activity(f: Fields): TrackActivity {
  return {
    started_at: f.get('started_at', nullableString),
    started_by: f.get('started_by', nullableString),
    blocked: f.get('blocked', nullable(blockFact)),
  };
}

const submission: Decode<ContextSubmission> = (value, path) => {
  const f = new Fields(value, path);
  return {
    version: f.get('version', integer),
    score: f.get('score', nullable(number)),
    document: f.get('document', nullableString),
    submitted_by: f.get('submitted_by', string),
    submitted_at: f.get('submitted_at', string),
    challenged_at: f.get('challenged_at', nullableString),
  };
};

const contextFacts: Decode<ContextFacts> = (value, path) => {
  const f = new Fields(value, path);
  return { ...activity(f), submissions: f.get('submissions', list(submission)) };
};

const specRef: Decode<DesignSpecRef> = (value, path) => {
  const f = new Fields(value, path);
  return {
    ref: f.get('ref', string),
    recorded_by: f.get('recorded_by', string),
    recorded_at: f.get('recorded_at', string),
  };
};

const designFacts: Decode<DesignFacts> = (value, path) => {
  const f = new Fields(value, path);
  return { ...activity(f), spec: f.get('spec', nullable(specRef)) };
};

const assumptions: Decode<BusinessCaseAssumptions> = (value, path) => {
  const f = new Fields(value, path);
  return {
    baseline_metrics: f.get('baseline_metrics', metadata),
    impact_assumptions: f.get('impact_assumptions', metadata),
    investment_estimate: f.get('investment_estimate', nullableString),
    updated_by: f.get('updated_by', string),
    updated_at: f.get('updated_at', string),
  };
};

const approvalRound: Decode<ApprovalRound> = (value, path) => {
  const f = new Fields(value, path);
  return {
    round: f.get('round', integer),
    submitted_by: f.get('submitted_by', string),
    submitted_at: f.get('submitted_at', string),
  };
};

const approval: Decode<StakeholderApproval> = (value, path) => {
  const f = new Fields(value, path);
  return {
    approver: f.get('approver', string),
    approved: f.get('approved', boolean),
    approval_type: f.get('approval_type', oneOf(APPROVAL_TYPES)),
    reference: f.get('reference', nullableString),
    notes: f.get('notes', nullableString),
    round: f.get('round', integer),
    recorded_at: f.get('recorded_at', string),
  };
};

const businessCaseFacts: Decode<BusinessCaseFacts> = (value, path) => {
  const f = new Fields(value, path);
  return {
    ...activity(f),
    assumptions: f.get('assumptions', nullable(assumptions)),
    rounds: f.get('rounds', list(approvalRound)),
    approvals: f.get('approvals', list(approval)),
  };
};

const component: Decode<EngineeringComponent> = (value, path) => {
  const f = new Fields(value, path);
  return {
    name: f.get('name', string),
    description: f.get('description', nullableString),
    added_by: f.get('added_by', string),
    added_at: f.get('added_at', string),
  };
};

const adr: Decode<Adr> = (value, path) => {
  const f = new Fields(value, path);
  return {
    number: f.get('number', integer),
    title: f.get('title', string),
    status: f.get('status', oneOf(ADR_STATUSES)),
    context: f.get('context', string),
    decision: f.get('decision', string),
    consequences: f.get('consequences', string),
    author: f.get('author', string),
    created_at: f.get('created_at', string),
    updated_at: f.get('updated_at', string),
    superseded_by: f.get('superseded_by', nullableInteger),
  };
};

const estimateSize = oneOf(ESTIMATE_SIZES);

const breakdown: Decode<Record<string, EstimateSize>> = (value, path) => {
  const result: Record<string, EstimateSize> = {};
  for (const [key, size] of Object.entries(object(value, path))) {
    result[key] = estimateSize(size, `${path}.${key}`);
  }
  return result;
};

const estimate: Decode<EngineeringEstimate> = (value, path) => {
  const f = new Fields(value, path);
  return {
    overall: f.get('overall', estimateSize),
    confidence: f.get('confidence', oneOf(LEVELS)),
    breakdown: f.get('breakdown', breakdown),
    assumptions: f.get('assumptions', stringList),
    estimated_by: f.get('estimated_by', string),
    estimated_at: f.get('estimated_at', string),
  };
};

const risk: Decode<TechnicalRisk> = (value, path) => {
  const f = new Fields(value, path);
  return {
    id: f.get('id', integer),
    risk: f.get('risk', string),
    impact: f.get('impact', oneOf(LEVELS)),
    likelihood: f.get('likelihood', oneOf(LEVELS)),
    mitigation: f.get('mitigation', nullableString),
    owner: f.get('owner', nullableString),
    status: f.get('status', oneOf(RISK_STATUSES)),
  };
};

const dependency: Decode<Dependency> = (value, path) => {
  const f = new Fields(value, path);
  return {
    name: f.get('name', string),
    type: f.get('type', string),
    description: f.get('description', string),
    blocking: f.get('blocking', boolean),
    status: f.get('status', oneOf(DEPENDENCY_STATUSES)),
    owner: f.get('owner', nullableString),
    eta: f.get('eta', nullableString),
  };
};

const technicalDecision: Decode<TechnicalDecision> = (value, path) => {
  const f = new Fields(value, path);
  return {
    decision: f.get('decision', string),
    rationale: f.get('rationale', string),
    category: f.get('category', string),
    related_adr: f.get('related_adr', nullableInteger),
    decided_by: f.get('decided_by', string),
    decided_at: f.get('decided_at', string),
  };
};

const engineeringFacts: Decode<EngineeringFacts> = (value, path) => {
  const f = new Fields(value, path);
  return {
    ...activity(f),
    components: f.get('components', list(component)),
    adrs: f.get('adrs', list(adr)),
    estimate: f.get('estimate', nullable(estimate)),
    estimate_requested: f.get('estimate_requested', boolean),
    risks: f.get('risks', list(risk)),
    dependencies: f.get('dependencies', list(dependency)),
    technical_decisions: f.get('technical_decisions', list(technicalDecision)),
  };
};

function trackState<S extends TrackStatus, F extends TrackActivity>(
  definition: TrackDefinition<S, F>,
  facts: Decode<F>
): Decode<TrackState<S, F>> {
  const status = oneOf([...definition.transitions.keys()]);
  return (value, path) => {
    const f = new Fields(value, path);
    return {
      status: f.get('status', status),
      version: f.get('version', integer),
      metadata: f.get('metadata', facts),
    };
  };
}

const tracks: Decode<FeatureTracks> = (value, path) => {
  const f = new Fields(value, path);
  return {
    context: f.get('context', trackState(CONTEXT_TRACK, contextFacts)),
    design: f.get('design', trackState(DESIGN_TRACK, designFacts)),
    business_case: f.get('business_case', trackState(BUSINESS_CASE_TRACK, businessCaseFacts)),
    engineering: f.get('engineering', trackState(ENGINEERING_TRACK, engineeringFacts)),
  };
};

const phase = oneOf(PHASES);

const phaseEntry: Decode<PhaseEntry> = (value, path) => {
  const f = new Fields(value, path);
  return {
    phase: f.get('phase', phase),
    entered_at: f.get('entered_at', string),
    exited_at: f.get('exited_at', nullableString),
    metadata: f.get('metadata', metadata),
  };
};

const decision: Decode<Decision> = (value, path) => {
  const f = new Fields(value, path);
  return {
    phase: f.get('phase', phase),
    decision: f.get('decision', string),
    rationale: f.get('rationale', string),
    decided_by: f.get('decided_by', string),
    timestamp: f.get('timestamp', string),
    metadata: f.get('metadata', metadata),
  };
};

const artifacts: Decode<Artifacts> = (value, path) => {
  const result: Artifacts = {};
  for (const [key, ref] of Object.entries(object(value, path))) {
    if (!isArtifactType(key)) {
      throw new FeatureStoreError(
        `Invalid feature record: unknown artifact type '${key}' in '${path}'`,
        'validation_error'
      );
    }
    result[key] = string(ref, `${path}.${key}`);
  }
  return result;
};

const slug: Decode<string> = (value, path) => {
  const text = string(value, path);
  if (!isValidSlug(text)) {
    throw invalid(path, 'a lowercase dash-separated slug', value);
  }
  return text;
};

function checkHistory(record: FeatureRecord): void {
  const history = record.phase_history;
  const open = history[history.length - 1];
  if (open === undefined) {
    throw corrupted('phase_history is empty');
  }
  if (open.exited_at !== null) {
    throw corrupted('the last phase_history entry is closed');
  }
  if (open.phase !== record.current_phase) {
    throw corrupted(
      `current_phase '${record.current_phase}' does not match the open phase_history entry '${open.phase}'`
    );
  }
  history.slice(0, -1).forEach((entry, index) => {
    const next = history[index + 1];
    if (entry.exited_at === null) {
      throw corrupted(`phase_history[${String(index)}] is still open`);
    }
    if (next !== undefined && next.entered_at < entry.exited_at) {
      throw corrupted(
        `phase_history[${String(index + 1)}] was entered before phase_history[${String(index)}] was exited`
      );
    }
  });
}

/**
 * Decodes a current-schema record.
 *
 * @param value - Parsed JSON.
 * @returns The typed record.
 * @throws FeatureStoreError with `validation_error` or `corruption_error`.
 */
export function decodeFeatureRecord(value: unknown): FeatureRecord {
  const f = new Fields(value, '');
  const record: FeatureRecord = {
    schema_version: f.get('schema_version', integer),
    slug: f.get('slug', slug),
    title: f.get('title', string),
    product_id: f.get('product_id', string),
    organization: f.get('organization', string),
    created_at: f.get('created_at', string),
    created_by: f.get('created_by', string),
    priority: f.get('priority', oneOf(PRIORITIES)),
    brain_entity: f.get('brain_entity', nullableString),
    current_phase: f.get('current_phase', phase),
    phase_history: f.get('phase_history', list(phaseEntry)),
    tracks: f.get('tracks', tracks),
    artifacts: f.get('artifacts', artifacts),
    decisions: f.get('decisions', list(decision)),
    aliases: f.get('aliases', stringList),
  };
  checkHistory(record);
  return record;
}
