/**
 * Feature record types: the persisted shape of one feature.
 *
 * Field names are snake_case because they are written to disk as-is.
 *
 * @packageDocumentation
 */

/**
 * Current schema version of a persisted feature record.
 */
export const CURRENT_SCHEMA_VERSION = 2;

/**
 * Lifecycle phases of a feature.
 */
export type Phase =
  | 'initialization'
  | 'signal_analysis'
  | 'context_doc'
  | 'parallel_tracks'
  | 'decision_gate'
  | 'output_generation'
  | 'complete'
  | 'archived'
  | 'deferred';

/**
 * All phases in lifecycle order.
 */
export const PHASES: readonly Phase[] = [
  'initialization',
  'signal_analysis',
  'context_doc',
  'parallel_tracks',
  'decision_gate',
  'output_generation',
  'complete',
  'archived',
  'deferred',
];

/**
 * Feature priority.
 */
export type Priority = 'P0' | 'P1' | 'P2' | 'P3';

export const PRIORITIES: readonly Priority[] = ['P0', 'P1', 'P2', 'P3'];

/**
 * The four workstreams of a feature.
 */
export type TrackName = 'context' | 'design' | 'business_case' | 'engineering';

/**
 * Tracks in report order.
 */
export const TRACK_NAMES: readonly TrackName[] = [
  'context',
  'design',
  'business_case',
  'engineering',
];

/**
 * Display labels used in blocker strings and reports.
 */
export const TRACK_LABELS: Readonly<Record<TrackName, string>> = {
  context: 'Context',
  design: 'Design',
  business_case: 'Business Case',
  engineering: 'Engineering',
};

/**
 * External artifact kinds a feature can reference.
 */
export type ArtifactType = 'figma' | 'wireframes' | 'jira_epic' | 'confluence_page' | 'gdocs';

export const ARTIFACT_TYPES: readonly ArtifactType[] = [
  'figma',
  'wireframes',
  'jira_epic',
  'confluence_page',
  'gdocs',
];

/**
 * Artifact references by kind. Entries are added or replaced, never removed.
 */
export type Artifacts = Partial<Record<ArtifactType, string>>;

/**
 * Free-form JSON metadata.
 */
export type Metadata = Record<string, unknown>;

/**
 * One entry in a feature's phase history.
 */
export interface PhaseEntry {
  /** Phase that was entered. */
  phase: Phase;
  /** When the phase was entered (ISO 8601). */
  entered_at: string;
  /** When the phase was left, or null for the open entry. */
  exited_at: string | null;
  /** Context recorded with the transition. */
  metadata: Metadata;
}

/**
 * An auditable decision. Decisions are append-only.
 */
export interface Decision {
  /** Phase the decision belongs to. */
  phase: Phase;
  /** What was decided. */
  decision: string;
  /** Why it was decided. */
  rationale: string;
  /** Who decided. */
  decided_by: string;
  /** When it was decided (ISO 8601). */
  timestamp: string;
  /** Structured details such as the gate outcome. */
  metadata: Metadata;
}

// ---------------------------------------------------------------------------
// Track statuses
// ---------------------------------------------------------------------------

export type ContextStatus =
  | 'not_started'
  | 'in_progress'
  | 'pending_challenge'
  | 'blocked'
  | 'complete';

export type DesignStatus =
  | 'not_started'
  | 'in_progress'
  | 'wireframes_ready'
  | 'figma_attached'
  | 'blocked'
  | 'complete';

export type BusinessCaseStatus =
  | 'not_started'
  | 'in_progress'
  | 'pending_approval'
  | 'approved'
  | 'rejected'
  | 'blocked';

export type EngineeringStatus =
  | 'not_started'
  | 'in_progress'
  | 'estimation_pending'
  | 'blocked'
  | 'complete';

/**
 * Status of any track.
 */
export type TrackStatus = ContextStatus | DesignStatus | BusinessCaseStatus | EngineeringStatus;

// ---------------------------------------------------------------------------
// Track facts
// ---------------------------------------------------------------------------

/**
 * A recorded block on a track.
 */
export interface BlockFact {
  reason: string;
  blocked_by: string;
  blocked_at: string;
}

/**
 * Facts every track records.
 */
export interface TrackActivity {
  /** When the track was started, or null before `start`. */
  started_at: string | null;
  /** Who started the track. */
  started_by: string | null;
  /** The active block, if any. */
  blocked: BlockFact | null;
}

/**
 * One submitted context document version.
 */
export interface ContextSubmission {
  /** Document version, 1 to 3. */
  version: number;
  /** Challenge score 0..100, or null until challenged. */
  score: number | null;
  /** Reference to the document content. */
  document: string | null;
  submitted_by: string;
  submitted_at: string;
  /** When the score was recorded, or null. */
  challenged_at: string | null;
}

export interface ContextFacts extends TrackActivity {
  /** Submissions in order; the last one is the current document. */
  submissions: ContextSubmission[];
}

/**
 * Design spec document reference.
 */
export interface DesignSpecRef {
  ref: string;
  recorded_by: string;
  recorded_at: string;
}

/**
 * Design facts. The Figma and wireframe references live in the record's
 * artifacts map.
 */
export interface DesignFacts extends TrackActivity {
  spec: DesignSpecRef | null;
}

/**
 * Business case assumptions.
 */
export interface BusinessCaseAssumptions {
  baseline_metrics: Metadata;
  impact_assumptions: Metadata;
  investment_estimate: string | null;
  updated_by: string;
  updated_at: string;
}

/**
 * One submission of the business case for approval.
 */
export interface ApprovalRound {
  round: number;
  submitted_by: string;
  submitted_at: string;
}

export type ApprovalType = 'verbal' | 'written' | 'email' | 'slack' | 'meeting';

export const APPROVAL_TYPES: readonly ApprovalType[] = [
  'verbal',
  'written',
  'email',
  'slack',
  'meeting',
];

/**
 * A stakeholder's approval or dissent.
 */
export interface StakeholderApproval {
  approver: string;
  approved: boolean;
  approval_type: ApprovalType;
  /** Link to evidence such as a message thread. */
  reference: string | null;
  notes: string | null;
  /** Approval round the verdict belongs to. */
  round: number;
  recorded_at: string;
}

export interface BusinessCaseFacts extends TrackActivity {
  assumptions: BusinessCaseAssumptions | null;
  rounds: ApprovalRound[];
  approvals: StakeholderApproval[];
}

export type AdrStatus = 'proposed' | 'accepted' | 'rejected' | 'deprecated' | 'superseded';

export const ADR_STATUSES: readonly AdrStatus[] = [
  'proposed',
  'accepted',
  'rejected',
  'deprecated',
  'superseded',
];

/**
 * Architecture Decision Record.
 */
export interface Adr {
  /** Sequential number starting at 1. */
  number: number;
  title: string;
  status: AdrStatus;
  context: string;
  decision: string;
  consequences: string;
  author: string;
  created_at: string;
  updated_at: string;
  /** Number of the ADR that replaced this one. */
  superseded_by: number | null;
}

export type EstimateSize = 'S' | 'M' | 'L' | 'XL';

export const ESTIMATE_SIZES: readonly EstimateSize[] = ['S', 'M', 'L', 'XL'];

export type Level = 'low' | 'medium' | 'high';

export const LEVELS: readonly Level[] = ['low', 'medium', 'high'];

/**
 * T-shirt size estimate.
 */
export interface EngineeringEstimate {
  overall: EstimateSize;
  confidence: Level;
  /** Per-area sizes, e.g. `{ frontend: 'S' }`. */
  breakdown: Record<string, EstimateSize>;
  assumptions: string[];
  estimated_by: string;
  estimated_at: string;
}

export interface EngineeringComponent {
  name: string;
  description: string | null;
  added_by: string;
  added_at: string;
}

export type RiskStatus = 'identified' | 'mitigating' | 'resolved';

export const RISK_STATUSES: readonly RiskStatus[] = ['identified', 'mitigating', 'resolved'];

export interface TechnicalRisk {
  /** Sequential id starting at 1. */
  id: number;
  risk: string;
  impact: Level;
  likelihood: Level;
  mitigation: string | null;
  owner: string | null;
  status: RiskStatus;
}

export type DependencyStatus = 'pending' | 'in_progress' | 'resolved';

export const DEPENDENCY_STATUSES: readonly DependencyStatus[] = [
  'pending',
  'in_progress',
  'resolved',
];

export interface Dependency {
  name: string;
  type: string;
  description: string;
  /** Whether an unresolved dependency blocks the decision gate. */
  blocking: boolean;
  status: DependencyStatus;
  owner: string | null;
  eta: string | null;
}

export interface TechnicalDecision {
  decision: string;
  rationale: string;
  category: string;
  related_adr: number | null;
  decided_by: string;
  decided_at: string;
}

export interface EngineeringFacts extends TrackActivity {
  components: EngineeringComponent[];
  adrs: Adr[];
  estimate: EngineeringEstimate | null;
  estimate_requested: boolean;
  risks: TechnicalRisk[];
  dependencies: Dependency[];
  technical_decisions: TechnicalDecision[];
}

// ---------------------------------------------------------------------------
// Track state and record
// ---------------------------------------------------------------------------

/**
 * Persisted state of one track. `status` is always derived from `metadata`.
 */
export interface TrackState<S extends TrackStatus, F extends TrackActivity> {
  status: S;
  /** Document revision: context version, spec revision, approval round or estimate revision. */
  version: number;
  /** The track's recorded facts. */
  metadata: F;
}

export type ContextTrackState = TrackState<ContextStatus, ContextFacts>;
export type DesignTrackState = TrackState<DesignStatus, DesignFacts>;
export type BusinessCaseTrackState = TrackState<BusinessCaseStatus, BusinessCaseFacts>;
export type EngineeringTrackState = TrackState<EngineeringStatus, EngineeringFacts>;

export interface FeatureTracks {
  context: ContextTrackState;
  design: DesignTrackState;
  business_case: BusinessCaseTrackState;
  engineering: EngineeringTrackState;
}

/**
 * One feature moving through the lifecycle.
 */
export interface FeatureRecord {
  schema_version: number;
  slug: string;
  title: string;
  product_id: string;
  organization: string;
  created_at: string;
  created_by: string;
  priority: Priority;
  /** Knowledge graph entity reference, when one was created. */
  brain_entity: string | null;
  current_phase: Phase;
  /** Append-only; only the last entry is open. */
  phase_history: PhaseEntry[];
  tracks: FeatureTracks;
  artifacts: Artifacts;
  /** Append-only. */
  decisions: Decision[];
  /** Alternative names, unique case-insensitively. */
  aliases: string[];
}

/**
 * Overall progress derived from the four tracks.
 */
export type OverallStatus = 'To Do' | 'In Progress' | 'Done';
