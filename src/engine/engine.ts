/**
 * The feature engine: the command surface over the record store, the track
 * state machines, the quality gates and the phase state machine.
 *
 * Every command is a synchronous read-modify-write of one record. Two engines
 * writing the same feature concurrently follow last-writer-wins.
 *
 * @packageDocumentation
 */

import { AliasIndex, type DuplicateCandidate } from '../aliases/index.js';
import { DEFAULT_ORGANIZATION } from '../config/defaults.js';
import { resolveGateConfig } from '../config/parser.js';
import type { Config, GateConfig } from '../config/types.js';
import {
  addAlias,
  createFeatureRecord,
  deriveOverallStatus,
  generateSlug,
  isArtifactType,
  isPriority,
  isTrackName,
  isValidSlug,
  setArtifact,
} from '../feature/record.js';
import {
  ARTIFACT_TYPES,
  PRIORITIES,
  TRACK_NAMES,
  type Artifacts,
  type FeatureRecord,
  type FeatureTracks,
  type Metadata,
  type OverallStatus,
  type Phase,
  type Priority,
  type TrackName,
  type TrackStatus,
} from '../feature/types.js';
import { DecisionGateController } from '../gates/decision.js';
import type { DecisionResult, TrackGateResult } from '../gates/types.js';
import {
  InvalidTransitionError,
  advancePhase,
  createTransitionError,
  isPhase,
  operatorTransition,
} from '../lifecycle/phases.js';
import type { FeatureStore } from '../store/store.js';
import { TRACK_ACTIONS, applyTrackAction, isTrackAction, refreshDesignStatus } from '../tracks/index.js';
import { getLogger } from '../utils/logger.js';
import type { BrainEntityCreator, OutputGenerator } from './collaborators.js';
import { FeatureEngineError } from './errors.js';

const logger = getLogger('FeatureEngine');

/** Actor recorded when a command names none. */
export const DEFAULT_ACTOR = 'system';

/**
 * Options for creating a {@link FeatureEngine}.
 */
export interface FeatureEngineOptions {
  config: Config;
  store: FeatureStore;
  /** Clock; defaults to the system time. */
  now?: (() => Date) | undefined;
  brain?: BrainEntityCreator | undefined;
  outputs?: OutputGenerator | undefined;
}

/**
 * Input of {@link FeatureEngine.startFeature}.
 */
export interface StartFeatureInput {
  title: string;
  productId: string;
  priority?: string | undefined;
  actor?: string | undefined;
  /** Create the feature even when similar features exist. */
  confirm?: boolean | undefined;
}

/**
 * Outcome of {@link FeatureEngine.startFeature}.
 */
export type StartFeatureResult =
  | { kind: 'created'; record: FeatureRecord }
  | { kind: 'duplicate_candidate'; candidates: DuplicateCandidate[] };

/**
 * One track in a {@link FeatureCheck}.
 */
export interface TrackCheck {
  status: TrackStatus;
  version: number;
  gate: TrackGateResult;
}

/**
 * Snapshot returned by {@link FeatureEngine.checkFeature}.
 */
export interface FeatureCheck {
  record: FeatureRecord;
  overall_status: OverallStatus;
  tracks: Record<TrackName, TrackCheck>;
  /** Decision gate readiness. */
  readiness: DecisionResult;
  /** Open blockers, in track order. */
  pending: readonly string[];
}

/**
 * One row of {@link FeatureEngine.listFeatures}.
 */
export interface FeatureSummary {
  slug: string;
  title: string;
  product_id: string;
  priority: Priority;
  current_phase: Phase;
  overall_status: OverallStatus;
  tracks: Record<TrackName, TrackStatus>;
}

/**
 * Input of {@link FeatureEngine.decisionGate}.
 */
export interface DecisionGateInput {
  reason: string;
  force?: boolean | undefined;
  actor?: string | undefined;
}

export type GateVerdict = 'approve' | 'reject';

function trackStatuses(tracks: FeatureTracks): Record<TrackName, TrackStatus> {
  return {
    context: tracks.context.status,
    design: tracks.design.status,
    business_case: tracks.business_case.status,
    engineering: tracks.engineering.status,
  };
}

function requireText(value: string, field: string, slug?: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new FeatureEngineError('MALFORMED_PAYLOAD', `${field} must not be empty`, slug);
  }
  return trimmed;
}

function requirePhase(value: string, slug: string): Phase {
  if (!isPhase(value)) {
    throw new FeatureEngineError('MALFORMED_PAYLOAD', `Unknown phase '${value}'`, slug);
  }
  return value;
}

/**
 * Runs the feature lifecycle over a record store.
 *
 * @example
 * ```typescript
 * const engine = new FeatureEngine({ config, store: new FileFeatureStore('.features') });
 * const result = engine.startFeature({ title: 'OTP Checkout Recovery', productId: 'meal-kit' });
 * ```
 */
export class FeatureEngine {
  private readonly config: Config;
  private readonly store: FeatureStore;
  private readonly clock: () => Date;
  private readonly brain: BrainEntityCreator | undefined;
  private readonly outputs: OutputGenerator | undefined;
  private readonly aliases: AliasIndex;

  constructor(options: FeatureEngineOptions) {
    this.config = options.config;
    this.store = options.store;
    this.clock = options.now ?? ((): Date => new Date());
    this.brain = options.brain;
    this.outputs = options.outputs;
    this.aliases = new AliasIndex(options.config.aliases.similarity_threshold);
  }

  /**
   * Creates a feature in `initialization`.
   *
   * Similar features of the same product are reported instead, unless
   * `confirm` is set; the overridden candidates are then recorded in the
   * first phase entry as `duplicate_override`.
   *
   * @param input - Title, product and options.
   * @returns The created record or the duplicate candidates.
   * @throws FeatureEngineError with `UNKNOWN_PRODUCT`, `SLUG_CONFLICT` or
   *   `MALFORMED_PAYLOAD`.
   */
  startFeature(input: StartFeatureInput): StartFeatureResult {
    const title = requireText(input.title, 'Title');
    const productId = requireText(input.productId, 'Product id');
    const priority = this.resolvePriority(input.priority);
    const product = this.config.products[productId];
    if (product === undefined && Object.keys(this.config.products).length > 0) {
      throw new FeatureEngineError(
        'UNKNOWN_PRODUCT',
        `Unknown product '${productId}'. Configured products: ${Object.keys(this.config.products).sort().join(', ')}`
      );
    }

    const slug = generateSlug(title, productId);
    if (!isValidSlug(slug)) {
      throw new FeatureEngineError(
        'MALFORMED_PAYLOAD',
        `Title '${title}' does not produce a usable slug`
      );
    }

    const candidates = this.aliases.findCandidates(title, productId, this.loadAll());
    if (candidates.length > 0 && input.confirm !== true) {
      logger.info('duplicate_candidate_found', {
        title,
        productId,
        candidates: candidates.map((candidate) => candidate.slug),
      });
      return { kind: 'duplicate_candidate', candidates };
    }

    if (this.store.exists(slug)) {
      throw new FeatureEngineError('SLUG_CONFLICT', `Feature '${slug}' already exists`, slug);
    }

    const actor = input.actor ?? DEFAULT_ACTOR;
    let record = createFeatureRecord({
      title,
      productId,
      organization: product?.organization ?? DEFAULT_ORGANIZATION,
      priority,
      createdBy: actor,
      createdAt: this.timestamp(),
      metadata:
        candidates.length > 0
          ? { duplicate_override: candidates.map((candidate) => candidate.slug) }
          : {},
    });
    if (this.brain !== undefined) {
      record = { ...record, brain_entity: this.brain.create(record) };
    }

    this.store.save(slug, record);
    logger.info('feature_created', { slug, productId, actor, duplicateOverride: candidates.length });
    return { kind: 'created', record };
  }

  /**
   * Reports a feature's state and gate status.
   *
   * @param slug - Feature slug.
   * @returns The snapshot.
   */
  checkFeature(slug: string): FeatureCheck {
    const record = this.load(slug);
    const readiness = this.controllerFor(record).validate(record);
    const trackCheck = (track: TrackName, gate: TrackGateResult): TrackCheck => ({
      status: record.tracks[track].status,
      version: record.tracks[track].version,
      gate,
    });
    const [context, design, businessCase, engineering] = readiness.tracks;
    if (
      context === undefined ||
      design === undefined ||
      businessCase === undefined ||
      engineering === undefined
    ) {
      throw new Error(`Incomplete gate evaluation for '${slug}'`);
    }

    return {
      record,
      overall_status: deriveOverallStatus(record),
      tracks: {
        context: trackCheck('context', context),
        design: trackCheck('design', design),
        business_case: trackCheck('business_case', businessCase),
        engineering: trackCheck('engineering', engineering),
      },
      readiness,
      pending: readiness.blockers,
    };
  }

  /**
   * Applies one track action.
   *
   * @param slug - Feature slug.
   * @param track - Track name.
   * @param action - Action name.
   * @param payload - Untrusted action payload.
   * @param actor - Who acts.
   * @returns The track's new state.
   * @throws FeatureEngineError with `UNKNOWN_TRACK` or `UNKNOWN_ACTION`.
   * @throws TrackOperationError when the track rejects the action.
   */
  advanceTrack(
    slug: string,
    track: string,
    action: string,
    payload: unknown = {},
    actor: string = DEFAULT_ACTOR
  ): FeatureTracks[TrackName] {
    if (!isTrackName(track)) {
      throw new FeatureEngineError(
        'UNKNOWN_TRACK',
        `Unknown track '${track}'. Valid tracks: ${TRACK_NAMES.join(', ')}`,
        slug
      );
    }
    if (!isTrackAction(track, action)) {
      throw new FeatureEngineError(
        'UNKNOWN_ACTION',
        `Unknown ${track} action '${action}'. Valid actions: ${TRACK_ACTIONS[track].join(', ')}`,
        slug
      );
    }

    const record = this.load(slug);
    const updated = applyTrackAction(record, track, action, payload, {
      actor,
      now: this.timestamp(),
      gates: this.gatesFor(record),
    });
    this.store.save(slug, updated);

    logger.debug('track_advanced', { slug, track, action, status: updated.tracks[track].status });
    return updated.tracks[track];
  }

  /**
   * Adds or replaces an artifact reference. Figma and wireframe references
   * also update the design track.
   *
   * @param slug - Feature slug.
   * @param type - Artifact type.
   * @param ref - Reference such as a URL.
   * @returns The new artifacts map.
   * @throws FeatureEngineError with `INVALID_ARTIFACT_TYPE` or `MALFORMED_PAYLOAD`.
   */
  attachArtifact(slug: string, type: string, ref: string): Artifacts {
    if (!isArtifactType(type)) {
      throw new FeatureEngineError(
        'INVALID_ARTIFACT_TYPE',
        `Unknown artifact type '${type}'. Valid types: ${ARTIFACT_TYPES.join(', ')}`,
        slug
      );
    }
    const reference = requireText(ref, 'Artifact reference', slug);

    const record = this.load(slug);
    let updated = setArtifact(record, type, reference);
    if (type === 'figma' || type === 'wireframes') {
      updated = {
        ...updated,
        tracks: {
          ...updated.tracks,
          design: refreshDesignStatus(updated.tracks.design, {
            gates: this.gatesFor(record),
            artifacts: updated.artifacts,
          }),
        },
      };
    }
    this.store.save(slug, updated);

    logger.debug('artifact_attached', { slug, type });
    return updated.artifacts;
  }

  /**
   * Evaluates decision gate readiness without changing the feature.
   *
   * @param slug - Feature slug.
   * @param phase - Phase to scope the evaluation to.
   * @returns The validation result.
   */
  validateFeature(slug: string, phase?: string): DecisionResult {
    const record = this.load(slug);
    const scope = phase === undefined ? undefined : requirePhase(phase, slug);
    return this.controllerFor(record).validate(record, scope);
  }

  /**
   * Approves or rejects the decision gate.
   *
   * @param slug - Feature slug.
   * @param verdict - `approve` or `reject`.
   * @param input - Reason, force flag and actor.
   * @returns The updated record.
   * @throws GateNotReadyError when approval is requested for a feature that
   *   is not ready and not forced.
   */
  decisionGate(slug: string, verdict: GateVerdict, input: DecisionGateInput): FeatureRecord {
    const reason = requireText(input.reason, 'Reason', slug);
    const record = this.load(slug);
    const controller = this.controllerFor(record);
    const request = {
      reason,
      actor: input.actor ?? DEFAULT_ACTOR,
      now: this.timestamp(),
      force: input.force,
    };
    const updated =
      verdict === 'approve' ? controller.approve(record, request) : controller.reject(record, request);
    this.store.save(slug, updated);
    return updated;
  }

  /**
   * Moves a feature to another phase.
   *
   * `output_generation` is entered through the decision gate only, and
   * `archived`/`deferred` through the operator commands.
   *
   * @param slug - Feature slug.
   * @param target - Phase to enter.
   * @param metadata - Metadata of the new history entry.
   * @returns The updated record.
   * @throws InvalidTransitionError when the phase cannot be entered.
   */
  advancePhase(slug: string, target: string, metadata: Metadata = {}): FeatureRecord {
    const record = this.load(slug);
    const phase = requirePhase(target, slug);
    if (phase === 'output_generation' && record.current_phase !== phase) {
      throw new InvalidTransitionError(
        'INVALID_TRANSITION',
        `'output_generation' is entered by approving the decision gate; feature is in '${record.current_phase}'`,
        record.current_phase,
        phase
      );
    }

    const updated = advancePhase(record, phase, this.timestamp(), metadata);
    if (updated !== record) {
      this.store.save(slug, updated);
    }
    return updated;
  }

  /**
   * Archives a feature from any non-terminal phase.
   *
   * @param slug - Feature slug.
   * @param reason - Why.
   * @param actor - Who.
   * @returns The updated record.
   */
  archiveFeature(slug: string, reason: string, actor: string = DEFAULT_ACTOR): FeatureRecord {
    return this.operate(slug, reason, actor, (record, action) =>
      operatorTransition(record, 'archived', action)
    );
  }

  /**
   * Defers a feature from any non-terminal phase.
   *
   * @param slug - Feature slug.
   * @param reason - Why.
   * @param actor - Who.
   * @returns The updated record.
   */
  deferFeature(slug: string, reason: string, actor: string = DEFAULT_ACTOR): FeatureRecord {
    return this.operate(slug, reason, actor, (record, action) =>
      operatorTransition(record, 'deferred', action)
    );
  }

  /**
   * Adds an alternative name to a feature.
   *
   * @param slug - Feature slug.
   * @param alias - Alternative name.
   * @returns The feature's aliases.
   */
  addAlias(slug: string, alias: string): string[] {
    const name = requireText(alias, 'Alias', slug);
    const record = this.load(slug);
    const updated = addAlias(record, name);
    if (updated !== record) {
      this.store.save(slug, updated);
      logger.debug('alias_added', { slug, alias: name });
    }
    return updated.aliases;
  }

  /**
   * Lists features, optionally of one product, sorted by slug.
   *
   * @param productId - Product to filter by.
   * @returns One summary per feature.
   */
  listFeatures(productId?: string): FeatureSummary[] {
    return this.loadAll()
      .filter((record) => productId === undefined || record.product_id === productId)
      .map((record) => ({
        slug: record.slug,
        title: record.title,
        product_id: record.product_id,
        priority: record.priority,
        current_phase: record.current_phase,
        overall_status: deriveOverallStatus(record),
        tracks: trackStatuses(record.tracks),
      }));
  }

  /**
   * Generates the final documents of an approved feature and completes it.
   *
   * @param slug - Feature in `output_generation`.
   * @param documents - Names of the documents to produce.
   * @returns Paths of the generated files.
   * @throws FeatureEngineError with `NOT_CONFIGURED` when no generator was given.
   * @throws InvalidTransitionError from any other phase.
   */
  generateOutputs(slug: string, documents: readonly string[]): string[] {
    if (this.outputs === undefined) {
      throw new FeatureEngineError('NOT_CONFIGURED', 'No output generator is configured', slug);
    }
    const record = this.load(slug);
    if (record.current_phase !== 'output_generation') {
      throw createTransitionError(record.current_phase, 'complete');
    }

    const paths = this.outputs.generate(record, documents);
    const updated = advancePhase(record, 'complete', this.timestamp(), {
      documents: [...documents],
      outputs: paths,
    });
    this.store.save(slug, updated);

    logger.info('outputs_generated', { slug, outputs: paths.length });
    return paths;
  }

  private operate(
    slug: string,
    reason: string,
    actor: string,
    transition: (
      record: FeatureRecord,
      action: { actor: string; reason: string; now: string }
    ) => FeatureRecord
  ): FeatureRecord {
    const text = requireText(reason, 'Reason', slug);
    const updated = transition(this.load(slug), { actor, reason: text, now: this.timestamp() });
    this.store.save(slug, updated);
    return updated;
  }

  private load(slug: string): FeatureRecord {
    const record = isValidSlug(slug) ? this.store.load(slug) : undefined;
    if (record === undefined) {
      throw new FeatureEngineError('FEATURE_NOT_FOUND', `Feature '${slug}' not found`, slug);
    }
    return record;
  }

  private loadAll(): FeatureRecord[] {
    return this.store.list().flatMap((key) => {
      const record = this.store.load(key);
      return record === undefined ? [] : [record];
    });
  }

  private gatesFor(record: FeatureRecord): GateConfig {
    return resolveGateConfig(this.config, record.product_id);
  }

  private controllerFor(record: FeatureRecord): DecisionGateController {
    return new DecisionGateController(this.gatesFor(record));
  }

  private resolvePriority(value: string | undefined): Priority {
    if (value === undefined) {
      return 'P2';
    }
    if (!isPriority(value)) {
      throw new FeatureEngineError(
        'MALFORMED_PAYLOAD',
        `Unknown priority '${value}'. Valid priorities: ${PRIORITIES.join(', ')}`
      );
    }
    return value;
  }

  private timestamp(): string {
    return this.clock().toISOString();
  }
}
