/**
 * Feature commands: start, check, list, attach, advance, alias and the
 * operator commands archive and defer.
 */

import type { FeatureCheck } from '../../engine/index.js';
import { TRACK_LABELS, TRACK_NAMES } from '../../feature/types.js';
import { ArgumentError } from '../args.js';
import type { CliCommandResult, CliContext, ParsedArgs } from '../types.js';
import {
  formatColumns,
  formatGateStatus,
  wrapInBox,
  type DisplayOptions,
} from '../utils/displayUtils.js';
import { ok, policyOutcome, positional, restText, toJson } from './common.js';

/**
 * Handles `start <title...> --product <id> [--priority P] [--confirm]`.
 */
export function handleStartCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const usage = 'feature-lifecycle start <title> --product <id> [--priority P0-P3] [--confirm]';
  const title = restText(args, 0, 'title', usage);
  const productId = args.options.product;
  if (productId === undefined) {
    throw new ArgumentError(`Missing --product. Usage: ${usage}`);
  }

  const result = context.engine.startFeature({
    title,
    productId,
    priority: args.options.priority,
    actor: context.actor,
    confirm: args.options.confirm,
  });

  if (args.options.json) {
    return result.kind === 'created' ? ok(toJson(result.record)) : policyOutcome(toJson(result));
  }
  if (result.kind === 'created') {
    return ok(`Created feature '${result.record.slug}' (${result.record.title})`);
  }

  const lines = [`Possible duplicates of '${title}':`];
  for (const candidate of result.candidates) {
    const percent = Math.round(candidate.similarity * 100);
    lines.push(`  - ${candidate.slug} (${candidate.matched}) ${String(percent)}% similar`);
  }
  lines.push('Re-run with --confirm to create it anyway.');
  return policyOutcome(lines.join('\n'));
}

/**
 * Lines of the check report.
 *
 * @param check - The engine's snapshot.
 * @param display - Display options.
 * @returns Report lines, without a border.
 */
export function formatFeatureCheck(check: FeatureCheck, display: DisplayOptions): string[] {
  const { record } = check;
  const lines = [
    `${record.title} (${record.slug})`,
    `Product: ${record.product_id}  Priority: ${record.priority}  Organization: ${record.organization}`,
    `Phase: ${record.current_phase}  Overall: ${check.overall_status}`,
    '',
    ...formatColumns(
      TRACK_NAMES.map((track) => [
        TRACK_LABELS[track],
        check.tracks[track].status,
        `v${String(check.tracks[track].version)}`,
        formatGateStatus(check.tracks[track].gate.status, display),
      ])
    ),
    '',
  ];

  if (check.pending.length === 0) {
    lines.push(`Decision gate: ${formatGateStatus('READY', display)}`);
  } else {
    lines.push(`Decision gate: ${formatGateStatus('NOT_READY', display)}`);
    lines.push(...check.pending.map((blocker) => `  - ${blocker}`));
  }
  return lines;
}

/**
 * Handles `check <slug>`.
 */
export function handleCheckCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const slug = positional(args, 0, 'slug', 'feature-lifecycle check <slug> [--json]');
  const check = context.engine.checkFeature(slug);
  if (args.options.json) {
    return ok(toJson(check));
  }
  return ok(wrapInBox(formatFeatureCheck(check, context.display).join('\n'), context.display));
}

/**
 * Handles `list [--product <id>]`.
 */
export function handleListCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const features = context.engine.listFeatures(args.options.product);
  if (args.options.json) {
    return ok(toJson(features));
  }
  if (features.length === 0) {
    return ok('No features found');
  }
  return ok(
    formatColumns([
      ['SLUG', 'PHASE', 'STATUS', 'PRIORITY', 'TITLE'],
      ...features.map((feature) => [
        feature.slug,
        feature.current_phase,
        feature.overall_status,
        feature.priority,
        feature.title,
      ]),
    ]).join('\n')
  );
}

/**
 * Handles `attach <slug> <type> <ref>`.
 */
export function handleAttachCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const usage = 'feature-lifecycle attach <slug> <type> <ref>';
  const slug = positional(args, 0, 'slug', usage);
  const type = positional(args, 1, 'artifact type', usage);
  const ref = positional(args, 2, 'reference', usage);

  const artifacts = context.engine.attachArtifact(slug, type, ref);
  return ok(args.options.json ? toJson(artifacts) : `Attached ${type} to '${slug}'`);
}

/**
 * Handles `advance <slug> <phase>`.
 */
export function handleAdvanceCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const usage = 'feature-lifecycle advance <slug> <phase>';
  const slug = positional(args, 0, 'slug', usage);
  const phase = positional(args, 1, 'phase', usage);

  const record = context.engine.advancePhase(slug, phase, { advanced_by: context.actor });
  return ok(
    args.options.json ? toJson(record) : `Feature '${slug}' is now in ${record.current_phase}`
  );
}

/**
 * Handles `alias <slug> <alias...>`.
 */
export function handleAliasCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const usage = 'feature-lifecycle alias <slug> <alias>';
  const slug = positional(args, 0, 'slug', usage);
  const alias = restText(args, 1, 'alias', usage);

  const aliases = context.engine.addAlias(slug, alias);
  return ok(args.options.json ? toJson(aliases) : `Aliases of '${slug}': ${aliases.join(', ')}`);
}

type OperatorCommand = 'archive' | 'defer';

function runOperatorCommand(
  command: OperatorCommand,
  context: CliContext,
  args: ParsedArgs
): CliCommandResult {
  const usage = `feature-lifecycle ${command} <slug> <reason>`;
  const slug = positional(args, 0, 'slug', usage);
  const reason = restText(args, 1, 'reason', usage);
  const { engine, actor } = context;

  const record =
    command === 'archive'
      ? engine.archiveFeature(slug, reason, actor)
      : engine.deferFeature(slug, reason, actor);
  return ok(
    args.options.json ? toJson(record) : `Feature '${slug}' is now in ${record.current_phase}`
  );
}

export function handleArchiveCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  return runOperatorCommand('archive', context, args);
}

export function handleDeferCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  return runOperatorCommand('defer', context, args);
}
