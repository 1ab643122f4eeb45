/**
 * Decision gate commands: validate, approve and reject.
 */

import type { DecisionResult } from '../../gates/index.js';
import type { CliCommandResult, CliContext, ParsedArgs } from '../types.js';
import { formatGateStatus, type DisplayOptions } from '../utils/displayUtils.js';
import { ok, policyOutcome, positional, restText, toJson } from './common.js';

/**
 * Lines of a validation report.
 *
 * @param result - Validation result.
 * @param display - Display options.
 * @returns The status line followed by one line per blocker.
 */
export function formatDecisionResult(result: DecisionResult, display: DisplayOptions): string[] {
  return [
    `${formatGateStatus(result.status, display)} (${result.phase})`,
    ...result.blockers.map((blocker) => `  - ${blocker}`),
  ];
}

/**
 * Handles `validate <slug> [--phase <phase>]`. NOT_READY exits with 2.
 */
export function handleValidateCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const slug = positional(args, 0, 'slug', 'feature-lifecycle validate <slug> [--phase <phase>]');
  const result = context.engine.validateFeature(slug, args.options.phase);
  const message = args.options.json
    ? toJson(result)
    : formatDecisionResult(result, context.display).join('\n');
  return result.status === 'READY' ? ok(message) : policyOutcome(message);
}

/**
 * Handles `approve <slug> <reason...> [--force]`.
 */
export function handleApproveCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const usage = 'feature-lifecycle approve <slug> <reason> [--force]';
  const slug = positional(args, 0, 'slug', usage);
  const reason = restText(args, 1, 'reason', usage);

  const record = context.engine.decisionGate(slug, 'approve', {
    reason,
    force: args.options.force,
    actor: context.actor,
  });
  if (args.options.json) {
    return ok(toJson(record));
  }

  const decision = record.decisions[record.decisions.length - 1];
  const bypassed = decision?.metadata['bypassed_blockers'];
  const suffix = Array.isArray(bypassed)
    ? ` (forced past ${String(bypassed.length)} blocker(s))`
    : '';
  return ok(
    `Decision gate approved for '${slug}'${suffix}; phase is now ${record.current_phase}`
  );
}

/**
 * Handles `reject <slug> <reason...>`.
 */
export function handleRejectCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const usage = 'feature-lifecycle reject <slug> <reason>';
  const slug = positional(args, 0, 'slug', usage);
  const reason = restText(args, 1, 'reason', usage);

  const record = context.engine.decisionGate(slug, 'reject', { reason, actor: context.actor });
  return ok(
    args.options.json
      ? toJson(record)
      : `Decision gate rejected for '${slug}'; phase is now ${record.current_phase}`
  );
}
