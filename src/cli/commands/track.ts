/**
 * Track command: applies one action to one track.
 */

import { isTrackName } from '../../feature/record.js';
import { TRACK_LABELS } from '../../feature/types.js';
import { ArgumentError } from '../args.js';
import type { CliCommandResult, CliContext, ParsedArgs } from '../types.js';
import { ok, positional, toJson } from './common.js';

const USAGE = "feature-lifecycle track <slug> <track> <action> [--payload '<json>']";

/**
 * Parses the `--payload` option.
 *
 * @param text - JSON text, or undefined for an empty payload.
 * @returns The parsed value.
 * @throws ArgumentError for invalid JSON.
 */
export function parsePayload(text: string | undefined): unknown {
  if (text === undefined) {
    return {};
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArgumentError(`--payload is not valid JSON: ${reason}`);
  }
}

/**
 * Handles `track <slug> <track> <action> [--payload <json>]`.
 */
export function handleTrackCommand(context: CliContext, args: ParsedArgs): CliCommandResult {
  const slug = positional(args, 0, 'slug', USAGE);
  const track = positional(args, 1, 'track', USAGE);
  const action = positional(args, 2, 'action', USAGE);
  const payload = parsePayload(args.options.payload);

  const state = context.engine.advanceTrack(slug, track, action, payload, context.actor);
  if (args.options.json) {
    return ok(toJson(state));
  }
  const label = isTrackName(track) ? TRACK_LABELS[track] : track;
  return ok(`${label} track of '${slug}' is now ${state.status} (v${String(state.version)})`);
}
