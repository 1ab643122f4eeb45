/**
 * Command dispatch for the feature lifecycle CLI.
 *
 * @packageDocumentation
 */

import { getEnvVarDocumentation } from '../config/index.js';
import { ArgumentError, parseArgs } from './args.js';
import { createCliApp, getDisplayOptions } from './app.js';
import {
  handleAdvanceCommand,
  handleAliasCommand,
  handleArchiveCommand,
  handleAttachCommand,
  handleCheckCommand,
  handleDeferCommand,
  handleListCommand,
  handleStartCommand,
} from './commands/feature.js';
import { handleApproveCommand, handleRejectCommand, handleValidateCommand } from './commands/gate.js';
import { ok } from './commands/common.js';
import { handleTrackCommand } from './commands/track.js';
import { handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler, CliCommandResult, CliContextFactory } from './types.js';
import { formatColumns } from './utils/displayUtils.js';
import { toErrorResult } from './utils/errorHandling.js';

const HELP_TEXT = `
Feature Lifecycle CLI

USAGE:
  feature-lifecycle <command> [arguments] [options]

COMMANDS:
  start       Start a feature (checks for duplicates first)
  check       Show a feature's phase, tracks and gate status
  list        List features
  validate    Evaluate decision gate readiness
  approve     Approve the decision gate
  reject      Reject the decision gate
  track       Apply an action to a track
  attach      Attach an artifact reference
  advance     Move a feature to another phase
  alias       Add an alternative name
  archive     Archive a feature
  defer       Defer a feature
  help        Show this help message
  version     Show version information

OPTIONS:
  --config, -c <path>   Config file (default: config.yaml)
  --product, -p <id>    Product id
  --priority <P0-P3>    Priority of a new feature (default: P2)
  --actor <name>        Who performs the command (default: $USER)
  --payload <json>      Track action payload
  --phase <phase>       Phase to scope validation to
  --force               Approve despite blockers
  --confirm             Create a feature despite duplicate candidates
  --json                Print JSON
  --help, -h            Show help for a command

EXIT CODES:
  0  success
  1  invalid input or failure
  2  gate or policy outcome (not ready, duplicate candidates)
`;

const COMMAND_HELP: Readonly<Record<string, string>> = {
  start: `
USAGE: feature-lifecycle start <title> --product <id> [--priority P0-P3] [--confirm]

Creates a feature in the initialization phase. When features of the same
product have similar names, lists them and exits with 2 unless --confirm
is given.

EXAMPLES:
  feature-lifecycle start OTP Checkout Recovery --product meal-kit
  feature-lifecycle start "OTP Checkout Recovery" -p meal-kit --confirm
`,
  check: `
USAGE: feature-lifecycle check <slug> [--json]

Shows the phase, the four tracks with their gate status and the open
blockers of the decision gate.
`,
  list: `
USAGE: feature-lifecycle list [--product <id>] [--json]
`,
  validate: `
USAGE: feature-lifecycle validate <slug> [--phase <phase>] [--json]

Exits with 2 when the feature is not ready. --phase context_doc checks the
context track alone.
`,
  approve: `
USAGE: feature-lifecycle approve <slug> <reason> [--force]

Approves the decision gate and moves the feature to output_generation.
With --force, approves despite blockers; they stay on record.
`,
  reject: `
USAGE: feature-lifecycle reject <slug> <reason>

Rejects the decision gate and returns the feature to parallel_tracks.
`,
  track: `
USAGE: feature-lifecycle track <slug> <track> <action> [--payload '<json>']

TRACKS AND ACTIONS:
  every track     start, block {reason}, unblock
  context         submit_version {version, score?, document?}, record_challenge {score}
  design          record_spec {ref}, attach_wireframes {ref}, attach_figma {ref}
  business_case   update_assumptions, submit_for_approval,
                  record_approval {approver, approved, approval_type?, reference?, notes?}
  engineering     add_component {name, description?}, create_adr {title, ...},
                  update_adr_status {number, status}, request_estimate,
                  record_estimate {overall, confidence?, breakdown?, assumptions?},
                  add_risk {risk, impact?, likelihood?, mitigation?, owner?},
                  mitigate_risk {id, mitigation, status?},
                  add_dependency {name, type?, description?, blocking?, status?, owner?, eta?},
                  update_dependency {name, status, eta?},
                  record_technical_decision {decision, rationale, category?, related_adr?}

EXAMPLES:
  feature-lifecycle track mea-otp-checkout-recovery context submit_version --payload '{"version":1,"score":40}'
`,
  attach: `
USAGE: feature-lifecycle attach <slug> <figma|wireframes|jira_epic|confluence_page|gdocs> <ref>
`,
  advance: `
USAGE: feature-lifecycle advance <slug> <phase>

Moves along initialization -> signal_analysis -> context_doc ->
parallel_tracks -> decision_gate. Use approve to leave decision_gate.
`,
  alias: `
USAGE: feature-lifecycle alias <slug> <alias>
`,
  archive: `
USAGE: feature-lifecycle archive <slug> <reason>
`,
  defer: `
USAGE: feature-lifecycle defer <slug> <reason>

Deferred is terminal: a deferred feature takes no further phase changes.
`,
};

const COMMANDS: Readonly<Record<string, CliCommandHandler>> = {
  start: handleStartCommand,
  check: handleCheckCommand,
  list: handleListCommand,
  validate: handleValidateCommand,
  approve: handleApproveCommand,
  reject: handleRejectCommand,
  track: handleTrackCommand,
  attach: handleAttachCommand,
  advance: handleAdvanceCommand,
  alias: handleAliasCommand,
  archive: handleArchiveCommand,
  defer: handleDeferCommand,
};

/**
 * The ENVIRONMENT section of the general help: one line per
 * `FEATURE_ENGINE_*` override.
 */
export function formatEnvironmentHelp(): string {
  const rows = Object.entries(getEnvVarDocumentation()).map(([name, doc]) => [
    `  ${name}`,
    doc.type,
    doc.description,
  ]);
  return `ENVIRONMENT (overrides config.yaml):\n${formatColumns(rows).join('\n')}\n`;
}

/**
 * Help text of one command, or the general help.
 *
 * @param command - Command name; omitted for the general help.
 * @returns The help text, or undefined for an unknown command.
 */
export function getHelpText(command?: string): string | undefined {
  if (command === undefined) {
    return `${HELP_TEXT}\n${formatEnvironmentHelp()}`;
  }
  return COMMAND_HELP[command];
}

/**
 * Runs one command line.
 *
 * @param argv - Arguments after the program name.
 * @param createContext - Context factory; reads config.yaml by default.
 * @returns The command result. Errors are returned, not thrown.
 */
export function runCli(
  argv: readonly string[],
  createContext: CliContextFactory = createCliApp
): CliCommandResult {
  const display = getDisplayOptions();
  try {
    const args = parseArgs(argv);
    const { command } = args;

    if (command === '' || command === 'help') {
      const topic = args.positionals[0];
      const help = getHelpText(topic);
      if (help === undefined) {
        throw new ArgumentError(`Unknown command: ${topic ?? ''}`);
      }
      return ok(help);
    }
    if (command === 'version') {
      return handleVersionCommand();
    }

    const handler = COMMANDS[command];
    if (handler === undefined) {
      throw new ArgumentError(`Unknown command: ${command}. Run "feature-lifecycle help" for usage.`);
    }
    if (args.options.help) {
      return ok(getHelpText(command) ?? HELP_TEXT);
    }

    const context = createContext(args.options);
    try {
      return handler(context, args);
    } catch (error) {
      return toErrorResult(error, context.display);
    }
  } catch (error) {
    return toErrorResult(error, display);
  }
}
