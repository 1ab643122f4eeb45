/**
 * Version command handler for the feature lifecycle CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { isRecord } from '../../config/index.js';
import { safeReadFileSync } from '../../utils/safe-fs.js';
import { getLogger } from '../../utils/logger.js';
import type { CliCommandResult } from '../types.js';
import { ok } from './common.js';

const logger = getLogger('cli');

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../../../package.json');
  try {
    const packageJson: unknown = JSON.parse(safeReadFileSync(packageJsonPath));
    if (isRecord(packageJson) && typeof packageJson['version'] === 'string') {
      return packageJson['version'];
    }
  } catch (error) {
    logger.debug('package_version_unavailable', {
      path: packageJsonPath,
      message: error instanceof Error ? error.message : String(error),
    });
  }
  return '(unknown)';
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  return ok(`feature-lifecycle v${getVersionFromPackageJson()}`);
}
