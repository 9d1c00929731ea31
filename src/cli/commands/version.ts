/**
 * Version command handler for the interview CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { getOwn, isJsonObject } from '../../utils/json.js';
import type { CliCommandResult, CliContext } from '../types.js';

const PACKAGE_JSON_PATH = fileURLToPath(new URL('../../../package.json', import.meta.url));

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(packageJsonPath = PACKAGE_JSON_PATH): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    const version = isJsonObject(packageJson) ? getOwn(packageJson, 'version') : undefined;
    return typeof version === 'string' ? version : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(context: Pick<CliContext, 'output'>): CliCommandResult {
  context.output.line(`interview v${getVersionFromPackageJson()}`);
  return { exitCode: 0 };
}
