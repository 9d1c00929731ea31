/**
 * Validate command handler for the interview CLI.
 *
 * Loads the configuration and every script without running anything.
 * Script warnings are logged while loading.
 */

import { createCliApp } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { CliUsageError, lastValue, parseArgs } from '../utils/args.js';
import { paint } from '../utils/displayUtils.js';

/**
 * Handles the validate command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleValidateCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, { values: ['config', 'script'], flags: [] });
  if (parsed.positionals.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${parsed.positionals.join(' ')}`);
  }
  const configPath = lastValue(parsed, 'config');
  const scripts = parsed.values.get('script');

  const app = await createCliApp({
    cwd: context.cwd,
    env: context.env,
    ...(configPath !== undefined && { configPath }),
    ...(scripts !== undefined && { scripts }),
  });

  const { output, display } = context;
  output.line(`Configuration: ${app.loaded.source ?? '(defaults)'}`);
  output.line(
    `${paint('OK', 'green', display)} ${String(app.interviews.size)} interview(s) in ${String(app.scriptPaths.length)} script(s)`
  );
  for (const interview of app.interviews.values()) {
    output.line(
      `  - ${interview.id}: ${String(interview.questions.size)} question(s), ${String(interview.steps.length)} step(s)`
    );
  }
  return { exitCode: 0 };
}
