/**
 * Command dispatch for the interview CLI.
 */

import { getEnvVarDocumentation } from '../config/index.js';
import { handleRunCommand } from './commands/run.js';
import { handleValidateCommand } from './commands/validate.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { CliContext, OutputWriter } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Displays usage information.
 */
export function showHelp(output: OutputWriter): void {
  output.line(`
Interview CLI v${getVersionFromPackageJson()}

USAGE:
  interview <command> [options]

COMMANDS:
  run         Run an interview in the terminal
  validate    Load the configuration and scripts and report problems
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  interview run registration
  interview run registration --context '{"event": "Meetup"}'
  interview validate --script interviews.yml
  interview help config
`);
}

const COMMAND_HELP: Readonly<Record<string, string>> = {
  run: `
USAGE: interview run <interview-id> [options]

Runs an interview, asking each question in turn. Prints the collected
data when the interview completes, or the exit message when it ends early.

OPTIONS:
  --config <file>    Configuration file (default: ./interview.toml if present)
  --script <file>    Script file to load instead of the configured ones; may repeat
  --context <json>   Read-only context object visible as "context"
  --data <json>      Pre-filled answers
  --target <tag>     Tag stored with the interview state

EXAMPLES:
  interview run registration
  interview run survey --script surveys.json --target spring
`,
  validate: `
USAGE: interview validate [options]

Loads the configuration and every script and lists the interviews found.
Unsatisfied references are logged as warnings.

OPTIONS:
  --config <file>    Configuration file (default: ./interview.toml if present)
  --script <file>    Script file to load instead of the configured ones; may repeat
`,
  config: `
CONFIGURATION: interview.toml

  [scripts]
  paths = ["interviews.yml"]        Script files, relative to the configuration file

  [storage]
  backend = "memory"                "memory" or "file"
  directory = ".interviews/state"   Directory of the file backend
  ttl_seconds = 86400               Record lifetime; 0 keeps records forever
  max_entries = 10000               Memory backend limit; 0 for none

  [evaluation]
  cache_size = 1024                 Compiled expressions kept

  [logging]
  debug = false                     Write debug events to stderr
`,
};

function environmentHelp(): string {
  const lines = Object.entries(getEnvVarDocumentation()).map(
    ([name, { description, type }]) => `  ${name} (${type})\n      ${description}`
  );
  return `ENVIRONMENT (overrides interview.toml):\n${lines.join('\n')}\n`;
}

/**
 * Shows help for a specific command.
 *
 * @returns Whether the command is known.
 */
export function showHelpForCommand(commandName: string, output: OutputWriter): boolean {
  const help = COMMAND_HELP[commandName];
  if (help === undefined) {
    output.error(`Unknown command: ${commandName}`);
    output.error('\nRun "interview help" to see all available commands.');
    return false;
  }
  output.line(help);
  if (commandName === 'config') {
    output.line(environmentHelp());
  }
  return true;
}

function wantsHelp(args: readonly string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the program name.
 * @param context - Everything but the command arguments.
 * @returns The exit code.
 */
export async function runCli(
  argv: readonly string[],
  context: Omit<CliContext, 'args'>
): Promise<number> {
  const [command, ...commandArgs] = argv;
  const { output } = context;

  switch (command) {
    case undefined:
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const [topic] = commandArgs;
      if (topic !== undefined) {
        return showHelpForCommand(topic, output) ? 0 : 1;
      }
      showHelp(output);
      return 0;
    }

    case 'version':
    case '--version':
    case '-v':
      return withErrorHandling(context, () => handleVersionCommand(context));

    case 'run':
      if (wantsHelp(commandArgs)) {
        showHelpForCommand('run', output);
        return 0;
      }
      return withErrorHandling(context, () => handleRunCommand({ ...context, args: commandArgs }));

    case 'validate':
      if (wantsHelp(commandArgs)) {
        showHelpForCommand('validate', output);
        return 0;
      }
      return withErrorHandling(context, () =>
        handleValidateCommand({ ...context, args: commandArgs })
      );

    default:
      output.error(`Error: Unknown command: ${command}`);
      output.error('\nRun "interview help" for usage information.');
      return 1;
  }
}
