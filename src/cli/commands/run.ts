/**
 * Run command handler for the interview CLI.
 *
 * Runs one interview in the terminal, asking each pending question until
 * the interview completes or exits.
 */

import { ValidationError } from '../../errors.js';
import type { EngineResult, InterviewEngine } from '../../interview/engine.js';
import { isJsonObject, isJsonValue, type JsonObject } from '../../utils/json.js';
import { createCliApp } from '../app.js';
import { promptQuestion, reportRejection } from '../prompt.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { CliUsageError, lastValue, parseArgs } from '../utils/args.js';
import { paint, wrapInBox } from '../utils/displayUtils.js';

const RUN_OPTIONS = ['config', 'script', 'context', 'data', 'target'];

/**
 * Parses a JSON object given on the command line.
 *
 * @throws CliUsageError when the text is not a JSON object.
 */
export function parseJsonOption(name: string, text: string): JsonObject {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliUsageError(`--${name} is not valid JSON: ${reason}`);
  }
  if (!isJsonObject(value) || !isJsonValue(value)) {
    throw new CliUsageError(`--${name} must be a JSON object`);
  }
  return value;
}

/**
 * Answers questions until the interview stops asking.
 */
async function answerQuestions(
  engine: InterviewEngine,
  first: EngineResult,
  context: CliContext
): Promise<EngineResult> {
  const { input, output, display } = context;
  let result = first;
  while (result.status === 'awaiting_answer' && result.content?.type === 'question') {
    const { question } = result.content;
    output.line();
    const responses = await promptQuestion(question, input, output, display);
    try {
      result = await engine.update(result.key, responses);
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      // The previous key is untouched by a rejected update; ask again.
      reportRejection(question, error.validationDetails, output, display);
    }
  }
  return result;
}

/**
 * Handles the run command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleRunCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, { values: RUN_OPTIONS, flags: [] });
  const [interviewId, ...extra] = parsed.positionals;
  if (interviewId === undefined) {
    throw new CliUsageError('Missing interview id');
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra.join(' ')}`);
  }

  const configPath = lastValue(parsed, 'config');
  const scripts = parsed.values.get('script');
  const contextText = lastValue(parsed, 'context');
  const dataText = lastValue(parsed, 'data');
  const target = lastValue(parsed, 'target');

  const app = await createCliApp({
    cwd: context.cwd,
    env: context.env,
    ...(configPath !== undefined && { configPath }),
    ...(scripts !== undefined && { scripts }),
  });

  const started = await app.engine.start(interviewId, {
    ...(target !== undefined && { target }),
    ...(contextText !== undefined && { context: parseJsonOption('context', contextText) }),
    ...(dataText !== undefined && { data: parseJsonOption('data', dataText) }),
  });
  const result = await answerQuestions(app.engine, await app.engine.update(started.key), context);

  const { output, display } = context;
  output.line();
  if (result.content?.type === 'exit') {
    const lines = [paint(result.content.title, 'bold', display)];
    if (result.content.description !== undefined) {
      lines.push(result.content.description);
    }
    output.line(wrapInBox(lines.join('\n'), display));
    return { exitCode: 0 };
  }

  output.line(paint('Interview complete.', 'green', display));
  output.line(JSON.stringify(result.data, null, 2));
  return { exitCode: 0 };
}
