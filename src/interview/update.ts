/**
 * The update algorithm.
 *
 * An update applies pending responses, then replays the steps from the top
 * until one halts. Replaying is safe because answered questions are never
 * asked again, so the same state always halts at the same step.
 *
 * @packageDocumentation
 */

import { ConfigurationError, ValidationError } from '../errors.js';
import { renderQuestion } from '../fields/question.js';
import { applyResponses } from '../fields/responses.js';
import { executeStep } from '../steps/execute.js';
import { recordAnswer, withState } from './state.js';
import type { InterviewContext, UpdateOutcome } from './types.js';

/**
 * Applies responses to the pending question.
 *
 * @throws ValidationError when responses and the pending question disagree, or the responses are invalid.
 * @throws ConfigurationError when the pending question is no longer in the script.
 */
export function applyPendingResponses(
  context: InterviewContext,
  responses: unknown
): InterviewContext {
  const pending = context.state.currentQuestionId;

  if (pending === null) {
    if (responses === undefined) {
      return context;
    }
    throw new ValidationError('No question is awaiting responses', [
      { field: 'responses', message: 'Responses were given but no question is pending' },
    ]);
  }

  if (responses === undefined) {
    throw new ValidationError(`Question "${pending}" is awaiting responses`, [
      { field: 'responses', message: 'Responses are required' },
    ]);
  }

  const template = context.interview.questions.get(pending);
  if (template === undefined) {
    throw new ConfigurationError(
      `Pending question "${pending}" is not in interview "${context.interview.id}"`
    );
  }

  const question = renderQuestion(template, context.scope);
  const data = applyResponses(template, question, responses, context.state.data, context.scope);
  return withState(context, recordAnswer(context.state, data));
}

/**
 * Runs the steps from the top until one halts.
 *
 * @returns The outcome; `completed` is set on the state when no step halts.
 */
export function runSteps(context: InterviewContext): UpdateOutcome {
  let current = context;
  for (const step of current.interview.steps) {
    const result = executeStep(step, current);
    current = result.context;
    if (result.content !== undefined) {
      return {
        context: current,
        content: result.content,
        status: result.content.type === 'question' ? 'awaiting_answer' : 'exited',
      };
    }
  }
  return {
    context: withState(current, { ...current.state, completed: true }),
    content: null,
    status: 'completed',
  };
}

/**
 * Advances an interview: applies responses to the pending question, if any,
 * and replays the steps.
 *
 * @param context - The interview and its current state.
 * @param responses - Response mapping for the pending question.
 * @returns The new context, the halting content and the status.
 */
export function updateInterview(context: InterviewContext, responses?: unknown): UpdateOutcome {
  return runSteps(applyPendingResponses(context, responses));
}
