import { ConfigurationError } from '../errors.js';
import { renderQuestion, type QuestionTemplate } from '../fields/question.js';
import { withState, isAnswered } from '../interview/state.js';
import type { InterviewContext, StepResult } from '../interview/types.js';
import { evaluateCondition } from '../logic/condition.js';
import type { AskStep } from './types.js';

/**
 * Renders a question and makes it the pending one. Halts the run.
 */
export function askQuestion(template: QuestionTemplate, context: InterviewContext): StepResult {
  const question = renderQuestion(template, context.scope);
  const state = { ...context.state, currentQuestionId: template.id };
  return { context: withState(context, state), content: { type: 'question', question } };
}

/**
 * Asks a question unless it was already answered or its guard fails.
 *
 * The answered check comes first, so a guard that flips after answering
 * never asks again.
 *
 * @throws ConfigurationError when the question id is not in the script.
 */
export function executeAsk(step: AskStep, context: InterviewContext): StepResult {
  if (isAnswered(context.state, step.questionId)) {
    return { context };
  }
  if (!evaluateCondition(step.when, context.scope)) {
    return { context };
  }
  const template = context.interview.questions.get(step.questionId);
  if (template === undefined) {
    throw new ConfigurationError(
      `Unknown question "${step.questionId}" in interview "${context.interview.id}"`
    );
  }
  return askQuestion(template, context);
}
