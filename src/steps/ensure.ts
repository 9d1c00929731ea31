import { ConfigurationError } from '../errors.js';
import { questionProvides, type QuestionTemplate } from '../fields/question.js';
import { isAnswered } from '../interview/state.js';
import type { InterviewContext, StepResult } from '../interview/types.js';
import { evaluateCondition } from '../logic/condition.js';
import { formatPointer } from '../pointer/parser.js';
import { getValue } from '../pointer/pointer.js';
import { askQuestion } from './ask.js';
import type { EnsureStep } from './types.js';

function findProvider(pointer: string, context: InterviewContext): QuestionTemplate | undefined {
  for (const template of context.interview.questions.values()) {
    if (
      !isAnswered(context.state, template.id) &&
      questionProvides(template).has(pointer) &&
      evaluateCondition(template.when, context.scope)
    ) {
      return template;
    }
  }
  return undefined;
}

/**
 * Asks for the first missing value among the step's pointers.
 *
 * The question chosen is the first in script order that is unanswered,
 * whose guard holds and that writes the pointer.
 *
 * @throws ConfigurationError when no question can provide a missing value.
 */
export function executeEnsure(step: EnsureStep, context: InterviewContext): StepResult {
  if (!evaluateCondition(step.when, context.scope)) {
    return { context };
  }
  for (const pointer of step.pointers) {
    if (getValue(pointer, context.state.data) !== undefined) {
      continue;
    }
    const text = formatPointer(pointer);
    const template = findProvider(text, context);
    if (template === undefined) {
      throw new ConfigurationError(
        `No unanswered question provides "${text}" in interview "${context.interview.id}"`
      );
    }
    return askQuestion(template, context);
  }
  return { context };
}
