import type { ExitContent, InterviewContext, StepResult } from '../interview/types.js';
import { evaluateCondition } from '../logic/condition.js';
import type { ExitStep } from './types.js';

/**
 * Halts the run without completing the interview.
 */
export function executeExit(step: ExitStep, context: InterviewContext): StepResult {
  if (!evaluateCondition(step.when, context.scope)) {
    return { context };
  }
  const description = step.description?.render(context.scope);
  const content: ExitContent = {
    type: 'exit',
    title: step.title.render(context.scope),
    ...(description !== undefined && { description }),
  };
  return { context, content };
}
