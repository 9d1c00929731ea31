import { withState } from '../interview/state.js';
import type { InterviewContext, StepResult } from '../interview/types.js';
import { evaluateCondition, evaluateValue } from '../logic/condition.js';
import { setDataValue } from '../pointer/pointer.js';
import type { SetStep } from './types.js';

/**
 * Writes the step's value at its pointer. An absent value is written as null.
 */
export function executeSet(step: SetStep, context: InterviewContext): StepResult {
  if (!evaluateCondition(step.when, context.scope)) {
    return { context };
  }
  const value = evaluateValue(step.value, context.scope);
  const data = setDataValue(step.pointer, context.state.data, value ?? null, context.scope);
  return { context: withState(context, { ...context.state, data }) };
}
