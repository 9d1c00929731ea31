import type { InterviewContext, StepResult } from '../interview/types.js';
import { executeAsk } from './ask.js';
import { executeEnsure } from './ensure.js';
import { executeExit } from './exit.js';
import { executeSet } from './set.js';
import type { Step } from './types.js';

/**
 * Runs one step. Every variant evaluates its guard first; a false guard
 * leaves the context unchanged.
 */
export function executeStep(step: Step, context: InterviewContext): StepResult {
  switch (step.type) {
    case 'ask':
      return executeAsk(step, context);
    case 'set':
      return executeSet(step, context);
    case 'exit':
      return executeExit(step, context);
    case 'ensure':
      return executeEnsure(step, context);
  }
}
