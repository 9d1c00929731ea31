/**
 * Interview state machine and engine boundary.
 *
 * @packageDocumentation
 */

export * from './types.js';
export {
  createInitialState,
  createInterviewContext,
  buildTemplateContext,
  withState,
  isAnswered,
  recordAnswer,
  type StartOptions,
} from './state.js';
export { updateInterview, applyPendingResponses, runSteps } from './update.js';
export {
  InterviewEngine,
  type EngineResult,
  type InterviewEngineOptions,
} from './engine.js';
