/**
 * Interview state construction and transitions.
 *
 * @packageDocumentation
 */

import type { JsonObject } from '../utils/json.js';
import {
  INTERVIEW_STATE_VERSION,
  type Interview,
  type InterviewContext,
  type InterviewState,
} from './types.js';

/**
 * Inputs for a new interview.
 */
export interface StartOptions {
  /** Caller-supplied tag carried through unchanged. */
  readonly target?: string | null;
  /** Read-only input context. */
  readonly context?: JsonObject;
  /** Pre-filled answers. */
  readonly data?: JsonObject;
}

/**
 * Creates the state of an interview that has not run yet.
 *
 * @param options - Target, context and initial data.
 * @returns A new InterviewState with nothing answered.
 */
export function createInitialState(options: StartOptions = {}): InterviewState {
  return {
    version: INTERVIEW_STATE_VERSION,
    data: options.data ?? {},
    context: options.context ?? {},
    answeredQuestionIds: [],
    currentQuestionId: null,
    target: options.target ?? null,
    completed: false,
  };
}

/**
 * Builds the names visible to expressions.
 *
 * Later sources win: the reserved names `context`, `data`, `target` and
 * `answered_question_ids`, then the keys of the input context, then the keys
 * of the data.
 */
export function buildTemplateContext(state: InterviewState): JsonObject {
  return {
    context: state.context,
    data: state.data,
    target: state.target,
    answered_question_ids: [...state.answeredQuestionIds],
    ...state.context,
    ...state.data,
  };
}

/**
 * Pairs a state with its interview.
 */
export function createInterviewContext(
  interview: Interview,
  state: InterviewState
): InterviewContext {
  return { interview, state, scope: buildTemplateContext(state) };
}

/**
 * Replaces the state of a context, rebuilding its template context.
 */
export function withState(context: InterviewContext, state: InterviewState): InterviewContext {
  return createInterviewContext(context.interview, state);
}

/**
 * Whether a question has been answered.
 */
export function isAnswered(state: InterviewState, questionId: string): boolean {
  return state.answeredQuestionIds.includes(questionId);
}

/**
 * Records an accepted response: the pending question becomes answered.
 *
 * @param state - The state with a question pending.
 * @param data - The data including the new answers.
 * @returns The new state.
 */
export function recordAnswer(state: InterviewState, data: JsonObject): InterviewState {
  const questionId = state.currentQuestionId;
  const answered =
    questionId === null || isAnswered(state, questionId)
      ? state.answeredQuestionIds
      : [...state.answeredQuestionIds, questionId];
  return { ...state, data, currentQuestionId: null, answeredQuestionIds: answered };
}
