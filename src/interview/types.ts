/**
 * Interview state and script types.
 *
 * @packageDocumentation
 */

import type { Scope } from '../logic/evaluator.js';
import type { Question, QuestionTemplate } from '../fields/question.js';
import type { Step } from '../steps/types.js';
import type { JsonObject } from '../utils/json.js';

/**
 * Persisted interview state.
 *
 * @remarks
 * A state is never modified; every transition produces a new one. When
 * `currentQuestionId` is set it is not in `answeredQuestionIds`, and
 * `answeredQuestionIds` only ever grows.
 *
 * @example
 * ```typescript
 * const state: InterviewState = {
 *   version: '1.0.0',
 *   data: { registration: { first_name: 'Ada' } },
 *   context: { event: 'conference' },
 *   answeredQuestionIds: ['registration'],
 *   currentQuestionId: 'level',
 *   target: null,
 *   completed: false,
 * };
 * ```
 */
export interface InterviewState {
  /** Schema version for future compatibility. */
  readonly version: string;
  /** Answers collected so far. */
  readonly data: JsonObject;
  /** Input context supplied at start; never modified. */
  readonly context: JsonObject;
  /** Ids of answered questions, in answer order, without duplicates. */
  readonly answeredQuestionIds: readonly string[];
  /** The question awaiting a response, if any. */
  readonly currentQuestionId: string | null;
  /** Caller-supplied tag carried through unchanged. */
  readonly target: string | null;
  /** True once the steps ran out with no question pending. */
  readonly completed: boolean;
}

/**
 * Current schema version for persisted interview state.
 */
export const INTERVIEW_STATE_VERSION = '1.0.0';

/**
 * A loaded interview script.
 */
export interface Interview {
  readonly id: string;
  /** Questions by id, in script order. */
  readonly questions: ReadonlyMap<string, QuestionTemplate>;
  readonly steps: readonly Step[];
}

/**
 * An interview state paired with its script and template context.
 */
export interface InterviewContext {
  readonly interview: Interview;
  readonly state: InterviewState;
  /** Names visible to expressions, rebuilt whenever the state changes. */
  readonly scope: Scope;
}

/**
 * A step asks a question.
 */
export interface AskContent {
  readonly type: 'question';
  readonly question: Question;
}

/**
 * A step ended the interview early.
 */
export interface ExitContent {
  readonly type: 'exit';
  readonly title: string;
  readonly description?: string;
}

export type StepContent = AskContent | ExitContent;

/**
 * Result of running one step.
 */
export interface StepResult {
  readonly context: InterviewContext;
  /** Present when the step halts the run. */
  readonly content?: StepContent;
}

/**
 * Where an interview stands after an update.
 *
 * @remarks
 * - running: started, steps not run yet
 * - awaiting_answer: a question is pending
 * - exited: an exit step ended the run
 * - completed: the steps ran out
 */
export type InterviewStatus = 'running' | 'awaiting_answer' | 'exited' | 'completed';

/**
 * Result of the update algorithm.
 */
export interface UpdateOutcome {
  readonly context: InterviewContext;
  readonly content: StepContent | null;
  readonly status: InterviewStatus;
}
