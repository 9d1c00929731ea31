/**
 * Step variants of an interview script.
 *
 * @packageDocumentation
 */

import type { ValueSource, WhenCondition } from '../logic/condition.js';
import type { Template } from '../logic/environment.js';
import type { ValuePointer } from '../pointer/types.js';

/**
 * Asks a question unless it was already answered.
 */
export interface AskStep {
  readonly type: 'ask';
  readonly questionId: string;
  readonly when: WhenCondition;
}

/**
 * Writes a value into the data.
 */
export interface SetStep {
  readonly type: 'set';
  readonly pointer: ValuePointer;
  readonly value: ValueSource;
  readonly when: WhenCondition;
}

/**
 * Ends the interview without completing it.
 */
export interface ExitStep {
  readonly type: 'exit';
  readonly title: Template;
  readonly description?: Template;
  readonly when: WhenCondition;
}

/**
 * Asks whichever question provides the first missing value.
 */
export interface EnsureStep {
  readonly type: 'ensure';
  /** Direct pointers only. */
  readonly pointers: readonly ValuePointer[];
  readonly when: WhenCondition;
}

export type Step = AskStep | SetStep | ExitStep | EnsureStep;

export type StepType = Step['type'];
