/**
 * Guard conditions and value sources built from compiled expressions.
 *
 * @packageDocumentation
 */

import type { JsonValue, Value } from '../utils/json.js';
import type { Expression, Template } from './environment.js';
import type { Scope } from './evaluator.js';
import { isTruthy } from './values.js';

/**
 * A `when` guard. An empty conjunction holds; an empty disjunction does not.
 */
export type WhenCondition =
  | { readonly type: 'always' }
  | { readonly type: 'never' }
  | { readonly type: 'expression'; readonly expression: Expression }
  | { readonly type: 'and'; readonly conditions: readonly WhenCondition[] }
  | { readonly type: 'or'; readonly conditions: readonly WhenCondition[] };

/** The guard used when none is given. */
export const ALWAYS: WhenCondition = Object.freeze({ type: 'always' });

/**
 * Evaluates a guard.
 *
 * @throws EvaluationError when an expression fails.
 */
export function evaluateCondition(condition: WhenCondition, scope: Scope): boolean {
  switch (condition.type) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'expression':
      return isTruthy(condition.expression.evaluate(scope));
    case 'and':
      return condition.conditions.every((inner) => evaluateCondition(inner, scope));
    case 'or':
      return condition.conditions.some((inner) => evaluateCondition(inner, scope));
  }
}

/**
 * Where a step or option gets its value from.
 */
export type ValueSource =
  | { readonly type: 'literal'; readonly value: JsonValue }
  | { readonly type: 'expression'; readonly expression: Expression }
  | { readonly type: 'template'; readonly template: Template };

/**
 * Produces the value of a source.
 *
 * @throws EvaluationError when an expression fails.
 */
export function evaluateValue(source: ValueSource, scope: Scope): Value {
  switch (source.type) {
    case 'literal':
      return source.value;
    case 'expression':
      return source.expression.evaluate(scope);
    case 'template':
      return source.template.render(scope);
  }
}
