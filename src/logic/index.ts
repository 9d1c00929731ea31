/**
 * Expression language, templates and guard conditions.
 *
 * @packageDocumentation
 */

export type { ExpressionNode } from './ast.js';
export { parseExpression, TEST_NAMES, type ParseOptions } from './parser.js';
export { evaluateNode, type Scope, type FilterTable } from './evaluator.js';
export { BUILTIN_FILTERS, type FilterFunction } from './filters.js';
export { splitTemplate, type TemplatePart } from './template.js';
export { isTruthy, toText, typeName, EvaluationFailure } from './values.js';
export {
  ExpressionEnvironment,
  DEFAULT_CACHE_SIZE,
  type Expression,
  type Template,
  type EnvironmentOptions,
} from './environment.js';
export {
  ALWAYS,
  evaluateCondition,
  evaluateValue,
  type WhenCondition,
  type ValueSource,
} from './condition.js';
