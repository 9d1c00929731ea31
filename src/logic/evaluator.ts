/**
 * Tree-walking evaluator for parsed expressions.
 *
 * Missing names, attributes and subscripts evaluate to `undefined`. Operations
 * that have no meaning for their operands (arithmetic on absent values,
 * ordering across types, division by zero) throw EvaluationFailure.
 *
 * @packageDocumentation
 */

import { deepEqual, getOwn, isJsonObject, type JsonObject, type JsonValue, type Value } from '../utils/json.js';
import type { BinaryNode, CompareNode, ExpressionNode, TestNode } from './ast.js';
import type { FilterFunction } from './filters.js';
import { EvaluationFailure, isTruthy, toText, typeName } from './values.js';

/**
 * Variables visible to an expression.
 */
export type Scope = Readonly<JsonObject>;

/**
 * Filters the evaluator can call, by name.
 */
export type FilterTable = Readonly<Record<string, FilterFunction>>;

function toJson(value: Value): JsonValue {
  return value === undefined ? null : value;
}

function subscript(object: Value, index: Value): Value {
  if (Array.isArray(object) || typeof object === 'string') {
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      return undefined;
    }
    const position = index < 0 ? object.length + index : index;
    return object[position];
  }
  if (isJsonObject(object) && typeof index === 'string') {
    return getOwn(object, index);
  }
  return undefined;
}

function arithmetic(node: BinaryNode, left: Value, right: Value): Value {
  if (node.operator === '~') {
    return toText(left) + toText(right);
  }
  if (node.operator === '+') {
    if (typeof left === 'string' && typeof right === 'string') {
      return left + right;
    }
    if (Array.isArray(left) && Array.isArray(right)) {
      return [...left, ...right];
    }
  }
  if (typeof left !== 'number' || typeof right !== 'number') {
    throw new EvaluationFailure(
      `Unsupported operand types for ${node.operator}: ${typeName(left)} and ${typeName(right)}`
    );
  }
  if ((node.operator === '/' || node.operator === '//' || node.operator === '%') && right === 0) {
    throw new EvaluationFailure('Division by zero');
  }
  switch (node.operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      return left / right;
    case '//':
      return Math.floor(left / right);
    case '%':
      return ((left % right) + right) % right;
  }
}

function contains(container: Value, item: Value): boolean {
  if (Array.isArray(container)) {
    return container.some((element) => deepEqual(element, item));
  }
  if (typeof container === 'string' && typeof item === 'string') {
    return container.includes(item);
  }
  if (isJsonObject(container) && typeof item === 'string') {
    return Object.hasOwn(container, item);
  }
  throw new EvaluationFailure(
    `Cannot test membership of ${typeName(item)} in ${typeName(container)}`
  );
}

function orderSign(operator: string, left: Value, right: Value): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return Math.sign(left - right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  throw new EvaluationFailure(
    `Cannot compare ${typeName(left)} and ${typeName(right)} with ${operator}`
  );
}

function compare(node: CompareNode, left: Value, right: Value): boolean {
  switch (node.operator) {
    case '==':
      return deepEqual(left, right);
    case '!=':
      return !deepEqual(left, right);
    case 'in':
      return contains(right, left);
    case 'not in':
      return !contains(right, left);
    case '<':
      return orderSign(node.operator, left, right) < 0;
    case '<=':
      return orderSign(node.operator, left, right) <= 0;
    case '>':
      return orderSign(node.operator, left, right) > 0;
    case '>=':
      return orderSign(node.operator, left, right) >= 0;
  }
}

function applyTest(node: TestNode, value: Value): boolean {
  let result: boolean;
  switch (node.test) {
    case 'defined':
      result = value !== undefined;
      break;
    case 'undefined':
      result = value === undefined;
      break;
    case 'none':
      result = value === null;
      break;
    case 'number':
      result = typeof value === 'number';
      break;
    case 'string':
      result = typeof value === 'string';
      break;
    case 'boolean':
      result = typeof value === 'boolean';
      break;
    case 'list':
      result = Array.isArray(value);
      break;
    case 'mapping':
      result = isJsonObject(value);
      break;
    case 'true':
      result = value === true;
      break;
    case 'false':
      result = value === false;
      break;
    default:
      throw new EvaluationFailure(`Unknown test "${node.test}"`);
  }
  return node.negated ? !result : result;
}

/**
 * Evaluates a syntax tree against a scope.
 *
 * @param node - The tree to evaluate.
 * @param scope - Variables visible to the expression.
 * @param filters - Filters callable with `|`.
 * @returns The resulting value, `undefined` when absent.
 * @throws EvaluationFailure for undefined operations.
 */
export function evaluateNode(node: ExpressionNode, scope: Scope, filters: FilterTable): Value {
  const evaluate = (child: ExpressionNode): Value => evaluateNode(child, scope, filters);

  switch (node.type) {
    case 'literal':
      return node.value;
    case 'name':
      return getOwn(scope, node.name);
    case 'attribute': {
      const object = evaluate(node.object);
      return isJsonObject(object) ? getOwn(object, node.name) : undefined;
    }
    case 'subscript':
      return subscript(evaluate(node.object), evaluate(node.index));
    case 'list':
      return node.items.map((item) => toJson(evaluate(item)));
    case 'object': {
      const result: JsonObject = {};
      for (const entry of node.entries) {
        const key = evaluate(entry.key);
        if (typeof key !== 'string') {
          throw new EvaluationFailure(`Mapping keys must be strings, got ${typeName(key)}`);
        }
        const value = evaluate(entry.value);
        if (value !== undefined) {
          result[key] = value;
        }
      }
      return result;
    }
    case 'unary': {
      const operand = evaluate(node.operand);
      if (node.operator === 'not') {
        return !isTruthy(operand);
      }
      if (typeof operand !== 'number') {
        throw new EvaluationFailure(
          `Unsupported operand type for unary ${node.operator}: ${typeName(operand)}`
        );
      }
      return node.operator === '-' ? -operand : operand;
    }
    case 'binary': {
      const result = arithmetic(node, evaluate(node.left), evaluate(node.right));
      if (typeof result === 'number' && !Number.isFinite(result)) {
        throw new EvaluationFailure(`Result of ${node.operator} is not a finite number`);
      }
      return result;
    }
    case 'compare':
      return compare(node, evaluate(node.left), evaluate(node.right));
    case 'logical': {
      const left = evaluate(node.left);
      if (node.operator === 'and') {
        return isTruthy(left) ? evaluate(node.right) : left;
      }
      return isTruthy(left) ? left : evaluate(node.right);
    }
    case 'test':
      return applyTest(node, evaluate(node.operand));
    case 'filter': {
      const filter = filters[node.name];
      if (filter === undefined) {
        throw new EvaluationFailure(`Unknown filter "${node.name}"`);
      }
      return filter(evaluate(node.operand), node.args.map(evaluate));
    }
    case 'conditional':
      if (isTruthy(evaluate(node.test))) {
        return evaluate(node.consequent);
      }
      return node.alternate !== undefined ? evaluate(node.alternate) : undefined;
  }
}
