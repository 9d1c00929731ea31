/**
 * Building blocks shared by the field validators and schema renderers.
 *
 * @packageDocumentation
 */

import { evaluateValue, type ValueSource } from '../logic/condition.js';
import type { Template } from '../logic/environment.js';
import type { Scope } from '../logic/evaluator.js';
import type { JsonObject, JsonValue, Value } from '../utils/json.js';
import type { Validator, ValidatorResult } from './types.js';

export function accept(value: JsonValue): ValidatorResult {
  return { valid: true, value };
}

export function reject(message: string): ValidatorResult {
  return { valid: false, message };
}

/**
 * Maps absent values to null, and rejects them when the field is required.
 */
export function presence(optional: boolean): Validator {
  return (value) => {
    if (value === undefined || value === null) {
      return optional ? accept(null) : reject('This field is required');
    }
    return accept(value);
  };
}

/**
 * Wraps a check so that null passes through untouched.
 */
export function unlessNull(check: (value: JsonValue) => ValidatorResult): Validator {
  return (value) => (value === undefined || value === null ? accept(null) : check(value));
}

/**
 * Runs validators in order; the first failure stops the chain.
 */
export function runValidators(validators: readonly Validator[], value: Value): ValidatorResult {
  let current: ValidatorResult = accept(value ?? null);
  let input: Value = value;
  for (const validator of validators) {
    current = validator(input);
    if (!current.valid) {
      return current;
    }
    input = current.value;
  }
  return current;
}

/**
 * Common properties of a field schema.
 *
 * @param field - The field's label and default.
 * @param scope - Template context for the label and default.
 * @param type - The JSON type of a present value.
 * @param nullable - Whether null is also accepted.
 * @param xType - The `x-type` hint, if any.
 */
export function baseSchema(
  field: { readonly label?: Template; readonly default?: ValueSource },
  scope: Scope,
  type: string,
  nullable: boolean,
  xType?: string
): JsonObject {
  const schema: JsonObject = { type: nullable ? [type, 'null'] : type };
  if (xType !== undefined) {
    schema['x-type'] = xType;
  }
  if (field.label !== undefined) {
    schema.title = field.label.render(scope);
  }
  if (field.default !== undefined) {
    const value = evaluateValue(field.default, scope);
    if (value !== undefined) {
      schema.default = value;
    }
  }
  return schema;
}
