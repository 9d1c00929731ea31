/**
 * Select fields: choices among options that can be hidden by context.
 *
 * Option ids are declaration indices rendered as strings, so an id stays
 * stable when earlier options are hidden.
 *
 * @packageDocumentation
 */

import { evaluateCondition } from '../logic/condition.js';
import type { Scope } from '../logic/evaluator.js';
import { isTruthy } from '../logic/values.js';
import type { JsonObject, JsonValue } from '../utils/json.js';
import type { SelectField, SelectOption, Validator } from './types.js';
import { accept, baseSchema, reject } from './validators.js';

/**
 * An option that is visible in the current context.
 */
export interface VisibleOption {
  readonly id: string;
  readonly option: SelectOption;
}

export function isMultiSelect(field: SelectField): boolean {
  return field.max > 1;
}

export function isOptionalSelect(field: SelectField): boolean {
  return field.min === 0;
}

/**
 * Lists the options whose `when` holds, with their ids.
 */
export function visibleOptions(field: SelectField, scope: Scope): VisibleOption[] {
  const visible: VisibleOption[] = [];
  field.options.forEach((option, index) => {
    if (evaluateCondition(option.when, scope)) {
      visible.push({ id: String(index), option });
    }
  });
  return visible;
}

function isDefaultOption(option: SelectOption, scope: Scope): boolean {
  if (option.default) {
    return true;
  }
  return option.defaultExpr !== undefined && isTruthy(option.defaultExpr.evaluate(scope));
}

export function selectSchema(field: SelectField, scope: Scope): JsonObject {
  const multi = isMultiSelect(field);
  const optional = isOptionalSelect(field);
  const visible = visibleOptions(field, scope);
  const choices: JsonValue[] = visible.map(({ id, option }) => ({
    const: id,
    title: option.label.render(scope),
  }));
  const defaults = visible.filter(({ option }) => isDefaultOption(option, scope)).map(({ id }) => id);

  const schema = baseSchema(field, scope, multi ? 'array' : 'string', optional);

  if (multi) {
    schema.items = choices.length > 0 ? { type: 'string', oneOf: choices } : { type: 'string' };
    schema.uniqueItems = true;
    schema.minItems = field.min;
    schema.maxItems = field.max;
    if (defaults.length > 0) {
      schema.default = defaults;
    }
  } else {
    if (choices.length > 0) {
      schema.oneOf = optional ? [...choices, { type: 'null' }] : choices;
    }
    const first = defaults[0];
    if (first !== undefined) {
      schema.default = first;
    }
  }

  schema['x-component'] = field.component;
  if (field.autocomplete !== undefined) {
    schema['x-autoComplete'] = field.autocomplete;
  }
  return schema;
}

function toIdList(value: JsonValue): string[] | undefined {
  if (value === null) {
    return [];
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    const ids: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') {
        return undefined;
      }
      if (!ids.includes(item)) {
        ids.push(item);
      }
    }
    return ids;
  }
  return undefined;
}

export function selectValidators(field: SelectField, scope: Scope): Validator[] {
  const multi = isMultiSelect(field);
  const visible = visibleOptions(field, scope);
  return [
    (value) => {
      const ids = toIdList(value ?? null);
      if (ids === undefined) {
        return reject('Invalid choice');
      }
      if (ids.length < field.min) {
        return reject(`Choose at least ${String(field.min)}`);
      }
      if (ids.length > field.max) {
        return reject(`Choose at most ${String(field.max)}`);
      }
      const values: JsonValue[] = [];
      for (const id of ids) {
        const match = visible.find((candidate) => candidate.id === id);
        if (match === undefined) {
          return reject('Invalid choice');
        }
        values.push(match.option.value);
      }
      return accept(multi ? values : (values[0] ?? null));
    },
  ];
}
