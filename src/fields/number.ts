import type { Scope } from '../logic/evaluator.js';
import type { JsonObject } from '../utils/json.js';
import type { NumberField, Validator } from './types.js';
import { accept, baseSchema, presence, reject, unlessNull } from './validators.js';

export function numberSchema(field: NumberField, scope: Scope): JsonObject {
  const schema = baseSchema(field, scope, field.integer ? 'integer' : 'number', field.optional, 'number');
  if (field.min !== undefined) {
    schema.minimum = field.min;
  }
  if (field.max !== undefined) {
    schema.maximum = field.max;
  }
  return schema;
}

export function numberValidators(field: NumberField): Validator[] {
  return [
    presence(field.optional),
    unlessNull((value) => {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return reject('Must be a number');
      }
      if (field.integer && !Number.isInteger(value)) {
        return reject('Must be a whole number');
      }
      if (field.min !== undefined && value < field.min) {
        return reject(`Must be at least ${String(field.min)}`);
      }
      if (field.max !== undefined && value > field.max) {
        return reject(`Must be at most ${String(field.max)}`);
      }
      return accept(value);
    }),
  ];
}
