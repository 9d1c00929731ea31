import type { Scope } from '../logic/evaluator.js';
import type { JsonObject } from '../utils/json.js';
import type { TextField, Validator } from './types.js';
import { accept, baseSchema, presence, reject, unlessNull } from './validators.js';

// One @, no whitespace, a dot in the domain.
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function textSchema(field: TextField, scope: Scope): JsonObject {
  const schema = baseSchema(field, scope, 'string', field.optional, 'text');
  schema.minLength = field.min;
  schema.maxLength = field.max;
  if (field.regex !== undefined) {
    schema.pattern = field.regex;
  }
  if (field.format !== undefined) {
    schema.format = field.format;
  }
  return schema;
}

export function textValidators(field: TextField): Validator[] {
  const pattern = field.regex !== undefined ? new RegExp(field.regex, 'u') : undefined;
  return [
    (value) => {
      if (value === undefined || value === null) {
        return accept(null);
      }
      if (typeof value !== 'string') {
        return reject('Must be text');
      }
      const trimmed = value.trim();
      return accept(trimmed === '' ? null : trimmed);
    },
    presence(field.optional),
    unlessNull((value) => {
      // Code points, as JSON Schema length keywords count them.
      const length = [...String(value)].length;
      if (length < field.min) {
        return reject(`Must be at least ${String(field.min)} characters`);
      }
      if (length > field.max) {
        return reject(`Must be at most ${String(field.max)} characters`);
      }
      return accept(value);
    }),
    unlessNull((value) =>
      pattern === undefined || pattern.test(String(value))
        ? accept(value)
        : reject('Does not match the required pattern')
    ),
    unlessNull((value) =>
      field.format !== 'email' || EMAIL_PATTERN.test(String(value))
        ? accept(value)
        : reject('Must be a valid email address')
    ),
  ];
}
