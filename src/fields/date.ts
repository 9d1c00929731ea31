import type { Scope } from '../logic/evaluator.js';
import type { JsonObject } from '../utils/json.js';
import type { DateField, Validator } from './types.js';
import { accept, baseSchema, presence, reject, unlessNull } from './validators.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Checks that a `YYYY-MM-DD` string names a real calendar day.
 *
 * @param text - The candidate date.
 * @returns True for dates such as 2024-02-29, false for 2023-02-29 or 2024-13-01.
 */
export function isCalendarDate(text: string): boolean {
  const match = DATE_PATTERN.exec(text);
  if (match === null) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

export function dateSchema(field: DateField, scope: Scope): JsonObject {
  const schema = baseSchema(field, scope, 'string', field.optional, 'date');
  schema.format = 'date';
  if (field.min !== undefined) {
    schema['x-min'] = field.min;
  }
  if (field.max !== undefined) {
    schema['x-max'] = field.max;
  }
  return schema;
}

export function dateValidators(field: DateField): Validator[] {
  return [
    presence(field.optional),
    unlessNull((value) => {
      if (typeof value !== 'string' || !DATE_PATTERN.test(value)) {
        return reject('Must be a date in YYYY-MM-DD format');
      }
      if (!isCalendarDate(value)) {
        return reject('Must be a valid calendar date');
      }
      // ISO dates order lexicographically.
      if (field.min !== undefined && value < field.min) {
        return reject(`Must be on or after ${field.min}`);
      }
      if (field.max !== undefined && value > field.max) {
        return reject(`Must be on or before ${field.max}`);
      }
      return accept(value);
    }),
  ];
}
