/**
 * Dispatch over field variants.
 *
 * @packageDocumentation
 */

import type { Scope } from '../logic/evaluator.js';
import type { Value } from '../utils/json.js';
import { dateSchema, dateValidators } from './date.js';
import { numberSchema, numberValidators } from './number.js';
import { isOptionalSelect, selectSchema, selectValidators } from './select.js';
import { textSchema, textValidators } from './text.js';
import type { FieldSchema, FieldTemplate, Validator, ValidatorResult } from './types.js';
import { runValidators } from './validators.js';

/**
 * Renders a field's JSON Schema in a template context.
 *
 * @throws EvaluationError when a label, default or option guard fails to evaluate.
 */
export function renderFieldSchema(field: FieldTemplate, scope: Scope): FieldSchema {
  switch (field.type) {
    case 'text':
      return textSchema(field, scope);
    case 'number':
      return numberSchema(field, scope);
    case 'date':
      return dateSchema(field, scope);
    case 'select':
      return selectSchema(field, scope);
  }
}

/**
 * Builds the ordered validators for a field.
 */
export function fieldValidators(field: FieldTemplate, scope: Scope): Validator[] {
  switch (field.type) {
    case 'text':
      return textValidators(field);
    case 'number':
      return numberValidators(field);
    case 'date':
      return dateValidators(field);
    case 'select':
      return selectValidators(field, scope);
  }
}

/**
 * Whether a response may leave the field empty.
 */
export function isOptionalField(field: FieldTemplate): boolean {
  return field.type === 'select' ? isOptionalSelect(field) : field.optional;
}

/**
 * Validates one response value for a field.
 */
export function validateFieldValue(field: FieldTemplate, value: Value, scope: Scope): ValidatorResult {
  return runValidators(fieldValidators(field, scope), value);
}
