/**
 * Decoding a response mapping into answer data.
 *
 * Responses are checked against the shape of the rendered question schema
 * with Ajv first; each field's validators then normalize the values, check
 * lengths, patterns and counts on the normalized form, and the results are
 * written into data at the fields' pointers.
 *
 * @packageDocumentation
 */

import AjvModule, { type ErrorObject } from 'ajv';
import { ValidationError, type ValidationDetail } from '../errors.js';
import type { Scope } from '../logic/evaluator.js';
import { setDataValue } from '../pointer/pointer.js';
import { getOwn, isJsonObject, isJsonValue, type JsonObject, type JsonValue } from '../utils/json.js';
import { validateFieldValue } from './field.js';
import { fieldName, type Question, type QuestionTemplate } from './question.js';

const Ajv = AjvModule.default;

// Field schemas carry x-* hints, and formats are checked by the field validators.
const ajv = new Ajv({ allErrors: true, strict: false, validateFormats: false });

function ajvDetails(errors: readonly ErrorObject[], responses: JsonObject): ValidationDetail[] {
  const byField = new Map<string, ValidationDetail>();
  for (const error of errors) {
    const missing: unknown = error.params.missingProperty;
    const field =
      error.keyword === 'required' && typeof missing === 'string'
        ? missing
        : (error.instancePath.split('/')[1] ?? 'responses');
    if (byField.has(field)) {
      continue;
    }
    const received = getOwn(responses, field);
    byField.set(field, {
      field,
      message: error.keyword === 'required' ? 'This field is required' : (error.message ?? 'Invalid value'),
      ...(received !== undefined && { received }),
    });
  }
  return [...byField.values()];
}

// Checked by the field validators after trimming, with their own messages.
const VALIDATOR_KEYWORDS = new Set(['minLength', 'maxLength', 'pattern', 'minItems', 'maxItems']);

/**
 * The schema without the keywords the field validators own.
 */
function structuralSchema(schema: JsonValue): JsonValue {
  if (Array.isArray(schema)) {
    return schema.map(structuralSchema);
  }
  if (!isJsonObject(schema)) {
    return schema;
  }
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(schema)) {
    if (!VALIDATOR_KEYWORDS.has(key)) {
      result[key] = structuralSchema(value);
    }
  }
  return result;
}

/**
 * Checks a response mapping against the shape of a rendered question schema:
 * types, required fields, choices and numeric bounds.
 *
 * @returns Per-field details; empty when the responses conform.
 */
export function checkResponseSchema(question: Question, responses: JsonObject): ValidationDetail[] {
  const schema = structuralSchema(question.schema);
  if (!isJsonObject(schema)) {
    return [];
  }
  const validate = ajv.compile(schema);
  try {
    return validate(responses) ? [] : ajvDetails(validate.errors ?? [], responses);
  } finally {
    ajv.removeSchema(schema);
  }
}

/**
 * Validates responses for a question and writes the answers into data.
 *
 * Absent answers to optional fields are written as null.
 *
 * @param template - The question being answered.
 * @param question - The question as rendered in `scope`.
 * @param responses - The raw response mapping, keyed by synthetic field name.
 * @param data - The answer data to write into; not modified.
 * @param scope - The template context the question was rendered in.
 * @returns The updated data.
 * @throws ValidationError listing every rejected field.
 */
export function applyResponses(
  template: QuestionTemplate,
  question: Question,
  responses: unknown,
  data: JsonObject,
  scope: Scope
): JsonObject {
  if (!isJsonObject(responses) || !isJsonValue(responses)) {
    throw new ValidationError(`Responses for question "${template.id}" must be an object`, [
      { field: 'responses', message: 'Must be an object' },
    ]);
  }

  const schemaDetails = checkResponseSchema(question, responses);
  if (schemaDetails.length > 0) {
    throw new ValidationError(`Invalid responses for question "${template.id}"`, schemaDetails);
  }

  const details: ValidationDetail[] = [];
  const values: JsonValue[] = [];
  template.fields.forEach(({ field }, index) => {
    const name = fieldName(index);
    const received = getOwn(responses, name);
    const result = validateFieldValue(field, received, scope);
    if (result.valid) {
      values.push(result.value);
    } else {
      details.push({
        field: name,
        message: result.message,
        ...(received !== undefined && { received }),
      });
    }
  });
  if (details.length > 0) {
    throw new ValidationError(`Invalid responses for question "${template.id}"`, details);
  }

  let updated = data;
  template.fields.forEach(({ pointer }, index) => {
    updated = setDataValue(pointer, updated, values[index] ?? null, scope);
  });
  return updated;
}
