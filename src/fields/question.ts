/**
 * Question templates and their rendering into JSON Schema.
 *
 * @packageDocumentation
 */

import type { WhenCondition } from '../logic/condition.js';
import type { Template } from '../logic/environment.js';
import type { Scope } from '../logic/evaluator.js';
import { formatPointer } from '../pointer/parser.js';
import { isDirectPointer } from '../pointer/pointer.js';
import type { ValuePointer } from '../pointer/types.js';
import type { JsonObject } from '../utils/json.js';
import { isOptionalField, renderFieldSchema } from './field.js';
import type { FieldTemplate } from './types.js';

/**
 * A field of a question and where its answer is written.
 */
export interface QuestionField {
  readonly pointer: ValuePointer;
  readonly field: FieldTemplate;
}

/**
 * A question as declared in a script.
 */
export interface QuestionTemplate {
  readonly id: string;
  readonly title?: Template;
  readonly description?: Template;
  readonly fields: readonly QuestionField[];
  /** Consulted when an ensure step chooses a question. */
  readonly when: WhenCondition;
}

/**
 * A question rendered for one template context.
 */
export interface Question {
  readonly id: string;
  readonly title?: string;
  readonly description?: string;
  /** Object schema whose properties are the synthetic field names. */
  readonly schema: JsonObject;
  readonly fieldNames: readonly string[];
}

/**
 * Synthetic name of the field at a position: `field_0`, `field_1`, ...
 */
export function fieldName(index: number): string {
  return `field_${String(index)}`;
}

/**
 * Renders a question's title, description and schema.
 *
 * @param template - The question to render.
 * @param scope - The template context.
 * @returns The rendered question.
 * @throws EvaluationError when a template or guard fails.
 */
export function renderQuestion(template: QuestionTemplate, scope: Scope): Question {
  const title = template.title?.render(scope);
  const description = template.description?.render(scope);
  const properties: JsonObject = {};
  const required: string[] = [];
  const fieldNames: string[] = [];

  template.fields.forEach(({ field }, index) => {
    const name = fieldName(index);
    fieldNames.push(name);
    properties[name] = renderFieldSchema(field, scope);
    if (!isOptionalField(field)) {
      required.push(name);
    }
  });

  const schema: JsonObject = { type: 'object' };
  if (title !== undefined) {
    schema.title = title;
  }
  if (description !== undefined) {
    schema.description = description;
  }
  schema.properties = properties;
  schema.required = required;

  return {
    id: template.id,
    ...(title !== undefined && { title }),
    ...(description !== undefined && { description }),
    schema,
    fieldNames,
  };
}

/**
 * The pointers a question writes, in canonical string form.
 * Indirect pointers depend on context and contribute nothing.
 */
export function questionProvides(template: QuestionTemplate): ReadonlySet<string> {
  const provides = new Set<string>();
  for (const { pointer } of template.fields) {
    if (isDirectPointer(pointer)) {
      provides.add(formatPointer(pointer));
    }
  }
  return provides;
}
