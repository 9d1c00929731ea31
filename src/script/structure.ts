/**
 * Structuring of script documents into typed interviews.
 *
 * Every element is mapped explicitly: step variants by their discriminating
 * key, fields by `type`. Expressions, templates and pointers are compiled
 * here, so a loaded script never fails to compile at run time. Any malformed
 * element raises a ConfigurationError naming its location.
 *
 * @packageDocumentation
 */

import { ConfigurationError, InterviewError } from '../errors.js';
import { isCalendarDate } from '../fields/date.js';
import type { QuestionField, QuestionTemplate } from '../fields/question.js';
import { questionProvides } from '../fields/question.js';
import {
  DEFAULT_SELECT_COMPONENT,
  DEFAULT_TEXT_MAX,
  DEFAULT_TEXT_MIN,
  type DateField,
  type FieldTemplate,
  type NumberField,
  type SelectField,
  type SelectOption,
  type TextField,
} from '../fields/types.js';
import type { Interview } from '../interview/types.js';
import { ALWAYS, type ValueSource, type WhenCondition } from '../logic/condition.js';
import type { Expression, ExpressionEnvironment, Template } from '../logic/environment.js';
import { formatPointer } from '../pointer/parser.js';
import { isDirectPointer } from '../pointer/pointer.js';
import type { ValuePointer } from '../pointer/types.js';
import type { AskStep, EnsureStep, ExitStep, SetStep, Step } from '../steps/types.js';
import { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from '../utils/json.js';

type RawObject = Record<string, unknown>;

const STEP_KEYS = ['ask', 'set', 'exit', 'ensure'] as const;

function fail(message: string, location: string): never {
  throw new ConfigurationError(message, location);
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function requireObject(value: unknown, location: string): RawObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    fail(`Expected a mapping, got ${describeType(value)}`, location);
  }
  return { ...value };
}

function requireArray(value: unknown, location: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    fail(`Expected a list, got ${describeType(value)}`, location);
  }
  return value;
}

function requireString(value: unknown, location: string): string {
  if (typeof value !== 'string') {
    fail(`Expected a string, got ${describeType(value)}`, location);
  }
  return value;
}

function optionalString(raw: RawObject, key: string, location: string): string | undefined {
  return raw[key] === undefined ? undefined : requireString(raw[key], `${location}.${key}`);
}

function optionalBoolean(raw: RawObject, key: string, location: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    fail(`Expected a boolean, got ${describeType(value)}`, `${location}.${key}`);
  }
  return value;
}

function optionalNumber(raw: RawObject, key: string, location: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    fail(`Expected a number, got ${describeType(value)}`, `${location}.${key}`);
  }
  return value;
}

function optionalCount(raw: RawObject, key: string, location: string): number | undefined {
  const value = optionalNumber(raw, key, location);
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    fail(`Expected a non-negative integer, got ${String(value)}`, `${location}.${key}`);
  }
  return value;
}

function requireJsonValue(value: unknown, location: string): JsonValue {
  if (!isJsonValue(value)) {
    fail('Expected a JSON value', location);
  }
  return value;
}

/**
 * Rejects keys outside the allowed set, catching misspelled settings.
 */
function checkKeys(raw: RawObject, allowed: readonly string[], location: string): void {
  for (const key of Object.keys(raw)) {
    if (!allowed.includes(key)) {
      fail(`Unknown key "${key}"`, location);
    }
  }
}

/**
 * Runs a compile step, reporting syntax errors at the script location.
 */
function compileAt<T>(location: string, compile: () => T): T {
  try {
    return compile();
  } catch (error) {
    if (error instanceof InterviewError && !(error instanceof ConfigurationError)) {
      throw new ConfigurationError(error.message, location, error);
    }
    throw error;
  }
}

/**
 * Compiles script text with a shared environment.
 */
class Compiler {
  constructor(private readonly env: ExpressionEnvironment) {}

  expression(value: unknown, location: string): Expression {
    const source = requireString(value, location);
    return compileAt(location, () => this.env.compileExpression(source));
  }

  template(value: unknown, location: string): Template {
    const source = requireString(value, location);
    return compileAt(location, () => this.env.compileTemplate(source));
  }

  optionalTemplate(raw: RawObject, key: string, location: string): Template | undefined {
    return raw[key] === undefined ? undefined : this.template(raw[key], `${location}.${key}`);
  }

  pointer(value: unknown, location: string): ValuePointer {
    const source = requireString(value, location);
    return compileAt(location, () => this.env.parsePointer(source));
  }

  /**
   * `when`: a boolean, an expression, a list (all must hold), or a mapping
   * with a single `and` or `or` list.
   */
  when(value: unknown, location: string): WhenCondition {
    if (value === undefined || value === true) {
      return ALWAYS;
    }
    if (value === false) {
      return { type: 'never' };
    }
    if (typeof value === 'string') {
      return { type: 'expression', expression: this.expression(value, location) };
    }
    if (Array.isArray(value)) {
      return {
        type: 'and',
        conditions: value.map((item: unknown, index) =>
          this.when(item, `${location}[${String(index)}]`)
        ),
      };
    }
    const raw = requireObject(value, location);
    const keys = Object.keys(raw);
    const [operator] = keys;
    if (keys.length !== 1 || (operator !== 'and' && operator !== 'or')) {
      fail('A condition mapping needs exactly one of "and", "or"', location);
    }
    const items = requireArray(raw[operator], `${location}.${operator}`);
    return {
      type: operator,
      conditions: items.map((item, index) =>
        this.when(item, `${location}.${operator}[${String(index)}]`)
      ),
    };
  }

  /**
   * A field's pre-filled value: `default` is a literal, `default_expr` an
   * expression.
   */
  fieldDefault(raw: RawObject, location: string): ValueSource | undefined {
    if (raw.default !== undefined && raw.default_expr !== undefined) {
      fail('Use either "default" or "default_expr", not both', location);
    }
    if (raw.default_expr !== undefined) {
      return {
        type: 'expression',
        expression: this.expression(raw.default_expr, `${location}.default_expr`),
      };
    }
    if (raw.default !== undefined) {
      return { type: 'literal', value: requireJsonValue(raw.default, `${location}.default`) };
    }
    return undefined;
  }
}

function checkBounds(min: number | undefined, max: number | undefined, location: string): void {
  if (min !== undefined && max !== undefined && min > max) {
    fail(`"min" (${String(min)}) is greater than "max" (${String(max)})`, location);
  }
}

function structureText(raw: RawObject, location: string, compiler: Compiler): TextField {
  checkKeys(
    raw,
    ['type', 'label', 'optional', 'min', 'max', 'regex', 'format', 'default', 'default_expr'],
    location
  );
  const min = optionalCount(raw, 'min', location) ?? DEFAULT_TEXT_MIN;
  const max = optionalCount(raw, 'max', location) ?? DEFAULT_TEXT_MAX;
  checkBounds(min, max, location);

  const regex = optionalString(raw, 'regex', location);
  if (regex !== undefined) {
    try {
      new RegExp(regex, 'u');
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigurationError(`Invalid regex: ${cause.message}`, `${location}.regex`, cause);
    }
  }
  const format = optionalString(raw, 'format', location);
  if (format !== undefined && format !== 'email') {
    fail(`Unknown text format "${format}"`, `${location}.format`);
  }

  const label = compiler.optionalTemplate(raw, 'label', location);
  const defaultValue = compiler.fieldDefault(raw, location);
  return {
    type: 'text',
    optional: optionalBoolean(raw, 'optional', location) ?? false,
    min,
    max,
    ...(regex !== undefined && { regex }),
    ...(format !== undefined && { format }),
    ...(label !== undefined && { label }),
    ...(defaultValue !== undefined && { default: defaultValue }),
  };
}

function structureNumber(raw: RawObject, location: string, compiler: Compiler): NumberField {
  checkKeys(
    raw,
    ['type', 'label', 'optional', 'integer', 'min', 'max', 'default', 'default_expr'],
    location
  );
  const min = optionalNumber(raw, 'min', location);
  const max = optionalNumber(raw, 'max', location);
  checkBounds(min, max, location);

  const label = compiler.optionalTemplate(raw, 'label', location);
  const defaultValue = compiler.fieldDefault(raw, location);
  return {
    type: 'number',
    optional: optionalBoolean(raw, 'optional', location) ?? false,
    integer: optionalBoolean(raw, 'integer', location) ?? false,
    ...(min !== undefined && { min }),
    ...(max !== undefined && { max }),
    ...(label !== undefined && { label }),
    ...(defaultValue !== undefined && { default: defaultValue }),
  };
}

function optionalDate(raw: RawObject, key: string, location: string): string | undefined {
  const value = optionalString(raw, key, location);
  if (value !== undefined && !isCalendarDate(value)) {
    fail(`Expected a date in YYYY-MM-DD format, got "${value}"`, `${location}.${key}`);
  }
  return value;
}

function structureDate(raw: RawObject, location: string, compiler: Compiler): DateField {
  checkKeys(raw, ['type', 'label', 'optional', 'min', 'max', 'default', 'default_expr'], location);
  const min = optionalDate(raw, 'min', location);
  const max = optionalDate(raw, 'max', location);
  if (min !== undefined && max !== undefined && min > max) {
    fail(`"min" (${min}) is after "max" (${max})`, location);
  }

  const label = compiler.optionalTemplate(raw, 'label', location);
  const defaultValue = compiler.fieldDefault(raw, location);
  return {
    type: 'date',
    optional: optionalBoolean(raw, 'optional', location) ?? false,
    ...(min !== undefined && { min }),
    ...(max !== undefined && { max }),
    ...(label !== undefined && { label }),
    ...(defaultValue !== undefined && { default: defaultValue }),
  };
}

function structureOption(value: unknown, location: string, compiler: Compiler): SelectOption {
  const raw = requireObject(value, location);
  checkKeys(raw, ['label', 'value', 'default', 'default_expr', 'when'], location);
  if (raw.label === undefined) {
    fail('An option needs a "label"', location);
  }
  if (raw.value === undefined) {
    fail('An option needs a "value"', location);
  }
  const defaultExpr =
    raw.default_expr !== undefined
      ? compiler.expression(raw.default_expr, `${location}.default_expr`)
      : undefined;
  return {
    label: compiler.template(raw.label, `${location}.label`),
    value: requireJsonValue(raw.value, `${location}.value`),
    default: optionalBoolean(raw, 'default', location) ?? false,
    ...(defaultExpr !== undefined && { defaultExpr }),
    when: compiler.when(raw.when, `${location}.when`),
  };
}

function structureSelect(raw: RawObject, location: string, compiler: Compiler): SelectField {
  checkKeys(raw, ['type', 'label', 'component', 'autocomplete', 'min', 'max', 'options'], location);
  const min = optionalCount(raw, 'min', location) ?? 0;
  const max = optionalCount(raw, 'max', location) ?? 1;
  checkBounds(min, max, location);
  if (max < 1) {
    fail('"max" must be at least 1', `${location}.max`);
  }

  const options = requireArray(raw.options ?? [], `${location}.options`).map((option, index) =>
    structureOption(option, `${location}.options[${String(index)}]`, compiler)
  );
  const label = compiler.optionalTemplate(raw, 'label', location);
  const autocomplete = optionalString(raw, 'autocomplete', location);
  return {
    type: 'select',
    options,
    min,
    max,
    component: optionalString(raw, 'component', location) ?? DEFAULT_SELECT_COMPONENT,
    ...(label !== undefined && { label }),
    ...(autocomplete !== undefined && { autocomplete }),
  };
}

/**
 * Structures a field template, dispatching on `type`.
 */
export function structureField(
  value: unknown,
  location: string,
  env: ExpressionEnvironment
): FieldTemplate {
  const compiler = new Compiler(env);
  const raw = requireObject(value, location);
  const type = requireString(raw.type, `${location}.type`);
  switch (type) {
    case 'text':
      return structureText(raw, location, compiler);
    case 'number':
      return structureNumber(raw, location, compiler);
    case 'date':
      return structureDate(raw, location, compiler);
    case 'select':
      return structureSelect(raw, location, compiler);
    default:
      return fail(`Unknown field type "${type}"`, `${location}.type`);
  }
}

/**
 * Structures a question. `fields` maps pointers to fields, in order.
 */
export function structureQuestion(
  value: unknown,
  location: string,
  env: ExpressionEnvironment
): QuestionTemplate {
  const compiler = new Compiler(env);
  const raw = requireObject(value, location);
  checkKeys(raw, ['id', 'title', 'description', 'fields', 'when'], location);

  const id = requireString(raw.id, `${location}.id`);
  const fieldsRaw = requireObject(raw.fields ?? {}, `${location}.fields`);
  const fields: QuestionField[] = Object.entries(fieldsRaw).map(([pointerText, fieldValue]) => {
    const fieldLocation = `${location}.fields[${JSON.stringify(pointerText)}]`;
    return {
      pointer: compiler.pointer(pointerText, fieldLocation),
      field: structureField(fieldValue, fieldLocation, env),
    };
  });

  const title = compiler.optionalTemplate(raw, 'title', location);
  const description = compiler.optionalTemplate(raw, 'description', location);
  return {
    id,
    ...(title !== undefined && { title }),
    ...(description !== undefined && { description }),
    fields,
    when: compiler.when(raw.when, `${location}.when`),
  };
}

function structureAsk(raw: RawObject, location: string, compiler: Compiler): AskStep {
  checkKeys(raw, ['ask', 'when'], location);
  return {
    type: 'ask',
    questionId: requireString(raw.ask, `${location}.ask`),
    when: compiler.when(raw.when, `${location}.when`),
  };
}

/**
 * `value` strings are expressions and other values literals; `template`
 * renders a string.
 */
function structureSet(raw: RawObject, location: string, compiler: Compiler): SetStep {
  checkKeys(raw, ['set', 'value', 'template', 'when'], location);
  if ((raw.value === undefined) === (raw.template === undefined)) {
    fail('A set step needs exactly one of "value", "template"', location);
  }
  let value: ValueSource;
  if (raw.template !== undefined) {
    value = { type: 'template', template: compiler.template(raw.template, `${location}.template`) };
  } else if (typeof raw.value === 'string') {
    value = { type: 'expression', expression: compiler.expression(raw.value, `${location}.value`) };
  } else {
    value = { type: 'literal', value: requireJsonValue(raw.value, `${location}.value`) };
  }
  return {
    type: 'set',
    pointer: compiler.pointer(raw.set, `${location}.set`),
    value,
    when: compiler.when(raw.when, `${location}.when`),
  };
}

function structureExit(raw: RawObject, location: string, compiler: Compiler): ExitStep {
  checkKeys(raw, ['exit', 'description', 'when'], location);
  const description = compiler.optionalTemplate(raw, 'description', location);
  return {
    type: 'exit',
    title: compiler.template(raw.exit, `${location}.exit`),
    ...(description !== undefined && { description }),
    when: compiler.when(raw.when, `${location}.when`),
  };
}

function structureEnsure(raw: RawObject, location: string, compiler: Compiler): EnsureStep {
  checkKeys(raw, ['ensure', 'when'], location);
  const items: readonly unknown[] =
    typeof raw.ensure === 'string' ? [raw.ensure] : requireArray(raw.ensure, `${location}.ensure`);
  const pointers = items.map((item, index) => {
    const itemLocation = `${location}.ensure[${String(index)}]`;
    const pointer = compiler.pointer(item, itemLocation);
    if (!isDirectPointer(pointer)) {
      fail(`Ensure needs a direct pointer, got "${formatPointer(pointer)}"`, itemLocation);
    }
    return pointer;
  });
  return { type: 'ensure', pointers, when: compiler.when(raw.when, `${location}.when`) };
}

/**
 * Structures a step. The variant is chosen by which of `ask`, `set`, `exit`
 * and `ensure` is present.
 */
export function structureStep(value: unknown, location: string, env: ExpressionEnvironment): Step {
  const compiler = new Compiler(env);
  const raw = requireObject(value, location);
  const present = STEP_KEYS.filter((key) => raw[key] !== undefined);
  const [kind] = present;
  if (present.length !== 1 || kind === undefined) {
    fail(`A step needs exactly one of ${STEP_KEYS.map((key) => `"${key}"`).join(', ')}`, location);
  }
  switch (kind) {
    case 'ask':
      return structureAsk(raw, location, compiler);
    case 'set':
      return structureSet(raw, location, compiler);
    case 'exit':
      return structureExit(raw, location, compiler);
    case 'ensure':
      return structureEnsure(raw, location, compiler);
  }
}

/**
 * Structures an interview whose question includes are already resolved.
 *
 * @throws ConfigurationError for malformed elements or duplicate question ids.
 */
export function structureInterview(
  value: unknown,
  location: string,
  env: ExpressionEnvironment
): Interview {
  const raw = requireObject(value, location);
  checkKeys(raw, ['id', 'questions', 'steps'], location);
  const id = requireString(raw.id, `${location}.id`);

  const questions = new Map<string, QuestionTemplate>();
  requireArray(raw.questions ?? [], `${location}.questions`).forEach((item, index) => {
    const questionLocation = `${location}.questions[${String(index)}]`;
    const question = structureQuestion(item, questionLocation, env);
    if (questions.has(question.id)) {
      fail(`Duplicate question id "${question.id}"`, questionLocation);
    }
    questions.set(question.id, question);
  });

  const steps = requireArray(raw.steps ?? [], `${location}.steps`).map((item, index) =>
    structureStep(item, `${location}.steps[${String(index)}]`, env)
  );

  return { id, questions, steps };
}

/**
 * A reference the script makes that nothing in it satisfies.
 */
export interface ScriptWarning {
  readonly location: string;
  readonly message: string;
}

/**
 * Finds ask steps naming unknown questions, and ensure pointers no question
 * provides. Both fail only when the step actually runs.
 */
export function findScriptWarnings(interview: Interview, location: string): ScriptWarning[] {
  const provided = new Set<string>();
  for (const question of interview.questions.values()) {
    for (const pointer of questionProvides(question)) {
      provided.add(pointer);
    }
  }

  const warnings: ScriptWarning[] = [];
  interview.steps.forEach((step, index) => {
    const stepLocation = `${location}.steps[${String(index)}]`;
    if (step.type === 'ask' && !interview.questions.has(step.questionId)) {
      warnings.push({
        location: stepLocation,
        message: `Ask step names unknown question "${step.questionId}"`,
      });
    }
    if (step.type === 'ensure') {
      for (const pointer of step.pointers) {
        const text = formatPointer(pointer);
        if (!provided.has(text)) {
          warnings.push({
            location: stepLocation,
            message: `No question provides "${text}"`,
          });
        }
      }
    }
  });
  return warnings;
}

/**
 * Checks that a parsed document is a mapping.
 */
export function requireDocument(value: unknown, location: string): JsonObject {
  if (!isJsonObject(value) || !isJsonValue(value)) {
    fail('A script document must be a mapping of JSON values', location);
  }
  return value;
}
