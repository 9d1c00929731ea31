/**
 * Field templates: the typed inputs a question is made of.
 *
 * A field template is static script data. Rendering it against a template
 * context produces a JSON Schema fragment; the same context produces the
 * validators that decode a response for it.
 *
 * @packageDocumentation
 */

import type { Expression, Template } from '../logic/environment.js';
import type { ValueSource, WhenCondition } from '../logic/condition.js';
import type { JsonObject, JsonValue, Value } from '../utils/json.js';

/**
 * Field types.
 */
export type FieldType = 'text' | 'number' | 'date' | 'select';

/**
 * Formats a text field can require.
 */
export type TextFormat = 'email';

/**
 * Properties shared by every field.
 */
interface FieldBase {
  /** Label shown to the user; becomes the schema title. */
  readonly label?: Template;
  /** Pre-filled value offered to the user. */
  readonly default?: ValueSource;
}

export interface TextField extends FieldBase {
  readonly type: 'text';
  readonly optional: boolean;
  /** Minimum length after trimming. */
  readonly min: number;
  /** Maximum length after trimming. */
  readonly max: number;
  readonly regex?: string;
  readonly format?: TextFormat;
}

export interface NumberField extends FieldBase {
  readonly type: 'number';
  readonly optional: boolean;
  readonly integer: boolean;
  readonly min?: number;
  readonly max?: number;
}

/**
 * Dates are ISO `YYYY-MM-DD` strings, bounds included.
 */
export interface DateField extends FieldBase {
  readonly type: 'date';
  readonly optional: boolean;
  readonly min?: string;
  readonly max?: string;
}

/**
 * One choice of a select field.
 */
export interface SelectOption {
  readonly label: Template;
  /** The value written to data when this option is chosen. */
  readonly value: JsonValue;
  /** Pre-selected regardless of context. */
  readonly default: boolean;
  /** Pre-selected when this expression is truthy. */
  readonly defaultExpr?: Expression;
  /** Hidden unless this holds. */
  readonly when: WhenCondition;
}

/**
 * A choice among options. The field is optional when `min` is 0 and takes
 * several values when `max` is above 1.
 */
export interface SelectField {
  readonly type: 'select';
  readonly label?: Template;
  readonly options: readonly SelectOption[];
  readonly min: number;
  readonly max: number;
  /** UI hint, e.g. `dropdown`, `radio` or `checkbox`. */
  readonly component: string;
  /** Autocomplete hint for the input, e.g. `country-name`. */
  readonly autocomplete?: string;
}

export type FieldTemplate = TextField | NumberField | DateField | SelectField;

/**
 * JSON Schema fragment for one field.
 */
export type FieldSchema = JsonObject;

/**
 * Result of one validator.
 */
export type ValidatorResult =
  | { readonly valid: true; readonly value: JsonValue }
  | { readonly valid: false; readonly message: string };

/**
 * A pure check on a response value. Returns the (possibly normalized) value
 * for the next validator.
 */
export type Validator = (value: Value) => ValidatorResult;

/** Text field minimum length when the script gives none. */
export const DEFAULT_TEXT_MIN = 1;
/** Text field maximum length when the script gives none. */
export const DEFAULT_TEXT_MAX = 300;
/** Select field UI hint when the script gives none. */
export const DEFAULT_SELECT_COMPONENT = 'dropdown';
